import { decomposeRef, type RefKind } from '@hatch/shared-types';
import { describeColumns, resolveColumns, type ColumnSpec } from '../columns.js';
import type { Completion } from '../completions.js';
import type { CommandContext } from '../context.js';
import { UsageError } from '../errors.js';
import { historyId } from '../installations.js';
import { parseCommandOptions, type CommandOptionsSpec } from '../options.js';
import { TablePrinter } from '../output.js';
import type { BuiltinCommand } from '../registry.js';

type ListColumnId =
  | 'application'
  | 'arch'
  | 'branch'
  | 'origin'
  | 'installation'
  | 'ref'
  | 'commit'
  | 'installed';

export const LIST_COLUMNS: readonly ColumnSpec<ListColumnId>[] = [
  { id: 'application', title: 'Application', description: 'Show the application/runtime ID', defaultVisible: true, allInAllMode: true },
  { id: 'arch', title: 'Arch', description: 'Show the architecture', defaultVisible: true, allInAllMode: true },
  { id: 'branch', title: 'Branch', description: 'Show the branch', defaultVisible: true, allInAllMode: true },
  { id: 'origin', title: 'Origin', description: 'Show the origin remote', defaultVisible: true, allInAllMode: true },
  { id: 'installation', title: 'Installation', description: 'Show the installation', defaultVisible: true, allInAllMode: true },
  { id: 'ref', title: 'Ref', description: 'Show the ref', defaultVisible: false, allInAllMode: true },
  { id: 'commit', title: 'Commit', description: 'Show the active commit', defaultVisible: false, allInAllMode: true },
  { id: 'installed', title: 'Installed', description: 'Show when the ref was installed', defaultVisible: false, allInAllMode: true },
];

const LIST_OPTIONS: CommandOptionsSpec = {
  usage: '[OPTION…]',
  summary: 'List installed apps and/or runtimes',
  options: [
    { long: 'app', kind: 'flag', description: 'List installed applications' },
    { long: 'runtime', kind: 'flag', description: 'List installed runtimes' },
    { long: 'arch', kind: 'value', placeholder: 'ARCH', description: 'Arch to show' },
    { long: 'columns', kind: 'value', placeholder: 'FIELD,…', description: 'What information to show' },
    { long: 'show-columns', kind: 'flag', description: 'Show available columns' },
  ],
  scope: 'all-dirs',
  optionalRepo: true,
};

function list(ctx: CommandContext, argv: string[]) {
  const { args, options, installations } = parseCommandOptions(ctx, argv, LIST_OPTIONS);
  if (args.length > 0) {
    throw new UsageError('Too many arguments', ctx.programName);
  }
  if (options.flag('show-columns')) {
    describeColumns(LIST_COLUMNS).print(ctx.io);
    return;
  }

  const columns = resolveColumns(LIST_COLUMNS, options.value('columns'), ctx.programName);
  const kinds: RefKind[] = [];
  if (options.flag('app')) {
    kinds.push('app');
  }
  if (options.flag('runtime')) {
    kinds.push('runtime');
  }
  const arch = options.value('arch');

  const printer = new TablePrinter();
  printer.setTitles(columns.map((column) => column.title));

  for (const installation of installations) {
    for (const entry of ctx.services.packages.listInstalled(installation)) {
      const ref = decomposeRef(entry.ref);
      if (!ref) {
        ctx.logger.main.debug({ ref: entry.ref }, 'skipping invalid installed ref');
        continue;
      }
      if ((kinds.length > 0 && !kinds.includes(ref.kind)) || (arch !== undefined && ref.arch !== arch)) {
        continue;
      }

      const cells: Record<ListColumnId, string> = {
        application: ref.id,
        arch: ref.arch,
        branch: ref.branch,
        origin: entry.remote,
        installation: historyId(installation),
        ref: entry.ref,
        commit: entry.commit.slice(0, 12),
        installed: entry.installedAt,
      };
      printer.addRow(columns.map((column) => cells[column.id]));
    }
  }

  printer.print(ctx.io);
}

function completeList(completion: Completion) {
  completion.completeOptionsFor(LIST_OPTIONS);
}

export const listCommand: BuiltinCommand = {
  name: 'list',
  description: 'List installed apps and/or runtimes',
  run: list,
  complete: completeList,
};
