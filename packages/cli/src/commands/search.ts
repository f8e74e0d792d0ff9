import { decomposeRef } from '@hatch/shared-types';
import type { Completion } from '../completions.js';
import type { CommandContext } from '../context.js';
import { UsageError } from '../errors.js';
import { parseCommandOptions, type CommandOptionsSpec } from '../options.js';
import { TablePrinter } from '../output.js';
import type { BuiltinCommand } from '../registry.js';

const SEARCH_OPTIONS: CommandOptionsSpec = {
  usage: '[OPTION…] TEXT',
  summary: 'Search remote apps/runtimes for text',
  options: [
    { long: 'arch', kind: 'value', placeholder: 'ARCH', description: 'Arch to search for' },
  ],
  scope: 'standard-dirs',
};

interface SearchHit {
  id: string;
  branch: string;
  remotes: string[];
}

function search(ctx: CommandContext, argv: string[]) {
  const { args, options, installations } = parseCommandOptions(ctx, argv, SEARCH_OPTIONS);
  const [text, ...extra] = args;
  if (text === undefined) {
    throw new UsageError('TEXT must be specified', ctx.programName);
  }
  if (extra.length > 0) {
    throw new UsageError('Too many arguments', ctx.programName);
  }

  const needle = text.toLowerCase();
  const arch = options.value('arch') ?? ctx.services.system.defaultArch();
  const hits = new Map<string, SearchHit>();

  for (const installation of installations) {
    for (const remote of ctx.services.packages.listRemotes(installation)) {
      for (const entry of ctx.services.packages.listRemoteRefs(installation, remote.name)) {
        const ref = decomposeRef(entry.ref);
        if (!ref || ref.arch !== arch || !ref.id.toLowerCase().includes(needle)) {
          continue;
        }
        const key = `${ref.id}/${ref.branch}`;
        const hit = hits.get(key) ?? { id: ref.id, branch: ref.branch, remotes: [] };
        if (!hit.remotes.includes(remote.name)) {
          hit.remotes.push(remote.name);
        }
        hits.set(key, hit);
      }
    }
  }

  if (hits.size === 0) {
    ctx.io.print('No matches found');
    return;
  }

  const printer = new TablePrinter();
  printer.setTitles(['Application ID', 'Branch', 'Remotes']);
  for (const hit of [...hits.values()].sort((a, b) => a.id.localeCompare(b.id))) {
    printer.addRow([hit.id, hit.branch, hit.remotes.join(',')]);
  }
  printer.print(ctx.io);
}

function completeSearch(completion: Completion) {
  completion.completeOptionsFor(SEARCH_OPTIONS);
}

export const searchCommand: BuiltinCommand = {
  name: 'search',
  description: 'Search for remote apps/runtimes',
  run: search,
  complete: completeSearch,
};
