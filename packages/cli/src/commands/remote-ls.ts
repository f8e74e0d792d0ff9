import { decomposeRef } from '@hatch/shared-types';
import type { CommandContext } from '../context.js';
import { UsageError } from '../errors.js';
import { parseCommandOptions, type CommandOptionsSpec } from '../options.js';
import { TablePrinter, formatSize } from '../output.js';
import type { RemoteRefInfo } from '../packages.js';
import type { BuiltinCommand } from '../registry.js';
import { singleInstallation } from './refs.js';
import { completeRemoteName } from './remotes.js';

const ALL_ARCHES = '*';

const REMOTE_LS_OPTIONS: CommandOptionsSpec = {
  usage: '[OPTION…] REMOTE',
  summary: 'Show available runtimes and applications',
  options: [
    { long: 'show-details', short: 'd', kind: 'flag', description: 'Show arches and branches' },
    { long: 'runtime', kind: 'flag', description: 'Show only runtimes' },
    { long: 'app', kind: 'flag', description: 'Show only apps' },
    { long: 'updates', kind: 'flag', description: 'Show only those where updates are available' },
    { long: 'arch', kind: 'value', placeholder: 'ARCH', description: 'Limit to this arch (* for all)' },
  ],
  scope: 'one-dir',
};

function listRemoteRefs(ctx: CommandContext, argv: string[]) {
  const { args, options, installations } = parseCommandOptions(ctx, argv, REMOTE_LS_OPTIONS);
  const [remote, ...extra] = args;
  if (remote === undefined) {
    throw new UsageError('REMOTE must be specified', ctx.programName);
  }
  if (extra.length > 0) {
    throw new UsageError('Too many arguments', ctx.programName);
  }

  const installation = singleInstallation(installations);
  const { packages, system } = ctx.services;
  const showDetails = options.flag('show-details');
  const onlyUpdates = options.flag('updates');
  const showApps = options.flag('app') || !options.flag('runtime');
  const showRuntimes = options.flag('runtime') || !options.flag('app');

  const archOption = options.value('arch');
  const arches =
    archOption === ALL_ARCHES ? undefined : archOption !== undefined ? [archOption] : system.supportedArches();

  const deployed = onlyUpdates
    ? new Map(packages.listInstalled(installation).map((entry) => [entry.ref, entry.commit] as const))
    : undefined;

  // Keyed by what gets printed; the first ref seen for a name wins.
  const names = new Map<string, RemoteRefInfo>();
  for (const entry of packages.listRemoteRefs(installation, remote)) {
    const ref = decomposeRef(entry.ref);
    if (!ref) {
      ctx.logger.main.debug({ ref: entry.ref }, 'invalid remote ref');
      continue;
    }
    if (deployed) {
      const commit = deployed.get(entry.ref);
      if (commit === undefined || commit === entry.commit) {
        continue;
      }
    }
    if (arches && !arches.includes(ref.arch)) {
      continue;
    }
    if ((ref.kind === 'runtime' && !showRuntimes) || (ref.kind === 'app' && !showApps)) {
      continue;
    }

    const name = showDetails ? entry.ref : ref.id;
    if (!names.has(name)) {
      names.set(name, entry);
    }
  }

  const printer = new TablePrinter();
  for (const name of [...names.keys()].sort()) {
    printer.addCell(name);
    const entry = names.get(name);
    if (showDetails && entry) {
      printer.addCell(entry.commit, 12);
      if (entry.installedSize !== undefined && entry.downloadSize !== undefined) {
        printer.addCell(formatSize(entry.installedSize));
        printer.addCell(formatSize(entry.downloadSize));
      }
    }
    printer.finishRow();
  }
  printer.print(ctx.io);
}

export const remoteLsCommand: BuiltinCommand = {
  name: 'remote-ls',
  description: 'List contents of a configured remote',
  run: listRemoteRefs,
  complete: (completion) => completeRemoteName(completion, REMOTE_LS_OPTIONS),
};
