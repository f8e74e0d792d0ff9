import { RemoteNameSchema } from '@hatch/shared-types';
import type { Completion } from '../completions.js';
import type { CommandContext } from '../context.js';
import { CliError, UsageError } from '../errors.js';
import { historyId } from '../installations.js';
import { parseCommandOptions, type CommandOptionsSpec } from '../options.js';
import { TablePrinter } from '../output.js';
import type { BuiltinCommand } from '../registry.js';
import { singleInstallation } from './refs.js';

const REMOTES_OPTIONS: CommandOptionsSpec = {
  usage: '[OPTION…]',
  summary: 'List remote repositories',
  options: [{ long: 'show-details', short: 'd', kind: 'flag', description: 'Show remote details' }],
  scope: 'standard-dirs',
};

function listRemotes(ctx: CommandContext, argv: string[]) {
  const { args, options, installations } = parseCommandOptions(ctx, argv, REMOTES_OPTIONS);
  if (args.length > 0) {
    throw new UsageError('Too many arguments', ctx.programName);
  }

  const details = options.flag('show-details');
  const printer = new TablePrinter();
  printer.setTitles(details ? ['Name', 'Title', 'URL', 'Options'] : ['Name', 'Options']);

  for (const installation of installations) {
    for (const remote of ctx.services.packages.listRemotes(installation)) {
      const scope = historyId(installation);
      printer.addRow(details ? [remote.name, remote.title, remote.url, scope] : [remote.name, scope]);
    }
  }
  printer.print(ctx.io);
}

export const remotesCommand: BuiltinCommand = {
  name: 'remotes',
  description: 'List all configured remotes',
  run: listRemotes,
  complete: (completion) => completion.completeOptionsFor(REMOTES_OPTIONS),
};

export const remoteListCommand: BuiltinCommand = {
  ...remotesCommand,
  name: 'remote-list',
  deprecated: true,
};

const REMOTE_ADD_OPTIONS: CommandOptionsSpec = {
  usage: '[OPTION…] NAME LOCATION',
  summary: 'Add a remote repository',
  options: [
    { long: 'title', kind: 'value', placeholder: 'TITLE', description: 'A nice name to use for this remote' },
    { long: 'if-not-exists', kind: 'flag', description: 'Do nothing if the provided remote exists' },
  ],
  scope: 'one-dir',
};

function addRemote(ctx: CommandContext, argv: string[]) {
  const { args, options, installations } = parseCommandOptions(ctx, argv, REMOTE_ADD_OPTIONS);
  const [name, location, ...extra] = args;
  if (name === undefined) {
    throw new UsageError('NAME must be specified', ctx.programName);
  }
  if (location === undefined) {
    throw new UsageError('LOCATION must be specified', ctx.programName);
  }
  if (extra.length > 0) {
    throw new UsageError('Too many arguments', ctx.programName);
  }
  if (!RemoteNameSchema.safeParse(name).success) {
    throw new UsageError(`'${name}' is not a valid remote name`, ctx.programName);
  }

  const installation = singleInstallation(installations);
  const { packages } = ctx.services;
  if (packages.listRemotes(installation).some((remote) => remote.name === name)) {
    if (options.flag('if-not-exists')) {
      return;
    }
    throw new CliError('REMOTE_EXISTS', `Remote ${name} already exists`, 1, { remote: name });
  }

  packages.addRemote(installation, { name, url: location, title: options.value('title') });
}

export const remoteAddCommand: BuiltinCommand = {
  name: 'remote-add',
  description: 'Add a new remote repository (by URL)',
  run: addRemote,
  complete: (completion) => completion.completeOptionsFor(REMOTE_ADD_OPTIONS),
};

const REMOTE_DELETE_OPTIONS: CommandOptionsSpec = {
  usage: '[OPTION…] NAME',
  summary: 'Delete a remote repository',
  options: [
    { long: 'force', kind: 'flag', description: 'Remove remote even if in use' },
  ],
  scope: 'one-dir',
};

function deleteRemote(ctx: CommandContext, argv: string[]) {
  const { args, options, installations } = parseCommandOptions(ctx, argv, REMOTE_DELETE_OPTIONS);
  const [name, ...extra] = args;
  if (name === undefined) {
    throw new UsageError('NAME must be specified', ctx.programName);
  }
  if (extra.length > 0) {
    throw new UsageError('Too many arguments', ctx.programName);
  }

  const installation = singleInstallation(installations);
  const { packages } = ctx.services;
  if (!options.flag('force')) {
    const users = packages.listInstalled(installation).filter((entry) => entry.remote === name);
    if (users.length > 0) {
      throw new CliError(
        'REMOTE_IN_USE',
        `Can't remove remote '${name}' with installed refs: ${users.map((entry) => entry.ref).join(', ')}`,
        1,
        { remote: name },
      );
    }
  }

  packages.deleteRemote(installation, name);
}

/** Completes configured remote names at the first positional argument. */
export function completeRemoteName(completion: Completion, spec: CommandOptionsSpec) {
  const parsed = completion.parse(spec);
  if (!parsed || parsed.args.length > 0) {
    return;
  }
  completion.completeOptionsFor(spec);
  const installation = singleInstallation(parsed.installations);
  for (const remote of completion.ctx.services.packages.listRemotes(installation)) {
    completion.complete(remote.name);
  }
}

export const remoteDeleteCommand: BuiltinCommand = {
  name: 'remote-delete',
  description: 'Delete a configured remote',
  run: deleteRemote,
  complete: (completion) => completeRemoteName(completion, REMOTE_DELETE_OPTIONS),
};
