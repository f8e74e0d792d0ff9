import type { Completion } from '../completions.js';
import type { CommandContext } from '../context.js';
import { NotFoundError, UsageError } from '../errors.js';
import { parseCommandOptions, type CommandOptionsSpec } from '../options.js';
import type { BuiltinCommand } from '../registry.js';
import {
  REF_FILTER_OPTIONS,
  logTransaction,
  parseRefPattern,
  pickRef,
  singleInstallation,
} from './refs.js';

const INSTALL_OPTIONS: CommandOptionsSpec = {
  usage: '[OPTION…] [REMOTE] REF…',
  summary: 'Install applications or runtimes',
  options: REF_FILTER_OPTIONS,
  scope: 'one-dir',
};

function install(ctx: CommandContext, argv: string[]) {
  const { args, options, installations } = parseCommandOptions(ctx, argv, INSTALL_OPTIONS);
  const installation = singleInstallation(installations);
  const { packages } = ctx.services;

  const remotes = packages.listRemotes(installation).map((remote) => remote.name);
  const [first, ...rest] = args;
  if (first === undefined) {
    throw new UsageError('At least one REF must be specified', ctx.programName);
  }
  if (remotes.length === 0) {
    throw new NotFoundError(`No remotes configured in ${installation.displayName}`);
  }

  const explicitRemote = rest.length > 0 && remotes.includes(first) ? first : undefined;
  const refArgs = explicitRemote === undefined ? args : rest;
  const searchRemotes = explicitRemote === undefined ? remotes : [explicitRemote];

  const available = searchRemotes.flatMap((remote) =>
    packages.listRemoteRefs(installation, remote).map((entry) => ({ remote, ref: entry.ref })),
  );

  for (const text of refArgs) {
    const ref = pickRef(
      ctx,
      text,
      parseRefPattern(text, options),
      available.map((entry) => entry.ref),
      explicitRemote === undefined ? 'any remote' : `remote ${explicitRemote}`,
    );
    const remote = available.find((entry) => entry.ref === ref)?.remote ?? first;

    const installed = logTransaction(
      ctx,
      { operation: 'install', installation, ref, remote },
      () => packages.install(installation, remote, ref),
    );
    ctx.io.print(`Installed ${installed.ref} from ${remote} (${installed.commit.slice(0, 12)})`);
  }
}

function completeInstall(completion: Completion) {
  const parsed = completion.parse(INSTALL_OPTIONS);
  if (!parsed) {
    return;
  }
  const installation = singleInstallation(parsed.installations);
  const { packages } = completion.ctx.services;
  const remotes = packages.listRemotes(installation).map((remote) => remote.name);

  if (parsed.args.length === 0) {
    completion.completeOptionsFor(INSTALL_OPTIONS);
    remotes.forEach((remote) => completion.complete(remote));
    return;
  }

  const [remote] = parsed.args;
  if (remote !== undefined && remotes.includes(remote)) {
    for (const entry of packages.listRemoteRefs(installation, remote)) {
      completion.complete(entry.ref);
    }
  }
}

export const installCommand: BuiltinCommand = {
  name: 'install',
  description: 'Install an application or runtime',
  run: install,
  complete: completeInstall,
};
