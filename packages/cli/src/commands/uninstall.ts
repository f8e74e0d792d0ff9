import type { Completion } from '../completions.js';
import type { CommandContext } from '../context.js';
import { UsageError } from '../errors.js';
import { parseCommandOptions, type CommandOptionsSpec } from '../options.js';
import type { BuiltinCommand } from '../registry.js';
import {
  REF_FILTER_OPTIONS,
  logTransaction,
  parseRefPattern,
  pickRef,
  singleInstallation,
} from './refs.js';

const UNINSTALL_OPTIONS: CommandOptionsSpec = {
  usage: '[OPTION…] REF…',
  summary: 'Uninstall applications or runtimes',
  options: REF_FILTER_OPTIONS,
  scope: 'one-dir',
};

function uninstall(ctx: CommandContext, argv: string[]) {
  const { args, options, installations } = parseCommandOptions(ctx, argv, UNINSTALL_OPTIONS);
  if (args.length === 0) {
    throw new UsageError('At least one REF must be specified', ctx.programName);
  }

  const installation = singleInstallation(installations);
  const { packages } = ctx.services;
  const installed = packages.listInstalled(installation);

  for (const text of args) {
    const ref = pickRef(
      ctx,
      text,
      parseRefPattern(text, options),
      installed.map((entry) => entry.ref),
      installation.displayName,
    );
    const remote = installed.find((entry) => entry.ref === ref)?.remote;
    logTransaction(ctx, { operation: 'uninstall', installation, ref, remote }, () =>
      packages.uninstall(installation, ref),
    );
    ctx.io.print(`Uninstalled ${ref}`);
  }
}

function completeUninstall(completion: Completion) {
  const parsed = completion.parse(UNINSTALL_OPTIONS);
  if (!parsed) {
    return;
  }
  completion.completeOptionsFor(UNINSTALL_OPTIONS);
  const installation = singleInstallation(parsed.installations);
  for (const entry of completion.ctx.services.packages.listInstalled(installation)) {
    completion.complete(entry.ref);
  }
}

export const uninstallCommand: BuiltinCommand = {
  name: 'uninstall',
  description: 'Uninstall an installed application or runtime',
  run: uninstall,
  complete: completeUninstall,
};

// Kept for users coming from other package managers.
export const removeCommand: BuiltinCommand = {
  ...uninstallCommand,
  name: 'remove',
  deprecated: true,
};
