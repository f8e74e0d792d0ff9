import { decomposeRef } from '@hatch/shared-types';
import type { Completion } from '../completions.js';
import type { CommandContext } from '../context.js';
import { NotFoundError, UsageError } from '../errors.js';
import { parseCommandOptions, type CommandOptionsSpec } from '../options.js';
import { TablePrinter } from '../output.js';
import type { BuiltinCommand } from '../registry.js';
import { REF_FILTER_OPTIONS, matchesRef, parseRefPattern } from './refs.js';

const INFO_COMMAND_OPTIONS: CommandOptionsSpec = {
  usage: '[OPTION…] REF',
  summary: 'Show info for installed app or runtime',
  options: REF_FILTER_OPTIONS,
  scope: 'standard-dirs',
};

function info(ctx: CommandContext, argv: string[]) {
  const { args, options, installations } = parseCommandOptions(ctx, argv, INFO_COMMAND_OPTIONS);
  const [text, ...extra] = args;
  if (text === undefined) {
    throw new UsageError('REF must be specified', ctx.programName);
  }
  if (extra.length > 0) {
    throw new UsageError('Too many arguments', ctx.programName);
  }

  const pattern = parseRefPattern(text, options);
  for (const installation of installations) {
    const entry = ctx.services.packages
      .listInstalled(installation)
      .find((candidate) => matchesRef(candidate.ref, pattern));
    const ref = entry ? decomposeRef(entry.ref) : null;
    if (!entry || !ref) {
      continue;
    }

    const printer = new TablePrinter();
    printer.addRow(['Ref:', entry.ref]);
    printer.addRow(['ID:', ref.id]);
    printer.addRow(['Arch:', ref.arch]);
    printer.addRow(['Branch:', ref.branch]);
    printer.addRow(['Origin:', entry.remote]);
    printer.addRow(['Commit:', entry.commit]);
    printer.addRow(['Installation:', installation.displayName]);
    printer.addRow(['Installed:', entry.installedAt]);
    printer.print(ctx.io);
    return;
  }

  throw new NotFoundError(`${text} not installed`, { ref: text });
}

function completeInfo(completion: Completion) {
  const parsed = completion.parse(INFO_COMMAND_OPTIONS);
  if (!parsed) {
    return;
  }
  completion.completeOptionsFor(INFO_COMMAND_OPTIONS);
  if (parsed.args.length > 0) {
    return;
  }
  for (const installation of parsed.installations) {
    for (const entry of completion.ctx.services.packages.listInstalled(installation)) {
      completion.complete(entry.ref);
    }
  }
}

export const infoCommand: BuiltinCommand = {
  name: 'info',
  description: 'Show info for installed app or runtime',
  run: info,
  complete: completeInfo,
};
