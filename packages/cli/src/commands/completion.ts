import { COMPLETION_SHELLS, completionScript, type CompletionShell } from '../completions.js';
import type { CommandContext } from '../context.js';
import { UsageError } from '../errors.js';
import { parseCommandOptions, type CommandOptionsSpec } from '../options.js';
import type { BuiltinCommand } from '../registry.js';
import { PROGRAM_NAME } from '../system.js';

const COMPLETION_OPTIONS: CommandOptionsSpec = {
  usage: '[OPTION…] [SHELL]',
  summary: 'Print shell completion script (bash, zsh or fish)',
  scope: 'no-dir',
};

function isShell(value: string): value is CompletionShell {
  return COMPLETION_SHELLS.some((shell) => shell === value);
}

function printCompletionScript(ctx: CommandContext, argv: string[]) {
  const { args } = parseCommandOptions(ctx, argv, COMPLETION_OPTIONS);
  const [shell = 'bash', ...extra] = args;
  if (extra.length > 0) {
    throw new UsageError('Too many arguments', ctx.programName);
  }
  if (!isShell(shell)) {
    throw new UsageError(
      `Unsupported shell ${shell}, expected one of: ${COMPLETION_SHELLS.join(', ')}`,
      ctx.programName,
    );
  }

  for (const line of completionScript(shell, PROGRAM_NAME).trimEnd().split('\n')) {
    ctx.io.print(line);
  }
}

export const completionCommand: BuiltinCommand = {
  name: 'completion',
  description: 'Print shell completion script',
  run: printCompletionScript,
  complete: (completion) => {
    const parsed = completion.parse(COMPLETION_OPTIONS);
    if (!parsed) {
      return;
    }
    completion.completeOptionsFor(COMPLETION_OPTIONS);
    if (parsed.args.length === 0) {
      COMPLETION_SHELLS.forEach((shell) => completion.complete(shell));
    }
  },
};
