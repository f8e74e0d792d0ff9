import { describeColumns, resolveColumns } from '../columns.js';
import type { Completion } from '../completions.js';
import type { CommandContext } from '../context.js';
import { UsageError } from '../errors.js';
import { HISTORY_COLUMNS, printHistory } from '../history.js';
import { parseCommandOptions, type CommandOptionsSpec } from '../options.js';
import type { BuiltinCommand } from '../registry.js';
import { parseTime } from '../time.js';

export const HISTORY_OPTIONS: CommandOptionsSpec = {
  usage: '[OPTION…]',
  summary: 'Show history',
  options: [
    { long: 'since', kind: 'value', placeholder: 'TIME', description: 'Only show changes after TIME' },
    { long: 'until', kind: 'value', placeholder: 'TIME', description: 'Only show changes before TIME' },
    { long: 'columns', kind: 'value', placeholder: 'FIELD,…', description: 'What information to show' },
    { long: 'show-columns', kind: 'flag', description: 'Show available columns' },
  ],
  scope: 'all-dirs',
  optionalRepo: true,
};

function history(ctx: CommandContext, argv: string[]) {
  const { args, options, installations } = parseCommandOptions(ctx, argv, HISTORY_OPTIONS);
  if (args.length > 0) {
    throw new UsageError('Too many arguments', ctx.programName);
  }
  if (options.flag('show-columns')) {
    describeColumns(HISTORY_COLUMNS).print(ctx.io);
    return;
  }

  // Everything the user typed is checked before the journal is touched.
  const columns = resolveColumns(HISTORY_COLUMNS, options.value('columns'), ctx.programName);
  const now = ctx.now();
  const sinceText = options.value('since');
  const untilText = options.value('until');
  const since = sinceText === undefined ? undefined : parseTime(sinceText, now);
  const until = untilText === undefined ? undefined : parseTime(untilText, now);

  printHistory(ctx, columns, { installations, since, until });
}

function completeHistory(completion: Completion) {
  completion.completeOptionsFor(HISTORY_OPTIONS);
}

export const historyCommand: BuiltinCommand = {
  name: 'history',
  description: 'Show history',
  run: history,
  complete: completeHistory,
};
