import type { CommandContext } from './context.js';
import { CliError, errorMessage } from './errors.js';
import {
  GLOBAL_OPTIONS,
  INFO_OPTIONS,
  TARGET_OPTIONS,
  optionSetsFor,
  parseCommandOptions,
  takesValue,
  type CommandOptionsSpec,
  type OptionSet,
  type ParsedCommand,
} from './options.js';
import { extractCommand, type CommandRegistry } from './registry.js';

export const COMPLETE_COMMAND = 'complete';

export type CompletionShell = 'bash' | 'zsh' | 'fish';

export const COMPLETION_SHELLS: readonly CompletionShell[] = ['bash', 'zsh', 'fish'];

/**
 * Splits a command line the way a POSIX shell would for plain words, single
 * and double quotes and backslash escapes. An unterminated quote runs to the
 * end of the line, since completion always sees partial input.
 */
export function splitCommandLine(line: string): string[] {
  const words: string[] = [];
  let current = '';
  let inWord = false;
  let quote: "'" | '"' | undefined;

  for (let index = 0; index < line.length; index++) {
    const char = line.charAt(index);

    if (quote === "'") {
      if (char === "'") {
        quote = undefined;
      } else {
        current += char;
      }
      continue;
    }

    if (quote === '"') {
      if (char === '"') {
        quote = undefined;
      } else if (char === '\\' && index + 1 < line.length && '"\\$`'.includes(line.charAt(index + 1))) {
        current += line.charAt(++index);
      } else {
        current += char;
      }
      continue;
    }

    if (char === ' ' || char === '\t' || char === '\n') {
      if (inWord) {
        words.push(current);
        current = '';
        inWord = false;
      }
      continue;
    }

    inWord = true;
    if (char === "'" || char === '"') {
      quote = char;
    } else if (char === '\\' && index + 1 < line.length) {
      current += line.charAt(++index);
    } else {
      current += char;
    }
  }

  if (inWord) {
    words.push(current);
  }
  return words;
}

export function optionWords(options: OptionSet): string[] {
  const words: string[] = [];
  for (const option of options) {
    if (option.hidden) {
      continue;
    }
    words.push(takesValue(option) ? `--${option.long}=` : `--${option.long}`);
    if (option.short) {
      words.push(`-${option.short}`);
    }
  }
  return words;
}

/**
 * The partial command line a completion request describes, with the program
 * name and the word being completed already removed.
 */
export class Completion {
  constructor(
    readonly ctx: CommandContext,
    readonly cur: string,
    readonly prev: string,
    readonly line: string,
    readonly args: readonly string[],
  ) {}

  /** Writes the candidate if it extends the current word. */
  complete(word: string) {
    if (word.startsWith(this.cur)) {
      this.ctx.io.print(word);
    }
  }

  completeOptions(options: OptionSet) {
    optionWords(options).forEach((word) => this.complete(word));
  }

  /** Every option the command accepts: target, its own, then global. */
  completeOptionsFor(spec: CommandOptionsSpec) {
    optionSetsFor(spec).forEach((options) => this.completeOptions(options));
  }

  /**
   * Parses the partial arguments the way the command would. Input the command
   * would reject yields no candidates rather than an error.
   */
  parse(spec: CommandOptionsSpec): ParsedCommand | null {
    try {
      return parseCommandOptions(this.ctx, this.args, spec);
    } catch (error) {
      if (error instanceof CliError) {
        this.ctx.logger.detail.debug({ error: errorMessage(error) }, 'completion parse failed');
        return null;
      }
      throw error;
    }
  }
}

export function isCompletionRequest(argv: readonly string[]) {
  return argv.length >= 4 && argv[0] === COMPLETE_COMMAND;
}

export function runCompletion(
  ctx: CommandContext,
  registry: CommandRegistry,
  cur: string,
  prev: string,
  line: string,
) {
  const words = splitCommandLine(line).slice(1);
  if (cur.length > 0 && words[words.length - 1] === cur) {
    words.pop();
  }

  const { commandName, args } = extractCommand(words);
  const command = commandName === undefined ? undefined : registry.find(commandName);
  ctx.logger.detail.debug({ command: command?.name, args }, 'completing');

  if (!command) {
    const completion = new Completion(ctx, cur, prev, line, args);
    registry.visibleCommands().forEach((entry) => completion.complete(entry.name));
    completion.completeOptions(GLOBAL_OPTIONS);
    completion.completeOptions(INFO_OPTIONS);
    completion.completeOptions(TARGET_OPTIONS);
    return;
  }

  const completion = new Completion(
    { ...ctx, programName: `${ctx.programName} ${command.name}` },
    cur,
    prev,
    line,
    args,
  );
  if (command.complete) {
    command.complete(completion);
  } else {
    completion.completeOptions(GLOBAL_OPTIONS);
  }
}

function bashCompletion(programName: string) {
  return [
    `# ${programName} bash completion`,
    `_${programName}_complete() {`,
    '  local cur prev',
    '  cur="${COMP_WORDS[COMP_CWORD]}"',
    '  prev="${COMP_WORDS[COMP_CWORD-1]}"',
    '  local IFS=$\'\\n\'',
    `  COMPREPLY=( $(${programName} ${COMPLETE_COMMAND} "$cur" "$prev" "\${COMP_LINE:0:$COMP_POINT}") )`,
    '  [[ ${COMPREPLY[0]} == *= ]] && compopt -o nospace',
    '}',
    `complete -F _${programName}_complete ${programName}`,
    '',
  ].join('\n');
}

function zshCompletion(programName: string) {
  return [
    `#compdef ${programName}`,
    `_${programName}() {`,
    '  local -a candidates',
    `  candidates=(\${(f)"$(${programName} ${COMPLETE_COMMAND} "\${words[CURRENT]}" "\${words[CURRENT-1]}" "\${BUFFER[1,CURSOR]}")"})`,
    '  compadd -Q -a candidates',
    '}',
    `_${programName} "$@"`,
    '',
  ].join('\n');
}

function fishCompletion(programName: string) {
  return [
    `complete -c ${programName} -f -a '(${programName} ${COMPLETE_COMMAND} (commandline -ct) "" (commandline -cp))'`,
    '',
  ].join('\n');
}

export function completionScript(shell: CompletionShell, programName: string) {
  if (shell === 'bash') {
    return bashCompletion(programName);
  }
  if (shell === 'zsh') {
    return zshCompletion(programName);
  }
  return fishCompletion(programName);
}
