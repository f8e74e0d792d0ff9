import type { Completion } from './completions.js';
import type { CommandContext } from './context.js';

export interface BuiltinCommand {
  name: string;
  description: string;
  /** Still dispatchable, but left out of help and suggestions. */
  deprecated?: boolean;
  run(ctx: CommandContext, args: string[]): void;
  complete?(completion: Completion): void;
}

export type RegistryEntry =
  | { kind: 'section'; title: string }
  | { kind: 'command'; command: BuiltinCommand };

export interface ExtractedCommand {
  commandName?: string;
  args: string[];
}

/**
 * Takes the first word that is not an option as the command name. Every other
 * word keeps its relative order, so global options may come before or after
 * the command.
 */
export function extractCommand(argv: readonly string[]): ExtractedCommand {
  let commandName: string | undefined;
  const args: string[] = [];
  for (const word of argv) {
    if (commandName === undefined && !word.startsWith('-')) {
      commandName = word;
    } else {
      args.push(word);
    }
  }
  return { commandName, args };
}

export function levenshteinDistance(a: string, b: string): number {
  const previous = Array.from({ length: b.length + 1 }, (_, index) => index);
  for (let i = 1; i <= a.length; i++) {
    let diagonal = previous[0] ?? 0;
    previous[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const above = previous[j] ?? 0;
      const left = previous[j - 1] ?? 0;
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      previous[j] = Math.min(above + 1, left + 1, diagonal + cost);
      diagonal = above;
    }
  }
  return previous[b.length] ?? 0;
}

export class CommandRegistry {
  private readonly entries: readonly RegistryEntry[];

  constructor(entries: readonly RegistryEntry[]) {
    const names = new Set<string>();
    for (const entry of entries) {
      if (entry.kind !== 'command') {
        continue;
      }
      if (names.has(entry.command.name)) {
        throw new Error(`Command ${entry.command.name} registered twice`);
      }
      names.add(entry.command.name);
    }
    this.entries = [...entries];
  }

  /** Every command in registration order, deprecated ones included. */
  commands(): BuiltinCommand[] {
    return this.entries.flatMap((entry) => (entry.kind === 'command' ? [entry.command] : []));
  }

  visibleCommands() {
    return this.commands().filter((command) => !command.deprecated);
  }

  find(name: string) {
    return this.commands().find((command) => command.name === name);
  }

  /** Closest non-deprecated name by edit distance; the earliest wins a tie. */
  suggest(name: string) {
    let best: BuiltinCommand | undefined;
    let bestDistance = Number.POSITIVE_INFINITY;
    for (const command of this.visibleCommands()) {
      const distance = levenshteinDistance(name, command.name);
      if (distance < bestDistance) {
        best = command;
        bestDistance = distance;
      }
    }
    return best;
  }

  summaryLines(): string[] {
    const lines: string[] = [];
    const width = Math.max(0, ...this.visibleCommands().map((command) => command.name.length));
    for (const entry of this.entries) {
      if (entry.kind === 'section') {
        if (lines.length > 0) {
          lines.push('');
        }
        lines.push(`${entry.title}:`);
      } else if (!entry.command.deprecated) {
        lines.push(`  ${entry.command.name.padEnd(width)}  ${entry.command.description}`);
      }
    }
    return lines;
  }
}
