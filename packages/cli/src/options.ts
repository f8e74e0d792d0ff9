import { Command, CommanderError, Option, type OptionValues } from 'commander';
import type { CommandContext } from './context.js';
import { EarlyExit, UsageError } from './errors.js';
import { DEFAULT_INSTALLATION_ID, type Installation } from './installations.js';
import { VERSION } from './system.js';

export type OptionKind = 'flag' | 'count' | 'value' | 'list';

export interface OptionSpec {
  long: string;
  short?: string;
  kind: OptionKind;
  description: string;
  placeholder?: string;
  hidden?: boolean;
}

export type OptionSet = readonly OptionSpec[];

export const GLOBAL_OPTIONS: OptionSet = [
  {
    long: 'verbose',
    short: 'v',
    kind: 'count',
    description: 'Show debug information, -vv for more detail',
  },
  { long: 'ostree-verbose', kind: 'flag', description: 'Show repository debug information' },
  { long: 'help', short: '?', kind: 'flag', description: 'Show help options', hidden: true },
];

export const INFO_OPTIONS: OptionSet = [
  { long: 'version', kind: 'flag', description: 'Print version information and exit' },
  { long: 'default-arch', kind: 'flag', description: 'Print default arch and exit' },
  { long: 'supported-arches', kind: 'flag', description: 'Print supported arches and exit' },
  { long: 'gl-drivers', kind: 'flag', description: 'Print active gl drivers and exit' },
  {
    long: 'installations',
    kind: 'flag',
    description: 'Print paths for system installations and exit',
  },
];

export const TARGET_OPTIONS: OptionSet = [
  { long: 'user', kind: 'flag', description: 'Work on the user installation' },
  {
    long: 'system',
    kind: 'flag',
    description: 'Work on the system-wide installation (default)',
  },
  {
    long: 'installation',
    kind: 'list',
    placeholder: 'NAME',
    description: 'Work on a non-default system-wide installation',
  },
];

/**
 * Which installations a command runs against.
 *
 * `no-dir` takes no target options at all, `one-dir` resolves exactly one
 * installation, `standard-dirs` the default system and user installations
 * unless narrowed, and `all-dirs` additionally every configured system
 * installation when no selector is given.
 */
export type TargetScope = 'no-dir' | 'one-dir' | 'standard-dirs' | 'all-dirs';

export interface CommandOptionsSpec {
  usage: string;
  summary: string;
  options?: OptionSet;
  scope: TargetScope;
  optionalRepo?: boolean;
  informational?: boolean;
  helpFooter?(): string[];
}

export interface ParsedCommand {
  args: string[];
  options: ParsedOptions;
  installations: Installation[];
}

function flagsFor(spec: OptionSpec) {
  const long = `--${spec.long}`;
  const names = spec.short ? `-${spec.short}, ${long}` : long;
  return takesValue(spec) ? `${names} <${spec.placeholder ?? 'VALUE'}>` : names;
}

export function takesValue(spec: OptionSpec) {
  return spec.kind === 'value' || spec.kind === 'list';
}

/** Reads parsed values back by long option name. */
export class ParsedOptions {
  private readonly keys = new Map<string, string>();

  constructor(
    private readonly values: OptionValues,
    options: OptionSet,
  ) {
    for (const spec of options) {
      this.keys.set(spec.long, new Option(flagsFor(spec)).attributeName());
    }
  }

  flag(long: string) {
    return this.raw(long) === true;
  }

  count(long: string) {
    const value = this.raw(long);
    return typeof value === 'number' ? value : 0;
  }

  value(long: string) {
    const value = this.raw(long);
    return typeof value === 'string' ? value : undefined;
  }

  list(long: string) {
    const value = this.raw(long);
    return Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === 'string') : [];
  }

  private raw(long: string): unknown {
    const key = this.keys.get(long);
    return key === undefined ? undefined : this.values[key];
  }
}

/** Merges option sets in order; registering a flag twice is a programming error. */
export function composeOptionSets(sets: readonly OptionSet[]): OptionSpec[] {
  const seen = new Set<string>();
  const composed: OptionSpec[] = [];
  for (const set of sets) {
    for (const spec of set) {
      for (const flag of [`--${spec.long}`, spec.short ? `-${spec.short}` : undefined]) {
        if (flag === undefined) {
          continue;
        }
        if (seen.has(flag)) {
          throw new Error(`Option ${flag} registered twice`);
        }
        seen.add(flag);
      }
      composed.push(spec);
    }
  }
  return composed;
}

export function optionSetsFor(spec: CommandOptionsSpec): OptionSet[] {
  return [
    ...(spec.scope === 'no-dir' ? [] : [TARGET_OPTIONS]),
    spec.options ?? [],
    GLOBAL_OPTIONS,
    ...(spec.informational ? [INFO_OPTIONS] : []),
  ];
}

function toOption(spec: OptionSpec) {
  const option = new Option(flagsFor(spec), spec.description);
  if (spec.hidden) {
    option.hideHelp();
  }
  if (spec.kind === 'count') {
    option.argParser((_value: string, previous: number | undefined) => (previous ?? 0) + 1);
  }
  if (spec.kind === 'list') {
    option.argParser((value: string, previous: string[] | undefined) => [...(previous ?? []), value]);
  }
  return option;
}

function buildParser(programName: string, spec: CommandOptionsSpec, options: OptionSet) {
  const parser = new Command(programName)
    .usage(spec.usage)
    .description(spec.summary)
    .helpOption(false)
    .exitOverride()
    .configureOutput({
      writeOut: () => undefined,
      writeErr: () => undefined,
      outputError: () => undefined,
    });
  for (const option of options) {
    parser.addOption(toOption(option));
  }
  return parser;
}

function usageMessage(error: CommanderError) {
  return error.message.replace(/^error: /, '');
}

function printInformational(ctx: CommandContext, options: ParsedOptions) {
  const { io, services } = ctx;
  if (options.flag('version')) {
    io.print(`${ctx.programName} ${VERSION}`);
  } else if (options.flag('default-arch')) {
    io.print(services.system.defaultArch());
  } else if (options.flag('supported-arches')) {
    services.system.supportedArches().forEach((arch) => io.print(arch));
  } else if (options.flag('gl-drivers')) {
    services.system.glDrivers().forEach((driver) => io.print(driver));
  } else if (options.flag('installations')) {
    services.installations.listAllSystem().forEach((installation) => io.print(installation.path));
  } else {
    return false;
  }
  return true;
}

/**
 * Parses a command's arguments against target, command and global options in
 * one pass, handles help and informational flags, applies verbosity and
 * resolves the installations the command runs against.
 */
export function parseCommandOptions(
  ctx: CommandContext,
  args: readonly string[],
  spec: CommandOptionsSpec,
): ParsedCommand {
  const optionSpecs = composeOptionSets(optionSetsFor(spec));
  const parser = buildParser(ctx.programName, spec, optionSpecs);

  let operands: string[];
  let unknown: string[];
  try {
    ({ operands, unknown } = parser.parseOptions([...args]));
  } catch (error) {
    if (error instanceof CommanderError) {
      throw new UsageError(usageMessage(error), ctx.programName);
    }
    throw error;
  }

  const [unknownOption] = unknown;
  if (unknownOption !== undefined) {
    throw new UsageError(`Unknown option ${unknownOption.split('=')[0]}`, ctx.programName, {
      option: unknownOption,
    });
  }

  const options = new ParsedOptions(parser.opts(), optionSpecs);

  if (!ctx.completing) {
    if (options.flag('help')) {
      const help = parser.helpInformation().trimEnd().split('\n');
      [...help, ...(spec.helpFooter?.() ?? [])].forEach((line) => ctx.io.print(line));
      throw new EarlyExit();
    }

    if (spec.informational && printInformational(ctx, options)) {
      throw new EarlyExit();
    }

    ctx.logger.applyVerbosity({
      verbose: options.count('verbose'),
      repoVerbose: options.flag('ostree-verbose'),
    });
  }

  const installations = resolveTargets(ctx, options, spec);
  return { args: operands, options, installations };
}

export function resolveTargets(
  ctx: CommandContext,
  options: ParsedOptions,
  spec: Pick<CommandOptionsSpec, 'scope' | 'optionalRepo'>,
): Installation[] {
  if (spec.scope === 'no-dir') {
    return [];
  }

  const provider = ctx.services.installations;
  const user = options.flag('user');
  const system = options.flag('system');
  const named = options.list('installation');

  let targets: Installation[];
  if (spec.scope === 'one-dir') {
    const selectors = [system, user, named.length > 0].filter(Boolean).length;
    if (selectors > 1 || named.length > 1) {
      throw new UsageError(
        'Multiple installations specified for a command that works on one installation',
        ctx.programName,
      );
    }
    const [id] = named;
    if (system || (!user && id === undefined)) {
      targets = [provider.getSystemDefault()];
    } else if (user) {
      targets = [provider.getUser()];
    } else {
      targets = [provider.getSystemById(id ?? DEFAULT_INSTALLATION_ID)];
    }
  } else if (spec.scope === 'all-dirs' && !user && !system && named.length === 0) {
    targets = [
      provider.getSystemDefault(),
      provider.getUser(),
      ...provider.listAllSystem().filter((entry) => entry.id !== DEFAULT_INSTALLATION_ID),
    ];
  } else {
    targets = [];
    if (system || (!user && named.length === 0)) {
      targets.push(provider.getSystemDefault());
    }
    if (user || (!system && named.length === 0)) {
      targets.push(provider.getUser());
    }
    for (const id of named) {
      // --system already brought in the default installation.
      if (system && id === DEFAULT_INSTALLATION_ID) {
        continue;
      }
      targets.push(provider.getSystemById(id));
    }
  }

  for (const target of targets) {
    if (spec.optionalRepo || ctx.completing) {
      provider.maybeEnsureRepo(target);
    } else {
      provider.ensureRepo(target);
    }
  }

  ctx.logger.detail.debug({ targets: targets.map((target) => target.id) }, 'resolved targets');
  return targets;
}
