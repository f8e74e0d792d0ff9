import { BUILTIN_COMMANDS } from './commands/index.js';
import { isCompletionRequest, runCompletion } from './completions.js';
import { resolveRuntimeConfig, type RuntimeConfig } from './config.js';
import { createServices, type CommandContext, type Services } from './context.js';
import {
  EarlyExit,
  NotFoundError,
  UsageError,
  errorMessage,
  exitCodeFor,
  formatError,
  helpHint,
} from './errors.js';
import { CliLogger } from './logger.js';
import { parseCommandOptions, type CommandOptionsSpec } from './options.js';
import { processIO, type CliIO } from './output.js';
import { CommandRegistry, extractCommand } from './registry.js';
import { PROGRAM_NAME } from './system.js';

function topLevelOptions(registry: CommandRegistry): CommandOptionsSpec {
  return {
    usage: '[OPTION…] COMMAND',
    summary: 'Builtin Commands:',
    scope: 'no-dir',
    informational: true,
    helpFooter: () => ['', ...registry.summaryLines()],
  };
}

/**
 * Routes an argument vector to its command. The command word may appear
 * anywhere among the options; the handler sees every other word in order.
 */
export function dispatch(ctx: CommandContext, registry: CommandRegistry, argv: readonly string[]) {
  const { commandName, args } = extractCommand(argv);
  const command = commandName === undefined ? undefined : registry.find(commandName);

  if (!command) {
    if (commandName !== undefined) {
      const similar = registry.suggest(commandName);
      const message = similar
        ? `'${commandName}' is not a ${PROGRAM_NAME} command. Did you mean '${similar.name}'?`
        : `'${commandName}' is not a ${PROGRAM_NAME} command`;
      throw new NotFoundError(`${message}\n\n${helpHint(ctx.programName)}`, {
        command: commandName,
        suggestion: similar?.name,
      });
    }

    // Informational flags and --help end here; anything else is an error.
    parseCommandOptions(ctx, args, topLevelOptions(registry));
    throw new UsageError('No command specified', ctx.programName);
  }

  ctx.logger.detail.debug({ command: command.name, args }, 'dispatching');
  command.run({ ...ctx, programName: `${ctx.programName} ${command.name}` }, args);
}

export interface RunOptions {
  io?: CliIO;
  logger?: CliLogger;
  config?: RuntimeConfig;
  services?: Partial<Services>;
  registry?: CommandRegistry;
  now?: () => Date;
  programName?: string;
}

export function run(argv: readonly string[], options: RunOptions = {}): number {
  const io = options.io ?? processIO();
  const logger = options.logger ?? new CliLogger();
  const completing = isCompletionRequest(argv);
  if (completing) {
    logger.silence();
  }

  try {
    const config = options.config ?? resolveRuntimeConfig();
    const ctx: CommandContext = {
      programName: options.programName ?? PROGRAM_NAME,
      io,
      logger,
      config,
      services: { ...createServices(config, logger), ...options.services },
      completing,
      now: options.now ?? (() => new Date()),
    };
    const registry = options.registry ?? new CommandRegistry(BUILTIN_COMMANDS);

    if (completing) {
      const [, cur = '', prev = '', line = ''] = argv;
      runCompletion(ctx, registry, cur, prev, line);
    } else {
      dispatch(ctx, registry, argv);
    }
    return 0;
  } catch (error) {
    if (error instanceof EarlyExit) {
      return error.exitCode;
    }
    if (completing) {
      logger.main.debug({ error: errorMessage(error) }, 'completion failed');
      return 1;
    }
    io.printErr(formatError(error, io.stderrIsTTY));
    return exitCodeFor(error);
  } finally {
    logger.flush();
  }
}
