import { chalkStderr, type ChalkInstance } from 'chalk';

export class CliError extends Error {
  readonly code: string;
  readonly exitCode: number;
  readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, exitCode = 1, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
    this.details = details;
  }
}

export function helpHint(programName: string) {
  return `See '${programName} --help'`;
}

export class UsageError extends CliError {
  constructor(message: string, programName: string, details?: Record<string, unknown>) {
    super('USAGE_ERROR', `${message}\n\n${helpHint(programName)}`, 1, details);
  }
}

export class NotFoundError extends CliError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('NOT_FOUND', message, 1, details);
  }
}

export class IOError extends CliError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('IO_ERROR', message, 1, details);
  }
}

export class ParseError extends CliError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('PARSE_ERROR', message, 1, details);
  }
}

export class ConfigError extends CliError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIG_ERROR', message, 1, details);
  }
}

/**
 * Thrown once an informational flag or `--help` has written its answer.
 * The top level turns it into a successful exit without running a command.
 */
export class EarlyExit extends Error {
  readonly exitCode = 0;

  constructor() {
    super('early exit');
    this.name = 'EarlyExit';
  }
}

export function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

/** Colour support is judged on stderr, where errors go. */
export function formatError(error: unknown, fancy: boolean, colors: ChalkInstance = chalkStderr) {
  const marker = fancy ? colors.red.bold('error:') : 'error:';
  return `${marker} ${errorMessage(error)}`;
}

export function exitCodeFor(error: unknown) {
  return error instanceof CliError ? error.exitCode : 1;
}
