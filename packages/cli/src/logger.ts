import pino, { type DestinationStream, type LevelWithSilent, type Logger } from 'pino';

export type LogChannel = 'main' | 'detail' | 'repo';

export const MAX_VERBOSITY = 2;

export interface VerbositySettings {
  verbose: number;
  repoVerbose: boolean;
}

const BASE_LEVELS: Record<LogChannel, LevelWithSilent> = {
  main: 'warn',
  detail: 'silent',
  repo: 'silent',
};

/**
 * Diagnostic logger handed down through every invocation.
 *
 * Each channel is a pino child with its own level: `main` carries warnings and
 * `-v` debug output, `detail` opens at `-vv`, and `repo` follows
 * `--ostree-verbose`. Output always goes to stderr so stdout stays parseable.
 */
export class CliLogger {
  private readonly root: Logger;
  private readonly channels: Record<LogChannel, Logger>;
  private silenced = false;

  constructor(destination: DestinationStream = pino.destination({ dest: 2, sync: true })) {
    this.root = pino({ level: 'trace', base: { name: 'hatch' } }, destination);
    this.channels = {
      main: this.root.child({ channel: 'main' }, { level: BASE_LEVELS.main }),
      detail: this.root.child({ channel: 'detail' }, { level: BASE_LEVELS.detail }),
      repo: this.root.child({ channel: 'repo' }, { level: BASE_LEVELS.repo }),
    };
  }

  get main() {
    return this.channels.main;
  }

  get detail() {
    return this.channels.detail;
  }

  get repo() {
    return this.channels.repo;
  }

  get isSilenced() {
    return this.silenced;
  }

  level(channel: LogChannel) {
    return this.channels[channel].level;
  }

  applyVerbosity(settings: VerbositySettings) {
    if (this.silenced) {
      return;
    }
    const verbose = Math.min(Math.max(settings.verbose, 0), MAX_VERBOSITY);
    if (verbose > 0) {
      this.channels.main.level = 'debug';
    }
    if (verbose > 1) {
      this.channels.detail.level = 'debug';
    }
    if (settings.repoVerbose) {
      this.channels.repo.level = 'debug';
    }
  }

  // Completion output must never carry diagnostics.
  silence() {
    this.silenced = true;
    for (const channel of Object.values(this.channels)) {
      channel.level = 'silent';
    }
  }

  flush() {
    this.root.flush();
  }
}
