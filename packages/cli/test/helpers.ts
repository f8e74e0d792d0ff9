import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { InstallationConfig, RemoteSummary } from '@hatch/shared-types';
import type { RuntimeConfig } from '../src/config.js';
import type { CommandContext, Services } from '../src/context.js';
import { createServices } from '../src/context.js';
import { run } from '../src/dispatch.js';
import { CliLogger } from '../src/logger.js';
import type { CliIO } from '../src/output.js';
import type { CommandRegistry } from '../src/registry.js';

export const COMMIT_A = 'a'.repeat(64);
export const COMMIT_B = 'b'.repeat(64);
export const COMMIT_C = 'c'.repeat(64);

export interface MemoryIO extends CliIO {
  out: string[];
  err: string[];
}

export function memoryIO(): MemoryIO {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    print: (line) => {
      out.push(line);
    },
    printErr: (line) => {
      err.push(line);
    },
    stdoutIsTTY: false,
    stderrIsTTY: false,
  };
}

export function memoryLogger() {
  const lines: string[] = [];
  const logger = new CliLogger({
    write: (line: string) => {
      lines.push(line);
    },
  });
  return { logger, lines };
}

export interface HarnessOptions {
  installations?: InstallationConfig[];
  services?: Partial<Services>;
  registry?: CommandRegistry;
  now?: Date;
}

export interface RunResult {
  code: number;
  out: string[];
  err: string[];
  logs: string[];
}

export class Harness {
  readonly root = mkdtempSync(join(tmpdir(), 'hatch-test-'));
  readonly config: RuntimeConfig;

  constructor(private readonly options: HarnessOptions = {}) {
    this.config = {
      configPath: join(this.root, 'config.json'),
      systemDir: join(this.root, 'system'),
      userDir: join(this.root, 'user'),
      installations: (options.installations ?? []).map((entry) => ({
        ...entry,
        path: join(this.root, entry.path),
      })),
      journalPath: join(this.root, 'journal.jsonl'),
      arch: 'x86_64',
      glDrivers: ['default', 'host'],
      passwdPath: join(this.root, 'passwd'),
    };
  }

  run(...argv: string[]): RunResult {
    const io = memoryIO();
    const { logger, lines } = memoryLogger();
    const now = this.options.now;
    const code = run(argv, {
      io,
      logger,
      config: this.config,
      services: this.options.services,
      registry: this.options.registry,
      now: now ? () => now : undefined,
    });
    return { code, out: io.out, err: io.err, logs: lines };
  }

  context(overrides: Partial<CommandContext> = {}): CommandContext & { io: MemoryIO } {
    const io = memoryIO();
    const { logger } = memoryLogger();
    return {
      programName: 'hatch',
      logger,
      config: this.config,
      services: { ...createServices(this.config, logger), ...this.options.services },
      completing: false,
      now: () => this.options.now ?? new Date(),
      ...overrides,
      io,
    };
  }

  /** Publishes a remote as a directory holding its summary document. */
  writeRemote(name: string, summary: RemoteSummary) {
    const dir = join(this.root, 'remotes', name);
    mkdirSync(dir, { recursive: true });
    writeFileSync(join(dir, 'summary.json'), JSON.stringify(summary));
    return dir;
  }

  write(relativePath: string, content: string) {
    const path = join(this.root, relativePath);
    mkdirSync(join(path, '..'), { recursive: true });
    writeFileSync(path, content);
    return path;
  }

  cleanup() {
    rmSync(this.root, { recursive: true, force: true });
  }
}
