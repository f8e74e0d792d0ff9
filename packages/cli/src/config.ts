import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { ConfigFileSchema, type ConfigFile, type InstallationConfig } from '@hatch/shared-types';
import { ConfigError, errorMessage } from './errors.js';

export const DEFAULT_SYSTEM_DIR = '/var/lib/hatch';
export const DEFAULT_PASSWD_PATH = '/etc/passwd';

export interface RuntimeConfig {
  configPath: string;
  systemDir: string;
  userDir: string;
  installations: InstallationConfig[];
  journalPath: string;
  arch?: string;
  glDrivers?: string[];
  passwdPath: string;
}

export interface ConfigOverrides extends Partial<Omit<RuntimeConfig, 'configPath'>> {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  home?: string;
}

function normalize(value?: string) {
  if (!value) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function splitList(value?: string) {
  const normalized = normalize(value);
  if (!normalized) {
    return undefined;
  }
  return normalized
    .split(':')
    .map((entry) => entry.trim())
    .filter(Boolean);
}

function isMissingFile(error: unknown) {
  return (
    typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'
  );
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env, home = homedir()) {
  return normalize(env.HATCH_CONFIG) ?? join(home, '.hatch', 'config.json');
}

export function readConfig(path: string): ConfigFile {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return ConfigFileSchema.parse({});
    }
    throw new ConfigError(`Unable to read configuration ${path}: ${errorMessage(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in configuration ${path}: ${errorMessage(error)}`);
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ConfigError(
      `Invalid configuration ${path}${where}: ${issue?.message ?? 'schema mismatch'}`,
    );
  }
  return parsed.data;
}

export function resolveRuntimeConfig(overrides: ConfigOverrides = {}): RuntimeConfig {
  const env = overrides.env ?? process.env;
  const home = overrides.home ?? homedir();
  const configPath = overrides.configPath ?? getConfigPath(env, home);
  const fileConfig = readConfig(configPath);

  const dataHome = normalize(env.XDG_DATA_HOME) ?? join(home, '.local', 'share');

  return {
    configPath,
    systemDir:
      overrides.systemDir ??
      normalize(env.HATCH_SYSTEM_DIR) ??
      normalize(fileConfig.systemDir) ??
      DEFAULT_SYSTEM_DIR,
    userDir:
      overrides.userDir ??
      normalize(env.HATCH_USER_DIR) ??
      normalize(fileConfig.userDir) ??
      join(dataHome, 'hatch'),
    installations: overrides.installations ?? fileConfig.installations,
    journalPath:
      overrides.journalPath ??
      normalize(env.HATCH_JOURNAL) ??
      normalize(fileConfig.journalPath) ??
      join(home, '.hatch', 'journal.jsonl'),
    arch: overrides.arch ?? normalize(env.HATCH_ARCH) ?? normalize(fileConfig.arch),
    glDrivers: overrides.glDrivers ?? splitList(env.HATCH_GL_DRIVERS) ?? fileConfig.glDrivers,
    passwdPath: overrides.passwdPath ?? normalize(fileConfig.passwdPath) ?? DEFAULT_PASSWD_PATH,
  };
}
