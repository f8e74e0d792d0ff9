import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { randomBytes } from 'node:crypto';
import { dirname, join } from 'node:path';
import {
  InstallationStateSchema,
  emptyInstallationState,
  type InstallationState,
} from '@hatch/shared-types';
import type { RuntimeConfig } from './config.js';
import { IOError, NotFoundError, errorMessage } from './errors.js';
import type { CliLogger } from './logger.js';

export const DEFAULT_INSTALLATION_ID = 'default';
export const USER_INSTALLATION_ID = 'user';

export type InstallationKind = 'system' | 'user';

export interface Installation {
  id: string;
  kind: InstallationKind;
  path: string;
  displayName: string;
}

export interface InstallationProvider {
  getSystemDefault(): Installation;
  getUser(): Installation;
  getSystemById(id: string): Installation;
  listAllSystem(): Installation[];
  ensureRepo(installation: Installation): void;
  maybeEnsureRepo(installation: Installation): void;
}

/** Identifier the history journal records for an installation. */
export function historyId(installation: Installation) {
  if (installation.kind === 'user') {
    return 'user';
  }
  return installation.id === DEFAULT_INSTALLATION_ID ? 'system' : installation.id;
}

export function statePath(installation: Installation) {
  return join(installation.path, 'repo', 'state.json');
}

export function readInstallationState(installation: Installation): InstallationState {
  const path = statePath(installation);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new IOError(`Unable to open repository at ${path}: ${errorMessage(error)}`, {
      installation: installation.id,
    });
  }

  const parsed = InstallationStateSchema.safeParse(raw);
  if (!parsed.success) {
    throw new IOError(`Repository state at ${path} is corrupt`, {
      installation: installation.id,
      issues: parsed.error.issues.map((issue) => issue.message),
    });
  }
  return parsed.data;
}

/** Like readInstallationState, but an installation without a repository reads as empty. */
export function readInstallationStateIfPresent(installation: Installation): InstallationState {
  return existsSync(statePath(installation))
    ? readInstallationState(installation)
    : emptyInstallationState();
}

export function writeInstallationState(installation: Installation, state: InstallationState) {
  const path = statePath(installation);
  try {
    mkdirSync(dirname(path), { recursive: true });
    const tmpPath = `${path}.${randomBytes(4).toString('hex')}.tmp`;
    writeFileSync(tmpPath, JSON.stringify(state, null, 2));
    renameSync(tmpPath, path);
  } catch (error) {
    throw new IOError(`Unable to write repository at ${path}: ${errorMessage(error)}`, {
      installation: installation.id,
    });
  }
}

export class LocalInstallationProvider implements InstallationProvider {
  private readonly systemDefault: Installation;
  private readonly user: Installation;
  private readonly extraSystem: Installation[];

  constructor(
    config: Pick<RuntimeConfig, 'systemDir' | 'userDir' | 'installations'>,
    private readonly logger?: CliLogger,
  ) {
    this.systemDefault = {
      id: DEFAULT_INSTALLATION_ID,
      kind: 'system',
      path: config.systemDir,
      displayName: 'Default system installation',
    };
    this.user = {
      id: USER_INSTALLATION_ID,
      kind: 'user',
      path: config.userDir,
      displayName: 'User installation',
    };
    this.extraSystem = config.installations.map((entry) => ({
      id: entry.id,
      kind: 'system',
      path: entry.path,
      displayName: entry.displayName ?? `${entry.id} system installation`,
    }));
  }

  getSystemDefault() {
    return this.systemDefault;
  }

  getUser() {
    return this.user;
  }

  getSystemById(id: string) {
    if (id === DEFAULT_INSTALLATION_ID) {
      return this.systemDefault;
    }
    const match = this.extraSystem.find((entry) => entry.id === id);
    if (!match) {
      throw new NotFoundError(`Could not find installation ${id}`, { installation: id });
    }
    return match;
  }

  listAllSystem() {
    return [this.systemDefault, ...this.extraSystem];
  }

  ensureRepo(installation: Installation) {
    if (existsSync(statePath(installation))) {
      readInstallationState(installation);
      return;
    }
    this.logger?.repo.debug({ path: installation.path }, 'creating repository');
    writeInstallationState(installation, emptyInstallationState());
  }

  maybeEnsureRepo(installation: Installation) {
    if (existsSync(statePath(installation))) {
      readInstallationState(installation);
    }
  }
}
