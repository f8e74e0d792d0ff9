import { readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  RemoteNameSchema,
  RemoteSummarySchema,
  type InstallationState,
  type InstalledRef,
  type RemoteSummary,
} from '@hatch/shared-types';
import { CliError, IOError, NotFoundError, errorMessage } from './errors.js';
import {
  readInstallationState,
  readInstallationStateIfPresent,
  writeInstallationState,
  type Installation,
} from './installations.js';
import type { CliLogger } from './logger.js';

export const SUMMARY_FILE = 'summary.json';

export interface RemoteInfo {
  name: string;
  url: string;
  title?: string;
}

export interface RemoteRefInfo {
  ref: string;
  commit: string;
  installedSize?: number;
  downloadSize?: number;
}

export interface InstalledRefInfo {
  ref: string;
  remote: string;
  commit: string;
  installedAt: string;
}

export interface RefUpdate {
  previousCommit: string;
  installed: InstalledRefInfo;
}

export interface PackageManager {
  listRemotes(installation: Installation): RemoteInfo[];
  addRemote(installation: Installation, remote: RemoteInfo): void;
  deleteRemote(installation: Installation, name: string): void;
  listRemoteRefs(installation: Installation, remote: string): RemoteRefInfo[];
  listInstalled(installation: Installation): InstalledRefInfo[];
  install(installation: Installation, remote: string, ref: string): InstalledRefInfo;
  /** Returns undefined when the ref is already at the remote's commit. */
  update(installation: Installation, ref: string): RefUpdate | undefined;
  uninstall(installation: Installation, ref: string): InstalledRefInfo;
}

/** Resolves a remote location (`file://` URL or path) to its summary document. */
export function summaryPath(location: string) {
  if (location.startsWith('file:')) {
    return join(fileURLToPath(location), SUMMARY_FILE);
  }
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(location)) {
    throw new IOError(`Unsupported remote location ${location}`, { location });
  }
  return join(resolve(location), SUMMARY_FILE);
}

export function readRemoteSummary(location: string): RemoteSummary {
  const path = summaryPath(location);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new IOError(`Unable to load summary from ${location}: ${errorMessage(error)}`, { path });
  }
  const parsed = RemoteSummarySchema.safeParse(raw);
  if (!parsed.success) {
    throw new IOError(`Invalid summary at ${location}`, {
      path,
      issues: parsed.error.issues.map((issue) => issue.message),
    });
  }
  return parsed.data;
}

function toInstalled(ref: string, entry: InstalledRef): InstalledRefInfo {
  return {
    ref,
    remote: entry.remote,
    commit: entry.commit,
    installedAt: entry.installed_at,
  };
}

/**
 * Package operations against the JSON repository state of an installation.
 * Remote contents come from a summary document beside the remote's location.
 */
export class LocalPackageManager implements PackageManager {
  constructor(
    private readonly logger?: CliLogger,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  listRemotes(installation: Installation) {
    const state = readInstallationStateIfPresent(installation);
    return Object.entries(state.remotes).map(([name, remote]) => ({
      name,
      url: remote.url,
      title: remote.title,
    }));
  }

  addRemote(installation: Installation, remote: RemoteInfo) {
    if (!RemoteNameSchema.safeParse(remote.name).success) {
      throw new CliError('INVALID_REMOTE', `Invalid remote name ${remote.name}`, 1, {
        remote: remote.name,
      });
    }
    const state = readInstallationState(installation);
    if (Object.hasOwn(state.remotes, remote.name)) {
      throw new CliError('REMOTE_EXISTS', `Remote ${remote.name} already exists`, 1, {
        remote: remote.name,
      });
    }
    state.remotes[remote.name] = remote.title ? { url: remote.url, title: remote.title } : { url: remote.url };
    writeInstallationState(installation, state);
    this.logger?.repo.debug({ installation: installation.id, remote: remote.name }, 'remote added');
  }

  deleteRemote(installation: Installation, name: string) {
    const state = readInstallationState(installation);
    this.requireRemote(installation, state, name);
    delete state.remotes[name];
    writeInstallationState(installation, state);
    this.logger?.repo.debug({ installation: installation.id, remote: name }, 'remote deleted');
  }

  listRemoteRefs(installation: Installation, remote: string) {
    const state = readInstallationStateIfPresent(installation);
    const config = this.requireRemote(installation, state, remote);
    const summary = readRemoteSummary(config.url);
    return Object.entries(summary.refs).map(([ref, entry]) => ({
      ref,
      commit: entry.commit,
      installedSize: entry.installed_size,
      downloadSize: entry.download_size,
    }));
  }

  listInstalled(installation: Installation) {
    const state = readInstallationStateIfPresent(installation);
    return Object.entries(state.installed)
      .map(([ref, entry]) => toInstalled(ref, entry))
      .sort((a, b) => a.ref.localeCompare(b.ref));
  }

  install(installation: Installation, remote: string, ref: string) {
    const state = readInstallationState(installation);
    if (Object.hasOwn(state.installed, ref)) {
      throw new CliError('ALREADY_INSTALLED', `${ref} already installed`, 1, { ref });
    }
    const commit = this.remoteCommit(installation, state, remote, ref);
    const entry = { remote, commit, installed_at: this.clock().toISOString() };
    state.installed[ref] = entry;
    writeInstallationState(installation, state);
    this.logger?.repo.debug({ installation: installation.id, ref, commit }, 'ref deployed');
    return toInstalled(ref, entry);
  }

  update(installation: Installation, ref: string) {
    const state = readInstallationState(installation);
    const current = this.requireInstalled(installation, state, ref);
    const commit = this.remoteCommit(installation, state, current.remote, ref);
    if (commit === current.commit) {
      return undefined;
    }
    const entry = { remote: current.remote, commit, installed_at: this.clock().toISOString() };
    state.installed[ref] = entry;
    writeInstallationState(installation, state);
    this.logger?.repo.debug({ installation: installation.id, ref, commit }, 'ref updated');
    return { previousCommit: current.commit, installed: toInstalled(ref, entry) };
  }

  uninstall(installation: Installation, ref: string) {
    const state = readInstallationState(installation);
    const current = this.requireInstalled(installation, state, ref);
    delete state.installed[ref];
    writeInstallationState(installation, state);
    this.logger?.repo.debug({ installation: installation.id, ref }, 'ref removed');
    return toInstalled(ref, current);
  }

  private requireRemote(installation: Installation, state: InstallationState, name: string) {
    const remote = Object.hasOwn(state.remotes, name) ? state.remotes[name] : undefined;
    if (!remote) {
      throw new NotFoundError(`Remote '${name}' not found in ${installation.displayName}`, {
        remote: name,
        installation: installation.id,
      });
    }
    return remote;
  }

  private requireInstalled(installation: Installation, state: InstallationState, ref: string) {
    const entry = Object.hasOwn(state.installed, ref) ? state.installed[ref] : undefined;
    if (!entry) {
      throw new NotFoundError(`${ref} not installed in ${installation.displayName}`, {
        ref,
        installation: installation.id,
      });
    }
    return entry;
  }

  private remoteCommit(
    installation: Installation,
    state: InstallationState,
    remote: string,
    ref: string,
  ) {
    const summary = readRemoteSummary(this.requireRemote(installation, state, remote).url);
    const entry = Object.hasOwn(summary.refs, ref) ? summary.refs[ref] : undefined;
    if (!entry) {
      throw new NotFoundError(`Nothing matches ${ref} in remote ${remote}`, { ref, remote });
    }
    return entry.commit;
  }
}
