import { PasswdAccountResolver, type AccountResolver } from './accounts.js';
import type { RuntimeConfig } from './config.js';
import { LocalInstallationProvider, type InstallationProvider } from './installations.js';
import { Journal, JournalWriter } from './journal.js';
import type { CliLogger } from './logger.js';
import type { CliIO } from './output.js';
import { LocalPackageManager, type PackageManager } from './packages.js';
import { HostSystemInfo, PROGRAM_NAME, VERSION, type SystemInfo } from './system.js';

export interface Services {
  installations: InstallationProvider;
  packages: PackageManager;
  openJournal(): Journal;
  journalWriter: JournalWriter;
  accounts: AccountResolver;
  system: SystemInfo;
}

/** Per-invocation state threaded from the dispatcher into every handler. */
export interface CommandContext {
  programName: string;
  io: CliIO;
  logger: CliLogger;
  config: RuntimeConfig;
  services: Services;
  completing: boolean;
  now(): Date;
}

export function createServices(config: RuntimeConfig, logger: CliLogger): Services {
  return {
    installations: new LocalInstallationProvider(config, logger),
    packages: new LocalPackageManager(logger),
    openJournal: () => Journal.open(config.journalPath),
    journalWriter: new JournalWriter(config.journalPath, { name: PROGRAM_NAME, version: VERSION }),
    accounts: new PasswdAccountResolver(config.passwdPath, logger),
    system: new HostSystemInfo(config),
  };
}
