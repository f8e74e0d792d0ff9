import type { RegistryEntry } from '../registry.js';
import { completionCommand } from './completion.js';
import { historyCommand } from './history.js';
import { infoCommand } from './info.js';
import { installCommand } from './install.js';
import { listCommand } from './list.js';
import { remoteLsCommand } from './remote-ls.js';
import {
  remoteAddCommand,
  remoteDeleteCommand,
  remoteListCommand,
  remotesCommand,
} from './remotes.js';
import { searchCommand } from './search.js';
import { removeCommand, uninstallCommand } from './uninstall.js';
import { updateCommand } from './update.js';

export const BUILTIN_COMMANDS: readonly RegistryEntry[] = [
  { kind: 'section', title: 'Manage installed applications and runtimes' },
  { kind: 'command', command: installCommand },
  { kind: 'command', command: updateCommand },
  { kind: 'command', command: uninstallCommand },
  { kind: 'command', command: removeCommand },
  { kind: 'command', command: listCommand },
  { kind: 'command', command: infoCommand },
  { kind: 'command', command: historyCommand },

  { kind: 'section', title: 'Finding applications and runtimes' },
  { kind: 'command', command: searchCommand },

  { kind: 'section', title: 'Manage remote repositories' },
  { kind: 'command', command: remotesCommand },
  { kind: 'command', command: remoteAddCommand },
  { kind: 'command', command: remoteDeleteCommand },
  { kind: 'command', command: remoteListCommand },
  { kind: 'command', command: remoteLsCommand },

  { kind: 'section', title: 'Shell integration' },
  { kind: 'command', command: completionCommand },
];
