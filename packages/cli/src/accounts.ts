import { readFileSync } from 'node:fs';
import { errorMessage } from './errors.js';
import type { CliLogger } from './logger.js';

export interface AccountResolver {
  uidToName(uid: string): string | undefined;
}

export function parsePasswd(content: string): Map<string, string> {
  const names = new Map<string, string>();
  for (const line of content.split('\n')) {
    if (line.length === 0 || line.startsWith('#')) {
      continue;
    }
    const [name, , uid] = line.split(':');
    if (name && uid && !names.has(uid)) {
      names.set(uid, name);
    }
  }
  return names;
}

export class PasswdAccountResolver implements AccountResolver {
  private names?: Map<string, string>;

  constructor(
    private readonly passwdPath: string,
    private readonly logger?: CliLogger,
  ) {}

  uidToName(uid: string) {
    return this.load().get(uid);
  }

  private load() {
    if (!this.names) {
      try {
        this.names = parsePasswd(readFileSync(this.passwdPath, 'utf-8'));
      } catch (error) {
        // Unresolvable accounts render as their numeric id.
        this.logger?.detail.debug(
          { path: this.passwdPath, error: errorMessage(error) },
          'account database unavailable',
        );
        this.names = new Map();
      }
    }
    return this.names;
  }
}
