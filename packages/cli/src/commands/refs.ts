import { decomposeRef, type RefKind } from '@hatch/shared-types';
import type { CommandContext } from '../context.js';
import { NotFoundError, UsageError } from '../errors.js';
import { historyId, type Installation } from '../installations.js';
import type { OptionSet, ParsedOptions } from '../options.js';

export const REF_FILTER_OPTIONS: OptionSet = [
  { long: 'arch', kind: 'value', placeholder: 'ARCH', description: 'Arch to use' },
  { long: 'app', kind: 'flag', description: 'Look for app with the specified name' },
  { long: 'runtime', kind: 'flag', description: 'Look for runtime with the specified name' },
];

export interface RefPattern {
  kinds: readonly RefKind[];
  id: string;
  arch?: string;
  branch?: string;
}

/**
 * Reads `ID[/ARCH[/BRANCH]]` or a full `KIND/ID/ARCH/BRANCH` ref. Empty parts
 * match anything; `--app`/`--runtime` narrow the kind when the text does not.
 */
export function parseRefPattern(text: string, options: ParsedOptions): RefPattern {
  const full = decomposeRef(text);
  if (full) {
    return { kinds: [full.kind], id: full.id, arch: full.arch, branch: full.branch };
  }

  const [id = '', arch, branch, ...rest] = text.split('/');
  if (id.length === 0 || rest.length > 0) {
    throw new NotFoundError(`Invalid ref ${text}`, { ref: text });
  }

  const kinds: RefKind[] = [];
  if (options.flag('app')) {
    kinds.push('app');
  }
  if (options.flag('runtime')) {
    kinds.push('runtime');
  }

  return {
    kinds: kinds.length > 0 ? kinds : ['app', 'runtime'],
    id,
    arch: arch || options.value('arch'),
    branch: branch || undefined,
  };
}

export function matchesRef(ref: string, pattern: RefPattern) {
  const parts = decomposeRef(ref);
  return (
    parts !== null &&
    pattern.kinds.includes(parts.kind) &&
    parts.id === pattern.id &&
    (pattern.arch === undefined || parts.arch === pattern.arch) &&
    (pattern.branch === undefined || parts.branch === pattern.branch)
  );
}

/** Picks the single ref a pattern names, preferring the default architecture. */
export function pickRef(
  ctx: CommandContext,
  text: string,
  pattern: RefPattern,
  candidates: readonly string[],
  where: string,
): string {
  let matches = [...new Set(candidates.filter((ref) => matchesRef(ref, pattern)))];
  if (matches.length > 1 && pattern.arch === undefined) {
    const defaultArch = ctx.services.system.defaultArch();
    const native = matches.filter((ref) => decomposeRef(ref)?.arch === defaultArch);
    if (native.length > 0) {
      matches = native;
    }
  }

  const [match] = matches;
  if (match === undefined) {
    throw new NotFoundError(`Nothing matches ${text} in ${where}`, { ref: text });
  }
  if (matches.length > 1) {
    throw new UsageError(
      `Multiple refs match ${text}, you must specify one of: ${matches.sort().join(', ')}`,
      ctx.programName,
    );
  }
  return match;
}

export function singleInstallation(installations: readonly Installation[]): Installation {
  const [installation] = installations;
  if (installation === undefined || installations.length !== 1) {
    throw new Error(`Expected exactly one installation, got ${installations.length}`);
  }
  return installation;
}

interface Transaction {
  operation: 'install' | 'update' | 'uninstall';
  installation: Installation;
  ref: string;
  remote?: string;
}

/** Runs one change and records its outcome in the transaction journal. */
export function logTransaction<T extends { commit?: string }>(
  ctx: CommandContext,
  transaction: Transaction,
  change: () => T,
): T {
  const entry = {
    operation: transaction.operation,
    installation: historyId(transaction.installation),
    ref: transaction.ref,
    remote: transaction.remote,
  };
  let result: T;
  try {
    result = change();
  } catch (error) {
    ctx.services.journalWriter.logTransaction({ ...entry, success: false });
    throw error;
  }
  ctx.services.journalWriter.logTransaction({ ...entry, commit: result.commit, success: true });
  return result;
}
