import type { Completion } from '../completions.js';
import type { CommandContext } from '../context.js';
import { NotFoundError } from '../errors.js';
import type { Installation } from '../installations.js';
import { parseCommandOptions, type CommandOptionsSpec } from '../options.js';
import type { BuiltinCommand } from '../registry.js';
import { REF_FILTER_OPTIONS, logTransaction, matchesRef, parseRefPattern } from './refs.js';

const UPDATE_OPTIONS: CommandOptionsSpec = {
  usage: '[OPTION…] [REF…]',
  summary: 'Update applications or runtimes',
  options: REF_FILTER_OPTIONS,
  scope: 'standard-dirs',
};

function latestCommits(ctx: CommandContext, installation: Installation) {
  const cache = new Map<string, Map<string, string>>();
  return (remote: string, ref: string) => {
    let commits = cache.get(remote);
    if (!commits) {
      commits = new Map(
        ctx.services.packages
          .listRemoteRefs(installation, remote)
          .map((entry) => [entry.ref, entry.commit] as const),
      );
      cache.set(remote, commits);
    }
    return commits.get(ref);
  };
}

function update(ctx: CommandContext, argv: string[]) {
  const { args, options, installations } = parseCommandOptions(ctx, argv, UPDATE_OPTIONS);
  const { packages } = ctx.services;
  const patterns = args.map((text) => ({ text, pattern: parseRefPattern(text, options) }));
  const matched = new Set<string>();
  let updated = 0;

  for (const installation of installations) {
    const latest = latestCommits(ctx, installation);
    const selected = packages.listInstalled(installation).filter((entry) => {
      if (patterns.length === 0) {
        return true;
      }
      const hits = patterns.filter(({ pattern }) => matchesRef(entry.ref, pattern));
      hits.forEach(({ text }) => matched.add(text));
      return hits.length > 0;
    });

    for (const entry of selected) {
      const commit = latest(entry.remote, entry.ref);
      if (commit === undefined) {
        ctx.logger.main.warn({ ref: entry.ref, remote: entry.remote }, 'ref no longer in remote');
        continue;
      }
      if (commit === entry.commit) {
        ctx.logger.main.debug({ ref: entry.ref }, 'already up to date');
        continue;
      }

      const result = logTransaction(
        ctx,
        { operation: 'update', installation, ref: entry.ref, remote: entry.remote },
        () => ({ commit: packages.update(installation, entry.ref)?.installed.commit }),
      );
      updated++;
      ctx.io.print(
        `Updated ${entry.ref} in ${installation.displayName} to ${(result.commit ?? commit).slice(0, 12)}`,
      );
    }
  }

  const missing = patterns.find(({ text }) => !matched.has(text));
  if (missing) {
    throw new NotFoundError(`${missing.text} not installed`, { ref: missing.text });
  }
  if (updated === 0) {
    ctx.io.print('Nothing to do.');
  }
}

function completeUpdate(completion: Completion) {
  const parsed = completion.parse(UPDATE_OPTIONS);
  if (!parsed) {
    return;
  }
  completion.completeOptionsFor(UPDATE_OPTIONS);
  for (const installation of parsed.installations) {
    for (const entry of completion.ctx.services.packages.listInstalled(installation)) {
      completion.complete(entry.ref);
    }
  }
}

export const updateCommand: BuiltinCommand = {
  name: 'update',
  description: 'Update an installed application or runtime',
  run: update,
  complete: completeUpdate,
};
