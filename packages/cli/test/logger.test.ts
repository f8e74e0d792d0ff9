import { describe, expect, it } from 'vitest';
import { memoryLogger } from './helpers.js';

function parsed(lines: string[]): unknown[] {
  return lines.map((line) => JSON.parse(line));
}

describe('CliLogger', () => {
  it('only passes warnings by default', () => {
    const { logger, lines } = memoryLogger();
    logger.main.debug('hidden');
    logger.detail.warn('hidden too');
    logger.main.warn({ ref: 'app/org.example.Editor/x86_64/stable' }, 'careful');

    expect(parsed(lines)).toEqual([
      expect.objectContaining({
        level: 40,
        name: 'hatch',
        channel: 'main',
        ref: 'app/org.example.Editor/x86_64/stable',
        msg: 'careful',
      }),
    ]);
  });

  it('opens channels as verbosity rises', () => {
    const { logger } = memoryLogger();
    logger.applyVerbosity({ verbose: 1, repoVerbose: false });
    expect([logger.level('main'), logger.level('detail'), logger.level('repo')]).toEqual([
      'debug',
      'silent',
      'silent',
    ]);

    logger.applyVerbosity({ verbose: 7, repoVerbose: true });
    expect([logger.level('main'), logger.level('detail'), logger.level('repo')]).toEqual([
      'debug',
      'debug',
      'debug',
    ]);
  });

  it('stays silent once silenced', () => {
    const { logger, lines } = memoryLogger();
    logger.silence();
    logger.applyVerbosity({ verbose: 2, repoVerbose: true });
    logger.main.error('dropped');

    expect(logger.isSilenced).toBe(true);
    expect(logger.level('detail')).toBe('silent');
    expect(lines).toEqual([]);
  });
});
