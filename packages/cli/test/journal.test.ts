import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { IOError } from '../src/errors.js';
import { Journal, JournalWriter, TRANSACTION_MESSAGE_ID } from '../src/journal.js';
import { COMMIT_A } from './helpers.js';

const EDITOR = 'app/org.example.Editor/x86_64/stable';

describe('Journal', () => {
  const content = [
    JSON.stringify({ KIND: 'a', SOURCE: 'x', N: '1' }),
    '{not json',
    JSON.stringify({ KIND: 'b', SOURCE: 'x', N: '2' }),
    '',
    JSON.stringify({ KIND: 'c', SOURCE: 'y', N: '3' }),
    JSON.stringify({ KIND: 'a', NESTED: { deep: true } }),
  ].join('\n');

  const numbers = (journal: Journal) => [...journal.backwards()].map((record) => record.getField('N'));

  it('counts lines it cannot read and skips them', () => {
    const journal = Journal.fromContent(content);
    expect(journal.stats).toEqual({ totalLines: 5, parseErrors: 2 });
    expect(numbers(journal)).toEqual(['3', '2', '1']);
  });

  it('treats values for one field as alternatives', () => {
    const journal = Journal.fromContent(content);
    journal.addMatch('KIND=a');
    journal.addMatch('KIND=c');
    expect(numbers(journal)).toEqual(['3', '1']);
  });

  it('requires every matched field', () => {
    const journal = Journal.fromContent(content);
    journal.addMatch('KIND=b');
    journal.addMatch('SOURCE=x');
    expect(numbers(journal)).toEqual(['2']);

    const none = Journal.fromContent(content);
    none.addMatch('KIND=c');
    none.addMatch('SOURCE=x');
    expect(numbers(none)).toEqual([]);
  });

  it('keeps the part after the first equals sign as the value', () => {
    const journal = Journal.fromContent(JSON.stringify({ MESSAGE: 'a=b', N: '1' }));
    journal.addMatch('MESSAGE=a=b');
    expect(numbers(journal)).toEqual(['1']);
  });

  it('rejects malformed matches', () => {
    const journal = Journal.fromContent(content);
    expect(() => journal.addMatch('KIND')).toThrow(IOError);
    expect(() => journal.addMatch('=a')).toThrow("Failed to add match to journal: invalid match '=a'");
  });

  it('cannot be read once closed', () => {
    const journal = Journal.fromContent(content);
    journal.close();
    expect(() => [...journal.backwards()]).toThrow('Journal is closed');
  });

  it('opens a missing journal as empty', () => {
    const journal = Journal.open(join(tmpdir(), 'hatch-missing-journal', 'journal.jsonl'));
    expect(journal.stats).toEqual({ totalLines: 0, parseErrors: 0 });
  });
});

describe('JournalWriter', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'hatch-journal-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  function readEntries(path: string): unknown[] {
    return readFileSync(path, 'utf-8')
      .trim()
      .split('\n')
      .map((entry) => JSON.parse(entry));
  }

  it('records a successful transaction with its commit', () => {
    const path = join(root, 'logs', 'journal.jsonl');
    const writer = new JournalWriter(path, { name: 'hatch', version: '9.9.9' }, () => 1_700_000_000_000);

    writer.logTransaction({
      operation: 'install',
      installation: 'system',
      ref: EDITOR,
      remote: 'origin',
      commit: COMMIT_A,
      success: true,
    });

    const [entry] = readEntries(path);
    expect(entry).toMatchObject({
      _SOURCE_REALTIME_TIMESTAMP: '1700000000000000',
      _COMM: 'hatch',
      MESSAGE_ID: TRANSACTION_MESSAGE_ID,
      MESSAGE: `install ${EDITOR}`,
      OPERATION: 'install',
      INSTALLATION: 'system',
      REF: EDITOR,
      REMOTE: 'origin',
      COMMIT: COMMIT_A,
      RESULT: '0',
      TOOL: 'hatch',
      TOOL_VERSION: '9.9.9',
    });
  });

  it('records a failed transaction without a commit', () => {
    const path = join(root, 'journal.jsonl');
    const writer = new JournalWriter(path);

    writer.logTransaction({ operation: 'uninstall', installation: 'user', ref: EDITOR, success: false });

    const [entry] = readEntries(path);
    expect(entry).toMatchObject({ OPERATION: 'uninstall', INSTALLATION: 'user', RESULT: '1' });
    expect(entry).not.toHaveProperty('COMMIT');
    expect(entry).not.toHaveProperty('REMOTE');
  });

  it('appends entries that read back newest first', () => {
    const path = join(root, 'journal.jsonl');
    let clock = 1_000;
    const writer = new JournalWriter(path, undefined, () => clock++);

    writer.append({ N: '1' });
    writer.append({ N: '2' });

    const journal = Journal.open(path);
    journal.addMatch('_COMM=hatch');
    const records = [...journal.backwards()];
    expect(records.map((record) => record.getField('N'))).toEqual(['2', '1']);
    expect(records[0]?.getField('_SOURCE_REALTIME_TIMESTAMP')).toBe('1001000');
  });
});
