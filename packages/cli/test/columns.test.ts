import { describe, expect, it } from 'vitest';
import { describeColumns, resolveColumns } from '../src/columns.js';
import { HISTORY_COLUMNS } from '../src/history.js';
import { UsageError } from '../src/errors.js';

const ids = (selection: string | undefined) =>
  resolveColumns(HISTORY_COLUMNS, selection, 'hatch history').map((column) => column.id);

describe('resolveColumns', () => {
  it('falls back to the default columns', () => {
    expect(ids(undefined)).toEqual([
      'time',
      'change',
      'installation',
      'application',
      'branch',
      'remote',
      'commit',
      'result',
    ]);
  });

  it('keeps the requested order', () => {
    expect(ids('change, time')).toEqual(['change', 'time']);
    expect(ids('ref,ref')).toEqual(['ref', 'ref']);
  });

  it('expands all to every column meant for it', () => {
    expect(ids('all')).toEqual(
      HISTORY_COLUMNS.filter((column) => column.id !== 'ref').map((column) => column.id),
    );
  });

  it('rejects an empty selection', () => {
    expect(() => ids(' , ')).toThrow("No columns specified\n\nSee 'hatch history --help'");
  });

  it('rejects unknown columns, including all among others', () => {
    expect(() => ids('time,all')).toThrow(UsageError);
    expect(() => ids('when')).toThrow(/^Unknown column: when\nAvailable columns: time, change,/);
  });
});

describe('describeColumns', () => {
  it('lists ids with their descriptions', () => {
    const lines = describeColumns(HISTORY_COLUMNS.slice(0, 2)).render();
    expect(lines).toEqual([
      'Column Description',
      'time   Show when the change happened',
      'change Show the kind of change',
    ]);
  });
});
