import { decomposeRef } from '@hatch/shared-types';
import type { AccountResolver } from './accounts.js';
import type { ColumnSpec } from './columns.js';
import type { CommandContext } from './context.js';
import { historyId, type Installation } from './installations.js';
import {
  JOURNAL_COMM,
  JournalField,
  TRANSACTION_MESSAGE_ID,
  type Journal,
  type JournalRecord,
} from './journal.js';
import { TablePrinter } from './output.js';

export type HistoryColumnId =
  | 'time'
  | 'change'
  | 'installation'
  | 'ref'
  | 'application'
  | 'arch'
  | 'branch'
  | 'remote'
  | 'commit'
  | 'result'
  | 'user'
  | 'tool'
  | 'version';

export const HISTORY_COLUMNS: readonly ColumnSpec<HistoryColumnId>[] = [
  { id: 'time', title: 'Time', description: 'Show when the change happened', defaultVisible: true, allInAllMode: true },
  { id: 'change', title: 'Change', description: 'Show the kind of change', defaultVisible: true, allInAllMode: true },
  { id: 'installation', title: 'Installation', description: 'Show the affected installation', defaultVisible: true, allInAllMode: true },
  { id: 'ref', title: 'Ref', description: 'Show the ref', defaultVisible: false, allInAllMode: false },
  { id: 'application', title: 'Application', description: 'Show the application/runtime ID', defaultVisible: true, allInAllMode: true },
  { id: 'arch', title: 'Arch', description: 'Show the architecture', defaultVisible: false, allInAllMode: true },
  { id: 'branch', title: 'Branch', description: 'Show the branch', defaultVisible: true, allInAllMode: true },
  { id: 'remote', title: 'Remote', description: 'Show the remote', defaultVisible: true, allInAllMode: true },
  { id: 'commit', title: 'Commit', description: 'Show the current commit', defaultVisible: true, allInAllMode: true },
  { id: 'result', title: 'Success', description: 'Show whether change was successful', defaultVisible: true, allInAllMode: true },
  { id: 'user', title: 'User', description: 'Show the user doing the change', defaultVisible: false, allInAllMode: true },
  { id: 'tool', title: 'Tool', description: 'Show the tool that was used', defaultVisible: false, allInAllMode: true },
  { id: 'version', title: 'Version', description: 'Show the tool version', defaultVisible: false, allInAllMode: true },
];

export const COMMIT_DISPLAY_LENGTH = 12;
export const SUCCESS_GLYPH = '✓';

export interface HistoryQuery {
  /** Only records for these installations; every record when omitted. */
  installations?: readonly Installation[];
  since?: Date;
  until?: Date;
}

export interface HistoryProjection {
  accounts: AccountResolver;
  formatTime?(date: Date): string;
}

/** Journal timestamps are microseconds since the epoch. */
export function recordTime(record: JournalRecord): Date | undefined {
  const raw = record.getField(JournalField.Timestamp);
  if (raw === undefined || !/^\d+$/.test(raw)) {
    return undefined;
  }
  return new Date(Math.floor(Number(raw) / 1000));
}

export function inTimeRange(time: Date | undefined, query: Pick<HistoryQuery, 'since' | 'until'>) {
  if (!query.since && !query.until) {
    return true;
  }
  if (!time) {
    return false;
  }
  return (
    (!query.since || time.getTime() >= query.since.getTime()) &&
    (!query.until || time.getTime() < query.until.getTime())
  );
}

/** Transaction records newest first, narrowed to the query's installations and time range. */
export function* queryHistory(journal: Journal, query: HistoryQuery): Generator<JournalRecord> {
  journal.addMatch(`${JournalField.Comm}=${JOURNAL_COMM}`);
  journal.addMatch(`${JournalField.MessageId}=${TRANSACTION_MESSAGE_ID}`);

  const ids = query.installations ? new Set(query.installations.map(historyId)) : undefined;

  for (const record of journal.backwards()) {
    if (ids) {
      const installation = record.getField(JournalField.Installation);
      if (installation === undefined || !ids.has(installation)) {
        continue;
      }
    }
    if (!inTimeRange(recordTime(record), query)) {
      continue;
    }
    yield record;
  }
}

export function projectRecord(
  record: JournalRecord,
  columns: readonly ColumnSpec<HistoryColumnId>[],
  projection: HistoryProjection,
): string[] {
  const formatTime = projection.formatTime ?? ((date: Date) => date.toLocaleTimeString());
  const rawRef = record.getField(JournalField.Ref);
  const ref = rawRef === undefined ? null : decomposeRef(rawRef);

  const cell = (id: HistoryColumnId): string => {
    switch (id) {
      case 'time': {
        const time = recordTime(record);
        return time ? formatTime(time) : '';
      }
      case 'change':
        return record.getField(JournalField.Operation) ?? '';
      case 'installation':
        return record.getField(JournalField.Installation) ?? '';
      case 'ref':
        return rawRef ?? '';
      case 'application':
        return ref?.id ?? '';
      case 'arch':
        return ref?.arch ?? '';
      case 'branch':
        return ref?.branch ?? '';
      case 'remote':
        return record.getField(JournalField.Remote) ?? '';
      case 'commit':
        return (record.getField(JournalField.Commit) ?? '').slice(0, COMMIT_DISPLAY_LENGTH);
      case 'result':
        // The transaction log writes "0" for a change that went through.
        return record.getField(JournalField.Result) === '0' ? SUCCESS_GLYPH : '';
      case 'user': {
        const uid = record.getField(JournalField.Uid);
        if (uid === undefined) {
          return '';
        }
        return projection.accounts.uidToName(uid) ?? uid;
      }
      case 'tool':
        return record.getField(JournalField.Tool) ?? '';
      case 'version':
        return record.getField(JournalField.ToolVersion) ?? '';
    }
  };

  return columns.map((column) => cell(column.id));
}

export function printHistory(
  ctx: CommandContext,
  columns: readonly ColumnSpec<HistoryColumnId>[],
  query: HistoryQuery,
  formatTime?: (date: Date) => string,
) {
  const printer = new TablePrinter();
  printer.setTitles(columns.map((column) => column.title));

  const journal = ctx.services.openJournal();
  try {
    if (journal.stats.parseErrors > 0) {
      ctx.logger.main.debug(
        { parseErrors: journal.stats.parseErrors },
        'skipped unreadable journal entries',
      );
    }
    for (const record of queryHistory(journal, query)) {
      printer.addRow(projectRecord(record, columns, { accounts: ctx.services.accounts, formatTime }));
    }
  } finally {
    journal.close();
  }

  printer.print(ctx.io);
  return printer.rowCount;
}
