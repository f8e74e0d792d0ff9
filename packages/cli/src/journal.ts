import { appendFileSync, mkdirSync, readFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { JournalEntrySchema, type JournalEntry } from '@hatch/shared-types';
import { IOError, errorMessage } from './errors.js';

export const JOURNAL_COMM = 'hatch';
export const TRANSACTION_MESSAGE_ID = '5b4e9c1a7d3f4e8b9a6c2d0f1e3b7a58';

export const JournalField = {
  Timestamp: '_SOURCE_REALTIME_TIMESTAMP',
  Comm: '_COMM',
  Uid: '_UID',
  MessageId: 'MESSAGE_ID',
  Message: 'MESSAGE',
  Operation: 'OPERATION',
  Installation: 'INSTALLATION',
  Ref: 'REF',
  Remote: 'REMOTE',
  Commit: 'COMMIT',
  Result: 'RESULT',
  Tool: 'TOOL',
  ToolVersion: 'TOOL_VERSION',
} as const;

export interface JournalReadStats {
  totalLines: number;
  parseErrors: number;
}

export class JournalRecord {
  constructor(private readonly fields: JournalEntry) {}

  getField(name: string): string | undefined {
    return this.fields[name];
  }
}

function isMissingFile(error: unknown) {
  return (
    typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'
  );
}

/**
 * Read side of the append-only JSONL journal.
 *
 * Matches follow journald rules: values for the same field are alternatives,
 * different fields must all match.
 */
export class Journal {
  private readonly matches = new Map<string, Set<string>>();
  private open = true;

  private constructor(
    private readonly records: readonly JournalRecord[],
    readonly stats: JournalReadStats,
  ) {}

  static open(path: string): Journal {
    let raw: string;
    try {
      raw = readFileSync(path, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return Journal.fromContent('');
      }
      throw new IOError(`Failed to open journal: ${errorMessage(error)}`, { path });
    }
    return Journal.fromContent(raw);
  }

  static fromContent(rawContent: string): Journal {
    const lines = rawContent.split('\n').filter((line) => line.trim().length > 0);
    const records: JournalRecord[] = [];
    let parseErrors = 0;

    for (const line of lines) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        parseErrors++;
        continue;
      }
      const entry = JournalEntrySchema.safeParse(parsed);
      if (!entry.success) {
        parseErrors++;
        continue;
      }
      records.push(new JournalRecord(entry.data));
    }

    return new Journal(records, { totalLines: lines.length, parseErrors });
  }

  addMatch(match: string) {
    this.assertOpen();
    const separator = match.indexOf('=');
    if (separator <= 0) {
      throw new IOError(`Failed to add match to journal: invalid match '${match}'`);
    }
    const field = match.slice(0, separator);
    const value = match.slice(separator + 1);
    const values = this.matches.get(field) ?? new Set<string>();
    values.add(value);
    this.matches.set(field, values);
  }

  /** Newest entries first. */
  *backwards(): Generator<JournalRecord> {
    this.assertOpen();
    for (let index = this.records.length - 1; index >= 0; index--) {
      const record = this.records[index];
      if (record && this.accepts(record)) {
        yield record;
      }
    }
  }

  close() {
    this.open = false;
    this.matches.clear();
  }

  private accepts(record: JournalRecord) {
    for (const [field, values] of this.matches) {
      const value = record.getField(field);
      if (value === undefined || !values.has(value)) {
        return false;
      }
    }
    return true;
  }

  private assertOpen() {
    if (!this.open) {
      throw new IOError('Journal is closed');
    }
  }
}

export interface TransactionLogEntry {
  operation: string;
  installation: string;
  ref: string;
  remote?: string;
  commit?: string;
  success: boolean;
}

export class JournalWriter {
  constructor(
    private readonly path: string,
    private readonly tool = { name: JOURNAL_COMM, version: '0.0.0' },
    private readonly clock: () => number = () => Date.now(),
  ) {}

  append(fields: JournalEntry) {
    const entry: JournalEntry = {
      [JournalField.Timestamp]: String(this.clock() * 1000),
      [JournalField.Comm]: JOURNAL_COMM,
      ...fields,
    };
    const uid = process.getuid?.();
    if (uid !== undefined && entry[JournalField.Uid] === undefined) {
      entry[JournalField.Uid] = String(uid);
    }

    try {
      mkdirSync(dirname(this.path), { recursive: true });
      appendFileSync(this.path, `${JSON.stringify(entry)}\n`);
    } catch (error) {
      throw new IOError(`Failed to write journal: ${errorMessage(error)}`, { path: this.path });
    }
  }

  logTransaction(transaction: TransactionLogEntry) {
    const fields: JournalEntry = {
      [JournalField.MessageId]: TRANSACTION_MESSAGE_ID,
      [JournalField.Message]: `${transaction.operation} ${transaction.ref}`,
      [JournalField.Operation]: transaction.operation,
      [JournalField.Installation]: transaction.installation,
      [JournalField.Ref]: transaction.ref,
      // "0" marks success, mirroring process exit status.
      [JournalField.Result]: transaction.success ? '0' : '1',
      [JournalField.Tool]: this.tool.name,
      [JournalField.ToolVersion]: this.tool.version,
    };
    if (transaction.remote !== undefined) {
      fields[JournalField.Remote] = transaction.remote;
    }
    if (transaction.commit !== undefined) {
      fields[JournalField.Commit] = transaction.commit;
    }
    this.append(fields);
  }
}
