import { UsageError } from './errors.js';
import { TablePrinter } from './output.js';

export interface ColumnSpec<Id extends string = string> {
  id: Id;
  title: string;
  description: string;
  defaultVisible: boolean;
  allInAllMode: boolean;
}

export const ALL_COLUMNS = 'all';

/**
 * Picks the ordered column list for a report.
 *
 * Without a selection the default columns are used, `all` selects every
 * column marked for that mode, and otherwise the comma separated ids are
 * looked up in order.
 */
export function resolveColumns<Id extends string>(
  table: readonly ColumnSpec<Id>[],
  selection: string | undefined,
  programName: string,
): ColumnSpec<Id>[] {
  if (selection === undefined) {
    return table.filter((column) => column.defaultVisible);
  }

  const requested = selection
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);

  if (requested.length === 0) {
    throw new UsageError('No columns specified', programName);
  }

  if (requested.length === 1 && requested[0] === ALL_COLUMNS) {
    return table.filter((column) => column.allInAllMode);
  }

  return requested.map((id) => {
    const column = table.find((entry) => entry.id === id);
    if (!column) {
      throw new UsageError(
        `Unknown column: ${id}\nAvailable columns: ${table.map((entry) => entry.id).join(', ')}`,
        programName,
        { column: id },
      );
    }
    return column;
  });
}

export function describeColumns(table: readonly ColumnSpec[]) {
  const printer = new TablePrinter();
  printer.setTitles(['Column', 'Description']);
  for (const column of table) {
    printer.addRow([column.id, column.description]);
  }
  return printer;
}
