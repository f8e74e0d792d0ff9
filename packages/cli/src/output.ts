import chalk from 'chalk';

export interface CliIO {
  print(line: string): void;
  printErr(line: string): void;
  stdoutIsTTY: boolean;
  stderrIsTTY: boolean;
}

export function processIO(): CliIO {
  return {
    print: (line) => {
      process.stdout.write(`${line}\n`);
    },
    printErr: (line) => {
      process.stderr.write(`${line}\n`);
    },
    stdoutIsTTY: process.stdout.isTTY === true,
    stderrIsTTY: process.stderr.isTTY === true,
  };
}

interface TableCell {
  text: string;
}

/**
 * Collects titled rows and renders them as space-aligned columns.
 * Cells may be capped to a maximum length when added; the last column is never padded.
 */
export class TablePrinter {
  private titles: string[] = [];
  private readonly rows: TableCell[][] = [];
  private current: TableCell[] = [];

  setTitles(titles: readonly string[]) {
    this.titles = [...titles];
  }

  addCell(text: string | undefined, maxLength?: number) {
    const value = text ?? '';
    this.current.push({
      text: maxLength !== undefined && value.length > maxLength ? value.slice(0, maxLength) : value,
    });
  }

  addRow(cells: readonly (string | undefined)[]) {
    for (const cell of cells) {
      this.addCell(cell);
    }
    this.finishRow();
  }

  finishRow() {
    this.rows.push(this.current);
    this.current = [];
  }

  get rowCount() {
    return this.rows.length;
  }

  render(options: { fancy?: boolean } = {}): string[] {
    if (this.current.length > 0) {
      this.finishRow();
    }
    if (this.rows.length === 0) {
      return [];
    }

    // Journals can hold far more rows than a spread argument list allows.
    const widths = this.titles.map((title) => title.length);
    for (const row of this.rows) {
      row.forEach((cell, column) => {
        widths[column] = Math.max(widths[column] ?? 0, cell.text.length);
      });
    }

    const formatLine = (cells: readonly string[]) =>
      cells
        .map((cell, column) =>
          column === cells.length - 1 ? cell : cell.padEnd(widths[column] ?? cell.length),
        )
        .join(' ')
        .trimEnd();

    const lines: string[] = [];
    if (this.titles.length > 0) {
      const header = formatLine(this.titles);
      lines.push(options.fancy ? chalk.bold(header) : header);
    }
    for (const row of this.rows) {
      lines.push(formatLine(row.map((cell) => cell.text)));
    }
    return lines;
  }

  print(io: CliIO) {
    for (const line of this.render({ fancy: io.stdoutIsTTY })) {
      io.print(line);
    }
  }
}

const SIZE_UNITS = ['kB', 'MB', 'GB', 'TB', 'PB'] as const;

/** Decimal units with one fraction digit, e.g. `1.5 MB`. */
export function formatSize(bytes: number) {
  if (bytes < 1000) {
    return bytes === 1 ? '1 byte' : `${bytes} bytes`;
  }
  let value = bytes;
  let unit: string = SIZE_UNITS[0];
  for (const candidate of SIZE_UNITS) {
    value /= 1000;
    unit = candidate;
    if (value < 1000) {
      break;
    }
  }
  return `${value.toFixed(1)} ${unit}`;
}
