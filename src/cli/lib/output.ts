/**
 * Output Formatting for CLI Commands
 *
 * Command results go to stdout through these helpers; diagnostics go
 * through the CLI logger.
 *
 * @module cli/lib/output
 */

export interface TableColumn<T> {
  readonly key: keyof T & string;
  readonly header: string;
  readonly width?: number;
  readonly align?: 'left' | 'right';
}

/**
 * Format rows as a plain-text table
 */
export function formatTable<T extends object>(data: readonly T[], columns: readonly TableColumn<T>[]): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const cell = (row: T, column: TableColumn<T>): string => String(row[column.key] ?? '');

  const widths = columns.map(
    (column) => column.width ?? Math.max(column.header.length, ...data.map((row) => cell(row, column).length))
  );

  const render = (values: readonly string[]): string =>
    values
      .map((value, i) => padCell(value, widths[i] ?? value.length, columns[i]?.align ?? 'left'))
      .join(' | ')
      .trimEnd();

  const headerRow = render(columns.map((column) => column.header));
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const dataRows = data.map((row) => render(columns.map((column) => cell(row, column))));

  return [headerRow, separator, ...dataRows].join('\n');
}

/**
 * Pad a cell to `width`, truncating with '~' when it does not fit
 */
function padCell(value: string, width: number, align: 'left' | 'right'): string {
  const truncated = value.length > width ? value.slice(0, width - 1) + '~' : value;
  return align === 'right' ? truncated.padStart(width) : truncated.padEnd(width);
}

export function formatJson<T>(data: T, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

export function printOutput(output: string): void {
  console.log(output);
}

export function printError(message: string): void {
  console.error(`Error: ${message}`);
}
