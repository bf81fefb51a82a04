/**
 * Column-aligned table output.
 *
 * Each column is as wide as its widest cell plus two spaces of padding. The
 * last column is written as-is with no trailing padding.
 */

import { OutputStream } from '../types/cli';

const PADDING = 2;

export interface TableColumn<TRow> {
  header: string;
  value: (row: TRow) => string;
  /** Truncate longer cells to this many characters. */
  maxWidth?: number;
}

function displayWidth(value: string): number {
  return Array.from(value).length;
}

/** Cut a string to `max` characters, ending in "..." when there is room for it. */
export function truncateString(value: string, max: number): string {
  const chars = Array.from(value);
  if (chars.length <= max) {
    return value;
  }
  if (max <= 3) {
    return chars.slice(0, max).join('');
  }
  return chars.slice(0, max - 3).join('') + '...';
}

export function formatTable(lines: readonly (readonly string[])[]): string {
  const widths: number[] = [];
  for (const cells of lines) {
    cells.forEach((cell, index) => {
      widths[index] = Math.max(widths[index] ?? 0, displayWidth(cell));
    });
  }

  return lines
    .map(cells =>
      cells
        .map((cell, index) => {
          if (index === cells.length - 1) {
            return cell;
          }
          return cell + ' '.repeat(widths[index] + PADDING - displayWidth(cell));
        })
        .join('')
    )
    .map(line => line + '\n')
    .join('');
}

export function writeTable<TRow>(out: OutputStream, columns: readonly TableColumn<TRow>[], rows: readonly TRow[]): void {
  const lines: string[][] = [columns.map(column => column.header)];
  for (const row of rows) {
    lines.push(
      columns.map(column => {
        const value = column.value(row);
        return column.maxWidth !== undefined ? truncateString(value, column.maxWidth) : value;
      })
    );
  }
  out.write(formatTable(lines));
}
