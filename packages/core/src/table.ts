import type { TableCell } from './types/report';

const COLUMN_GAP = 2;

// Width in characters (code points), not UTF-16 units
export function charLength(text: string): number {
  return Array.from(text).length;
}

export function getMaxFieldLength(rows: ReadonlyArray<readonly TableCell[]>): number {
  let max = 0;
  for (const row of rows) {
    for (const cell of row) {
      max = Math.max(max, charLength(String(cell)));
    }
  }
  return max;
}

/**
 * Every column shares one width: the longest cell anywhere, plus a gap.
 */
export function getColumnWidth(header: readonly TableCell[], body: ReadonlyArray<readonly TableCell[]>): number {
  return getMaxFieldLength([header, ...body]) + COLUMN_GAP;
}

export function formatRow(row: readonly TableCell[], width: number): string {
  return row
    .map((cell) => {
      const text = String(cell);
      return text + ' '.repeat(Math.max(0, width - charLength(text)));
    })
    .join('');
}

export interface RenderedTable {
  width: number;
  header: string;
  body: string[];
}

export function renderTable(header: readonly TableCell[], body: ReadonlyArray<readonly TableCell[]>): RenderedTable {
  const width = getColumnWidth(header, body);
  return {
    width,
    header: formatRow(header, width),
    body: body.map((row) => formatRow(row, width)),
  };
}
