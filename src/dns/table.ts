/**
 * Org-mode style text tables for human output
 */

export type Cell = string | number | boolean | undefined | null;

function cellText(cell: Cell): string {
  if (cell === undefined || cell === null) return '';
  return String(cell);
}

/**
 * Render rows under a header line:
 *
 *   | zone info | example.com |
 *   |-----------+-------------|
 *   | ttl       | 3600        |
 */
export function renderTable(headers: Cell[], rows: Cell[][]): string {
  const columnCount = Math.max(headers.length, ...rows.map((r) => r.length));
  const widths: number[] = [];

  for (let col = 0; col < columnCount; col++) {
    const texts = [headers[col], ...rows.map((r) => r[col])].map(cellText);
    widths.push(Math.max(...texts.map((t) => t.length)));
  }

  const line = (cells: Cell[]): string =>
    '| ' + widths.map((w, col) => cellText(cells[col]).padEnd(w)).join(' | ') + ' |';

  const separator = '|-' + widths.map((w) => '-'.repeat(w)).join('-+-') + '-|';

  return [line(headers), separator, ...rows.map(line)].join('\n');
}
