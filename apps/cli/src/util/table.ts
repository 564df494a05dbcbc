/**
 * Minimal table formatter for CLI output.
 * Prints a simple ASCII table with column headers and rows.
 */

import type { CellValue } from '@salesask/core';

const MAX_WIDTH = 60;

export function formatTable(columns: string[], rows: CellValue[][]): string {
  if (columns.length === 0) return '(no columns)';
  if (rows.length === 0) return '(0 rows)';

  // Calculate column widths
  const widths = columns.map((col) => col.length);
  for (const row of rows) {
    for (let i = 0; i < columns.length; i++) {
      const val = formatValue(row[i]);
      widths[i] = Math.min(Math.max(widths[i], val.length), MAX_WIDTH);
    }
  }

  const lines: string[] = [];
  lines.push(columns.map((col, i) => col.padEnd(widths[i])).join(' | '));
  lines.push(widths.map((w) => '-'.repeat(w)).join('-+-'));

  for (const row of rows) {
    const line = columns
      .map((_, i) => {
        const val = formatValue(row[i]);
        const cell = val.length > widths[i] ? val.slice(0, widths[i] - 1) + '…' : val;
        return typeof row[i] === 'number' ? cell.padStart(widths[i]) : cell.padEnd(widths[i]);
      })
      .join(' | ');
    lines.push(line.trimEnd());
  }

  return lines.join('\n');
}

function formatValue(val: CellValue | undefined): string {
  if (val === null || val === undefined) return 'NULL';
  return String(val);
}
