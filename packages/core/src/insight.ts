/**
 * Short plain-text observations about a result, shown under the chart.
 */

import type { Chart } from './chart/types.js';
import type { CellValue, ResultSet } from './db/types.js';

const SUMMABLE = /revenue|units/i;
const NOT_SUMMABLE = /avg|average|mean|price|ratio|share|pct|percent/i;

export function describeResult(result: ResultSet, chart: Chart): string[] {
  if (result.rowCount === 0) {
    return ['No rows matched the question.'];
  }

  const lines = [`Found ${result.rowCount} ${result.rowCount === 1 ? 'row' : 'rows'}.`];

  const valueIndex = primaryNumericColumn(result, chart);
  if (valueIndex !== -1) {
    const column = result.columns[valueIndex].name;
    const labelIndex = result.columns.findIndex((c) => c.type !== 'integer' && c.type !== 'real');
    const entries = result.rows
      .map((row) => ({ value: row[valueIndex], label: labelIndex === -1 ? null : row[labelIndex] }))
      .filter((e): e is { value: number; label: CellValue } => typeof e.value === 'number');

    if (entries.length === 1) {
      lines.push(`${column}: ${formatNumber(entries[0].value)}.`);
    } else if (entries.length > 1) {
      let max = entries[0];
      let min = entries[0];
      for (const e of entries) {
        if (e.value > max.value) max = e;
        if (e.value < min.value) min = e;
      }
      lines.push(`Highest ${column}: ${formatNumber(max.value)}${labelSuffix(max.label)}.`);
      lines.push(`Lowest ${column}: ${formatNumber(min.value)}${labelSuffix(min.label)}.`);
      if (SUMMABLE.test(column) && !NOT_SUMMABLE.test(column)) {
        const total = entries.reduce((sum, e) => sum + e.value, 0);
        lines.push(`Total ${column}: ${formatNumber(total)}.`);
      }
    }
  }

  if (result.truncated) {
    lines.push(`Only the first ${result.rowCount} rows are shown.`);
  }
  return lines;
}

function primaryNumericColumn(result: ResultSet, chart: Chart): number {
  const axis =
    chart.kind === 'bar' || chart.kind === 'line'
      ? chart.valueAxis
      : chart.kind === 'pie'
        ? chart.value
        : null;
  if (axis !== null) {
    const idx = result.columns.findIndex((c) => c.name === axis);
    if (idx !== -1) return idx;
  }
  return result.columns.findIndex((c) => c.type === 'integer' || c.type === 'real');
}

function labelSuffix(label: CellValue): string {
  return label === null ? '' : ` (${label})`;
}

export function formatNumber(value: number): string {
  return value.toLocaleString('en-US', { maximumFractionDigits: 2 });
}
