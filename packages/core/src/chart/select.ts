/**
 * Chart selection from a result's shape.
 *
 * Rules, first match wins:
 *   line    - a temporal column and exactly one numeric column, optionally
 *             one low-cardinality categorical column as the series
 *   pie     - one categorical column (2..pieThreshold values) and one
 *             proportion-like numeric column with non-negative values
 *   scatter - exactly two numeric columns and nothing else
 *   bar     - a categorical (or temporal) column and a numeric column
 *   table   - anything else, and every empty result
 */

import type { CellValue, ResultColumn, ResultSet } from '../db/types.js';
import type { Chart, ChartDirective, ChartOptions } from './types.js';

export const DEFAULT_PIE_THRESHOLD = 8;
export const DEFAULT_SERIES_THRESHOLD = 8;

const TEMPORAL_NAME = /(^|_)(date|month|day|week|year|period|quarter)$/i;
const TEMPORAL_VALUE = /^\d{4}-\d{2}(-\d{2})?$/;
const PROPORTION_NAME = /share|pct|percent|ratio|proportion/i;

interface Roles {
  temporal: number[];
  numeric: number[];
  categorical: number[];
}

export function selectChart(result: ResultSet, options: ChartOptions = {}): ChartDirective {
  return { chart: chooseChart(result, options), result };
}

function chooseChart(result: ResultSet, options: ChartOptions): Chart {
  if (result.rows.length === 0) return { kind: 'table' };

  const pieThreshold = options.pieThreshold ?? DEFAULT_PIE_THRESHOLD;
  const seriesThreshold = options.seriesThreshold ?? DEFAULT_SERIES_THRESHOLD;
  const { columns } = result;
  const roles = classifyColumns(result);
  const name = (i: number): string => columns[i].name;

  if (roles.temporal.length >= 1 && roles.numeric.length === 1 && roles.categorical.length <= 1) {
    const series = roles.categorical[0];
    if (series === undefined) {
      return { kind: 'line', timeAxis: name(roles.temporal[0]), valueAxis: name(roles.numeric[0]) };
    }
    if (cardinality(result.rows, series) <= seriesThreshold) {
      return {
        kind: 'line',
        timeAxis: name(roles.temporal[0]),
        valueAxis: name(roles.numeric[0]),
        series: name(series),
      };
    }
  }

  if (roles.temporal.length === 0 && roles.categorical.length === 1 && roles.numeric.length === 1) {
    const label = roles.categorical[0];
    const value = roles.numeric[0];
    const slices = cardinality(result.rows, label);
    if (
      PROPORTION_NAME.test(name(value)) &&
      slices >= 2 &&
      slices <= pieThreshold &&
      isNonNegativeWhole(result.rows, value)
    ) {
      return { kind: 'pie', label: name(label), value: name(value) };
    }
  }

  if (roles.numeric.length === 2 && roles.categorical.length === 0 && roles.temporal.length === 0) {
    return { kind: 'scatter', x: name(roles.numeric[0]), y: name(roles.numeric[1]) };
  }

  const category = roles.categorical[0] ?? roles.temporal[0];
  if (category !== undefined && roles.numeric.length >= 1) {
    return { kind: 'bar', categoryAxis: name(category), valueAxis: name(roles.numeric[0]) };
  }

  return { kind: 'table' };
}

/** Column indexes by role; columns with no values at all take no role */
export function classifyColumns(result: ResultSet): Roles {
  const roles: Roles = { temporal: [], numeric: [], categorical: [] };
  result.columns.forEach((column, i) => {
    if (column.type === 'integer' || column.type === 'real') {
      roles.numeric.push(i);
    } else if (isTemporal(column, result.rows, i)) {
      roles.temporal.push(i);
    } else if (column.type === 'text') {
      roles.categorical.push(i);
    }
  });
  return roles;
}

function isTemporal(column: ResultColumn, rows: CellValue[][], index: number): boolean {
  if (column.type === 'date') return true;
  if (column.type !== 'text') return false;
  if (TEMPORAL_NAME.test(column.name)) return true;
  const values = rows.map((row) => row[index]).filter((v) => v !== null && v !== undefined);
  return values.length > 0 && values.every((v) => typeof v === 'string' && TEMPORAL_VALUE.test(v));
}

function cardinality(rows: CellValue[][], index: number): number {
  return new Set(rows.map((row) => row[index] ?? null)).size;
}

function isNonNegativeWhole(rows: CellValue[][], index: number): boolean {
  let total = 0;
  for (const row of rows) {
    const v = row[index];
    if (typeof v !== 'number' || v < 0) return false;
    total += v;
  }
  return total > 0;
}
