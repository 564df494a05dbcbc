import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { selectChart } from '../select.js';
import type { CellValue, ResultColumn, ResultSet } from '../../db/types.js';

function result(columns: ResultColumn[], rows: CellValue[][]): ResultSet {
  return { columns, rows, rowCount: rows.length, truncated: false, execMs: 1 };
}

const MONTHS = Array.from({ length: 12 }, (_, i) => `2024-${String(i + 1).padStart(2, '0')}`);

describe('selectChart', () => {
  it('picks a line for revenue per month', () => {
    const rs = result(
      [
        { name: 'month', type: 'text' },
        { name: 'revenue', type: 'integer' },
      ],
      MONTHS.map((m, i) => [m, 1000 * (i + 1)]),
    );
    const directive = selectChart(rs);
    assert.deepEqual(directive.chart, { kind: 'line', timeAxis: 'month', valueAxis: 'revenue' });
    assert.equal(directive.result, rs);
  });

  it('uses a low-cardinality category as the line series', () => {
    const rows: CellValue[][] = [];
    for (const m of MONTHS.slice(0, 3)) {
      for (const c of ['Home', 'Electronics']) rows.push([m, c, 10]);
    }
    const rs = result(
      [
        { name: 'month', type: 'text' },
        { name: 'category', type: 'text' },
        { name: 'total_revenue', type: 'integer' },
      ],
      rows,
    );
    assert.deepEqual(selectChart(rs).chart, {
      kind: 'line',
      timeAxis: 'month',
      valueAxis: 'total_revenue',
      series: 'category',
    });
  });

  it('falls back to a bar when the series has too many values', () => {
    const rows: CellValue[][] = ['a', 'b', 'c'].map((c) => ['2024-01', c, 1]);
    const rs = result(
      [
        { name: 'month', type: 'text' },
        { name: 'product', type: 'text' },
        { name: 'units', type: 'integer' },
      ],
      rows,
    );
    assert.deepEqual(selectChart(rs, { seriesThreshold: 2 }).chart, {
      kind: 'bar',
      categoryAxis: 'product',
      valueAxis: 'units',
    });
  });

  it('recognizes temporal values without a temporal name', () => {
    const rs = result(
      [
        { name: 'period_start', type: 'text' },
        { name: 'units', type: 'integer' },
      ],
      [
        ['2024-01-01', 4],
        ['2024-02-01', 5],
      ],
    );
    assert.equal(selectChart(rs).chart.kind, 'line');
  });

  it('picks a bar for revenue by region', () => {
    const rs = result(
      [
        { name: 'region', type: 'text' },
        { name: 'revenue', type: 'integer' },
      ],
      [
        ['East', 400],
        ['North', 300],
        ['South', 200],
        ['West', 100],
      ],
    );
    assert.deepEqual(selectChart(rs).chart, { kind: 'bar', categoryAxis: 'region', valueAxis: 'revenue' });
  });

  it('picks a pie for a share of a whole', () => {
    const rs = result(
      [
        { name: 'sales_channel', type: 'text' },
        { name: 'revenue_share', type: 'real' },
      ],
      [
        ['Online', 0.6],
        ['Store', 0.4],
      ],
    );
    assert.deepEqual(selectChart(rs).chart, { kind: 'pie', label: 'sales_channel', value: 'revenue_share' });
  });

  it('does not pick a pie with negative values or too many slices', () => {
    const negative = result(
      [
        { name: 'channel', type: 'text' },
        { name: 'pct', type: 'real' },
      ],
      [
        ['a', 0.5],
        ['b', -0.1],
      ],
    );
    assert.equal(selectChart(negative).chart.kind, 'bar');

    const many = result(
      [
        { name: 'channel', type: 'text' },
        { name: 'pct', type: 'real' },
      ],
      ['a', 'b', 'c'].map((c) => [c, 0.3]),
    );
    assert.equal(selectChart(many, { pieThreshold: 2 }).chart.kind, 'bar');
  });

  it('picks a scatter for two numeric columns', () => {
    const rs = result(
      [
        { name: 'units', type: 'integer' },
        { name: 'unit_price', type: 'integer' },
      ],
      [
        [1, 100],
        [2, 90],
      ],
    );
    assert.deepEqual(selectChart(rs).chart, { kind: 'scatter', x: 'units', y: 'unit_price' });
  });

  it('uses the first categorical and first numeric column for bars', () => {
    const rs = result(
      [
        { name: 'category', type: 'text' },
        { name: 'total_revenue', type: 'integer' },
        { name: 'total_units', type: 'integer' },
      ],
      [
        ['Home', 10, 1],
        ['Electronics', 20, 2],
      ],
    );
    assert.deepEqual(selectChart(rs).chart, {
      kind: 'bar',
      categoryAxis: 'category',
      valueAxis: 'total_revenue',
    });
  });

  it('uses a bar over time when there are several measures', () => {
    const rs = result(
      [
        { name: 'month', type: 'text' },
        { name: 'total_revenue', type: 'integer' },
        { name: 'total_units', type: 'integer' },
      ],
      [
        ['2024-01', 1200, 12],
        ['2024-02', 900, 8],
        ['2024-03', 1500, 15],
      ],
    );
    assert.deepEqual(selectChart(rs).chart, { kind: 'bar', categoryAxis: 'month', valueAxis: 'total_revenue' });
  });

  it('shows a table for single-row summaries and empty results', () => {
    const summary = result(
      [
        { name: 'total_transactions', type: 'integer' },
        { name: 'total_revenue', type: 'integer' },
        { name: 'total_units', type: 'integer' },
      ],
      [[3, 100, 5]],
    );
    assert.deepEqual(selectChart(summary).chart, { kind: 'table' });

    const empty = result(
      [
        { name: 'month', type: 'text' },
        { name: 'revenue', type: 'integer' },
      ],
      [],
    );
    assert.deepEqual(selectChart(empty).chart, { kind: 'table' });

    const textOnly = result([{ name: 'region', type: 'text' }], [['North']]);
    assert.deepEqual(selectChart(textOnly).chart, { kind: 'table' });
  });

  it('gives the same chart for the same shape regardless of values', () => {
    const columns: ResultColumn[] = [
      { name: 'region', type: 'text' },
      { name: 'revenue', type: 'integer' },
    ];
    const a = selectChart(result(columns, [['North', 1], ['South', 2]]));
    const b = selectChart(result(columns, [['East', 900], ['West', 5]]));
    assert.deepEqual(a.chart, b.chart);
  });
});
