import { describe, it, after } from 'node:test';
import assert from 'node:assert/strict';
import { answerQuestion, EXECUTION_FAILED_MESSAGE, type AnswerDeps } from '../answer.js';
import { QueryResolver } from '../resolver.js';
import { SafetyValidator } from '../policy/validator.js';
import { FallbackCatalog } from '../fallback/catalog.js';
import { Executor } from '../db/execute.js';
import { openSalesEngine } from '../db/adapters/sqlite.js';
import type { SalesRow } from '../dataset/schema.js';
import type { AnalyticsEngine } from '../db/types.js';
import type { Translator } from '../llm/types.js';

function row(date: string, category: string, units: number, unitPrice: number, region: string): SalesRow {
  return {
    date,
    month: date.slice(0, 7),
    category,
    units,
    unit_price: unitPrice,
    region,
    sales_channel: 'Online',
    customer_segment: 'Consumer',
    revenue: units * unitPrice,
  };
}

const engine = openSalesEngine({
  rows: [
    row('2024-01-03', 'Home', 2, 1000, 'North'),
    row('2024-01-20', 'Electronics', 1, 5000, 'South'),
    row('2024-02-11', 'Home', 4, 1000, 'North'),
  ],
});
after(() => engine.close());

const catalog = new FallbackCatalog();

function depsFor(target: AnalyticsEngine, translator?: Translator): AnswerDeps {
  return {
    resolver: new QueryResolver({
      translator,
      validator: new SafetyValidator(),
      catalog,
      translatorTimeoutMs: 1000,
    }),
    executor: new Executor(target, { maxRows: 1000, timeoutMs: 5000 }),
    catalog,
  };
}

function fixedTranslator(sql: string): Translator {
  return { translate: async () => sql };
}

describe('answerQuestion', () => {
  it('answers with rows, a chart and insight text', async () => {
    const answer = await answerQuestion(
      { text: 'Revenue by region' },
      depsFor(
        engine,
        fixedTranslator('SELECT region, SUM(revenue) AS revenue FROM sales GROUP BY region ORDER BY region'),
      ),
    );

    assert.equal(answer.status, 'ok');
    if (answer.status !== 'ok') return;
    assert.equal(answer.retried, false);
    assert.equal(answer.resolution.source, 'translator');
    assert.deepEqual(answer.result.rows, [
      ['North', 6000],
      ['South', 5000],
    ]);
    assert.deepEqual(answer.chart, { kind: 'bar', categoryAxis: 'region', valueAxis: 'revenue' });
    assert.deepEqual(answer.insight, [
      'Found 2 rows.',
      'Highest revenue: 6,000 (North).',
      'Lowest revenue: 5,000 (South).',
      'Total revenue: 11,000.',
    ]);
  });

  it('retries once with the default query when execution fails', async () => {
    const answer = await answerQuestion(
      { text: 'Revenue by region' },
      depsFor(engine, fixedTranslator('SELECT no_such_column FROM sales')),
    );

    assert.equal(answer.status, 'ok');
    if (answer.status !== 'ok') return;
    assert.equal(answer.retried, true);
    assert.equal(answer.resolution.source, 'translator');
    assert.equal(answer.query, catalog.defaultEntry());
    assert.deepEqual(answer.result.rows, [
      ['2024-01', 7000],
      ['2024-02', 4000],
    ]);
    assert.deepEqual(answer.chart, { kind: 'line', timeAxis: 'month', valueAxis: 'total_revenue' });
  });

  it('returns one generic error when the retry fails too', async () => {
    const sqlSeen: string[] = [];
    const failing: AnalyticsEngine = {
      name: 'failing',
      query: async (sql) => {
        sqlSeen.push(sql);
        throw new Error('no such table: sales');
      },
      close: () => undefined,
    };

    const answer = await answerQuestion({ text: 'Compare revenue across regions' }, depsFor(failing));

    assert.equal(answer.status, 'error');
    if (answer.status !== 'error') return;
    assert.deepEqual(answer.error, { code: 'EXECUTION_FAILED', message: EXECUTION_FAILED_MESSAGE });
    assert.deepEqual(answer.attempts, ['unknown_identifier', 'unknown_identifier']);
    assert.deepEqual(sqlSeen, [catalog.resolve('region_totals').sql, catalog.defaultEntry().sql]);
    assert.equal(answer.resolution.intent, 'region_totals');
  });

  it('answers from the fallback catalog without a translator', async () => {
    const answer = await answerQuestion({ text: 'Compare revenue across regions' }, depsFor(engine));

    assert.equal(answer.status, 'ok');
    if (answer.status !== 'ok') return;
    assert.equal(answer.resolution.source, 'fallback');
    assert.equal(answer.query.intent, 'region_totals');
    assert.equal(answer.result.rowCount, 2);
    assert.equal(answer.chart.kind, 'bar');
  });
});
