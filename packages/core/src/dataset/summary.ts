/**
 * Dataset overview: record count, date range, distinct dimension values and
 * total revenue.
 */

import type { AnalyticsEngine } from '../db/types.js';
import { SALES_TABLE } from './schema.js';

export interface DatasetSummary {
  totalRecords: number;
  firstDate: string | null;
  lastDate: string | null;
  totalRevenue: number;
  categories: string[];
  regions: string[];
  salesChannels: string[];
  customerSegments: string[];
}

const SUMMARY_TIMEOUT_MS = 5_000;

export async function summarizeDataset(engine: AnalyticsEngine): Promise<DatasetSummary> {
  const totals = await firstRow(
    engine,
    `SELECT COUNT(*), MIN(date), MAX(date), COALESCE(SUM(revenue), 0) FROM ${SALES_TABLE}`,
  );

  return {
    totalRecords: asNumber(totals[0]),
    firstDate: asText(totals[1]),
    lastDate: asText(totals[2]),
    totalRevenue: asNumber(totals[3]),
    categories: await distinct(engine, 'category'),
    regions: await distinct(engine, 'region'),
    salesChannels: await distinct(engine, 'sales_channel'),
    customerSegments: await distinct(engine, 'customer_segment'),
  };
}

async function firstRow(engine: AnalyticsEngine, sql: string): Promise<unknown[]> {
  const out = await engine.query(sql, { maxRows: 1, deadline: Date.now() + SUMMARY_TIMEOUT_MS });
  return out.rows[0] ?? [];
}

async function distinct(engine: AnalyticsEngine, column: string): Promise<string[]> {
  const out = await engine.query(
    `SELECT DISTINCT ${column} FROM ${SALES_TABLE} ORDER BY ${column}`,
    { maxRows: 1000, deadline: Date.now() + SUMMARY_TIMEOUT_MS },
  );
  return out.rows.map((row) => asText(row[0])).filter((v): v is string => v !== null);
}

function asNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  return 0;
}

function asText(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}
