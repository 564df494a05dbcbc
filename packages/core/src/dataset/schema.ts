/**
 * The sales dataset schema, shared by the engine, the validator and the
 * translator prompt.
 */

export const SALES_TABLE = 'sales';

export type SalesColumnType = 'DATE' | 'TEXT' | 'INTEGER';

export interface SalesColumn {
  name: string;
  type: SalesColumnType;
  description: string;
}

export const SALES_COLUMNS: readonly SalesColumn[] = [
  { name: 'date', type: 'DATE', description: "sale date, 'YYYY-MM-DD'" },
  { name: 'month', type: 'TEXT', description: "sale month, 'YYYY-MM' (use this for period aggregation)" },
  { name: 'category', type: 'TEXT', description: 'product category' },
  { name: 'units', type: 'INTEGER', description: 'units sold' },
  { name: 'unit_price', type: 'INTEGER', description: 'price per unit' },
  { name: 'region', type: 'TEXT', description: 'sales region' },
  { name: 'sales_channel', type: 'TEXT', description: 'sales channel (e.g. Online, Store)' },
  { name: 'customer_segment', type: 'TEXT', description: 'customer segment' },
  { name: 'revenue', type: 'INTEGER', description: 'units * unit_price' },
];

export interface SalesRow {
  date: string;
  month: string;
  category: string;
  units: number;
  unit_price: number;
  region: string;
  sales_channel: string;
  customer_segment: string;
  revenue: number;
}

/** Columns a source file must provide; month and revenue are derived */
export const SOURCE_COLUMNS = [
  'date',
  'category',
  'units',
  'unit_price',
  'region',
  'sales_channel',
  'customer_segment',
] as const;

/**
 * Text description of the dataset for the translator prompt.
 */
export function describeSchema(): string {
  const lines = [`TABLE ${SALES_TABLE}`];
  for (const col of SALES_COLUMNS) {
    lines.push(`  ${col.name} ${col.type} -- ${col.description}`);
  }
  return lines.join('\n');
}

export function createTableSql(): string {
  const cols = SALES_COLUMNS.map((c) => `${c.name} ${c.type} NOT NULL`).join(', ');
  return `CREATE TABLE ${SALES_TABLE} (${cols})`;
}
