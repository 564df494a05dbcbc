/**
 * SQLite engine holding the sales dataset in memory.
 * Uses better-sqlite3; the database is created once per process and only
 * ever read after loading.
 *
 * better-sqlite3 blocks the thread it runs on, so statements run in a worker
 * holding a serialized copy of the database. The worker is terminated when
 * the deadline passes or the signal fires.
 */

import Database from 'better-sqlite3';
import { readFileSync } from 'node:fs';
import { Worker } from 'node:worker_threads';
import { DatasetError, ExecutionError, errorMessage } from '../../errors.js';
import { loadSalesRows } from '../../dataset/csv.js';
import { SALES_COLUMNS, SALES_TABLE, createTableSql, type SalesRow } from '../../dataset/schema.js';
import type { AnalyticsEngine, EngineQueryOptions, EngineRows } from '../types.js';

export interface SalesEngineOptions {
  /** Path to a sales CSV file */
  csvPath?: string;
  /** Rows to load directly, used instead of csvPath */
  rows?: SalesRow[];
}

const WORKER_URL = new URL('./sqlite-worker.cjs', import.meta.url);

type WorkerReply = { ok: true; rows: unknown[][]; truncated: boolean } | { ok: false; message: string };

export class SqliteEngine implements AnalyticsEngine {
  readonly name = 'sqlite';
  private readonly db: Database.Database;
  private readonly workers = new Set<Worker>();
  private image: Buffer | null = null;

  constructor(db: Database.Database) {
    this.db = db;
  }

  async query(sql: string, options: EngineQueryOptions): Promise<EngineRows> {
    // Compiling reports syntax errors and unknown identifiers without running anything
    const stmt = this.db.prepare(sql);
    if (!stmt.reader) {
      throw new ExecutionError('engine', 'Statement does not return rows');
    }

    const columns = stmt.columns().map((column) => ({
      name: column.name,
      declaredType: column.type,
    }));

    const { rows, truncated } = await this.runInWorker(sql, options);
    return { columns, rows, truncated };
  }

  private runInWorker(sql: string, options: EngineQueryOptions): Promise<{ rows: unknown[][]; truncated: boolean }> {
    if (options.signal?.aborted || Date.now() >= options.deadline) {
      return Promise.reject(new ExecutionError('timeout', 'Query passed its deadline before it started'));
    }

    this.image ??= this.db.serialize();
    const worker = new Worker(WORKER_URL, {
      workerData: { image: this.image, sql, maxRows: options.maxRows },
    });
    this.workers.add(worker);

    return new Promise((resolve, reject) => {
      let settled = false;
      const settle = (action: () => void): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        options.signal?.removeEventListener('abort', stop);
        this.workers.delete(worker);
        action();
      };

      const stop = (): void => {
        settle(() => {
          void worker.terminate();
          reject(new ExecutionError('timeout', 'Query passed its deadline and was stopped'));
        });
      };
      const timer = setTimeout(stop, options.deadline - Date.now());
      options.signal?.addEventListener('abort', stop, { once: true });

      worker.once('message', (message: unknown) => {
        settle(() => {
          if (!isWorkerReply(message)) {
            reject(new ExecutionError('engine', 'Unexpected reply from the query worker'));
          } else if (message.ok) {
            resolve({ rows: message.rows, truncated: message.truncated });
          } else {
            // Plain Error so classifyError can read the engine's message
            reject(new Error(message.message));
          }
        });
      });
      worker.once('error', (err: Error) => settle(() => reject(err)));
      worker.once('exit', (code: number) => {
        settle(() => reject(new ExecutionError('engine', `Query worker exited with code ${code}`)));
      });
    });
  }

  /** Number of rows in the sales table */
  countRows(): number {
    const row: unknown = this.db.prepare(`SELECT COUNT(*) FROM ${SALES_TABLE}`).pluck().get();
    return typeof row === 'number' ? row : 0;
  }

  close(): void {
    for (const worker of this.workers) {
      void worker.terminate();
    }
    this.workers.clear();
    if (this.db.open) this.db.close();
  }
}

/**
 * Create the in-memory sales database and load it from a CSV file or rows.
 */
export function openSalesEngine(options: SalesEngineOptions): SqliteEngine {
  const rows = options.rows ?? readSalesCsv(options.csvPath);

  const db = new Database(':memory:');
  try {
    db.exec(createTableSql());
    const names = SALES_COLUMNS.map((c) => c.name);
    const insert = db.prepare(
      `INSERT INTO ${SALES_TABLE} (${names.join(', ')}) VALUES (${names.map((n) => `@${n}`).join(', ')})`,
    );
    const insertAll = db.transaction((batch: SalesRow[]) => {
      for (const row of batch) insert.run(row);
    });
    insertAll(rows);
  } catch (err: unknown) {
    db.close();
    throw new DatasetError(`Failed to load sales data: ${errorMessage(err)}`, { cause: err });
  }

  return new SqliteEngine(db);
}

function isWorkerReply(value: unknown): value is WorkerReply {
  if (typeof value !== 'object' || value === null || !('ok' in value)) return false;
  if (value.ok === false) {
    return 'message' in value && typeof value.message === 'string';
  }
  return (
    value.ok === true &&
    'rows' in value &&
    Array.isArray(value.rows) &&
    value.rows.every((row) => Array.isArray(row)) &&
    'truncated' in value &&
    typeof value.truncated === 'boolean'
  );
}

function readSalesCsv(csvPath: string | undefined): SalesRow[] {
  if (!csvPath?.trim()) {
    throw new DatasetError('Sales data path is required.');
  }
  let text: string;
  try {
    text = readFileSync(csvPath, 'utf8');
  } catch (err: unknown) {
    throw new DatasetError(`Cannot read sales data at ${csvPath}: ${errorMessage(err)}`, { cause: err });
  }
  return loadSalesRows(text);
}
