/**
 * Executor: runs a SafeQuery against the analytical engine with a row
 * ceiling and a time bound, and turns the raw rows into a typed ResultSet.
 */

import { ExecutionError, TimeoutError, errorMessage, type ExecutionErrorKind } from '../errors.js';
import type { Logger } from '../logger.js';
import type { SafeQuery } from '../policy/safe-query.js';
import { withTimeout } from '../util/timeout.js';
import type {
  AnalyticsEngine,
  CellValue,
  ColumnType,
  EngineColumn,
  ResultColumn,
  ResultSet,
} from './types.js';

export interface ExecutorLimits {
  /** Hard cap on returned rows regardless of the query's LIMIT */
  maxRows: number;
  /** Execution timeout in milliseconds */
  timeoutMs: number;
}

export type ExecuteOutcome =
  | { ok: true; result: ResultSet }
  | { ok: false; error: ExecutionError };

const ISO_DATE = /^\d{4}-\d{2}(-\d{2})?$/;

export class Executor {
  private readonly engine: AnalyticsEngine;
  private readonly limits: ExecutorLimits;
  private readonly logger?: Logger;

  constructor(engine: AnalyticsEngine, limits: ExecutorLimits, logger?: Logger) {
    this.engine = engine;
    this.limits = limits;
    this.logger = logger;
  }

  /** Run once; failures come back as values, never retried here */
  async execute(query: SafeQuery): Promise<ExecuteOutcome> {
    const maxRows = Math.min(this.limits.maxRows, query.limit);
    const start = performance.now();

    try {
      const raw = await withTimeout('Query', this.limits.timeoutMs, (signal) =>
        this.engine.query(query.sql, {
          maxRows,
          deadline: Date.now() + this.limits.timeoutMs,
          signal,
        }),
      );
      const execMs = Math.round(performance.now() - start);

      const rows = raw.rows.slice(0, maxRows).map((row) => row.map(toCell));
      const truncated = raw.truncated || raw.rows.length > maxRows;
      const result: ResultSet = {
        columns: inferColumns(raw.columns, rows),
        rows,
        rowCount: rows.length,
        truncated,
        execMs,
      };

      this.logger?.debug('query executed', {
        origin: query.origin,
        intent: query.intent,
        rowCount: result.rowCount,
        truncated,
        execMs,
      });
      return { ok: true, result };
    } catch (err: unknown) {
      const error = classifyError(err);
      this.logger?.warn('query execution failed', { kind: error.kind, origin: query.origin });
      return { ok: false, error };
    }
  }
}

/**
 * Map an engine failure onto an ExecutionError kind by its message.
 */
export function classifyError(err: unknown): ExecutionError {
  if (err instanceof ExecutionError) return err;
  if (err instanceof TimeoutError) {
    return new ExecutionError('timeout', err.message, { cause: err });
  }

  const message = errorMessage(err);
  const lower = message.toLowerCase();
  let kind: ExecutionErrorKind = 'engine';
  if (/no such (column|table|function)|ambiguous column/.test(lower)) {
    kind = 'unknown_identifier';
  } else if (lower.includes('syntax error') || lower.includes('incomplete input')) {
    kind = 'syntax';
  } else if (lower.includes('datatype mismatch') || lower.includes('type mismatch')) {
    kind = 'type_mismatch';
  } else if (lower.includes('interrupt') || lower.includes('timed out')) {
    kind = 'timeout';
  }
  return new ExecutionError(kind, message, { cause: err });
}

function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number' || typeof value === 'string') return value;
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value instanceof Uint8Array) return Buffer.from(value).toString('base64');
  if (value instanceof Date) return value.toISOString();
  return JSON.stringify(value);
}

export function inferColumns(columns: EngineColumn[], rows: CellValue[][]): ResultColumn[] {
  return columns.map((column, i) => ({
    name: column.name,
    type: fromDeclared(column.declaredType) ?? fromValues(rows.map((row) => row[i] ?? null)),
  }));
}

/** SQLite type affinity rules, with DATE/TIME kept apart from numeric */
function fromDeclared(declared: string | null): ColumnType | null {
  if (!declared) return null;
  const t = declared.toUpperCase();
  if (t.includes('INT')) return 'integer';
  if (t.includes('CHAR') || t.includes('CLOB') || t.includes('TEXT')) return 'text';
  if (t.includes('REAL') || t.includes('FLOA') || t.includes('DOUB')) return 'real';
  if (t.includes('DATE') || t.includes('TIME')) return 'date';
  return null;
}

function fromValues(values: CellValue[]): ColumnType {
  const present = values.filter((v) => v !== null);
  if (present.length === 0) return 'null';
  if (present.every((v) => typeof v === 'number')) {
    return present.every((v) => Number.isInteger(v)) ? 'integer' : 'real';
  }
  if (present.every((v) => typeof v === 'string')) {
    return present.every((v) => ISO_DATE.test(String(v))) ? 'date' : 'text';
  }
  return 'text';
}
