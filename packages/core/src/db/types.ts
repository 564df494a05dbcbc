/**
 * Engine and result types for query execution.
 * The SQLite engine implements AnalyticsEngine; tests substitute stubs.
 */

export type ColumnType = 'integer' | 'real' | 'text' | 'date' | 'null';

export type CellValue = number | string | null;

export interface ResultColumn {
  name: string;
  type: ColumnType;
}

/** A bounded, typed query result */
export interface ResultSet {
  columns: ResultColumn[];
  rows: CellValue[][];
  /** Number of rows returned, always <= the ceiling */
  rowCount: number;
  /** Whether the engine had more rows than the ceiling */
  truncated: boolean;
  execMs: number;
}

export interface EngineColumn {
  name: string;
  /** Declared type of the source column, if the engine knows it */
  declaredType: string | null;
}

/** Raw rows as the engine produced them */
export interface EngineRows {
  columns: EngineColumn[];
  rows: unknown[][];
  truncated: boolean;
}

export interface EngineQueryOptions {
  /** Stop reading after this many rows */
  maxRows: number;
  /** Epoch milliseconds after which the engine must give up */
  deadline: number;
  signal?: AbortSignal;
}

/**
 * Read-only analytical engine holding the sales dataset.
 * Implementations must reject statements that are not queries.
 */
export interface AnalyticsEngine {
  readonly name: string;
  query(sql: string, options: EngineQueryOptions): Promise<EngineRows>;
  close(): void;
}
