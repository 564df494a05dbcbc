/**
 * SafeQuery — SQL that passed the safety policy or came from the vetted
 * fallback catalog. The brand symbol is not re-exported from the package
 * barrel, so code outside the validator and the catalog cannot forge one.
 */

export const SAFE_QUERY = Symbol('SafeQuery');

export type QueryOrigin = 'validated' | 'catalog';

export interface SafeQuery {
  readonly sql: string;
  /** Row ceiling embedded in the SQL */
  readonly limit: number;
  readonly origin: QueryOrigin;
  /** Catalog intent key, for catalog queries */
  readonly intent?: string;
  readonly [SAFE_QUERY]: true;
}

export interface MintInput {
  sql: string;
  limit: number;
  origin: QueryOrigin;
  intent?: string;
}

export function mintSafeQuery(input: MintInput): SafeQuery {
  return Object.freeze({ ...input, [SAFE_QUERY]: true as const });
}
