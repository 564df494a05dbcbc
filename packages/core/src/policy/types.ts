/**
 * Safety policy types.
 *
 * The validator evaluates every candidate query against these settings
 * before anything reaches the engine.
 */

import type { SafeQuery } from './safe-query.js';

/** Why a candidate query was turned away */
export type RejectionCode =
  | 'empty'
  | 'malformed'
  | 'multiple_statements'
  | 'not_read_only'
  | 'disallowed_keyword'
  | 'unknown_table'
  | 'unbounded_limit';

export interface SafetyConfig {
  /** The only relation a query may read from */
  datasetTable: string;
  /** LIMIT appended when a query has none */
  defaultLimit: number;
  /** Largest LIMIT a query may keep; anything above is clamped */
  maxLimit: number;
}

export interface Accepted {
  accepted: true;
  query: SafeQuery;
  /** True when a LIMIT was appended */
  limitApplied: boolean;
  /** True when an existing LIMIT was lowered to maxLimit */
  clamped: boolean;
  warnings: string[];
}

export interface Rejected {
  accepted: false;
  code: RejectionCode;
  reason: string;
}

export type Verdict = Accepted | Rejected;

export function defaultSafetyConfig(): SafetyConfig {
  return {
    datasetTable: 'sales',
    defaultLimit: 1000,
    maxLimit: 1000,
  };
}
