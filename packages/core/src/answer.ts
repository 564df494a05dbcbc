/**
 * High-level "answer" orchestration.
 * Ties together query resolution, bounded execution, one fallback retry,
 * chart selection and insight text.
 */

import { selectChart } from './chart/select.js';
import type { Chart, ChartOptions } from './chart/types.js';
import type { Executor } from './db/execute.js';
import type { ResultSet } from './db/types.js';
import type { ExecutionErrorKind } from './errors.js';
import type { FallbackCatalog } from './fallback/catalog.js';
import { describeResult } from './insight.js';
import type { Logger } from './logger.js';
import type { SafeQuery } from './policy/safe-query.js';
import type { AskRequest, QueryResolver, Resolution } from './resolver.js';

export interface AnswerDeps {
  resolver: QueryResolver;
  executor: Executor;
  catalog: FallbackCatalog;
  chartOptions?: ChartOptions;
  logger?: Logger;
}

/** The only message an end user sees when execution fails */
export const EXECUTION_FAILED_MESSAGE =
  'Sorry, the data could not be retrieved for this question. Please try rephrasing it.';

export type AnswerResult =
  | {
      status: 'ok';
      resolution: Resolution;
      /** The query that produced the result */
      query: SafeQuery;
      result: ResultSet;
      chart: Chart;
      insight: string[];
      /** Whether the default fallback query ran after the first query failed */
      retried: boolean;
    }
  | {
      status: 'error';
      resolution: Resolution;
      error: { code: 'EXECUTION_FAILED'; message: string };
      /** Execution failure kinds, in order; for logs and diagnostics */
      attempts: ExecutionErrorKind[];
    };

export async function answerQuestion(request: AskRequest, deps: AnswerDeps): Promise<AnswerResult> {
  const { resolver, executor, catalog, logger } = deps;

  // 1. Resolve to a safe query; never rejects
  const resolution = await resolver.resolve(request);

  // 2. Execute
  let query = resolution.query;
  let outcome = await executor.execute(query);
  let retried = false;
  const attempts: ExecutionErrorKind[] = [];

  // 3. One retry with the default fallback query
  if (!outcome.ok) {
    attempts.push(outcome.error.kind);
    logger?.warn('execution failed, retrying with default query', {
      kind: outcome.error.kind,
      source: resolution.source,
      intent: resolution.intent,
    });
    retried = true;
    query = catalog.defaultEntry();
    outcome = await executor.execute(query);
  }

  if (!outcome.ok) {
    attempts.push(outcome.error.kind);
    logger?.error('default query failed, giving up', { attempts });
    return {
      status: 'error',
      resolution,
      error: { code: 'EXECUTION_FAILED', message: EXECUTION_FAILED_MESSAGE },
      attempts,
    };
  }

  // 4. Chart and insight
  const { chart } = selectChart(outcome.result, deps.chartOptions);
  return {
    status: 'ok',
    resolution,
    query,
    result: outcome.result,
    chart,
    insight: describeResult(outcome.result, chart),
    retried,
  };
}
