/**
 * Row-ceiling rewriter.
 *
 * Handles:
 * - Appending LIMIT when the statement has none at the top level
 * - Clamping a top-level LIMIT above the maximum
 *
 * Edits are spliced into the original text by token offsets so the rest of
 * the query keeps its formatting.
 */

import { isPunct, isWord, type Token } from './lexer.js';

export type CeilingOutcome =
  | {
      ok: true;
      rewrittenSql: string;
      /** Effective row ceiling of the rewritten SQL */
      limit: number;
      limitApplied: boolean;
      originalLimit: number | null;
      clamped: boolean;
    }
  | { ok: false; reason: string };

const INTEGER = /^\d+$/;

/**
 * Ensure the statement carries a LIMIT no greater than maxLimit.
 *
 * @param sql     Statement text; token offsets refer to it
 * @param tokens  Significant tokens of the statement, without a trailing `;`
 */
export function ensureLimit(
  sql: string,
  tokens: Token[],
  defaultLimit: number,
  maxLimit: number,
): CeilingOutcome {
  if (tokens.length === 0) {
    return { ok: false, reason: 'Empty SQL statement' };
  }
  const body = sql.slice(tokens[0].start, tokens[tokens.length - 1].end);
  const offset = tokens[0].start;

  let limitIdx = -1;
  tokens.forEach((t, i) => {
    if (t.depth === 0 && isWord(t, 'LIMIT')) limitIdx = i;
  });

  if (limitIdx === -1) {
    const limit = Math.min(defaultLimit, maxLimit);
    return {
      ok: true,
      rewrittenSql: `${body} LIMIT ${limit}`,
      limit,
      limitApplied: true,
      originalLimit: null,
      clamped: false,
    };
  }

  let countTok = tokens[limitIdx + 1];
  // SQLite also accepts LIMIT <offset>, <count>
  if (isPunct(tokens[limitIdx + 2], ',')) {
    countTok = tokens[limitIdx + 3];
  }
  if (!countTok || countTok.type !== 'number' || !INTEGER.test(countTok.text)) {
    return { ok: false, reason: 'LIMIT must be a non-negative integer literal.' };
  }

  const existing = Number(countTok.text);
  if (existing <= maxLimit) {
    return {
      ok: true,
      rewrittenSql: body,
      limit: existing,
      limitApplied: false,
      originalLimit: existing,
      clamped: false,
    };
  }

  const start = countTok.start - offset;
  const end = countTok.end - offset;
  return {
    ok: true,
    rewrittenSql: `${body.slice(0, start)}${maxLimit}${body.slice(end)}`,
    limit: maxLimit,
    limitApplied: true,
    originalLimit: existing,
    clamped: true,
  };
}
