/**
 * Token-based validation rules for the safety validator.
 *
 * Each rule looks at the significant tokens (comments removed) of one
 * statement and returns a violation or null. Matching is on whole tokens, so
 * a keyword inside a string literal or a quoted identifier never counts.
 */

import { isPunct, isWord, type Token } from './lexer.js';
import type { RejectionCode } from './types.js';

export interface RuleViolation {
  code: RejectionCode;
  reason: string;
}

const READ_ONLY_LEADERS = new Set(['SELECT', 'WITH']);

/** Keywords grouped by what they would let a query do */
export const DENYLIST: Readonly<Record<string, readonly string[]>> = {
  dataModification: ['INSERT', 'UPDATE', 'DELETE', 'MERGE', 'UPSERT', 'REPLACE', 'TRUNCATE'],
  schemaModification: ['CREATE', 'DROP', 'ALTER', 'RENAME', 'REINDEX', 'VACUUM', 'ANALYZE'],
  privilege: ['GRANT', 'REVOKE'],
  attachment: ['ATTACH', 'DETACH', 'COPY', 'IMPORT', 'EXPORT', 'LOAD', 'INSTALL'],
  procedural: [
    'PRAGMA',
    'EXEC',
    'EXECUTE',
    'CALL',
    'DO',
    'SET',
    'BEGIN',
    'COMMIT',
    'ROLLBACK',
    'SAVEPOINT',
    'TRANSACTION',
    'LOCK',
  ],
  recursion: ['RECURSIVE'],
};

const DENIED = new Set(Object.values(DENYLIST).flat());

/** Words that end a relation and cannot be a table alias */
const CLAUSE_WORDS = new Set([
  'WHERE',
  'GROUP',
  'ORDER',
  'LIMIT',
  'OFFSET',
  'HAVING',
  'WINDOW',
  'JOIN',
  'INNER',
  'LEFT',
  'RIGHT',
  'FULL',
  'CROSS',
  'OUTER',
  'NATURAL',
  'ON',
  'USING',
  'UNION',
  'EXCEPT',
  'INTERSECT',
]);

/**
 * Words after which an opening paren starts a subquery or a list rather than
 * a function's argument list.
 */
const NON_FUNCTION_WORDS = new Set([
  'SELECT',
  'FROM',
  'JOIN',
  'WHERE',
  'AND',
  'OR',
  'NOT',
  'IN',
  'EXISTS',
  'AS',
  'ON',
  'ANY',
  'ALL',
  'SOME',
  'UNION',
  'EXCEPT',
  'INTERSECT',
  'WITH',
  'MATERIALIZED',
  'THEN',
  'ELSE',
  'WHEN',
  'CASE',
  'HAVING',
  'BY',
  'LIMIT',
  'OFFSET',
  'IS',
  'LIKE',
  'BETWEEN',
]);

export function checkReadOnlyLeader(tokens: Token[]): RuleViolation | null {
  const first = tokens[0];
  if (isWord(first) && READ_ONLY_LEADERS.has(first.value)) {
    return null;
  }
  if (isWord(first) && DENIED.has(first.value)) {
    return {
      code: 'disallowed_keyword',
      reason: `${first.value} statements are not allowed. Only SELECT queries may run.`,
    };
  }
  return {
    code: 'not_read_only',
    reason: 'Statement must start with SELECT or WITH.',
  };
}

export function checkDenylist(tokens: Token[]): RuleViolation | null {
  const hit = tokens.find((t) => t.type === 'word' && DENIED.has(t.value));
  if (!hit) return null;
  return {
    code: 'disallowed_keyword',
    reason: `Keyword ${hit.value} is not allowed in a read-only query.`,
  };
}

/**
 * Names declared as common table expressions: `name AS (` or
 * `name (col, ...) AS (`.
 */
export function collectCteNames(tokens: Token[]): Set<string> {
  const names = new Set<string>();
  for (let i = 1; i < tokens.length - 1; i++) {
    if (!isWord(tokens[i], 'AS')) continue;
    let next = i + 1;
    if (isWord(tokens[next], 'MATERIALIZED')) next++;
    else if (isWord(tokens[next], 'NOT') && isWord(tokens[next + 1], 'MATERIALIZED')) next += 2;
    if (!isPunct(tokens[next], '(')) continue;

    let nameIdx = i - 1;
    if (isPunct(tokens[nameIdx], ')')) {
      nameIdx = matchingOpen(tokens, nameIdx) - 1;
    }
    const name = tokens[nameIdx];
    if (name && (name.type === 'word' || name.type === 'ident')) {
      names.add(relationName(name));
    }
  }
  return names;
}

/**
 * Relations read by the statement: whatever follows FROM or JOIN, plus the
 * rest of a comma-separated FROM list. A FROM inside a function call, as in
 * EXTRACT(MONTH FROM date), is skipped.
 */
export function collectRelations(tokens: Token[]): string[] {
  const inFunction = functionContext(tokens);
  const relations: string[] = [];

  for (let i = 0; i < tokens.length; i++) {
    const t = tokens[i];
    if (!isWord(t, 'FROM', 'JOIN')) continue;
    if (inFunction[i]) continue;

    let j = i + 1;
    for (;;) {
      const head = tokens[j];
      if (!head || isPunct(head, '(')) break;
      if (head.type !== 'word' && head.type !== 'ident') {
        relations.push(head.text);
        break;
      }

      let name = relationName(head);
      j++;
      while (isPunct(tokens[j], '.') && tokens[j + 1]) {
        name = `${name}.${relationName(tokens[j + 1])}`;
        j += 2;
      }
      if (isPunct(tokens[j], '(')) {
        // Table-valued function, e.g. read_csv('...')
        relations.push(`${name}()`);
        break;
      }
      relations.push(name);

      j = skipAlias(tokens, j);
      if (t.value === 'FROM' && isPunct(tokens[j], ',')) {
        j++;
        continue;
      }
      break;
    }
  }

  return relations;
}

function skipAlias(tokens: Token[], j: number): number {
  if (isWord(tokens[j], 'AS')) return j + 2;
  const candidate = tokens[j];
  if (candidate?.type === 'ident') return j + 1;
  if (candidate?.type === 'word' && !CLAUSE_WORDS.has(candidate.value)) return j + 1;
  return j;
}

/**
 * For each token, whether its innermost enclosing paren belongs to a
 * function call. A paren that opens a subquery never does.
 */
function functionContext(tokens: Token[]): boolean[] {
  const stack: boolean[] = [];
  return tokens.map((t, i) => {
    if (isPunct(t, ')')) {
      stack.pop();
      return stack[stack.length - 1] ?? false;
    }
    const inside = stack[stack.length - 1] ?? false;
    if (isPunct(t, '(')) {
      const prev = tokens[i - 1];
      // A parenthesised SELECT is a subquery whatever precedes it (GLOB, ESCAPE, ...)
      const subquery = isWord(tokens[i + 1], 'SELECT', 'WITH');
      stack.push(
        !subquery && prev !== undefined && prev.type === 'word' && !NON_FUNCTION_WORDS.has(prev.value),
      );
    }
    return inside;
  });
}

function matchingOpen(tokens: Token[], closeIdx: number): number {
  const depth = tokens[closeIdx].depth;
  for (let k = closeIdx - 1; k >= 0; k--) {
    if (isPunct(tokens[k], '(') && tokens[k].depth === depth) return k;
  }
  return 0;
}

function relationName(token: Token): string {
  return token.type === 'word' ? token.text.toLowerCase() : token.value.toLowerCase();
}
