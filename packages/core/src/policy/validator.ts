/**
 * Safety validator — token rules, an AST cross-check, and row-ceiling
 * rewriting for candidate queries.
 *
 * Rules run in a fixed order and the first failure wins. This is a policy
 * filter, not a parser: when in doubt it rejects.
 */

import { defaultSafetyConfig, type SafetyConfig, type Verdict, type RejectionCode } from './types.js';
import { isPunct, significant, tokenize, type Token } from './lexer.js';
import {
  checkDenylist,
  checkReadOnlyLeader,
  collectCteNames,
  collectRelations,
} from './rules.js';
import { inspectSql } from './parse.js';
import { ensureLimit } from './rewrite.js';
import { mintSafeQuery } from './safe-query.js';

export interface QueryValidator {
  /** Accept (and normalise) or reject a candidate query */
  validate(candidate: string): Verdict;

  /** Get the current safety config */
  getConfig(): SafetyConfig;
}

export class SafetyValidator implements QueryValidator {
  private readonly config: SafetyConfig;

  constructor(config?: Partial<SafetyConfig>) {
    this.config = { ...defaultSafetyConfig(), ...config };
    if (this.config.defaultLimit > this.config.maxLimit) {
      this.config.defaultLimit = this.config.maxLimit;
    }
  }

  validate(candidate: string): Verdict {
    if (!candidate.trim()) {
      return reject('empty', 'Empty SQL statement');
    }

    const lexed = tokenize(candidate);
    if (!lexed.ok) {
      return reject('malformed', lexed.error);
    }

    // Rule 1: a single statement; trailing semicolons are dropped
    const tokens = significant(lexed.tokens);
    while (tokens.length > 0 && isPunct(tokens[tokens.length - 1], ';')) {
      tokens.pop();
    }
    if (tokens.length === 0) {
      return reject('empty', 'Empty SQL statement');
    }
    if (tokens.some((t) => isPunct(t, ';'))) {
      return reject(
        'multiple_statements',
        'Multiple statements detected. Only a single statement is allowed.',
      );
    }

    // Rule 2: read-only leading keyword
    const leader = checkReadOnlyLeader(tokens);
    if (leader) return reject(leader.code, leader.reason);

    // Rule 3: denylisted keywords anywhere outside literals
    const denied = checkDenylist(tokens);
    if (denied) return reject(denied.code, denied.reason);

    // AST cross-check, when the parser understands the statement
    const statement = statementText(candidate, tokens);
    const ast = inspectSql(statement);
    if (ast && ast.statementCount > 1) {
      return reject(
        'multiple_statements',
        'Multiple statements detected. Only a single statement is allowed.',
      );
    }
    if (ast && ast.kind !== 'select') {
      return reject('not_read_only', `Statement type "${ast.kind}" is not a read-only query.`);
    }

    // Rule 4: the dataset table (and the statement's own CTEs) only
    const allowed = collectCteNames(tokens);
    allowed.add(this.config.datasetTable.toLowerCase());
    const relations = [
      ...collectRelations(tokens),
      ...(ast?.tables ?? []).map((t) => (t.db ? `${t.db}.${t.table}` : t.table).toLowerCase()),
    ];
    const unknown = relations.find((name) => !allowed.has(name));
    if (unknown !== undefined) {
      return reject(
        'unknown_table',
        `Table "${unknown}" is not available. Only "${this.config.datasetTable}" can be queried.`,
      );
    }

    // Rule 5: row ceiling
    const ceiling = ensureLimit(candidate, tokens, this.config.defaultLimit, this.config.maxLimit);
    if (!ceiling.ok) {
      return reject('unbounded_limit', ceiling.reason);
    }

    const warnings: string[] = [];
    if (ceiling.limitApplied && !ceiling.clamped) {
      warnings.push(`LIMIT ${ceiling.limit} appended (no LIMIT was present).`);
    }
    if (ceiling.clamped) {
      warnings.push(`LIMIT clamped from ${ceiling.originalLimit} to ${ceiling.limit}.`);
    }

    return {
      accepted: true,
      query: mintSafeQuery({ sql: ceiling.rewrittenSql, limit: ceiling.limit, origin: 'validated' }),
      limitApplied: ceiling.limitApplied,
      clamped: ceiling.clamped,
      warnings,
    };
  }

  getConfig(): SafetyConfig {
    return { ...this.config };
  }
}

function reject(code: RejectionCode, reason: string): Verdict {
  return { accepted: false, code, reason };
}

function statementText(sql: string, tokens: Token[]): string {
  return sql.slice(tokens[0].start, tokens[tokens.length - 1].end);
}
