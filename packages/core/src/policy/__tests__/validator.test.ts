/**
 * Safety validator tests.
 * Covers statement rules, the table allowlist, row ceilings and rewriting.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SafetyValidator } from '../validator.js';
import { SAFE_QUERY } from '../safe-query.js';
import type { RejectionCode, Verdict } from '../types.js';

const validator = new SafetyValidator();

function acceptedSql(verdict: Verdict): string {
  assert.equal(verdict.accepted, true, verdict.accepted ? '' : verdict.reason);
  return verdict.accepted ? verdict.query.sql : '';
}

function rejectionCode(verdict: Verdict): RejectionCode | null {
  return verdict.accepted ? null : verdict.code;
}

// ── Statement rules ──────────────────────────────────────────────────

describe('SafetyValidator statement rules', () => {
  it('rejects empty input', () => {
    assert.equal(rejectionCode(validator.validate('')), 'empty');
    assert.equal(rejectionCode(validator.validate('   \n ')), 'empty');
    assert.equal(rejectionCode(validator.validate(' ; ')), 'empty');
  });

  it('rejects unterminated literals as malformed', () => {
    assert.equal(rejectionCode(validator.validate("SELECT 'abc FROM sales")), 'malformed');
  });

  it('rejects more than one statement', () => {
    assert.equal(rejectionCode(validator.validate('SELECT 1; SELECT 2')), 'multiple_statements');
    assert.equal(
      rejectionCode(validator.validate('SELECT * FROM sales; DELETE FROM sales')),
      'multiple_statements',
    );
  });

  it('ignores separators inside literals and a single trailing semicolon', () => {
    assert.equal(
      acceptedSql(validator.validate("SELECT 'a;b' AS x FROM sales;")),
      "SELECT 'a;b' AS x FROM sales LIMIT 1000",
    );
    assert.equal(acceptedSql(validator.validate('SELECT 1; -- done')), 'SELECT 1 LIMIT 1000');
  });

  it('rejects the DROP injection with a disallowed keyword', () => {
    const verdict = validator.validate('DROP TABLE sales; --');
    assert.equal(rejectionCode(verdict), 'disallowed_keyword');
    assert.equal(
      verdict.accepted ? '' : verdict.reason,
      'DROP statements are not allowed. Only SELECT queries may run.',
    );
  });

  it('rejects data and schema modification', () => {
    for (const sql of [
      'DELETE FROM sales',
      "UPDATE sales SET units = 0",
      "INSERT INTO sales (units) VALUES (1)",
      'PRAGMA table_info(sales)',
      "ATTACH DATABASE 'x.db' AS x",
    ]) {
      assert.equal(rejectionCode(validator.validate(sql)), 'disallowed_keyword', sql);
    }
  });

  it('rejects statements that do not start with SELECT or WITH', () => {
    const verdict = validator.validate('EXPLAIN SELECT * FROM sales');
    assert.equal(rejectionCode(verdict), 'not_read_only');
  });

  it('rejects denylisted keywords anywhere in a SELECT', () => {
    const verdict = validator.validate('WITH x AS (DELETE FROM sales RETURNING *) SELECT * FROM x');
    assert.equal(rejectionCode(verdict), 'disallowed_keyword');
  });

  it('rejects recursive CTEs, which can run without bound', () => {
    const verdict = validator.validate(
      'WITH RECURSIVE c(x) AS (SELECT 1 UNION ALL SELECT x + 1 FROM c) SELECT COUNT(*) AS n FROM c',
    );
    assert.equal(rejectionCode(verdict), 'disallowed_keyword');
    assert.equal(
      verdict.accepted ? '' : verdict.reason,
      'Keyword RECURSIVE is not allowed in a read-only query.',
    );
  });

  it('does not treat keywords in literals, identifiers or comments as statements', () => {
    assert.equal(
      acceptedSql(validator.validate("SELECT 'DROP TABLE sales' AS note FROM sales")),
      "SELECT 'DROP TABLE sales' AS note FROM sales LIMIT 1000",
    );
    assert.equal(
      acceptedSql(validator.validate('SELECT "delete" FROM sales')),
      'SELECT "delete" FROM sales LIMIT 1000',
    );
    assert.equal(
      acceptedSql(validator.validate('SELECT * FROM sales -- DROP TABLE sales')),
      'SELECT * FROM sales LIMIT 1000',
    );
  });
});

// ── Table allowlist ──────────────────────────────────────────────────

describe('SafetyValidator table allowlist', () => {
  it('rejects unknown tables', () => {
    const verdict = validator.validate('SELECT * FROM users');
    assert.equal(rejectionCode(verdict), 'unknown_table');
    assert.equal(
      verdict.accepted ? '' : verdict.reason,
      'Table "users" is not available. Only "sales" can be queried.',
    );
  });

  it('rejects unknown tables in joins, lists and subqueries', () => {
    for (const sql of [
      'SELECT * FROM sales JOIN customers ON 1 = 1',
      'SELECT * FROM sales, other',
      'SELECT * FROM (SELECT * FROM users) AS u',
      'SELECT SUM(revenue) FROM sales WHERE region IN (SELECT region FROM regions)',
      'SELECT * FROM main.sales',
      'SELECT * FROM sqlite_master',
    ]) {
      assert.equal(rejectionCode(validator.validate(sql)), 'unknown_table', sql);
    }
  });

  it('accepts the dataset regardless of case', () => {
    assert.equal(acceptedSql(validator.validate('select * from SALES s')), 'select * from SALES s LIMIT 1000');
  });

  it('accepts CTE names declared by the statement', () => {
    const sql =
      'WITH monthly AS (SELECT month, SUM(revenue) AS total FROM sales GROUP BY month) ' +
      'SELECT * FROM monthly ORDER BY month';
    assert.equal(acceptedSql(validator.validate(sql)), `${sql} LIMIT 1000`);
  });

  it('accepts subqueries over the dataset', () => {
    const sql =
      'SELECT category, SUM(revenue) AS total_revenue FROM sales ' +
      'WHERE month = (SELECT MAX(month) FROM sales) GROUP BY category LIMIT 3';
    assert.equal(acceptedSql(validator.validate(sql)), sql);
  });

  it('checks subqueries in operator and keyword positions', () => {
    const cases = [
      'SELECT region, region GLOB (SELECT group_concat(sql) FROM sqlite_master) AS g FROM sales',
      "SELECT * FROM sales WHERE region LIKE 'x' ESCAPE (SELECT 'a' FROM secrets)",
      'SELECT * FROM sales WHERE region REGEXP (SELECT pattern FROM patterns)',
      'SELECT * FROM sales WHERE region MATCH (SELECT term FROM searches)',
      'SELECT * FROM sales WHERE NOT (SELECT COUNT(*) FROM users)',
      'SELECT DISTINCT (SELECT name FROM users) FROM sales',
      'SELECT COALESCE((SELECT name FROM users), region) FROM sales',
      'SELECT ABS((WITH t AS (SELECT 1 AS n FROM sales) SELECT n FROM other)) FROM sales',
    ];
    for (const sql of cases) {
      assert.equal(rejectionCode(validator.validate(sql)), 'unknown_table', sql);
    }
  });

  it('does not read FROM inside a function call as a table', () => {
    const sql = "SELECT SUBSTR(date, 1, 4) AS y, TRIM(LEADING '0' FROM month) AS m FROM sales";
    assert.equal(acceptedSql(validator.validate(sql)), `${sql} LIMIT 1000`);
  });
});

// ── Row ceiling ──────────────────────────────────────────────────────

describe('SafetyValidator row ceiling', () => {
  it('appends the default ceiling when LIMIT is missing', () => {
    const verdict = validator.validate('SELECT category, SUM(revenue) FROM sales GROUP BY category');
    assert.equal(verdict.accepted, true);
    if (verdict.accepted) {
      assert.equal(verdict.query.sql, 'SELECT category, SUM(revenue) FROM sales GROUP BY category LIMIT 1000');
      assert.equal(verdict.query.limit, 1000);
      assert.equal(verdict.limitApplied, true);
      assert.equal(verdict.clamped, false);
      assert.deepEqual(verdict.warnings, ['LIMIT 1000 appended (no LIMIT was present).']);
    }
  });

  it('keeps a LIMIT within the maximum', () => {
    const verdict = validator.validate('SELECT * FROM sales LIMIT 10');
    assert.equal(verdict.accepted, true);
    if (verdict.accepted) {
      assert.equal(verdict.query.sql, 'SELECT * FROM sales LIMIT 10');
      assert.equal(verdict.query.limit, 10);
      assert.deepEqual(verdict.warnings, []);
    }
  });

  it('clamps a LIMIT above the maximum', () => {
    const verdict = validator.validate('SELECT * FROM sales LIMIT 5000 OFFSET 2');
    assert.equal(verdict.accepted, true);
    if (verdict.accepted) {
      assert.equal(verdict.query.sql, 'SELECT * FROM sales LIMIT 1000 OFFSET 2');
      assert.equal(verdict.clamped, true);
      assert.deepEqual(verdict.warnings, ['LIMIT clamped from 5000 to 1000.']);
    }
  });

  it('clamps the count in LIMIT offset, count', () => {
    assert.equal(
      acceptedSql(validator.validate('SELECT * FROM sales LIMIT 10, 5000')),
      'SELECT * FROM sales LIMIT 10, 1000',
    );
  });

  it('only looks at the outermost LIMIT', () => {
    const sql = 'SELECT * FROM (SELECT * FROM sales LIMIT 5) AS s';
    assert.equal(acceptedSql(validator.validate(sql)), `${sql} LIMIT 1000`);
  });

  it('rejects a LIMIT that is not an integer literal', () => {
    assert.equal(rejectionCode(validator.validate('SELECT * FROM sales LIMIT (SELECT 5)')), 'unbounded_limit');
    assert.equal(rejectionCode(validator.validate('SELECT * FROM sales LIMIT -1')), 'unbounded_limit');
  });

  it('uses the configured default and maximum', () => {
    const strict = new SafetyValidator({ defaultLimit: 50, maxLimit: 100 });
    assert.equal(acceptedSql(strict.validate('SELECT * FROM sales')), 'SELECT * FROM sales LIMIT 50');
    assert.equal(acceptedSql(strict.validate('SELECT * FROM sales LIMIT 500')), 'SELECT * FROM sales LIMIT 100');
  });

  it('never accepts a ceiling above the maximum', () => {
    const bounded = new SafetyValidator({ defaultLimit: 5000, maxLimit: 200 });
    const candidates = [
      'SELECT * FROM sales',
      'SELECT * FROM sales LIMIT 199',
      'SELECT * FROM sales LIMIT 200',
      'SELECT * FROM sales LIMIT 201',
      'SELECT * FROM sales LIMIT 999999',
      'SELECT * FROM sales LIMIT 3, 100000',
      'WITH t AS (SELECT * FROM sales LIMIT 100000) SELECT * FROM t',
    ];
    for (const sql of candidates) {
      const verdict = bounded.validate(sql);
      assert.equal(verdict.accepted, true, sql);
      if (verdict.accepted) {
        assert.ok(verdict.query.limit <= 200, sql);
      }
    }
    assert.equal(bounded.getConfig().defaultLimit, 200);
  });
});

// ── Safe queries ─────────────────────────────────────────────────────

describe('SafetyValidator output', () => {
  it('mints frozen safe queries marked as validated', () => {
    const verdict = validator.validate('SELECT region FROM sales');
    assert.equal(verdict.accepted, true);
    if (verdict.accepted) {
      assert.equal(verdict.query.origin, 'validated');
      assert.equal(verdict.query[SAFE_QUERY], true);
      assert.equal(Object.isFrozen(verdict.query), true);
    }
  });

  it('is deterministic', () => {
    const sql = 'SELECT month, SUM(units) FROM sales GROUP BY month';
    assert.deepEqual(validator.validate(sql), validator.validate(sql));
  });
});
