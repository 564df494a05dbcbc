/**
 * AST cross-check for the safety validator.
 * Uses node-sql-parser with the SQLite dialect.
 *
 * The lexer-based rules are the primary decision-maker; this module only adds
 * rejections. A statement the parser cannot handle is not rejected here.
 */

import pkg from 'node-sql-parser';
const { Parser } = pkg;

const parser = new Parser();
const SQLITE_OPT = { database: 'sqlite' } as const;

export interface TableRef {
  /** Schema or database qualifier, if any */
  db: string | null;
  table: string;
}

export interface AstSummary {
  /** Number of statements found */
  statementCount: number;
  /** Statement type of the first statement, lowercased */
  kind: string;
  /** Relations read by the statement */
  tables: TableRef[];
}

/**
 * Parse a single statement and summarise what it reads.
 * Returns null when the parser does not understand the SQL.
 */
export function inspectSql(sql: string): AstSummary | null {
  let statementCount: number;
  let kind: string;
  try {
    const astResult = parser.astify(sql, SQLITE_OPT);
    const statements = Array.isArray(astResult) ? astResult : [astResult];
    if (statements.length === 0) return null;
    statementCount = statements.length;
    kind = String(statements[0].type).toLowerCase();
  } catch {
    // The dialect grammar is narrower than SQLite itself.
    return null;
  }

  let entries: string[];
  try {
    entries = parser.tableList(sql, SQLITE_OPT);
  } catch {
    return { statementCount, kind, tables: [] };
  }

  return { statementCount, kind, tables: entries.map(parseTableEntry) };
}

/** node-sql-parser reports tables as "<action>::<db>::<table>" */
function parseTableEntry(entry: string): TableRef {
  const [, db = 'null', table = ''] = entry.split('::');
  return { db: db === 'null' ? null : db, table };
}
