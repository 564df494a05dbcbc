import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { significant, tokenize, type Token } from '../lexer.js';

function lex(sql: string): Token[] {
  const out = tokenize(sql);
  assert.equal(out.ok, true);
  return out.ok ? out.tokens : [];
}

describe('tokenize', () => {
  it('splits words, numbers and punctuation with offsets', () => {
    const tokens = lex('select a, 10 from sales');
    assert.deepEqual(
      tokens.map((t) => [t.type, t.value]),
      [
        ['word', 'SELECT'],
        ['word', 'A'],
        ['punct', ','],
        ['number', '10'],
        ['word', 'FROM'],
        ['word', 'SALES'],
      ],
    );
    assert.equal(tokens[5].start, 18);
    assert.equal(tokens[5].end, 23);
    assert.equal(tokens[5].text, 'sales');
  });

  it('keeps keywords inside string literals out of word tokens', () => {
    const tokens = lex("SELECT 'it''s DROP' AS note");
    assert.equal(tokens[1].type, 'string');
    assert.equal(tokens[1].value, "it's DROP");
    assert.equal(tokens.filter((t) => t.type === 'word').length, 3);
  });

  it('reads double-quoted, backtick and bracket identifiers', () => {
    const tokens = lex('SELECT "de""lete", `x`, [y z]');
    const idents = tokens.filter((t) => t.type === 'ident').map((t) => t.value);
    assert.deepEqual(idents, ['de"lete', 'x', 'y z']);
  });

  it('marks line and block comments', () => {
    const tokens = lex('SELECT 1 -- DROP\n/* DELETE */ ');
    assert.deepEqual(
      tokens.map((t) => t.type),
      ['word', 'number', 'comment', 'comment'],
    );
    assert.equal(significant(tokens).length, 2);
  });

  it('tracks parenthesis depth', () => {
    const tokens = lex('SELECT SUM(x) FROM (SELECT 1)');
    const depths = tokens.map((t) => `${t.text}:${t.depth}`);
    assert.deepEqual(depths, [
      'SELECT:0',
      'SUM:0',
      '(:0',
      'x:1',
      '):0',
      'FROM:0',
      '(:0',
      'SELECT:1',
      '1:1',
      '):0',
    ]);
  });

  it('fails on unterminated literals and comments', () => {
    assert.deepEqual(tokenize("SELECT 'abc"), { ok: false, error: 'Unterminated string literal' });
    assert.deepEqual(tokenize('SELECT "abc'), { ok: false, error: 'Unterminated quoted identifier' });
    assert.deepEqual(tokenize('SELECT 1 /* open'), { ok: false, error: 'Unterminated block comment' });
  });
});
