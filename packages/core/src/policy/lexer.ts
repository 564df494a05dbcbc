/**
 * Minimal SQL lexer for the safety validator.
 *
 * Not a grammar: it only knows enough to tell words apart from string
 * literals, quoted identifiers and comments, and to track parenthesis depth.
 * Every rule in the validator works on these tokens, never on raw text.
 */

export type TokenType = 'word' | 'number' | 'string' | 'ident' | 'punct' | 'comment';

export interface Token {
  type: TokenType;
  /** Raw source text of the token */
  text: string;
  /** Uppercased word, unquoted identifier, or the raw text for other types */
  value: string;
  start: number;
  end: number;
  /** Parenthesis depth at the token (an opening paren sits at the outer depth) */
  depth: number;
}

export type LexOutcome = { ok: true; tokens: Token[] } | { ok: false; error: string };

const WORD_START = /[A-Za-z_]/;
const WORD_PART = /[A-Za-z0-9_$]/;
const DIGIT = /[0-9]/;

const CLOSING_QUOTE: Record<string, string> = { '"': '"', '`': '`', '[': ']' };

export function tokenize(sql: string): LexOutcome {
  const tokens: Token[] = [];
  let depth = 0;
  let i = 0;

  const push = (type: TokenType, start: number, end: number, value?: string): void => {
    const text = sql.slice(start, end);
    tokens.push({ type, text, value: value ?? text, start, end, depth });
  };

  while (i < sql.length) {
    const c = sql[i];

    if (/\s/.test(c)) {
      i++;
      continue;
    }

    // -- line comment
    if (c === '-' && sql[i + 1] === '-') {
      const newline = sql.indexOf('\n', i);
      const end = newline === -1 ? sql.length : newline;
      push('comment', i, end);
      i = end;
      continue;
    }

    /* block comment */
    if (c === '/' && sql[i + 1] === '*') {
      const close = sql.indexOf('*/', i + 2);
      if (close === -1) {
        return { ok: false, error: 'Unterminated block comment' };
      }
      push('comment', i, close + 2);
      i = close + 2;
      continue;
    }

    if (c === "'") {
      const end = scanQuoted(sql, i, "'");
      if (end === -1) {
        return { ok: false, error: 'Unterminated string literal' };
      }
      push('string', i, end, sql.slice(i + 1, end - 1).replace(/''/g, "'"));
      i = end;
      continue;
    }

    const closing = CLOSING_QUOTE[c];
    if (closing) {
      const end = scanQuoted(sql, i, closing);
      if (end === -1) {
        return { ok: false, error: 'Unterminated quoted identifier' };
      }
      const inner = sql.slice(i + 1, end - 1);
      push('ident', i, end, closing === ']' ? inner : inner.split(closing + closing).join(closing));
      i = end;
      continue;
    }

    if (WORD_START.test(c)) {
      let end = i + 1;
      while (end < sql.length && WORD_PART.test(sql[end])) end++;
      push('word', i, end, sql.slice(i, end).toUpperCase());
      i = end;
      continue;
    }

    if (DIGIT.test(c) || (c === '.' && DIGIT.test(sql[i + 1] ?? ''))) {
      let end = i + 1;
      while (end < sql.length && /[0-9.eE]/.test(sql[end])) end++;
      push('number', i, end);
      i = end;
      continue;
    }

    if (c === '(') {
      push('punct', i, i + 1);
      depth++;
      i++;
      continue;
    }

    if (c === ')') {
      depth = Math.max(0, depth - 1);
      push('punct', i, i + 1);
      i++;
      continue;
    }

    push('punct', i, i + 1);
    i++;
  }

  return { ok: true, tokens };
}

/**
 * Return the index just past the closing quote, or -1 when the literal never
 * closes. A doubled quote character is an escaped quote.
 */
function scanQuoted(sql: string, start: number, quote: string): number {
  let i = start + 1;
  while (i < sql.length) {
    if (sql[i] === quote) {
      if (quote !== ']' && sql[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  return -1;
}

/** Tokens with comments removed */
export function significant(tokens: Token[]): Token[] {
  return tokens.filter((t) => t.type !== 'comment');
}

export function isWord(token: Token | undefined, ...values: string[]): boolean {
  return token?.type === 'word' && (values.length === 0 || values.includes(token.value));
}

export function isPunct(token: Token | undefined, text: string): boolean {
  return token?.type === 'punct' && token.text === text;
}
