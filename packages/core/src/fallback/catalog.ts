/**
 * Fallback catalog: pre-audited queries keyed by intent, used whenever the
 * translator cannot supply a safe query.
 *
 * Entries live in data/fallbacks.json and are listed in priority order;
 * more specific intents come first.
 */

import { Ajv, type JSONSchemaType } from 'ajv';
import { readFileSync } from 'node:fs';
import { DatasetError, errorMessage } from '../errors.js';
import { significant, tokenize } from '../policy/lexer.js';
import { ensureLimit } from '../policy/rewrite.js';
import { mintSafeQuery, type SafeQuery } from '../policy/safe-query.js';
import { SAFE_DEFAULTS } from '../config.js';

export interface FallbackEntry {
  intent: string;
  title: string;
  sql: string;
  keywords: string[];
}

export interface FallbackFile {
  defaultIntent: string;
  sampleQuestions: string[];
  entries: FallbackEntry[];
}

export interface CatalogOptions {
  /** Row ceiling every template is clamped to */
  maxLimit?: number;
  /** Catalog contents; read from data/fallbacks.json when omitted */
  source?: FallbackFile;
}

const fallbackFileSchema: JSONSchemaType<FallbackFile> = {
  type: 'object',
  properties: {
    defaultIntent: { type: 'string', minLength: 1 },
    sampleQuestions: { type: 'array', items: { type: 'string' } },
    entries: {
      type: 'array',
      minItems: 1,
      items: {
        type: 'object',
        properties: {
          intent: { type: 'string', minLength: 1 },
          title: { type: 'string' },
          sql: { type: 'string', minLength: 1 },
          keywords: { type: 'array', items: { type: 'string', minLength: 1 } },
        },
        required: ['intent', 'title', 'sql', 'keywords'],
        additionalProperties: false,
      },
    },
  },
  required: ['defaultIntent', 'sampleQuestions', 'entries'],
  additionalProperties: false,
};

const validateFile = new Ajv({ allErrors: true }).compile(fallbackFileSchema);

export const CATALOG_PATH = new URL('../../data/fallbacks.json', import.meta.url);

export function readFallbackFile(path: URL | string = CATALOG_PATH): FallbackFile {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err: unknown) {
    throw new DatasetError(`Cannot read fallback catalog: ${errorMessage(err)}`, { cause: err });
  }
  if (!validateFile(parsed)) {
    const first = validateFile.errors?.[0];
    throw new DatasetError(
      `Invalid fallback catalog at ${first?.instancePath || '/'}: ${first?.message ?? 'unknown error'}`,
    );
  }
  return parsed;
}

interface CompiledEntry {
  entry: FallbackEntry;
  query: SafeQuery;
  matchers: RegExp[];
}

export class FallbackCatalog {
  private readonly compiled: CompiledEntry[];
  private readonly fallback: CompiledEntry;
  private readonly samples: string[];

  constructor(options: CatalogOptions = {}) {
    const source = options.source ?? readFallbackFile();
    const maxLimit = options.maxLimit ?? SAFE_DEFAULTS.maxRows;

    const seen = new Set<string>();
    this.compiled = source.entries.map((entry) => {
      if (seen.has(entry.intent)) {
        throw new DatasetError(`Duplicate fallback intent "${entry.intent}"`);
      }
      seen.add(entry.intent);
      return {
        entry,
        query: compileQuery(entry, maxLimit),
        matchers: entry.keywords.map(keywordMatcher),
      };
    });

    const fallback = this.compiled.find((c) => c.entry.intent === source.defaultIntent);
    if (!fallback) {
      throw new DatasetError(`Default intent "${source.defaultIntent}" is not in the catalog`);
    }
    this.fallback = fallback;
    this.samples = [...source.sampleQuestions];
  }

  /** The query for an intent; unknown intents get the default entry */
  resolve(intent: string): SafeQuery {
    return this.compiled.find((c) => c.entry.intent === intent)?.query ?? this.fallback.query;
  }

  defaultEntry(): SafeQuery {
    return this.fallback.query;
  }

  /**
   * Pick the entry whose keywords best match the question. Score is the
   * number of distinct keywords present; ties go to the earlier entry, and
   * no match at all gives the default entry.
   */
  match(text: string): FallbackEntry {
    let best: CompiledEntry | null = null;
    let bestScore = 0;
    for (const candidate of this.compiled) {
      const score = candidate.matchers.filter((m) => m.test(text)).length;
      if (score > bestScore) {
        best = candidate;
        bestScore = score;
      }
    }
    return (best ?? this.fallback).entry;
  }

  /** Whether any keyword of any intent appears in the question */
  matchesAnyIntent(text: string): boolean {
    return this.compiled.some((c) => c.matchers.some((m) => m.test(text)));
  }

  entries(): FallbackEntry[] {
    return this.compiled.map((c) => ({ ...c.entry, sql: c.query.sql }));
  }

  sampleQuestions(): string[] {
    return [...this.samples];
  }
}

function compileQuery(entry: FallbackEntry, maxLimit: number): SafeQuery {
  const lexed = tokenize(entry.sql);
  if (!lexed.ok) {
    throw new DatasetError(`Fallback "${entry.intent}" has malformed SQL: ${lexed.error}`);
  }
  const ceiling = ensureLimit(entry.sql, significant(lexed.tokens), maxLimit, maxLimit);
  if (!ceiling.ok) {
    throw new DatasetError(`Fallback "${entry.intent}": ${ceiling.reason}`);
  }
  return mintSafeQuery({
    sql: ceiling.rewrittenSql,
    limit: ceiling.limit,
    origin: 'catalog',
    intent: entry.intent,
  });
}

const ASCII_ONLY = /^[\x20-\x7e]+$/;

/** ASCII keywords match at a word start; others (e.g. Japanese) anywhere */
function keywordMatcher(keyword: string): RegExp {
  const escaped = keyword.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return ASCII_ONLY.test(keyword) ? new RegExp(`\\b${escaped}`, 'i') : new RegExp(escaped, 'i');
}
