/**
 * Query resolver: question in, SafeQuery out.
 *
 * The translator's candidate is used only when the validator accepts it.
 * Translator failures, timeouts and rejections all end in the fallback
 * catalog; resolve() never rejects.
 */

import { describeSchema } from './dataset/schema.js';
import { TranslationError, TimeoutError, errorMessage } from './errors.js';
import type { FallbackCatalog } from './fallback/catalog.js';
import type { Translator } from './llm/types.js';
import type { Logger } from './logger.js';
import type { SafeQuery } from './policy/safe-query.js';
import type { RejectionCode } from './policy/types.js';
import type { QueryValidator } from './policy/validator.js';
import { withTimeout } from './util/timeout.js';

export interface AskRequest {
  text: string;
  /** BCP 47 language tag; informational only */
  language?: string;
}

/** Why the translator's candidate was not used */
export type SoftFailure =
  | { stage: 'translation'; reason: TranslationError['kind'] }
  | { stage: 'validation'; reason: RejectionCode }
  | { stage: 'internal'; reason: 'unexpected_error' };

export interface Resolution {
  query: SafeQuery;
  source: 'translator' | 'fallback';
  /** Catalog intent when the query came from the fallback catalog */
  intent?: string;
  softFailure?: SoftFailure;
  /** Validator notes, e.g. an appended LIMIT */
  warnings: string[];
}

export interface ResolverDeps {
  /** Absent when no translator is configured */
  translator?: Translator;
  validator: QueryValidator;
  catalog: FallbackCatalog;
  translatorTimeoutMs: number;
  logger?: Logger;
}

export class QueryResolver {
  private readonly deps: ResolverDeps;
  private readonly schema = describeSchema();

  constructor(deps: ResolverDeps) {
    this.deps = deps;
  }

  async resolve(request: AskRequest): Promise<Resolution> {
    const { translator, validator, logger } = this.deps;

    if (!translator) {
      return this.fallback(request, { stage: 'translation', reason: 'unavailable' });
    }

    let candidate: string;
    try {
      candidate = await withTimeout('Translator', this.deps.translatorTimeoutMs, (signal) =>
        translator.translate(
          { text: request.text, language: request.language, schema: this.schema },
          signal,
        ),
      );
    } catch (err: unknown) {
      return this.fallback(request, { stage: 'translation', reason: translationFailureKind(err) });
    }

    try {
      const verdict = validator.validate(candidate);
      if (verdict.accepted) {
        logger?.debug('translator query accepted', {
          limit: verdict.query.limit,
          warnings: verdict.warnings,
        });
        return { query: verdict.query, source: 'translator', warnings: verdict.warnings };
      }
      logger?.warn('translator query rejected', {
        code: verdict.code,
        candidateLength: candidate.length,
      });
      return this.fallback(request, { stage: 'validation', reason: verdict.code });
    } catch (err: unknown) {
      logger?.error('validator failed', { error: errorMessage(err) });
      return this.fallback(request, { stage: 'internal', reason: 'unexpected_error' });
    }
  }

  private fallback(request: AskRequest, softFailure: SoftFailure): Resolution {
    const { catalog, logger } = this.deps;
    if (softFailure.stage === 'translation') {
      logger?.warn('translator unavailable, using fallback', { reason: softFailure.reason });
    }

    let intent: string;
    try {
      intent = catalog.match(request.text).intent;
    } catch (err: unknown) {
      logger?.error('fallback matching failed', { error: errorMessage(err) });
      const query = catalog.defaultEntry();
      return { query, source: 'fallback', intent: query.intent, softFailure, warnings: [] };
    }
    return {
      query: catalog.resolve(intent),
      source: 'fallback',
      intent,
      softFailure,
      warnings: [],
    };
  }
}

function translationFailureKind(err: unknown): TranslationError['kind'] {
  if (err instanceof TranslationError) return err.kind;
  if (err instanceof TimeoutError) return 'timeout';
  return 'unavailable';
}
