/**
 * Error types raised across the core pipeline.
 *
 * Validator rejections are values (see policy/types.ts), not errors.
 */

export type TranslationErrorKind = 'unavailable' | 'timeout' | 'malformed';

/** The translator could not produce a candidate query */
export class TranslationError extends Error {
  readonly kind: TranslationErrorKind;

  constructor(kind: TranslationErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TranslationError';
    this.kind = kind;
  }
}

export type ExecutionErrorKind =
  | 'timeout'
  | 'unknown_identifier'
  | 'syntax'
  | 'type_mismatch'
  | 'engine';

/**
 * A safe query failed inside the engine. The message is the engine's own
 * text and is for logs only.
 */
export class ExecutionError extends Error {
  readonly kind: ExecutionErrorKind;

  constructor(kind: ExecutionErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExecutionError';
    this.kind = kind;
  }
}

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class DatasetError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DatasetError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
