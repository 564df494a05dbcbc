/**
 * @salesask/core — barrel export
 *
 * Question answering over the sales dataset, shared by the CLI.
 */

// Configuration and logging
export { loadConfig, SAFE_DEFAULTS, DEFAULT_DATA_PATH } from './config.js';
export type { AppConfig } from './config.js';
export { createLogger, silentLogger, LOG_LEVELS } from './logger.js';
export type { Logger, LogLevel, LoggerOptions } from './logger.js';

// Errors
export {
  TranslationError,
  ExecutionError,
  TimeoutError,
  ConfigError,
  DatasetError,
  errorMessage,
} from './errors.js';
export type { TranslationErrorKind, ExecutionErrorKind } from './errors.js';

// Dataset
export { SALES_TABLE, SALES_COLUMNS, describeSchema } from './dataset/schema.js';
export type { SalesColumn, SalesRow } from './dataset/schema.js';
export { parseCsv, toSalesRows, loadSalesRows } from './dataset/csv.js';
export type { ParsedCsv } from './dataset/csv.js';
export { summarizeDataset } from './dataset/summary.js';
export type { DatasetSummary } from './dataset/summary.js';

// Engine and execution
export type {
  AnalyticsEngine,
  EngineRows,
  EngineColumn,
  EngineQueryOptions,
  ResultSet,
  ResultColumn,
  ColumnType,
  CellValue,
} from './db/types.js';
export { SqliteEngine, openSalesEngine } from './db/adapters/sqlite.js';
export type { SalesEngineOptions } from './db/adapters/sqlite.js';
export { Executor, classifyError } from './db/execute.js';
export type { ExecuteOutcome, ExecutorLimits } from './db/execute.js';

// Safety policy
export { SafetyValidator } from './policy/validator.js';
export type { QueryValidator } from './policy/validator.js';
export { defaultSafetyConfig } from './policy/types.js';
export type { SafetyConfig, Verdict, RejectionCode } from './policy/types.js';
export type { SafeQuery, QueryOrigin } from './policy/safe-query.js';
export { DENYLIST } from './policy/rules.js';

// Fallback catalog
export { FallbackCatalog, readFallbackFile } from './fallback/catalog.js';
export type { FallbackEntry, FallbackFile, CatalogOptions } from './fallback/catalog.js';

// Translator
export { OpenAITranslator, parseTranslatorReply } from './llm/index.js';
export type { Translator, TranslateInput, OpenAITranslatorOptions, ChatClient } from './llm/index.js';

// Resolution, charts, answers
export { QueryResolver } from './resolver.js';
export type { AskRequest, Resolution, ResolverDeps, SoftFailure } from './resolver.js';
export { selectChart } from './chart/select.js';
export type { Chart, ChartKind, ChartDirective, ChartOptions } from './chart/types.js';
export { describeResult, formatNumber } from './insight.js';
export { answerQuestion, EXECUTION_FAILED_MESSAGE } from './answer.js';
export type { AnswerDeps, AnswerResult } from './answer.js';
