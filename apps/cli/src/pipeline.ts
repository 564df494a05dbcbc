/**
 * Wires the core components for one CLI invocation. The engine is opened
 * once here and must be closed by the caller.
 */

import {
  Executor,
  FallbackCatalog,
  OpenAITranslator,
  QueryResolver,
  SafetyValidator,
  createLogger,
  loadConfig,
  openSalesEngine,
  type AppConfig,
  type Logger,
  type SqliteEngine,
  type Translator,
} from '@salesask/core';
import { logLevelFromOutput, type OutputOptions } from './output.js';

export interface PipelineOptions {
  /** Sales CSV path, overriding the configured one */
  data?: string;
  /** Use the translator when an API key is configured */
  ai?: boolean;
}

export interface Pipeline {
  config: AppConfig;
  logger: Logger;
  engine: SqliteEngine;
  validator: SafetyValidator;
  catalog: FallbackCatalog;
  translator?: Translator;
  resolver: QueryResolver;
  executor: Executor;
  close(): void;
}

export function loadCliConfig(output: OutputOptions, options: PipelineOptions = {}): { config: AppConfig; logger: Logger } {
  const config = loadConfig(process.env, {
    dataPath: options.data,
    logLevel: logLevelFromOutput(output),
  });
  const logger = createLogger({ level: config.logLevel, json: output.json });
  return { config, logger };
}

/** The fallback catalog clamped to the configured row ceiling */
export function openCatalog(config: Pick<AppConfig, 'maxRows'>): FallbackCatalog {
  return new FallbackCatalog({ maxLimit: config.maxRows });
}

export function openPipeline(output: OutputOptions, options: PipelineOptions = {}): Pipeline {
  const { config, logger } = loadCliConfig(output, options);

  const engine = openSalesEngine({ csvPath: config.dataPath });
  logger.info('sales data loaded', { path: config.dataPath, rows: engine.countRows() });

  const validator = new SafetyValidator({
    defaultLimit: config.defaultLimit,
    maxLimit: config.maxRows,
  });
  const catalog = openCatalog(config);

  let translator: Translator | undefined;
  if (options.ai !== false && config.openaiApiKey) {
    translator = new OpenAITranslator({
      apiKey: config.openaiApiKey,
      model: config.model,
      timeoutMs: config.translatorTimeoutMs,
    });
  } else {
    logger.info('translator disabled, questions use the fallback catalog');
  }

  const resolver = new QueryResolver({
    translator,
    validator,
    catalog,
    translatorTimeoutMs: config.translatorTimeoutMs,
    logger,
  });
  const executor = new Executor(
    engine,
    { maxRows: config.maxRows, timeoutMs: config.execTimeoutMs },
    logger,
  );

  return {
    config,
    logger,
    engine,
    validator,
    catalog,
    translator,
    resolver,
    executor,
    close: () => engine.close(),
  };
}
