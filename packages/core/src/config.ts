/**
 * Runtime configuration: safe defaults, overridden by SALESASK_* environment
 * variables, overridden by explicit values (CLI flags).
 */

import { Ajv, type JSONSchemaType } from 'ajv';
import { fileURLToPath } from 'node:url';
import { ConfigError } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';

export const SAFE_DEFAULTS = {
  /** Row ceiling for any query, and the LIMIT appended when one is missing */
  maxRows: 1000,
  defaultLimit: 1000,
  /** Execution timeout in milliseconds */
  execTimeoutMs: 10_000,
  /** Translator timeout in milliseconds */
  translatorTimeoutMs: 30_000,
  model: 'gpt-4o-mini',
  logLevel: 'warn',
} as const;

export const DEFAULT_DATA_PATH = fileURLToPath(new URL('../data/sample_sales.csv', import.meta.url));

export interface AppConfig {
  maxRows: number;
  defaultLimit: number;
  execTimeoutMs: number;
  translatorTimeoutMs: number;
  model: string;
  dataPath: string;
  logLevel: LogLevel;
  /** Absent means the translator is unavailable and every question falls back */
  openaiApiKey?: string;
}

const ENV_KEYS = {
  maxRows: 'SALESASK_MAX_ROWS',
  defaultLimit: 'SALESASK_DEFAULT_LIMIT',
  execTimeoutMs: 'SALESASK_EXEC_TIMEOUT_MS',
  translatorTimeoutMs: 'SALESASK_TRANSLATOR_TIMEOUT_MS',
  model: 'SALESASK_MODEL',
  dataPath: 'SALESASK_DATA_PATH',
  logLevel: 'SALESASK_LOG_LEVEL',
  openaiApiKey: 'OPENAI_API_KEY',
} as const satisfies Record<keyof AppConfig, string>;

const configSchema: JSONSchemaType<AppConfig> = {
  type: 'object',
  properties: {
    maxRows: { type: 'integer', minimum: 1 },
    defaultLimit: { type: 'integer', minimum: 1 },
    execTimeoutMs: { type: 'integer', minimum: 1 },
    translatorTimeoutMs: { type: 'integer', minimum: 1 },
    model: { type: 'string', minLength: 1 },
    dataPath: { type: 'string', minLength: 1 },
    logLevel: { type: 'string', enum: [...LOG_LEVELS] },
    openaiApiKey: { type: 'string', nullable: true, minLength: 1 },
  },
  required: [
    'maxRows',
    'defaultLimit',
    'execTimeoutMs',
    'translatorTimeoutMs',
    'model',
    'dataPath',
    'logLevel',
  ],
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true, coerceTypes: true });
const validateConfig = ajv.compile(configSchema);

/**
 * Build the configuration. Numeric values from the environment are coerced;
 * anything that fails the schema raises ConfigError naming the setting.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<AppConfig> = {},
): AppConfig {
  const candidate: Record<string, unknown> = {
    maxRows: SAFE_DEFAULTS.maxRows,
    defaultLimit: SAFE_DEFAULTS.defaultLimit,
    execTimeoutMs: SAFE_DEFAULTS.execTimeoutMs,
    translatorTimeoutMs: SAFE_DEFAULTS.translatorTimeoutMs,
    model: SAFE_DEFAULTS.model,
    dataPath: DEFAULT_DATA_PATH,
    logLevel: SAFE_DEFAULTS.logLevel,
  };

  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const raw = env[envName]?.trim();
    if (raw) candidate[key] = raw;
  }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) candidate[key] = value;
  }
  if (typeof candidate.logLevel === 'string') {
    candidate.logLevel = candidate.logLevel.toLowerCase();
  }

  if (!validateConfig(candidate)) {
    const first = validateConfig.errors?.[0];
    const setting = first?.instancePath.replace(/^\//, '') || 'config';
    const envName = Object.entries(ENV_KEYS).find(([key]) => key === setting)?.[1] ?? setting;
    throw new ConfigError(`Invalid ${envName}: ${first?.message ?? 'invalid value'}`);
  }

  if (candidate.defaultLimit > candidate.maxRows) {
    throw new ConfigError(
      `Invalid ${ENV_KEYS.defaultLimit}: default LIMIT (${candidate.defaultLimit}) exceeds the row ceiling (${candidate.maxRows})`,
    );
  }

  return candidate;
}
