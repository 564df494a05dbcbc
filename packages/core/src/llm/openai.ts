/**
 * OpenAI translator for question-to-SQL generation.
 */

import OpenAI from 'openai';
import { Ajv } from 'ajv';
import { TranslationError, errorMessage } from '../errors.js';
import { SAFE_DEFAULTS } from '../config.js';
import { translatorReplySchema } from './schema_json.js';
import { buildMessages } from './prompt.js';
import type { TranslateInput, Translator, TranslatorReply } from './types.js';

/** The part of the OpenAI client the translator calls */
export interface ChatClient {
  chat: {
    completions: {
      create(
        body: OpenAI.ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal },
      ): Promise<{ choices: Array<{ message?: { content?: string | null } }> }>;
    };
  };
}

export interface OpenAITranslatorOptions {
  apiKey?: string;
  model?: string;
  /** Client-side request timeout in milliseconds */
  timeoutMs?: number;
  /** Use this client instead of constructing one from apiKey */
  client?: ChatClient;
}

const validateReply = new Ajv({ allErrors: true }).compile(translatorReplySchema);

/**
 * Extract JSON from a string that may contain markdown fences or extra text.
 */
export function extractJson(text: string): string {
  const fenceMatch = text.match(/```(?:json)?\s*\n?([\s\S]*?)```/);
  if (fenceMatch) {
    return fenceMatch[1].trim();
  }
  const braceStart = text.indexOf('{');
  const braceEnd = text.lastIndexOf('}');
  if (braceStart !== -1 && braceEnd > braceStart) {
    return text.slice(braceStart, braceEnd + 1);
  }
  return text.trim();
}

/**
 * Parse the model's reply into a reply object, or throw
 * TranslationError('malformed').
 */
export function parseTranslatorReply(raw: string): TranslatorReply {
  const jsonStr = extractJson(raw);
  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonStr);
  } catch (err: unknown) {
    throw new TranslationError('malformed', 'Translator reply is not valid JSON', { cause: err });
  }

  if (!validateReply(parsed)) {
    const errors = validateReply.errors
      ?.map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`)
      .join('; ');
    throw new TranslationError('malformed', `Translator reply failed validation: ${errors ?? 'unknown'}`);
  }
  if (!parsed.sql.trim()) {
    throw new TranslationError('malformed', 'Translator returned an empty query');
  }
  return parsed;
}

export class OpenAITranslator implements Translator {
  private readonly client: ChatClient;
  readonly model: string;

  constructor(options: OpenAITranslatorOptions = {}) {
    if (!options.client && !options.apiKey) {
      throw new TranslationError(
        'unavailable',
        'OpenAI API key is not configured. Set OPENAI_API_KEY in your shell.',
      );
    }
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey,
        timeout: options.timeoutMs ?? SAFE_DEFAULTS.translatorTimeoutMs,
        maxRetries: 0,
      });
    this.model = options.model ?? SAFE_DEFAULTS.model;
  }

  async translate(input: TranslateInput, signal?: AbortSignal): Promise<string> {
    const messages = buildMessages({
      question: input.text,
      schema: input.schema,
      language: input.language,
    });

    const raw = await this.callOpenAI(messages, signal);
    return parseTranslatorReply(raw).sql.trim();
  }

  private async callOpenAI(
    messages: OpenAI.ChatCompletionMessageParam[],
    signal?: AbortSignal,
  ): Promise<string> {
    let response: Awaited<ReturnType<ChatClient['chat']['completions']['create']>>;
    try {
      response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages,
          temperature: 0,
          max_tokens: 500,
        },
        { signal },
      );
    } catch (err: unknown) {
      if (err instanceof OpenAI.APIConnectionTimeoutError || signal?.aborted) {
        throw new TranslationError('timeout', 'Translator request timed out', { cause: err });
      }
      throw new TranslationError('unavailable', `Translator request failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new TranslationError('malformed', 'OpenAI returned empty response.');
    }
    return content;
  }
}
