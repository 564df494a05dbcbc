/**
 * LLM module barrel export.
 */

export type { Translator, TranslateInput, TranslatorReply } from './types.js';
export { OpenAITranslator, extractJson, parseTranslatorReply } from './openai.js';
export type { OpenAITranslatorOptions, ChatClient } from './openai.js';
export { buildMessages } from './prompt.js';
export type { ChatMessage, PromptInput } from './prompt.js';
export { translatorReplySchema } from './schema_json.js';
