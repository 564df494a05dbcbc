/**
 * AJV JSON Schema for the translator's reply.
 */

import type { JSONSchemaType } from 'ajv';
import type { TranslatorReply } from './types.js';

export const translatorReplySchema: JSONSchemaType<TranslatorReply> = {
  type: 'object',
  properties: {
    sql: { type: 'string', minLength: 1 },
    assumptions: {
      type: 'array',
      items: { type: 'string' },
      nullable: true,
    },
  },
  required: ['sql'],
  additionalProperties: true,
};
