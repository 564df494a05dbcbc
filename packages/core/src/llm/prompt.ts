/**
 * Prompt construction for question-to-SQL translation.
 */

import { SALES_TABLE } from '../dataset/schema.js';

export interface PromptInput {
  question: string;
  schema: string;
  language?: string;
}

export type ChatMessage = { role: 'system'; content: string } | { role: 'user'; content: string };

const JSON_FORMAT_INSTRUCTIONS = `You must respond with ONLY a JSON object matching this exact schema:
{
  "sql": "<single SQLite SELECT statement>",
  "assumptions": ["<assumption 1>", ...]
}

Rules:
- Do NOT wrap in markdown code fences.
- Do NOT include any text before or after the JSON.`;

export function buildMessages(input: PromptInput): ChatMessage[] {
  const languageNote = input.language
    ? `\n- The question is written in "${input.language}". Keep string literals for data values as they appear in the schema.`
    : '';

  const systemPrompt = `You are a SQL query generator for sales analysis on SQLite.

CONSTRAINTS:
- Generate a SINGLE SELECT statement (a WITH ... SELECT is fine). Never multiple statements.
- No INSERT, UPDATE, DELETE, CREATE, DROP, PRAGMA, ATTACH or any other DDL/DML.
- The only table is ${SALES_TABLE}. Do NOT reference any other table.
- Use the month column ('YYYY-MM') for period aggregation.
- Aggregate with SUM(revenue) or SUM(units) and give aggregates readable aliases.
- Order results in a natural reading order (period, then category).
- LIMIT is optional; the application enforces a row ceiling.${languageNote}

${JSON_FORMAT_INSTRUCTIONS}`;

  const userPrompt = `${input.schema}

Question: ${input.question}

Generate the SQL query as a JSON object.`;

  return [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: userPrompt },
  ];
}
