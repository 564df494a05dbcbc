/**
 * Translator contract and reply types.
 */

export interface TranslateInput {
  /** The user's question, verbatim */
  text: string;
  /** BCP 47 tag of the question's language, informational only */
  language?: string;
  /** Text description of the dataset schema */
  schema: string;
}

/** Reply shape the model is asked to produce */
export interface TranslatorReply {
  /** A single SELECT statement */
  sql: string;
  /** Assumptions the model made about the question */
  assumptions?: string[];
}

/**
 * Turns a question into one candidate query. The output is untrusted and
 * must pass the safety validator before it can run.
 */
export interface Translator {
  translate(input: TranslateInput, signal?: AbortSignal): Promise<string>;
}
