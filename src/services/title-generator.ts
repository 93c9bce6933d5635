/**
 * Title Generator
 * Asks the model for a few-word summary of the opening exchanges
 */

import type { CompletionResult, Message, ModelClient, ModelParameters, RequestOptions } from '../types/index.js';

export const PLACEHOLDER_TITLE = 'Untitled conversation';

const TITLE_INSTRUCTION = 'Summarize the previous messages in max 4 words';
const MAX_TITLE_LENGTH = 60;

export interface GeneratedTitle {
  title: string;
  usage: CompletionResult['usage'];
}

export class TitleGenerator {
  constructor(private readonly client: ModelClient) {}

  /**
   * @param messages Opening messages of the conversation, oldest first
   * @returns Cleaned-up title, or null when the model gave nothing usable
   */
  async generate(
    messages: readonly Message[],
    parameters: ModelParameters,
    options?: RequestOptions
  ): Promise<GeneratedTitle | null> {
    if (messages.length === 0) {
      return null;
    }

    const result = await this.client.complete(
      [
        ...messages.map(m => ({ role: m.role, content: m.content })),
        { role: 'system', content: TITLE_INSTRUCTION }
      ],
      { ...parameters, temperature: 0.3, maxTokens: 16 },
      options
    );

    const title = cleanTitle(result.text);
    return title ? { title, usage: result.usage } : null;
  }
}

/** Strip quotes, trailing punctuation and line breaks the model tends to add */
export function cleanTitle(raw: string): string {
  const firstLine = raw.trim().split('\n')[0] ?? '';
  return firstLine
    .replace(/^["'“”‘’\s]+|["'“”‘’\s]+$/g, '')
    .replace(/[.!]+$/, '')
    .trim()
    .slice(0, MAX_TITLE_LENGTH);
}
