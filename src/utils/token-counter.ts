/**
 * Tokenizers used by the token accountant
 */

import { getEncoding, type Tiktoken } from 'js-tiktoken';
import { encodingFor, type EncodingName } from '../models.js';

export interface Tokenizer {
  count(text: string, model: string): number;
}

/**
 * BPE counts matching the OpenAI models' own tokenizers.
 * Encodings are loaded lazily and shared across models.
 */
export class TiktokenTokenizer implements Tokenizer {
  private readonly encodings = new Map<EncodingName, Tiktoken>();

  count(text: string, model: string): number {
    if (!text) return 0;
    return this.encoding(encodingFor(model)).encode(text).length;
  }

  private encoding(name: EncodingName): Tiktoken {
    let encoding = this.encodings.get(name);
    if (!encoding) {
      encoding = getEncoding(name);
      this.encodings.set(name, encoding);
    }
    return encoding;
  }
}

/**
 * Simple character-based approximation: 1 token ≈ 4 characters
 */
export class CharacterTokenizer implements Tokenizer {
  constructor(private readonly charsPerToken: number = 4) {}

  count(text: string): number {
    return Math.ceil(text.length / this.charsPerToken);
  }
}
