/**
 * API credential held in memory for the lifetime of a client.
 *
 * The key is reachable only through `reveal()`. Serializing or inspecting the
 * object yields a redacted placeholder, so a credential that ends up inside a
 * persisted record or a log line never leaks the key.
 */

import { inspect } from 'node:util';

const REDACTED = '[redacted]';

export class ApiCredential {
  readonly #key: string;

  constructor(key: string) {
    if (!key.trim()) {
      throw new Error('API key must not be empty');
    }
    this.#key = key;
  }

  static fromEnv(env: Record<string, string | undefined>, name = 'OPENAI_API_KEY'): ApiCredential | null {
    const value = env[name];
    return value ? new ApiCredential(value) : null;
  }

  reveal(): string {
    return this.#key;
  }

  toJSON(): string {
    return REDACTED;
  }

  toString(): string {
    return REDACTED;
  }

  [inspect.custom](): string {
    return `ApiCredential(${REDACTED})`;
  }
}
