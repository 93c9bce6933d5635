/**
 * OpenAI collaborators: chat completions (model API) and embeddings.
 * SDK errors are mapped onto the transient/permanent split the sessions retry on.
 */

import OpenAI from 'openai';
import { PermanentApiError, RequestCancelledError, TransientApiError } from '../errors.js';
import type {
  ChatMessage,
  CompletionResult,
  EmbeddingBackend,
  ModelClient,
  ModelParameters,
  RequestOptions
} from '../types/index.js';
import type { ApiCredential } from './credentials.js';

const TRANSIENT_STATUS = new Set([408, 409, 429]);
const TRANSIENT_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ENOTFOUND', 'ETIMEDOUT', 'EAI_AGAIN']);

function readProperty(value: unknown, key: string): unknown {
  if (typeof value === 'object' && value !== null && key in value) {
    return Reflect.get(value, key);
  }
  return undefined;
}

/**
 * Map an SDK or network error onto the error taxonomy
 */
export function classifyApiError(error: unknown): Error {
  if (error instanceof OpenAI.APIUserAbortError) {
    return new RequestCancelledError({ cause: error });
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new TransientApiError(error.message, undefined, { cause: error });
  }

  const status = readProperty(error, 'status');
  const code = readProperty(error, 'code');
  const message = error instanceof Error ? error.message : String(error);

  if (typeof status === 'number') {
    if (TRANSIENT_STATUS.has(status) || status >= 500) {
      return new TransientApiError(message, status, { cause: error });
    }
    return new PermanentApiError(message, status, { cause: error });
  }
  if (typeof code === 'string' && TRANSIENT_CODES.has(code)) {
    return new TransientApiError(message, undefined, { cause: error });
  }
  if (error instanceof Error && /timeout|timed out/i.test(error.message)) {
    return new TransientApiError(message, undefined, { cause: error });
  }
  return new PermanentApiError(message, undefined, { cause: error });
}

function toMessageParam(message: ChatMessage) {
  switch (message.role) {
    case 'system':
      return { role: 'system' as const, content: message.content };
    case 'assistant':
      return { role: 'assistant' as const, content: message.content };
    case 'user':
      return { role: 'user' as const, content: message.content };
  }
}

export interface OpenAIClientOptions {
  credential: ApiCredential;
  baseURL?: string;
  /** Retries are done by the session, not the SDK */
  sdkMaxRetries?: number;
}

function createClient(options: OpenAIClientOptions): OpenAI {
  return new OpenAI({
    apiKey: options.credential.reveal(),
    baseURL: options.baseURL,
    maxRetries: options.sdkMaxRetries ?? 0
  });
}

export class OpenAIModelClient implements ModelClient {
  private readonly openai: OpenAI;

  constructor(options: OpenAIClientOptions) {
    this.openai = createClient(options);
  }

  async complete(
    messages: ChatMessage[],
    parameters: ModelParameters,
    options: RequestOptions = {}
  ): Promise<CompletionResult> {
    try {
      const response = await this.openai.chat.completions.create(
        {
          model: parameters.model,
          messages: messages.map(toMessageParam),
          temperature: parameters.temperature,
          max_tokens: parameters.maxTokens
        },
        { signal: options.signal }
      );

      const text = response.choices[0]?.message?.content;
      if (typeof text !== 'string') {
        throw new PermanentApiError(`Model ${parameters.model} returned no text`);
      }
      return {
        text,
        usage: {
          promptTokens: response.usage?.prompt_tokens ?? 0,
          completionTokens: response.usage?.completion_tokens ?? 0
        }
      };
    } catch (error) {
      if (error instanceof PermanentApiError) throw error;
      throw classifyApiError(error);
    }
  }
}

export class OpenAIEmbeddingBackend implements EmbeddingBackend {
  private readonly openai: OpenAI;

  constructor(options: OpenAIClientOptions, private readonly model: string) {
    this.openai = createClient(options);
  }

  async embedText(text: string, options: RequestOptions = {}): Promise<number[]> {
    try {
      const response = await this.openai.embeddings.create(
        { model: this.model, input: text },
        { signal: options.signal }
      );
      const vector = response.data[0]?.embedding;
      if (!vector) {
        throw new PermanentApiError(`Embedding model ${this.model} returned no vector`);
      }
      return vector;
    } catch (error) {
      if (error instanceof PermanentApiError) throw error;
      throw classifyApiError(error);
    }
  }
}
