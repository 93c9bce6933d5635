/**
 * In-process stand-ins for the model API and embedding backend
 */

import { RequestCancelledError, TransientApiError } from '../src/errors.js';
import type { SessionDependencies } from '../src/services/conversation-session.js';
import { TokenAccountant } from '../src/services/token-accountant.js';
import type {
  ChatMessage,
  CompletionResult,
  EmbeddingBackend,
  Message,
  ModelClient,
  ModelParameters,
  RequestOptions
} from '../src/types/index.js';
import { createLogger } from '../src/utils/logger.js';
import { CharacterTokenizer } from '../src/utils/token-counter.js';

export const silentLogger = createLogger('test', 'error');

/** 4 characters per token, no per-message overhead, no margins */
export function makeAccountant(overrides: { messageOverhead?: number; safetyMarginPct?: number } = {}): TokenAccountant {
  return new TokenAccountant({
    tokenizer: new CharacterTokenizer(),
    messageOverhead: overrides.messageOverhead ?? 0,
    responseReservePct: 25,
    safetyMarginPct: overrides.safetyMarginPct ?? 0
  });
}

export function makeMessage(id: string, tokens: number, timestamp: number, role: Message['role'] = 'user'): Message {
  return { id, role, content: `${id} `.padEnd(tokens * 4, '.'), timestamp, tokenCount: tokens };
}

export const baseParameters: ModelParameters = {
  model: 'gpt-4o-mini',
  temperature: 0.7,
  maxTokens: 100,
  systemDirective: 'Be brief.', // 9 chars -> 3 tokens
  contextWindow: 1000,
  recencyWindow: 2
};

type Responder = (messages: ChatMessage[], parameters: ModelParameters, options: RequestOptions) =>
  Promise<CompletionResult> | CompletionResult;

export class FakeModelClient implements ModelClient {
  readonly calls: Array<{ messages: ChatMessage[]; parameters: ModelParameters }> = [];
  private readonly queue: Responder[] = [];

  constructor(private readonly fallback: Responder = messages => ({
    text: `reply to ${messages[messages.length - 1]?.content ?? ''}`,
    usage: { promptTokens: 10, completionTokens: 5 }
  })) {}

  /** Queue a one-off behaviour for the next call */
  next(responder: Responder): this {
    this.queue.push(responder);
    return this;
  }

  failNext(error: Error): this {
    return this.next(() => {
      throw error;
    });
  }

  async complete(messages: ChatMessage[], parameters: ModelParameters, options: RequestOptions = {}): Promise<CompletionResult> {
    this.calls.push({ messages, parameters });
    const responder = this.queue.shift() ?? this.fallback;
    return responder(messages, parameters, options);
  }
}

/** Resolves only when released, or rejects when the signal aborts */
export function deferredReply(text: string) {
  let release: () => void = () => undefined;
  const responder: Responder = (_messages, _parameters, options) =>
    new Promise<CompletionResult>((resolve, reject) => {
      release = () => resolve({ text, usage: { promptTokens: 1, completionTokens: 1 } });
      options.signal?.addEventListener('abort', () => reject(new RequestCancelledError()), { once: true });
    });
  return { responder, release: () => release() };
}

export class FakeEmbeddingBackend implements EmbeddingBackend {
  readonly requests: string[] = [];
  failing = false;

  constructor(private readonly vectors: Record<string, number[]> = {}, private readonly fallback: number[] = [0, 0, 1]) {}

  async embedText(text: string): Promise<number[]> {
    this.requests.push(text);
    if (this.failing) {
      throw new TransientApiError('embedding service down', 503);
    }
    return this.vectors[text] ?? this.fallback;
  }
}

export function makeDeps(overrides: Partial<SessionDependencies> = {}): SessionDependencies {
  let clock = 1_000;
  let counter = 0;
  return {
    modelClient: new FakeModelClient(),
    embeddingBackend: new FakeEmbeddingBackend(),
    accountant: makeAccountant(),
    retry: { maxRetries: 2, baseDelayMs: 0, maxDelayMs: 0 },
    logger: silentLogger,
    now: () => (clock += 10),
    generateId: () => `id-${++counter}`,
    ...overrides
  };
}
