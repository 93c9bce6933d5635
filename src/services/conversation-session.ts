/**
 * Conversation Session
 * Owns one conversation's log, metadata and embedding cache, and runs each
 * turn: embed, budget, select context, call the model, append, persist.
 */

import { randomUUID } from 'node:crypto';
import {
  EmbeddingUnavailableError,
  InvalidParametersError,
  RequestCancelledError,
  SessionArchivedError,
  SessionBusyError
} from '../errors.js';
import { ModelParametersPatchSchema, ModelParametersSchema, formatIssues } from '../schemas.js';
import type {
  AssembledPrompt,
  EmbeddingBackend,
  Message,
  ModelClient,
  ModelParameters,
  ModelUsage,
  RequestOptions,
  Role,
  SessionSnapshot,
  SessionState,
  TitleSource,
  TokenUsageLedger
} from '../types/index.js';
import { createLogger, describeError, type Logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { ContextSelector } from './context-selector.js';
import type { PersistableSession } from './conversation-store.js';
import { EmbeddingIndex, EmbeddingStore } from './embedding-store.js';
import { PLACEHOLDER_TITLE, type TitleGenerator } from './title-generator.js';
import type { TokenAccountant } from './token-accountant.js';

export interface SessionWriter {
  save(session: PersistableSession): Promise<void>;
}

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface SessionDependencies {
  modelClient: ModelClient;
  embeddingBackend: EmbeddingBackend;
  accountant: TokenAccountant;
  retry: RetryPolicy;
  selector?: ContextSelector;
  titleGenerator?: TitleGenerator;
  /** Exchanges after which a title is requested; 0 disables it */
  titleAfterExchanges?: number;
  store?: SessionWriter;
  logger?: Logger;
  now?: () => number;
  generateId?: () => string;
}

export function validateParameters(parameters: unknown): ModelParameters {
  const result = ModelParametersSchema.safeParse(parameters);
  if (!result.success) {
    throw new InvalidParametersError(formatIssues(result.error));
  }
  return result.data;
}

export class ConversationSession implements PersistableSession {
  private state: SessionState = 'created';
  private titleText: string;
  private titleOrigin: TitleSource;
  private lastUpdated: number;
  private params: ModelParameters;
  private readonly messages: Message[];
  private readonly usage: TokenUsageLedger;
  private readonly embeddings: EmbeddingStore;
  private readonly selector: ContextSelector;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly generateId: () => string;
  /** Token costs of logged messages under `model`, which may differ from the model that wrote them */
  private costs: { model: string; counts: Map<string, number> } = { model: '', counts: new Map() };
  private unsaved = false;

  private constructor(
    readonly id: string,
    readonly createdAt: number,
    snapshot: Omit<SessionSnapshot, 'id' | 'createdAt'>,
    private readonly deps: SessionDependencies
  ) {
    this.titleText = snapshot.title;
    this.titleOrigin = snapshot.titleSource;
    this.lastUpdated = snapshot.updatedAt;
    this.params = validateParameters(snapshot.parameters);
    this.messages = [...snapshot.messages];
    this.usage = Object.fromEntries(
      Object.entries(snapshot.tokenUsage).map(([model, usage]) => [model, { ...usage }])
    );
    this.embeddings = new EmbeddingStore(
      deps.embeddingBackend,
      EmbeddingIndex.fromRecord(snapshot.embeddings.dimension, snapshot.embeddings.vectors)
    );
    this.selector = deps.selector ?? new ContextSelector();
    this.logger = (deps.logger ?? createLogger('session')).child(id);
    this.now = deps.now ?? Date.now;
    this.generateId = deps.generateId ?? randomUUID;
  }

  static create(
    parameters: ModelParameters,
    deps: SessionDependencies,
    id: string = (deps.generateId ?? randomUUID)()
  ): ConversationSession {
    const createdAt = (deps.now ?? Date.now)();
    return new ConversationSession(
      id,
      createdAt,
      {
        title: PLACEHOLDER_TITLE,
        titleSource: 'placeholder',
        updatedAt: createdAt,
        parameters,
        messages: [],
        tokenUsage: {},
        embeddings: { dimension: null, vectors: {} }
      },
      deps
    );
  }

  static restore(snapshot: SessionSnapshot, deps: SessionDependencies): ConversationSession {
    return new ConversationSession(snapshot.id, snapshot.createdAt, snapshot, deps);
  }

  get status(): SessionState {
    return this.state;
  }

  get title(): string {
    return this.titleText;
  }

  get titleSource(): TitleSource {
    return this.titleOrigin;
  }

  get updatedAt(): number {
    return this.lastUpdated;
  }

  get parameters(): ModelParameters {
    return { ...this.params };
  }

  get log(): readonly Message[] {
    return this.messages;
  }

  get runningTokenCount(): number {
    return this.messages.reduce((total, message) => total + message.tokenCount, 0);
  }

  get tokenUsage(): TokenUsageLedger {
    return Object.fromEntries(Object.entries(this.usage).map(([model, usage]) => [model, { ...usage }]));
  }

  get exchangeCount(): number {
    return this.messages.filter(m => m.role === 'assistant').length;
  }

  embeddingOf(messageId: string): number[] | undefined {
    return this.embeddings.index.get(messageId);
  }

  /**
   * Send a user message and return the assistant's reply.
   * Nothing is appended unless the whole turn succeeds.
   */
  async submit(text: string, options: RequestOptions = {}): Promise<string> {
    if (this.state === 'archived') {
      throw new SessionArchivedError(this.id);
    }
    if (this.state === 'awaiting_response') {
      throw new SessionBusyError(this.id);
    }
    this.state = 'awaiting_response';

    try {
      return await this.runTurn(text, this.parameters, options);
    } finally {
      this.state = 'awaiting_input';
    }
  }

  rename(title: string): void {
    const trimmed = title.trim();
    if (!trimmed) {
      throw new InvalidParametersError('title must not be empty');
    }
    this.titleText = trimmed;
    this.titleOrigin = 'user';
    this.touch();
  }

  updateParameters(patch: unknown): ModelParameters {
    const result = ModelParametersPatchSchema.safeParse(patch);
    if (!result.success) {
      throw new InvalidParametersError(formatIssues(result.error));
    }
    this.params = validateParameters({ ...this.params, ...result.data });
    this.touch();
    return this.parameters;
  }

  /**
   * Close the session, flushing changes not yet saved. A session with a
   * request in flight cannot be archived.
   */
  async archive(): Promise<void> {
    if (this.state === 'archived') return;
    if (this.state === 'awaiting_response') {
      throw new SessionBusyError(this.id);
    }
    if (this.unsaved) {
      await this.flush();
    }
    this.state = 'archived';
    this.logger.info('Session archived', { messages: this.messages.length });
  }

  /** Whether there are changes the store has not seen yet */
  get hasUnsavedChanges(): boolean {
    return this.unsaved;
  }

  async flush(): Promise<void> {
    if (!this.deps.store) return;
    await this.deps.store.save(this);
    this.unsaved = false;
  }

  snapshot(): SessionSnapshot {
    return {
      id: this.id,
      title: this.titleText,
      titleSource: this.titleOrigin,
      createdAt: this.createdAt,
      updatedAt: this.lastUpdated,
      parameters: this.parameters,
      messages: this.messages.map(m => ({ ...m })),
      tokenUsage: this.tokenUsage,
      embeddings: this.embeddings.index.toRecord()
    };
  }

  private async runTurn(text: string, parameters: ModelParameters, options: RequestOptions): Promise<string> {
    const { signal } = options;
    const userMessage = this.createMessage('user', text, parameters.model);

    // Refuse before anything is sent if directive + message cannot fit
    const budget = this.deps.accountant.budgetFor(parameters, userMessage.tokenCount);
    let appended = false;

    try {
      const queryVector = await this.embedForSelection(userMessage, options);
      throwIfAborted(signal);

      const allowance = budget.availableForContext - budget.mandatoryTokens;
      const prompt = this.buildPrompt(parameters, userMessage, queryVector, allowance);
      this.logger.debug('Assembled prompt', {
        model: parameters.model,
        availableForContext: budget.availableForContext,
        mandatoryTokens: budget.mandatoryTokens,
        contextTokens: prompt.report.contextTokens,
        recency: prompt.report.recencyIds.length,
        relevant: prompt.report.relevanceIds.length,
        degraded: prompt.report.degraded
      });

      const result = await withRetry(
        () => this.deps.modelClient.complete(
          prompt.messages,
          { ...parameters, maxTokens: budget.reservedForResponse },
          options
        ),
        {
          ...this.deps.retry,
          signal,
          onRetry: (attempt, delayMs, error) =>
            this.logger.warn('Transient API error, retrying', {
              attempt,
              maxRetries: this.deps.retry.maxRetries,
              delayMs,
              status: error.status
            })
        }
      );
      throwIfAborted(signal);

      const assistantMessage = this.createMessage('assistant', result.text, parameters.model, userMessage.timestamp);
      this.messages.push(userMessage, assistantMessage);
      appended = true;
      this.unsaved = true;
      this.recordUsage(parameters.model, result.usage);
      this.lastUpdated = assistantMessage.timestamp;

      await this.maybeGenerateTitle(parameters, options);
      // The exchange is complete; a failed write stays pending for the next flush
      try {
        await this.flush();
      } catch (error) {
        this.logger.error('Could not save session', { error: describeError(error) });
      }
      return result.text;
    } finally {
      if (!appended) {
        this.embeddings.forget(userMessage.id);
      }
    }
  }

  private buildPrompt(
    parameters: ModelParameters,
    userMessage: Message,
    queryVector: number[] | null,
    allowance: number
  ): AssembledPrompt {
    const selection = this.selector.select({
      history: this.messages,
      allowance,
      recencyWindow: parameters.recencyWindow,
      queryVector,
      vectorOf: message => this.embeddings.lookup(message),
      similarity: (a, b) => this.embeddings.similarity(a, b),
      costOf: message => this.costOf(message, parameters.model)
    });
    return this.selector.assemble(parameters.systemDirective, selection, userMessage.content);
  }

  /**
   * Embed the new message, then backfill earlier messages that have no vector
   * yet. Returns null when the new message cannot be embedded (recency-only mode).
   */
  private async embedForSelection(userMessage: Message, options: RequestOptions): Promise<number[] | null> {
    let queryVector: number[];
    try {
      queryVector = await this.embeddings.embedMessage(userMessage, options);
    } catch (error) {
      if (!(error instanceof EmbeddingUnavailableError)) throw error;
      this.logger.warn('Embeddings unavailable, using recency-only selection', { error: describeError(error) });
      return null;
    }

    for (const message of this.messages) {
      if (this.embeddings.lookup(message)) continue;
      try {
        await this.embeddings.embedMessage(message, options);
      } catch (error) {
        if (!(error instanceof EmbeddingUnavailableError)) throw error;
        this.logger.warn('Could not backfill embeddings', { error: describeError(error) });
        break;
      }
    }
    return queryVector;
  }

  /**
   * Best effort: a failure keeps the placeholder and is retried next turn.
   */
  private async maybeGenerateTitle(parameters: ModelParameters, options: RequestOptions): Promise<void> {
    const threshold = this.deps.titleAfterExchanges ?? 0;
    const generator = this.deps.titleGenerator;
    if (!generator || threshold <= 0 || this.titleOrigin !== 'placeholder') return;
    if (this.exchangeCount < threshold) return;

    try {
      const generated = await generator.generate(this.messages.slice(0, threshold * 2), parameters, options);
      if (generated) {
        this.titleText = generated.title;
        this.titleOrigin = 'generated';
        this.recordUsage(parameters.model, generated.usage);
      }
    } catch (error) {
      this.logger.warn('Title generation failed', { error: describeError(error) });
    }
  }

  /** Timestamps never go backwards, even if the clock does */
  private createMessage(
    role: Role,
    content: string,
    model: string,
    notBefore: number = this.messages.at(-1)?.timestamp ?? -Infinity
  ): Message {
    const timestamp = Math.max(this.now(), notBefore);
    return {
      id: this.generateId(),
      role,
      content,
      timestamp,
      tokenCount: this.deps.accountant.countMessage(content, model)
    };
  }

  private costOf(message: Message, model: string): number {
    if (this.costs.model !== model) {
      this.costs = { model, counts: new Map() };
    }
    let count = this.costs.counts.get(message.id);
    if (count === undefined) {
      count = this.deps.accountant.countMessage(message.content, model);
      this.costs.counts.set(message.id, count);
    }
    return count;
  }

  private recordUsage(model: string, usage: ModelUsage): void {
    const current = this.usage[model] ?? { promptTokens: 0, completionTokens: 0 };
    this.usage[model] = {
      promptTokens: current.promptTokens + usage.promptTokens,
      completionTokens: current.completionTokens + usage.completionTokens
    };
  }

  private touch(): void {
    this.unsaved = true;
    this.lastUpdated = Math.max(this.now(), this.lastUpdated);
  }
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new RequestCancelledError();
  }
}
