/**
 * Core type definitions for the context-recall assistant
 */

export type Role = 'user' | 'assistant' | 'system';

export interface Message {
  readonly id: string;
  readonly role: Role;
  readonly content: string;
  readonly timestamp: number; // ms since epoch
  readonly tokenCount: number;
}

/** Wire shape sent to the model API */
export interface ChatMessage {
  role: Role;
  content: string;
}

export interface ModelParameters {
  model: string;
  temperature: number;
  maxTokens?: number; // reserved for the response
  systemDirective: string;
  contextWindow?: number; // overrides the model catalogue limit
  recencyWindow: number;
}

export interface PromptBudget {
  maxTotalTokens: number;
  reservedForResponse: number;
  availableForContext: number;
  mandatoryTokens: number; // system directive + new user message
}

export interface ModelUsage {
  promptTokens: number;
  completionTokens: number;
}

export type TokenUsageLedger = Record<string, ModelUsage>;

export interface CompletionResult {
  text: string;
  usage: ModelUsage;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

/** Model API collaborator */
export interface ModelClient {
  complete(
    messages: ChatMessage[],
    parameters: ModelParameters,
    options?: RequestOptions
  ): Promise<CompletionResult>;
}

/** Embedding backend collaborator */
export interface EmbeddingBackend {
  embedText(text: string, options?: RequestOptions): Promise<number[]>;
}

export type SessionState = 'created' | 'awaiting_input' | 'awaiting_response' | 'archived';

export type TitleSource = 'placeholder' | 'generated' | 'user';

export interface SessionSummary {
  id: string;
  title: string;
  createdAt: number;
  updatedAt: number;
  messageCount: number;
}

export interface SelectionReport {
  recencyIds: string[];
  relevanceIds: string[];
  contextTokens: number;
  degraded: boolean;
}

export interface AssembledPrompt {
  messages: ChatMessage[];
  context: Message[];
  report: SelectionReport;
}

/** Serializable snapshot of a session, as written by the persistence layer */
export interface SessionSnapshot {
  id: string;
  title: string;
  titleSource: TitleSource;
  createdAt: number;
  updatedAt: number;
  parameters: ModelParameters;
  messages: Message[];
  tokenUsage: TokenUsageLedger;
  embeddings: {
    dimension: number | null;
    vectors: Record<string, number[]>;
  };
}
