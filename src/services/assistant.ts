/**
 * Chat Assistant - the surface front-ends talk to.
 * Keeps open sessions in memory and loads the rest from the store on demand.
 */

import type { ModelParameters, RequestOptions, SessionSummary } from '../types/index.js';
import {
  ConversationSession,
  validateParameters,
  type SessionDependencies
} from './conversation-session.js';
import type { ConversationStore } from './conversation-store.js';

export interface ChatAssistantOptions {
  store: ConversationStore;
  defaults: ModelParameters;
  session: Omit<SessionDependencies, 'store'>;
}

export class ChatAssistant {
  private readonly open = new Map<string, ConversationSession>();
  private readonly loading = new Map<string, Promise<ConversationSession>>();
  private readonly deps: SessionDependencies;

  constructor(private readonly options: ChatAssistantOptions) {
    this.deps = { ...options.session, store: options.store };
  }

  /** The session is written on its first completed turn or explicit change. */
  createSession(overrides: Partial<ModelParameters> = {}): ConversationSession {
    const parameters = validateParameters({ ...this.options.defaults, ...overrides });
    const session = ConversationSession.create(parameters, this.deps);
    this.open.set(session.id, session);
    return session;
  }

  async submit(sessionId: string, text: string, options?: RequestOptions): Promise<string> {
    const session = await this.loadSession(sessionId);
    return session.submit(text, options);
  }

  listSessions(): Promise<SessionSummary[]> {
    return this.options.store.list();
  }

  /**
   * Return the open session, or restore it from the store. Concurrent loads
   * of the same id share one restore so the session object stays unique.
   */
  async loadSession(sessionId: string): Promise<ConversationSession> {
    const open = this.open.get(sessionId);
    if (open) return open;

    let pending = this.loading.get(sessionId);
    if (!pending) {
      pending = this.restore(sessionId);
      this.loading.set(sessionId, pending);
    }
    try {
      return await pending;
    } finally {
      this.loading.delete(sessionId);
    }
  }

  async archiveSession(sessionId: string): Promise<void> {
    const session = await this.loadSession(sessionId);
    await session.archive();
    this.open.delete(sessionId);
  }

  async updateParameters(sessionId: string, patch: Partial<ModelParameters>): Promise<ModelParameters> {
    const session = await this.loadSession(sessionId);
    const parameters = session.updateParameters(patch);
    await session.flush();
    return parameters;
  }

  async renameSession(sessionId: string, title: string): Promise<void> {
    const session = await this.loadSession(sessionId);
    session.rename(title);
    await session.flush();
  }

  /** Archive every open session, flushing unsaved changes to the store. */
  async close(): Promise<void> {
    for (const session of [...this.open.values()]) {
      if (session.status !== 'awaiting_response') {
        await session.archive();
        this.open.delete(session.id);
      }
    }
  }

  private async restore(sessionId: string): Promise<ConversationSession> {
    const snapshot = await this.options.store.load(sessionId);
    const session = ConversationSession.restore(snapshot, this.deps);
    this.open.set(sessionId, session);
    return session;
  }
}
