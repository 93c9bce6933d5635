/**
 * Context Selector - SELECT strategy over conversation history
 * Picks which prior messages enter the next prompt within a token allowance:
 * a recency window first, then the messages most similar to the new message
 */

import type { AssembledPrompt, ChatMessage, Message, SelectionReport } from '../types/index.js';
import { cosineSimilarity } from './embedding-store.js';

interface ScoredMessage {
  message: Message;
  position: number; // index in the history, higher is more recent
  score: number;
}

export interface SelectionInput {
  history: readonly Message[];
  /** Tokens left after the system directive and the new message */
  allowance: number;
  recencyWindow: number;
  /** Embedding of the new message; null selects recency-only (degraded) mode */
  queryVector: readonly number[] | null;
  vectorOf: (message: Message) => readonly number[] | undefined;
  /** Defaults to cosine similarity */
  similarity?: (a: readonly number[], b: readonly number[]) => number;
  /** Token cost of a message under the model being prompted; defaults to its stored count */
  costOf?: (message: Message) => number;
}

export interface Selection {
  recency: Message[];
  relevant: Message[];
  report: SelectionReport;
}

export class ContextSelector {
  select(input: SelectionInput): Selection {
    const { history, allowance } = input;
    const costOf = input.costOf ?? ((message: Message) => message.tokenCount);
    let used = 0;

    // 1. Recency window: contiguous suffix of the history, walked newest first
    const windowStart = Math.max(history.length - input.recencyWindow, 0);
    let recencyStart = history.length;
    for (let i = history.length - 1; i >= windowStart; i--) {
      const tokens = costOf(history[i]);
      if (used + tokens > allowance) break;
      used += tokens;
      recencyStart = i;
    }
    const recency = history.slice(recencyStart);

    // 2-4. Everything older than the included window competes for the rest
    const candidates: ScoredMessage[] = [];
    for (let i = 0; i < recencyStart; i++) {
      candidates.push({ message: history[i], position: i, score: 0 });
    }

    const picked = new Set<number>();
    const degraded = input.queryVector === null;

    if (input.queryVector === null) {
      // Degraded mode: most recent first until the next one does not fit
      for (let i = candidates.length - 1; i >= 0; i--) {
        const tokens = costOf(candidates[i].message);
        if (used + tokens > allowance) break;
        used += tokens;
        picked.add(candidates[i].position);
      }
    } else {
      const ranked = this.rank(candidates, input.queryVector, input.vectorOf, input.similarity ?? cosineSimilarity);
      for (const entry of ranked) {
        const tokens = costOf(entry.message);
        if (used + tokens > allowance) continue; // skip, never truncate
        used += tokens;
        picked.add(entry.position);
      }
    }

    const relevant = candidates
      .filter(entry => picked.has(entry.position))
      .map(entry => entry.message);

    return {
      recency,
      relevant,
      report: {
        recencyIds: recency.map(m => m.id),
        relevanceIds: relevant.map(m => m.id),
        contextTokens: used,
        degraded
      }
    };
  }

  /**
   * Similarity descending, ties broken by recency. Messages without a cached
   * vector come after every scored one, most recent first.
   */
  private rank(
    candidates: ScoredMessage[],
    queryVector: readonly number[],
    vectorOf: (message: Message) => readonly number[] | undefined,
    similarity: (a: readonly number[], b: readonly number[]) => number
  ): ScoredMessage[] {
    const scored: ScoredMessage[] = [];
    const unscored: ScoredMessage[] = [];

    for (const entry of candidates) {
      const vector = vectorOf(entry.message);
      if (vector) {
        scored.push({ ...entry, score: similarity(queryVector, vector) });
      } else {
        unscored.push(entry);
      }
    }

    scored.sort((a, b) => b.score - a.score || b.position - a.position);
    unscored.sort((a, b) => b.position - a.position);
    return [...scored, ...unscored];
  }

  /**
   * Final prompt: directive, recency window, relevance picks, new message
   */
  assemble(systemDirective: string, selection: Selection, userContent: string): AssembledPrompt {
    const context = [...selection.recency, ...selection.relevant];
    const messages: ChatMessage[] = [
      { role: 'system', content: systemDirective },
      ...context.map(m => ({ role: m.role, content: m.content })),
      { role: 'user', content: userContent }
    ];
    return { messages, context, report: selection.report };
  }
}
