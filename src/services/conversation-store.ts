/**
 * Conversation Store - persistence layer for sessions
 *
 * Each session is two JSON files in the data directory:
 *   <id>.json          full record (log, metadata, usage, embedding cache)
 *   <id>.summary.json  id, title and timestamps, read by list()
 *
 * Files are replaced atomically (temp file, fsync, rename) and writes for one
 * session id never interleave.
 */

import { randomUUID } from 'node:crypto';
import { mkdir, open, readdir, readFile, rename } from 'node:fs/promises';
import { join } from 'node:path';
import { CorruptStateError, SessionNotFoundError } from '../errors.js';
import {
  SESSION_RECORD_VERSION,
  SessionRecordSchema,
  SessionSummarySchema,
  formatIssues,
  type SessionRecord
} from '../schemas.js';
import type { SessionSnapshot, SessionSummary } from '../types/index.js';
import { KeyedLock } from '../utils/keyed-lock.js';
import { createLogger, describeError, type Logger } from '../utils/logger.js';

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;
const SUMMARY_SUFFIX = '.summary.json';

export interface PersistableSession {
  readonly id: string;
  snapshot(): SessionSnapshot;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function isValidSessionId(id: string): boolean {
  return SESSION_ID_PATTERN.test(id);
}

/**
 * Check the data-model invariants a schema cannot express.
 * Returns a description of the first violation, or null.
 */
export function findInvariantViolation(record: SessionRecord): string | null {
  const ids = new Set<string>();
  let previous = -Infinity;

  for (const [position, message] of record.messages.entries()) {
    if (ids.has(message.id)) {
      return `duplicate message id ${message.id}`;
    }
    ids.add(message.id);
    if (message.timestamp < previous) {
      return `message ${position} is older than the message before it`;
    }
    previous = message.timestamp;
  }

  const { dimension, vectors } = record.embeddings;
  for (const [id, vector] of Object.entries(vectors)) {
    if (!ids.has(id)) {
      return `embedding for unknown message ${id}`;
    }
    if (vector.length !== dimension) {
      return `embedding for message ${id} has ${vector.length} dimensions, expected ${dimension}`;
    }
  }
  return null;
}

export class ConversationStore {
  private readonly lock = new KeyedLock();
  private readonly logger: Logger;

  constructor(private readonly directory: string, logger?: Logger) {
    this.logger = logger ?? createLogger('store');
  }

  /**
   * Write the session's current state. The snapshot is taken once the
   * session's lock is held, so the last save always carries the latest state.
   */
  async save(session: PersistableSession): Promise<void> {
    this.assertValidId(session.id);

    await this.lock.run(session.id, async () => {
      const snapshot = session.snapshot();
      const record: SessionRecord = { version: SESSION_RECORD_VERSION, ...snapshot };
      const summary: SessionSummary = {
        id: snapshot.id,
        title: snapshot.title,
        createdAt: snapshot.createdAt,
        updatedAt: snapshot.updatedAt,
        messageCount: snapshot.messages.length
      };

      await mkdir(this.directory, { recursive: true });
      await this.writeAtomic(this.recordPath(session.id), JSON.stringify(record));
      await this.writeAtomic(this.summaryPath(session.id), JSON.stringify(summary, null, 2));
      this.logger.debug('Saved session', { sessionId: session.id, messages: summary.messageCount });
    });
  }

  async load(id: string): Promise<SessionSnapshot> {
    if (!isValidSessionId(id)) {
      throw new SessionNotFoundError(id);
    }

    let raw: string;
    try {
      raw = await readFile(this.recordPath(id), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) throw new SessionNotFoundError(id);
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new CorruptStateError(id, 'record is not valid JSON', { cause: error });
    }

    const result = SessionRecordSchema.safeParse(parsed);
    if (!result.success) {
      throw new CorruptStateError(id, formatIssues(result.error));
    }
    const { version: _version, ...snapshot } = result.data;

    if (snapshot.id !== id) {
      throw new CorruptStateError(id, `record belongs to session ${snapshot.id}`);
    }
    const violation = findInvariantViolation(result.data);
    if (violation) {
      throw new CorruptStateError(id, violation);
    }
    return snapshot;
  }

  /**
   * Lightweight listing, most recently updated first.
   * Summaries that cannot be read are logged and left out.
   */
  async list(): Promise<SessionSummary[]> {
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }

    const summaries: SessionSummary[] = [];
    for (const entry of entries) {
      if (!entry.endsWith(SUMMARY_SUFFIX)) continue;
      try {
        const data: unknown = JSON.parse(await readFile(join(this.directory, entry), 'utf-8'));
        summaries.push(SessionSummarySchema.parse(data));
      } catch (error) {
        this.logger.warn('Skipping unreadable session summary', { file: entry, error: describeError(error) });
      }
    }

    return summaries.sort((a, b) => b.updatedAt - a.updatedAt || a.id.localeCompare(b.id));
  }

  private async writeAtomic(path: string, content: string): Promise<void> {
    const tempPath = `${path}.${randomUUID()}.tmp`;
    const handle = await open(tempPath, 'w');
    try {
      await handle.writeFile(content, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tempPath, path);
  }

  private assertValidId(id: string): void {
    if (!isValidSessionId(id)) {
      throw new RangeError(`Invalid session id: ${id}`);
    }
  }

  private recordPath(id: string): string {
    return join(this.directory, `${id}.json`);
  }

  private summaryPath(id: string): string {
    return join(this.directory, `${id}${SUMMARY_SUFFIX}`);
  }
}
