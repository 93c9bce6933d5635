import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CorruptStateError, SessionNotFoundError } from '../src/errors.js';
import { ConversationSession } from '../src/services/conversation-session.js';
import {
  ConversationStore,
  findInvariantViolation,
  isValidSessionId,
  type PersistableSession
} from '../src/services/conversation-store.js';
import { ApiCredential } from '../src/services/credentials.js';
import { OpenAIModelClient } from '../src/services/openai-clients.js';
import { SESSION_RECORD_VERSION } from '../src/schemas.js';
import type { SessionSnapshot } from '../src/types/index.js';
import { baseParameters, makeDeps, silentLogger } from './helpers.js';

function makeSnapshot(id: string, overrides: Partial<SessionSnapshot> = {}): SessionSnapshot {
  return {
    id,
    title: 'Trip planning',
    titleSource: 'generated',
    createdAt: 100,
    updatedAt: 130,
    parameters: { ...baseParameters },
    messages: [
      { id: 'u1', role: 'user', content: 'Where should I go?', timestamp: 120, tokenCount: 5 },
      { id: 'a1', role: 'assistant', content: 'Somewhere "warm"\nwith snow', timestamp: 130, tokenCount: 7 }
    ],
    tokenUsage: { 'gpt-4o-mini': { promptTokens: 40, completionTokens: 12 } },
    embeddings: { dimension: 3, vectors: { u1: [0.1, 0.2, 0.30000000000000004], a1: [-1, 0, 1e-9] } },
    ...overrides
  };
}

function fixed(snapshot: SessionSnapshot): PersistableSession & { current: SessionSnapshot } {
  return {
    id: snapshot.id,
    current: snapshot,
    snapshot() {
      return this.current;
    }
  };
}

describe('ConversationStore', () => {
  let dir: string;
  let store: ConversationStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'conversation-store-test-'));
    store = new ConversationStore(dir, silentLogger);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('save() / load()', () => {
    it('loads exactly what was saved', async () => {
      const snapshot = makeSnapshot('s1');
      await store.save(fixed(snapshot));

      const loaded = await store.load('s1');

      expect(loaded).toEqual(snapshot);
      expect(await store.load('s1')).toEqual(loaded);
    });

    it('writes a versioned record and a summary', async () => {
      await store.save(fixed(makeSnapshot('s1')));

      const record: unknown = JSON.parse(await readFile(join(dir, 's1.json'), 'utf-8'));
      const summary: unknown = JSON.parse(await readFile(join(dir, 's1.summary.json'), 'utf-8'));

      expect(record).toMatchObject({ version: SESSION_RECORD_VERSION, id: 's1' });
      expect(summary).toEqual({ id: 's1', title: 'Trip planning', createdAt: 100, updatedAt: 130, messageCount: 2 });
    });

    it('overwrites in place and leaves no temp files behind', async () => {
      const session = fixed(makeSnapshot('s1'));
      await store.save(session);
      session.current = makeSnapshot('s1', { title: 'Renamed', titleSource: 'user' });
      await store.save(session);

      expect((await readdir(dir)).sort()).toEqual(['s1.json', 's1.summary.json']);
      expect((await store.load('s1')).title).toBe('Renamed');
    });

    it('persists the latest state when saves overlap', async () => {
      const session = fixed(makeSnapshot('s1', { title: 'First' }));

      const first = store.save(session);
      session.current = makeSnapshot('s1', { title: 'Second' });
      const second = store.save(session);
      await Promise.all([first, second]);

      expect((await store.load('s1')).title).toBe('Second');
      expect((await store.list()).map(s => s.title)).toEqual(['Second']);
    });

    it('round-trips a live session', async () => {
      const deps = makeDeps();
      const session = ConversationSession.create(baseParameters, deps);
      await session.submit('hello');
      await store.save(session);

      const restored = ConversationSession.restore(await store.load(session.id), makeDeps());

      expect(restored.snapshot()).toEqual(session.snapshot());
    });

    it('never writes the API key', async () => {
      const credential = new ApiCredential('test-secret-key');
      const session = ConversationSession.create(
        baseParameters,
        makeDeps({ modelClient: new OpenAIModelClient({ credential }) })
      );
      await store.save(session);

      const files = await readdir(dir);
      for (const file of files) {
        expect(await readFile(join(dir, file), 'utf-8')).not.toContain('test-secret-key');
      }
      expect(files).toHaveLength(2);
    });

    it('refuses ids that are not safe file names', async () => {
      await expect(store.save(fixed(makeSnapshot('../escape')))).rejects.toBeInstanceOf(RangeError);
      await expect(store.load('../escape')).rejects.toBeInstanceOf(SessionNotFoundError);
    });
  });

  describe('load() failures', () => {
    it('reports a missing session as not found', async () => {
      await expect(store.load('missing')).rejects.toBeInstanceOf(SessionNotFoundError);
    });

    it('reports unparseable JSON as corrupt', async () => {
      await writeFile(join(dir, 'broken.json'), '{"version": 1,');

      await expect(store.load('broken')).rejects.toThrow(
        'Stored state for session broken is corrupt: record is not valid JSON'
      );
    });

    it('reports a record that fails validation as corrupt', async () => {
      await writeFile(join(dir, 'partial.json'), JSON.stringify({ version: 1, id: 'partial' }));

      await expect(store.load('partial')).rejects.toBeInstanceOf(CorruptStateError);
    });

    it('reports an unknown record version as corrupt', async () => {
      const record = { ...makeSnapshot('future'), version: 2 };
      await writeFile(join(dir, 'future.json'), JSON.stringify(record));

      await expect(store.load('future')).rejects.toBeInstanceOf(CorruptStateError);
    });

    it('reports a record stored under another id as corrupt', async () => {
      await store.save(fixed(makeSnapshot('a')));
      await writeFile(join(dir, 'b.json'), await readFile(join(dir, 'a.json'), 'utf-8'));

      await expect(store.load('b')).rejects.toThrow('Stored state for session b is corrupt: record belongs to session a');
    });

    it('reports broken invariants as corrupt', async () => {
      const snapshot = makeSnapshot('dup');
      const record = {
        version: 1,
        ...snapshot,
        messages: [snapshot.messages[0], { ...snapshot.messages[1], id: 'u1' }]
      };
      await writeFile(join(dir, 'dup.json'), JSON.stringify(record));

      await expect(store.load('dup')).rejects.toThrow('duplicate message id u1');
    });
  });

  describe('list()', () => {
    it('returns summaries most recently updated first', async () => {
      await store.save(fixed(makeSnapshot('older', { updatedAt: 200 })));
      await store.save(fixed(makeSnapshot('newer', { updatedAt: 300 })));
      await store.save(fixed(makeSnapshot('also-newer', { updatedAt: 300 })));

      const summaries = await store.list();

      expect(summaries.map(s => s.id)).toEqual(['also-newer', 'newer', 'older']);
      expect(summaries[2]).toEqual({ id: 'older', title: 'Trip planning', createdAt: 100, updatedAt: 200, messageCount: 2 });
    });

    it('skips unreadable summaries', async () => {
      await store.save(fixed(makeSnapshot('good')));
      await writeFile(join(dir, 'bad.summary.json'), '{');

      expect((await store.list()).map(s => s.id)).toEqual(['good']);
    });

    it('returns nothing when the directory does not exist yet', async () => {
      const empty = new ConversationStore(join(dir, 'not-created'), silentLogger);
      expect(await empty.list()).toEqual([]);
    });

    it('leaves stored sessions untouched', async () => {
      const snapshot = makeSnapshot('s1');
      await store.save(fixed(snapshot));
      const recordBefore = await readFile(join(dir, 's1.json'));
      const summaryBefore = await readFile(join(dir, 's1.summary.json'));

      await store.list();
      await store.list();

      expect((await readFile(join(dir, 's1.json'))).equals(recordBefore)).toBe(true);
      expect((await readFile(join(dir, 's1.summary.json'))).equals(summaryBefore)).toBe(true);
      expect(await readdir(dir)).toHaveLength(2);
      expect(await store.load('s1')).toEqual(snapshot);
    });
  });
});

describe('findInvariantViolation', () => {
  const record = (overrides: Partial<SessionSnapshot>) => ({ version: 1 as const, ...makeSnapshot('s', overrides) });

  it('accepts a consistent record', () => {
    expect(findInvariantViolation(record({}))).toBeNull();
  });

  it('flags timestamps that go backwards', () => {
    const [first, second] = makeSnapshot('s').messages;
    const messages = [{ ...first, timestamp: 200 }, second];
    expect(findInvariantViolation(record({ messages }))).toBe('message 1 is older than the message before it');
  });

  it('flags embeddings for messages that do not exist', () => {
    const embeddings = { dimension: 3, vectors: { ghost: [1, 0, 0] } };
    expect(findInvariantViolation(record({ embeddings }))).toBe('embedding for unknown message ghost');
  });

  it('flags vectors of the wrong dimension', () => {
    const embeddings = { dimension: 2, vectors: { u1: [1, 0, 0] } };
    expect(findInvariantViolation(record({ embeddings }))).toBe(
      'embedding for message u1 has 3 dimensions, expected 2'
    );
  });
});

describe('isValidSessionId', () => {
  it('accepts uuids and rejects path characters', () => {
    expect(isValidSessionId('0f8fad5b-d9cb-469f-a165-70867728950e')).toBe(true);
    expect(isValidSessionId('a/b')).toBe(false);
    expect(isValidSessionId('')).toBe(false);
  });
});
