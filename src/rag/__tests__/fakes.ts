import { createClient } from '@libsql/client';
import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { Embedder } from '../../embed/model.js';
import type { ChatMessage, ChatModel } from '../../llm/chat.js';
import type { Tracker } from '../../tracker/client.js';
import type { RawIssue } from '../../tracker/schema.js';
import { loadConfig } from '../../utils/config.js';
import { TrackerError } from '../../utils/errors.js';
import { silentLogger } from '../../utils/logger.js';
import type { Session } from '../session.js';
import { VectorIndex } from '../vector-index.js';

export function issue(key: string, fields: Record<string, unknown>): RawIssue {
  return { key, fields };
}

/**
 * In-memory tracker. Children are the issues whose parent field points at
 * the searched key.
 */
export class FakeTracker implements Tracker {
  readonly issues = new Map<string, RawIssue>();
  readonly comments: { key: string; body: string }[] = [];
  searchError: Error | null = null;

  constructor(issues: RawIssue[] = []) {
    for (const raw of issues) this.issues.set(raw.key, raw);
  }

  async getIssue(key: string): Promise<RawIssue> {
    const found = this.issues.get(key);
    if (!found) {
      throw new TrackerError(`Fetch issue ${key}`, `Fetch issue ${key} failed (404): Issue does not exist`, {
        status: 404,
      });
    }
    return found;
  }

  async searchChildren(rootKey: string): Promise<RawIssue[]> {
    if (this.searchError) throw this.searchError;
    return [...this.issues.values()].filter((raw) => {
      const parent = raw.fields.parent;
      return typeof parent === 'object' && parent !== null && 'key' in parent && parent.key === rootKey;
    });
  }

  async addComment(key: string, body: string): Promise<string> {
    await this.getIssue(key);
    this.comments.push({ key, body });
    return String(10000 + this.comments.length);
  }
}

const VOCABULARY = ['x', 'epic', 'review'];

/**
 * Counts vocabulary words, plus a constant bias dimension so no vector is zero.
 */
export class FakeEmbedder implements Embedder {
  documentCalls = 0;

  async embedDocuments(texts: string[]): Promise<number[][]> {
    this.documentCalls++;
    return texts.map(embedWords);
  }

  async embedQuery(text: string): Promise<number[]> {
    return embedWords(text);
  }
}

export function embedWords(text: string): number[] {
  const words = text.toLowerCase().split(/[^a-z0-9]+/);
  return [...VOCABULARY.map((term) => words.filter((w) => w === term).length), 1];
}

/**
 * Replies from a queue, recording every request.
 */
export class ScriptedChat implements ChatModel {
  readonly requests: ChatMessage[][] = [];
  private readonly replies: (string | Error)[];

  constructor(replies: (string | Error)[]) {
    this.replies = [...replies];
  }

  async complete(messages: ChatMessage[]): Promise<string> {
    this.requests.push(messages);
    const reply = this.replies.shift();
    if (reply === undefined) throw new Error('No scripted reply left');
    if (reply instanceof Error) throw reply;
    return reply;
  }
}

export interface TestSessionOptions {
  tracker?: Tracker;
  embedder?: Embedder;
  chat?: ChatModel;
  env?: Record<string, string>;
}

/**
 * A session over fakes and an in-memory store, rooted in a fresh temp dir.
 */
export function createTestSession(options: TestSessionOptions = {}): Session {
  const cwd = mkdtempSync(join(tmpdir(), 'criteria-session-'));
  const config = loadConfig({ cwd, env: { VECTOR_ANN_INDEX: 'false', ...options.env } });
  return {
    config,
    tracker: options.tracker ?? new FakeTracker(),
    embedder: options.embedder ?? new FakeEmbedder(),
    chat: options.chat ?? new ScriptedChat([]),
    index: new VectorIndex(createClient({ url: ':memory:' }), { annIndex: false }),
    logger: silentLogger,
    processed: null,
  };
}
