/**
 * Thread state service: remembers which provider thread belongs to which user
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import initSqlJs, { type Database } from 'sql.js';
import { ConversationThread, ThreadStore } from '../types/core';
import { createChildLogger } from '../utils/logger';

const log = createChildLogger('thread-state');

const IN_MEMORY = ':memory:';

interface ThreadRow {
  user_id: string;
  thread_id: string;
  created_at: number;
}

function isThreadRow(row: unknown): row is ThreadRow {
  return (
    typeof row === 'object' &&
    row !== null &&
    'user_id' in row && typeof row.user_id === 'string' &&
    'thread_id' in row && typeof row.thread_id === 'string' &&
    'created_at' in row && typeof row.created_at === 'number'
  );
}

/**
 * SQLite (sql.js) table of user to thread mappings. A file-backed store is
 * loaded on start and written back after every save.
 */
export class ThreadStateService implements ThreadStore {
  private cache: Map<string, ConversationThread> = new Map();
  private ready: Promise<Database>;

  constructor(private readonly dbPath: string = IN_MEMORY) {
    this.ready = this.initialize();
    this.ready.catch(err => log.error({ err, dbPath }, 'Thread table initialization failed'));
  }

  private async initialize(): Promise<Database> {
    const SQL = await initSqlJs();
    const persisted = this.dbPath !== IN_MEMORY && existsSync(this.dbPath) ? readFileSync(this.dbPath) : undefined;
    const db = new SQL.Database(persisted);
    db.run(`
      CREATE TABLE IF NOT EXISTS conversation_threads (
        user_id TEXT PRIMARY KEY,
        thread_id TEXT NOT NULL,
        created_at INTEGER NOT NULL
      )
    `);
    return db;
  }

  async get(userId: string): Promise<ConversationThread | null> {
    const cached = this.cache.get(userId);
    if (cached) return cached;

    const db = await this.ready;
    const statement = db.prepare('SELECT user_id, thread_id, created_at FROM conversation_threads WHERE user_id = ?');
    let row: unknown;
    try {
      statement.bind([userId]);
      row = statement.step() ? statement.getAsObject() : undefined;
    } finally {
      statement.free();
    }

    if (!isThreadRow(row)) return null;
    const thread: ConversationThread = {
      userId: row.user_id,
      threadId: row.thread_id,
      createdAt: row.created_at
    };
    this.cache.set(userId, thread);
    return thread;
  }

  /**
   * Upsert: a user never has more than one thread, a replacement overwrites the old one
   */
  async save(thread: ConversationThread): Promise<void> {
    const db = await this.ready;
    db.run(
      'INSERT OR REPLACE INTO conversation_threads (user_id, thread_id, created_at) VALUES (?, ?, ?)',
      [thread.userId, thread.threadId, thread.createdAt]
    );
    this.cache.set(thread.userId, thread);

    if (this.dbPath !== IN_MEMORY) {
      writeFileSync(this.dbPath, db.export());
    }
  }

  async count(): Promise<number> {
    const db = await this.ready;
    const [result] = db.exec('SELECT COUNT(*) AS total FROM conversation_threads');
    const total = result?.values[0]?.[0];
    return typeof total === 'number' ? total : 0;
  }

  close(): void {
    void this.ready
      .then(db => db.close())
      .catch(err => log.error({ err }, 'Thread database did not close cleanly'));
  }
}

/**
 * Process-local store for the CLI and tests
 */
export class MemoryThreadStore implements ThreadStore {
  private threads = new Map<string, ConversationThread>();

  async get(userId: string): Promise<ConversationThread | null> {
    return this.threads.get(userId) ?? null;
  }

  async save(thread: ConversationThread): Promise<void> {
    this.threads.set(thread.userId, thread);
  }

  async count(): Promise<number> {
    return this.threads.size;
  }

  close(): void {
    this.threads.clear();
  }
}
