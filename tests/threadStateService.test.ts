import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { ThreadStateService } from '../src/services/threadStateService';

describe('ThreadStateService', () => {
  let store: ThreadStateService | undefined;

  afterEach(() => {
    store?.close();
  });

  it('stores one thread per user and replaces it on save', async () => {
    store = new ThreadStateService(':memory:');

    expect(await store.get('alice')).toBeNull();

    await store.save({ userId: 'alice', threadId: 'thread_1', createdAt: 1000 });
    await store.save({ userId: 'bob', threadId: 'thread_2', createdAt: 2000 });
    await store.save({ userId: 'alice', threadId: 'thread_3', createdAt: 3000 });

    expect(await store.get('alice')).toEqual({ userId: 'alice', threadId: 'thread_3', createdAt: 3000 });
    expect(await store.count()).toBe(2);
  });

  it('reads mappings back from a database file', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'threads-'));
    const path = join(dir, 'threads.db');
    try {
      const writer = new ThreadStateService(path);
      await writer.save({ userId: 'alice', threadId: 'thread_1', createdAt: 1000 });
      await writer.save({ userId: 'alice', threadId: 'thread_2', createdAt: 2000 });
      writer.close();

      store = new ThreadStateService(path);
      expect(await store.get('alice')).toEqual({ userId: 'alice', threadId: 'thread_2', createdAt: 2000 });
      expect(await store.count()).toBe(1);
    } finally {
      store?.close();
      store = undefined;
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
