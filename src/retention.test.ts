import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FingerprintIndex } from './fingerprint-index.js';
import { pruneGhosts } from './retention.js';
import { LibraryStore } from './store.js';
import { makeRecordInput } from './test-helpers.js';

describe('pruneGhosts', () => {
  let store: LibraryStore;
  let index: FingerprintIndex;

  beforeEach(() => {
    store = new LibraryStore(':memory:');
    index = new FingerprintIndex(store, { blockSize: 4, blockCount: 4 });
  });

  afterEach(() => {
    store.close();
  });

  function admit(path: string, isDuplicate: boolean): number {
    const record = store.upsertRecord(makeRecordInput(path, 'AAAABBBB', { isDuplicate }));
    index.admit(record.id, record.fingerprint);
    return record.id;
  }

  it('should keep everything without a limit', () => {
    admit('/dups/a.mp3', true);
    admit('/dups/b.mp3', true);

    expect(pruneGhosts(store, index, null)).toBe(0);
    expect(store.listDuplicates()).toHaveLength(2);
  });

  it('should keep only the newest duplicates', () => {
    const oldest = admit('/dups/a.mp3', true);
    const middle = admit('/dups/b.mp3', true);
    const newest = admit('/dups/c.mp3', true);
    const unique = admit('/music/d.mp3', false);

    const removed = pruneGhosts(store, index, 1);

    expect(removed).toBe(2);
    expect(store.listDuplicates().map((r) => r.id)).toEqual([newest]);
    expect(store.getRecord(oldest)).toBeNull();
    expect(store.getRecord(middle)).toBeNull();
    expect(store.getRecord(unique)).not.toBeNull();
    expect([...index.candidates('AAAABBBB')]).toEqual([newest, unique]);
  });

  it('should remove every duplicate with a limit of zero', () => {
    admit('/dups/a.mp3', true);

    expect(pruneGhosts(store, index, 0)).toBe(1);
    expect(store.listDuplicates()).toEqual([]);
  });
});
