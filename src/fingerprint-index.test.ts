import { describe, it, expect } from 'vitest';
import type { BlockStore } from './fingerprint-index.js';
import { FingerprintIndex, deriveBlocks } from './fingerprint-index.js';

class MemoryBlockStore implements BlockStore {
  readonly blocks = new Map<number, string[]>();

  deleteBlocks(key: number): void {
    this.blocks.delete(key);
  }

  insertBlocks(key: number, blocks: string[]): void {
    this.blocks.set(key, [...(this.blocks.get(key) ?? []), ...blocks]);
  }

  queryBlocks(blocks: string[]): number[] {
    const wanted = new Set(blocks);

    return [...this.blocks.entries()]
      .filter(([, stored]) => stored.some((block) => wanted.has(block)))
      .map(([key]) => key);
  }
}

describe('deriveBlocks', () => {
  it('should cut consecutive slices from the start', () => {
    expect(deriveBlocks('aaaabbbbcc', { blockSize: 4, blockCount: 16 })).toEqual([
      'aaaa',
      'bbbb',
      'cc',
    ]);
  });

  it('should stop after blockCount slices', () => {
    expect(deriveBlocks('abcdefgh', { blockSize: 2, blockCount: 2 })).toEqual(['ab', 'cd']);
  });

  it('should collapse repeated slices', () => {
    expect(deriveBlocks('abababab', { blockSize: 2, blockCount: 4 })).toEqual(['ab']);
  });

  it('should return nothing for an empty fingerprint', () => {
    expect(deriveBlocks('', { blockSize: 4, blockCount: 4 })).toEqual([]);
  });
});

describe('FingerprintIndex', () => {
  const shape = { blockSize: 4, blockCount: 2 };

  it('should find records sharing a block', () => {
    const store = new MemoryBlockStore();
    const index = new FingerprintIndex(store, shape);

    index.admit(1, 'AAAABBBBCCCC');
    index.admit(2, 'XXXXBBBBCCCC');
    index.admit(3, 'ZZZZYYYY');

    expect([...index.candidates('QQQQBBBB')]).toEqual([1, 2]);
    expect([...index.candidates('ZZZZ')]).toEqual([3]);
    expect(index.candidates('MMMMNNNN').size).toBe(0);
  });

  it('should replace the blocks of a re-admitted record', () => {
    const store = new MemoryBlockStore();
    const index = new FingerprintIndex(store, shape);

    index.admit(1, 'AAAABBBB');
    index.admit(1, 'CCCCDDDD');

    expect(store.blocks.get(1)).toEqual(['CCCC', 'DDDD']);
    expect(index.candidates('AAAA').size).toBe(0);
  });

  it('should forget evicted records', () => {
    const store = new MemoryBlockStore();
    const index = new FingerprintIndex(store, shape);

    index.admit(7, 'AAAABBBB');
    index.evict(7);

    expect(index.candidates('AAAABBBB').size).toBe(0);
  });
});
