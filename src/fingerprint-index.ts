export interface BlockStore {
  deleteBlocks(key: number): void;
  insertBlocks(key: number, blocks: string[]): void;
  queryBlocks(blocks: string[]): number[];
}

export interface BlockShape {
  blockSize: number;
  blockCount: number;
}

/**
 * Splits a fingerprint into at most `blockCount` consecutive slices of
 * `blockSize` characters, starting at the beginning. The last slice may be
 * shorter. Repeated slices are collapsed.
 */
export function deriveBlocks(fingerprint: string, shape: BlockShape): string[] {
  const blocks = new Set<string>();

  for (let index = 0; index < shape.blockCount; index++) {
    const offset = index * shape.blockSize;

    if (offset >= fingerprint.length) {
      break;
    }

    blocks.add(fingerprint.slice(offset, offset + shape.blockSize));
  }

  return Array.from(blocks);
}

/**
 * Block-based prefilter over stored fingerprints. Candidates share at
 * least one block with the query; they still need a similarity check.
 */
export class FingerprintIndex {
  constructor(
    private readonly store: BlockStore,
    private readonly shape: BlockShape
  ) {}

  blocksOf(fingerprint: string): string[] {
    return deriveBlocks(fingerprint, this.shape);
  }

  admit(key: number, fingerprint: string): void {
    this.store.deleteBlocks(key);
    this.store.insertBlocks(key, this.blocksOf(fingerprint));
  }

  candidates(fingerprint: string): Set<number> {
    return new Set(this.store.queryBlocks(this.blocksOf(fingerprint)));
  }

  evict(key: number): void {
    this.store.deleteBlocks(key);
  }
}
