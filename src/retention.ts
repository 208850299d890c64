import type { FingerprintIndex } from './fingerprint-index.js';
import type { LibraryStore } from './store.js';

/**
 * Keeps the `maxGhosts` most recently updated duplicate records and purges
 * the rest, blocks included. `null` keeps everything. Returns the number
 * of records removed.
 */
export function pruneGhosts(
  store: LibraryStore,
  index: FingerprintIndex,
  maxGhosts: number | null
): number {
  if (maxGhosts === null) {
    return 0;
  }

  const excess = store.listDuplicates().slice(maxGhosts);

  store.transaction(() => {
    for (const ghost of excess) {
      index.evict(ghost.id);
      store.deleteRecord(ghost.id);
    }
  });

  return excess.length;
}
