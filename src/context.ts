import type { MatchingConfig } from './types.js';
import { FingerprintIndex } from './fingerprint-index.js';
import type { Logger } from './logger.js';
import { MatchResolver } from './resolver.js';
import { SelectionContext } from './selection.js';
import type { LibraryStore } from './store.js';

/**
 * Everything one scan mutates or reads. Nothing here is global, so two
 * scans with separate contexts never see each other's state.
 */
export interface EngineContext {
  matching: MatchingConfig;
  store: LibraryStore;
  index: FingerprintIndex;
  resolver: MatchResolver;
  selection: SelectionContext;
  logger: Logger;
}

export function createEngineContext(
  matching: MatchingConfig,
  store: LibraryStore,
  logger: Logger
): EngineContext {
  const index = new FingerprintIndex(store, {
    blockSize: matching.blockSize,
    blockCount: matching.blockCount,
  });

  return {
    matching,
    store,
    index,
    resolver: new MatchResolver(index, store, matching.minSimilarity, logger),
    selection: new SelectionContext(),
    logger,
  };
}
