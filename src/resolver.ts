import type { AlbumRef, MatchCandidate, TrackRecord } from './types.js';
import type { FingerprintIndex } from './fingerprint-index.js';
import type { Logger } from './logger.js';
import { IndexCorruption } from './errors.js';
import { similarity } from './similarity.js';

export interface RecordSource {
  getRecord(id: number): TrackRecord | null;
  albumsFor(id: number): AlbumRef[];
}

export interface ResolveOptions {
  excludeKeys?: Iterable<number>;
  albumId?: string | null;
}

export function compareCandidates(a: MatchCandidate, b: MatchCandidate): number {
  if (a.owned !== b.owned) {
    return a.owned ? -1 : 1;
  }

  if (a.similarity !== b.similarity) {
    return b.similarity - a.similarity;
  }

  return a.key - b.key;
}

export class MatchResolver {
  constructor(
    private readonly index: FingerprintIndex,
    private readonly records: RecordSource,
    private readonly minSimilarity: number,
    private readonly logger: Logger
  ) {}

  /**
   * Ranked historical matches for a fingerprint. Candidates on the
   * requested album come first, then by similarity.
   */
  resolve(fingerprint: string, options: ResolveOptions = {}): MatchCandidate[] {
    const excluded = new Set(options.excludeKeys ?? []);
    const albumId = options.albumId ?? null;
    const matches: MatchCandidate[] = [];

    for (const key of this.index.candidates(fingerprint)) {
      if (excluded.has(key)) {
        continue;
      }

      const record = this.records.getRecord(key);

      if (!record) {
        this.heal(new IndexCorruption(key));
        continue;
      }

      const score = similarity(fingerprint, record.fingerprint);

      if (score < this.minSimilarity) {
        continue;
      }

      const albums = this.records.albumsFor(key);

      matches.push({
        key,
        similarity: score,
        owned: albumId !== null && albums.some((album) => album.releaseId === albumId),
        record,
        albums,
      });
    }

    return matches.sort(compareCandidates);
  }

  private heal(corruption: IndexCorruption): void {
    this.logger.warn(`${corruption.message}; dropping its blocks`);
    this.index.evict(corruption.recordKey);
  }
}
