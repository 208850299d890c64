import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import type { AlbumRef, TrackRecord, TrackRecordInput } from './types.js';

interface TrackRow {
  id: number;
  path: string;
  fingerprint: string;
  duration: number | null;
  quality_score: number | null;
  format: string | null;
  bitrate: number | null;
  sample_rate: number | null;
  bit_depth: number | null;
  file_size: number | null;
  mtime_ms: number | null;
  is_duplicate: number;
  updated_at: string;
}

interface AlbumRow {
  release_id: string;
  artist: string | null;
  title: string | null;
}

export interface LibraryStats {
  uniqueTracks: number;
  uniqueBytes: number;
  duplicateTracks: number;
  duplicateBytes: number;
  formats: Array<{ format: string; count: number }>;
}

export interface ExportRow extends TrackRecord {
  releaseIds: string[];
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS tracks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    path TEXT NOT NULL UNIQUE,
    fingerprint TEXT NOT NULL,
    duration REAL,
    quality_score INTEGER NOT NULL DEFAULT 0,
    format TEXT,
    bitrate INTEGER,
    sample_rate INTEGER,
    bit_depth INTEGER,
    file_size INTEGER,
    mtime_ms REAL,
    is_duplicate INTEGER NOT NULL DEFAULT 0,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS fingerprint_blocks (
    block TEXT NOT NULL,
    track_id INTEGER NOT NULL REFERENCES tracks(id) ON DELETE CASCADE
  );
  CREATE INDEX IF NOT EXISTS idx_fingerprint_blocks_block ON fingerprint_blocks(block);
  CREATE INDEX IF NOT EXISTS idx_fingerprint_blocks_track ON fingerprint_blocks(track_id);

  CREATE TABLE IF NOT EXISTS albums (
    release_id TEXT PRIMARY KEY,
    artist TEXT,
    title TEXT
  );

  CREATE TABLE IF NOT EXISTS track_albums (
    track_id INTEGER NOT NULL REFERENCES tracks(id) ON DELETE CASCADE,
    release_id TEXT NOT NULL REFERENCES albums(release_id),
    PRIMARY KEY (track_id, release_id)
  );

  CREATE TABLE IF NOT EXISTS distinct_pairs (
    track_id INTEGER NOT NULL REFERENCES tracks(id) ON DELETE CASCADE,
    other_id INTEGER NOT NULL REFERENCES tracks(id) ON DELETE CASCADE,
    PRIMARY KEY (track_id, other_id)
  );
`;

function toRecord(row: TrackRow): TrackRecord {
  return {
    id: row.id,
    path: row.path,
    fingerprint: row.fingerprint,
    duration: row.duration,
    qualityScore: row.quality_score ?? 0,
    format: row.format,
    bitrate: row.bitrate,
    sampleRate: row.sample_rate,
    bitDepth: row.bit_depth,
    fileSize: row.file_size,
    modTime: row.mtime_ms,
    isDuplicate: row.is_duplicate === 1,
    updatedAt: row.updated_at,
  };
}

function toAlbum(row: AlbumRow): AlbumRef {
  return { releaseId: row.release_id, artist: row.artist, title: row.title };
}

/**
 * SQLite persistence for track records, their fingerprint blocks, album
 * links and operator-declared distinct pairs. All methods are synchronous;
 * wrap related writes in `transaction` so they commit together.
 */
export class LibraryStore {
  readonly db: Database.Database;

  constructor(databasePath: string) {
    if (databasePath !== ':memory:') {
      mkdirSync(dirname(databasePath), { recursive: true });
    }

    this.db = new Database(databasePath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.exec(SCHEMA);
  }

  transaction<T>(work: () => T): T {
    return this.db.transaction(work)();
  }

  /**
   * Runs `work` inside one outer transaction that is always rolled back.
   * Writes made meanwhile (including nested `transaction` calls, which
   * become savepoints) are visible to `work` and gone afterwards.
   */
  async rehearse<T>(work: () => Promise<T>): Promise<T> {
    this.db.exec('BEGIN');

    try {
      return await work();
    } finally {
      if (this.db.inTransaction) {
        this.db.exec('ROLLBACK');
      }
    }
  }

  getRecord(id: number): TrackRecord | null {
    const row = this.db.prepare<[number], TrackRow>('SELECT * FROM tracks WHERE id = ?').get(id);
    return row ? toRecord(row) : null;
  }

  getRecordByPath(path: string): TrackRecord | null {
    const row = this.db
      .prepare<[string], TrackRow>('SELECT * FROM tracks WHERE path = ?')
      .get(path);
    return row ? toRecord(row) : null;
  }

  upsertRecord(input: TrackRecordInput): TrackRecord {
    const { stats } = input;
    const row = this.db
      .prepare<
        [string, string, number | null, number, string, number | null, number | null, number | null, number, number, number, string],
        TrackRow
      >(
        `INSERT INTO tracks
           (path, fingerprint, duration, quality_score, format, bitrate, sample_rate,
            bit_depth, file_size, mtime_ms, is_duplicate, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(path) DO UPDATE SET
           fingerprint = excluded.fingerprint,
           duration = excluded.duration,
           quality_score = excluded.quality_score,
           format = excluded.format,
           bitrate = excluded.bitrate,
           sample_rate = excluded.sample_rate,
           bit_depth = excluded.bit_depth,
           file_size = excluded.file_size,
           mtime_ms = excluded.mtime_ms,
           is_duplicate = excluded.is_duplicate,
           updated_at = excluded.updated_at
         RETURNING *`
      )
      .get(
        input.path,
        input.fingerprint,
        input.duration,
        input.qualityScore,
        stats.format,
        stats.bitrate,
        stats.sampleRate,
        stats.bitDepth,
        stats.fileSize,
        input.modTime,
        input.isDuplicate ? 1 : 0,
        new Date().toISOString()
      );

    if (!row) {
      throw new Error(`Upsert returned no row for ${input.path}`);
    }

    return toRecord(row);
  }

  /** Flags a record as duplicate (or not) and optionally points it at a new path. */
  markDuplicate(id: number, isDuplicate: boolean, path?: string): void {
    const now = new Date().toISOString();

    if (path === undefined) {
      this.db
        .prepare('UPDATE tracks SET is_duplicate = ?, updated_at = ? WHERE id = ?')
        .run(isDuplicate ? 1 : 0, now, id);
      return;
    }

    this.db
      .prepare('UPDATE tracks SET is_duplicate = ?, path = ?, updated_at = ? WHERE id = ?')
      .run(isDuplicate ? 1 : 0, path, now, id);
  }

  updatePath(id: number, path: string): void {
    this.db
      .prepare('UPDATE tracks SET path = ?, updated_at = ? WHERE id = ?')
      .run(path, new Date().toISOString(), id);
  }

  setModTime(id: number, modTime: number): void {
    this.db.prepare('UPDATE tracks SET mtime_ms = ? WHERE id = ?').run(modTime, id);
  }

  deleteRecord(id: number): void {
    this.db.prepare('DELETE FROM tracks WHERE id = ?').run(id);
  }

  isPathTaken(path: string, exceptId?: number): boolean {
    const row = this.db
      .prepare<[string], { id: number }>('SELECT id FROM tracks WHERE path = ?')
      .get(path);
    return row !== undefined && row.id !== exceptId;
  }

  deleteBlocks(id: number): void {
    this.db.prepare('DELETE FROM fingerprint_blocks WHERE track_id = ?').run(id);
  }

  insertBlocks(id: number, blocks: string[]): void {
    const insert = this.db.prepare('INSERT INTO fingerprint_blocks (block, track_id) VALUES (?, ?)');

    for (const block of blocks) {
      insert.run(block, id);
    }
  }

  queryBlocks(blocks: string[]): number[] {
    if (blocks.length === 0) {
      return [];
    }

    const placeholders = blocks.map(() => '?').join(',');
    const rows = this.db
      .prepare<string[], { track_id: number }>(
        `SELECT DISTINCT track_id FROM fingerprint_blocks WHERE block IN (${placeholders}) ORDER BY track_id`
      )
      .all(...blocks);

    return rows.map((row) => row.track_id);
  }

  blocksFor(id: number): string[] {
    return this.db
      .prepare<[number], { block: string }>('SELECT block FROM fingerprint_blocks WHERE track_id = ?')
      .all(id)
      .map((row) => row.block);
  }

  linkAlbum(id: number, album: AlbumRef): void {
    this.db
      .prepare(
        `INSERT INTO albums (release_id, artist, title) VALUES (?, ?, ?)
         ON CONFLICT(release_id) DO UPDATE SET
           artist = COALESCE(excluded.artist, albums.artist),
           title = COALESCE(excluded.title, albums.title)`
      )
      .run(album.releaseId, album.artist, album.title);

    this.db
      .prepare('INSERT OR IGNORE INTO track_albums (track_id, release_id) VALUES (?, ?)')
      .run(id, album.releaseId);
  }

  albumsFor(id: number): AlbumRef[] {
    return this.db
      .prepare<[number], AlbumRow>(
        `SELECT a.release_id, a.artist, a.title
           FROM track_albums ta
           JOIN albums a ON a.release_id = ta.release_id
          WHERE ta.track_id = ?
          ORDER BY a.release_id`
      )
      .all(id)
      .map(toAlbum);
  }

  addDistinctPair(id: number, otherId: number): void {
    const insert = this.db.prepare('INSERT OR IGNORE INTO distinct_pairs (track_id, other_id) VALUES (?, ?)');
    insert.run(id, otherId);
    insert.run(otherId, id);
  }

  distinctPeers(id: number): number[] {
    return this.db
      .prepare<[number], { other_id: number }>('SELECT other_id FROM distinct_pairs WHERE track_id = ?')
      .all(id)
      .map((row) => row.other_id);
  }

  /** Duplicate records, most recently updated first. */
  listDuplicates(): TrackRecord[] {
    return this.db
      .prepare<[], TrackRow>('SELECT * FROM tracks WHERE is_duplicate = 1 ORDER BY updated_at DESC, id DESC')
      .all()
      .map(toRecord);
  }

  listForExport(): ExportRow[] {
    const rows = this.db.prepare<[], TrackRow>('SELECT * FROM tracks ORDER BY path').all();

    return rows.map((row) => ({
      ...toRecord(row),
      releaseIds: this.albumsFor(row.id).map((album) => album.releaseId),
    }));
  }

  stats(): LibraryStats {
    const totals = this.db
      .prepare<[], { is_duplicate: number; count: number; bytes: number | null }>(
        'SELECT is_duplicate, COUNT(*) AS count, SUM(file_size) AS bytes FROM tracks GROUP BY is_duplicate'
      )
      .all();

    const unique = totals.find((row) => row.is_duplicate === 0);
    const duplicate = totals.find((row) => row.is_duplicate === 1);

    const formats = this.db
      .prepare<[], { format: string | null; count: number }>(
        `SELECT format, COUNT(*) AS count FROM tracks
          WHERE is_duplicate = 0
          GROUP BY format
          ORDER BY count DESC, format`
      )
      .all()
      .map((row) => ({ format: row.format ?? 'unknown', count: row.count }));

    return {
      uniqueTracks: unique?.count ?? 0,
      uniqueBytes: unique?.bytes ?? 0,
      duplicateTracks: duplicate?.count ?? 0,
      duplicateBytes: duplicate?.bytes ?? 0,
      formats,
    };
  }

  close(): void {
    this.db.close();
  }
}
