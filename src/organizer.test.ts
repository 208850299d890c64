import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import { existsSync } from 'fs';
import path from 'path';
import os from 'os';
import trash from 'trash';
import type { TrackTags } from './types.js';
import { LibraryOrganizer, buildTrackFilename, sanitizeName, uniqueTarget } from './organizer.js';

vi.mock('trash', () => ({ default: vi.fn(async () => undefined) }));

const TAGS: TrackTags = {
  title: 'Song',
  artist: 'Artist',
  albumArtist: 'Artist',
  album: { releaseId: 'rel-1', artist: 'Artist', title: 'Album' },
  trackNumber: 1,
  discNumber: null,
};

describe('sanitizeName', () => {
  it('should strip characters that are not allowed in file names', () => {
    expect(sanitizeName('AC/DC: Live?')).toBe('ACDC Live');
  });

  it('should fall back to Unknown', () => {
    expect(sanitizeName(null)).toBe('Unknown');
    expect(sanitizeName('   ')).toBe('Unknown');
    expect(sanitizeName('???')).toBe('Unknown');
  });

  it('should cap the length', () => {
    expect(sanitizeName('a'.repeat(150))).toHaveLength(100);
  });
});

describe('buildTrackFilename', () => {
  it('should pad the track number', () => {
    expect(buildTrackFilename({ ...TAGS, trackNumber: 3 }, '.flac')).toBe('03 - Song.flac');
  });

  it('should leave out a missing track number', () => {
    expect(buildTrackFilename({ ...TAGS, trackNumber: null }, '.mp3')).toBe('Song.mp3');
  });
});

describe('uniqueTarget', () => {
  it('should add a numbered suffix until the name is free', () => {
    const taken = new Set(['/lib/Song.mp3', '/lib/Song_01.mp3']);

    expect(uniqueTarget('/lib/Song.mp3', (p) => taken.has(p))).toBe('/lib/Song_02.mp3');
    expect(uniqueTarget('/lib/Other.mp3', (p) => taken.has(p))).toBe('/lib/Other.mp3');
  });
});

describe('LibraryOrganizer', () => {
  let tempDir: string;
  let libraryRoot: string;
  let duplicatesDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'audio-dedupe-organizer-'));
    libraryRoot = path.join(tempDir, 'library');
    duplicatesDir = path.join(tempDir, 'duplicates');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function createFile(name: string): Promise<string> {
    const filePath = path.join(tempDir, 'incoming', name);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, 'audio');
    return filePath;
  }

  function organizer(overrides: Partial<ConstructorParameters<typeof LibraryOrganizer>[0]> = {}) {
    return new LibraryOrganizer({
      libraryRoot,
      duplicatesDir,
      loserPolicy: 'archive',
      dryRun: false,
      ...overrides,
    });
  }

  describe('fileWinner', () => {
    it('should move the file into artist and album folders', async () => {
      const source = await createFile('track.MP3');

      const target = await organizer().fileWinner(source, TAGS);

      expect(target).toBe(path.join(libraryRoot, 'Artist', 'Album', '01 - Song.mp3'));
      expect(existsSync(target)).toBe(true);
      expect(existsSync(source)).toBe(false);
    });

    it('should not overwrite a file already at the target', async () => {
      const existing = path.join(libraryRoot, 'Artist', 'Album', '01 - Song.mp3');
      await fs.mkdir(path.dirname(existing), { recursive: true });
      await fs.writeFile(existing, 'older');
      const source = await createFile('track.mp3');

      const target = await organizer().fileWinner(source, TAGS);

      expect(target).toBe(path.join(libraryRoot, 'Artist', 'Album', '01 - Song_01.mp3'));
      expect(await fs.readFile(existing, 'utf-8')).toBe('older');
    });

    it('should avoid paths another record owns', async () => {
      const claimed = path.join(libraryRoot, 'Artist', 'Album', '01 - Song.mp3');
      const source = await createFile('track.mp3');

      const target = await organizer({ isPathClaimed: (p) => p === claimed }).fileWinner(
        source,
        TAGS
      );

      expect(target).toBe(path.join(libraryRoot, 'Artist', 'Album', '01 - Song_01.mp3'));
    });

    it('should take over the path of the record it replaces', async () => {
      const claimed = path.join(libraryRoot, 'Artist', 'Album', '01 - Song.mp3');
      const source = await createFile('track.mp3');
      const isPathClaimed = (p: string, exceptKey?: number) => p === claimed && exceptKey !== 7;

      const target = await organizer({ isPathClaimed }).fileWinner(source, TAGS, 7);

      expect(target).toBe(claimed);
    });

    it('should use Unknown Album when the album is missing', async () => {
      const source = await createFile('track.mp3');

      const target = await organizer().fileWinner(source, { ...TAGS, album: null });

      expect(target).toBe(path.join(libraryRoot, 'Artist', 'Unknown Album', '01 - Song.mp3'));
    });

    it('should leave the file alone without a library root or usable tags', async () => {
      const source = await createFile('track.mp3');

      expect(await organizer({ libraryRoot: null }).fileWinner(source, TAGS)).toBe(source);
      expect(await organizer().fileWinner(source, null)).toBe(source);
      expect(await organizer().fileWinner(source, { ...TAGS, title: null })).toBe(source);
      expect(existsSync(source)).toBe(true);
    });

    it('should not touch the file in a dry run', async () => {
      const source = await createFile('track.mp3');

      const target = await organizer({ dryRun: true }).fileWinner(source, TAGS);

      expect(target).toBe(source);
      expect(existsSync(source)).toBe(true);
    });
  });

  describe('archiveLoser', () => {
    it('should move the file into the duplicates folder', async () => {
      const source = await createFile('track.mp3');

      const target = await organizer().archiveLoser(source);

      expect(target).toBe(path.join(duplicatesDir, 'track.mp3'));
      expect(existsSync(target)).toBe(true);
      expect(existsSync(source)).toBe(false);
    });

    it('should number archived files with the same name', async () => {
      const first = await createFile('track.mp3');
      await organizer().archiveLoser(first);
      const second = await createFile('track.mp3');

      const target = await organizer().archiveLoser(second);

      expect(target).toBe(path.join(duplicatesDir, 'track_01.mp3'));
    });

    it('should trash the file and give its record a marker path', async () => {
      const source = await createFile('track.mp3');
      const isPathClaimed = (p: string) => p === `trash:${source}`;

      const target = await organizer({ loserPolicy: 'trash', isPathClaimed }).archiveLoser(source);

      expect(trash).toHaveBeenCalledWith(source);
      expect(target).toBe(`trash:${path.join(tempDir, 'incoming', 'track_01.mp3')}`);
    });

    it('should return the path unchanged when the file is gone', async () => {
      const missing = path.join(tempDir, 'incoming', 'gone.mp3');

      expect(await organizer().archiveLoser(missing)).toBe(missing);
    });

    it('should not touch the file in a dry run', async () => {
      const source = await createFile('track.mp3');

      expect(await organizer({ dryRun: true }).archiveLoser(source)).toBe(source);
      expect(existsSync(source)).toBe(true);
    });
  });
});
