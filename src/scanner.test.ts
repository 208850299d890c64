import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { discoverAudioFiles, walkAudioFiles } from './scanner.js';

describe('scanner', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'audio-dedupe-scanner-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function touch(relative: string): Promise<string> {
    const filePath = path.join(tempDir, relative);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, 'audio');
    return filePath;
  }

  describe('walkAudioFiles', () => {
    it('should find audio files recursively by extension', async () => {
      const song = await touch('Artist/Album/01 - Song.FLAC');
      const other = await touch('loose.mp3');
      await touch('Artist/Album/cover.jpg');
      const found: string[] = [];

      await walkAudioFiles(tempDir, new Set(['mp3', 'flac']), new Set(), (p) => found.push(p));

      expect(found.sort()).toEqual([song, other].sort());
    });

    it('should skip excluded directories', async () => {
      const kept = await touch('keep/song.mp3');
      await touch('.git/objects/song.mp3');
      const found: string[] = [];

      await walkAudioFiles(tempDir, new Set(['mp3']), new Set(['.git']), (p) => found.push(p));

      expect(found).toEqual([kept]);
    });
  });

  describe('discoverAudioFiles', () => {
    it('should never return files from the duplicates folder', async () => {
      const kept = await touch('music/song.mp3');
      await touch('music/duplicates/song.mp3');

      const result = await discoverAudioFiles([tempDir], {
        extensions: ['mp3'],
        excludePatterns: [],
        duplicatesDir: path.join(tempDir, 'music', 'duplicates'),
      });

      expect(result.files).toEqual([kept]);
    });

    it('should list each file once, sorted', async () => {
      const b = await touch('b.mp3');
      const a = await touch('a.mp3');

      const result = await discoverAudioFiles([tempDir, tempDir], {
        extensions: ['mp3'],
        excludePatterns: [],
        duplicatesDir: path.join(tempDir, 'duplicates'),
      });

      expect(result.files).toEqual([a, b]);
    });

    it('should report scan roots that do not exist', async () => {
      const song = await touch('music/song.mp3');
      const gone = path.join(tempDir, 'gone');

      const result = await discoverAudioFiles([gone, path.join(tempDir, 'music')], {
        extensions: ['mp3'],
        excludePatterns: [],
        duplicatesDir: path.join(tempDir, 'duplicates'),
      });

      expect(result.missing).toEqual([gone]);
      expect(result.files).toEqual([song]);
    });
  });
});
