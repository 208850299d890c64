import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { exportLibraryCsv, renderLibraryCsv } from './report.js';
import { LibraryStore } from './store.js';
import { makeRecord, makeRecordInput } from './test-helpers.js';

const HEADER =
  'path,quality_score,format,bitrate,sample_rate,bit_depth,file_size,mtime,is_duplicate,release_ids,fingerprint';

describe('renderLibraryCsv', () => {
  it('should write a header and one line per record', () => {
    const csv = renderLibraryCsv([
      {
        ...makeRecord(1, {
          path: '/music/a.flac',
          qualityScore: 20160441000000,
          format: 'flac',
          bitrate: 900,
          bitDepth: 16,
          modTime: 0,
        }),
        releaseIds: ['rel-1', 'rel-2'],
      },
    ]);

    expect(csv.split('\n')).toEqual([
      HEADER,
      '/music/a.flac,20160441000000,flac,900,44100,16,1000,1970-01-01T00:00:00.000Z,0,rel-1;rel-2,AQAD',
      '',
    ]);
  });

  it('should leave unknown values empty and quote awkward paths', () => {
    const csv = renderLibraryCsv([
      {
        ...makeRecord(2, {
          path: '/music/Hello, World.mp3',
          format: null,
          bitrate: null,
          sampleRate: null,
          fileSize: null,
          modTime: null,
          isDuplicate: true,
        }),
        releaseIds: [],
      },
    ]);

    expect(csv.split('\n')[1]).toBe('"/music/Hello, World.mp3",100,,,,,,,1,,AQAD');
  });
});

describe('exportLibraryCsv', () => {
  let tempDir: string;
  let store: LibraryStore;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'audio-dedupe-report-'));
    store = new LibraryStore(':memory:');
  });

  afterEach(async () => {
    store.close();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should write every record to the file', async () => {
    store.upsertRecord(makeRecordInput('/music/b.mp3', 'AQAE'));
    store.upsertRecord(makeRecordInput('/music/a.mp3', 'AQAD'));
    const outputPath = path.join(tempDir, 'out', 'library.csv');

    const count = await exportLibraryCsv(store, outputPath);
    const lines = (await fs.readFile(outputPath, 'utf-8')).trim().split('\n');

    expect(count).toBe(2);
    expect(lines[0]).toBe(HEADER);
    expect(lines.slice(1).map((line) => line.split(',')[0])).toEqual(['/music/a.mp3', '/music/b.mp3']);
  });
});
