import type { AudioStats, TrackRecord, TrackRecordInput } from './types.js';

export function makeStats(overrides: Partial<AudioStats> = {}): AudioStats {
  return {
    format: 'mp3',
    bitDepth: null,
    sampleRate: 44100,
    bitrate: 320,
    fileSize: 1000,
    modTime: 1,
    ...overrides,
  };
}

export function makeRecordInput(
  path: string,
  fingerprint: string,
  overrides: Partial<TrackRecordInput> = {}
): TrackRecordInput {
  return {
    path,
    fingerprint,
    duration: 200,
    qualityScore: 100,
    stats: makeStats(),
    modTime: 1,
    isDuplicate: false,
    ...overrides,
  };
}

export function makeRecord(id: number, overrides: Partial<TrackRecord> = {}): TrackRecord {
  return {
    id,
    path: `/music/${id}.mp3`,
    fingerprint: 'AQAD',
    duration: 200,
    qualityScore: 100,
    format: 'mp3',
    bitrate: 320,
    sampleRate: 44100,
    bitDepth: null,
    fileSize: 1000,
    modTime: 1,
    isDuplicate: false,
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}
