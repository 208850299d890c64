import { stat } from 'node:fs/promises';
import { extname } from 'node:path';
import { parseFile } from 'music-metadata';
import type { IAudioMetadata, ICommonTagsResult } from 'music-metadata';
import type { AlbumRef, AudioStats, FileProbe, TrackTags } from './types.js';
import { LOSSLESS_FORMATS } from './quality.js';
import { parseTrackFilename } from './parser.js';

export interface StatsExtractor {
  extract(filePath: string): Promise<AudioStats | null>;
}

export interface MetadataResolver {
  resolve(filePath: string): Promise<TrackTags | null>;
}

export async function probeFile(filePath: string): Promise<FileProbe | null> {
  try {
    const fileStats = await stat(filePath);

    if (!fileStats.isFile()) {
      return null;
    }

    return { size: fileStats.size, mtimeMs: fileStats.mtimeMs };
  } catch {
    return null;
  }
}

/**
 * Container extension, unless the decoder reports a lossless codec the
 * extension does not reveal (ALAC inside .m4a).
 */
export function resolveFormat(filePath: string, metadata: IAudioMetadata): string {
  const extension = extname(filePath).slice(1).toLowerCase();

  if (LOSSLESS_FORMATS.has(extension) || !metadata.format.lossless) {
    return extension;
  }

  const codec = metadata.format.codec?.toLowerCase() ?? '';

  return LOSSLESS_FORMATS.has(codec) ? codec : 'alac';
}

function normalizeKey(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

export function albumFromTags(
  album: string | null,
  albumArtist: string | null,
  releaseId: string | null
): AlbumRef | null {
  if (!album) {
    return null;
  }

  return {
    releaseId: releaseId ?? `local:${normalizeKey(albumArtist ?? '')}|${normalizeKey(album)}`,
    artist: albumArtist,
    title: album,
  };
}

function embeddedArtist(common: ICommonTagsResult, filePath: string): string | null {
  return common.artist ?? common.artists?.[0] ?? parseTrackFilename(filePath).artist;
}

export function embeddedAlbum(common: ICommonTagsResult, filePath: string): AlbumRef | null {
  const albumArtist = common.albumartist ?? embeddedArtist(common, filePath);

  return albumFromTags(common.album ?? null, albumArtist, common.musicbrainz_albumid ?? null);
}

export async function extractStats(filePath: string): Promise<AudioStats | null> {
  try {
    const [fileStats, metadata] = await Promise.all([
      stat(filePath),
      parseFile(filePath, { duration: false, skipCovers: true }),
    ]);

    return {
      format: resolveFormat(filePath, metadata),
      album: embeddedAlbum(metadata.common, filePath),
      bitrate: metadata.format.bitrate ? Math.round(metadata.format.bitrate / 1000) : null,
      sampleRate: metadata.format.sampleRate ?? null,
      bitDepth: metadata.format.bitsPerSample ?? null,
      fileSize: fileStats.size,
      modTime: fileStats.mtimeMs,
    };
  } catch {
    return null;
  }
}

export const musicMetadataStats: StatsExtractor = { extract: extractStats };

/**
 * Reads the tags already embedded in the file. When artist or title are
 * missing, falls back to what the filename suggests.
 */
export class EmbeddedTagResolver implements MetadataResolver {
  async resolve(filePath: string): Promise<TrackTags | null> {
    const metadata = await parseFile(filePath, { duration: false, skipCovers: true });
    const { common } = metadata;
    const parsed = parseTrackFilename(filePath);

    const artist = embeddedArtist(common, filePath);
    const title = common.title ?? parsed.title;

    if (!artist && !title) {
      return null;
    }

    return {
      title,
      artist,
      albumArtist: common.albumartist ?? artist,
      album: embeddedAlbum(common, filePath),
      trackNumber: common.track.no ?? parsed.trackNumber,
      discNumber: common.disk.no,
    };
  }
}

export function formatFileSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }

  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(1)} KB`;
  }

  if (bytes < 1024 * 1024 * 1024) {
    return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  }

  return `${(bytes / (1024 * 1024 * 1024)).toFixed(2)} GB`;
}

export function formatDuration(seconds: number | null): string {
  if (seconds === null) {
    return 'unknown';
  }

  const mins = Math.floor(seconds / 60);
  const secs = Math.floor(seconds % 60);

  return `${mins}:${secs.toString().padStart(2, '0')}`;
}

export function describeStats(stats: AudioStats): string {
  const parts = [stats.format.toUpperCase() || '?'];

  if (stats.bitDepth) {
    parts.push(`${stats.bitDepth}-bit`);
  }

  if (stats.sampleRate) {
    parts.push(`${(stats.sampleRate / 1000).toFixed(1)}kHz`);
  }

  if (stats.bitrate) {
    parts.push(`${stats.bitrate}kbps`);
  }

  parts.push(formatFileSize(stats.fileSize));

  return parts.join(' | ');
}
