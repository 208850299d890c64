import { basename, extname } from 'node:path';

export interface ParsedTrackFilename {
  trackNumber: number | null;
  artist: string | null;
  title: string | null;
}

const NOISE_PATTERNS = [
  /\[.*?\]/g,
  /\{.*?\}/g,
  /\b(320|256|192|128)\s*k(bps)?\b/gi,
  /\b(hq|official audio|lyrics?)\b/gi,
];

const TRACK_NUMBER_PATTERN = /^(\d{1,3})(?:[.\-_\s]+)/;

const SEPARATORS = [' - ', ' – ', ' — ', ' _ '];

function clean(value: string): string | null {
  let cleaned = value;

  for (const pattern of NOISE_PATTERNS) {
    cleaned = cleaned.replace(pattern, ' ');
  }

  cleaned = cleaned.replace(/_/g, ' ').replace(/\s+/g, ' ').trim();

  return cleaned || null;
}

/**
 * Guesses track number, artist and title from names like
 * "03 - Artist - Title.flac", "03. Title.mp3" or "Artist - Title.m4a".
 */
export function parseTrackFilename(filePath: string): ParsedTrackFilename {
  const filename = basename(filePath, extname(filePath));
  let rest = filename;
  let trackNumber: number | null = null;

  const numbered = TRACK_NUMBER_PATTERN.exec(rest);

  if (numbered) {
    trackNumber = parseInt(numbered[1], 10);
    rest = rest.slice(numbered[0].length);
  }

  for (const separator of SEPARATORS) {
    const index = rest.indexOf(separator);

    if (index === -1) {
      continue;
    }

    return {
      trackNumber,
      artist: clean(rest.slice(0, index)),
      title: clean(rest.slice(index + separator.length)),
    };
  }

  return { trackNumber, artist: null, title: clean(rest) };
}
