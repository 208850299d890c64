import type { QualityInput, TieBreak } from './types.js';

export const LOSSLESS_FORMATS = new Set(['flac', 'wav', 'aiff', 'aif', 'alac', 'ape', 'wv']);

const TIER_WEIGHT = 10_000_000_000_000;
const BIT_DEPTH_WEIGHT = 10_000_000_000;
const SAMPLE_RATE_WEIGHT = 10_000;

const MAX_BIT_DEPTH = 99;
const MAX_SAMPLE_RATE = 999_999;
const MAX_BITRATE_KBPS = 9_999;

export function normalizeFormat(format: string | null): string {
  if (!format) {
    return '';
  }

  return format.trim().toLowerCase().replace(/^\./, '');
}

export function isLossless(format: string | null): boolean {
  return LOSSLESS_FORMATS.has(normalizeFormat(format));
}

function clampField(value: number | null, max: number): number {
  if (value === null || !Number.isFinite(value) || value <= 0) {
    return 0;
  }

  return Math.min(Math.floor(value), max);
}

/**
 * Collapses the technical properties of a file into one integer.
 * Each weight is larger than the biggest possible sum of the finer
 * terms below it: lossless tier, then bit depth, sample rate (Hz)
 * and bitrate (kbps).
 */
export function qualityScore(input: QualityInput): number {
  const tier = isLossless(input.format) ? 2 : 1;

  return (
    tier * TIER_WEIGHT +
    clampField(input.bitDepth, MAX_BIT_DEPTH) * BIT_DEPTH_WEIGHT +
    clampField(input.sampleRate, MAX_SAMPLE_RATE) * SAMPLE_RATE_WEIGHT +
    clampField(input.bitrate, MAX_BITRATE_KBPS)
  );
}

/** True when the incoming file should replace the stored one. */
export function incomingWins(newScore: number, storedScore: number, tieBreak: TieBreak): boolean {
  if (newScore === storedScore) {
    return tieBreak === 'prefer-new';
  }

  return newScore > storedScore;
}
