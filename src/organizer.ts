import { existsSync } from 'node:fs';
import { copyFile, mkdir, rename, unlink } from 'node:fs/promises';
import { basename, dirname, extname, join, resolve } from 'node:path';
import trash from 'trash';
import type { LoserPolicy, TrackTags } from './types.js';

export interface FileEffects {
  /**
   * Moves a kept file into the organized tree; returns where it ended up.
   * `replacingKey` is the record being displaced, whose path is free to take.
   */
  fileWinner(filePath: string, tags: TrackTags | null, replacingKey?: number): Promise<string>;
  /** Gets a losing file out of the library; returns the path its record should keep. */
  archiveLoser(filePath: string): Promise<string>;
}

export interface OrganizerOptions {
  libraryRoot: string | null;
  duplicatesDir: string;
  loserPolicy: LoserPolicy;
  dryRun: boolean;
  isPathClaimed?: (path: string, exceptKey?: number) => boolean;
}

const ILLEGAL_CHARACTERS = /[\\/*?:"<>|]/g;
const MAX_NAME_LENGTH = 100;

export const TRASH_MARKER = 'trash:';

export function sanitizeName(text: string | null): string {
  if (!text) {
    return 'Unknown';
  }

  const cleaned = text.replace(ILLEGAL_CHARACTERS, '').trim().slice(0, MAX_NAME_LENGTH).trim();

  return cleaned || 'Unknown';
}

export function buildTrackFilename(tags: TrackTags, extension: string): string {
  const title = sanitizeName(tags.title);

  if (tags.trackNumber === null) {
    return `${title}${extension}`;
  }

  return `${String(tags.trackNumber).padStart(2, '0')} - ${title}${extension}`;
}

/**
 * First free variant of `target`: the name itself, then `name_01.ext`,
 * `name_02.ext`, ...
 */
export function uniqueTarget(target: string, isTaken: (path: string) => boolean): string {
  if (!isTaken(target)) {
    return target;
  }

  const extension = extname(target);
  const stem = basename(target, extension);
  const dir = dirname(target);

  for (let counter = 1; ; counter++) {
    const candidate = join(dir, `${stem}_${String(counter).padStart(2, '0')}${extension}`);

    if (!isTaken(candidate)) {
      return candidate;
    }
  }
}

async function moveFile(source: string, target: string): Promise<void> {
  await mkdir(dirname(target), { recursive: true });

  try {
    await rename(source, target);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'EXDEV') {
      throw error;
    }

    await copyFile(source, target);
    await unlink(source);
  }
}

export class LibraryOrganizer implements FileEffects {
  constructor(private readonly options: OrganizerOptions) {}

  private isTaken(path: string, exceptKey?: number): boolean {
    return existsSync(path) || (this.options.isPathClaimed?.(path, exceptKey) ?? false);
  }

  targetFor(filePath: string, tags: TrackTags | null): string | null {
    const { libraryRoot } = this.options;

    if (!libraryRoot || !tags || !tags.title || !(tags.albumArtist ?? tags.artist)) {
      return null;
    }

    const artistDir = sanitizeName(tags.albumArtist ?? tags.artist);
    const albumDir = sanitizeName(tags.album?.title ?? 'Unknown Album');
    const filename = buildTrackFilename(tags, extname(filePath).toLowerCase());

    return join(libraryRoot, artistDir, albumDir, filename);
  }

  async fileWinner(
    filePath: string,
    tags: TrackTags | null,
    replacingKey?: number
  ): Promise<string> {
    const desired = this.targetFor(filePath, tags);

    if (!desired || resolve(desired) === resolve(filePath)) {
      return filePath;
    }

    const target = uniqueTarget(desired, (path) => this.isTaken(path, replacingKey));

    if (!this.options.dryRun) {
      await moveFile(filePath, target);
    }

    return this.options.dryRun ? filePath : target;
  }

  async archiveLoser(filePath: string): Promise<string> {
    if (this.options.dryRun || !existsSync(filePath)) {
      return filePath;
    }

    // a trashed file has no path of its own; its record gets a marker so the
    // original location stays free for the winner
    if (this.options.loserPolicy === 'trash') {
      await trash(filePath);
      return uniqueTarget(`${TRASH_MARKER}${filePath}`, (path) => this.isTaken(path));
    }

    const target = uniqueTarget(join(this.options.duplicatesDir, basename(filePath)), (path) =>
      this.isTaken(path)
    );
    await moveFile(filePath, target);

    return target;
  }
}
