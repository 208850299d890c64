import type { AlbumRef } from './types.js';

/**
 * Remembers the album the operator last picked so that the following
 * tracks from the same album are not prompted again. Lives only as long
 * as the process.
 */
export class SelectionContext {
  private album: AlbumRef | null = null;

  get current(): AlbumRef | null {
    return this.album;
  }

  remember(album: AlbumRef): void {
    this.album = album;
  }

  clear(): void {
    this.album = null;
  }
}
