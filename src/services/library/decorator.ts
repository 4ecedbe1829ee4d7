import { RateLimitError, errorMessage } from '../../utils/errors.js';
import { sleep } from '../../utils/index.js';
import type {
  Album,
  AlbumRepository,
  Artwork,
  ArtworkSource,
  CoverUpdateResult,
  DecorateSummary,
  PageDecoration,
} from './types.js';

export interface DecorateOptions {
  updateExisting?: boolean;
}

export interface DecoratorHooks {
  onStart?: (total: number) => void;
  onAlbumComplete?: (result: CoverUpdateResult, done: number, total: number) => void;
}

export interface DecoratorSettings {
  /** Pause between albums, in milliseconds */
  delayMs: number;
  wait?: (ms: number) => Promise<void>;
}

export function needsDecoration(album: Album, updateExisting: boolean): boolean {
  return updateExisting || !album.hasCover || !album.hasIcon;
}

export function isUsableImageUrl(url: string | null): url is string {
  if (!url) {
    return false;
  }
  try {
    return new URL(url).protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Picks the fields to write: missing ones, or all of them when overwriting.
 * Returns null when a wanted image is absent or not an https URL.
 */
export function planDecoration(album: Album, artwork: Artwork, updateExisting: boolean): PageDecoration | null {
  const decoration: PageDecoration = {};

  if (updateExisting || !album.hasCover) {
    if (!isUsableImageUrl(artwork.coverUrl)) return null;
    decoration.coverUrl = artwork.coverUrl;
  }

  if (updateExisting || !album.hasIcon) {
    if (!isUsableImageUrl(artwork.iconUrl)) return null;
    decoration.iconUrl = artwork.iconUrl;
  }

  return decoration;
}

export class AlbumDecorator {
  private readonly wait: (ms: number) => Promise<void>;

  constructor(
    private readonly repository: AlbumRepository,
    private readonly artwork: ArtworkSource,
    private readonly settings: DecoratorSettings,
    private readonly hooks: DecoratorHooks = {}
  ) {
    this.wait = settings.wait ?? sleep;
  }

  async run(options: DecorateOptions = {}): Promise<DecorateSummary> {
    const updateExisting = options.updateExisting ?? false;
    const albums = await this.repository.fetchAlbums();
    const pending = albums.filter((album) => needsDecoration(album, updateExisting));

    this.hooks.onStart?.(pending.length);

    const results: CoverUpdateResult[] = [];
    for (const [i, album] of pending.entries()) {
      if (i > 0) {
        await this.wait(this.settings.delayMs);
      }
      const result = await this.decorateAlbum(album, updateExisting);
      results.push(result);
      this.hooks.onAlbumComplete?.(result, i + 1, pending.length);
    }

    return {
      total: albums.length,
      processed: pending.length,
      updated: results.filter((r) => r.outcome === 'updated').length,
      results,
    };
  }

  private async decorateAlbum(album: Album, updateExisting: boolean): Promise<CoverUpdateResult> {
    const base = { albumId: album.id, title: album.title, artist: album.artist };

    try {
      const artwork = await this.artwork.findAlbumArtwork(album.title, album.artist);
      if (!artwork) {
        return { ...base, outcome: 'not-found', message: `No album found for '${album.title}' by '${album.artist}'` };
      }

      const decoration = planDecoration(album, artwork, updateExisting);
      if (!decoration) {
        return { ...base, outcome: 'invalid-image', message: `No usable artwork for '${artwork.matchedName}'` };
      }

      await this.repository.updateDecorations(album.id, decoration);
      return { ...base, outcome: 'updated', ...decoration };
    } catch (error) {
      return {
        ...base,
        outcome: error instanceof RateLimitError ? 'rate-limited' : 'failed',
        message: errorMessage(error),
      };
    }
  }
}
