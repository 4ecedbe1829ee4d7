import { errorMessage } from '../../utils/errors.js';
import { needsUpdate, rankAlbums, reservedRanks, selectCandidates } from './ranking.js';
import type { Album, AlbumRepository, RankedAlbum, SortRequest, SortResult } from './types.js';

export interface SorterHooks {
  onFetched?: (albums: Album[]) => void;
  onWriteStart?: (total: number) => void;
  onWriteComplete?: (entry: RankedAlbum, error: string | null, done: number) => void;
}

export class AlbumSorter {
  constructor(
    private readonly repository: AlbumRepository,
    private readonly hooks: SorterHooks = {}
  ) {}

  async plan(request: SortRequest): Promise<RankedAlbum[]> {
    const albums = await this.repository.fetchAlbums();
    this.hooks.onFetched?.(albums);

    const candidates = selectCandidates(albums, request.listenedOnly, (album) =>
      this.repository.isListened(album)
    );
    return rankAlbums(candidates, request, reservedRanks(albums, candidates));
  }

  /**
   * Writes the new ranking. Albums whose stored rank already matches are not
   * touched; a failed write is recorded and the remaining albums still run,
   * so a partial failure leaves the database with a mix of old and new ranks.
   */
  async run(request: SortRequest): Promise<SortResult> {
    const ranked = await this.plan(request);
    const pending = ranked.filter(needsUpdate);

    const result: SortResult = {
      total: ranked.length,
      updated: 0,
      unchanged: ranked.length - pending.length,
      failed: [],
      albums: ranked,
    };

    this.hooks.onWriteStart?.(pending.length);

    let done = 0;
    for (const entry of pending) {
      let failure: string | null = null;
      try {
        await this.repository.updateRank(entry.album.id, entry.label);
        result.updated++;
      } catch (error) {
        failure = errorMessage(error);
        result.failed.push({ albumId: entry.album.id, title: entry.album.title, error: failure });
      }
      done++;
      this.hooks.onWriteComplete?.(entry, failure, done);
    }

    return result;
  }
}
