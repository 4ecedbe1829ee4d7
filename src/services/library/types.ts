import { z } from 'zod';

export interface Album {
  id: string;
  title: string;
  artist: string;
  /** Position in the ranking, null when the album has not been ranked */
  rank: number | null;
  /** Option name exactly as stored, e.g. "07" */
  rankLabel: string | null;
  status: string | null;
  coverUrl: string | null;
  iconUrl: string | null;
  hasCover: boolean;
  hasIcon: boolean;
}

export const SORT_KEYS = ['rank', 'title', 'artist'] as const;
export type SortKey = (typeof SORT_KEYS)[number];

export const sortRequestSchema = z.object({
  key: z.enum(SORT_KEYS).default('rank'),
  direction: z.enum(['asc', 'desc']).default('asc'),
  compact: z.boolean().default(false),
  startingRank: z.number().int().min(1).default(1),
  listenedOnly: z.boolean().default(true),
}).refine((request) => request.key !== 'rank' || request.direction === 'asc', {
  message: 'Ranking by existing rank is always ascending',
  path: ['direction'],
});

export type SortRequest = z.infer<typeof sortRequestSchema>;

export interface RankedAlbum {
  album: Album;
  rank: number;
  label: string;
}

export interface SortFailure {
  albumId: string;
  title: string;
  error: string;
}

export interface SortResult {
  total: number;
  updated: number;
  unchanged: number;
  failed: SortFailure[];
  albums: RankedAlbum[];
}

export type CoverOutcome = 'updated' | 'not-found' | 'rate-limited' | 'invalid-image' | 'failed';

export interface CoverUpdateResult {
  albumId: string;
  title: string;
  artist: string;
  outcome: CoverOutcome;
  coverUrl?: string;
  iconUrl?: string;
  message?: string;
}

export interface DecorateSummary {
  total: number;
  processed: number;
  updated: number;
  results: CoverUpdateResult[];
}

export interface AlbumStats {
  totalAlbums: number;
  listenedAlbums: number;
  ratedAlbums: number;
  unratedAlbums: number;
  albumsWithCovers: number;
  albumsWithoutCovers: number;
  albumsWithIcons: number;
  albumsWithoutIcons: number;
}

export interface PageDecoration {
  coverUrl?: string;
  iconUrl?: string;
}

/**
 * Everything the sorter and decorator need from the workspace.
 * The Notion-backed implementation lives in services/notion/albums.ts.
 */
export interface AlbumRepository {
  isListened(album: Album): boolean;
  fetchAlbums(): Promise<Album[]>;
  updateRank(albumId: string, label: string): Promise<void>;
  updateDecorations(albumId: string, decoration: PageDecoration): Promise<void>;
  getRankOptions(): Promise<string[]>;
  setRankOptions(names: string[]): Promise<void>;
}

export interface Artwork {
  coverUrl: string | null;
  iconUrl: string | null;
  matchedName: string;
  matchedArtist: string | null;
}

export interface ArtworkSource {
  findAlbumArtwork(title: string, artist: string): Promise<Artwork | null>;
}
