import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { z } from 'zod';
import { toApiError } from '../../utils/errors.js';
import type { Artwork, ArtworkSource } from '../library/types.js';
import { requestClientCredentialsToken, type ClientCredentials, type SpotifyTokens } from './auth.js';

const imageSchema = z.object({
  url: z.string(),
  height: z.number().nullable().optional(),
  width: z.number().nullable().optional(),
});

const albumSchema = z.object({
  id: z.string(),
  name: z.string(),
  artists: z.array(z.object({ id: z.string(), name: z.string() })),
  images: z.array(imageSchema),
  release_date: z.string().optional(),
  total_tracks: z.number().optional(),
});

const albumSearchSchema = z.object({
  albums: z.object({
    items: z.array(albumSchema.nullable()),
  }),
});

export type SpotifyImage = z.infer<typeof imageSchema>;
export type SpotifyAlbum = z.infer<typeof albumSchema>;

export interface SpotifyClientOptions {
  baseURL?: string;
  adapter?: AxiosAdapter;
}

function area(image: SpotifyImage): number {
  return (image.width ?? 0) * (image.height ?? 0);
}

/**
 * Largest image for the page cover, smallest for the icon. Images without
 * dimensions keep Spotify's order (largest first).
 */
export function pickArtwork(album: SpotifyAlbum): Artwork {
  const images = album.images
    .map((image, index) => ({ image, index }))
    .sort((a, b) => area(b.image) - area(a.image) || a.index - b.index)
    .map(({ image }) => image);

  return {
    coverUrl: images[0]?.url ?? null,
    iconUrl: images[images.length - 1]?.url ?? null,
    matchedName: album.name,
    matchedArtist: album.artists[0]?.name ?? null,
  };
}

export function buildAlbumQuery(title: string, artist: string): string {
  return `album:${title} artist:${artist}`;
}

export class SpotifyClient implements ArtworkSource {
  private client: AxiosInstance;
  private tokens: SpotifyTokens | null = null;

  constructor(
    private readonly credentials: ClientCredentials,
    private readonly options: SpotifyClientOptions = {}
  ) {
    this.client = axios.create({
      baseURL: options.baseURL ?? 'https://api.spotify.com/v1',
      adapter: options.adapter,
    });

    // Fetch a token on first use and again 1 minute before it expires
    this.client.interceptors.request.use(async (config) => {
      if (!this.tokens || Date.now() >= this.tokens.expires_at - 60000) {
        this.tokens = await requestClientCredentialsToken(this.credentials, this.options.adapter);
      }
      config.headers.Authorization = `Bearer ${this.tokens.access_token}`;
      return config;
    });

    this.client.interceptors.response.use(undefined, (error: unknown) =>
      Promise.reject(toApiError('spotify', error))
    );
  }

  async searchAlbums(query: string, limit: number = 5): Promise<SpotifyAlbum[]> {
    const response = await this.client.get('/search', {
      params: {
        q: query,
        type: 'album',
        limit,
      },
    });

    const parsed = albumSearchSchema.parse(response.data);
    return parsed.albums.items.filter((item): item is SpotifyAlbum => item !== null);
  }

  // Prefer an exact title + artist match, otherwise Spotify's top result
  async matchAlbum(title: string, artist: string): Promise<SpotifyAlbum | null> {
    const results = await this.searchAlbums(buildAlbumQuery(title, artist), 5);

    if (results.length === 0) {
      return null;
    }

    const exactMatch = results.find(
      (album) =>
        album.name.toLowerCase() === title.toLowerCase() &&
        album.artists.some((a) => a.name.toLowerCase() === artist.toLowerCase())
    );

    return exactMatch || results[0];
  }

  async findAlbumArtwork(title: string, artist: string): Promise<Artwork | null> {
    const album = await this.matchAlbum(title, artist);
    return album ? pickArtwork(album) : null;
  }
}
