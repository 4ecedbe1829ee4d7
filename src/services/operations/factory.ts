import type { Config } from '../../config/index.js';
import { ConfigurationError } from '../../utils/errors.js';
import type { AlbumRepository, ArtworkSource } from '../library/types.js';
import { NotionAlbumRepository, NotionClient } from '../notion/index.js';
import { SpotifyClient } from '../spotify/index.js';

export function createAlbumRepository(cfg: Config): AlbumRepository {
  const missing: string[] = [];
  if (!cfg.notion.apiKey) missing.push('NOTION_API_KEY');
  if (!cfg.notion.databaseId) missing.push('NOTION_DATABASE_ID');
  if (missing.length > 0) {
    throw new ConfigurationError(missing);
  }

  const client = new NotionClient({ apiKey: cfg.notion.apiKey, version: cfg.notion.version });
  return new NotionAlbumRepository(client, {
    databaseId: cfg.notion.databaseId,
    properties: cfg.notion.properties,
    listenedStatus: cfg.notion.listenedStatus,
  });
}

export function createArtworkSource(cfg: Config): ArtworkSource {
  const missing: string[] = [];
  if (!cfg.spotify.clientId) missing.push('SPOTIFY_CLIENT_ID');
  if (!cfg.spotify.clientSecret) missing.push('SPOTIFY_CLIENT_SECRET');
  if (missing.length > 0) {
    throw new ConfigurationError(missing);
  }

  return new SpotifyClient({ clientId: cfg.spotify.clientId, clientSecret: cfg.spotify.clientSecret });
}
