export { NotionClient, type NotionClientOptions, type QueryResponse, type NotionDatabase } from './client.js';
export {
  NotionAlbumRepository,
  parseAlbumPage,
  propertyText,
  fileUrl,
  parseRank,
  type AlbumPropertyNames,
  type NotionAlbumSettings,
} from './albums.js';
