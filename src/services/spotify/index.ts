export {
  requestClientCredentialsToken,
  TOKEN_URL,
  type SpotifyTokens,
  type ClientCredentials,
} from './auth.js';

export {
  SpotifyClient,
  pickArtwork,
  buildAlbumQuery,
  type SpotifyAlbum,
  type SpotifyImage,
  type SpotifyClientOptions,
} from './client.js';
