import axios, { type AxiosAdapter } from 'axios';
import { toApiError } from '../../utils/errors.js';

export interface SpotifyTokens {
  access_token: string;
  expires_at: number;
}

export interface ClientCredentials {
  clientId: string;
  clientSecret: string;
}

export const TOKEN_URL = 'https://accounts.spotify.com/api/token';

// Client credentials grant: app-only token, no user involved
export async function requestClientCredentialsToken(
  credentials: ClientCredentials,
  adapter?: AxiosAdapter
): Promise<SpotifyTokens> {
  const data = new URLSearchParams({
    grant_type: 'client_credentials',
    client_id: credentials.clientId,
    client_secret: credentials.clientSecret,
  });

  try {
    const response = await axios.post(TOKEN_URL, data, {
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      adapter,
    });

    const accessToken: unknown = response.data?.access_token;
    if (typeof accessToken !== 'string' || accessToken.length === 0) {
      throw new Error('Spotify token response did not include an access token');
    }

    const expiresIn: unknown = response.data?.expires_in;
    const expiresAt = Date.now() + (typeof expiresIn === 'number' ? expiresIn : 3600) * 1000;

    return {
      access_token: accessToken,
      expires_at: expiresAt,
    };
  } catch (error) {
    throw toApiError('spotify', error);
  }
}
