import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const configSchema = z.object({
  server: z.object({
    port: z.number().int().positive().default(8080),
    host: z.string().default('0.0.0.0'),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
  }),
  notion: z.object({
    apiKey: z.string(),
    databaseId: z.string(),
    version: z.string().default('2022-06-28'),
    properties: z.object({
      title: z.string().min(1),
      artist: z.string().min(1),
      rank: z.string().min(1),
      status: z.string().min(1),
    }),
    listenedStatus: z.string().min(1),
  }),
  spotify: z.object({
    clientId: z.string(),
    clientSecret: z.string(),
    requestDelayMs: z.number().int().nonnegative().default(500),
  }),
});

type Config = z.infer<typeof configSchema>;
type Env = Record<string, string | undefined>;

function parseNodeEnv(value: string | undefined): 'development' | 'production' | 'test' {
  if (value === 'production' || value === 'test') {
    return value;
  }
  return 'development';
}

export function loadConfig(env: Env = process.env): Config {
  const nodeEnv = parseNodeEnv(env.NODE_ENV);

  const rawConfig = {
    server: {
      port: parseInt(env.PORT || '8080', 10),
      host: env.HOST || '0.0.0.0',
      nodeEnv,
      logLevel: env.LOG_LEVEL || (nodeEnv === 'production' ? 'info' : 'debug'),
    },
    notion: {
      // API_KEY / ALBUM_DB_ID are the names older .env files use
      apiKey: (env.NOTION_API_KEY || env.API_KEY || '').trim(),
      databaseId: (env.NOTION_DATABASE_ID || env.ALBUM_DB_ID || '').trim(),
      version: env.NOTION_VERSION || '2022-06-28',
      properties: {
        title: env.NOTION_TITLE_PROPERTY || 'Album',
        artist: env.NOTION_ARTIST_PROPERTY || 'Artist',
        rank: env.NOTION_RANK_PROPERTY || 'Rank',
        status: env.NOTION_STATUS_PROPERTY || 'Status',
      },
      listenedStatus: env.LISTENED_STATUS || 'Listened',
    },
    spotify: {
      clientId: (env.SPOTIFY_CLIENT_ID || '').trim(),
      clientSecret: (env.SPOTIFY_CLIENT_SECRET || '').trim(),
      requestDelayMs: parseInt(env.SPOTIFY_REQUEST_DELAY_MS || '500', 10),
    },
  };

  return configSchema.parse(rawConfig);
}

export interface ConfigStatus {
  notionApiKey: boolean;
  notionDatabase: boolean;
  spotify: boolean;
}

export function getConfigStatus(cfg: Config): ConfigStatus {
  return {
    notionApiKey: cfg.notion.apiKey.length > 0,
    notionDatabase: cfg.notion.databaseId.length > 0,
    spotify: cfg.spotify.clientId.length > 0 && cfg.spotify.clientSecret.length > 0,
  };
}

export const config = loadConfig();
export type { Config };
