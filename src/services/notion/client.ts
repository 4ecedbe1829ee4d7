import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { z } from 'zod';
import { toApiError } from '../../utils/errors.js';

const queryResponseSchema = z.object({
  results: z.array(z.unknown()),
  has_more: z.boolean(),
  next_cursor: z.string().nullable(),
});

const databaseSchema = z.object({
  id: z.string(),
  properties: z.record(z.unknown()),
});

export type QueryResponse = z.infer<typeof queryResponseSchema>;
export type NotionDatabase = z.infer<typeof databaseSchema>;

export interface NotionClientOptions {
  apiKey: string;
  version: string;
  baseURL?: string;
  pageSize?: number;
  adapter?: AxiosAdapter;
}

export class NotionClient {
  private client: AxiosInstance;
  private pageSize: number;

  constructor(options: NotionClientOptions) {
    this.pageSize = options.pageSize ?? 100;

    this.client = axios.create({
      baseURL: options.baseURL ?? 'https://api.notion.com/v1',
      headers: {
        Authorization: `Bearer ${options.apiKey}`,
        'Notion-Version': options.version,
        'Content-Type': 'application/json',
      },
      adapter: options.adapter,
    });

    // Surface Notion's { code, message } body instead of the bare axios error
    this.client.interceptors.response.use(undefined, (error: unknown) =>
      Promise.reject(toApiError('notion', error))
    );
  }

  async queryDatabase(databaseId: string, startCursor?: string): Promise<QueryResponse> {
    const response = await this.client.post(`/databases/${databaseId}/query`, {
      page_size: this.pageSize,
      ...(startCursor ? { start_cursor: startCursor } : {}),
    });
    return queryResponseSchema.parse(response.data);
  }

  // Follows next_cursor until has_more is false
  async queryAll(databaseId: string): Promise<unknown[]> {
    const pages: unknown[] = [];
    let response = await this.queryDatabase(databaseId);
    pages.push(...response.results);

    while (response.has_more && response.next_cursor) {
      response = await this.queryDatabase(databaseId, response.next_cursor);
      pages.push(...response.results);
    }

    return pages;
  }

  async retrieveDatabase(databaseId: string): Promise<NotionDatabase> {
    const response = await this.client.get(`/databases/${databaseId}`);
    return databaseSchema.parse(response.data);
  }

  async updateDatabase(databaseId: string, body: Record<string, unknown>): Promise<void> {
    await this.client.patch(`/databases/${databaseId}`, body);
  }

  async updatePage(pageId: string, body: Record<string, unknown>): Promise<void> {
    await this.client.patch(`/pages/${pageId}`, body);
  }
}
