/**
 * CryptoPanic client - news posts
 * https://cryptopanic.com/developers/api/
 */

import { z } from 'zod';
import { API_ENDPOINTS } from '@crypto-backfill/config';
import { ApiClient, createApiClient, type ApiClientConfig } from '../client';
import { lenientNumber, lenientString, rawItems, type FetchResult } from '../types';

export const CryptoPanicSourceSchema = z.object({
  title: lenientString(),
  url: lenientString(),
  domain: lenientString(),
}).passthrough();

export const CryptoPanicVotesSchema = z.object({
  bullish: lenientNumber(),
  bearish: lenientNumber(),
  liked: lenientNumber(),
  disliked: lenientNumber(),
  important: lenientNumber(),
}).passthrough();

// Fields vary by plan: panic_score is only present on paid tiers
export const CryptoPanicPostSchema = z.object({
  id: lenientNumber(),
  title: lenientString(),
  description: lenientString(),
  body: lenientString(),
  url: lenientString(),
  published_at: lenientString(),
  created_at: lenientString(),
  panic_score: lenientNumber(),
  source: CryptoPanicSourceSchema.optional().catch(undefined),
  votes: CryptoPanicVotesSchema.optional().catch(undefined),
}).passthrough();

export const CryptoPanicPageSchema = z.object({
  count: lenientNumber(),
  next: z.string().nullable().optional().catch(null),
  previous: z.string().nullable().optional().catch(null),
  results: rawItems(),
}).passthrough();

export type CryptoPanicPost = z.infer<typeof CryptoPanicPostSchema>;
export type CryptoPanicPage = z.infer<typeof CryptoPanicPageSchema>;

export interface CryptoPanicPostsParams {
  currencies: string;
  filter?: string;
  kind?: string;
  public?: boolean;
  with_content?: boolean;
  size?: number;
}

export interface CryptoPanicClientConfig extends Partial<ApiClientConfig> {
  authToken: string;
}

export class CryptoPanicClient {
  private client: ApiClient;
  private authToken: string;

  constructor(config: CryptoPanicClientConfig) {
    const { authToken, ...clientConfig } = config;
    this.authToken = authToken;
    this.client = createApiClient({
      ...clientConfig,
      baseUrl: clientConfig.baseUrl ?? API_ENDPOINTS.cryptopanic.base,
    });
  }

  /**
   * Get the first page of posts
   */
  async getPosts(params: CryptoPanicPostsParams): Promise<FetchResult<CryptoPanicPage>> {
    return this.client.get(
      API_ENDPOINTS.cryptopanic.posts,
      { params: { auth_token: this.authToken, ...params } },
      CryptoPanicPageSchema
    );
  }

  /**
   * Follow a `next` link; it already carries the query, auth token included
   */
  async getNextPage(nextUrl: string): Promise<FetchResult<CryptoPanicPage>> {
    return this.client.get(nextUrl, {}, CryptoPanicPageSchema);
  }
}

/**
 * Create a CryptoPanic client
 */
export function createCryptoPanicClient(config: CryptoPanicClientConfig): CryptoPanicClient {
  return new CryptoPanicClient(config);
}
