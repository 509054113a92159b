/**
 * Base API client - the fetch executor shared by every provider
 *
 * Applies a fixed timeout, retries a rate-limited request exactly once after a
 * cooldown, and reports everything else as a FetchFailure value.
 */

import { z } from 'zod';
import { FetchFailure } from './errors';
import type { FetchResult, QueryParams } from './types';

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_RATE_LIMIT_COOLDOWN_MS = 1_000;

export interface RequestOptions extends Omit<RequestInit, 'signal'> {
  params?: QueryParams;
  timeout?: number;
}

export interface ApiClientConfig {
  baseUrl: string;
  defaultHeaders?: Record<string, string>;
  timeout?: number;
  rateLimitCooldownMs?: number;
  fetch?: typeof fetch;
  onFailure?: (failure: FetchFailure) => void;
}

interface RawResponse {
  status: number;
  statusText: string;
  text: string;
}

/**
 * Schema for a whole response body; input is whatever JSON.parse produced
 */
export type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class ApiClient {
  private baseUrl: string;
  private defaultHeaders: Record<string, string>;
  private timeout: number;
  private rateLimitCooldownMs: number;
  private fetchImpl: typeof fetch;
  private onFailure?: (failure: FetchFailure) => void;

  constructor(config: ApiClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, '');
    this.defaultHeaders = config.defaultHeaders ?? {};
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
    this.rateLimitCooldownMs = config.rateLimitCooldownMs ?? DEFAULT_RATE_LIMIT_COOLDOWN_MS;
    this.fetchImpl = config.fetch ?? ((input, init) => fetch(input, init));
    this.onFailure = config.onFailure;
  }

  buildUrl(path: string, params?: QueryParams): string {
    // Continuation links arrive as absolute URLs
    let urlString = /^https?:\/\//i.test(path) ? path : `${this.baseUrl}${path}`;

    if (params) {
      const searchParams = new URLSearchParams();
      Object.entries(params).forEach(([key, value]) => {
        if (value !== undefined) {
          searchParams.append(key, String(value));
        }
      });
      const queryString = searchParams.toString();
      if (queryString) {
        urlString += `${urlString.includes('?') ? '&' : '?'}${queryString}`;
      }
    }

    return urlString;
  }

  async request<T>(
    path: string,
    options: RequestOptions,
    schema: ResponseSchema<T>
  ): Promise<FetchResult<T>> {
    const { params, timeout = this.timeout, ...fetchOptions } = options;
    const url = this.buildUrl(path, params);

    let retried = false;
    let response = await this.attempt(url, fetchOptions, timeout);

    if (!(response instanceof FetchFailure) && response.status === 429) {
      await sleep(this.rateLimitCooldownMs);
      retried = true;
      response = await this.attempt(url, fetchOptions, timeout);
    }

    if (response instanceof FetchFailure) {
      return this.fail(response);
    }

    if (response.status < 200 || response.status >= 300) {
      return this.fail(FetchFailure.fromStatus(url, response.status, response.statusText, response.text));
    }

    let data: unknown;
    try {
      data = JSON.parse(response.text);
    } catch {
      return this.fail(FetchFailure.malformed(url, 'body is not valid JSON', response.text, response.status));
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      return this.fail(FetchFailure.fromZodError(url, parsed.error, response.status));
    }
    return { ok: true, data: parsed.data, retried };
  }

  async get<T>(
    path: string,
    options: Omit<RequestOptions, 'method' | 'body'>,
    schema: ResponseSchema<T>
  ): Promise<FetchResult<T>> {
    return this.request<T>(path, { ...options, method: 'GET' }, schema);
  }

  async post<T>(
    path: string,
    body: unknown,
    options: Omit<RequestOptions, 'method' | 'body'>,
    schema: ResponseSchema<T>
  ): Promise<FetchResult<T>> {
    return this.request<T>(
      path,
      { ...options, method: 'POST', body: body ? JSON.stringify(body) : undefined },
      schema
    );
  }

  /**
   * One network round trip, body included, under the timeout
   */
  private async attempt(
    url: string,
    fetchOptions: Omit<RequestInit, 'signal'>,
    timeout: number
  ): Promise<RawResponse | FetchFailure> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await this.fetchImpl(url, {
        ...fetchOptions,
        headers: {
          'Content-Type': 'application/json',
          ...this.defaultHeaders,
          ...fetchOptions.headers,
        },
        signal: controller.signal,
      });
      const text = await response.text();
      return { status: response.status, statusText: response.statusText, text };
    } catch (error) {
      if (controller.signal.aborted) {
        return FetchFailure.timeout(url, timeout);
      }
      return FetchFailure.transport(url, error);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private fail<T>(failure: FetchFailure): FetchResult<T> {
    this.onFailure?.(failure);
    return { ok: false, failure };
  }
}

/**
 * Create an API client with configuration
 */
export function createApiClient(config: ApiClientConfig): ApiClient {
  return new ApiClient(config);
}
