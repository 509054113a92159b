/**
 * Santiment client - GraphQL metric time series
 * https://api.santiment.net/graphql
 */

import { z } from 'zod';
import { API_ENDPOINTS } from '@crypto-backfill/config';
import { ApiClient, createApiClient, type ApiClientConfig } from '../client';
import { FetchFailure } from '../errors';
import { lenientNumber, lenientString, rawItems, type FetchResult } from '../types';

export const SantimentPointSchema = z.object({
  datetime: lenientString(),
  value: lenientNumber(),
}).passthrough();

export const SantimentMetricResponseSchema = z.object({
  data: z
    .object({
      getMetric: z
        .object({ timeseriesData: rawItems() })
        .passthrough()
        .nullable()
        .optional(),
    })
    .passthrough()
    .nullable()
    .optional(),
  errors: z
    .array(z.object({ message: z.string().optional().catch(undefined) }).passthrough())
    .optional(),
}).passthrough();

export type SantimentPoint = z.infer<typeof SantimentPointSchema>;
export type SantimentMetricResponse = z.infer<typeof SantimentMetricResponseSchema>;

export interface MetricTimeseriesParams {
  slug: string;
  from: string;
  to: string;
  interval?: string;
}

export interface SantimentClientConfig extends Partial<ApiClientConfig> {
  apiKey: string;
}

const METRIC_NAME = /^[a-z0-9_]+$/;

/**
 * GraphQL document for one metric's time series
 *
 * The metric name is part of the document (not a variable) in Santiment's
 * schema, so only plain metric identifiers are accepted.
 */
export function buildMetricQuery(metric: string): string {
  if (!METRIC_NAME.test(metric)) {
    throw new RangeError(`Invalid Santiment metric name: ${metric}`);
  }
  return `query($slug: String!, $from: DateTime!, $to: DateTime!, $interval: String!) {
  getMetric(metric: "${metric}") {
    timeseriesData(slug: $slug, from: $from, to: $to, interval: $interval) {
      datetime
      value
    }
  }
}`;
}

export class SantimentClient {
  private client: ApiClient;
  private endpoint: string;

  constructor(config: SantimentClientConfig) {
    const { apiKey, ...clientConfig } = config;
    this.client = createApiClient({
      ...clientConfig,
      baseUrl: clientConfig.baseUrl ?? API_ENDPOINTS.santiment.base,
      defaultHeaders: {
        ...clientConfig.defaultHeaders,
        Authorization: `Bearer ${apiKey}`,
      },
    });
    this.endpoint = this.client.buildUrl(API_ENDPOINTS.santiment.graphql);
  }

  /**
   * Get the raw time-series points of a metric; GraphQL errors become failures
   */
  async getMetricTimeseries(metric: string, params: MetricTimeseriesParams): Promise<FetchResult<unknown[]>> {
    const result = await this.client.post(
      API_ENDPOINTS.santiment.graphql,
      {
        query: buildMetricQuery(metric),
        variables: { interval: '1d', ...params },
      },
      {},
      SantimentMetricResponseSchema
    );

    if (!result.ok) {
      return result;
    }

    const { data, errors } = result.data;
    if (errors && errors.length > 0) {
      return {
        ok: false,
        failure: FetchFailure.upstream(
          this.endpoint,
          errors.map((error) => error.message ?? 'unknown error')
        ),
      };
    }

    return {
      ok: true,
      data: data?.getMetric?.timeseriesData ?? [],
      retried: result.retried,
    };
  }
}

/**
 * Create a Santiment client
 */
export function createSantimentClient(config: SantimentClientConfig): SantimentClient {
  return new SantimentClient(config);
}
