/**
 * @crypto-backfill/api - HTTP clients for the backfill data providers
 *
 * Exports:
 * - Fetch executor (timeout, single 429 retry, failures as values)
 * - CoinAPI client (OHLCV history)
 * - CryptoPanic client (news posts)
 * - LunarCrush client (social sentiment time series)
 * - Santiment client (GraphQL metrics)
 * - Yahoo Finance client (macro charts)
 * - Shared types
 */

// Base client
export {
  ApiClient,
  createApiClient,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_RATE_LIMIT_COOLDOWN_MS,
  type ApiClientConfig,
  type RequestOptions,
  type ResponseSchema,
} from './client';

// Errors
export {
  BaseAPIError,
  FetchFailure,
  MAX_BODY_CHARS,
  getFailureDetails,
  redactUrl,
  truncateBody,
  type FetchFailureKind,
} from './errors';

// CoinAPI (OHLCV)
export {
  CoinApiClient,
  createCoinApiClient,
  buildSymbolId,
  CoinApiOhlcvSchema,
  CoinApiOhlcvResponseSchema,
  type CoinApiOhlcv,
  type CoinApiClientConfig,
  type OhlcvHistoryParams,
} from './coinapi';

// CryptoPanic (news)
export {
  CryptoPanicClient,
  createCryptoPanicClient,
  CryptoPanicPostSchema,
  CryptoPanicPageSchema,
  type CryptoPanicPost,
  type CryptoPanicPage,
  type CryptoPanicPostsParams,
  type CryptoPanicClientConfig,
} from './cryptopanic';

// LunarCrush (social sentiment)
export {
  LunarCrushClient,
  createLunarCrushClient,
  LunarCrushPointSchema,
  LunarCrushAssetSchema,
  LunarCrushAssetsResponseSchema,
  type LunarCrushPoint,
  type LunarCrushAsset,
  type LunarCrushAssetsResponse,
  type LunarCrushAssetsParams,
  type LunarCrushClientConfig,
} from './lunarcrush';

// Santiment (GraphQL metrics)
export {
  SantimentClient,
  createSantimentClient,
  buildMetricQuery,
  SantimentPointSchema,
  SantimentMetricResponseSchema,
  type SantimentPoint,
  type SantimentMetricResponse,
  type MetricTimeseriesParams,
  type SantimentClientConfig,
} from './santiment';

// Yahoo Finance (macro)
export {
  YahooFinanceClient,
  createYahooFinanceClient,
  YahooChartResponseSchema,
  YahooChartResultSchema,
  YahooQuoteSchema,
  type YahooChartResponse,
  type YahooChartResult,
  type YahooQuote,
  type YahooChartParams,
} from './yahoo';

// Types
export * from './types';
