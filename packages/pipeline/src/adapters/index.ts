/**
 * Provider adapter registry
 */

import type { ProviderName } from '@crypto-backfill/config';
import { getFailureDetails, type ApiClientConfig } from '@crypto-backfill/api';
import { createCoinApiClient } from '@crypto-backfill/api/coinapi';
import { createCryptoPanicClient } from '@crypto-backfill/api/cryptopanic';
import { createLunarCrushClient } from '@crypto-backfill/api/lunarcrush';
import { createSantimentClient } from '@crypto-backfill/api/santiment';
import { createYahooFinanceClient } from '@crypto-backfill/api/yahoo';
import { requireProviderKey, type Config } from '../lib/config';
import { createChildLogger } from '../lib/logger';
import { CoinApiAdapter } from './coinapi';
import { CryptoPanicAdapter } from './cryptopanic';
import { LunarCrushAdapter } from './lunarcrush';
import { SantimentAdapter } from './santiment';
import { YahooAdapter } from './yahoo';
import type { ProviderAdapter } from './types';

export * from './types';
export { CoinApiAdapter, type CoinApiAdapterOptions } from './coinapi';
export { CryptoPanicAdapter, newsSentiment, type CryptoPanicAdapterOptions } from './cryptopanic';
export { LunarCrushAdapter, socialSentiment, type LunarCrushAdapterOptions } from './lunarcrush';
export {
  SantimentAdapter,
  toSlug,
  balanceMentions,
  SENTIMENT_GROUP,
  SENTIMENT_METRICS,
  ONCHAIN_METRICS,
  type SantimentAdapterOptions,
} from './santiment';
export { YahooAdapter, chartToBars, type YahooAdapterOptions } from './yahoo';
export { balanceScore } from './normalize';

export interface AdapterDeps {
  /** Replaces the global fetch (tests) */
  fetch?: typeof fetch;
}

/**
 * Build the adapter for a provider from validated configuration
 *
 * Throws ConfigError when the provider's key is missing.
 */
export function createAdapter(provider: ProviderName, config: Config, deps: AdapterDeps = {}): ProviderAdapter {
  const logger = createChildLogger({ module: 'fetch', provider });
  const clientConfig: Partial<ApiClientConfig> = {
    timeout: config.requestTimeoutMs,
    rateLimitCooldownMs: config.rateLimitCooldownMs,
    fetch: deps.fetch,
    onFailure: (failure) => logger.debug(getFailureDetails(failure), 'Request failed'),
  };

  switch (provider) {
    case 'coinapi':
      return new CoinApiAdapter({
        client: createCoinApiClient({
          ...clientConfig,
          baseUrl: config.coinapiApiUrl,
          apiKey: requireProviderKey(config, provider),
        }),
        exchange: config.coinapiExchange,
        quote: config.coinapiQuote,
      });
    case 'cryptopanic':
      return new CryptoPanicAdapter({
        client: createCryptoPanicClient({
          ...clientConfig,
          baseUrl: config.cryptopanicApiUrl,
          authToken: requireProviderKey(config, provider),
        }),
        pageSize: config.cryptopanicPageSize,
      });
    case 'lunarcrush':
      return new LunarCrushAdapter({
        client: createLunarCrushClient({
          ...clientConfig,
          baseUrl: config.lunarcrushApiUrl,
          apiKey: requireProviderKey(config, provider),
        }),
        dataPoints: config.lunarcrushDataPoints,
      });
    case 'santiment':
      return new SantimentAdapter({
        client: createSantimentClient({
          ...clientConfig,
          baseUrl: config.santimentApiUrl,
          apiKey: requireProviderKey(config, provider),
        }),
      });
    case 'yahoo':
      return new YahooAdapter({
        client: createYahooFinanceClient({ ...clientConfig, baseUrl: config.yahooApiUrl }),
      });
  }
}
