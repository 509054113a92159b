/**
 * Backfill configuration with Zod validation
 *
 * Parsed once per process into a frozen object and passed explicitly to the
 * coordinator factory; nothing reads process.env after startup.
 */

import { z } from 'zod';
import {
  API_ENDPOINTS,
  PROVIDER_KEY_ENV,
  isKeyedProvider,
  providerCredentialsSchema,
  type KeyedProvider,
  type ProviderName,
} from '@crypto-backfill/config';
import { ConfigError } from './errors';

const ConfigSchema = z.object({
  // Provider credentials (secret)
  credentials: providerCredentialsSchema,

  // Database
  dbHost: z.string().min(1).default('127.0.0.1'),
  dbPort: z.coerce.number().int().positive().default(5432),
  dbName: z.string().min(1).default('portfolio'),
  dbUser: z.string().min(1).default('app'),
  dbPassword: z.string().default('change_me'),
  dbPoolMax: z.coerce.number().int().positive().default(1),
  queryTimeoutMs: z.coerce.number().int().positive().default(30000),

  // Fetch executor
  requestTimeoutMs: z.coerce.number().int().positive().default(30000),
  rateLimitCooldownMs: z.coerce.number().int().nonnegative().default(1000),

  // Provider mapping and paging
  coinapiExchange: z.string().min(1).default('BITSTAMP'),
  coinapiQuote: z.string().min(1).default('USD'),
  cryptopanicPageSize: z.coerce.number().int().positive().default(50),
  lunarcrushDataPoints: z.coerce.number().int().positive().default(1000),

  // API URLs
  coinapiApiUrl: z.string().url().default(API_ENDPOINTS.coinapi.base),
  cryptopanicApiUrl: z.string().url().default(API_ENDPOINTS.cryptopanic.base),
  lunarcrushApiUrl: z.string().url().default(API_ENDPOINTS.lunarcrush.base),
  santimentApiUrl: z.string().url().default(API_ENDPOINTS.santiment.base),
  yahooApiUrl: z.string().url().default(API_ENDPOINTS.yahoo.base),

  // Persistence
  exportsDir: z.string().min(1).default('exports'),
  insertBatchSize: z.coerce.number().int().positive().default(500),

  // Logging
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // Environment
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
});

export type Config = Readonly<z.infer<typeof ConfigSchema>>;

let cachedConfig: Config | null = null;

/**
 * Parse configuration from an environment object without caching
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    dbHost: env.DB_HOST,
    dbPort: env.DB_PORT,
    dbName: env.DB_NAME,
    dbUser: env.DB_USER,
    dbPassword: env.DB_PASSWORD,
    dbPoolMax: env.DB_POOL_MAX,
    queryTimeoutMs: env.QUERY_TIMEOUT_MS,
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
    rateLimitCooldownMs: env.RATE_LIMIT_COOLDOWN_MS,
    coinapiExchange: env.COINAPI_EXCHANGE,
    coinapiQuote: env.COINAPI_QUOTE,
    cryptopanicPageSize: env.CRYPTOPANIC_PAGE_SIZE,
    lunarcrushDataPoints: env.LUNARCRUSH_DATA_POINTS,
    coinapiApiUrl: env.COINAPI_API_URL,
    cryptopanicApiUrl: env.CRYPTOPANIC_API_URL,
    lunarcrushApiUrl: env.LUNARCRUSH_API_URL,
    santimentApiUrl: env.SANTIMENT_API_URL,
    yahooApiUrl: env.YAHOO_API_URL,
    exportsDir: env.EXPORTS_DIR,
    insertBatchSize: env.INSERT_BATCH_SIZE,
    logLevel: env.LOG_LEVEL,
    nodeEnv: env.NODE_ENV,
  };

  // Remove unset and blank values so defaults are applied
  const cleanConfig = Object.fromEntries(
    Object.entries(rawConfig).filter(([, v]) => v !== undefined && v.trim() !== '')
  );

  const result = ConfigSchema.safeParse({
    ...cleanConfig,
    credentials: {
      COINAPI_KEY: env.COINAPI_KEY,
      CRYPTOPANIC_KEY: env.CRYPTOPANIC_KEY,
      LUNARCRUSH_KEY: env.LUNARCRUSH_KEY,
      SANTIMENT_KEY: env.SANTIMENT_KEY,
    },
  });

  if (!result.success) {
    process.stderr.write(`Invalid configuration: ${JSON.stringify(result.error.format(), null, 2)}\n`);
    throw new ConfigError('Invalid configuration');
  }

  return Object.freeze({ ...result.data, credentials: Object.freeze(result.data.credentials) });
}

/**
 * Get validated configuration from environment variables
 */
export function getConfig(): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  cachedConfig = loadConfig(process.env);
  return cachedConfig;
}

/**
 * Reset cached config (useful for testing)
 */
export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * The provider's API key
 *
 * Throws ConfigError when it is not configured, before any network or
 * database activity.
 */
export function requireProviderKey(config: Config, provider: KeyedProvider): string {
  const envName = PROVIDER_KEY_ENV[provider];
  const key = config.credentials[envName];
  if (!key) {
    throw new ConfigError(`${envName} not set (required by ${provider})`);
  }
  return key;
}

/**
 * Check that a provider can run with this configuration; public sources always can
 */
export function assertProviderCredentials(config: Config, provider: ProviderName): void {
  if (isKeyedProvider(provider)) {
    requireProviderKey(config, provider);
  }
}
