/**
 * Provider credentials with Zod validation
 */

import { z } from 'zod';

export const PROVIDERS = ['coinapi', 'cryptopanic', 'lunarcrush', 'santiment', 'yahoo'] as const;

export type ProviderName = (typeof PROVIDERS)[number];

// Empty strings in .env files mean "not set"
const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined));

export const providerCredentialsSchema = z.object({
  COINAPI_KEY: optionalSecret,
  CRYPTOPANIC_KEY: optionalSecret,
  LUNARCRUSH_KEY: optionalSecret,
  SANTIMENT_KEY: optionalSecret,
});

export type ProviderCredentials = z.infer<typeof providerCredentialsSchema>;

/**
 * Environment variable holding each provider's key (null when the source is public)
 */
export const PROVIDER_KEY_ENV = {
  coinapi: 'COINAPI_KEY',
  cryptopanic: 'CRYPTOPANIC_KEY',
  lunarcrush: 'LUNARCRUSH_KEY',
  santiment: 'SANTIMENT_KEY',
  yahoo: null,
} as const satisfies Record<ProviderName, keyof ProviderCredentials | null>;

/**
 * Providers that cannot be called without a credential
 */
export type KeyedProvider = {
  [P in ProviderName]: (typeof PROVIDER_KEY_ENV)[P] extends null ? never : P;
}[ProviderName];

export function isKeyedProvider(provider: ProviderName): provider is KeyedProvider {
  return PROVIDER_KEY_ENV[provider] !== null;
}
