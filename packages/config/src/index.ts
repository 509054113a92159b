/**
 * @crypto-backfill/config - Shared configuration for the backfill packages
 *
 * Contains:
 * - Provider credential schema (Zod)
 * - Provider API endpoints
 * - UTC calendar-day utilities
 */

// Provider credentials
export * from './env';

// Calendar-day utilities
export * from './date';

// Provider API endpoints
export const API_ENDPOINTS = {
  coinapi: {
    base: 'https://rest.coinapi.io',
    ohlcvHistory: (symbolId: string) => `/v1/ohlcv/${encodeURIComponent(symbolId)}/history`,
  },
  cryptopanic: {
    base: 'https://cryptopanic.com',
    posts: '/api/v1/posts/',
  },
  lunarcrush: {
    base: 'https://lunarcrush.com',
    assets: '/api3/assets',
  },
  santiment: {
    base: 'https://api.santiment.net',
    graphql: '/graphql',
  },
  yahoo: {
    base: 'https://query1.finance.yahoo.com',
    chart: (symbol: string) => `/v8/finance/chart/${encodeURIComponent(symbol)}`,
  },
} as const;

// Re-export zod for convenience
export { z } from 'zod';
