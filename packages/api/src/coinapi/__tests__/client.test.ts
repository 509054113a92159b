/**
 * CoinAPI client unit tests
 */

import { describe, it, expect } from 'vitest';
import { buildSymbolId, CoinApiOhlcvSchema, createCoinApiClient } from '../index';
import { calledHeaders, calledUrl, jsonResponse, queueFetch } from '../../test/fetch';

describe('buildSymbolId', () => {
  it('qualifies a ticker with the default exchange and quote', () => {
    expect(buildSymbolId('btc')).toBe('BITSTAMP_SPOT_BTC_USD');
  });

  it('accepts a custom exchange and quote', () => {
    expect(buildSymbolId('eth', 'eur', 'kraken')).toBe('KRAKEN_SPOT_ETH_EUR');
  });
});

describe('CoinApiClient.getOhlcvHistory', () => {
  it('requests the history endpoint with the key header', async () => {
    const fetchMock = queueFetch(jsonResponse([{ price_open: 1 }]));
    const client = createCoinApiClient({ apiKey: 'test-secret', fetch: fetchMock });

    const result = await client.getOhlcvHistory('BITSTAMP_SPOT_BTC_USD', {
      period_id: '1DAY',
      time_start: '2024-01-01T00:00:00',
      time_end: '2024-01-02T00:00:00',
      limit: 1,
    });

    expect(result).toEqual({ ok: true, data: [{ price_open: 1 }], retried: false });
    const url = calledUrl(fetchMock);
    expect(url.origin).toBe('https://rest.coinapi.io');
    expect(url.pathname).toBe('/v1/ohlcv/BITSTAMP_SPOT_BTC_USD/history');
    expect(url.searchParams.get('period_id')).toBe('1DAY');
    expect(url.searchParams.get('time_start')).toBe('2024-01-01T00:00:00');
    expect(url.searchParams.get('time_end')).toBe('2024-01-02T00:00:00');
    expect(url.searchParams.get('limit')).toBe('1');
    expect(calledHeaders(fetchMock).get('x-coinapi-key')).toBe('test-secret');
  });

  it('rejects a body that is not an array', async () => {
    const fetchMock = queueFetch(jsonResponse({ error: 'Invalid symbol' }));
    const client = createCoinApiClient({ apiKey: 'test-secret', fetch: fetchMock });

    const result = await client.getOhlcvHistory('X', { period_id: '1DAY', time_start: 'a', time_end: 'b' });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.kind).toBe('malformed');
    }
  });
});

describe('CoinApiOhlcvSchema', () => {
  it('accepts numeric strings and drops wrong types per field', () => {
    const parsed = CoinApiOhlcvSchema.parse({
      time_period_start: '2024-01-01T00:00:00.0000000Z',
      price_open: '42000.5',
      price_close: 'n/a',
      volume_traded: 12,
    });

    expect(parsed.price_open).toBe(42000.5);
    expect(parsed.price_close).toBeUndefined();
    expect(parsed.volume_traded).toBe(12);
  });
});
