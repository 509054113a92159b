/**
 * Yahoo Finance adapter unit tests
 */

import { describe, it, expect } from 'vitest';
import { createYahooFinanceClient } from '@crypto-backfill/api/yahoo';
import { chartToBars, YahooAdapter } from '../yahoo';
import { createFakeFetch, jsonResponse } from '../../test/fakes';

const window = { start: '2024-01-01', end: '2024-01-02' };

function createAdapter(responses: Array<Response | Error>) {
  const fake = createFakeFetch(responses);
  const client = createYahooFinanceClient({ fetch: fake.fetch });
  return { adapter: new YahooAdapter({ client }), requests: fake.requests };
}

describe('chartToBars', () => {
  it('keeps missing prices as null and never sets value', () => {
    const bars = chartToBars('^GSPC', {
      timestamp: [1704067200, null],
      indicators: { quote: [{ open: [4700.5, 1], high: [null, 1], low: [4690], close: [4720.25, 1], volume: [3000000000, 1] }] },
    });

    expect(bars).toEqual([
      {
        kind: 'macro_bar',
        symbol: '^GSPC',
        date: '2024-01-01',
        open: 4700.5,
        high: null,
        low: 4690,
        close: 4720.25,
        volume: 3000000000,
        value: null,
      },
    ]);
  });

  it('returns no bars without timestamps', () => {
    expect(chartToBars('DX-Y.NYB', {})).toEqual([]);
  });
});

describe('YahooAdapter', () => {
  it('requests the window through the end day and keeps in-window bars', async () => {
    const { adapter, requests } = createAdapter([
      jsonResponse({
        chart: {
          result: [
            {
              timestamp: [1704067200, 1704153600, 1704240000],
              indicators: { quote: [{ open: [1, 2, 3], high: [1, 2, 3], low: [1, 2, 3], close: [1, 2, 3], volume: [0, 0, 0] }] },
            },
          ],
          error: null,
        },
      }),
    ]);

    const result = await adapter.fetch({ token: 'DX-Y.NYB', window });

    expect(result.ok && result.records.map((record) => record.date)).toEqual(['2024-01-01', '2024-01-02']);
    const url = new URL(requests[0]?.url ?? '');
    expect(url.searchParams.get('period1')).toBe('1704067200');
    expect(url.searchParams.get('period2')).toBe('1704240000');
  });

  it('returns no records when the chart has no result', async () => {
    const { adapter } = createAdapter([jsonResponse({ chart: { result: null, error: { code: 'Not Found' } } })]);

    expect(await adapter.fetch({ token: 'UNKNOWN', window })).toEqual({ ok: true, records: [] });
  });

  it('plans one work item per symbol', () => {
    const { adapter } = createAdapter([]);

    expect(adapter.plan('^GSPC', window)).toEqual([{ token: '^GSPC', window }]);
  });
});
