/**
 * CoinAPI adapter - one daily OHLCV bar per token-day
 */

import { addDays, eachDay, utcDayFromTimestamp, type DateWindow } from '@crypto-backfill/config';
import { buildSymbolId, CoinApiOhlcvSchema, type CoinApiClient } from '@crypto-backfill/api/coinapi';
import { createChildLogger } from '../lib/logger';
import type { PriceBarDraft } from '../records';
import { num, parseItem } from './normalize';
import type { AdapterResult, ProviderAdapter, WorkItem } from './types';

export interface CoinApiAdapterOptions {
  client: CoinApiClient;
  exchange?: string;
  quote?: string;
}

export class CoinApiAdapter implements ProviderAdapter {
  readonly provider = 'coinapi' as const;
  private logger = createChildLogger({ module: 'coinapi-adapter' });
  private client: CoinApiClient;
  private exchange: string;
  private quote: string;

  constructor(options: CoinApiAdapterOptions) {
    this.client = options.client;
    this.exchange = options.exchange ?? 'BITSTAMP';
    this.quote = options.quote ?? 'USD';
  }

  plan(token: string, window: DateWindow): WorkItem[] {
    return eachDay(window).map((day) => ({ token, window: { start: day, end: day } }));
  }

  async fetch(item: WorkItem): Promise<AdapterResult> {
    const day = item.window.start;
    const symbolId = buildSymbolId(item.token, this.quote, this.exchange);

    const result = await this.client.getOhlcvHistory(symbolId, {
      period_id: '1DAY',
      time_start: `${day}T00:00:00`,
      time_end: `${addDays(day, 1)}T00:00:00`,
      limit: 1,
    });
    if (!result.ok) {
      return result;
    }

    const [first] = result.data;
    if (first === undefined) {
      this.logger.debug({ token: item.token, day, symbolId }, 'No OHLCV period returned');
      return { ok: true, records: [] };
    }

    const bar = parseItem(CoinApiOhlcvSchema, first, this.logger, { token: item.token, day });
    const record: PriceBarDraft = {
      kind: 'price_bar',
      token: item.token,
      date: utcDayFromTimestamp(bar.time_period_start) ?? day,
      open: num(bar.price_open),
      high: num(bar.price_high),
      low: num(bar.price_low),
      close: num(bar.price_close),
      volume: num(bar.volume_traded),
      source: 'coinapi',
    };
    return { ok: true, records: [record] };
  }
}
