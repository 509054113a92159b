/**
 * Yahoo Finance adapter - daily macro bars per symbol
 */

import {
  addDays,
  isWithinWindow,
  toUnixSeconds,
  utcDayFromUnixSeconds,
  type DateWindow,
} from '@crypto-backfill/config';
import type { YahooChartResult, YahooFinanceClient } from '@crypto-backfill/api/yahoo';
import { createChildLogger } from '../lib/logger';
import type { MacroBarDraft } from '../records';
import { nullable } from './normalize';
import type { AdapterResult, ProviderAdapter, WorkItem } from './types';

export interface YahooAdapterOptions {
  client: YahooFinanceClient;
}

/**
 * One bar per reported timestamp; missing prices stay null
 */
export function chartToBars(symbol: string, chart: YahooChartResult): MacroBarDraft[] {
  const quote = chart.indicators?.quote?.[0];
  const bars: MacroBarDraft[] = [];

  (chart.timestamp ?? []).forEach((timestamp, i) => {
    const date = utcDayFromUnixSeconds(timestamp);
    if (date === null) return;
    bars.push({
      kind: 'macro_bar',
      symbol,
      date,
      open: nullable(quote?.open?.[i]),
      high: nullable(quote?.high?.[i]),
      low: nullable(quote?.low?.[i]),
      close: nullable(quote?.close?.[i]),
      volume: nullable(quote?.volume?.[i]),
      value: null,
    });
  });

  return bars;
}

export class YahooAdapter implements ProviderAdapter {
  readonly provider = 'yahoo' as const;
  private logger = createChildLogger({ module: 'yahoo-adapter' });
  private client: YahooFinanceClient;

  constructor(options: YahooAdapterOptions) {
    this.client = options.client;
  }

  plan(symbol: string, window: DateWindow): WorkItem[] {
    return [{ token: symbol, window }];
  }

  async fetch(item: WorkItem): Promise<AdapterResult> {
    const result = await this.client.getChart(item.token, {
      period1: toUnixSeconds(item.window.start),
      period2: toUnixSeconds(addDays(item.window.end, 1)),
    });
    if (!result.ok) {
      return result;
    }
    if (result.data === null) {
      this.logger.debug({ symbol: item.token }, 'No chart data for range');
      return { ok: true, records: [] };
    }

    const records = chartToBars(item.token, result.data).filter((bar) =>
      isWithinWindow(bar.date, item.window)
    );
    return { ok: true, records };
  }
}
