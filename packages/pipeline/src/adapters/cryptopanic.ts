/**
 * CryptoPanic adapter - news posts for a token over a window
 *
 * The posts endpoint has no date filter on most plans, so the whole feed is
 * walked through its `next` links and the window is applied afterwards.
 */

import { isWithinWindow, utcDayFromTimestamp, type DateWindow } from '@crypto-backfill/config';
import {
  CryptoPanicPostSchema,
  type CryptoPanicClient,
  type CryptoPanicPost,
} from '@crypto-backfill/api/cryptopanic';
import { createChildLogger } from '../lib/logger';
import type { NewsEventDraft } from '../records';
import { parseItem, str } from './normalize';
import type { AdapterResult, ProviderAdapter, WorkItem } from './types';

export const DEFAULT_NEWS_FILTER = 'rising|hot|important|bullish|bearish';
export const DEFAULT_NEWS_KINDS = 'news|media';

export interface CryptoPanicAdapterOptions {
  client: CryptoPanicClient;
  pageSize?: number;
  filter?: string;
  kind?: string;
}

/**
 * panic_score when present, else the vote balance, else 0
 *
 * @example
 * newsSentiment({ votes: { bullish: 3, liked: 1, bearish: 1, disliked: 1 } }) // (4 - 2) / 6
 */
export function newsSentiment(post: Pick<CryptoPanicPost, 'panic_score' | 'votes'>): number {
  if (post.panic_score !== undefined) {
    return post.panic_score;
  }
  const votes = post.votes;
  const up = (votes?.bullish ?? 0) + (votes?.liked ?? 0);
  const down = (votes?.bearish ?? 0) + (votes?.disliked ?? 0);
  const total = up + down;
  return total === 0 ? 0 : (up - down) / total;
}

export class CryptoPanicAdapter implements ProviderAdapter {
  readonly provider = 'cryptopanic' as const;
  private logger = createChildLogger({ module: 'cryptopanic-adapter' });
  private client: CryptoPanicClient;
  private pageSize: number;
  private filter: string;
  private kind: string;

  constructor(options: CryptoPanicAdapterOptions) {
    this.client = options.client;
    this.pageSize = options.pageSize ?? 50;
    this.filter = options.filter ?? DEFAULT_NEWS_FILTER;
    this.kind = options.kind ?? DEFAULT_NEWS_KINDS;
  }

  plan(token: string, window: DateWindow): WorkItem[] {
    return [{ token, window }];
  }

  async fetch(item: WorkItem): Promise<AdapterResult> {
    const posts: unknown[] = [];
    const visited = new Set<string>();
    let pages = 0;

    let page = await this.client.getPosts({
      currencies: item.token,
      filter: this.filter,
      kind: this.kind,
      public: true,
      with_content: true,
      size: this.pageSize,
    });

    for (;;) {
      if (!page.ok) {
        return page;
      }
      pages++;
      posts.push(...(page.data.results ?? []));

      const next = page.data.next;
      if (!next) break;
      if (visited.has(next)) {
        this.logger.warn({ token: item.token, pages }, 'Pagination link repeated, stopping walk');
        break;
      }
      visited.add(next);
      page = await this.client.getNextPage(next);
    }

    const records: NewsEventDraft[] = [];
    for (const raw of posts) {
      const record = this.toNewsEvent(item, raw);
      if (isWithinWindow(record.date, item.window)) {
        records.push(record);
      }
    }

    this.logger.debug(
      { token: item.token, pages, fetched: posts.length, kept: records.length },
      'News walk completed'
    );
    return { ok: true, records };
  }

  private toNewsEvent(item: WorkItem, raw: unknown): NewsEventDraft {
    const post = parseItem(CryptoPanicPostSchema, raw, this.logger, { token: item.token });
    const date =
      utcDayFromTimestamp(post.published_at) ??
      utcDayFromTimestamp(post.created_at) ??
      item.window.end;

    return {
      kind: 'news_event',
      token: item.token,
      date,
      title: str(post.title),
      description: str(post.description, post.body),
      source: str(post.source?.title, 'cryptopanic'),
      sentimentScore: newsSentiment(post),
      url: str(post.url, post.source?.url),
    };
  }
}
