import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { AxiosResponse, isAxiosError } from 'axios';
import { firstValueFrom } from 'rxjs';
import Parser from 'rss-parser';
import { FeedCache } from './feed-cache';
import { FeedEntry, FeedFetchResult, FeedLocale, Outcome } from './news.types';

export const DEFAULT_FEED_URL = 'https://news.google.com/rss/search';
export const DEFAULT_CACHE_TTL_MS = 60 * 60 * 1000;

type CachedFeed = Omit<FeedFetchResult, 'fromCache'>;

/**
 * Unwraps redirect links of the form `...?url=<target>`. Anything that does not
 * parse, or carries no such parameter, is returned untouched.
 */
export function resolveLink(link: string): string {
  try {
    return new URL(link).searchParams.get('url') || link;
  } catch {
    return link;
  }
}

export function toFeedEntry(item: Parser.Item, fetchedAt: Date): Outcome<FeedEntry> {
  if (!item.title) return { ok: false, reason: 'entry has no title' };
  if (!item.link) return { ok: false, reason: `entry "${item.title}" has no link` };

  return {
    ok: true,
    value: {
      title: item.title,
      link: resolveLink(item.link),
      // Undated entries take the fetch time, so re-fetches of them differ.
      published: item.pubDate ?? fetchedAt.toISOString(),
      rawSummary: item.content ?? item.summary,
    },
  };
}

function describeFailure(error: unknown): string {
  if (isAxiosError(error)) {
    if (error.response) return `HTTP ${error.response.status}`;
    if (error.code === 'ECONNABORTED') return 'request timed out';
    return error.code ?? error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

@Injectable()
export class FeedFetcherService {
  private readonly logger = new Logger(FeedFetcherService.name);
  private readonly parser = new Parser<object, object>();
  private readonly cache: FeedCache<CachedFeed>;

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
  ) {
    const ttl = Number(this.configService.get<string>('NEWS_CACHE_TTL_MS'));
    this.cache = new FeedCache<CachedFeed>(
      Number.isFinite(ttl) && ttl > 0 ? ttl : DEFAULT_CACHE_TTL_MS,
    );
  }

  buildFeedUrl(keyword: string, locale: FeedLocale): string {
    const baseUrl = this.configService.get<string>('NEWS_FEED_URL') ?? DEFAULT_FEED_URL;
    const { language, region } = locale;
    return `${baseUrl}?q=${encodeURIComponent(keyword)}&hl=${language}&gl=${region}&ceid=${region}:${language}`;
  }

  async fetchFeed(
    keyword: string,
    locale: FeedLocale,
    limit: number,
  ): Promise<FeedFetchResult> {
    const cacheKey = [keyword, locale.language, locale.region, limit].join('|');
    const cached = this.cache.get(cacheKey);
    if (cached) return { ...cached, fromCache: true };

    const url = this.buildFeedUrl(keyword, locale);
    let items: Parser.Item[];
    try {
      const response = await firstValueFrom<AxiosResponse<string>>(
        this.httpService.get<string>(url, { responseType: 'text' }),
      );
      items = (await this.parser.parseString(response.data)).items;
    } catch (error) {
      const warning = `Feed for "${keyword}" unavailable: ${describeFailure(error)}`;
      this.logger.warn(warning);
      return { keyword, entries: [], warnings: [warning], fromCache: false };
    }

    const fetchedAt = new Date();
    const entries: FeedEntry[] = [];
    const warnings: string[] = [];
    const outcomes = items.slice(0, limit).map((item) => toFeedEntry(item, fetchedAt));
    for (const outcome of outcomes) {
      if (outcome.ok) {
        entries.push(outcome.value);
      } else {
        const warning = `Skipped entry for "${keyword}": ${outcome.reason}`;
        this.logger.warn(warning);
        warnings.push(warning);
      }
    }

    const result: CachedFeed = { keyword, entries, warnings };
    this.cache.set(cacheKey, result);
    return { ...result, fromCache: false };
  }

  @Cron(CronExpression.EVERY_HOUR)
  pruneExpiredFeeds(): number {
    const removed = this.cache.prune();
    if (removed > 0) {
      this.logger.log(`Dropped ${removed} expired feed(s) from cache`);
    }
    return removed;
  }
}
