import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FeedFetcherService } from './news-fetcher.service';
import { NewsEnrichmentService } from './news-enrichment.service';
import {
  CollectionReport,
  DateRange,
  EnrichedArticle,
  FeedLanguage,
  FeedLocale,
} from './news.types';

export const DEFAULT_KEYWORDS = ['AI', '로봇', '로봇감정', '로봇성격', 'IT', '산업데이터', '데이터시스템'];
export const LANGUAGE_LABELS = ['한국어', '영어', 'ko', 'en'] as const;
export type LanguageLabel = (typeof LANGUAGE_LABELS)[number];

const DEFAULT_REGION = 'KR';

/** Selected keywords followed by the comma-separated extras, trimmed, blanks dropped. */
export function parseKeywords(selected: string[], extra?: string): string[] {
  const extras = extra ? extra.split(',') : [];
  return [...selected, ...extras].map((kw) => kw.trim()).filter((kw) => kw.length > 0);
}

export function dedupeByLink(articles: EnrichedArticle[]): EnrichedArticle[] {
  const seen = new Set<string>();
  return articles.filter((article) => {
    if (seen.has(article.link)) return false;
    seen.add(article.link);
    return true;
  });
}

/**
 * Inclusive bounds on the parsed publication date. An unparseable date is NaN,
 * which fails every comparison, so it drops out as soon as a bound is set.
 */
export function filterByDateRange(
  articles: EnrichedArticle[],
  range: DateRange = {},
): EnrichedArticle[] {
  const { from, to } = range;
  if (!from && !to) return articles;

  return articles.filter((article) => {
    const published = new Date(article.published).getTime();
    if (from && !(published >= from.getTime())) return false;
    if (to && !(published <= to.getTime())) return false;
    return true;
  });
}

@Injectable()
export class NewsAggregatorService {
  private readonly logger = new Logger(NewsAggregatorService.name);

  constructor(
    private readonly fetcher: FeedFetcherService,
    private readonly enrichment: NewsEnrichmentService,
    private readonly configService: ConfigService,
  ) {}

  resolveLocale(label: LanguageLabel): FeedLocale {
    const language: FeedLanguage = label === '영어' || label === 'en' ? 'en' : 'ko';
    const region = this.configService.get<string>('NEWS_FEED_REGION') ?? DEFAULT_REGION;
    return { language, region };
  }

  async collect(
    keywords: string[],
    locale: FeedLocale,
    perKeywordLimit: number,
    range?: DateRange,
  ): Promise<CollectionReport> {
    const collected: EnrichedArticle[] = [];
    const warnings: string[] = [];
    const skippedKeywords: string[] = [];

    for (const [index, keyword] of keywords.entries()) {
      const result = await this.fetcher.fetchFeed(keyword, locale, perKeywordLimit);
      warnings.push(...result.warnings);

      if (result.entries.length === 0) {
        skippedKeywords.push(keyword);
      } else {
        collected.push(...result.entries.map((entry) => this.enrichment.enrich(entry, keyword)));
      }
      this.logger.log(`Collected keyword ${index + 1} of ${keywords.length} ("${keyword}")`);
    }

    const articles = filterByDateRange(dedupeByLink(collected), range);
    this.logger.log(
      `Collection done. ${articles.length} article(s), ${skippedKeywords.length} keyword(s) empty.`,
    );

    return { articles, warnings, skippedKeywords };
  }
}
