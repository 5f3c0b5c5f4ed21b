export const SENTIMENTS = ['긍정', '부정', '중립'] as const;
export type Sentiment = (typeof SENTIMENTS)[number];

export const TONES = ['정보성', '감정적', '분석적'] as const;
export type Tone = (typeof TONES)[number];

export type FeedLanguage = 'ko' | 'en';

/** Language and region sent to the feed-search endpoint. */
export interface FeedLocale {
  language: FeedLanguage;
  region: string;
}

/** One syndicated item as it came off the feed. */
export interface FeedEntry {
  title: string;
  /** Target URL, already unwrapped from any redirect link. */
  link: string;
  /** Raw publication text; parsed best-effort only when filtering. */
  published: string;
  rawSummary?: string;
}

export interface EnrichedArticle extends FeedEntry {
  keyword: string;
  body: string;
  summary: string;
  extractedKeywords: string;
  sentiment: Sentiment;
  tone: Tone;
  tags: string;
  opinion: string;
}

export interface DateRange {
  from?: Date;
  to?: Date;
}

export type Outcome<T> = { ok: true; value: T } | { ok: false; reason: string };

export interface FeedFetchResult {
  keyword: string;
  entries: FeedEntry[];
  warnings: string[];
  fromCache: boolean;
}

/** Result of one collection run. `articles` is the deduplicated ArticleSet. */
export interface CollectionReport {
  articles: EnrichedArticle[];
  warnings: string[];
  skippedKeywords: string[];
}
