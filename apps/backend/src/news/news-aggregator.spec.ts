import { Test, TestingModule } from '@nestjs/testing';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { AxiosResponse } from 'axios';
import { of, throwError } from 'rxjs';
import {
  NewsAggregatorService,
  dedupeByLink,
  filterByDateRange,
  parseKeywords,
} from './news-aggregator.service';
import { FeedFetcherService } from './news-fetcher.service';
import { NewsEnrichmentService } from './news-enrichment.service';
import { EnrichedArticle, FeedEntry, FeedFetchResult, FeedLocale, SENTIMENTS } from './news.types';

// ─── Helpers ─────────────────────────────────────────────────────────────────

const KO: FeedLocale = { language: 'ko', region: 'KR' };

function makeEntry(n: number, overrides: Partial<FeedEntry> = {}): FeedEntry {
  return {
    title: `기사 ${n}`,
    link: `https://example.com/news/${n}`,
    published: '2025-01-05T09:00:00Z',
    rawSummary: `<p>기사 ${n} 본문에서 AI 기술 동향을 다룬다</p>`,
    ...overrides,
  };
}

function makeArticle(overrides: Partial<EnrichedArticle> = {}): EnrichedArticle {
  return {
    keyword: 'AI',
    title: '기사',
    link: 'https://example.com/news/1',
    published: '2025-01-05T00:00:00Z',
    body: '본문',
    summary: '요약',
    extractedKeywords: '본문',
    sentiment: '중립',
    tone: '정보성',
    tags: '#일반',
    opinion: '🟡 중립적인 관점 + ℹ️ 정보 전달의 뉴스입니다.',
    ...overrides,
  };
}

function fetchResult(keyword: string, entries: FeedEntry[], warnings: string[] = []): FeedFetchResult {
  return { keyword, entries, warnings, fromCache: false };
}

// ─── NewsAggregatorService ───────────────────────────────────────────────────

describe('NewsAggregatorService', () => {
  let aggregator: NewsAggregatorService;
  let fetcher: jest.Mocked<Pick<FeedFetcherService, 'fetchFeed'>>;
  let feeds: Record<string, FeedFetchResult>;

  beforeEach(async () => {
    feeds = {};

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        NewsAggregatorService,
        NewsEnrichmentService,
        {
          provide: FeedFetcherService,
          useValue: {
            fetchFeed: jest.fn((keyword: string) =>
              Promise.resolve(feeds[keyword] ?? fetchResult(keyword, [])),
            ),
          },
        },
        {
          provide: ConfigService,
          useValue: { get: jest.fn().mockReturnValue(undefined) },
        },
      ],
    }).compile();

    aggregator = module.get<NewsAggregatorService>(NewsAggregatorService);
    fetcher = module.get<FeedFetcherService, jest.Mocked<
      Pick<FeedFetcherService, 'fetchFeed'>
    >>(FeedFetcherService);
  });

  describe('collect()', () => {
    it('should fetch every keyword in order and tag articles with it', async () => {
      feeds.AI = fetchResult('AI', [makeEntry(1)]);
      feeds['로봇'] = fetchResult('로봇', [makeEntry(2)]);

      const report = await aggregator.collect(['AI', '로봇'], KO, 3);

      expect(fetcher.fetchFeed).toHaveBeenNthCalledWith(1, 'AI', KO, 3);
      expect(fetcher.fetchFeed).toHaveBeenNthCalledWith(2, '로봇', KO, 3);
      expect(report.articles.map((a) => [a.keyword, a.link])).toEqual([
        ['AI', 'https://example.com/news/1'],
        ['로봇', 'https://example.com/news/2'],
      ]);
      expect(report.articles[0].tags).toBe('#기술동향');
    });

    it('should keep the first article for a repeated link', async () => {
      feeds.AI = fetchResult('AI', [makeEntry(1), makeEntry(2)]);
      feeds['로봇'] = fetchResult('로봇', [makeEntry(2, { title: '중복 기사' }), makeEntry(3)]);

      const report = await aggregator.collect(['AI', '로봇'], KO, 3);

      expect(report.articles.map((a) => a.link)).toEqual([
        'https://example.com/news/1',
        'https://example.com/news/2',
        'https://example.com/news/3',
      ]);
      expect(report.articles[1]).toMatchObject({ keyword: 'AI', title: '기사 2' });
    });

    it('should skip keywords without results and pass their warnings on', async () => {
      feeds.AI = fetchResult('AI', [makeEntry(1)]);
      feeds.IT = fetchResult('IT', [], ['Feed for "IT" unavailable: HTTP 503']);

      const report = await aggregator.collect(['IT', 'AI'], KO, 3);

      expect(report.articles).toHaveLength(1);
      expect(report.skippedKeywords).toEqual(['IT']);
      expect(report.warnings).toEqual(['Feed for "IT" unavailable: HTTP 503']);
    });

    it('should return an empty set when every keyword is empty', async () => {
      const report = await aggregator.collect(['AI', '로봇'], KO, 3);

      expect(report.articles).toEqual([]);
      expect(report.skippedKeywords).toEqual(['AI', '로봇']);
    });

    it('should apply the date range after deduplication', async () => {
      feeds.AI = fetchResult('AI', [
        makeEntry(1, { published: '2025-01-01T00:00:00Z' }),
        makeEntry(2, { published: '2025-02-01T00:00:00Z' }),
        makeEntry(3, { published: 'unknown' }),
      ]);

      const report = await aggregator.collect(['AI'], KO, 3, {
        from: new Date('2025-01-15T00:00:00Z'),
      });

      expect(report.articles.map((a) => a.link)).toEqual(['https://example.com/news/2']);
    });
  });

  describe('resolveLocale()', () => {
    it('should map display labels and codes to a feed locale', () => {
      expect(aggregator.resolveLocale('한국어')).toEqual({ language: 'ko', region: 'KR' });
      expect(aggregator.resolveLocale('영어')).toEqual({ language: 'en', region: 'KR' });
      expect(aggregator.resolveLocale('en')).toEqual({ language: 'en', region: 'KR' });
    });
  });
});

// ─── Pipeline with a stubbed HTTP layer ──────────────────────────────────────

describe('NewsAggregatorService with FeedFetcherService', () => {
  const rss = (items: Array<{ title: string; link: string; description: string }>) =>
    '<?xml version="1.0" encoding="UTF-8"?><rss version="2.0"><channel><title>t</title>' +
    items
      .map(
        (i) =>
          `<item><title>${i.title}</title><link>${i.link}</link>` +
          `<pubDate>Mon, 20 Oct 2025 07:00:00 GMT</pubDate><description>${i.description}</description></item>`,
      )
      .join('') +
    '</channel></rss>';

  const response = (data: string): AxiosResponse<string> => ({
    data,
    status: 200,
    statusText: 'OK',
    headers: {},
    config: { headers: {} } as AxiosResponse['config'],
  });

  it('should collect, enrich and deduplicate across keywords', async () => {
    const feedsByQuery: Record<string, string> = {
      '%EB%A1%9C%EB%B4%87': rss([
        {
          title: '로봇 시장 확대',
          link: 'https://example.com/shared',
          description: '&lt;p&gt;로봇 시장 수요가 증가하며 성공 사례가 늘고 있다&lt;/p&gt;',
        },
      ]),
      AI: rss([
        {
          title: 'AI 규제 논란',
          link: 'https://example.com/ai-1',
          description: 'AI 규제를 둘러싼 논란과 우려가 커지고 있다',
        },
        {
          title: '로봇 시장 확대',
          link: 'https://example.com/shared',
          description: '중복 기사',
        },
        {
          title: 'AI 연구 발표',
          link: 'https://example.com/ai-3',
          description: '연구진이 새로운 데이터 분석 결과를 발표했다',
        },
      ]),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        NewsAggregatorService,
        NewsEnrichmentService,
        FeedFetcherService,
        {
          provide: HttpService,
          useValue: {
            get: jest.fn((url: string) => {
              const query = new URL(url).searchParams.get('q') ?? '';
              const body = feedsByQuery[encodeURIComponent(query)];
              return body ? of(response(body)) : throwError(() => new Error('ENOTFOUND'));
            }),
          },
        },
        {
          provide: ConfigService,
          useValue: { get: jest.fn().mockReturnValue(undefined) },
        },
      ],
    }).compile();

    const aggregator = module.get<NewsAggregatorService>(NewsAggregatorService);
    const report = await aggregator.collect(['로봇', 'AI', '없는키워드'], KO, 3);

    expect(report.articles.map((a) => [a.keyword, a.link])).toEqual([
      ['로봇', 'https://example.com/shared'],
      ['AI', 'https://example.com/ai-1'],
      ['AI', 'https://example.com/ai-3'],
    ]);
    expect(report.skippedKeywords).toEqual(['없는키워드']);
    for (const article of report.articles) {
      expect(article.summary).not.toBe('');
      expect(SENTIMENTS).toContain(article.sentiment);
    }
    expect(report.articles[0]).toMatchObject({
      body: '로봇 시장 수요가 증가하며 성공 사례가 늘고 있다',
      sentiment: '긍정',
      tags: '#시장분석',
    });
    expect(report.articles[1]).toMatchObject({ sentiment: '부정', tags: '#기술동향 #이슈' });
    expect(report.articles[2]).toMatchObject({ tone: '분석적' });
  });
});

// ─── Pure helpers ────────────────────────────────────────────────────────────

describe('parseKeywords()', () => {
  it('should append trimmed extra keywords and drop blanks', () => {
    expect(parseKeywords(['AI'], ' 로봇, , IT ')).toEqual(['AI', '로봇', 'IT']);
    expect(parseKeywords([' AI ', ''])).toEqual(['AI']);
  });
});

describe('dedupeByLink()', () => {
  it('should keep the first occurrence of each link', () => {
    const first = makeArticle({ keyword: 'AI' });
    const second = makeArticle({ keyword: '로봇' });
    const other = makeArticle({ link: 'https://example.com/news/2' });

    expect(dedupeByLink([first, second, other])).toEqual([first, other]);
  });
});

describe('filterByDateRange()', () => {
  const early = makeArticle({ link: 'a', published: '2025-01-05T00:00:00Z' });
  const late = makeArticle({ link: 'b', published: 'Fri, 10 Jan 2025 12:00:00 GMT' });
  const undated = makeArticle({ link: 'c', published: 'not a date' });
  const articles = [early, late, undated];

  it('should return everything when no bound is given', () => {
    expect(filterByDateRange(articles)).toEqual(articles);
    expect(filterByDateRange(articles, {})).toEqual(articles);
  });

  it('should treat both bounds as inclusive', () => {
    expect(
      filterByDateRange(articles, {
        from: new Date('2025-01-05T00:00:00Z'),
        to: new Date('2025-01-10T12:00:00Z'),
      }),
    ).toEqual([early, late]);
  });

  it('should exclude unparseable dates whenever a bound is set', () => {
    expect(filterByDateRange(articles, { to: new Date('2025-01-06T00:00:00Z') })).toEqual([early]);
    expect(filterByDateRange(articles, { from: new Date('2025-01-06T00:00:00Z') })).toEqual([late]);
  });
});
