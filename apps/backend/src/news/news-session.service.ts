import { Injectable, NotFoundException } from '@nestjs/common';
import { filterByDateRange } from './news-aggregator.service';
import { DateRange, EnrichedArticle, Sentiment, Tone } from './news.types';
import { NO_KEYWORDS } from './news-enrichment';

export interface NewsSummary {
  totalArticles: number;
  byKeyword: Record<string, number>;
  bySentiment: Record<Sentiment, number>;
  byTone: Record<Tone, number>;
  toneByKeyword: Record<string, Record<Tone, number>>;
}

const emptyToneCounts = (): Record<Tone, number> => ({ 정보성: 0, 감정적: 0, 분석적: 0 });

/**
 * Dashboard state for the running process: the latest ArticleSet and the
 * bookmarked links. Collection is the only writer of the set; bookmarks are
 * written by user requests.
 */
@Injectable()
export class NewsSessionService {
  private articles: EnrichedArticle[] = [];
  private readonly bookmarks = new Set<string>();

  replaceArticles(articles: EnrichedArticle[]): void {
    this.articles = [...articles];
  }

  getArticles(range?: DateRange): EnrichedArticle[] {
    return filterByDateRange(this.articles, range);
  }

  /** Returns false when the link was already bookmarked. */
  addBookmark(link: string): boolean {
    if (!this.articles.some((article) => article.link === link)) {
      throw new NotFoundException(`No collected article with link ${link}`);
    }
    if (this.bookmarks.has(link)) return false;
    this.bookmarks.add(link);
    return true;
  }

  getBookmarks(): string[] {
    return [...this.bookmarks];
  }

  getBookmarkedArticles(): EnrichedArticle[] {
    return this.articles.filter((article) => this.bookmarks.has(article.link));
  }

  getSummary(range?: DateRange): NewsSummary {
    const articles = this.getArticles(range);
    const summary: NewsSummary = {
      totalArticles: articles.length,
      byKeyword: {},
      bySentiment: { 긍정: 0, 부정: 0, 중립: 0 },
      byTone: emptyToneCounts(),
      toneByKeyword: {},
    };

    for (const { keyword, sentiment, tone } of articles) {
      summary.byKeyword[keyword] = (summary.byKeyword[keyword] ?? 0) + 1;
      summary.bySentiment[sentiment] += 1;
      summary.byTone[tone] += 1;
      const tones = (summary.toneByKeyword[keyword] ??= emptyToneCounts());
      tones[tone] += 1;
    }
    return summary;
  }

  /** Term counts over every article's extracted keywords, most frequent first. */
  getTermFrequencies(range?: DateRange): Array<{ term: string; count: number }> {
    const counts = new Map<string, number>();
    for (const article of this.getArticles(range)) {
      if (article.extractedKeywords === NO_KEYWORDS) continue;
      for (const term of article.extractedKeywords.split(', ')) {
        counts.set(term, (counts.get(term) ?? 0) + 1);
      }
    }
    return [...counts.entries()]
      .sort((a, b) => b[1] - a[1])
      .map(([term, count]) => ({ term, count }));
  }
}
