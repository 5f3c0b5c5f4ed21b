import { Injectable } from '@nestjs/common';
import { EnrichedArticle, FeedEntry } from './news.types';
import { cleanMarkup } from './text-cleaner';
import {
  classifySentiment,
  classifyTone,
  extractKeywords,
  generateOpinion,
  generateTags,
  summarize,
} from './news-enrichment';

@Injectable()
export class NewsEnrichmentService {
  enrich(entry: FeedEntry, keyword: string): EnrichedArticle {
    // Feeds often ship an empty description; the headline is the only text then.
    const body = cleanMarkup(entry.rawSummary) || entry.title;
    const sentiment = classifySentiment(body);
    const tone = classifyTone(body);

    return {
      ...entry,
      keyword,
      body,
      summary: summarize(body),
      extractedKeywords: extractKeywords(body),
      sentiment,
      tone,
      tags: generateTags(body),
      opinion: generateOpinion(sentiment, tone),
    };
  }
}
