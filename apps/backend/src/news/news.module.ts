import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';

import { NewsController } from './news.controller';
import { FeedFetcherService } from './news-fetcher.service';
import { NewsEnrichmentService } from './news-enrichment.service';
import { NewsAggregatorService } from './news-aggregator.service';
import { NewsSessionService } from './news-session.service';

@Module({
  imports: [
    HttpModule.register({
      timeout: 10000,
      maxRedirects: 3,
    }),
  ],
  controllers: [NewsController],
  providers: [
    FeedFetcherService,
    NewsEnrichmentService,
    NewsAggregatorService,
    NewsSessionService,
  ],
  exports: [NewsAggregatorService, NewsSessionService],
})
export class NewsModule {}
