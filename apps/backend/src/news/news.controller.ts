import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  InternalServerErrorException,
  Logger,
  NotFoundException,
  Post,
  Query,
  StreamableFile,
} from '@nestjs/common';
import { ApiOperation, ApiProduces, ApiResponse, ApiTags } from '@nestjs/swagger';
import {
  DEFAULT_KEYWORDS,
  NewsAggregatorService,
  parseKeywords,
} from './news-aggregator.service';
import { NewsSessionService, NewsSummary } from './news-session.service';
import { exportFileName, toCsv, toText } from './news-export';
import { EnrichedArticle } from './news.types';
import { CollectNewsDto } from './dto/collect-news.dto';
import { DateRangeQueryDto, toDateRange } from './dto/date-range-query.dto';
import { BookmarkDto, ExportQueryDto } from './dto/bookmark.dto';
import {
  BookmarkResponseDto,
  CollectNewsResponseDto,
  EnrichedArticleDto,
} from './dto/news-article.dto';

const DEFAULT_LIMIT = 3;

@ApiTags('news')
@Controller('news')
export class NewsController {
  private readonly logger = new Logger(NewsController.name);

  constructor(
    private readonly aggregator: NewsAggregatorService,
    private readonly session: NewsSessionService,
  ) {}

  @Get('keywords')
  @ApiOperation({ summary: 'Default keyword choices' })
  getKeywords(): string[] {
    return [...DEFAULT_KEYWORDS];
  }

  @Post('collect')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Fetch and enrich news for the given keywords' })
  @ApiResponse({ status: 200, type: CollectNewsResponseDto })
  @ApiResponse({ status: 400, description: 'No keyword selected' })
  async collect(@Body() dto: CollectNewsDto): Promise<CollectNewsResponseDto> {
    const keywords = parseKeywords(dto.keywords, dto.extraKeywords);
    if (keywords.length === 0) {
      throw new BadRequestException('Select at least one keyword');
    }

    const locale = this.aggregator.resolveLocale(dto.language ?? '한국어');
    const report = await this.aggregator.collect(keywords, locale, dto.limit ?? DEFAULT_LIMIT);

    // The session keeps the whole set; the date range is only a view over it.
    this.session.replaceArticles(report.articles);
    const articles = this.session.getArticles(toDateRange(dto));

    return {
      total: articles.length,
      articles,
      skippedKeywords: report.skippedKeywords,
      warnings: report.warnings,
    };
  }

  @Get()
  @ApiOperation({ summary: 'Articles from the latest collection run' })
  @ApiResponse({ status: 200, type: [EnrichedArticleDto] })
  getArticles(@Query() query: DateRangeQueryDto): EnrichedArticle[] {
    return this.session.getArticles(toDateRange(query));
  }

  @Get('summary')
  @ApiOperation({ summary: 'Counts by keyword, sentiment and tone plus term frequencies' })
  getSummary(@Query() query: DateRangeQueryDto): NewsSummary & {
    terms: Array<{ term: string; count: number }>;
  } {
    const range = toDateRange(query);
    return {
      ...this.session.getSummary(range),
      terms: this.session.getTermFrequencies(range),
    };
  }

  @Post('bookmarks')
  @ApiOperation({ summary: 'Bookmark a collected article by link' })
  @ApiResponse({ status: 201, type: BookmarkResponseDto })
  @ApiResponse({ status: 404, description: 'Link is not in the current set' })
  addBookmark(@Body() dto: BookmarkDto): BookmarkResponseDto {
    const added = this.session.addBookmark(dto.link);
    return { added, bookmarks: this.session.getBookmarks() };
  }

  @Get('bookmarks')
  @ApiOperation({ summary: 'Bookmarked articles still in the current set' })
  @ApiResponse({ status: 200, type: [EnrichedArticleDto] })
  getBookmarks(): EnrichedArticle[] {
    return this.session.getBookmarkedArticles();
  }

  @Get('bookmarks/export')
  @ApiOperation({ summary: 'Download bookmarked articles as CSV or plain text' })
  @ApiProduces('text/csv', 'text/plain')
  @ApiResponse({ status: 404, description: 'Nothing bookmarked' })
  exportBookmarks(@Query() query: ExportQueryDto): StreamableFile {
    const articles = this.session.getBookmarkedArticles();
    if (articles.length === 0) {
      throw new NotFoundException('No bookmarked articles to export');
    }

    const format = query.format ?? 'csv';
    let content: string;
    try {
      content = format === 'text' ? toText(articles) : toCsv(articles);
    } catch (error) {
      this.logger.error(`Export (${format}) failed`, error instanceof Error ? error.stack : String(error));
      throw new InternalServerErrorException('Export failed');
    }

    const fileName = exportFileName(format === 'text' ? 'txt' : 'csv');
    return new StreamableFile(Buffer.from(content, 'utf-8'), {
      type: format === 'text' ? 'text/plain; charset=utf-8' : 'text/csv; charset=utf-8',
      disposition: `attachment; filename="${fileName}"`,
    });
  }
}
