import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { EnrichedArticle, SENTIMENTS, Sentiment, TONES, Tone } from '../news.types';

export class EnrichedArticleDto implements EnrichedArticle {
  @ApiProperty({ example: 'AI' })
  keyword!: string;

  @ApiProperty()
  title!: string;

  @ApiProperty({ example: 'https://example.com/news/1' })
  link!: string;

  @ApiProperty({ example: 'Mon, 20 Oct 2025 07:00:00 GMT' })
  published!: string;

  @ApiPropertyOptional()
  rawSummary?: string;

  @ApiProperty()
  body!: string;

  @ApiProperty()
  summary!: string;

  @ApiProperty({ example: '인공지능, 반도체' })
  extractedKeywords!: string;

  @ApiProperty({ enum: [...SENTIMENTS] })
  sentiment!: Sentiment;

  @ApiProperty({ enum: [...TONES] })
  tone!: Tone;

  @ApiProperty({ example: '#기술동향 #시장분석' })
  tags!: string;

  @ApiProperty()
  opinion!: string;
}

export class CollectNewsResponseDto {
  @ApiProperty()
  total!: number;

  @ApiProperty({ type: [EnrichedArticleDto] })
  articles!: EnrichedArticle[];

  @ApiProperty({ type: [String] })
  skippedKeywords!: string[];

  @ApiProperty({ type: [String] })
  warnings!: string[];
}

export class BookmarkResponseDto {
  @ApiProperty()
  added!: boolean;

  @ApiProperty({ type: [String] })
  bookmarks!: string[];
}
