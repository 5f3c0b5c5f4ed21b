import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsArray,
  IsDateString,
  IsIn,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import { LANGUAGE_LABELS, LanguageLabel } from '../news-aggregator.service';

export class CollectNewsDto {
  @ApiProperty({
    description: 'Keywords to search, in collection order',
    example: ['AI', '로봇'],
    type: [String],
  })
  @IsArray()
  @IsString({ each: true })
  keywords!: string[];

  @ApiPropertyOptional({
    description: 'Extra keywords, comma separated',
    example: '반도체, 자율주행',
  })
  @IsOptional()
  @IsString()
  extraKeywords?: string;

  @ApiPropertyOptional({ enum: [...LANGUAGE_LABELS], default: '한국어' })
  @IsOptional()
  @IsIn([...LANGUAGE_LABELS])
  language?: LanguageLabel;

  @ApiPropertyOptional({ description: 'Items per keyword', minimum: 1, maximum: 10, default: 3 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(10)
  limit?: number;

  @ApiPropertyOptional({ example: '2025-01-01' })
  @IsOptional()
  @IsDateString()
  from?: string;

  @ApiPropertyOptional({ example: '2025-12-31' })
  @IsOptional()
  @IsDateString()
  to?: string;
}
