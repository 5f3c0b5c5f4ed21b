import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsIn, IsNotEmpty, IsOptional, IsString } from 'class-validator';

export class BookmarkDto {
  @ApiProperty({ example: 'https://example.com/news/1' })
  @IsString()
  @IsNotEmpty()
  link!: string;
}

export const EXPORT_FORMATS = ['csv', 'text'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export class ExportQueryDto {
  @ApiPropertyOptional({ enum: [...EXPORT_FORMATS], default: 'csv' })
  @IsOptional()
  @IsIn([...EXPORT_FORMATS])
  format?: ExportFormat;
}
