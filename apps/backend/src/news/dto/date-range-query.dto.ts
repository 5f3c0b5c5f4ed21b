import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsDateString, IsOptional } from 'class-validator';
import { DateRange } from '../news.types';

export class DateRangeQueryDto {
  @ApiPropertyOptional({ description: 'Inclusive lower bound', example: '2025-01-01' })
  @IsOptional()
  @IsDateString()
  from?: string;

  @ApiPropertyOptional({ description: 'Inclusive upper bound', example: '2025-12-31' })
  @IsOptional()
  @IsDateString()
  to?: string;
}

export function toDateRange(query: { from?: string; to?: string }): DateRange {
  return {
    from: query.from ? new Date(query.from) : undefined,
    to: query.to ? new Date(query.to) : undefined,
  };
}
