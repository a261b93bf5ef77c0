import { ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsBoolean, IsEnum, IsInt, IsOptional, IsString } from 'class-validator';
import { RecommendationType } from '@/domain/models';

/** An empty value means the filter is absent, as for user_segment. */
const toOptionalInt = ({ value }: { value: unknown }) => {
  if (typeof value !== 'string') return value;
  return value.trim() === '' ? undefined : Number(value);
};

const toBoolean = ({ value }: { value: unknown }) => {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
};

/**
 * Optional filters for GET /recommendations. At most one is applied, in this order:
 * user_segment, product_id, user_id, recommendation_type, viewed_in_last7d,
 * bought_in_last30d, last_relevance_date, last_relevance_date_from.
 */
export class ListRecommendationsQueryDto {
  @ApiPropertyOptional({ description: 'Exact user segment', example: 'pet owner' })
  @IsOptional()
  @IsString({ message: 'user_segment must be a string' })
  user_segment?: string;

  @ApiPropertyOptional({ description: 'Exact product ID', example: 42 })
  @IsOptional()
  @Transform(toOptionalInt)
  @IsInt({ message: 'product_id must be an integer' })
  product_id?: number;

  @ApiPropertyOptional({ description: 'Exact user ID', example: 7 })
  @IsOptional()
  @Transform(toOptionalInt)
  @IsInt({ message: 'user_id must be an integer' })
  user_id?: number;

  @ApiPropertyOptional({ description: 'Recommendation basis', enum: RecommendationType })
  @IsOptional()
  @IsEnum(RecommendationType, { message: 'recommendation_type must be a known recommendation type' })
  recommendation_type?: RecommendationType;

  @ApiPropertyOptional({ description: 'Viewed in the last 7 days', type: Boolean })
  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean({ message: 'viewed_in_last7d must be true or false' })
  viewed_in_last7d?: boolean;

  @ApiPropertyOptional({ description: 'Bought in the last 30 days', type: Boolean })
  @IsOptional()
  @Transform(toBoolean)
  @IsBoolean({ message: 'bought_in_last30d must be true or false' })
  bought_in_last30d?: boolean;

  @ApiPropertyOptional({ description: 'Exact last relevance date', example: '2024-05-17', format: 'date' })
  @IsOptional()
  @IsString({ message: 'last_relevance_date must be a string' })
  last_relevance_date?: string;

  @ApiPropertyOptional({
    description: 'Relevance date lower bound (inclusive)',
    example: '2024-01-01',
    format: 'date',
  })
  @IsOptional()
  @IsString({ message: 'last_relevance_date_from must be a string' })
  last_relevance_date_from?: string;
}
