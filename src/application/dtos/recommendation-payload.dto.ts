import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { RecommendationType } from '@/domain/models';
import { USER_SEGMENT_MAX_LENGTH } from '@/domain/validation';

/**
 * Request body for create and update. Documents the schema only: bodies are
 * checked by the domain validator, which reports the first offending field.
 */
export class RecommendationPayloadDto {
  @ApiPropertyOptional({ description: 'Ignored; ids are assigned by the store', example: null, nullable: true })
  id?: number | null;

  @ApiProperty({ description: 'Product ID (products service)', example: 42 })
  product_id!: number;

  @ApiProperty({ description: 'User ID (customers service)', example: 7 })
  user_id!: number;

  @ApiProperty({ description: 'User segment label', example: 'pet owner', maxLength: USER_SEGMENT_MAX_LENGTH })
  user_segment!: string;

  @ApiProperty({ description: 'Product viewed in the last 7 days', example: true })
  viewed_in_last7d!: boolean;

  @ApiProperty({ description: 'Product bought in the last 30 days', example: false })
  bought_in_last30d!: boolean;

  @ApiProperty({ description: 'Last relevance date', example: '2024-05-17', format: 'date' })
  last_relevance_date!: string;

  @ApiProperty({ description: 'Recommendation basis', enum: RecommendationType, example: RecommendationType.UPGRADE })
  recommendation_type!: RecommendationType;
}
