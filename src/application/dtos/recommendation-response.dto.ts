import { ApiProperty } from '@nestjs/swagger';
import { Recommendation, RecommendationType } from '@/domain/models';

export class RecommendationResponseDto {
  @ApiProperty({ description: 'Recommendation ID', example: 1, nullable: true, type: Number })
  id!: number | null;

  @ApiProperty({ description: 'Product ID', example: 42 })
  product_id!: number;

  @ApiProperty({ description: 'User ID', example: 7 })
  user_id!: number;

  @ApiProperty({ description: 'User segment label', example: 'pet owner' })
  user_segment!: string;

  @ApiProperty({ description: 'Product viewed in the last 7 days', example: true })
  viewed_in_last7d!: boolean;

  @ApiProperty({ description: 'Product bought in the last 30 days', example: false })
  bought_in_last30d!: boolean;

  @ApiProperty({ description: 'Last relevance date', example: '2024-05-17', format: 'date' })
  last_relevance_date!: string;

  @ApiProperty({ description: 'Recommendation basis', enum: RecommendationType, example: RecommendationType.UPGRADE })
  recommendation_type!: RecommendationType;

  static fromModel(recommendation: Recommendation): RecommendationResponseDto {
    return Object.assign(new RecommendationResponseDto(), recommendation.serialize());
  }
}
