import { Column, Entity, PrimaryGeneratedColumn } from 'typeorm';
import { RecommendationType } from '@/domain/models';

/**
 * ORM entity for the recommendations table.
 * Kept apart from the domain model so the domain has no TypeORM dependency.
 */
@Entity('recommendations')
export class RecommendationEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'product_id', type: 'integer' })
  productId!: number;

  @Column({ name: 'user_id', type: 'integer' })
  userId!: number;

  @Column({ name: 'user_segment', type: 'varchar', length: 63 })
  userSegment!: string;

  @Column({ name: 'viewed_in_last7d', type: 'boolean', default: false })
  viewedInLast7d!: boolean;

  @Column({ name: 'bought_in_last30d', type: 'boolean', default: false })
  boughtInLast30d!: boolean;

  // Hydrated as 'YYYY-MM-DD' text
  @Column({ name: 'last_relevance_date', type: 'date' })
  lastRelevanceDate!: string;

  @Column({ name: 'recommendation_type', type: 'varchar', length: 32, default: RecommendationType.UNKNOWN })
  recommendationType!: RecommendationType;
}
