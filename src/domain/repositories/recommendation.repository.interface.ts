import type { Recommendation, RecommendationType } from '@/domain/models';

export const RECOMMENDATION_REPOSITORY = Symbol('RECOMMENDATION_REPOSITORY');

/**
 * Persistence port for recommendations.
 * Lookups are single-predicate filters returning records in ascending id order;
 * a lookup that matches nothing resolves to an empty array.
 */
export interface RecommendationRepository {
  findAll(): Promise<Recommendation[]>;
  findById(id: number): Promise<Recommendation | null>;
  findByProductId(productId: number): Promise<Recommendation[]>;
  findByUserId(userId: number): Promise<Recommendation[]>;
  findByUserSegment(userSegment: string): Promise<Recommendation[]>;
  findByViewedInLast7d(viewedInLast7d?: boolean): Promise<Recommendation[]>;
  findByBoughtInLast30d(boughtInLast30d?: boolean): Promise<Recommendation[]>;
  /**
   * @param lastRelevanceDate - ISO calendar date (`YYYY-MM-DD`)
   * @throws {DataValidationError} When the date does not parse
   */
  findByLastRelevanceDate(lastRelevanceDate: string): Promise<Recommendation[]>;
  /**
   * Records whose relevance date is on or after the given day.
   * @throws {DataValidationError} When the date does not parse
   */
  findSinceLastRelevanceDate(lastRelevanceDate: string): Promise<Recommendation[]>;
  findByRecommendationType(recommendationType?: RecommendationType): Promise<Recommendation[]>;

  /** Inserts the record under a fresh id, whatever id it carried. */
  create(recommendation: Recommendation): Promise<Recommendation>;
  /**
   * Overwrites every non-id field of the stored row.
   * @returns The stored record, or null when no row has that id
   * @throws {MissingIdError} When the record was never persisted
   */
  update(recommendation: Recommendation): Promise<Recommendation | null>;
  /** Removes the row; an absent id is a no-op. */
  delete(id: number): Promise<void>;
}
