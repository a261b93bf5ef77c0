import { Recommendation } from '@/domain/models';
import { RecommendationEntity } from '@/infrastructure/database/entities';

/** Data Mapper: converts between the ORM entity and the domain model. */
export class RecommendationMapper {
  static toDomain(entity: RecommendationEntity): Recommendation {
    return new Recommendation({
      id: entity.id,
      productId: entity.productId,
      userId: entity.userId,
      userSegment: entity.userSegment,
      viewedInLast7d: entity.viewedInLast7d,
      boughtInLast30d: entity.boughtInLast30d,
      lastRelevanceDate: entity.lastRelevanceDate,
      recommendationType: entity.recommendationType,
    });
  }

  /**
   * Converts a domain model to entity data for persistence.
   * The id is left out: it is either assigned by the store or matched separately.
   */
  static toEntity(model: Recommendation): Omit<RecommendationEntity, 'id'> {
    return {
      productId: model.productId,
      userId: model.userId,
      userSegment: model.userSegment,
      viewedInLast7d: model.viewedInLast7d,
      boughtInLast30d: model.boughtInLast30d,
      lastRelevanceDate: model.lastRelevanceDate,
      recommendationType: model.recommendationType,
    };
  }
}
