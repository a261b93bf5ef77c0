import { Recommendation, RecommendationType } from '@/domain/models';
import { RecommendationEntity } from '@/infrastructure/database/entities';
import { RecommendationMapper } from './recommendation.mapper';

describe('RecommendationMapper', () => {
  const entity: RecommendationEntity = {
    id: 3,
    productId: 42,
    userId: 7,
    userSegment: 'new parent',
    viewedInLast7d: false,
    boughtInLast30d: true,
    lastRelevanceDate: '2024-02-29',
    recommendationType: RecommendationType.FREQ_BOUGHT_TOGETHER,
  };

  describe('toDomain', () => {
    it('should convert an entity to the domain model', () => {
      const recommendation = RecommendationMapper.toDomain(entity);

      expect(recommendation).toBeInstanceOf(Recommendation);
      expect(recommendation.toPlainObject()).toEqual({
        id: 3,
        productId: 42,
        userId: 7,
        userSegment: 'new parent',
        viewedInLast7d: false,
        boughtInLast30d: true,
        lastRelevanceDate: '2024-02-29',
        recommendationType: RecommendationType.FREQ_BOUGHT_TOGETHER,
      });
    });
  });

  describe('toEntity', () => {
    it('should copy every field except the id', () => {
      const recommendation = RecommendationMapper.toDomain(entity);

      const data = RecommendationMapper.toEntity(recommendation);

      expect(data).toEqual({
        productId: 42,
        userId: 7,
        userSegment: 'new parent',
        viewedInLast7d: false,
        boughtInLast30d: true,
        lastRelevanceDate: '2024-02-29',
        recommendationType: RecommendationType.FREQ_BOUGHT_TOGETHER,
      });
      expect(data).not.toHaveProperty('id');
    });
  });
});
