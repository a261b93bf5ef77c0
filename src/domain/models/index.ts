export {
  RECOMMENDATION_TYPES,
  RecommendationType,
  isRecommendationType,
  parseRecommendationType,
} from './recommendation-type.enum';
export { Recommendation } from './recommendation.model';
export type { RecommendationProps, SerializedRecommendation } from './recommendation.model';
