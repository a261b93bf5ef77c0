export { RECOMMENDATION_REPOSITORY } from './recommendation.repository.interface';
export type { RecommendationRepository } from './recommendation.repository.interface';
