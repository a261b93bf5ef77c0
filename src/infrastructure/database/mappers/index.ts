export { RecommendationMapper } from './recommendation.mapper';
