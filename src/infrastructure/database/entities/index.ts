export { RecommendationEntity } from './recommendation.orm-entity';
