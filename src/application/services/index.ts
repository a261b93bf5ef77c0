export { HealthService } from './health.service';
export { RecommendationService } from './recommendation.service';
