export { HealthController } from './health.controller';
export { IndexController } from './index.controller';
export { RecommendationController } from './recommendation.controller';
