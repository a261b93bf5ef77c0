export { repositoriesProviders } from './repositories.providers';
export { TypeOrmRecommendationRepository } from './recommendation.repository';
