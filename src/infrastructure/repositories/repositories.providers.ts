import { Provider } from '@nestjs/common';
import { RECOMMENDATION_REPOSITORY } from '@/domain/repositories';
import { TypeOrmRecommendationRepository } from './recommendation.repository';

export const repositoriesProviders: Provider[] = [
  {
    provide: RECOMMENDATION_REPOSITORY,
    useClass: TypeOrmRecommendationRepository,
  },
];
