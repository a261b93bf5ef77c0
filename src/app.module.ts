import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { TypeOrmModule } from '@nestjs/typeorm';
import { HealthService, RecommendationService } from './application/services';
import { EnvironmentVariables, validate } from './infrastructure/config';
import { RecommendationEntity } from './infrastructure/database/entities';
import { TypeOrmLogger } from './infrastructure/database/typeorm-logger';
import { loggerProviders } from './infrastructure/logger';
import { repositoriesProviders } from './infrastructure/repositories';
import { HealthController, IndexController, RecommendationController } from './presentation/controllers';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate,
    }),
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<EnvironmentVariables, true>) => {
        const loggingEnabled = configService.get('TYPEORM_LOGGING', { infer: true });
        return {
          type: 'better-sqlite3',
          database: configService.get('DATABASE_PATH', { infer: true }),
          entities: [RecommendationEntity],
          synchronize: configService.get('DATABASE_SYNCHRONIZE', { infer: true }),
          logging: loggingEnabled,
          logger: loggingEnabled ? new TypeOrmLogger() : undefined,
        };
      },
    }),
    TypeOrmModule.forFeature([RecommendationEntity]),
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<EnvironmentVariables, true>) => [
        {
          ttl: configService.get('RATE_LIMIT_TTL', { infer: true }) * 1000,
          limit: configService.get('RATE_LIMIT_MAX', { infer: true }),
        },
      ],
    }),
  ],
  controllers: [IndexController, HealthController, RecommendationController],
  providers: [
    ...repositoriesProviders,
    ...loggerProviders,
    { provide: APP_GUARD, useClass: ThrottlerGuard },
    RecommendationService,
    HealthService,
  ],
})
export class AppModule {}
