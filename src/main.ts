import 'reflect-metadata';
import { ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { AppModule } from './app.module';
import { EnvironmentVariables, SWAGGER_PATH, setupSwagger } from './infrastructure/config';
import { LoggerService } from './infrastructure/logger';
import { HttpExceptionFilter } from './presentation/filters';
import { LoggingInterceptor } from './presentation/interceptors';

async function bootstrap() {
  const logger = new LoggerService('Main');

  const app = await NestFactory.create<NestFastifyApplication>(AppModule, new FastifyAdapter(), { logger });

  const configService = app.get<ConfigService<EnvironmentVariables, true>>(ConfigService);
  LoggerService.useMinimumLevel(configService.get('LOG_LEVEL', { infer: true }));

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  app.useGlobalFilters(new HttpExceptionFilter());
  app.useGlobalInterceptors(new LoggingInterceptor());
  app.enableShutdownHooks();

  setupSwagger(app);

  const port = configService.get('PORT', { infer: true });
  await app.listen(port, '0.0.0.0');

  logger.log('Application started', { port, docs: `/${SWAGGER_PATH}` });
}

bootstrap().catch((error: unknown) => {
  new LoggerService('Main').error('Application failed to start', {
    stack: error instanceof Error ? error.stack : String(error),
  });
  process.exit(1);
});
