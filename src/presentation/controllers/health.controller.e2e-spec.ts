/**
 * E2E TEST - Health check and rate limiting
 *
 * ThrottlerGuard is registered as APP_GUARD the way AppModule does it. The
 * global limit is lowered to 3 so the default and the health override differ.
 */

import { APP_GUARD } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { Test, TestingModule } from '@nestjs/testing';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import request from 'supertest';
import { HealthService } from '@/application/services';
import { LoggerService } from '@/infrastructure/logger';
import { HttpExceptionFilter } from '@/presentation/filters';
import { HealthController } from './health.controller';
import { IndexController } from './index.controller';

describe('Health API (E2E)', () => {
  let app: NestFastifyApplication;
  const mockHealthService = { check: jest.fn() };

  const get = (path: string) => request(app.getHttpServer()).get(path);

  beforeAll(() => {
    LoggerService.useMinimumLevel('error');
  });

  beforeEach(async () => {
    mockHealthService.check.mockResolvedValue({ status: 200, message: 'Healthy' });

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [ThrottlerModule.forRoot([{ ttl: 60000, limit: 3 }])],
      controllers: [IndexController, HealthController],
      providers: [
        { provide: HealthService, useValue: mockHealthService },
        { provide: APP_GUARD, useClass: ThrottlerGuard },
      ],
    }).compile();

    app = moduleFixture.createNestApplication<NestFastifyApplication>(new FastifyAdapter());
    app.useGlobalFilters(new HttpExceptionFilter());

    await app.init();
    await app.getHttpAdapter().getInstance().ready();
  });

  afterEach(async () => {
    jest.clearAllMocks();
    await app?.close();
  });

  afterAll(() => {
    LoggerService.useMinimumLevel('verbose');
  });

  describe('GET /healthcheck', () => {
    it('should return 200 when healthy', async () => {
      const response = await get('/healthcheck').expect(200);

      expect(response.body).toEqual({ status: 200, message: 'Healthy' });
    });

    it('should return 503 with the standard error envelope when unhealthy', async () => {
      mockHealthService.check.mockResolvedValue({ status: 503, message: 'Unhealthy' });

      const response = await get('/healthcheck').expect(503);

      expect(response.body).toEqual(
        expect.objectContaining({
          statusCode: 503,
          message: 'Unhealthy',
          error: 'Service Unavailable',
          path: '/healthcheck',
        }),
      );
    });

    it('should allow 30 requests per minute, then answer 429', async () => {
      for (let i = 0; i < 30; i++) {
        await get('/healthcheck').expect(200);
      }

      const response = await get('/healthcheck').expect(429);

      expect(response.body.error).toBe('Too Many Requests');
    });
  });

  describe('global rate limit', () => {
    it('should apply the configured limit to other routes', async () => {
      for (let i = 0; i < 3; i++) {
        await get('/').expect(200);
      }

      await get('/').expect(429);
    });

    it('should count routes separately', async () => {
      for (let i = 0; i < 3; i++) {
        await get('/').expect(200);
      }

      await get('/healthcheck').expect(200);
    });
  });
});
