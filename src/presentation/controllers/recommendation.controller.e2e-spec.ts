/**
 * E2E TEST - Recommendations API
 *
 * HTTP request → Controller → Service → Repository → SQLite (in-memory),
 * on the Fastify adapter with the same global pipe and filter as main.ts.
 */

import { ValidationPipe } from '@nestjs/common';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { Test, TestingModule } from '@nestjs/testing';
import { TypeOrmModule, getRepositoryToken } from '@nestjs/typeorm';
import request from 'supertest';
import { DataSource, Repository } from 'typeorm';
import { RecommendationFactory } from '@test/factories/recommendation.factory';
import { HealthService, RecommendationService } from '@/application/services';
import type { SerializedRecommendation } from '@/domain/models';
import { LOGGER_SERVICE } from '@/domain/services';
import { RecommendationEntity } from '@/infrastructure/database/entities';
import { LoggerService } from '@/infrastructure/logger';
import { repositoriesProviders } from '@/infrastructure/repositories';
import { HttpExceptionFilter } from '@/presentation/filters';
import { HealthController } from './health.controller';
import { IndexController } from './index.controller';
import { RecommendationController } from './recommendation.controller';

describe('Recommendations API (E2E)', () => {
  let app: NestFastifyApplication;
  let dataSource: DataSource;
  let ormRepository: Repository<RecommendationEntity>;

  const mockLogger = {
    log: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  };

  const post = (payload: object) => request(app.getHttpServer()).post('/recommendations').send(payload);

  /** Creates a record over HTTP and returns its id. */
  const seed = async (payload: SerializedRecommendation): Promise<number> => {
    const response = await post(payload).expect(201);
    return response.body.id;
  };

  beforeAll(async () => {
    LoggerService.useMinimumLevel('error');

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [
        TypeOrmModule.forRoot({
          type: 'better-sqlite3',
          database: ':memory:',
          entities: [RecommendationEntity],
          synchronize: true,
          logging: false,
        }),
        TypeOrmModule.forFeature([RecommendationEntity]),
      ],
      controllers: [IndexController, HealthController, RecommendationController],
      providers: [
        ...repositoriesProviders,
        RecommendationService,
        HealthService,
        { provide: LOGGER_SERVICE, useValue: mockLogger },
      ],
    }).compile();

    app = moduleFixture.createNestApplication<NestFastifyApplication>(new FastifyAdapter());

    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true,
        forbidNonWhitelisted: true,
        transform: true,
      }),
    );
    app.useGlobalFilters(new HttpExceptionFilter());

    await app.init();
    await app.getHttpAdapter().getInstance().ready();

    dataSource = moduleFixture.get<DataSource>(DataSource);
    ormRepository = moduleFixture.get<Repository<RecommendationEntity>>(getRepositoryToken(RecommendationEntity));
  }, 30000);

  beforeEach(async () => {
    await ormRepository.clear();
    RecommendationFactory.reset();
    jest.clearAllMocks();
  });

  afterAll(async () => {
    LoggerService.useMinimumLevel('verbose');
    if (dataSource?.isInitialized) {
      await dataSource.destroy();
    }
    await app?.close();
  }, 10000);

  // ============================================================
  // GET / and /healthcheck
  // ============================================================

  describe('GET /', () => {
    it('should describe the service', async () => {
      const response = await request(app.getHttpServer()).get('/').expect(200);

      expect(response.body.name).toBe('Recommendations REST API Service');
      expect(response.body.version).toBe('1.0');
      expect(response.body.paths).toMatch(/^http:\/\/[^/]+\/recommendations$/);
    });
  });

  describe('GET /healthcheck', () => {
    it('should report healthy', async () => {
      const response = await request(app.getHttpServer()).get('/healthcheck').expect(200);

      expect(response.body).toEqual({ status: 200, message: 'Healthy' });
    });
  });

  // ============================================================
  // POST /recommendations
  // ============================================================

  describe('POST /recommendations', () => {
    it('should create a recommendation and point Location at it', async () => {
      const payload = RecommendationFactory.payload();

      const response = await post(payload).expect(201);

      expect(response.body).toEqual({ ...payload, id: expect.any(Number) });
      expect(response.headers.location).toMatch(new RegExp(`^http://[^/]+/recommendations/${response.body.id}$`));

      const fetched = await request(app.getHttpServer())
        .get(new URL(response.headers.location).pathname)
        .expect(200);
      expect(fetched.body).toEqual(response.body);
    });

    it('should ignore an id in the body', async () => {
      const response = await post(RecommendationFactory.payload({ id: 555 })).expect(201);

      expect(response.body.id).not.toBe(555);
    });

    it('should return 415 without a Content-Type', async () => {
      const response = await request(app.getHttpServer()).post('/recommendations').expect(415);

      expect(response.body.message).toBe('Content-Type must be application/json');
      expect(await ormRepository.count()).toBe(0);
    });

    it('should return 415 for text/plain', async () => {
      const response = await request(app.getHttpServer())
        .post('/recommendations')
        .set('Content-Type', 'text/plain')
        .send('product_id=1')
        .expect(415);

      expect(response.body.error).toBe('Unsupported Media Type');
    });

    it('should return 400 naming a field of the wrong type', async () => {
      const response = await post({ ...RecommendationFactory.payload(), product_id: 'abc' }).expect(400);

      expect(response.body).toEqual(
        expect.objectContaining({
          statusCode: 400,
          message: 'Invalid type for integer [product_id]: string',
          error: 'Bad Request',
          path: '/recommendations',
        }),
      );
    });

    it('should return 400 for an unknown recommendation type', async () => {
      const response = await post({ ...RecommendationFactory.payload(), recommendation_type: 'BOGUS' }).expect(400);

      expect(response.body.message).toBe(
        "Invalid attribute: recommendation_type 'BOGUS' is not a known recommendation type",
      );
    });

    it('should return 400 for a malformed date', async () => {
      const payload = { ...RecommendationFactory.payload(), last_relevance_date: '2024/01/01' };

      const response = await post(payload).expect(400);

      expect(response.body.message).toBe(
        "Invalid date for [last_relevance_date]: '2024/01/01' is not an ISO-8601 calendar date (YYYY-MM-DD)",
      );
    });

    it('should return 400 for a missing field', async () => {
      const response = await post({ product_id: 1 }).expect(400);

      expect(response.body.message).toBe('Invalid Recommendation: missing user_id');
    });
  });

  // ============================================================
  // GET /recommendations/:id
  // ============================================================

  describe('GET /recommendations/:id', () => {
    it('should return 404 for an unknown id', async () => {
      const response = await request(app.getHttpServer()).get('/recommendations/9999').expect(404);

      expect(response.body.message).toBe("Recommendation with id '9999' was not found.");
    });

    it('should return 400 for a non-numeric id', async () => {
      await request(app.getHttpServer()).get('/recommendations/abc').expect(400);
    });
  });

  // ============================================================
  // PUT /recommendations/:id
  // ============================================================

  describe('PUT /recommendations/:id', () => {
    it('should replace every field and keep the id', async () => {
      const id = await seed(RecommendationFactory.payload());
      const replacement = RecommendationFactory.payload({ user_segment: 'gift shopper', viewed_in_last7d: false });

      const response = await request(app.getHttpServer())
        .put(`/recommendations/${id}`)
        .send({ ...replacement, id: 12345 })
        .expect(200);

      expect(response.body).toEqual({ ...replacement, id });

      const fetched = await request(app.getHttpServer()).get(`/recommendations/${id}`).expect(200);
      expect(fetched.body.user_segment).toBe('gift shopper');
    });

    it('should return 404 for id 0', async () => {
      const response = await request(app.getHttpServer())
        .put('/recommendations/0')
        .send(RecommendationFactory.payload())
        .expect(404);

      expect(response.body.message).toBe("Recommendation with id '0' was not found.");
    });

    it('should return 400 for an invalid payload', async () => {
      const id = await seed(RecommendationFactory.payload());

      const response = await request(app.getHttpServer())
        .put(`/recommendations/${id}`)
        .send({ ...RecommendationFactory.payload(), bought_in_last30d: 'yes' })
        .expect(400);

      expect(response.body.message).toBe('Invalid type for boolean [bought_in_last30d]: string');
    });

    it('should return 415 for text/plain', async () => {
      const id = await seed(RecommendationFactory.payload());

      await request(app.getHttpServer())
        .put(`/recommendations/${id}`)
        .set('Content-Type', 'text/plain')
        .send('user_segment=x')
        .expect(415);
    });
  });

  // ============================================================
  // DELETE /recommendations/:id
  // ============================================================

  describe('DELETE /recommendations/:id', () => {
    it('should return 204 and remove the record', async () => {
      const id = await seed(RecommendationFactory.payload());

      const response = await request(app.getHttpServer()).delete(`/recommendations/${id}`).expect(204);

      expect(response.text).toBe('');
      await request(app.getHttpServer()).get(`/recommendations/${id}`).expect(404);
    });

    it('should return 204 again for an already deleted record', async () => {
      const id = await seed(RecommendationFactory.payload());

      await request(app.getHttpServer()).delete(`/recommendations/${id}`).expect(204);
      await request(app.getHttpServer()).delete(`/recommendations/${id}`).expect(204);
    });
  });

  // ============================================================
  // GET /recommendations
  // ============================================================

  describe('GET /recommendations', () => {
    // n=0: product 100, 'pet owner', viewed, bought, 2024-01-01, SIMILAR_PRODUCT
    // n=1: product 101, 'new parent', not viewed, not bought, 2024-01-11, RECOMMENDED_FOR_YOU
    // n=2: product 102, 'college student', viewed, not bought, 2024-01-21, UPGRADE
    let ids: number[];

    const list = (query: string) => request(app.getHttpServer()).get(`/recommendations${query}`);
    const idsOf = (body: SerializedRecommendation[]) => body.map((item) => item.id);

    beforeEach(async () => {
      ids = [];
      for (let n = 0; n < 3; n++) {
        ids.push(await seed(RecommendationFactory.payload()));
      }
    });

    it('should list every record in id order', async () => {
      const response = await list('').expect(200);

      expect(idsOf(response.body)).toEqual(ids);
    });

    it('should return an empty list when the store is empty', async () => {
      await ormRepository.clear();

      const response = await list('').expect(200);

      expect(response.body).toEqual([]);
    });

    it.each([
      ['?user_segment=new%20parent', [1]],
      ['?product_id=102', [2]],
      ['?user_id=200', [0]],
      ['?recommendation_type=UPGRADE', [2]],
      ['?viewed_in_last7d=false', [1]],
      ['?bought_in_last30d=true', [0]],
      ['?last_relevance_date=2024-01-11', [1]],
      ['?last_relevance_date_from=2024-01-11', [1, 2]],
      ['?user_segment=nobody', []],
    ])('should filter %s', async (query, positions) => {
      const response = await list(query).expect(200);

      expect(idsOf(response.body)).toEqual(positions.map((position) => ids[position]));
    });

    it('should apply user_segment ahead of product_id', async () => {
      const response = await list('?user_segment=pet%20owner&product_id=101').expect(200);

      expect(idsOf(response.body)).toEqual([ids[0]]);
    });

    it.each(['?product_id=', '?user_id=', '?user_segment='])('should treat an empty %s as no filter', async (query) => {
      const response = await list(query).expect(200);

      expect(idsOf(response.body)).toEqual(ids);
    });

    it('should return 400 for a non-integer product_id', async () => {
      await list('?product_id=abc').expect(400);
    });

    it('should return 400 for an unknown query parameter', async () => {
      await list('?page=2').expect(400);
    });

    it('should return 400 for a malformed date filter', async () => {
      const response = await list('?last_relevance_date=01-11-2024').expect(400);

      expect(response.body.message).toBe(
        "Invalid date for [last_relevance_date]: '01-11-2024' is not an ISO-8601 calendar date (YYYY-MM-DD)",
      );
    });
  });
});
