/**
 * INTEGRATION TEST - RecommendationRepository
 *
 * Runs the repository against a real SQLite database (in-memory) through TypeORM,
 * so the SQL behind every lookup is exercised.
 */

import { Test, TestingModule } from '@nestjs/testing';
import { TypeOrmModule, getRepositoryToken } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import { RecommendationFactory } from '@test/factories/recommendation.factory';
import { DataValidationError, MissingIdError } from '@/domain/errors';
import { Recommendation, RecommendationType } from '@/domain/models';
import { RecommendationEntity } from '@/infrastructure/database/entities';
import { TypeOrmRecommendationRepository } from './recommendation.repository';

describe('RecommendationRepository (Integration)', () => {
  let repository: TypeOrmRecommendationRepository;
  let dataSource: DataSource;
  let module: TestingModule;
  let ormRepository: Repository<RecommendationEntity>;

  const ids = (recommendations: Recommendation[]) => recommendations.map((recommendation) => recommendation.id);

  beforeAll(async () => {
    module = await Test.createTestingModule({
      imports: [
        TypeOrmModule.forRoot({
          type: 'better-sqlite3',
          database: ':memory:',
          entities: [RecommendationEntity],
          synchronize: true,
          logging: false,
          retryAttempts: 0,
        }),
        TypeOrmModule.forFeature([RecommendationEntity]),
      ],
      providers: [TypeOrmRecommendationRepository],
    }).compile();

    repository = module.get<TypeOrmRecommendationRepository>(TypeOrmRecommendationRepository);
    dataSource = module.get<DataSource>(DataSource);
    ormRepository = module.get<Repository<RecommendationEntity>>(getRepositoryToken(RecommendationEntity));
  }, 30000);

  beforeEach(async () => {
    await ormRepository.clear();
    RecommendationFactory.reset();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  afterAll(async () => {
    if (dataSource?.isInitialized) {
      await dataSource.destroy();
    }
    await module?.close();
  }, 10000);

  // ============================================================
  // CREATE
  // ============================================================

  describe('create', () => {
    it('should assign an id and persist every field', async () => {
      const recommendation = RecommendationFactory.build();

      const created = await repository.create(recommendation);

      expect(created.id).toEqual(expect.any(Number));
      expect(created.toPlainObject()).toEqual({ ...recommendation.toPlainObject(), id: created.id });
    });

    it('should be retrievable by its id', async () => {
      const created = await repository.create(RecommendationFactory.build({ userSegment: 'pet owner' }));

      const found = await repository.findById(created.id ?? -1);

      expect(found?.toPlainObject()).toEqual(created.toPlainObject());
    });

    it('should ignore an id carried by the record', async () => {
      const created = await repository.create(RecommendationFactory.build({ id: 999 }));

      expect(created.id).not.toBe(999);
      expect(await repository.findById(999)).toBeNull();
    });

    it('should assign unique ids', async () => {
      const created: Recommendation[] = [];
      for (const recommendation of RecommendationFactory.buildBatch(5)) {
        created.push(await repository.create(recommendation));
      }

      const assigned = ids(created);
      expect(assigned).not.toContain(null);
      expect(new Set(assigned).size).toBe(5);
    });

    it('should default recommendation_type to UNKNOWN at the schema level', async () => {
      const saved = await ormRepository.save({
        productId: 1,
        userId: 2,
        userSegment: 'pet owner',
        viewedInLast7d: true,
        boughtInLast30d: true,
        lastRelevanceDate: '2024-01-01',
      });

      const found = await repository.findById(saved.id);

      expect(found?.recommendationType).toBe(RecommendationType.UNKNOWN);
    });
  });

  // ============================================================
  // UPDATE
  // ============================================================

  describe('update', () => {
    it('should fail with MissingIdError for an unsaved record', async () => {
      await expect(repository.update(RecommendationFactory.build())).rejects.toThrow(MissingIdError);
      await expect(repository.update(RecommendationFactory.build())).rejects.toThrow(
        'Update called with empty ID field',
      );
    });

    it('should overwrite every field and keep the id', async () => {
      const created = await repository.create(RecommendationFactory.build());
      const replacement = RecommendationFactory.build({ id: created.id, userSegment: 'gift shopper' });

      const updated = await repository.update(replacement);

      expect(updated?.id).toBe(created.id);
      expect(updated?.toPlainObject()).toEqual(replacement.toPlainObject());

      const found = await repository.findById(created.id ?? -1);
      expect(found?.userSegment).toBe('gift shopper');
    });

    it('should not bring back a row deleted just before the write', async () => {
      const created = await repository.create(RecommendationFactory.build());
      const id = created.id ?? -1;
      const write = ormRepository.update.bind(ormRepository);
      jest.spyOn(ormRepository, 'update').mockImplementationOnce(async (criteria, partialEntity) => {
        await ormRepository.delete({ id });
        return write(criteria, partialEntity);
      });

      const updated = await repository.update(RecommendationFactory.build({ id }));

      expect(updated).toBeNull();
      expect(await ormRepository.count()).toBe(0);
    });

    it('should return null when no row has the id', async () => {
      const updated = await repository.update(RecommendationFactory.build({ id: 99999 }));

      expect(updated).toBeNull();
      expect(await repository.findAll()).toEqual([]);
    });
  });

  // ============================================================
  // DELETE
  // ============================================================

  describe('delete', () => {
    it('should remove the row', async () => {
      const created = await repository.create(RecommendationFactory.build());

      await repository.delete(created.id ?? -1);

      expect(await repository.findById(created.id ?? -1)).toBeNull();
    });

    it('should be idempotent', async () => {
      const created = await repository.create(RecommendationFactory.build());

      await expect(repository.delete(created.id ?? -1)).resolves.toBeUndefined();
      await expect(repository.delete(created.id ?? -1)).resolves.toBeUndefined();
    });

    it('should leave other rows alone', async () => {
      const first = await repository.create(RecommendationFactory.build());
      const second = await repository.create(RecommendationFactory.build());

      await repository.delete(first.id ?? -1);

      expect(ids(await repository.findAll())).toEqual([second.id]);
    });
  });

  // ============================================================
  // LOOKUPS
  // ============================================================

  describe('lookups', () => {
    let stored: Recommendation[];

    const expectedIds = (predicate: (recommendation: Recommendation) => boolean) => ids(stored.filter(predicate));

    beforeEach(async () => {
      stored = [];
      for (const recommendation of RecommendationFactory.buildBatch(18)) {
        stored.push(await repository.create(recommendation));
      }
      // second record on an existing date, so exact-date matches are not trivially single
      stored.push(await repository.create(RecommendationFactory.build({ lastRelevanceDate: '2024-02-10' })));
    });

    it('findAll should return every record in id order', async () => {
      expect(ids(await repository.findAll())).toEqual(ids(stored));
    });

    it('findByProductId should match exactly', async () => {
      expect(ids(await repository.findByProductId(105))).toEqual(expectedIds((r) => r.productId === 105));
      expect(await repository.findByProductId(105)).toHaveLength(1);
    });

    it('findByUserId should match exactly', async () => {
      expect(ids(await repository.findByUserId(210))).toEqual(expectedIds((r) => r.userId === 210));
    });

    it('findByUserSegment should match exactly', async () => {
      const result = await repository.findByUserSegment('new parent');

      expect(ids(result)).toEqual(expectedIds((r) => r.userSegment === 'new parent'));
      expect(result.length).toBeGreaterThan(0);
    });

    it('findByViewedInLast7d should default to true', async () => {
      expect(ids(await repository.findByViewedInLast7d())).toEqual(expectedIds((r) => r.viewedInLast7d));
    });

    it('findByViewedInLast7d should filter on false', async () => {
      expect(ids(await repository.findByViewedInLast7d(false))).toEqual(expectedIds((r) => !r.viewedInLast7d));
    });

    it('findByBoughtInLast30d should default to true', async () => {
      expect(ids(await repository.findByBoughtInLast30d())).toEqual(expectedIds((r) => r.boughtInLast30d));
    });

    it('findByBoughtInLast30d should filter on false', async () => {
      expect(ids(await repository.findByBoughtInLast30d(false))).toEqual(expectedIds((r) => !r.boughtInLast30d));
    });

    it('findByLastRelevanceDate should match the exact day', async () => {
      const result = await repository.findByLastRelevanceDate('2024-02-10');

      expect(ids(result)).toEqual(expectedIds((r) => r.lastRelevanceDate === '2024-02-10'));
      expect(result).toHaveLength(2);
    });

    it('findSinceLastRelevanceDate should include the bound itself', async () => {
      const result = await repository.findSinceLastRelevanceDate('2024-03-01');

      expect(ids(result)).toEqual(expectedIds((r) => r.lastRelevanceDate >= '2024-03-01'));
      expect(result.map((r) => r.lastRelevanceDate)).toContain('2024-03-01');
    });

    it('findByRecommendationType should match the given type', async () => {
      expect(ids(await repository.findByRecommendationType(RecommendationType.TRENDING))).toEqual(
        expectedIds((r) => r.recommendationType === RecommendationType.TRENDING),
      );
    });

    it('findByRecommendationType should default to UNKNOWN', async () => {
      const result = await repository.findByRecommendationType();

      expect(ids(result)).toEqual(expectedIds((r) => r.recommendationType === RecommendationType.UNKNOWN));
      expect(result.length).toBeGreaterThan(0);
    });

    it('should return an empty list when nothing matches', async () => {
      expect(await repository.findByProductId(1)).toEqual([]);
      expect(await repository.findByUserSegment('astronaut')).toEqual([]);
      expect(await repository.findSinceLastRelevanceDate('2099-01-01')).toEqual([]);
    });

    it('should reject a malformed date with a parse error', async () => {
      await expect(repository.findByLastRelevanceDate('2024/02/10')).rejects.toThrow(DataValidationError);
      await expect(repository.findSinceLastRelevanceDate('March 1st')).rejects.toThrow(DataValidationError);
    });
  });
});
