import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { FindOptionsWhere, MoreThanOrEqual, Repository } from 'typeorm';
import { MissingIdError } from '@/domain/errors';
import { Recommendation, RecommendationType } from '@/domain/models';
import type { RecommendationRepository } from '@/domain/repositories';
import { parseCalendarDate } from '@/domain/validation';
import { RecommendationEntity } from '@/infrastructure/database/entities';
import { RecommendationMapper } from '@/infrastructure/database/mappers';

/**
 * TypeORM implementation of RecommendationRepository.
 * Each write is a single INSERT, UPDATE or DELETE statement.
 */
@Injectable()
export class TypeOrmRecommendationRepository implements RecommendationRepository {
  constructor(
    @InjectRepository(RecommendationEntity)
    private readonly repository: Repository<RecommendationEntity>,
  ) {}

  async findAll(): Promise<Recommendation[]> {
    return this.findWhere({});
  }

  async findById(id: number): Promise<Recommendation | null> {
    const entity = await this.repository.findOne({ where: { id } });

    return entity ? RecommendationMapper.toDomain(entity) : null;
  }

  async findByProductId(productId: number): Promise<Recommendation[]> {
    return this.findWhere({ productId });
  }

  async findByUserId(userId: number): Promise<Recommendation[]> {
    return this.findWhere({ userId });
  }

  async findByUserSegment(userSegment: string): Promise<Recommendation[]> {
    return this.findWhere({ userSegment });
  }

  async findByViewedInLast7d(viewedInLast7d = true): Promise<Recommendation[]> {
    return this.findWhere({ viewedInLast7d });
  }

  async findByBoughtInLast30d(boughtInLast30d = true): Promise<Recommendation[]> {
    return this.findWhere({ boughtInLast30d });
  }

  async findByLastRelevanceDate(lastRelevanceDate: string): Promise<Recommendation[]> {
    return this.findWhere({ lastRelevanceDate: parseCalendarDate(lastRelevanceDate) });
  }

  /** Inclusive lower bound; ISO dates order the same as text. */
  async findSinceLastRelevanceDate(lastRelevanceDate: string): Promise<Recommendation[]> {
    return this.findWhere({ lastRelevanceDate: MoreThanOrEqual(parseCalendarDate(lastRelevanceDate)) });
  }

  async findByRecommendationType(
    recommendationType: RecommendationType = RecommendationType.UNKNOWN,
  ): Promise<Recommendation[]> {
    return this.findWhere({ recommendationType });
  }

  async create(recommendation: Recommendation): Promise<Recommendation> {
    const entity = this.repository.create(RecommendationMapper.toEntity(recommendation));

    const savedEntity = await this.repository.save(entity);
    return RecommendationMapper.toDomain(savedEntity);
  }

  async update(recommendation: Recommendation): Promise<Recommendation | null> {
    const { id } = recommendation;
    if (id === null) {
      throw new MissingIdError();
    }

    // UPDATE only: never re-inserts a row deleted since the caller read it
    const result = await this.repository.update({ id }, RecommendationMapper.toEntity(recommendation));
    if (result.affected === 0) {
      return null;
    }

    const entity = await this.repository.findOne({ where: { id } });
    return entity ? RecommendationMapper.toDomain(entity) : null;
  }

  async delete(id: number): Promise<void> {
    await this.repository.delete({ id });
  }

  private async findWhere(where: FindOptionsWhere<RecommendationEntity>): Promise<Recommendation[]> {
    const entities = await this.repository.find({ where, order: { id: 'ASC' } });

    return entities.map((entity) => RecommendationMapper.toDomain(entity));
  }
}
