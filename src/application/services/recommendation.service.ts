import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import { Recommendation } from '@/domain/models';
import type { RecommendationRepository } from '@/domain/repositories';
import { RECOMMENDATION_REPOSITORY } from '@/domain/repositories';
import type { ILogger } from '@/domain/services';
import { LOGGER_SERVICE } from '@/domain/services';
import { ListRecommendationsQueryDto, RecommendationResponseDto } from '@/application/dtos';

/**
 * Service for recommendation CRUD and lookups.
 * Payloads arrive untyped and go through Recommendation.deserialize, which throws
 * DataValidationError for the first bad field.
 */
@Injectable()
export class RecommendationService {
  constructor(
    @Inject(RECOMMENDATION_REPOSITORY)
    private readonly recommendationRepository: RecommendationRepository,
    @Inject(LOGGER_SERVICE)
    private readonly logger: ILogger,
  ) {}

  /**
   * Lists recommendations, narrowed by at most one filter from the query.
   * @throws {DataValidationError} When a date filter does not parse
   */
  async list(query: ListRecommendationsQueryDto = {}): Promise<RecommendationResponseDto[]> {
    this.logger.log('Listing recommendations', { ...query });

    const recommendations = await this.lookup(query);

    this.logger.log('Returning recommendations', { count: recommendations.length });

    return recommendations.map(RecommendationResponseDto.fromModel);
  }

  /** @throws {NotFoundException} When no record has this id */
  async findById(id: number): Promise<RecommendationResponseDto> {
    this.logger.log('Fetching recommendation by id', { id });

    const recommendation = await this.recommendationRepository.findById(id);

    if (!recommendation) {
      throw this.notFound(id);
    }

    return RecommendationResponseDto.fromModel(recommendation);
  }

  /**
   * Validates the payload and stores it under a new id.
   * @throws {DataValidationError} When the payload is invalid
   */
  async create(payload: unknown): Promise<RecommendationResponseDto> {
    this.logger.log('Creating recommendation');

    const recommendation = await this.recommendationRepository.create(Recommendation.deserialize(payload));

    this.logger.log('Recommendation created successfully', { id: recommendation.id });

    return RecommendationResponseDto.fromModel(recommendation);
  }

  /**
   * Replaces every field of an existing recommendation; the id is kept.
   * @throws {NotFoundException} When no record has this id
   * @throws {DataValidationError} When the payload is invalid
   */
  async update(id: number, payload: unknown): Promise<RecommendationResponseDto> {
    this.logger.log('Updating recommendation', { id });

    const existing = await this.recommendationRepository.findById(id);
    if (!existing) {
      throw this.notFound(id);
    }

    const recommendation = await this.recommendationRepository.update(Recommendation.deserialize(payload).withId(id));

    if (!recommendation) {
      throw this.notFound(id);
    }

    this.logger.log('Recommendation updated successfully', { id });

    return RecommendationResponseDto.fromModel(recommendation);
  }

  /** Deletes a recommendation; an unknown id is not an error. */
  async remove(id: number): Promise<void> {
    this.logger.log('Deleting recommendation', { id });

    await this.recommendationRepository.delete(id);

    this.logger.log('Recommendation delete complete', { id });
  }

  private lookup(query: ListRecommendationsQueryDto): Promise<Recommendation[]> {
    const repository = this.recommendationRepository;

    if (query.user_segment) return repository.findByUserSegment(query.user_segment);
    if (query.product_id !== undefined) return repository.findByProductId(query.product_id);
    if (query.user_id !== undefined) return repository.findByUserId(query.user_id);
    if (query.recommendation_type !== undefined) return repository.findByRecommendationType(query.recommendation_type);
    if (query.viewed_in_last7d !== undefined) return repository.findByViewedInLast7d(query.viewed_in_last7d);
    if (query.bought_in_last30d !== undefined) return repository.findByBoughtInLast30d(query.bought_in_last30d);
    if (query.last_relevance_date !== undefined) return repository.findByLastRelevanceDate(query.last_relevance_date);
    if (query.last_relevance_date_from !== undefined) {
      return repository.findSinceLastRelevanceDate(query.last_relevance_date_from);
    }

    return repository.findAll();
  }

  private notFound(id: number): NotFoundException {
    return new NotFoundException(`Recommendation with id '${id}' was not found.`);
  }
}
