import { validateRecommendationPayload } from '@/domain/validation/recommendation.validator';
import type { RecommendationFields } from '@/domain/validation/recommendation.validator';
import { RecommendationType } from './recommendation-type.enum';

/** Properties for Recommendation domain model. */
export interface RecommendationProps extends RecommendationFields {
  id: number | null;
}

/** Wire (JSON) representation of a recommendation. */
export interface SerializedRecommendation {
  id: number | null;
  product_id: number;
  user_id: number;
  user_segment: string;
  viewed_in_last7d: boolean;
  bought_in_last30d: boolean;
  last_relevance_date: string;
  recommendation_type: RecommendationType;
}

/**
 * Pure domain model for a product/user recommendation (no ORM dependencies).
 * `id` stays null until the store assigns one.
 */
export class Recommendation {
  constructor(private readonly props: RecommendationProps) {}

  /**
   * Builds an unsaved recommendation from an untyped payload.
   * @throws {DataValidationError} When a field is missing or malformed
   */
  static deserialize(data: unknown): Recommendation {
    return new Recommendation({ id: null, ...validateRecommendationPayload(data) });
  }

  get id(): number | null {
    return this.props.id;
  }

  get productId(): number {
    return this.props.productId;
  }

  get userId(): number {
    return this.props.userId;
  }

  get userSegment(): string {
    return this.props.userSegment;
  }

  get viewedInLast7d(): boolean {
    return this.props.viewedInLast7d;
  }

  get boughtInLast30d(): boolean {
    return this.props.boughtInLast30d;
  }

  get lastRelevanceDate(): string {
    return this.props.lastRelevanceDate;
  }

  get recommendationType(): RecommendationType {
    return this.props.recommendationType;
  }

  /** Same fields under another id; used to target an existing row on update. */
  withId(id: number | null): Recommendation {
    return new Recommendation({ ...this.props, id });
  }

  serialize(): SerializedRecommendation {
    return {
      id: this.props.id,
      product_id: this.props.productId,
      user_id: this.props.userId,
      user_segment: this.props.userSegment,
      viewed_in_last7d: this.props.viewedInLast7d,
      bought_in_last30d: this.props.boughtInLast30d,
      last_relevance_date: this.props.lastRelevanceDate,
      recommendation_type: this.props.recommendationType,
    };
  }

  toPlainObject(): RecommendationProps {
    return { ...this.props };
  }
}
