import { isInt, isObject, isString, maxLength } from 'class-validator';
import { DataValidationError } from '@/domain/errors';
import { RecommendationType, parseRecommendationType } from '@/domain/models/recommendation-type.enum';
import { parseCalendarDate } from './calendar-date';

export const USER_SEGMENT_MAX_LENGTH = 63;

/** Every persisted field except the store-assigned id. */
export interface RecommendationFields {
  productId: number;
  userId: number;
  userSegment: string;
  viewedInLast7d: boolean;
  boughtInLast30d: boolean;
  lastRelevanceDate: string;
  recommendationType: RecommendationType;
}

type Payload = Record<string, unknown>;

/** Runtime type name used in error messages ("array" and "null" are told apart from "object"). */
function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function requireField(data: Payload, field: string): unknown {
  const value = data[field];
  if (value === undefined) {
    throw new DataValidationError(`Invalid Recommendation: missing ${field}`, 'missing_field', field);
  }
  return value;
}

function readInteger(data: Payload, field: string): number {
  const value = requireField(data, field);
  if (typeof value !== 'number' || !isInt(value)) {
    throw new DataValidationError(
      `Invalid type for integer [${field}]: ${describeType(value)}`,
      'wrong_type',
      field,
    );
  }
  return value;
}

function readBoolean(data: Payload, field: string): boolean {
  const value = requireField(data, field);
  if (typeof value !== 'boolean') {
    throw new DataValidationError(
      `Invalid type for boolean [${field}]: ${describeType(value)}`,
      'wrong_type',
      field,
    );
  }
  return value;
}

function readSegment(data: Payload, field: string): string {
  const value = requireField(data, field);
  if (!isString(value)) {
    throw new DataValidationError(`Invalid type for string [${field}]: ${describeType(value)}`, 'wrong_type', field);
  }
  if (!maxLength(value, USER_SEGMENT_MAX_LENGTH)) {
    throw new DataValidationError(
      `Invalid value for [${field}]: must have at most ${USER_SEGMENT_MAX_LENGTH} characters`,
      'invalid_value',
      field,
    );
  }
  return value;
}

function readRecommendationType(data: Payload, field: string): RecommendationType {
  const value = requireField(data, field);
  const type = typeof value === 'string' ? parseRecommendationType(value) : undefined;
  if (type === undefined) {
    throw new DataValidationError(
      `Invalid attribute: ${field} '${String(value)}' is not a known recommendation type`,
      'unknown_attribute',
      field,
    );
  }
  return type;
}

/**
 * Converts an untyped payload (usually a parsed JSON body) into typed recommendation fields.
 * Fields are checked in wire order and the first failure is reported. Any `id` and unknown
 * keys are ignored.
 *
 * @throws {DataValidationError} Naming the offending field and the reason
 */
export function validateRecommendationPayload(data: unknown): RecommendationFields {
  if (!isObject<Payload>(data)) {
    throw new DataValidationError('Invalid Recommendation: body of request contained bad or no data', 'bad_data');
  }

  return {
    productId: readInteger(data, 'product_id'),
    userId: readInteger(data, 'user_id'),
    userSegment: readSegment(data, 'user_segment'),
    viewedInLast7d: readBoolean(data, 'viewed_in_last7d'),
    boughtInLast30d: readBoolean(data, 'bought_in_last30d'),
    lastRelevanceDate: parseCalendarDate(requireField(data, 'last_relevance_date'), 'last_relevance_date'),
    recommendationType: readRecommendationType(data, 'recommendation_type'),
  };
}
