/** Basis on which a product was recommended to a user. Member names are the wire values. */
export enum RecommendationType {
  SIMILAR_PRODUCT = 'SIMILAR_PRODUCT',
  RECOMMENDED_FOR_YOU = 'RECOMMENDED_FOR_YOU',
  UPGRADE = 'UPGRADE',
  FREQ_BOUGHT_TOGETHER = 'FREQ_BOUGHT_TOGETHER',
  ADD_ON = 'ADD_ON',
  TRENDING = 'TRENDING',
  TOP_RATED = 'TOP_RATED',
  NEW_ARRIVAL = 'NEW_ARRIVAL',
  UNKNOWN = 'UNKNOWN',
}

/** Lookup table of accepted names; anything not listed is rejected. */
const RECOMMENDATION_TYPE_NAMES: ReadonlyMap<string, RecommendationType> = new Map(
  Object.values(RecommendationType).map((type) => [type, type]),
);

export const RECOMMENDATION_TYPES: readonly RecommendationType[] = Object.values(RecommendationType);

export function isRecommendationType(value: unknown): value is RecommendationType {
  return typeof value === 'string' && RECOMMENDATION_TYPE_NAMES.has(value);
}

/**
 * Resolves a type by its exact, case-sensitive name.
 * @returns The matching member, or undefined for any other string
 */
export function parseRecommendationType(name: string): RecommendationType | undefined {
  return RECOMMENDATION_TYPE_NAMES.get(name);
}
