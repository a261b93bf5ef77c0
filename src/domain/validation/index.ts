export { parseCalendarDate } from './calendar-date';
export { USER_SEGMENT_MAX_LENGTH, validateRecommendationPayload } from './recommendation.validator';
export type { RecommendationFields } from './recommendation.validator';
