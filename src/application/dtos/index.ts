export { HealthResponseDto } from './health-response.dto';
export { ListRecommendationsQueryDto } from './list-recommendations-query.dto';
export { RecommendationPayloadDto } from './recommendation-payload.dto';
export { RecommendationResponseDto } from './recommendation-response.dto';
export { ServiceInfoResponseDto } from './service-info-response.dto';
