import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
  Req,
  Res,
  UseGuards,
} from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiBody,
  ApiCreatedResponse,
  ApiNoContentResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiTags,
  ApiUnsupportedMediaTypeResponse,
} from '@nestjs/swagger';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { ListRecommendationsQueryDto, RecommendationPayloadDto, RecommendationResponseDto } from '@/application/dtos';
import { RecommendationService } from '@/application/services';
import { JsonContentTypeGuard } from '@/presentation/guards';
import { baseUrl } from './base-url';

export const RECOMMENDATIONS_PATH = 'recommendations';

@Controller(RECOMMENDATIONS_PATH)
@ApiTags('recommendations')
export class RecommendationController {
  constructor(private readonly recommendationService: RecommendationService) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'List recommendations, optionally filtered by one field' })
  @ApiOkResponse({ description: 'Recommendation list', type: [RecommendationResponseDto] })
  @ApiBadRequestResponse({ description: 'Malformed filter value' })
  async list(@Query() query: ListRecommendationsQueryDto): Promise<RecommendationResponseDto[]> {
    return this.recommendationService.list(query);
  }

  @Get(':id')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Find recommendation by id' })
  @ApiParam({ name: 'id', description: 'Recommendation ID', example: 1 })
  @ApiOkResponse({ description: 'Recommendation found', type: RecommendationResponseDto })
  @ApiNotFoundResponse({ description: 'Recommendation not found' })
  async findById(@Param('id', ParseIntPipe) id: number): Promise<RecommendationResponseDto> {
    return this.recommendationService.findById(id);
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @UseGuards(JsonContentTypeGuard)
  @ApiOperation({ summary: 'Create recommendation' })
  @ApiBody({ type: RecommendationPayloadDto })
  @ApiCreatedResponse({ description: 'Recommendation created; Location points at it', type: RecommendationResponseDto })
  @ApiBadRequestResponse({ description: 'Invalid recommendation payload' })
  @ApiUnsupportedMediaTypeResponse({ description: 'Content-Type is not application/json' })
  async create(
    @Body() payload: unknown,
    @Req() request: FastifyRequest,
    @Res({ passthrough: true }) reply: FastifyReply,
  ): Promise<RecommendationResponseDto> {
    const recommendation = await this.recommendationService.create(payload);

    reply.header('Location', `${baseUrl(request)}/${RECOMMENDATIONS_PATH}/${recommendation.id}`);

    return recommendation;
  }

  @Put(':id')
  @HttpCode(HttpStatus.OK)
  @UseGuards(JsonContentTypeGuard)
  @ApiOperation({ summary: 'Replace recommendation' })
  @ApiParam({ name: 'id', description: 'Recommendation ID', example: 1 })
  @ApiBody({ type: RecommendationPayloadDto })
  @ApiOkResponse({ description: 'Recommendation updated', type: RecommendationResponseDto })
  @ApiNotFoundResponse({ description: 'Recommendation not found' })
  @ApiBadRequestResponse({ description: 'Invalid recommendation payload' })
  @ApiUnsupportedMediaTypeResponse({ description: 'Content-Type is not application/json' })
  async update(@Param('id', ParseIntPipe) id: number, @Body() payload: unknown): Promise<RecommendationResponseDto> {
    return this.recommendationService.update(id, payload);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete recommendation (idempotent)' })
  @ApiParam({ name: 'id', description: 'Recommendation ID', example: 1 })
  @ApiNoContentResponse({ description: 'Recommendation deleted or already absent' })
  async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    return this.recommendationService.remove(id);
  }
}
