import { Controller, Get, HttpCode, HttpStatus, Req } from '@nestjs/common';
import { ApiExcludeController } from '@nestjs/swagger';
import type { FastifyRequest } from 'fastify';
import { ServiceInfoResponseDto } from '@/application/dtos';
import { baseUrl } from './base-url';
import { RECOMMENDATIONS_PATH } from './recommendation.controller';

export const SERVICE_NAME = 'Recommendations REST API Service';
export const SERVICE_VERSION = '1.0';

/** Root URL: names the service and points at the collection. */
@Controller()
@ApiExcludeController()
export class IndexController {
  @Get()
  @HttpCode(HttpStatus.OK)
  index(@Req() request: FastifyRequest): ServiceInfoResponseDto {
    return {
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
      paths: `${baseUrl(request)}/${RECOMMENDATIONS_PATH}`,
    };
  }
}
