import { Controller, Get, HttpCode, HttpStatus, ServiceUnavailableException } from '@nestjs/common';
import { ApiOkResponse, ApiOperation, ApiServiceUnavailableResponse, ApiTags } from '@nestjs/swagger';
import { Throttle } from '@nestjs/throttler';
import { HealthResponseDto } from '@/application/dtos';
import { HealthService } from '@/application/services';

@Controller('healthcheck')
@ApiTags('health')
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @Throttle({ default: { ttl: 60000, limit: 30 } })
  @ApiOperation({
    summary: 'Liveness check',
    description: 'Reports whether the service and its database are answering. Rate limit: 30 req/min.',
  })
  @ApiOkResponse({ description: 'Service is healthy', type: HealthResponseDto })
  @ApiServiceUnavailableResponse({ description: 'Database is not answering' })
  async check(): Promise<HealthResponseDto> {
    const health = await this.healthService.check();

    if (health.status !== HttpStatus.OK) {
      throw new ServiceUnavailableException(health.message);
    }

    return health;
  }
}
