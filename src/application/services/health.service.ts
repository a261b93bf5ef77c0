import { HttpStatus, Injectable } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { HealthResponseDto } from '@/application/dtos';

/** Timeout in milliseconds for the database probe */
const DATABASE_TIMEOUT_MS = 3000;

/** Liveness check: the service is healthy while its database answers. */
@Injectable()
export class HealthService {
  constructor(private readonly dataSource: DataSource) {}

  async check(): Promise<HealthResponseDto> {
    const healthy = await this.pingDatabase();

    return healthy
      ? { status: HttpStatus.OK, message: 'Healthy' }
      : { status: HttpStatus.SERVICE_UNAVAILABLE, message: 'Unhealthy' };
  }

  private async pingDatabase(): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error('Timeout')), DATABASE_TIMEOUT_MS);
    });

    try {
      await Promise.race([this.dataSource.query('SELECT 1'), timeout]);
      return true;
    } catch {
      return false;
    } finally {
      clearTimeout(timer);
    }
  }
}
