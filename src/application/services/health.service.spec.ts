import { HttpStatus } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { HealthService } from './health.service';

describe('HealthService', () => {
  let service: HealthService;
  let mockDataSource: jest.Mocked<DataSource>;

  beforeEach(async () => {
    jest.clearAllMocks();

    mockDataSource = {
      query: jest.fn().mockResolvedValue([{ 1: 1 }]),
    } as unknown as jest.Mocked<DataSource>;

    const module: TestingModule = await Test.createTestingModule({
      providers: [HealthService, { provide: DataSource, useValue: mockDataSource }],
    }).compile();

    service = module.get<HealthService>(HealthService);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('check', () => {
    it('should report healthy when the database answers', async () => {
      const result = await service.check();

      expect(result).toEqual({ status: HttpStatus.OK, message: 'Healthy' });
      expect(mockDataSource.query).toHaveBeenCalledWith('SELECT 1');
    });

    it('should report unhealthy when the database query fails', async () => {
      mockDataSource.query.mockRejectedValue(new Error('SQLITE_CANTOPEN'));

      const result = await service.check();

      expect(result).toEqual({ status: HttpStatus.SERVICE_UNAVAILABLE, message: 'Unhealthy' });
    });

    it('should report unhealthy when the database does not answer in time', async () => {
      jest.useFakeTimers();
      mockDataSource.query.mockReturnValue(new Promise(() => undefined));

      const pending = service.check();
      await jest.advanceTimersByTimeAsync(3000);

      await expect(pending).resolves.toEqual({ status: HttpStatus.SERVICE_UNAVAILABLE, message: 'Unhealthy' });
    });
  });
});
