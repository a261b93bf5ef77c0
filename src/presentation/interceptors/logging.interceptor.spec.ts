import { CallHandler, ExecutionContext } from '@nestjs/common';
import { lastValueFrom, of } from 'rxjs';
import { LoggerService } from '@/infrastructure/logger';
import { LoggingInterceptor } from './logging.interceptor';

describe('LoggingInterceptor', () => {
  let logSpy: jest.SpyInstance;

  const contextFor = (request: object): ExecutionContext =>
    ({
      switchToHttp: () => ({
        getRequest: () => request,
        getResponse: () => ({ statusCode: 200 }),
      }),
    }) as unknown as ExecutionContext;

  const handlerReturning = (data: unknown): CallHandler => ({ handle: () => of(data) });

  beforeEach(() => {
    logSpy = jest.spyOn(LoggerService.prototype, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should log the request without empty parts', async () => {
    const context = contextFor({ method: 'GET', url: '/recommendations/3', params: { id: '3' }, query: {} });

    await lastValueFrom(new LoggingInterceptor().intercept(context, handlerReturning({ id: 3 })));

    expect(logSpy).toHaveBeenCalledWith('Request', {
      method: 'GET',
      url: '/recommendations/3',
      params: { id: '3' },
      query: undefined,
      body: undefined,
    });
  });

  it('should summarise a list response by its size', async () => {
    const context = contextFor({ method: 'GET', url: '/recommendations', params: {}, query: {} });

    const result = await lastValueFrom(new LoggingInterceptor().intercept(context, handlerReturning([{}, {}])));

    expect(result).toEqual([{}, {}]);
    expect(logSpy).toHaveBeenLastCalledWith(
      'Response',
      expect.objectContaining({ statusCode: 200, body: { count: 2 }, duration: expect.stringMatching(/^\d+ms$/) }),
    );
  });
});
