import { ExecutionContext, UnsupportedMediaTypeException } from '@nestjs/common';
import { JsonContentTypeGuard } from './json-content-type.guard';

describe('JsonContentTypeGuard', () => {
  const guard = new JsonContentTypeGuard();

  const contextWith = (headers: Record<string, string>): ExecutionContext =>
    ({
      switchToHttp: () => ({
        getRequest: () => ({ headers }),
      }),
    }) as unknown as ExecutionContext;

  it('should accept application/json', () => {
    expect(guard.canActivate(contextWith({ 'content-type': 'application/json' }))).toBe(true);
  });

  it('should ignore parameters and case', () => {
    expect(guard.canActivate(contextWith({ 'content-type': 'Application/JSON; charset=utf-8' }))).toBe(true);
  });

  it('should reject a missing Content-Type', () => {
    expect(() => guard.canActivate(contextWith({}))).toThrow(UnsupportedMediaTypeException);
  });

  it.each(['text/plain', 'application/x-www-form-urlencoded', 'application/jsonp'])('should reject %s', (type) => {
    expect(() => guard.canActivate(contextWith({ 'content-type': type }))).toThrow(
      'Content-Type must be application/json',
    );
  });
});
