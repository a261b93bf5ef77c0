import { Environment, validate } from './env.validation';

describe('validate (environment)', () => {
  it('should apply defaults to an empty environment', () => {
    const config = validate({});

    expect(config.NODE_ENV).toBe(Environment.Development);
    expect(config.PORT).toBe(8080);
    expect(config.LOG_LEVEL).toBe('log');
    expect(config.DATABASE_PATH).toBe('./data/recommendations.sqlite');
    expect(config.DATABASE_SYNCHRONIZE).toBe(true);
    expect(config.RATE_LIMIT_TTL).toBe(60);
    expect(config.RATE_LIMIT_MAX).toBe(100);
  });

  it('should convert string values from the environment', () => {
    const config = validate({
      NODE_ENV: 'production',
      PORT: '3000',
      LOG_LEVEL: 'debug',
      DATABASE_PATH: ':memory:',
      DATABASE_SYNCHRONIZE: 'false',
      TYPEORM_LOGGING: 'FALSE',
      RATE_LIMIT_MAX: '5',
    });

    expect(config.NODE_ENV).toBe(Environment.Production);
    expect(config.PORT).toBe(3000);
    expect(config.LOG_LEVEL).toBe('debug');
    expect(config.DATABASE_PATH).toBe(':memory:');
    expect(config.DATABASE_SYNCHRONIZE).toBe(false);
    expect(config.TYPEORM_LOGGING).toBe(false);
    expect(config.RATE_LIMIT_MAX).toBe(5);
  });

  it('should reject a non-numeric port', () => {
    expect(() => validate({ PORT: 'eighty' })).toThrow(/^Environment validation failed:\nPORT: /);
  });

  it('should reject an unknown log level', () => {
    expect(() => validate({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL: /);
  });

  it('should reject an unknown NODE_ENV', () => {
    expect(() => validate({ NODE_ENV: 'staging' })).toThrow(/NODE_ENV: /);
  });
});
