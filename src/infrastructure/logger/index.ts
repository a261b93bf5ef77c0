export { LoggerService } from './custom-logger.service';
export type { LogMetadata } from './custom-logger.service';
export { loggerProviders } from './logger.providers';
