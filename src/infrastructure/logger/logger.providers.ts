import { Provider, Scope } from '@nestjs/common';
import { INQUIRER } from '@nestjs/core';
import { LOGGER_SERVICE } from '@/domain/services';
import { LoggerService } from './custom-logger.service';

/**
 * Binds LOGGER_SERVICE to a fresh LoggerService per injection (transient scope),
 * named after the class that asked for it.
 */
export const loggerProviders: Provider[] = [
  {
    provide: LOGGER_SERVICE,
    useFactory: (inquirer?: object) => new LoggerService(inquirer?.constructor.name ?? ''),
    inject: [{ token: INQUIRER, optional: true }],
    scope: Scope.TRANSIENT,
  },
];
