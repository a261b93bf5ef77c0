import { ConsoleLogger, Injectable, LogLevel } from '@nestjs/common';
import { LOG_LEVELS } from '@/infrastructure/config/env.validation';

export interface LogMetadata {
  [key: string]: unknown;
}

interface FormattedEntry {
  message: string;
  context?: string;
  stack?: string;
}

/**
 * Console logger that accepts a metadata object after the message:
 * `logger.log('Recommendation created', { id })` prints `[create] Recommendation created {"id":1}`.
 * Plain Nest-style calls (`message, context`) pass through unchanged.
 */
@Injectable()
export class LoggerService extends ConsoleLogger {
  private static enabledLevels: readonly LogLevel[] = LOG_LEVELS;

  constructor(context: string = '') {
    super(context);
  }

  /** Enables `minimum` and every more severe level, for all instances. */
  static useMinimumLevel(minimum: LogLevel): void {
    LoggerService.enabledLevels = LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(minimum) + 1);
  }

  log(message: string, ...optionalParams: unknown[]) {
    const entry = this.format(message, optionalParams);
    if (entry.context) super.log(entry.message, entry.context);
    else super.log(entry.message);
  }

  error(message: string, ...optionalParams: unknown[]) {
    const entry = this.format(message, optionalParams);
    if (entry.stack) super.error(entry.message, entry.stack, entry.context ?? this.context);
    else if (entry.context) super.error(entry.message, entry.context);
    else super.error(entry.message);
  }

  warn(message: string, ...optionalParams: unknown[]) {
    const entry = this.format(message, optionalParams);
    if (entry.context) super.warn(entry.message, entry.context);
    else super.warn(entry.message);
  }

  debug(message: string, ...optionalParams: unknown[]) {
    const entry = this.format(message, optionalParams);
    if (entry.context) super.debug(entry.message, entry.context);
    else super.debug(entry.message);
  }

  verbose(message: string, ...optionalParams: unknown[]) {
    const entry = this.format(message, optionalParams);
    if (entry.context) super.verbose(entry.message, entry.context);
    else super.verbose(entry.message);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LoggerService.enabledLevels.includes(level);
  }

  private format(message: string, optionalParams: unknown[]): FormattedEntry {
    const [first, second, third] = optionalParams;
    const asString = (value: unknown) => (typeof value === 'string' ? value : undefined);

    if (!isMetadata(first)) {
      // Nest internals: (message, context) or (message, stack, context)
      return { message: String(message), context: asString(first), stack: asString(second) };
    }

    const parts: string[] = [];
    const methodName = this.callerMethodName();
    if (methodName) {
      parts.push(`[${methodName}]`);
    }
    parts.push(String(message));
    if (Object.keys(first).length > 0) {
      parts.push(JSON.stringify(first));
    }

    return { message: parts.join(' '), context: asString(second), stack: asString(third) };
  }

  /** Name of the first stack frame outside the logging classes. */
  private callerMethodName(): string {
    const frames = new Error().stack?.split('\n') ?? [];

    for (const frame of frames) {
      if (frame.includes('Logger')) {
        continue;
      }
      // "    at ClassName.methodName (/path/to/file.ts:line:column)"
      const match = frame.match(/at\s+(?:[\w$]+\.)?([\w$]+)\s+\(/);
      if (match) {
        return match[1];
      }
    }

    return '';
  }
}

function isMetadata(value: unknown): value is LogMetadata {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
