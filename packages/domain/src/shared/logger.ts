// Logging utility for the facility throughput core
import { env, type LogLevelSetting } from './env';

export type LogLevel = Exclude<LogLevelSetting, 'silent'>;

export interface LogContext {
  productKey?: string;
  sequenceId?: string;
  event?: string;
  duration?: number;
  operation?: string;
  error?: string;
  code?: string;
  field?: string;
  value?: number;
  [key: string]: string | number | boolean | null | undefined;
}

type LogInput = LogContext | Error | undefined;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
}

export interface LoggerOptions {
  level?: LogLevelSetting;
  // pretty: one console line per entry, json: one serialized entry per line
  format?: 'pretty' | 'json';
}

const LEVEL_WEIGHT: Record<LogLevelSetting, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  critical: 50,
  silent: 100,
};

export class Logger {
  private readonly threshold: number;
  private readonly format: 'pretty' | 'json';

  constructor(options: LoggerOptions = {}) {
    this.threshold = LEVEL_WEIGHT[options.level ?? 'info'];
    this.format = options.format ?? 'pretty';
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_WEIGHT[level] >= this.threshold;
  }

  private normalizeContext(input: LogInput): LogContext | undefined {
    if (!input) return undefined;
    if (input instanceof Error) {
      return { error: input.message, stack: input.stack };
    }
    return input;
  }

  private log(level: LogLevel, message: string, context?: LogInput) {
    if (!this.isEnabled(level)) return;

    const timestamp = new Date().toISOString();
    const normalized = this.normalizeContext(context);

    if (this.format === 'json') {
      const entry: LogEntry = { timestamp, level, message, context: normalized };
      this.write(level, JSON.stringify(entry));
      return;
    }

    const prefix = `[${timestamp}] ${level.toUpperCase()}:`;
    if (normalized) {
      this.write(level, prefix, message, normalized);
    } else {
      this.write(level, prefix, message);
    }
  }

  private write(level: LogLevel, ...args: unknown[]) {
    switch (level) {
      case 'debug':
        console.debug(...args);
        break;
      case 'info':
        console.info(...args);
        break;
      case 'warn':
        console.warn(...args);
        break;
      case 'error':
      case 'critical':
        console.error(...args);
        break;
    }
  }

  debug(message: string, context?: LogInput) {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogInput) {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogInput) {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogInput) {
    this.log('error', message, context);
  }

  critical(message: string, context?: LogInput) {
    this.log('critical', message, context);
  }

  // Facility-specific logging methods
  logConfigurationChange(productKey: string, field: string, value: number) {
    this.info('Product configuration updated', {
      productKey,
      field,
      value,
      event: 'configuration_change',
    });
  }

  logSkippedProduct(sequenceId: string, productKey: string, reason: string) {
    this.warn(`Skipping ${productKey} in ${sequenceId}: ${reason}`, {
      sequenceId,
      productKey,
      event: 'sequence_skip',
    });
  }

  logPerformance(operation: string, duration: number, context?: LogContext) {
    this.debug(`Performance: ${operation} took ${duration.toFixed(2)}ms`, {
      ...context,
      duration,
      operation,
      event: 'performance',
    });
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

export const logger = createLogger({
  level: env.LOG_LEVEL,
  format: env.NODE_ENV === 'production' ? 'json' : 'pretty',
});

// Measure a synchronous operation and log how long it took
export function measurePerformance<T>(operation: string, fn: () => T, context?: LogContext): T {
  const start = performance.now();

  try {
    const result = fn();
    logger.logPerformance(operation, performance.now() - start, context);
    return result;
  } catch (error) {
    const duration = performance.now() - start;
    logger.error(`${operation} failed after ${duration.toFixed(2)}ms`, {
      ...context,
      error: error instanceof Error ? error.message : 'Unknown error',
    });
    throw error;
  }
}
