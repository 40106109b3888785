import { pino } from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import type { AppConfig } from './config.js';
import { cfg } from './config.js';
import { isTreeCipherError } from '../errors/base.js';

/**
 * Logger configuration
 *
 * Output always goes to stderr. Tests only see warnings and errors; development
 * output is pretty-printed and production output is JSON.
 */
export class LoggerFactory {
  private readonly appConfig: AppConfig;
  private readonly mainLogger: Logger;

  constructor(appConfig: AppConfig) {
    this.appConfig = appConfig;
    const options = this.createLoggerOptions();
    // pino rejects a destination stream alongside a transport; the transport writes to fd 2 itself
    this.mainLogger = options.transport ? pino(options) : pino(options, process.stderr);
  }

  private createLoggerOptions(): LoggerOptions {
    const isDevelopment = this.appConfig.NODE_ENV === 'development';
    const isTest = this.appConfig.NODE_ENV === 'test';

    const baseOptions: LoggerOptions = {
      level: isTest ? 'warn' : this.appConfig.LOG_LEVEL,
      base: {
        pid: process.pid,
        hostname: process.env.HOSTNAME || 'unknown',
      },
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label: string) => ({ level: label }),
      },
    };

    if (isDevelopment) {
      return {
        ...baseOptions,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'yyyy-mm-dd HH:MM:ss',
            ignore: 'pid,hostname',
            destination: 2, // stderr
          },
        },
      };
    }

    return baseOptions;
  }

  getLogger(): Logger {
    return this.mainLogger;
  }

  /**
   * Create a module-specific logger
   *
   * @param moduleName - Name of the module/component
   */
  createModuleLogger(moduleName: string): Logger {
    return this.mainLogger.child({ module: moduleName });
  }
}

const defaultFactory = new LoggerFactory(cfg);

export function createLoggerFactory(appConfig: AppConfig): LoggerFactory {
  return new LoggerFactory(appConfig);
}

export const logger = defaultFactory.getLogger();

export function createModuleLogger(moduleName: string): Logger {
  return defaultFactory.createModuleLogger(moduleName);
}

/**
 * Performance timing utility
 *
 * @returns Function to call when the operation completes; logs at debug level
 */
export function startTimer(
  logger: Logger,
  operation: string
): (result?: Record<string, unknown>) => void {
  const start = process.hrtime.bigint();

  return (result: Record<string, unknown> = {}) => {
    const duration = Number(process.hrtime.bigint() - start) / 1_000_000;

    logger.debug(
      {
        operation,
        duration: `${duration.toFixed(2)}ms`,
        ...result,
      },
      `${operation} completed in ${duration.toFixed(2)}ms`
    );
  };
}

/**
 * Log an error with its details. Cipher errors are expected failures of the
 * caller's input and are logged at warn; anything else at error.
 */
export function logError(
  logger: Logger,
  error: Error | string,
  context: Record<string, unknown> = {}
): void {
  if (typeof error === 'string') {
    logger.error(context, error);
    return;
  }

  const errorInfo: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };

  if ('cause' in error && error.cause !== undefined) {
    errorInfo.cause = error.cause;
  }

  const level = isTreeCipherError(error) ? 'warn' : 'error';
  logger[level](
    {
      ...context,
      error: errorInfo,
    },
    error.message
  );
}
