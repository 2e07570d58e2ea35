import winston from 'winston';
import { loggingConfig } from '@core/config/logging';
import type { ServiceName } from '@core/config/logging';

/**
 * The logging surface the runtime depends on. winston loggers satisfy it;
 * tests pass plain spies.
 */
export interface ILogger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

export interface ILoggerFactory {
  createServiceLogger(serviceName: ServiceName): winston.Logger;
}

winston.addColors(loggingConfig.colors);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.colorize({ all: loggingConfig.format.colorize }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    // Concise output unless debugging
    if (process.env.LIVENS_DEBUG !== 'true') {
      return `${level}: ${message}`;
    }

    let msg = `${timestamp} [${level}]${service ? ` [${service}]` : ''} ${message}`;
    if (Object.keys(metadata).length > 0) {
      msg += '\n' + JSON.stringify(metadata, null, 2);
    }
    return msg;
  })
);

const isTest = (): boolean => process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

/**
 * LOG_LEVEL wins, then the test defaults, then LIVENS_DEBUG, then the
 * service's configured level.
 */
export function getServiceLogLevel(serviceName: ServiceName): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }

  if (isTest()) {
    return process.env.TEST_LOG_LEVEL || 'error';
  }

  if (process.env.LIVENS_DEBUG === 'true') {
    return 'debug';
  }

  return loggingConfig.services[serviceName].level;
}

/**
 * Factory service for creating Winston loggers
 */
export class LoggerFactory implements ILoggerFactory {
  private readonly loggers = new Map<ServiceName, winston.Logger>();

  createServiceLogger(serviceName: ServiceName): winston.Logger {
    const existing = this.loggers.get(serviceName);
    if (existing) {
      return existing;
    }

    const level = getServiceLogLevel(serviceName);
    const logger = winston.createLogger({
      level,
      levels: loggingConfig.levels,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
      ),
      defaultMeta: { service: serviceName },
      silent: isTest(),
      transports: [
        new winston.transports.Console({
          format: consoleFormat,
          stderrLevels: ['error', 'warn'],
          level
        })
      ]
    });

    this.loggers.set(serviceName, logger);
    return logger;
  }

  /**
   * Applies a level to every logger created so far (used by the CLI after
   * reading configuration and flags).
   */
  setLevel(level: string): void {
    for (const logger of this.loggers.values()) {
      logger.level = level;
      logger.transports.forEach(transport => {
        transport.level = level;
      });
    }
  }
}

export const loggerFactory = new LoggerFactory();

export const registryLogger = loggerFactory.createServiceLogger('registry');
export const passLogger = loggerFactory.createServiceLogger('pass');
export const aliasLogger = loggerFactory.createServiceLogger('alias');
export const loaderLogger = loggerFactory.createServiceLogger('loader');
export const frontendLogger = loggerFactory.createServiceLogger('frontend');
export const configLogger = loggerFactory.createServiceLogger('config');
export const cliLogger = loggerFactory.createServiceLogger('cli');
