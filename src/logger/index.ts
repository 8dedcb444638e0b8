import winston from 'winston';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import type { Config } from '../config/schema.js';
import { DiskError } from '../errors/index.js';

/**
 * Logger module using Winston
 * Console output goes to stderr so command output on stdout stays parseable.
 */

const ALL_LEVELS = ['error', 'warn', 'info', 'debug'];

export class Logger {
  private logger: winston.Logger;
  private config: Config['logging'];

  constructor(config: Config['logging']) {
    this.config = config;
    this.ensureLogDirectory();
    this.logger = this.createLogger();
  }

  private ensureLogDirectory(): void {
    if (this.config.dir && !existsSync(this.config.dir)) {
      mkdirSync(this.config.dir, { recursive: true });
    }
  }

  /**
   * Create Winston logger instance
   */
  private createLogger(): winston.Logger {
    return winston.createLogger({
      level: this.config.level,
      format: this.getFormats(),
      transports: this.getTransports(),
      exitOnError: false,
    });
  }

  /**
   * Get log formats based on configuration
   */
  private getFormats(): winston.Logform.Format {
    const timestamp = winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss.SSS',
    });

    const errors = winston.format.errors({ stack: true });

    switch (this.config.format) {
      case 'json':
        return winston.format.combine(timestamp, errors, winston.format.json());

      case 'pretty':
        return winston.format.combine(
          timestamp,
          errors,
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, ...metadata }) => {
            let msg = `${timestamp} [${level}]: ${message}`;
            if (Object.keys(metadata).length > 0) {
              msg += ` ${JSON.stringify(metadata, null, 2)}`;
            }
            return msg;
          })
        );

      case 'simple':
      default:
        return winston.format.combine(
          timestamp,
          errors,
          winston.format.printf(({ timestamp, level, message, device }) => {
            const prefix = typeof device === 'string' ? `${device}: ` : '';
            return `${timestamp} [${level}]: ${prefix}${message}`;
          })
        );
    }
  }

  /**
   * Get transports based on configuration
   */
  private getTransports(): winston.transport[] {
    const transports: winston.transport[] = [
      new winston.transports.Console({ stderrLevels: ALL_LEVELS }),
    ];

    const dir = this.config.dir;
    if (dir) {
      transports.push(
        new winston.transports.File({
          filename: join(dir, 'diskscope-combined.log'),
          format: winston.format.json(),
          maxsize: this.parseSize(this.config.maxSize),
          maxFiles: this.config.maxFiles,
        }),
        new winston.transports.File({
          filename: join(dir, 'diskscope-error.log'),
          level: 'error',
          format: winston.format.json(),
          maxsize: this.parseSize(this.config.maxSize),
          maxFiles: this.config.maxFiles,
        })
      );
    }

    return transports;
  }

  /**
   * Parse size string to bytes
   */
  private parseSize(size: string): number {
    const units: Record<string, number> = {
      b: 1,
      k: 1024,
      m: 1024 * 1024,
      g: 1024 * 1024 * 1024,
    };

    const match = size.toLowerCase().match(/^(\d+)([bkmg])$/);
    const num = match?.[1];
    const unit = match?.[2];
    if (!num || !unit) {
      return 10 * 1024 * 1024;
    }

    return parseInt(num, 10) * (units[unit] ?? 1);
  }

  debug(message: string, metadata?: object): void {
    this.logger.debug(message, metadata);
  }

  info(message: string, metadata?: object): void {
    this.logger.info(message, metadata);
  }

  warn(message: string, metadata?: object): void {
    this.logger.warn(message, metadata);
  }

  /**
   * Log error message, attaching code and severity for DiskError instances
   */
  error(message: string, error?: Error | DiskError, metadata?: object): void {
    const errorMetadata = error
      ? {
          error: {
            message: error.message,
            stack: error.stack,
            ...(error instanceof DiskError ? { code: error.code, severity: error.severity } : {}),
          },
          ...metadata,
        }
      : metadata;

    this.logger.error(message, errorMetadata);
  }

  /**
   * Create child logger with additional metadata
   */
  child(metadata: object): Logger {
    const childLogger = new Logger(this.config);
    childLogger.logger = this.logger.child(metadata);
    return childLogger;
  }
}

// Singleton instance
let loggerInstance: Logger | null = null;

/**
 * Get logger singleton
 */
export function getLogger(config?: Config['logging']): Logger {
  if (!loggerInstance && config) {
    loggerInstance = new Logger(config);
  } else if (!loggerInstance) {
    throw new Error('Logger not initialized. Call getLogger with config first.');
  }
  return loggerInstance;
}

/**
 * Reset logger (useful for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}
