import winston from 'winston';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import type { Config } from '../config/schema.js';
import { InfraGraphError } from '../errors/index.js';

const DEFAULT_MAX_SIZE = 10 * 1024 * 1024;

/**
 * Logger module using Winston
 * Structured logging with json/simple/pretty formats. Console output goes to
 * stderr because stdout carries the MCP stdio transport.
 */
export class Logger {
  private logger: winston.Logger;
  private config: Config['logging'];

  constructor(config: Config['logging'], logger?: winston.Logger) {
    this.config = config;
    if (logger) {
      this.logger = logger;
    } else {
      this.ensureLogDirectory();
      this.logger = this.createLogger();
    }
  }

  private ensureLogDirectory(): void {
    if (!existsSync(this.config.dir)) {
      mkdirSync(this.config.dir, { recursive: true });
    }
  }

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
            let msg = `${String(timestamp)} [${level}]: ${String(message)}`;
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
          winston.format.printf(({ timestamp, level, message }) => {
            return `${String(timestamp)} [${level}]: ${String(message)}`;
          })
        );
    }
  }

  private getTransports(): winston.transport[] {
    const transports: winston.transport[] = [];

    transports.push(
      new winston.transports.Console({
        stderrLevels: ['error', 'warn', 'info', 'debug'],
        format: this.config.format === 'json' ? winston.format.json() : this.getFormats(),
      })
    );

    transports.push(
      new winston.transports.File({
        filename: join(this.config.dir, 'infragraph-combined.log'),
        maxsize: this.parseSize(this.config.maxSize),
        maxFiles: this.config.maxFiles,
      })
    );

    transports.push(
      new winston.transports.File({
        filename: join(this.config.dir, 'infragraph-error.log'),
        level: 'error',
        maxsize: this.parseSize(this.config.maxSize),
        maxFiles: this.config.maxFiles,
      })
    );

    return transports;
  }

  /**
   * Parse size string ("10m", "512k") to bytes
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
      return DEFAULT_MAX_SIZE;
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
   * Log error message; InfraGraphError code and severity are attached
   */
  error(message: string, error?: unknown, metadata?: object): void {
    if (error === undefined) {
      this.logger.error(message, metadata);
      return;
    }

    const errorMetadata =
      error instanceof Error
        ? {
            message: error.message,
            stack: error.stack,
            ...(error instanceof InfraGraphError
              ? { code: error.code, severity: error.severity }
              : {}),
          }
        : { message: String(error) };

    this.logger.error(message, { error: errorMetadata, ...metadata });
  }

  /**
   * Create child logger with additional metadata
   */
  child(metadata: object): Logger {
    return new Logger(this.config, this.logger.child(metadata));
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
