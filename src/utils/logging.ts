import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';

const isTestEnv = process.env.NODE_ENV === 'test' || Boolean(process.env.VITEST);

class LoggingConfig {
  private logLevel: string;
  private maxSize: string;
  private retention: string;
  private compression: boolean;
  private logDir: string;

  constructor() {
    this.logLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();
    this.maxSize = process.env.LOG_MAX_SIZE || '10m';
    this.retention = this.parseRetention(process.env.LOG_RETENTION || '30 days');
    this.compression = process.env.LOG_COMPRESS !== 'false';
    this.logDir = process.env.LOG_DIR || path.join(process.cwd(), 'logs');
  }

  private formatLine(info: winston.Logform.TransformableInfo, stackPrefix: string): string {
    const { timestamp, level, message, stack, ...meta } = info;
    const stackStr = typeof stack === 'string' ? `\n${stackPrefix}${stack}` : '';
    const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} | ${level} | ${String(message)}${metaStr}${stackStr}`;
  }

  private createConsoleFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.colorize({ all: true }),
      winston.format.printf(info => this.formatLine(info, ''))
    );
  }

  private createFileFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.printf(info => this.formatLine(info, 'Stack: '))
    );
  }

  private parseRetention(retention: string): string {
    // "30 days" -> "30d", "12 hours" -> "12h"
    const match = retention.match(/(\d+)\s*(day|days|d|hour|hours|h)/i);
    if (match) {
      const num = match[1];
      const unit = match[2].toLowerCase();
      if (unit.startsWith('d')) return `${num}d`;
      if (unit.startsWith('h')) return `${num}h`;
    }
    return '30d';
  }

  private createRotatingTransport(prefix: string, level?: string): DailyRotateFile {
    return new DailyRotateFile({
      filename: path.join(this.logDir, `${prefix}-%DATE%.log`),
      datePattern: 'YYYY-MM-DD',
      maxSize: this.maxSize,
      maxFiles: this.retention,
      zippedArchive: this.compression,
      level,
      format: this.createFileFormat(),
    });
  }

  setupLogging(): winston.Logger {
    const logger = winston.createLogger({
      level: this.logLevel,
      format: this.createFileFormat(),
      transports: [],
      exitOnError: false,
    });

    logger.add(new winston.transports.Console({
      level: this.logLevel,
      format: this.createConsoleFormat(),
      silent: isTestEnv,
    }));

    if (isTestEnv) {
      return logger;
    }

    if (!fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }

    logger.add(this.createRotatingTransport('sys'));
    logger.add(this.createRotatingTransport('error', 'error'));
    logger.add(this.createRotatingTransport('combined', 'silly'));

    return logger;
  }
}

export const loggingConfig = new LoggingConfig();

export const logger = loggingConfig.setupLogging();

/**
 * Security-relevant events (signup, login, password reset, status changes)
 */
export function auditLog(event: string, details: Record<string, unknown> = {}) {
  logger.info(`[AUDIT] ${event}`, details);
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
