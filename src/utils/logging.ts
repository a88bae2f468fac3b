import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import { appConfig } from '../connections/config/app.config';

class LoggingConfig {
  private logLevel: string;
  private rotation: string;
  private retention: string;
  private compression: boolean;
  private logDir: string;
  private fileLogging: boolean;

  constructor() {
    this.logLevel = appConfig.logLevel;
    this.rotation = '10MB';
    this.retention = '30d';
    this.compression = true;
    this.logDir = path.resolve(appConfig.logDir);

    // Test runs only log to the console
    this.fileLogging = appConfig.nodeEnv !== 'test';

    if (this.fileLogging && !fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
  }

  private formatLine(info: winston.Logform.TransformableInfo, stackPrefix: string): string {
    const { timestamp, level, message, stack, ...meta } = info;
    const stackStr = stack ? `\n${stackPrefix}${String(stack)}` : '';
    const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} | ${level} | ${String(message)}${metaStr}${stackStr}`;
  }

  private createConsoleFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.colorize({ all: true }),
      winston.format.printf((info) => this.formatLine(info, ''))
    );
  }

  private createFileFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.printf((info) => this.formatLine(info, 'Stack: '))
    );
  }

  private createRotatingFile(baseName: string, level?: string): DailyRotateFile {
    return new DailyRotateFile({
      filename: path.join(this.logDir, `${baseName}-%DATE%.log`),
      datePattern: 'YYYY-MM-DD',
      maxSize: this.rotation,
      maxFiles: this.retention,
      zippedArchive: this.compression,
      level,
      format: this.createFileFormat(),
    });
  }

  setupLogging(): winston.Logger {
    const logger = winston.createLogger({
      level: this.logLevel.toLowerCase(),
      format: this.createFileFormat(),
      transports: [],
      exitOnError: false,
    });

    logger.add(new winston.transports.Console({
      level: this.logLevel.toLowerCase(),
      format: this.createConsoleFormat(),
    }));

    if (this.fileLogging) {
      logger.add(this.createRotatingFile('sys'));
      logger.add(this.createRotatingFile('error', 'error'));
    }

    return logger;
  }
}

export const logger = new LoggingConfig().setupLogging();

/**
 * Audit trail for security relevant events (role changes, order transitions, deletions)
 */
export function auditLog(event: string, details: Record<string, unknown> = {}) {
  logger.info(`[AUDIT] ${event}`, details);
}

/**
 * Normalize an unknown thrown value into log metadata
 */
export function errorMeta(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { error: error.message, stack: error.stack };
  }
  return { error: String(error) };
}
