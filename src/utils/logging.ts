import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import { appConfig, loggingConfig } from '../connections/config/app.config';

interface CallerInfo {
  file?: string;
  line?: number;
  function?: string;
}

const isCallSite = (frame: unknown): frame is NodeJS.CallSite =>
  typeof frame === 'object' &&
  frame !== null &&
  'getFileName' in frame &&
  typeof frame.getFileName === 'function';

/**
 * Whether a stack frame's file belongs to application code rather than
 * winston, a dependency or this module, in source or compiled form
 */
export const isCallerFile = (file: string): boolean =>
  !file.includes('node_modules') && !file.includes('winston') && path.parse(file).name !== 'logging';

class LoggingConfig {
  private logLevel: string;
  private rotation: string;
  private retention: string;
  private compression: boolean;
  private logDir: string;
  private fileTransports: boolean;
  private silent: boolean;

  constructor() {
    this.logLevel = loggingConfig.level;
    this.rotation = loggingConfig.rotation;
    this.retention = loggingConfig.retention;
    this.compression = loggingConfig.compression;
    this.logDir = path.resolve(process.cwd(), loggingConfig.dir);

    // Test runs log nowhere: no files, no console noise
    this.silent = appConfig.nodeEnv === 'test';
    this.fileTransports = !this.silent;

    if (this.fileTransports && !fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
  }

  private getCallerInfo(): CallerInfo {
    const originalFunc = Error.prepareStackTrace;
    const info: CallerInfo = {};

    try {
      Error.prepareStackTrace = (_err, stack) => stack;
      const stack: unknown = new Error().stack;

      if (!Array.isArray(stack)) {
        return info;
      }

      // Skip this frame and the winston format function
      for (const frame of stack.slice(2)) {
        if (!isCallSite(frame)) {
          continue;
        }
        const file = frame.getFileName();

        if (file && isCallerFile(file)) {
          info.file = file;
          info.line = frame.getLineNumber() ?? undefined;
          info.function = frame.getFunctionName() || 'anonymous';
          break;
        }
      }
    } finally {
      Error.prepareStackTrace = originalFunc;
    }

    return info;
  }

  private formatLine(info: Record<string, unknown>, stackPrefix: string): string {
    const { timestamp, level, message, stack, ...meta } = info;
    const callerInfo = this.getCallerInfo();
    const location = callerInfo.file && callerInfo.line
      ? ` | ${callerInfo.file}:${callerInfo.line}${callerInfo.function ? ` (${callerInfo.function})` : ''}`
      : '';

    const stackStr = stack ? `\n${stackPrefix}${stack}` : '';
    const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
    return `${timestamp} | ${level} | ${message}${location}${metaStr}${stackStr}`;
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

  private parseRotation(rotation: string): { maxSize?: string; datePattern?: string } {
    if (rotation.includes('MB') || rotation.includes('KB') || rotation.includes('GB')) {
      return { maxSize: rotation };
    } else if (rotation.includes('day') || rotation.includes('hour')) {
      return { datePattern: 'YYYY-MM-DD' };
    }
    return { maxSize: '10MB' };
  }

  private parseRetention(retention: string): string {
    // "30 days" -> "30d"
    const match = retention.match(/(\d+)\s*(day|days|d|hour|hours|h)/i);
    if (match) {
      const num = match[1];
      const unit = match[2].toLowerCase();
      if (unit.startsWith('d')) return `${num}d`;
      if (unit.startsWith('h')) return `${num}h`;
    }
    return '30d';
  }

  private createFileTransport(name: string, level?: string): DailyRotateFile {
    const rotationConfig = this.parseRotation(this.rotation);

    return new DailyRotateFile({
      filename: path.join(this.logDir, `${name}-%DATE%.log`),
      datePattern: rotationConfig.datePattern || 'YYYY-MM-DD',
      maxSize: rotationConfig.maxSize,
      maxFiles: this.parseRetention(this.retention),
      zippedArchive: this.compression,
      format: this.createFileFormat(),
      ...(level ? { level } : {}),
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
      silent: this.silent,
    }));

    if (this.fileTransports) {
      logger.add(this.createFileTransport('sys'));
      logger.add(this.createFileTransport('error', 'error'));
      logger.add(this.createFileTransport('combined', 'silly'));
    }

    return logger;
  }
}

export const loggingSetup = new LoggingConfig();

export const logger = loggingSetup.setupLogging();

export { LoggingConfig };

export function auditLog(event: string, details: Record<string, unknown> = {}) {
  logger.info(`[AUDIT] ${event}`, details);
}

/**
 * Normalise an unknown thrown value into loggable metadata
 */
export const errorMeta = (error: unknown): { error: string; stack?: string } =>
  error instanceof Error
    ? { error: error.message, stack: error.stack }
    : { error: String(error) };
