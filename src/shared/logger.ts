import path from 'node:path';
import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

let rootLogger: winston.Logger | null = null;

function createRootLogger(): winston.Logger {
  const logDir = process.env.LOG_DIR || 'logs';
  const fileTransports =
    process.env.LOG_TO_FILE !== 'false'
      ? [
          new winston.transports.File({ filename: path.join(logDir, 'error.log'), level: 'error' }),
          new DailyRotateFile({
            dirname: logDir,
            filename: 'combined-%DATE%.log',
            datePattern: 'YYYY-MM-DD',
            maxSize: '10m',
            maxFiles: '7',
            zippedArchive: false,
          }),
        ]
      : [];

  return winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json(),
    ),
    transports: [
      new winston.transports.Console({
        format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
      }),
      ...fileTransports,
    ],
  });
}

function toMeta(meta: unknown): Record<string, unknown> | undefined {
  if (meta === undefined) return undefined;
  if (meta instanceof Error) {
    return { error: meta.message, stack: meta.stack };
  }
  if (typeof meta === 'object' && meta !== null) {
    return { ...meta };
  }
  return { detail: meta };
}

export class Logger {
  private readonly logger: winston.Logger;

  constructor(private readonly context: string) {
    rootLogger ??= createRootLogger();
    this.logger = rootLogger.child({ context });
  }

  info(message: string, meta?: unknown): void {
    this.logger.info(message, toMeta(meta));
  }

  error(message: string, meta?: unknown): void {
    this.logger.error(message, toMeta(meta));
  }

  warn(message: string, meta?: unknown): void {
    this.logger.warn(message, toMeta(meta));
  }

  debug(message: string, meta?: unknown): void {
    this.logger.debug(message, toMeta(meta));
  }
}
