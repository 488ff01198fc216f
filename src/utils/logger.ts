import { createLogger, format, transports, Logger } from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug'
}

export interface LogContext {
  operation?: string;
  recordId?: number;
  threadId?: number;
  conversationKey?: string;
  field?: string;
  eventType?: string;
  path?: string;
}

type LogMeta = Record<string, unknown>;

class ArchiveLogger {
  private readonly logger: Logger;

  constructor(level: string = LogLevel.WARN) {
    const isProduction = process.env.NODE_ENV === 'production';

    this.logger = createLogger({
      level,
      format: format.combine(
        format.timestamp(),
        format.errors({ stack: true }),
        format.json(),
        format.printf(({ timestamp, level, message, event, data, ...meta }) => {
          const messageStr = typeof message === 'string' ? message : String(message);
          return JSON.stringify({
            timestamp,
            level,
            event: event || messageStr.toLowerCase().replace(/\s+/g, '_'),
            data: data || meta,
            message: messageStr
          });
        })
      ),
      transports: [
        new transports.Console({
          stderrLevels: ['error', 'warn', 'info', 'debug'],
          format: format.combine(
            format.colorize(),
            format.simple()
          )
        }),
        ...(isProduction ? [
          new DailyRotateFile({
            filename: 'logs/sms-chat-archive-%DATE%.log',
            datePattern: 'YYYY-MM-DD',
            maxSize: '20m',
            maxFiles: '14d',
            format: format.json()
          }),
          new DailyRotateFile({
            filename: 'logs/error-%DATE%.log',
            datePattern: 'YYYY-MM-DD',
            level: 'error',
            maxSize: '20m',
            maxFiles: '30d',
            format: format.json()
          })
        ] : [
          new transports.File({
            filename: 'logs/sms-chat-archive.log',
            format: format.json()
          }),
          new transports.File({
            filename: 'logs/error.log',
            level: 'error',
            format: format.json()
          })
        ])
      ]
    });
  }

  setLevel(level: LogLevel): void {
    this.logger.level = level;
  }

  log(level: LogLevel, message: string, context?: LogContext, meta?: LogMeta) {
    this.logger.log(level, message, { ...context, ...meta });
  }

  info(message: string, context?: LogContext, meta?: LogMeta) {
    this.log(LogLevel.INFO, message, context, meta);
  }

  error(message: string, error?: Error, context?: LogContext, meta?: LogMeta) {
    this.log(LogLevel.ERROR, message, context, {
      error: error?.message,
      stack: error?.stack,
      ...meta
    });
  }

  warn(message: string, context?: LogContext, meta?: LogMeta) {
    this.log(LogLevel.WARN, message, context, meta);
  }

  debug(message: string, context?: LogContext, meta?: LogMeta) {
    this.log(LogLevel.DEBUG, message, context, meta);
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.values(LogLevel).some(level => level === value);
}

const configuredLevel = (process.env.LOG_LEVEL ?? '').toLowerCase();

export const logger = new ArchiveLogger(isLogLevel(configuredLevel) ? configuredLevel : LogLevel.WARN);
