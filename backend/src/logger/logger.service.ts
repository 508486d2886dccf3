import { Injectable, LoggerService as NestLoggerService, Scope } from '@nestjs/common';
import * as winston from 'winston';

export interface LogContext {
  [key: string]: unknown;
}

const asText = (value: unknown): string => (value === undefined || value === null ? '' : String(value));

let sharedLogger: winston.Logger | undefined;

/**
 * The process-wide winston logger. Built on first use, after the config module
 * has loaded `.env`, and only once so its exception handlers register once.
 */
export function getWinstonLogger(): winston.Logger {
  if (!sharedLogger) {
    sharedLogger = createWinstonLogger();
  }
  return sharedLogger;
}

function createWinstonLogger(): winston.Logger {
  const isDevelopment = process.env.NODE_ENV === 'development';

  return winston.createLogger({
    level: process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info'),
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      isDevelopment ? winston.format.colorize() : winston.format.json(),
      winston.format.printf((info) => {
        const { timestamp, level, message, context, requestId, stack, ...metadata } = info;
        if (isDevelopment) {
          const ctx = context ? `[${asText(context)}]` : '';
          const reqId = requestId ? `[${asText(requestId)}]` : '';
          const trace = stack ? `\n${asText(stack)}` : '';
          return `${asText(timestamp)} ${level} ${ctx}${reqId} ${asText(message)}${trace}`;
        }
        // JSON format for production
        return JSON.stringify({
          timestamp,
          level,
          context,
          requestId,
          message,
          ...metadata,
          ...(stack ? { stack } : {}),
        });
      }),
    ),
    transports: [
      new winston.transports.Console({
        handleExceptions: true,
        handleRejections: true,
      }),
    ],
  });
}

// Transient so that every consumer keeps its own context
@Injectable({ scope: Scope.TRANSIENT })
export class LoggerService implements NestLoggerService {
  private readonly logger: winston.Logger;
  private context?: string;

  constructor() {
    this.logger = getWinstonLogger();
  }

  setContext(context: string) {
    this.context = context;
  }

  log(message: string, context?: string | LogContext, metadata?: LogContext) {
    this.logger.info(message, this.meta(context, metadata));
  }

  error(message: string, trace?: string, context?: string | LogContext, metadata?: LogContext) {
    this.logger.error(message, { ...this.meta(context, metadata), stack: trace });
  }

  warn(message: string, context?: string | LogContext, metadata?: LogContext) {
    this.logger.warn(message, this.meta(context, metadata));
  }

  debug(message: string, context?: string | LogContext, metadata?: LogContext) {
    this.logger.debug(message, this.meta(context, metadata));
  }

  verbose(message: string, context?: string | LogContext, metadata?: LogContext) {
    this.logger.verbose(message, this.meta(context, metadata));
  }

  private meta(context?: string | LogContext, metadata?: LogContext): LogContext {
    const ctx = typeof context === 'string' ? context : this.context;
    const meta = typeof context === 'object' ? context : metadata;
    return { context: ctx, ...meta };
  }
}
