import { Injectable, LoggerService as NestLoggerService, Scope } from '@nestjs/common';
import * as winston from 'winston';

export interface LogContext {
  [key: string]: unknown;
}

@Injectable({ scope: Scope.TRANSIENT })
export class LoggerService implements NestLoggerService {
  private logger: winston.Logger;
  private context?: string;

  constructor() {
    const isDevelopment = process.env.NODE_ENV === 'development';

    this.logger = winston.createLogger({
      level: process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info'),
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        isDevelopment ? winston.format.colorize() : winston.format.uncolorize(),
        winston.format.printf((info) => {
          const { timestamp, level, message, context, requestId, stack, ...rest } = info;
          if (isDevelopment) {
            const ctx = context ? `[${String(context)}]` : '';
            const req = requestId ? `[${String(requestId)}]` : '';
            const meta = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
            return `${String(timestamp)} ${level} ${ctx}${req} ${String(message)}${meta}${stack ? '\n' + String(stack) : ''}`;
          }
          // JSON lines in production
          return JSON.stringify({
            timestamp,
            level,
            context,
            requestId,
            message,
            ...rest,
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
