import { mkdirSync } from 'fs';
import { join } from 'path';

import { createLogger, format, transports, type Logger } from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

import type { LogLevel } from '../config/envSchema.js';

export interface AppLoggerOptions {
  level?: LogLevel;
  fileEnabled?: boolean;
  retentionHours?: number;
  /** Defaults to ./logs */
  logsDir?: string;
}

/**
 * winston-daily-rotate-file takes 'Nh' or 'Nd'; whole days are used from 24h up.
 */
export function retentionSpec(retentionHours: number): string {
  return retentionHours >= 24
    ? `${Math.floor(retentionHours / 24)}d`
    : `${retentionHours}h`;
}

export function createAppLogger(options: AppLoggerOptions = {}): Logger {
  const loggerTransports: Array<transports.ConsoleTransportInstance | DailyRotateFile> = [
    new transports.Console({
      format: format.combine(
        format.colorize(),
        format.printf(({ timestamp, level, message, ...meta }) => {
          const metaStr = Object.keys(meta).length > 0
            ? ` ${JSON.stringify(meta)}`
            : '';
          return `${String(timestamp)} [${level}] ${String(message)}${metaStr}`;
        })
      )
    })
  ];

  if (options.fileEnabled) {
    const logsDir = options.logsDir ?? join(process.cwd(), 'logs');
    mkdirSync(logsDir, { recursive: true });

    loggerTransports.push(new DailyRotateFile({
      filename: join(logsDir, 'platform-metrics-%DATE%.log'),
      datePattern: 'YYYY-MM-DD-HH', // Hourly rotation
      maxSize: '50m',
      maxFiles: retentionSpec(options.retentionHours ?? 24),
      format: format.combine(format.timestamp(), format.json()),
      auditFile: join(logsDir, '.audit.json')
    }));
  }

  return createLogger({
    level: options.level ?? 'info',
    format: format.combine(
      format.timestamp(),
      format.errors({ stack: true }),
      format.json()
    ),
    transports: loggerTransports
  });
}
