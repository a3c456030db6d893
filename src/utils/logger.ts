import fs from 'fs';

import { createLogger, format, transports, type Logger } from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

import { config } from '../config/index.js';

export interface AppLoggerOptions {
  level?: string;
  fileEnabled?: boolean;
  retentionHours?: number;
  logsDir?: string;
}

/**
 * Application logger: JSON lines with timestamps, colorized on the console,
 * optionally mirrored to a daily-rotated file.
 */
export function createAppLogger(options: AppLoggerOptions = {}): Logger {
  const level = options.level ?? config.logLevel;
  const fileEnabled = options.fileEnabled ?? config.logFileEnabled;
  const retentionHours = options.retentionHours ?? config.logFileRetentionHours;
  const logsDir = options.logsDir ?? 'logs';

  const loggerTransports: Array<transports.ConsoleTransportInstance | DailyRotateFile> = [
    new transports.Console({
      format: format.combine(
        format.colorize(),
        format.printf(({ timestamp, level: lvl, message, ...meta }) => {
          const metaStr = Object.keys(meta).length > 0
            ? ` ${JSON.stringify(meta, bigintReplacer)}`
            : '';
          return `${String(timestamp)} [${lvl}] ${String(message)}${metaStr}`;
        })
      )
    })
  ];

  if (fileEnabled) {
    fs.mkdirSync(logsDir, { recursive: true });
    loggerTransports.push(
      new DailyRotateFile({
        dirname: logsDir,
        filename: 'engine-%DATE%.log',
        datePattern: 'YYYY-MM-DD-HH',
        maxFiles: `${retentionHours}h`,
        format: format.combine(format.timestamp(), format.json({ replacer: bigintReplacer }))
      })
    );
  }

  return createLogger({
    level,
    format: format.combine(
      format.timestamp(),
      format.errors({ stack: true })
    ),
    transports: loggerTransports
  });
}

/** JSON.stringify replacer that renders bigint amounts as decimal strings. */
export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}
