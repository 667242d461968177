// Structured logging for the analysis pipeline.
// JSON records with timestamps; colorized single-line console output.

import { createLogger, format, transports, type Logger } from 'winston';

export type { Logger } from 'winston';

export function buildLogger(level: string = process.env.LOG_LEVEL || 'info'): Logger {
  return createLogger({
    level,
    format: format.combine(
      format.timestamp(),
      format.errors({ stack: true }),
      format.json()
    ),
    transports: [
      new transports.Console({
        format: format.combine(
          format.colorize(),
          format.printf(({ timestamp, level, message, ...meta }) => {
            const metaStr = Object.keys(meta).length > 0
              ? ` ${JSON.stringify(meta, bigintReplacer)}`
              : '';
            return `${timestamp} [${level}] ${message}${metaStr}`;
          })
        )
      })
    ]
  });
}

function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

export const logger = buildLogger();

/**
 * Child logger tagging every record with the component that wrote it.
 */
export function createScopedLogger(scope: string, parent: Logger = logger): Logger {
  return parent.child({ scope });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
