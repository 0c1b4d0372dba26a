import winston from 'winston';
import path from 'path';

const logDir = process.env.LOG_DIR || 'logs';
const isProduction = process.env.NODE_ENV === 'production';
const MAX_LOG_SIZE = 5242880; // 5MB

// Error instances serialize to {} with plain JSON.stringify
const serializeMeta = (meta: Record<string, unknown>): string =>
  JSON.stringify(meta, (_key, value: unknown) =>
    value instanceof Error ? { name: value.name, message: value.message } : value,
  );

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

// One line per event; run progress reads like a console report
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
    const label = typeof service === 'string' ? ` [${service}]` : '';
    const details = Object.keys(meta).length ? ` ${serializeMeta(meta)}` : '';
    return `${timestamp} ${level}${label} ${message}${details}`;
  }),
);

const rootLogger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  defaultMeta: { service: 'defense-brief' },
  // Jest output stays readable unless VERBOSE_TESTS is set
  silent: process.env.NODE_ENV === 'test' && !process.env.VERBOSE_TESTS,
  transports: [
    new winston.transports.Console({
      format: isProduction ? fileFormat : consoleFormat,
    }),
  ],
});

if (isProduction) {
  rootLogger.add(
    new winston.transports.File({
      filename: path.resolve(logDir, 'brief.log'),
      format: fileFormat,
      maxsize: MAX_LOG_SIZE,
      maxFiles: 5,
      tailable: true,
    }),
  );
  rootLogger.add(
    new winston.transports.File({
      filename: path.resolve(logDir, 'error.log'),
      level: 'error',
      format: fileFormat,
      maxsize: MAX_LOG_SIZE,
      maxFiles: 5,
      tailable: true,
    }),
  );
}

/**
 * Applies the configured level once config is loaded. Child loggers share
 * the root's level, so loggers created earlier follow too.
 */
export function setLogLevel(level: string): void {
  rootLogger.level = level;
}

export const createLogger = (service: string): winston.Logger =>
  rootLogger.child({ service });
