import winston, { Logger, format } from 'winston';
import path from 'path';
import fs from 'fs';
import DailyRotateFile from 'winston-daily-rotate-file';
import { config } from '../config/config';

const SERVICE_NAME = 'agent-ranking';
const RETENTION = '14d';
const MAX_FILE_SIZE = '5m';

const isProduction = config.NODE_ENV === 'production';
const fileOutput = config.LOG_FILE && config.NODE_ENV !== 'test';

const timestamped = format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' });

const fileFormat = format.combine(
  timestamped,
  format.errors({ stack: true }),
  format.metadata({ fillExcept: ['message', 'level', 'timestamp', 'service'] }),
  format.json()
);

// Human-readable lines locally, one JSON object per line in production
const consoleFormat = isProduction
  ? format.combine(format.timestamp(), format.json())
  : format.combine(
      timestamped,
      format.colorize({ all: true }),
      format.printf(({ timestamp, level, message, service, ...meta }) => {
        const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
        return `${timestamp} [${service}] ${level}: ${message}${metaStr}`;
      })
    );

const onlyLevel = (level: string) => format((info) => (info.level === level ? info : false))();

/**
 * One daily rotating file under LOG_FILE_PATH, e.g. combined-2024-05-01.log
 */
const rotatingFile = (
  name: string,
  options: { level?: string; onlyDebug?: boolean } = {}
): DailyRotateFile =>
  new DailyRotateFile({
    filename: path.join(config.LOG_FILE_PATH, `${name}-%DATE%.log`),
    datePattern: 'YYYY-MM-DD',
    level: options.level,
    format: options.onlyDebug ? format.combine(onlyLevel('debug'), fileFormat) : fileFormat,
    maxSize: MAX_FILE_SIZE,
    maxFiles: RETENTION,
    auditFile: path.join(config.LOG_FILE_PATH, `.${name}-audit.json`),
  });

const buildTransports = (): winston.transport[] => {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      level: isProduction ? 'info' : config.LOG_LEVEL,
      format: consoleFormat,
    }),
  ];

  if (fileOutput) {
    transports.push(rotatingFile('combined', { level: 'info' }), rotatingFile('error', { level: 'error' }));
    if (!isProduction) {
      transports.push(rotatingFile('debug', { onlyDebug: true }));
    }
  }

  return transports;
};

if (fileOutput && !fs.existsSync(config.LOG_FILE_PATH)) {
  fs.mkdirSync(config.LOG_FILE_PATH, { recursive: true });
}

const logger: Logger = winston.createLogger({
  level: config.LOG_LEVEL,
  format: fileFormat,
  defaultMeta: { service: SERVICE_NAME, environment: config.NODE_ENV },
  transports: buildTransports(),
});

if (fileOutput) {
  logger.exceptions.handle(rotatingFile('exceptions'));
  logger.rejections.handle(rotatingFile('rejections'));
}

const loggerUtils = {
  logError: (log: Logger, error: Error, context?: Record<string, unknown>) => {
    log.error('Error occurred', {
      error: error.message,
      stack: error.stack,
      ...context,
    });
  },

  /**
   * Query text with its duration, at debug on success and error on failure
   */
  logDatabase: (log: Logger, query: string, duration: number, error?: Error) => {
    if (error) {
      log.error('Database error', { query, duration: `${duration}ms`, error: error.message });
    } else {
      log.debug('Database query', { query, duration: `${duration}ms` });
    }
  },
};

export default logger;
export { loggerUtils };
