import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { LogLevel } from '../types';

const LOG_LEVELS: readonly string[] = Object.values(LogLevel);

const envLogLevel = (process.env.LOG_LEVEL || LogLevel.INFO).toLowerCase();
const level = LOG_LEVELS.includes(envLogLevel) ? envLogLevel : LogLevel.INFO;
const logToFile = (process.env.LOG_TO_FILE || 'true').toLowerCase() === 'true';

// Loan amounts are bigint; JSON.stringify throws on them
export const bigIntReplacer = (_key: string, value: unknown): unknown => {
  if (typeof value === 'bigint') {
    return value.toString() + 'n';
  }
  return value;
};

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level: lvl, message, ...meta }) => {
    const metaString = Object.keys(meta).length ? ` ${JSON.stringify(meta, bigIntReplacer)}` : '';
    return `[${String(timestamp)}] ${lvl}: ${String(message)}${metaString}`;
  }),
);

const fileFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.json({ replacer: bigIntReplacer }),
);

const transports: winston.transport[] = [
  new winston.transports.Console({ format: consoleFormat }),
];

if (logToFile) {
  const mkRotate = (fileLevel: string) =>
    new DailyRotateFile({
      level: fileLevel,
      dirname: 'logs',
      filename: `%DATE%-${fileLevel}.log`,
      datePattern: 'YYYY-MM-DD',
      maxFiles: '14d',
      maxSize: '20m',
      zippedArchive: false,
      format: fileFormat,
    });

  transports.push(mkRotate('error'));
  transports.push(mkRotate('info'));
}

export const logger = winston.createLogger({
  level,
  transports,
});

export const logLoanPlanned = (payload: Record<string, unknown>): void => {
  logger.info('Flash loan planned', payload);
};

export const logLoanSubmitted = (payload: Record<string, unknown>): void => {
  logger.info('Flash loan submitted', payload);
};

export const logLoanFailure = (payload: Record<string, unknown>): void => {
  logger.error('Flash loan failed', payload);
};
