import path from 'path';
import winston from 'winston';
import chalk from 'chalk';
import { env } from '../config';

const { combine, timestamp, printf, errors } = winston.format;

// Color definitions for different log levels
const levelColors: Record<string, typeof chalk.red> = {
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.blue,
  debug: chalk.cyan,
};

const levelBrightColors: Record<string, typeof chalk.red> = {
  error: chalk.redBright,
  warn: chalk.yellowBright,
  info: chalk.blueBright,
  debug: chalk.cyanBright,
};

const levelIcons: Record<string, string> = {
  error: '❌',
  warn: '⚠️ ',
  info: 'ℹ️ ',
  debug: '🔍',
};

// Custom colorized format for console output
const colorizedFormat = printf(({ level, message, timestamp: ts, stack }) => {
  const color = levelColors[level] ?? chalk.white;
  const brightColor = levelBrightColors[level] ?? chalk.whiteBright;
  const icon = levelIcons[level] ?? '📝';

  const timestampStr = chalk.gray(`[${String(ts)}]`);
  const levelStr = color(`[${level.toUpperCase()}]`);

  const formattedMessage = typeof message === 'string' ? brightColor(message) : String(message);

  // Include stack trace for errors
  return stack
    ? `${timestampStr} ${icon} ${levelStr}\n${chalk.red(String(stack))}`
    : `${timestampStr} ${icon} ${levelStr} ${formattedMessage}`;
});

// Simple format for file output (no colors)
const fileFormat = printf(({ level, message, timestamp: ts, stack }) => {
  return `${String(ts)} [${level.toUpperCase()}]: ${String(stack ?? message)}`;
});

const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), errors({ stack: true })),
  defaultMeta: { service: 'partmatch' },
  transports: [
    new winston.transports.Console({
      format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        errors({ stack: true }),
        colorizedFormat
      ),
    }),
  ],
});

// Add file transports in production
if (env.NODE_ENV === 'production') {
  logger.add(
    new winston.transports.File({
      filename: path.join(env.LOG_DIR, 'error.log'),
      level: 'error',
      format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        errors({ stack: true }),
        fileFormat
      ),
    })
  );
  logger.add(
    new winston.transports.File({
      filename: path.join(env.LOG_DIR, 'combined.log'),
      format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        errors({ stack: true }),
        fileFormat
      ),
    })
  );
}

export default logger;
