import winston from 'winston';
import chalk from 'chalk';
import { env } from '../config';

const { combine, timestamp, printf, errors, json } = winston.format;

type LevelName = 'error' | 'warn' | 'info' | 'http' | 'debug';

const levelStyles: Record<LevelName, { color: chalk.Chalk; tag: string }> = {
  error: { color: chalk.red, tag: 'ERROR' },
  warn: { color: chalk.yellow, tag: 'WARN ' },
  info: { color: chalk.blue, tag: 'INFO ' },
  http: { color: chalk.magenta, tag: 'HTTP ' },
  debug: { color: chalk.cyan, tag: 'DEBUG' },
};

const isLevelName = (level: string): level is LevelName => level in levelStyles;

const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss';

// Colorized single-line format for the console
const consoleFormat = printf(({ level, message, timestamp: ts, stack }) => {
  const style = isLevelName(level) ? levelStyles[level] : { color: chalk.white, tag: level };
  const prefix = `${chalk.gray(`[${String(ts)}]`)} ${style.color(`[${style.tag}]`)}`;

  if (typeof stack === 'string') {
    return `${prefix} ${String(message)}\n${chalk.red(stack)}`;
  }

  return `${prefix} ${typeof message === 'string' ? message : JSON.stringify(message)}`;
});

const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  defaultMeta: { service: 'credits-reconciler' },
  transports: [
    new winston.transports.Console({
      format: combine(timestamp({ format: TIMESTAMP_FORMAT }), errors({ stack: true }), consoleFormat),
      silent: env.NODE_ENV === 'test',
    }),
  ],
});

// Structured JSON files in production
if (env.NODE_ENV === 'production') {
  const fileFormat = combine(timestamp(), errors({ stack: true }), json());

  logger.add(new winston.transports.File({ filename: 'logs/error.log', level: 'error', format: fileFormat }));
  logger.add(new winston.transports.File({ filename: 'logs/combined.log', format: fileFormat }));
}

const stringify = (args: unknown): string =>
  typeof args === 'string' ? args : JSON.stringify(args, null, 2);

/**
 * Static helpers for one-off messages (startup banners, run summaries)
 */
export class Logging {
  public static info = (args: unknown): void => {
    logger.info(stringify(args));
  };

  public static warn = (args: unknown): void => {
    logger.warn(stringify(args));
  };

  public static success = (args: unknown): void => {
    logger.info(chalk.green(stringify(args)));
  };

  // Framed banner, printed through the logger so tests stay quiet
  public static box = (title: string, message: string): void => {
    const width = Math.max(title.length, message.length) + 2;
    const line = '═'.repeat(width);

    logger.info(
      [
        chalk.cyan(`╔${line}╗`),
        chalk.cyan('║') + chalk.bold.cyanBright(` ${title.padEnd(width - 1)}`) + chalk.cyan('║'),
        chalk.cyan(`╠${line}╣`),
        chalk.cyan('║') + ` ${message.padEnd(width - 1)}` + chalk.cyan('║'),
        chalk.cyan(`╚${line}╝`),
      ].join('\n')
    );
  };
}

export default logger;
