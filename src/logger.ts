import pino from 'pino';
import type { LevelWithSilent } from 'pino';

const isLevel = (value: string | undefined): value is LevelWithSilent =>
  value !== undefined && (value === 'silent' || value in pino.levels.values);

// Until configuration is applied, honour a valid LOG_LEVEL already in the environment.
const envLevel = process.env['LOG_LEVEL'];
const INITIAL_LEVEL: LevelWithSilent = isLevel(envLevel) ? envLevel : 'info';

export const logger = pino({
  level: INITIAL_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'media-pipeline',
  },
});

export type Logger = typeof logger;

const children: Logger[] = [];

/**
 * Child logger tagged with the calling component.
 */
export const createLogger = (context: Record<string, unknown>): Logger => {
  const child = logger.child(context);
  children.push(child);
  return child;
};

/**
 * Applies a level to the root logger and every child created so far. Pino
 * children copy the level at creation, so a plain `logger.level` assignment
 * would miss the module-level loggers.
 */
export const setLogLevel = (level: LevelWithSilent): void => {
  logger.level = level;
  for (const child of children) {
    child.level = level;
  }
};
