import pino, { type Logger, type LevelWithSilent } from 'pino';

/**
 * Structured JSON logger writing to stderr, so stdout stays free for the
 * rendered task tables.
 */
export const logger: Logger = pino(
  {
    level: process.env['LOG_LEVEL'] ?? 'warn',
    formatters: {
      level: (label: string) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2),
);

export function setLogLevel(level: LevelWithSilent): void {
  logger.level = level;
}
