import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

/**
 * Builds the library's default logger.
 *
 * Level comes from LOG_LEVEL, falling back to `warn` so an embedding
 * application only sees the engine when something needs attention.
 */
export function createLogger(level?: LevelWithSilent): Logger {
  return pino({
    name: 'telemetry-transmission',
    level: level ?? process.env['LOG_LEVEL'] ?? 'warn',
  });
}
