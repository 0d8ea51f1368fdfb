import { createLogger, type Logger } from '@tapline/logger';

let shared: Logger | undefined;

/**
 * Logger that drops everything; used when no logger is supplied
 */
export function silentLogger(): Logger {
  shared ??= createLogger({ level: 'error', silent: true });
  return shared;
}
