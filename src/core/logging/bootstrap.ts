import type { Logger, LogLevel } from './types.js';
import { LOG_LEVELS } from './types.js';
import { createRootLogger } from './create-logger.js';

/**
 * Logger for code that runs outside the DI container: library consumers that
 * construct an engine directly, and early CLI startup.
 *
 * Reads RESUMABLE_LOG_LEVEL once; defaults to silent.
 */
let _bootstrapLogger: Logger | null = null;

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    const configured = process.env['RESUMABLE_LOG_LEVEL']?.toLowerCase() ?? '';
    _bootstrapLogger = createRootLogger(isLogLevel(configured) ? configured : 'silent');
  }

  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
