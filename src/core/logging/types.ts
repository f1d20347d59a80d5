import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type: pino's `Logger`, used directly without a wrapper.
 *
 * Data-first calls, pino idiom:
 *   logger.info({ step: 'FirstToss' }, 'Running step');
 *   logger.error({ err: error }, 'Checkpoint save failed');
 */
export type Logger = PinoLogger;

/**
 * Logger factory interface for DI.
 */
export interface ILoggerFactory {
  /** Create a child logger for a component */
  create(component: string): Logger;

  /** Root logger instance */
  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const satisfies readonly LogLevel[];
