import { createConsola, LogLevels, type ConsolaInstance } from 'consola';

/**
 * Router logging backed by consola, tagged with the router name.
 *
 * @category Logging
 */
export type Logger = ConsolaInstance;

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
    trace: LogLevels.trace,
    debug: LogLevels.debug,
    info: LogLevels.info,
    warn: LogLevels.warn,
    error: LogLevels.error,
    fatal: LogLevels.fatal,
    silent: LogLevels.silent,
};

export function isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Create a logger for a router or component.
 *
 * @example
 * ```typescript
 * const log = createLogger('catalog', 'info');
 * log.info('Request received', { method: 'GET', path: '/users' });
 * ```
 */
export function createLogger(name: string, level: LogLevel = 'info'): Logger {
    return createConsola({
        level: LOG_LEVELS[level],
        defaults: { tag: name },
    });
}

export function setLogLevel(log: Logger, level: LogLevel): void {
    log.level = LOG_LEVELS[level];
}
