import { ConfigurationError } from './errors.js';
import { isLogLevel, type LogLevel } from './logger.js';

/**
 * Router run mode. Picks the default log level.
 * @category Configuration
 */
export type RouterMode = 'debug' | 'release' | 'test';

/**
 * What to do when a route name is registered a second time.
 *
 * - `overwrite` - the latest registration wins; the earlier one is unregistered
 * - `reject` - throw a ConfigurationError
 *
 * @category Configuration
 */
export type DuplicateNamePolicy = 'overwrite' | 'reject';

/**
 * @category Configuration
 */
export interface RouterOptions {
    /** Router name, used as the log tag (default: 'unnamed') */
    name?: string;
    /** Run mode; falls back to the ROUTER_MODE environment variable, then 'debug' */
    mode?: RouterMode;
    /** Log level; falls back to LOG_LEVEL, then the mode's default */
    logLevel?: LogLevel;
    /** @default 'overwrite' */
    duplicateNames?: DuplicateNamePolicy;
}

/**
 * Fully resolved router configuration
 * @category Configuration
 */
export interface RouterConfig {
    name: string;
    mode: RouterMode;
    logLevel: LogLevel;
    duplicateNames: DuplicateNamePolicy;
}

const MODE_LOG_LEVELS: Record<RouterMode, LogLevel> = {
    debug: 'debug',
    release: 'info',
    test: 'silent',
};

function isRouterMode(value: string): value is RouterMode {
    return Object.prototype.hasOwnProperty.call(MODE_LOG_LEVELS, value);
}

function parseMode(value: string): RouterMode {
    const normalized = value.trim().toLowerCase();
    if (!isRouterMode(normalized)) {
        throw new ConfigurationError(`Unknown router mode '${value}'`);
    }
    return normalized;
}

function parseLevel(value: string): LogLevel {
    const normalized = value.trim().toLowerCase();
    if (!isLogLevel(normalized)) {
        throw new ConfigurationError(`Unknown log level '${value}'`);
    }
    return normalized;
}

/**
 * Merge explicit options with environment variables and defaults.
 *
 * Explicit options take precedence over `ROUTER_MODE` and `LOG_LEVEL`; empty
 * environment values are ignored.
 *
 * @throws ConfigurationError on an unknown mode, log level or duplicate policy
 */
export function resolveConfig(
    options: RouterOptions = {},
    env: NodeJS.ProcessEnv = process.env
): RouterConfig {
    const mode = options.mode ? parseMode(options.mode) : env.ROUTER_MODE ? parseMode(env.ROUTER_MODE) : 'debug';
    const logLevel = options.logLevel
        ? parseLevel(options.logLevel)
        : env.LOG_LEVEL
          ? parseLevel(env.LOG_LEVEL)
          : MODE_LOG_LEVELS[mode];

    const duplicateNames = options.duplicateNames ?? 'overwrite';
    if (duplicateNames !== 'overwrite' && duplicateNames !== 'reject') {
        throw new ConfigurationError(`Unknown duplicate name policy '${String(duplicateNames)}'`);
    }

    return {
        name: options.name ?? 'unnamed',
        mode,
        logLevel,
        duplicateNames,
    };
}
