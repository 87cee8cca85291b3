/**
 * Logger Module
 *
 * Module-scoped console loggers with a single process-wide level.
 * The level defaults to LOGGING.DEFAULT_LEVEL and can be overridden with the
 * CRUST_LOG_LEVEL environment variable or Logger.setLevel().
 */

import { LOGGING } from './constants.js';

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'none';

const LEVELS: Record<LogLevelName, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    none: 4
};

function isLevelName(value: string): value is LogLevelName {
    return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

function levelFromEnv(): LogLevelName {
    const raw = process.env[LOGGING.ENV_VAR]?.trim().toLowerCase();
    if (raw && isLevelName(raw)) return raw;
    return LOGGING.DEFAULT_LEVEL;
}

let currentLevel: LogLevelName = levelFromEnv();

export interface ModuleLogger {
    debug(...args: unknown[]): void;
    info(...args: unknown[]): void;
    warn(...args: unknown[]): void;
    error(...args: unknown[]): void;
}

function enabled(level: LogLevelName): boolean {
    return LEVELS[level] >= LEVELS[currentLevel];
}

export const Logger = {
    /**
     * Create a logger whose messages are prefixed with the module name.
     */
    getLogger(moduleName: string): ModuleLogger {
        const prefix = `[${moduleName}]`;
        return {
            debug: (...args: unknown[]) => { if (enabled('debug')) console.debug(prefix, ...args); },
            info: (...args: unknown[]) => { if (enabled('info')) console.info(prefix, ...args); },
            warn: (...args: unknown[]) => { if (enabled('warn')) console.warn(prefix, ...args); },
            error: (...args: unknown[]) => { if (enabled('error')) console.error(prefix, ...args); }
        };
    },

    setLevel(level: LogLevelName): void {
        currentLevel = level;
    },

    getLevel(): LogLevelName {
        return currentLevel;
    },

    /**
     * Parse a user-supplied level name (CLI flag). Returns null when unknown.
     */
    parseLevel(value: string): LogLevelName | null {
        const normalized = value.trim().toLowerCase();
        return isLevelName(normalized) ? normalized : null;
    }
};
