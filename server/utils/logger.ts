/**
 * Logger
 *
 * Leveled logger shared by every server module. Backed by winston with a
 * single console transport; messages follow the `[Component] text key=value`
 * convention so they stay greppable in journald.
 *
 * Level comes from LOG_LEVEL at import time and can be changed at runtime
 * via setLevel() once the config file has been read.
 */

import winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

const initialLevel = process.env.LOG_LEVEL && isLogLevel(process.env.LOG_LEVEL)
    ? process.env.LOG_LEVEL
    : 'info';

const base = winston.createLogger({
    level: initialLevel,
    format: winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.printf(({ timestamp, level, message }) =>
            `${timestamp} ${level.toUpperCase().padEnd(5)} ${message}`
        )
    ),
    transports: [new winston.transports.Console()],
});

const logger = {
    error(message: string): void {
        base.error(message);
    },

    warn(message: string): void {
        base.warn(message);
    },

    info(message: string): void {
        base.info(message);
    },

    debug(message: string): void {
        base.debug(message);
    },

    /**
     * Change the active level. Unknown names are ignored with a warning.
     */
    setLevel(level: string): void {
        if (!isLogLevel(level)) {
            base.warn(`[Logger] Ignoring unknown log level: level=${level}`);
            return;
        }
        base.level = level;
        base.debug(`[Logger] Level set: level=${level}`);
    },

    /**
     * Print the startup banner
     */
    startup(name: string, meta: Record<string, string | number | boolean>): void {
        const details = Object.entries(meta)
            .map(([key, value]) => `${key}=${value}`)
            .join(' ');
        base.info(`${name} starting ${details}`.trimEnd());
    },
};

export default logger;
