/**
 * Structured logging for the HTSP client.
 * @module core/logger
 */
import pino from 'pino';
import type {Logger} from 'pino';

export type {Logger};

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS = new Set<string>(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export type LoggerOptions = {
    /** Minimum level. Defaults to `HTSP_LOG_LEVEL`, then `'warn'`. */
    level?: LogLevel;
    /** Logger name. Defaults to `'htsp'`. */
    name?: string;
};

const isLogLevel = (value: string | undefined): value is LogLevel => value !== undefined && LOG_LEVELS.has(value);

/**
 * Create a pino logger with ISO timestamps and textual level labels.
 */
export const createLogger = (options: LoggerOptions = {}): Logger => {
    const envLevel = process.env.HTSP_LOG_LEVEL;
    const level = options.level ?? (isLogLevel(envLevel) ? envLevel : 'warn');
    return pino({
        level,
        name: options.name ?? 'htsp',
        timestamp: pino.stdTimeFunctions.isoTime,
        formatters: {
            level: (label) => ({level: label}),
        },
    });
};

let defaultLogger: Logger | null = null;

/** Shared logger used when a component is not handed one explicitly. */
export const getDefaultLogger = (): Logger => {
    if (!defaultLogger) defaultLogger = createLogger();
    return defaultLogger;
};
