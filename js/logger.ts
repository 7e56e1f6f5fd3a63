/**
 * @fileoverview Structured Logging Module
 * Provides configurable logging with log levels and production safety.
 * In production mode, DEBUG and INFO logs are suppressed unless a level is
 * set explicitly through `COSTING_LOG_LEVEL`.
 */

/**
 * Log levels in order of severity
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    NONE = 4,
}

/**
 * Log level names for display
 */
const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
    [LogLevel.DEBUG]: 'DEBUG',
    [LogLevel.INFO]: 'INFO',
    [LogLevel.WARN]: 'WARN',
    [LogLevel.ERROR]: 'ERROR',
    [LogLevel.NONE]: 'NONE',
};

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'none';

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
    none: LogLevel.NONE,
};

/**
 * Logger configuration
 */
interface LoggerConfig {
    /** Minimum log level to output */
    minLevel: LogLevel;
    /** Whether to include timestamps in output */
    timestamps: boolean;
    /** Whether to include the module name in output */
    showModule: boolean;
}

function isLevelName(value: string): value is LogLevelName {
    return value in LEVELS_BY_NAME;
}

/**
 * Parses a level name, case-insensitively. Unknown names yield null.
 */
export function parseLogLevel(name: string | undefined): LogLevel | null {
    if (!name) return null;
    const lower = name.trim().toLowerCase();
    return isLevelName(lower) ? LEVELS_BY_NAME[lower] : null;
}

/**
 * Default configuration based on environment
 */
const getDefaultConfig = (): LoggerConfig => {
    const explicit = parseLogLevel(process.env.COSTING_LOG_LEVEL);
    const isProduction = process.env.NODE_ENV === 'production';
    const isTest = process.env.NODE_ENV === 'test';

    return {
        minLevel: explicit ?? (isProduction || isTest ? LogLevel.WARN : LogLevel.INFO),
        timestamps: true,
        showModule: true,
    };
};

/**
 * Global logger configuration
 */
const config: LoggerConfig = getDefaultConfig();

/**
 * Set the minimum log level
 */
export function setLogLevel(level: LogLevel): void {
    config.minLevel = level;
}

/**
 * Format a log message with metadata
 */
function formatMessage(level: LogLevel, module: string | undefined, message: string): string {
    const parts: string[] = [];

    if (config.timestamps) {
        parts.push(`[${new Date().toISOString()}]`);
    }

    parts.push(`[${LOG_LEVEL_NAMES[level]}]`);

    if (config.showModule && module) {
        parts.push(`[${module}]`);
    }

    parts.push(message);

    return parts.join(' ');
}

/**
 * Sanitize data to remove sensitive information before logging
 * Removes tokens, emails, and other PII
 */
export function sanitize(data: unknown): unknown {
    if (data === null || data === undefined) {
        return data;
    }

    if (typeof data === 'string') {
        // Mask potential tokens (long alphanumeric strings)
        return data.replace(/[a-zA-Z0-9]{32,}/g, '[REDACTED]');
    }

    if (Array.isArray(data)) {
        return data.map(sanitize);
    }

    if (data instanceof Error) {
        return data;
    }

    if (typeof data === 'object') {
        const sanitized: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(data)) {
            const lowerKey = key.toLowerCase();
            // Redact sensitive fields
            if (
                lowerKey.includes('token') ||
                lowerKey.includes('password') ||
                lowerKey.includes('secret') ||
                lowerKey.includes('email') ||
                lowerKey.includes('dsn') ||
                lowerKey === 'authorization'
            ) {
                sanitized[key] = '[REDACTED]';
            } else {
                sanitized[key] = sanitize(value);
            }
        }
        return sanitized;
    }

    return data;
}

/**
 * Core log function
 */
function log(level: LogLevel, module: string | undefined, message: string, ...data: unknown[]): void {
    if (level < config.minLevel) {
        return;
    }

    const formattedMessage = formatMessage(level, module, message);
    const sanitizedData = data.map(sanitize);

    switch (level) {
        case LogLevel.DEBUG:
        case LogLevel.INFO:
            // eslint-disable-next-line no-console
            console.log(formattedMessage, ...sanitizedData);
            break;
        case LogLevel.WARN:
            console.warn(formattedMessage, ...sanitizedData);
            break;
        case LogLevel.ERROR:
            console.error(formattedMessage, ...sanitizedData);
            break;
    }
}

export interface Logger {
    debug: (message: string, ...data: unknown[]) => void;
    info: (message: string, ...data: unknown[]) => void;
    warn: (message: string, ...data: unknown[]) => void;
    error: (message: string, ...data: unknown[]) => void;
    log: (level: LogLevel, message: string, ...data: unknown[]) => void;
}

/**
 * Create a scoped logger for a specific module
 */
export function createLogger(module: string): Logger {
    return {
        debug: (message: string, ...data: unknown[]) => log(LogLevel.DEBUG, module, message, ...data),
        info: (message: string, ...data: unknown[]) => log(LogLevel.INFO, module, message, ...data),
        warn: (message: string, ...data: unknown[]) => log(LogLevel.WARN, module, message, ...data),
        error: (message: string, ...data: unknown[]) => log(LogLevel.ERROR, module, message, ...data),
        /**
         * Log with explicit level
         */
        log: (level: LogLevel, message: string, ...data: unknown[]) => log(level, module, message, ...data),
    };
}
