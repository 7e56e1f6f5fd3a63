/**
 * @fileoverview Error Reporting Module
 * Centralized error tracking for batch recomputes and the CLI using Sentry.
 * Handles initialization, error capture, and sensitive data scrubbing.
 * Every report is also written to the log, so a run without a DSN loses nothing.
 */

import * as Sentry from '@sentry/node';
import { createLogger } from './logger.js';

const logger = createLogger('ErrorReporting');

// ==================== TYPES ====================

/**
 * Sentry configuration options
 */
export interface SentryConfig {
    /** Sentry DSN (Data Source Name). Empty disables reporting. */
    dsn: string;
    /** Environment name (e.g., 'production', 'development') */
    environment: string;
    /** Application version */
    release: string;
    /** Whether to enable debug mode */
    debug?: boolean;
    /** Sample rate for error events (0.0 to 1.0) */
    sampleRate?: number;
}

export type ReportLevel = 'fatal' | 'error' | 'warning' | 'info';

/**
 * Error context for reporting
 */
export interface ErrorContext {
    /** Module where error occurred */
    module?: string;
    /** Function or operation name */
    operation?: string;
    /** Additional metadata */
    metadata?: Record<string, unknown>;
    /** Error severity level */
    level?: ReportLevel;
}

// ==================== STATE ====================

let sentryInitialized = false;

// ==================== SENSITIVE DATA PATTERNS ====================

/**
 * Patterns to redact from error reports
 */
const SENSITIVE_PATTERNS = [
    /Bearer\s+[^\s]*/gi,
    /token["\s:=]+[^"'\s,}]*/gi,
    /password["\s:=]+[^"'\s,}]*/gi,
    /secret["\s:=]+[^"'\s,}]*/gi,
    /api[_-]?key["\s:=]+[^"'\s,}]*/gi,
    /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, // Email addresses
];

/**
 * Scrubs sensitive data from a string
 */
export function scrubSensitiveData(text: string): string {
    let scrubbed = text;
    for (const pattern of SENSITIVE_PATTERNS) {
        scrubbed = scrubbed.replace(pattern, '[REDACTED]');
    }
    return scrubbed;
}

function isSensitiveKey(key: string): boolean {
    const lowerKey = key.toLowerCase();
    return (
        lowerKey.includes('token') ||
        lowerKey.includes('password') ||
        lowerKey.includes('secret') ||
        lowerKey.includes('key') ||
        lowerKey.includes('email')
    );
}

/**
 * Scrubs sensitive data from a value recursively
 */
function scrubValue(value: unknown): unknown {
    if (typeof value === 'string') {
        return scrubSensitiveData(value);
    }
    if (Array.isArray(value)) {
        return value.map(scrubValue);
    }
    if (value !== null && typeof value === 'object') {
        return scrubRecord(Object.fromEntries(Object.entries(value)));
    }
    return value;
}

/**
 * Scrubs a record, redacting sensitive keys entirely.
 */
export function scrubRecord(obj: Record<string, unknown>): Record<string, unknown> {
    const scrubbed: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
        scrubbed[key] = isSensitiveKey(key) ? '[REDACTED]' : scrubValue(value);
    }
    return scrubbed;
}

// ==================== INITIALIZATION ====================

/**
 * Initializes Sentry error reporting.
 * Safe to call multiple times - subsequent calls are no-ops.
 *
 * @returns Whether reporting is active.
 */
export function initErrorReporting(config: SentryConfig): boolean {
    if (sentryInitialized) {
        return true;
    }

    if (!config.dsn) {
        logger.debug('Sentry DSN not configured, error reporting disabled');
        return false;
    }

    try {
        Sentry.init({
            dsn: config.dsn,
            environment: config.environment,
            release: config.release,
            debug: config.debug ?? false,
            sampleRate: config.sampleRate ?? 1.0,

            // Scrub sensitive data before sending
            beforeSend(event) {
                for (const exception of event.exception?.values ?? []) {
                    if (exception.value) {
                        exception.value = scrubSensitiveData(exception.value);
                    }
                }

                for (const breadcrumb of event.breadcrumbs ?? []) {
                    if (breadcrumb.message) {
                        breadcrumb.message = scrubSensitiveData(breadcrumb.message);
                    }
                    if (breadcrumb.data) {
                        breadcrumb.data = scrubRecord(breadcrumb.data);
                    }
                }

                if (event.extra) {
                    event.extra = scrubRecord(event.extra);
                }

                return event;
            },
        });

        Sentry.setTag('service', 'costing-engine');

        sentryInitialized = true;
        logger.info('Sentry initialized');
        return true;
    } catch (error) {
        logger.warn('Failed to initialize Sentry:', error);
        return false;
    }
}

// ==================== ERROR REPORTING ====================

/**
 * Reports an error to Sentry with optional context.
 * Safe to call even if Sentry is not initialized.
 *
 * @param error - The error to report
 * @param context - Additional context about the error
 */
export function reportError(error: Error | string, context?: ErrorContext): void {
    const errorObj = typeof error === 'string' ? new Error(error) : error;

    logger.error(`[${context?.module || 'App'}] ${context?.operation || 'Error'}: ${errorObj.message}`);

    if (!sentryInitialized) {
        return;
    }

    try {
        Sentry.withScope((scope) => {
            if (context?.level) {
                scope.setLevel(context.level);
            }
            if (context?.module) {
                scope.setTag('module', context.module);
            }
            if (context?.operation) {
                scope.setTag('operation', context.operation);
            }
            if (context?.metadata) {
                scope.setExtras(scrubRecord(context.metadata));
            }

            Sentry.captureException(errorObj);
        });
    } catch (sentryError) {
        logger.warn('Failed to report error to Sentry:', sentryError);
    }
}

/**
 * Reports a message to Sentry (for non-error events).
 *
 * @param message - The message to report
 * @param level - Severity level
 * @param context - Additional context
 */
export function reportMessage(
    message: string,
    level: ReportLevel = 'info',
    context?: Omit<ErrorContext, 'level'>
): void {
    const line = `[${context?.module || 'App'}] ${message}`;
    if (level === 'error' || level === 'fatal') {
        logger.error(line);
    } else {
        logger.warn(line);
    }

    if (!sentryInitialized) {
        return;
    }

    try {
        Sentry.withScope((scope) => {
            scope.setLevel(level);

            if (context?.module) {
                scope.setTag('module', context.module);
            }
            if (context?.operation) {
                scope.setTag('operation', context.operation);
            }
            if (context?.metadata) {
                scope.setExtras(scrubRecord(context.metadata));
            }

            Sentry.captureMessage(scrubSensitiveData(message));
        });
    } catch (sentryError) {
        logger.warn('Failed to report message to Sentry:', sentryError);
    }
}

/**
 * Adds a breadcrumb to the error trail.
 *
 * @param category - Breadcrumb category
 * @param message - Breadcrumb message
 * @param data - Additional data
 */
export function addBreadcrumb(
    category: string,
    message: string,
    data?: Record<string, unknown>
): void {
    if (!sentryInitialized) {
        return;
    }

    Sentry.addBreadcrumb({
        category,
        message: scrubSensitiveData(message),
        data: data ? scrubRecord(data) : undefined,
        level: 'info',
    });
}

// ==================== HELPERS ====================

/**
 * Gets Sentry initialization status
 */
export function isErrorReportingEnabled(): boolean {
    return sentryInitialized;
}

/**
 * Flushes pending error reports (call before the process exits)
 */
export async function flushErrorReports(timeout = 2000): Promise<boolean> {
    if (!sentryInitialized) {
        return true;
    }

    try {
        return await Sentry.flush(timeout);
    } catch (error) {
        logger.warn('Failed to flush Sentry events:', error);
        return false;
    }
}
