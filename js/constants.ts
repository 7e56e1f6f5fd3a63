/**
 * @fileoverview Application Constants
 * Configuration defaults, calendar templates and error messages shared
 * across the costing engine.
 */

import type { FriendlyError, ShiftWindow, WeekTemplate } from './types.js';

// ==================== COSTING DEFAULTS ====================

/**
 * Global costing constants.
 */
export const CONSTANTS = {
    /** Divisor turning a monthly base wage into an hourly rate. */
    WAGE_MONTH_HOURS: 225,
    /** Currency every snapshot is reported in. */
    REPORTING_CURRENCY: 'EUR',
    /** Currency whose wage average is preferred when a user has no wage rows. */
    DEFAULT_CURRENCY: 'TRY',
    /** Business (payroll) timezone. Also the machine calendar default. */
    DEFAULT_TIMEZONE: 'Europe/Istanbul',
    /** Placeholder wage when no wage data exists anywhere. */
    PLACEHOLDER_BASE_MONTHLY: 1,
    PLACEHOLDER_AFTER_HOURS_MULTIPLIER: 1.5,
    PLACEHOLDER_SUNDAY_MULTIPLIER: 2,
    /** Widest plan interval, in local days, the validator accepts. */
    MAX_PLAN_DAYS: 7,
    /** Epoch values below this are read as seconds. */
    EPOCH_MS_THRESHOLD: 1_000_000_000_000,
} as const;

/**
 * Recalc queue defaults.
 */
export const QUEUE_DEFAULTS = {
    /** Entries claimed per batch. */
    BATCH_SIZE: 100,
    /** A claim older than this is treated as abandoned and can be re-claimed. */
    LEASE_MS: 5 * 60 * 1000,
    /** Concurrent recompute lanes. */
    WORKERS: 4,
} as const;

/**
 * Default file locations for the CLI.
 */
export const FILE_DEFAULTS = {
    DATA_FILE: 'costing-data.json',
    STOP_FILE: 'recompute_job_costs.stop',
} as const;

export const CURRENCIES = ['TRY', 'USD', 'EUR'] as const;

export const PAY_BUCKETS = ['weekday_work', 'after_hours', 'sunday'] as const;

// ==================== CALENDARS ====================

/**
 * Fixed payroll window. Mon–Fri only; Saturday is after hours, Sunday is its own bucket.
 */
export const BUSINESS_WORK_WINDOW = {
    start: '07:30',
    end: '17:00',
} as const;

const DEFAULT_WEEKDAY_SHIFTS: ShiftWindow[] = [
    { start: '07:30', end: '12:00' },
    { start: '12:30', end: '17:00' },
];

/**
 * Machine template used when a machine has no calendar: Mon–Fri with a lunch
 * break, weekend closed. Keys are weekday indexes, 0 = Monday.
 */
export const DEFAULT_WEEK_TEMPLATE: WeekTemplate = {
    '0': DEFAULT_WEEKDAY_SHIFTS,
    '1': DEFAULT_WEEKDAY_SHIFTS,
    '2': DEFAULT_WEEKDAY_SHIFTS,
    '3': DEFAULT_WEEKDAY_SHIFTS,
    '4': DEFAULT_WEEKDAY_SHIFTS,
    '5': [],
    '6': [],
};

// ==================== ERROR CONSTANTS ====================

/**
 * Classification of error types.
 */
export const ERROR_TYPES = {
    VALIDATION: 'VALIDATION_ERROR',
    NOT_FOUND: 'NOT_FOUND_ERROR',
    STORAGE: 'STORAGE_ERROR',
    RECOMPUTE: 'RECOMPUTE_ERROR',
    UNKNOWN: 'UNKNOWN_ERROR',
} as const;

export type ErrorType = typeof ERROR_TYPES[keyof typeof ERROR_TYPES];

/**
 * Error message configuration
 */
export interface ErrorMessageConfig {
    title: string;
    message: string;
    action: 'retry' | 'fix-input' | 'none';
}

/**
 * Operator-facing messages and actions for each error type.
 */
export const ERROR_MESSAGES: Record<ErrorType, ErrorMessageConfig> = {
    [ERROR_TYPES.VALIDATION]: {
        title: 'Validation Error',
        message: 'The input did not pass validation. Correct it and try again.',
        action: 'fix-input',
    },
    [ERROR_TYPES.NOT_FOUND]: {
        title: 'Not Found',
        message: 'The referenced record does not exist.',
        action: 'none',
    },
    [ERROR_TYPES.STORAGE]: {
        title: 'Storage Error',
        message: 'The data store could not be read or written.',
        action: 'retry',
    },
    [ERROR_TYPES.RECOMPUTE]: {
        title: 'Recompute Error',
        message: 'A cost snapshot could not be recomputed. The task stays queued for retry.',
        action: 'retry',
    },
    [ERROR_TYPES.UNKNOWN]: {
        title: 'Unexpected Error',
        message: 'An unexpected error occurred.',
        action: 'none',
    },
};

// Re-export types for convenience
export type { FriendlyError };
