/**
 * @fileoverview Utility Functions
 * Generic helpers for date manipulation, rounding and error handling.
 * These functions are pure and stateless where possible.
 */

import { DateTime } from 'luxon';
import { CONSTANTS, ERROR_MESSAGES, ERROR_TYPES, type ErrorType, type FriendlyError } from './constants.js';
import type { EpochMs, IsoDate } from './types.js';

// ==================== TYPE VALIDATION ====================

/**
 * Creates a validation error.
 * @param message - The error message.
 * @returns The structured error.
 */
export function createValidationError(message: string): FriendlyError {
    return createUserFriendlyError(new Error(message), ERROR_TYPES.VALIDATION);
}

/**
 * Creates a not-found error.
 */
export function createNotFoundError(message: string): FriendlyError {
    return createUserFriendlyError(new Error(message), ERROR_TYPES.NOT_FOUND);
}

/**
 * Validates that a value is a valid string.
 * @param value - Value to validate.
 * @param field - Field name for error messages.
 * @returns The trimmed string.
 * @throws FriendlyError with VALIDATION type if invalid.
 */
export function validateString(value: unknown, field: string): string {
    if (typeof value !== 'string') {
        throw createValidationError(`${field} must be a non-empty string`);
    }
    const trimmed = value.trim();
    if (trimmed === '') {
        throw createValidationError(`${field} cannot be empty`);
    }
    return trimmed;
}

/**
 * Validates a `YYYY-MM-DD` calendar date.
 * @throws FriendlyError with VALIDATION type if invalid.
 */
export function validateISODate(value: unknown, field: string): IsoDate {
    const str = validateString(value, field);
    if (!/^\d{4}-\d{2}-\d{2}$/.test(str)) {
        throw createValidationError(`${field} must be in ISO format (YYYY-MM-DD)`);
    }
    if (!DateTime.fromISO(str, { zone: 'utc' }).isValid) {
        throw createValidationError(`${field} is not a valid calendar date`);
    }
    return str;
}

/**
 * Validates an epoch timestamp given in milliseconds or seconds.
 * @returns The value in milliseconds.
 * @throws FriendlyError with VALIDATION type if invalid.
 */
export function validateEpoch(value: unknown, field: string): EpochMs {
    const num = typeof value === 'string' ? Number(value.trim()) : value;
    if (typeof num !== 'number' || !Number.isFinite(num) || !Number.isInteger(num)) {
        throw createValidationError(`${field} must be an integer epoch timestamp`);
    }
    return normalizeEpochMs(num);
}

// ==================== ERROR CLASSIFICATION ====================

/**
 * Type guard for structured errors produced by createUserFriendlyError.
 */
export function isFriendlyError(value: unknown): value is FriendlyError {
    return (
        typeof value === 'object' &&
        value !== null &&
        'type' in value &&
        'detail' in value &&
        'timestamp' in value
    );
}

/**
 * Classifies an error object into a predefined category.
 *
 * @param error - The error object to classify.
 * @returns One of the ERROR_TYPES constants.
 */
export function classifyError(error: unknown): ErrorType {
    if (!error) return ERROR_TYPES.UNKNOWN;

    if (isFriendlyError(error)) {
        const known = Object.values(ERROR_TYPES).find((t) => t === error.type);
        return known ?? ERROR_TYPES.UNKNOWN;
    }

    if (error instanceof SyntaxError) {
        return ERROR_TYPES.VALIDATION;
    }

    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT' || code === 'EACCES' || code === 'EISDIR') {
        return ERROR_TYPES.STORAGE;
    }

    return ERROR_TYPES.UNKNOWN;
}

/**
 * Creates a structured error object from a raw error.
 *
 * @param error - The raw error or error message.
 * @param type - Optional explicit error type override.
 * @returns Structured error object.
 */
export function createUserFriendlyError(error: Error | string, type?: ErrorType): FriendlyError {
    const errorType = type || classifyError(error);
    const errorMessage = ERROR_MESSAGES[errorType];
    const err = typeof error === 'string' ? new Error(error) : error;

    return {
        type: errorType,
        title: errorMessage.title,
        message: errorMessage.message,
        detail: err.message,
        action: errorMessage.action,
        originalError: err,
        timestamp: new Date().toISOString(),
        stack: err.stack,
    };
}

/**
 * Extracts a one-line description from anything thrown.
 */
export function describeError(error: unknown): string {
    if (isFriendlyError(error)) return error.detail;
    if (error instanceof Error) return error.message;
    return String(error);
}

/**
 * Converts anything thrown into an Error for reporting.
 */
export function toError(error: unknown): Error {
    if (error instanceof Error) return error;
    if (isFriendlyError(error) && error.originalError instanceof Error) return error.originalError;
    return new Error(describeError(error));
}

// ==================== GENERIC HELPERS ====================

/**
 * Rounds a number to a specific number of decimal places, half away from zero
 * for the positive amounts the engine produces.
 *
 * @param num - The number to round.
 * @param decimals - Number of decimal places.
 * @returns The rounded number.
 */
export function round(num: number, decimals = 2): number {
    if (!Number.isFinite(num)) return 0;
    const factor = Math.pow(10, decimals);
    return Math.round((num + Number.EPSILON) * factor) / factor;
}

/**
 * Interprets small values as epoch seconds.
 */
export function normalizeEpochMs(ts: number): EpochMs {
    return Math.abs(ts) < CONSTANTS.EPOCH_MS_THRESHOLD ? ts * 1000 : ts;
}

/**
 * Escapes a value for a CSV cell.
 */
export function escapeCsv(str: unknown): string {
    if (str === null || str === undefined) return '';
    const stringValue = String(str);
    if (/[",\n\r]/.test(stringValue)) {
        return '"' + stringValue.replace(/"/g, '""') + '"';
    }
    return stringValue;
}

// ==================== DATE HELPERS ====================

/**
 * Parsed `HH:MM` time of day.
 */
export interface ClockTime {
    hour: number;
    minute: number;
}

const HHMM_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

/**
 * Parses an `HH:MM` string. Returns null when malformed.
 */
export function parseClockTime(hhmm: string): ClockTime | null {
    const match = HHMM_PATTERN.exec(hhmm);
    if (!match) return null;
    return { hour: Number(match[1]), minute: Number(match[2]) };
}

/**
 * Minutes since midnight for an `HH:MM` string, or null when malformed.
 */
export function clockMinutes(hhmm: string): number | null {
    const t = parseClockTime(hhmm);
    return t ? t.hour * 60 + t.minute : null;
}

export const IsoUtils = {
    /**
     * Local calendar date of an instant in the given zone.
     */
    dateInZone(ms: EpochMs, zone: string): IsoDate {
        return DateTime.fromMillis(ms, { zone }).toISODate() ?? '';
    },

    /**
     * Local midnight of an ISO date in the given zone.
     */
    startOfDay(date: IsoDate, zone: string): DateTime {
        return DateTime.fromISO(date, { zone }).startOf('day');
    },

    /**
     * Local date-time on `date` at `hhmm`. Times skipped by a DST jump land after the gap.
     */
    atClock(date: IsoDate, hhmm: string, zone: string): DateTime | null {
        const t = parseClockTime(hhmm);
        if (!t) return null;
        return IsoUtils.startOfDay(date, zone).set({ hour: t.hour, minute: t.minute });
    },

    /**
     * Shifts an ISO date by whole days.
     */
    addDays(date: IsoDate, days: number): IsoDate {
        return DateTime.fromISO(date, { zone: 'utc' }).plus({ days }).toISODate() ?? date;
    },

    /**
     * Weekday index with Monday = 0 … Sunday = 6.
     */
    weekdayIndex(date: IsoDate): number {
        return DateTime.fromISO(date, { zone: 'utc' }).weekday - 1;
    },

    /**
     * Formats a date-time as `HH:MM`.
     */
    formatClock(dt: DateTime): string {
        return dt.toFormat('HH:mm');
    },

    /**
     * Checks whether a zone name is a valid IANA timezone.
     */
    isValidZone(zone: string): boolean {
        return DateTime.local().setZone(zone).isValid;
    },

    /**
     * Epoch bounds of the current local day in the given zone.
     */
    todayWindow(zone: string, nowMs: EpochMs): { startMs: EpochMs; endMs: EpochMs } {
        const start = DateTime.fromMillis(nowMs, { zone }).startOf('day');
        return { startMs: start.toMillis(), endMs: start.plus({ days: 1 }).toMillis() };
    },
};
