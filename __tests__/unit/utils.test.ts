/**
 * @fileoverview Unit tests for utility helpers
 */

import { describe, it, expect } from '@jest/globals';
import { DateTime } from 'luxon';
import {
    IsoUtils,
    classifyError,
    clockMinutes,
    createUserFriendlyError,
    describeError,
    escapeCsv,
    normalizeEpochMs,
    parseClockTime,
    round,
    validateEpoch,
    validateISODate,
} from '../../js/utils.js';
import { caught } from '../helpers/fixtures.js';

describe('round', () => {
    it('rounds half up to two decimals by default', () => {
        expect(round(1.005)).toBe(1.01);
        expect(round(2.344)).toBe(2.34);
        expect(round(2.5, 0)).toBe(3);
    });

    it('returns 0 for non-finite input', () => {
        expect(round(Number.NaN)).toBe(0);
        expect(round(Number.POSITIVE_INFINITY)).toBe(0);
    });
});

describe('normalizeEpochMs / validateEpoch', () => {
    it('reads values below 10^12 as seconds', () => {
        expect(normalizeEpochMs(1704700800)).toBe(1704700800000);
        expect(normalizeEpochMs(1704700800000)).toBe(1704700800000);
    });

    it('accepts numeric strings and rejects fractions', () => {
        expect(validateEpoch(' 1704700800 ', 'start')).toBe(1704700800000);
        expect(caught(() => validateEpoch(1.5, 'start'))).toMatchObject({
            detail: 'start must be an integer epoch timestamp',
        });
    });
});

describe('validateISODate', () => {
    it('accepts real calendar dates only', () => {
        expect(validateISODate('2024-02-29', 'since')).toBe('2024-02-29');
        expect(caught(() => validateISODate('2023-02-29', 'since'))).toMatchObject({
            detail: 'since is not a valid calendar date',
        });
        expect(caught(() => validateISODate('29.02.2024', 'since'))).toMatchObject({
            detail: 'since must be in ISO format (YYYY-MM-DD)',
        });
        expect(caught(() => validateISODate('', 'since'))).toMatchObject({ detail: 'since cannot be empty' });
    });
});

describe('error helpers', () => {
    it('classifies file system errors as storage errors', () => {
        const error = Object.assign(new Error('no such file'), { code: 'ENOENT' });
        expect(classifyError(error)).toBe('STORAGE_ERROR');
        expect(classifyError(new SyntaxError('bad'))).toBe('VALIDATION_ERROR');
        expect(classifyError(new Error('other'))).toBe('UNKNOWN_ERROR');
    });

    it('builds structured errors with the message for their type', () => {
        const friendly = createUserFriendlyError('disk full', 'STORAGE_ERROR');
        expect(friendly).toMatchObject({
            type: 'STORAGE_ERROR',
            title: 'Storage Error',
            detail: 'disk full',
            action: 'retry',
        });
        expect(describeError(friendly)).toBe('disk full');
        expect(describeError('plain')).toBe('plain');
    });
});

describe('escapeCsv', () => {
    it('quotes cells containing separators, quotes or newlines', () => {
        expect(escapeCsv('plain')).toBe('plain');
        expect(escapeCsv('a,b')).toBe('"a,b"');
        expect(escapeCsv('say "hi"')).toBe('"say ""hi"""');
        expect(escapeCsv('two\nlines')).toBe('"two\nlines"');
        expect(escapeCsv(null)).toBe('');
        expect(escapeCsv(12.5)).toBe('12.5');
    });
});

describe('clock helpers', () => {
    it('parses HH:MM', () => {
        expect(parseClockTime('07:30')).toEqual({ hour: 7, minute: 30 });
        expect(parseClockTime('24:00')).toBeNull();
        expect(clockMinutes('17:00')).toBe(1020);
    });
});

describe('IsoUtils', () => {
    it('uses Monday as weekday 0', () => {
        expect(IsoUtils.weekdayIndex('2024-01-08')).toBe(0);
        expect(IsoUtils.weekdayIndex('2024-01-14')).toBe(6);
    });

    it('resolves local dates in a zone', () => {
        const ms = DateTime.fromISO('2024-01-08T22:30', { zone: 'UTC' }).toMillis();
        expect(IsoUtils.dateInZone(ms, 'UTC')).toBe('2024-01-08');
        expect(IsoUtils.dateInZone(ms, 'Europe/Istanbul')).toBe('2024-01-09');
    });

    it('shifts dates across month ends', () => {
        expect(IsoUtils.addDays('2024-02-28', 1)).toBe('2024-02-29');
        expect(IsoUtils.addDays('2024-03-01', -1)).toBe('2024-02-29');
    });

    it('checks timezone names', () => {
        expect(IsoUtils.isValidZone('Europe/Istanbul')).toBe(true);
        expect(IsoUtils.isValidZone('Nowhere/Town')).toBe(false);
    });
});
