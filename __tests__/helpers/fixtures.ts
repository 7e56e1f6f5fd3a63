/**
 * @fileoverview Test data builders shared by the unit tests
 */

import { DateTime } from 'luxon';
import type { FxRateSnapshot, Task, Timer, WageRate } from '../../js/types.js';

/**
 * Epoch ms of a local date-time in the business timezone.
 */
export function ist(iso: string): number {
    return DateTime.fromISO(iso, { zone: 'Europe/Istanbul' }).toMillis();
}

export function makeTask(id: string, overrides: Partial<Task> = {}): Task {
    return {
        id,
        name: `Task ${id}`,
        jobNo: `JOB-${id}`,
        machineId: 'm1',
        isHold: false,
        plannedStartMs: null,
        plannedEndMs: null,
        planOrder: null,
        planLocked: false,
        ...overrides,
    };
}

export function makeTimer(
    id: string,
    taskId: string,
    userId: string,
    start: string,
    finish: string | null
): Timer {
    return { id, taskId, userId, startMs: ist(start), finishMs: finish === null ? null : ist(finish) };
}

export function makeWage(userId: string, effectiveFrom: string, baseMonthly: number, overrides: Partial<WageRate> = {}): WageRate {
    return {
        userId,
        effectiveFrom,
        currency: 'TRY',
        baseMonthly,
        afterHoursMultiplier: 1.5,
        sundayMultiplier: 2,
        ...overrides,
    };
}

/** TRY-based snapshot: 1 TRY = 0.04 EUR */
export const TRY_EUR: FxRateSnapshot = { date: '2024-01-01', base: 'TRY', rates: { EUR: 0.04 } };

/**
 * Runs `fn` and returns whatever it throws, or undefined.
 */
export function caught(fn: () => unknown): unknown {
    try {
        fn();
    } catch (error) {
        return error;
    }
    return undefined;
}
