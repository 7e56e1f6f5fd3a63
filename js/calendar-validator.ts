/**
 * @fileoverview Plan Interval Validator
 *
 * Guardrail for plan editing: a planned bar is accepted only when every
 * local-day piece of it fits inside a single working window of the machine's
 * calendar. Bars are never split here; a bar crossing a break must be sent
 * as separate bars.
 *
 * Violations come back as strings naming the offending local date and the
 * windows allowed on it. Nothing in this module throws.
 */

import { DateTime } from 'luxon';
import { CONSTANTS } from './constants.js';
import { resolveWorkingWindows } from './calendar.js';
import type { EpochMs, IsoDate, LocalWindow, ResolvedCalendar } from './types.js';
import { IsoUtils } from './utils.js';

export interface PlanValidationOptions {
    /** Most local days a single bar may touch */
    maxPlanDays?: number;
}

interface DayPiece {
    date: IsoDate;
    start: DateTime;
    end: DateTime;
}

/**
 * Splits `[startMs, endMs)` at local midnights of `zone`.
 */
export function splitByLocalDay(startMs: EpochMs, endMs: EpochMs, zone: string): DayPiece[] {
    const pieces: DayPiece[] = [];
    let cursor = DateTime.fromMillis(startMs, { zone });
    const end = DateTime.fromMillis(endMs, { zone });
    while (cursor < end) {
        const nextMidnight = cursor.startOf('day').plus({ days: 1 });
        const pieceEnd = nextMidnight < end ? nextMidnight : end;
        pieces.push({ date: cursor.toISODate() ?? '', start: cursor, end: pieceEnd });
        cursor = pieceEnd;
    }
    return pieces;
}

function formatWindows(windows: LocalWindow[]): string {
    return windows
        .map((w) => `${IsoUtils.formatClock(w.start)}-${IsoUtils.formatClock(w.end)}`)
        .join(', ');
}

/**
 * Returns null when the interval fits the calendar, otherwise a message.
 */
export function validatePlanInterval(
    calendar: ResolvedCalendar,
    startMs: EpochMs,
    endMs: EpochMs,
    options: PlanValidationOptions = {}
): string | null {
    if (endMs <= startMs) {
        return 'planned end must be after planned start';
    }

    if (!IsoUtils.isValidZone(calendar.timezone)) {
        return `unknown calendar timezone "${calendar.timezone}"`;
    }

    const maxDays = options.maxPlanDays ?? CONSTANTS.MAX_PLAN_DAYS;
    const pieces = splitByLocalDay(startMs, endMs, calendar.timezone);
    if (pieces.length > maxDays) {
        return `planned interval spans ${pieces.length} local days (max ${maxDays}); split it into shorter bars`;
    }

    for (const piece of pieces) {
        const windows = resolveWorkingWindows(calendar, piece.date);
        if (windows.length === 0) {
            return `${piece.date}: no working shifts configured (closed)`;
        }
        const covered = windows.some((w) => piece.start >= w.start && piece.end <= w.end);
        if (!covered) {
            const bar = `${IsoUtils.formatClock(piece.start)}-${IsoUtils.formatClock(piece.end)}`;
            return `${piece.date} ${bar} is not within working windows (${formatWindows(windows)})`;
        }
    }

    return null;
}
