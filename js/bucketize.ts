/**
 * @fileoverview Interval Bucketizer
 *
 * Splits a timer interval into business-local days and classifies each
 * day's time into a pay bucket using the fixed payroll calendar:
 *
 * - **sunday**: all of Sunday
 * - **weekday_work**: Mon–Fri time inside the work window (07:30–17:00)
 * - **after_hours**: the rest of Mon–Fri, and all of Saturday
 *
 * Day boundaries are local midnights in the business timezone, so a 23- or
 * 25-hour DST day is bucketed by its real length.
 */

import { DateTime } from 'luxon';
import { BUSINESS_WORK_WINDOW, CONSTANTS, PAY_BUCKETS } from './constants.js';
import type { BusinessCalendar, DaySegment, EpochMs, PayBucket } from './types.js';
import { IsoUtils } from './utils.js';

export const DEFAULT_BUSINESS_CALENDAR: BusinessCalendar = {
    timezone: CONSTANTS.DEFAULT_TIMEZONE,
    workStart: BUSINESS_WORK_WINDOW.start,
    workEnd: BUSINESS_WORK_WINDOW.end,
};

const LUXON_SATURDAY = 6;
const LUXON_SUNDAY = 7;

function pushSegment(out: DaySegment[], date: string, bucket: PayBucket, ms: number): void {
    if (ms > 0) {
        out.push({ date, bucket, seconds: ms / 1000 });
    }
}

/**
 * Splits `[startMs, endMs)` into per-day, per-bucket segments.
 * Returns an empty list when `endMs <= startMs`.
 */
export function bucketizeInterval(
    startMs: EpochMs,
    endMs: EpochMs,
    calendar: BusinessCalendar = DEFAULT_BUSINESS_CALENDAR
): DaySegment[] {
    if (endMs <= startMs) return [];

    const zone = calendar.timezone;
    const out: DaySegment[] = [];
    let cursor = startMs;

    while (cursor < endMs) {
        const dayStart = DateTime.fromMillis(cursor, { zone }).startOf('day');
        const date = dayStart.toISODate() ?? IsoUtils.dateInZone(cursor, zone);
        const pieceEnd = Math.min(dayStart.plus({ days: 1 }).toMillis(), endMs);
        const spanMs = pieceEnd - cursor;

        if (dayStart.weekday === LUXON_SUNDAY) {
            pushSegment(out, date, 'sunday', spanMs);
        } else if (dayStart.weekday === LUXON_SATURDAY) {
            pushSegment(out, date, 'after_hours', spanMs);
        } else {
            const workStart = IsoUtils.atClock(date, calendar.workStart, zone)?.toMillis() ?? pieceEnd;
            const workEnd = IsoUtils.atClock(date, calendar.workEnd, zone)?.toMillis() ?? pieceEnd;
            const workMs = Math.max(0, Math.min(pieceEnd, workEnd) - Math.max(cursor, workStart));
            pushSegment(out, date, 'weekday_work', workMs);
            pushSegment(out, date, 'after_hours', spanMs - workMs);
        }

        cursor = pieceEnd;
    }

    return out;
}

/**
 * Sums segment lists by `(date, bucket)`. Bucketizing `[a, c)` equals merging
 * the buckets of `[a, b)` and `[b, c)`.
 */
export function mergeDaySegments(...lists: DaySegment[][]): DaySegment[] {
    const totals = new Map<string, DaySegment>();
    for (const list of lists) {
        for (const seg of list) {
            const key = `${seg.date}|${seg.bucket}`;
            const existing = totals.get(key);
            if (existing) {
                existing.seconds += seg.seconds;
            } else {
                totals.set(key, { ...seg });
            }
        }
    }
    return Array.from(totals.values()).sort(
        (a, b) =>
            a.date.localeCompare(b.date) || PAY_BUCKETS.indexOf(a.bucket) - PAY_BUCKETS.indexOf(b.bucket)
    );
}
