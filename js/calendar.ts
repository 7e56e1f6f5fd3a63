/**
 * @fileoverview Machine Calendar Resolver
 *
 * Turns a machine's stored shift calendar into concrete local working windows
 * for a given date, and checks calendar definitions before they are saved.
 *
 * ## Resolution rules
 * - An exception entry for the date replaces that weekday's template windows.
 * - A window flagged `endNextDay` ends on the following local date.
 * - The previous date's `endNextDay` windows (its exception if it has one,
 *   otherwise its template) add a `[00:00, end)` tail on the target date.
 * - Windows with `end <= start` are dropped; the result is sorted by start.
 *
 * This is the machine shift calendar. Payroll buckets use the separate
 * `BusinessCalendar` in `bucketize.ts` and never consult these windows.
 */

import { z } from 'zod';
import { CONSTANTS, DEFAULT_WEEK_TEMPLATE } from './constants.js';
import type {
    IsoDate,
    LocalWindow,
    MachineCalendar,
    ResolvedCalendar,
    ShiftWindow,
    WeekTemplate,
    WorkException,
} from './types.js';
import { IsoUtils, clockMinutes } from './utils.js';

// ============================================================================
// RESOLUTION
// ============================================================================

/**
 * Applies system defaults to a stored calendar. A missing calendar, an empty
 * timezone or an empty week template each fall back independently.
 */
export function resolveMachineCalendar(
    calendar: MachineCalendar | null | undefined,
    defaultTimezone: string = CONSTANTS.DEFAULT_TIMEZONE
): ResolvedCalendar {
    if (!calendar) {
        return { timezone: defaultTimezone, weekTemplate: DEFAULT_WEEK_TEMPLATE, workExceptions: [] };
    }
    const hasTemplate = Object.keys(calendar.weekTemplate).length > 0;
    return {
        timezone: calendar.timezone || defaultTimezone,
        weekTemplate: hasTemplate ? calendar.weekTemplate : DEFAULT_WEEK_TEMPLATE,
        workExceptions: calendar.workExceptions,
    };
}

function findException(exceptions: WorkException[], date: IsoDate): WorkException | undefined {
    return exceptions.find((ex) => ex.date === date);
}

/**
 * Windows configured for a date before overnight tails are added:
 * the exception's windows if one exists, else the weekday template.
 */
export function configuredWindows(calendar: ResolvedCalendar, date: IsoDate): ShiftWindow[] {
    const exception = findException(calendar.workExceptions, date);
    if (exception) return exception.windows;
    return calendar.weekTemplate[String(IsoUtils.weekdayIndex(date))] ?? [];
}

function toLocalWindows(zone: string, date: IsoDate, windows: ShiftWindow[]): LocalWindow[] {
    const out: LocalWindow[] = [];
    for (const w of windows) {
        const start = IsoUtils.atClock(date, w.start, zone);
        const endDate = w.endNextDay ? IsoUtils.addDays(date, 1) : date;
        const end = IsoUtils.atClock(endDate, w.end, zone);
        if (start && end && end > start) {
            out.push({ start, end });
        }
    }
    return out;
}

/**
 * Concrete working windows for a local date, in the calendar's timezone.
 */
export function resolveWorkingWindows(calendar: ResolvedCalendar, date: IsoDate): LocalWindow[] {
    const zone = calendar.timezone;
    const windows = toLocalWindows(zone, date, configuredWindows(calendar, date));

    const previous = configuredWindows(calendar, IsoUtils.addDays(date, -1));
    const midnight = IsoUtils.startOfDay(date, zone);
    for (const w of previous) {
        if (!w.endNextDay) continue;
        const end = IsoUtils.atClock(date, w.end, zone);
        if (end && end > midnight) {
            windows.push({ start: midnight, end });
        }
    }

    windows.sort((a, b) => a.start.toMillis() - b.start.toMillis());
    return windows;
}

// ============================================================================
// DEFINITION CHECKS
// ============================================================================

const clockSchema = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:MM');

const shiftWindowSchema = z
    .object({
        start: clockSchema,
        end: clockSchema,
        endNextDay: z.boolean().optional(),
    })
    .refine((w) => w.endNextDay === true || w.end > w.start, {
        message: 'window ends before it starts; set endNextDay for overnight shifts',
    });

const calendarSchema = z.object({
    machineId: z.string().min(1),
    timezone: z
        .string()
        .min(1)
        .refine((zone) => IsoUtils.isValidZone(zone), { message: 'unknown IANA timezone' }),
    weekTemplate: z.record(z.string().regex(/^[0-6]$/, 'expected weekday index 0-6'), z.array(shiftWindowSchema)),
    workExceptions: z.array(
        z.object({
            date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD'),
            windows: z.array(shiftWindowSchema),
        })
    ),
});

export type CalendarCheck =
    | { ok: true; calendar: MachineCalendar }
    | { ok: false; errors: string[] };

interface MinuteRange {
    start: number;
    end: number;
}

/**
 * Minute ranges occupied on one day: its own windows (overnight ones run past
 * 1440) plus the tails carried over from the previous day.
 */
function occupiedRanges(own: ShiftWindow[], previous: ShiftWindow[]): MinuteRange[] {
    const ranges: MinuteRange[] = [];
    for (const w of own) {
        const start = clockMinutes(w.start);
        const end = clockMinutes(w.end);
        if (start === null || end === null) continue;
        ranges.push({ start, end: w.endNextDay ? end + 1440 : end });
    }
    for (const w of previous) {
        const end = clockMinutes(w.end);
        if (w.endNextDay && end !== null && end > 0) {
            ranges.push({ start: 0, end });
        }
    }
    return ranges.sort((a, b) => a.start - b.start);
}

function hasOverlap(ranges: MinuteRange[]): boolean {
    for (let i = 1; i < ranges.length; i++) {
        if (ranges[i].start < ranges[i - 1].end) return true;
    }
    return false;
}

/**
 * Validates a calendar definition before it is stored.
 * Returns every problem found rather than stopping at the first.
 */
export function validateCalendarDefinition(input: unknown): CalendarCheck {
    const parsed = calendarSchema.safeParse(input);
    if (!parsed.success) {
        return {
            ok: false,
            errors: parsed.error.issues.map((issue) => `${issue.path.join('.') || 'calendar'}: ${issue.message}`),
        };
    }

    const calendar: MachineCalendar = parsed.data;
    const template: WeekTemplate = calendar.weekTemplate;
    const errors: string[] = [];

    for (let day = 0; day < 7; day++) {
        const own = template[String(day)] ?? [];
        const previous = template[String((day + 6) % 7)] ?? [];
        if (hasOverlap(occupiedRanges(own, previous))) {
            errors.push(`weekTemplate.${day}: windows overlap`);
        }
    }

    const seen = new Set<string>();
    const exceptionDates = new Set(calendar.workExceptions.map((ex) => ex.date));
    const resolved = resolveMachineCalendar(calendar);
    for (const exception of calendar.workExceptions) {
        if (seen.has(exception.date)) {
            errors.push(`workExceptions.${exception.date}: duplicate date`);
            continue;
        }
        seen.add(exception.date);
        const previous = configuredWindows(resolved, IsoUtils.addDays(exception.date, -1));
        if (hasOverlap(occupiedRanges(exception.windows, previous))) {
            errors.push(`workExceptions.${exception.date}: windows overlap`);
        }

        // A following exception date checks this tail itself
        const next = IsoUtils.addDays(exception.date, 1);
        if (exceptionDates.has(next)) continue;
        if (hasOverlap(occupiedRanges(configuredWindows(resolved, next), exception.windows))) {
            errors.push(`workExceptions.${exception.date}: overnight window overlaps ${next}`);
        }
    }

    return errors.length > 0 ? { ok: false, errors } : { ok: true, calendar };
}
