/**
 * @fileoverview Dataset File
 * JSON file holding everything the CLI works on: tasks, timers, wage rows,
 * exchange rates, machine calendars, snapshots and the recalc queue.
 * Input is validated on load; timestamps given in epoch seconds are
 * converted to milliseconds.
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { validateCalendarDefinition } from './calendar.js';
import { CURRENCIES, ERROR_TYPES } from './constants.js';
import { createLogger } from './logger.js';
import type {
    FxRateSnapshot,
    MachineCalendar,
    RecalcQueueEntry,
    Task,
    TaskCostSnapshot,
    Timer,
    UserCostSnapshot,
    WageRate,
} from './types.js';
import { createUserFriendlyError, createValidationError, normalizeEpochMs, toError } from './utils.js';

const logger = createLogger('Dataset');

export interface CostingDataset {
    tasks: Task[];
    timers: Timer[];
    wageRates: WageRate[];
    fxRates: FxRateSnapshot[];
    calendars: MachineCalendar[];
    taskSnapshots: TaskCostSnapshot[];
    userSnapshots: UserCostSnapshot[];
    queue: RecalcQueueEntry[];
}

export function emptyDataset(): CostingDataset {
    return {
        tasks: [],
        timers: [],
        wageRates: [],
        fxRates: [],
        calendars: [],
        taskSnapshots: [],
        userSnapshots: [],
        queue: [],
    };
}

// ==================== SCHEMA ====================

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');
const epoch = z.number().int().transform(normalizeEpochMs);
const currency = z.enum(CURRENCIES);

const taskSchema = z.object({
    id: z.string().min(1),
    name: z.string().default(''),
    jobNo: z.string().default(''),
    machineId: z.string().min(1).nullable().default(null),
    isHold: z.boolean().default(false),
    plannedStartMs: epoch.nullable().default(null),
    plannedEndMs: epoch.nullable().default(null),
    planOrder: z.number().int().nullable().default(null),
    planLocked: z.boolean().default(false),
});

const timerSchema = z.object({
    id: z.string().min(1),
    userId: z.string().min(1),
    taskId: z.string().min(1),
    startMs: epoch,
    finishMs: epoch.nullable().default(null),
});

const wageRateSchema = z.object({
    userId: z.string().min(1),
    effectiveFrom: isoDate,
    currency,
    baseMonthly: z.number().nonnegative(),
    afterHoursMultiplier: z.number().min(1),
    sundayMultiplier: z.number().min(1),
});

const fxRateSchema = z.object({
    date: isoDate,
    base: currency,
    rates: z.record(currency, z.number().positive()),
});

const bucketTotals = {
    taskId: z.string().min(1),
    jobNoCached: z.string(),
    currency: z.literal('EUR'),
    hoursWw: z.number(),
    hoursAh: z.number(),
    hoursSu: z.number(),
    costWw: z.number(),
    costAh: z.number(),
    costSu: z.number(),
    totalCost: z.number(),
    updatedAt: z.string(),
};

const queueEntrySchema = z.object({
    taskId: z.string().min(1),
    enqueuedAt: epoch,
    claimedBy: z.string().nullable().default(null),
    claimedAt: epoch.nullable().default(null),
    dirty: z.boolean().default(false),
});

const datasetSchema = z.object({
    tasks: z.array(taskSchema).default([]),
    timers: z.array(timerSchema).default([]),
    wageRates: z.array(wageRateSchema).default([]),
    fxRates: z.array(fxRateSchema).default([]),
    calendars: z.array(z.unknown()).default([]),
    taskSnapshots: z.array(z.object(bucketTotals)).default([]),
    userSnapshots: z.array(z.object({ ...bucketTotals, userId: z.string().min(1) })).default([]),
    queue: z.array(queueEntrySchema).default([]),
});

// ==================== PARSE / LOAD / SAVE ====================

/**
 * Validates raw dataset JSON.
 *
 * @throws FriendlyError with VALIDATION type listing every problem found.
 */
export function parseDataset(raw: unknown): CostingDataset {
    const parsed = datasetSchema.safeParse(raw);
    if (!parsed.success) {
        const problems = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'dataset'}: ${issue.message}`);
        throw createValidationError(`Invalid dataset: ${problems.join('; ')}`);
    }

    const calendars: MachineCalendar[] = [];
    const problems: string[] = [];
    parsed.data.calendars.forEach((entry, index) => {
        const check = validateCalendarDefinition(entry);
        if (check.ok) {
            calendars.push(check.calendar);
        } else {
            problems.push(...check.errors.map((e) => `calendars.${index}.${e}`));
        }
    });
    if (problems.length > 0) {
        throw createValidationError(`Invalid dataset: ${problems.join('; ')}`);
    }

    return { ...parsed.data, calendars };
}

/**
 * Reads and validates a dataset file.
 *
 * @throws FriendlyError with STORAGE type when the file cannot be read,
 *   VALIDATION type when it is not valid JSON or fails validation.
 */
export async function loadDataset(path: string): Promise<CostingDataset> {
    let text: string;
    try {
        text = await readFile(path, 'utf8');
    } catch (error) {
        throw createUserFriendlyError(toError(error), ERROR_TYPES.STORAGE);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        throw createValidationError(`${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }

    const dataset = parseDataset(raw);
    logger.debug(`Loaded ${path}: ${dataset.tasks.length} task(s), ${dataset.timers.length} timer(s)`);
    return dataset;
}

/**
 * Writes a dataset file through a temporary file and a rename.
 *
 * @throws FriendlyError with STORAGE type when the file cannot be written.
 */
export async function saveDataset(path: string, dataset: CostingDataset): Promise<void> {
    const tmp = `${path}.${process.pid}.tmp`;
    try {
        await mkdir(dirname(path), { recursive: true });
        await writeFile(tmp, `${JSON.stringify(dataset, null, 2)}\n`, 'utf8');
        await rename(tmp, path);
    } catch (error) {
        throw createUserFriendlyError(toError(error), ERROR_TYPES.STORAGE);
    }
    logger.debug(`Saved ${path}`);
}
