/**
 * @fileoverview Machine Timeline
 *
 * Builds a machine's utilization view for a time window from live timer and
 * plan data. Nothing here is persisted; every call rebuilds from source.
 *
 * ## Segment merging
 * 1. Clip each raw segment to `[t0, t1)` and drop the empty ones
 * 2. Sort by start (stable, so equal starts keep their input order)
 * 3. Fold a segment into the previous one when task, hold flag and category
 *    match and it starts at or before the running end
 * 4. Walk the result from `t0`, emitting an `idle` segment for every
 *    uncovered gap and a trailing one up to `t1`
 *
 * Merged segments plus idle segments always cover `[t0, t1)` exactly.
 */

import { CONSTANTS } from './constants.js';
import { createLogger } from './logger.js';
import type { EpochMs, Task, TaskDirectory, TimelineSegment, TimerFeed, TimeWindow } from './types.js';
import { IsoUtils, createValidationError, normalizeEpochMs } from './utils.js';

const logger = createLogger('Timeline');

export interface MergeResult {
    merged: TimelineSegment[];
    idle: TimelineSegment[];
}

export interface TimelineTotals {
    productiveSeconds: number;
    holdSeconds: number;
    idleSeconds: number;
}

export interface MachineTimeline {
    machineId: string;
    window: TimeWindow;
    actual: TimelineSegment[];
    idle: TimelineSegment[];
    planned: TimelineSegment[];
    totals: TimelineTotals;
}

export interface TimelineDeps {
    timers: TimerFeed;
    tasks: TaskDirectory;
    now?: () => EpochMs;
}

// ============================================================================
// MERGING
// ============================================================================

/**
 * Clips `[startMs, endMs)` to the window. Returns null when nothing remains.
 */
export function clipToWindow<T extends TimeWindow>(segment: T, t0: EpochMs, t1: EpochMs): T | null {
    const startMs = Math.max(segment.startMs, t0);
    const endMs = Math.min(segment.endMs, t1);
    return endMs > startMs ? { ...segment, startMs, endMs } : null;
}

function sameRun(a: TimelineSegment, b: TimelineSegment): boolean {
    return a.taskId === b.taskId && a.isHold === b.isHold && a.category === b.category;
}

/**
 * Folds touching or overlapping segments of the same run together.
 * Input must already be sorted by start.
 */
export function foldSegments<T extends TimelineSegment>(sorted: readonly T[]): T[] {
    const out: T[] = [];
    for (const seg of sorted) {
        const last = out[out.length - 1];
        if (last && sameRun(last, seg) && seg.startMs <= last.endMs) {
            if (seg.endMs > last.endMs) last.endMs = seg.endMs;
        } else {
            out.push({ ...seg });
        }
    }
    return out;
}

function idleSegment(startMs: EpochMs, endMs: EpochMs): TimelineSegment {
    return { startMs, endMs, taskId: null, taskName: null, isHold: false, category: 'idle' };
}

/**
 * Gaps in `[t0, t1)` not covered by any of the sorted segments.
 */
export function idleGaps(sorted: readonly TimelineSegment[], t0: EpochMs, t1: EpochMs): TimelineSegment[] {
    const idle: TimelineSegment[] = [];
    let cursor = t0;
    for (const seg of sorted) {
        if (seg.startMs > cursor) {
            idle.push(idleSegment(cursor, seg.startMs));
        }
        cursor = Math.max(cursor, seg.endMs);
    }
    if (cursor < t1) {
        idle.push(idleSegment(cursor, t1));
    }
    return idle;
}

/**
 * Merges raw segments inside `[t0, t1)` and computes the idle gaps between them.
 */
export function mergeSegments(raw: readonly TimelineSegment[], t0: EpochMs, t1: EpochMs): MergeResult {
    const clipped: TimelineSegment[] = [];
    for (const seg of raw) {
        const c = clipToWindow(seg, t0, t1);
        if (c) clipped.push(c);
    }
    clipped.sort((a, b) => a.startMs - b.startMs);

    const merged = foldSegments(clipped);
    return { merged, idle: idleGaps(merged, t0, t1) };
}

// ============================================================================
// WINDOWS
// ============================================================================

/**
 * Resolves an optional `[from, to)` pair. Values below 10^12 are read as
 * epoch seconds. A missing bound selects the current business-local day.
 *
 * @throws FriendlyError with VALIDATION type when `to <= from`.
 */
export function resolveWindow(
    fromMs: EpochMs | null | undefined,
    toMs: EpochMs | null | undefined,
    timezone: string = CONSTANTS.DEFAULT_TIMEZONE,
    nowMs: EpochMs = Date.now()
): TimeWindow {
    if (fromMs === null || fromMs === undefined || toMs === null || toMs === undefined) {
        return IsoUtils.todayWindow(timezone, nowMs);
    }
    const window = { startMs: normalizeEpochMs(fromMs), endMs: normalizeEpochMs(toMs) };
    if (window.endMs <= window.startMs) {
        throw createValidationError('window end must be after window start');
    }
    return window;
}

function wholeSeconds(segments: readonly TimelineSegment[], category?: TimelineSegment['category']): number {
    let total = 0;
    for (const seg of segments) {
        if (category && seg.category !== category) continue;
        total += Math.floor((seg.endMs - seg.startMs) / 1000);
    }
    return total;
}

/**
 * Planned bar of a task, or null when it has no complete plan.
 */
export function plannedSegment(task: Task): TimelineSegment | null {
    if (task.plannedStartMs === null || task.plannedEndMs === null) return null;
    return {
        startMs: task.plannedStartMs,
        endMs: task.plannedEndMs,
        taskId: task.id,
        taskName: task.name,
        isHold: task.isHold,
        category: 'planned',
    };
}

// ============================================================================
// MACHINE TIMELINE
// ============================================================================

/**
 * Actual, idle and planned segments of a machine within a window.
 * Running timers are drawn up to "now".
 */
export async function buildMachineTimeline(
    machineId: string,
    window: TimeWindow,
    deps: TimelineDeps
): Promise<MachineTimeline> {
    const now = deps.now ?? (() => Date.now());
    const { startMs: t0, endMs: t1 } = window;

    const [timers, tasks] = await Promise.all([
        deps.timers.timersForMachine(machineId, window),
        deps.tasks.tasksForMachine(machineId),
    ]);
    const taskById = new Map(tasks.map((t) => [t.id, t]));

    const raw: TimelineSegment[] = [];
    for (const timer of timers) {
        const task = taskById.get(timer.taskId);
        const isHold = task?.isHold ?? false;
        raw.push({
            startMs: timer.startMs,
            endMs: timer.finishMs ?? now(),
            taskId: timer.taskId,
            taskName: task?.name ?? null,
            isHold,
            category: isHold ? 'hold' : 'work',
        });
    }
    const { merged: actual, idle } = mergeSegments(raw, t0, t1);

    const plannedRaw: TimelineSegment[] = [];
    for (const task of tasks) {
        const seg = plannedSegment(task);
        const clipped = seg ? clipToWindow(seg, t0, t1) : null;
        if (clipped) plannedRaw.push(clipped);
    }
    plannedRaw.sort((a, b) => a.startMs - b.startMs);
    const planned = foldSegments(plannedRaw);

    logger.debug(`Machine ${machineId}: ${actual.length} actual, ${idle.length} idle, ${planned.length} planned`);

    return {
        machineId,
        window,
        actual,
        idle,
        planned,
        totals: {
            productiveSeconds: wholeSeconds(actual, 'work'),
            holdSeconds: wholeSeconds(actual, 'hold'),
            idleSeconds: wholeSeconds(idle),
        },
    };
}
