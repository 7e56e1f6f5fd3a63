/**
 * @fileoverview Recalc Triggers
 * Decides which tasks need their snapshots rebuilt after source data changes,
 * and bulk-enqueues tasks for backfills.
 *
 * - Timer saved or deleted: its task (and the task it moved away from)
 * - Wage row saved or deleted: every task the user has timers on
 * - Task job number changed: snapshots are relabelled in place, no recompute
 */

import { CONSTANTS } from './constants.js';
import { createLogger } from './logger.js';
import type {
    ChangeFeed,
    IsoDate,
    RecalcQueue,
    SnapshotStore,
    StoreEvent,
    TaskDirectory,
    Timer,
    TimerFeed,
} from './types.js';
import { IsoUtils, validateISODate } from './utils.js';

const logger = createLogger('Enqueue');

export async function enqueueForTimerChange(
    timer: Pick<Timer, 'taskId'>,
    queue: RecalcQueue,
    previousTaskId: string | null = null
): Promise<string[]> {
    const taskIds = [timer.taskId];
    if (previousTaskId && previousTaskId !== timer.taskId) {
        taskIds.push(previousTaskId);
    }
    for (const taskId of taskIds) {
        await queue.enqueue(taskId);
    }
    return taskIds;
}

export async function enqueueForWageChange(
    userId: string,
    deps: { timers: TimerFeed; queue: RecalcQueue }
): Promise<string[]> {
    const taskIds = await deps.timers.taskIdsForUser(userId);
    for (const taskId of taskIds) {
        await deps.queue.enqueue(taskId);
    }
    logger.debug(`Wage change for ${userId} queued ${taskIds.length} task(s)`);
    return taskIds;
}

/**
 * Copies a task's new job number onto its existing snapshots.
 * @returns Number of snapshot rows relabelled.
 */
export async function renameTaskJobNo(
    taskId: string,
    jobNo: string,
    deps: { snapshots: SnapshotStore }
): Promise<number> {
    return deps.snapshots.transaction((tx) => tx.relabelTask(taskId, jobNo));
}

// ============================================================================
// BULK ENQUEUE
// ============================================================================

export interface EnqueueFilter {
    /** Inclusive, business-local start date of the timers considered */
    since?: IsoDate;
    /** Inclusive, business-local start date of the timers considered */
    until?: IsoDate;
    /** Job number prefix */
    prefix?: string;
    /** Most tasks to enqueue */
    limit?: number;
}

export interface EnqueueDeps {
    timers: TimerFeed;
    tasks: TaskDirectory;
    queue: RecalcQueue;
    timezone?: string;
}

/**
 * Finds tasks with timers matching the filter and enqueues them, ordered by
 * job number then task id.
 *
 * @throws FriendlyError with VALIDATION type for malformed dates.
 */
export async function enqueueJobCosts(filter: EnqueueFilter, deps: EnqueueDeps): Promise<string[]> {
    const zone = deps.timezone ?? CONSTANTS.DEFAULT_TIMEZONE;
    const since = filter.since === undefined ? null : validateISODate(filter.since, 'since');
    const until = filter.until === undefined ? null : validateISODate(filter.until, 'until');

    const [timers, tasks] = await Promise.all([deps.timers.listTimers(), deps.tasks.listTasks()]);
    const taskById = new Map(tasks.map((t) => [t.id, t]));

    const matched = new Set<string>();
    for (const timer of timers) {
        const localDate = IsoUtils.dateInZone(timer.startMs, zone);
        if (since !== null && localDate < since) continue;
        if (until !== null && localDate > until) continue;
        const task = taskById.get(timer.taskId);
        if (!task || task.jobNo === '') continue;
        if (filter.prefix && !task.jobNo.startsWith(filter.prefix)) continue;
        matched.add(task.id);
    }

    let ordered = Array.from(matched).sort((a, b) => {
        const jobA = taskById.get(a)?.jobNo ?? '';
        const jobB = taskById.get(b)?.jobNo ?? '';
        return jobA.localeCompare(jobB) || a.localeCompare(b);
    });
    if (filter.limit !== undefined && filter.limit > 0) {
        ordered = ordered.slice(0, filter.limit);
    }

    for (const taskId of ordered) {
        await deps.queue.enqueue(taskId);
    }
    logger.info(`Enqueued ${ordered.length} task(s) for recompute`);
    return ordered;
}

// ============================================================================
// STORE WIRING
// ============================================================================

/**
 * Subscribes to a store's change feed and keeps the queue and snapshot
 * labels in step with its writes.
 * @returns Unsubscribe function.
 */
export function wireRecalcTriggers(
    feed: ChangeFeed,
    deps: { timers: TimerFeed; queue: RecalcQueue; snapshots: SnapshotStore }
): () => void {
    return feed.subscribe(async (event: StoreEvent) => {
        switch (event.type) {
            case 'timer-saved':
                await enqueueForTimerChange(event.timer, deps.queue, event.previousTaskId);
                break;
            case 'timer-deleted':
                await enqueueForTimerChange(event.timer, deps.queue);
                break;
            case 'wage-saved':
            case 'wage-deleted':
                await enqueueForWageChange(event.rate.userId, deps);
                break;
            case 'task-saved':
                if (event.previousJobNo !== null && event.previousJobNo !== event.task.jobNo) {
                    await renameTaskJobNo(event.task.id, event.task.jobNo, deps);
                }
                break;
        }
    });
}
