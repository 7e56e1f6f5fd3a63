/**
 * @fileoverview Worker Manager Module
 * Runs snapshot recomputes in bounded-concurrency lanes, either by draining
 * the recalc queue or over an explicit list of tasks.
 *
 * ## Drain loop (per lane)
 *
 * ```
 * ┌──────────────────┐
 * │ token cancelled? │──yes──► stop claiming
 * └────────┬─────────┘
 *          ▼
 * ┌──────────────────┐
 * │   claimBatch()   │──empty──► lane finished
 * └────────┬─────────┘
 *          ▼
 * ┌──────────────────┐    success ──► ack()      (entry deleted)
 * │   recompute()    │──► failure ──► release()  (entry kept for retry)
 * └────────┬─────────┘    cancelled ─► release() (rest of the batch)
 *          │
 *          └──► next entry, then back to claimBatch()
 * ```
 *
 * ## Failure handling
 * One task's failure never aborts the batch. The failure is logged with the
 * task id, reported to Sentry when enabled, and the task is not claimed again
 * in the same run so a persistent error cannot spin the loop.
 *
 * ## Cancellation
 * The token is checked before every task. A recompute already running
 * finishes normally; claimed entries not yet started are released.
 */

import { NEVER_CANCELLED, type CancellationToken } from './cancellation.js';
import { ERROR_TYPES, QUEUE_DEFAULTS } from './constants.js';
import { addBreadcrumb, reportError, reportMessage } from './error-reporting.js';
import { createLogger } from './logger.js';
import type { RecalcQueue } from './types.js';
import { createUserFriendlyError, describeError, toError } from './utils.js';

const logger = createLogger('WorkerManager');

/**
 * Recomputes one task. Rejects on failure.
 */
export type RecomputeFn = (taskId: string) => Promise<unknown>;

export interface PoolOptions {
    /** Concurrent lanes */
    workers?: number;
    token?: CancellationToken;
}

export interface DrainOptions extends PoolOptions {
    batchSize?: number;
    /** Stop after starting this many recomputes */
    maxTasks?: number;
    /** Prefix of the worker ids recorded on claims */
    workerIdPrefix?: string;
}

export interface DrainResult {
    processed: number;
    failed: number;
    cancelled: boolean;
}

export type TaskStatus = 'ok' | 'failed' | 'cancelled';

export interface TaskOutcome {
    taskId: string;
    status: TaskStatus;
    error?: string;
}

function laneCount(workers: number | undefined, jobs = Number.POSITIVE_INFINITY): number {
    const requested = Math.max(1, Math.floor(workers ?? QUEUE_DEFAULTS.WORKERS));
    return Math.max(1, Math.min(requested, jobs));
}

function reportFailure(taskId: string, error: unknown): void {
    const friendly = createUserFriendlyError(toError(error), ERROR_TYPES.RECOMPUTE);
    logger.error(`${friendly.title} for task ${taskId}: ${friendly.detail}`);
    reportError(toError(error), {
        module: 'WorkerManager',
        operation: `recompute ${taskId}`,
        metadata: { taskId },
    });
}

/**
 * Releases a claim. A queue that fails to release is reported; the lease
 * expiry hands the entry to a later run.
 */
async function releaseClaim(queue: RecalcQueue, taskId: string, workerId: string): Promise<void> {
    try {
        await queue.release(taskId, workerId);
    } catch (error) {
        logger.warn(`Could not release task ${taskId} for ${workerId}: ${describeError(error)}`);
        reportError(toError(error), {
            module: 'WorkerManager',
            operation: `release ${taskId}`,
            metadata: { taskId, workerId },
        });
    }
}

// ============================================================================
// QUEUE DRAIN
// ============================================================================

/**
 * Drains the queue until it is empty, `maxTasks` recomputes have started,
 * or the token is cancelled.
 */
export async function drainQueue(
    queue: RecalcQueue,
    recompute: RecomputeFn,
    options: DrainOptions = {}
): Promise<DrainResult> {
    const token = options.token ?? NEVER_CANCELLED;
    const batchSize = Math.max(1, options.batchSize ?? QUEUE_DEFAULTS.BATCH_SIZE);
    const maxTasks = options.maxTasks ?? Number.POSITIVE_INFINITY;
    const prefix = options.workerIdPrefix ?? `drain-${process.pid}`;

    const failedThisRun = new Set<string>();
    let started = 0;
    let processed = 0;
    let cancelled = false;

    const lane = async (workerId: string): Promise<void> => {
        while (!cancelled && started < maxTasks) {
            if (token.isCancellationRequested()) {
                cancelled = true;
                break;
            }

            const batch = await queue.claimBatch(Math.min(batchSize, maxTasks - started), workerId, failedThisRun);
            if (batch.length === 0) break;
            addBreadcrumb('queue', `${workerId} claimed ${batch.length} task(s)`);

            for (let i = 0; i < batch.length; i++) {
                const { taskId } = batch[i];
                if (token.isCancellationRequested() || started >= maxTasks) {
                    cancelled = cancelled || token.isCancellationRequested();
                    for (const rest of batch.slice(i)) {
                        await releaseClaim(queue, rest.taskId, workerId);
                    }
                    break;
                }

                started++;
                try {
                    await recompute(taskId);
                    await queue.ack(taskId, workerId);
                    processed++;
                } catch (error) {
                    failedThisRun.add(taskId);
                    await releaseClaim(queue, taskId, workerId);
                    reportFailure(taskId, error);
                }
            }
        }
    };

    const lanes = laneCount(options.workers);
    logger.info(`Draining recalc queue with ${lanes} lane(s), batch ${batchSize}`);
    await Promise.all(Array.from({ length: lanes }, (_, i) => lane(`${prefix}-${i + 1}`)));

    if (cancelled) {
        reportMessage(`Queue drain cancelled: ${token.reason() ?? 'cancelled'}`, 'warning', {
            module: 'WorkerManager',
            operation: 'drain',
        });
    }
    logger.info(`Processed ${processed} task(s), ${failedThisRun.size} failed`);

    return { processed, failed: failedThisRun.size, cancelled };
}

// ============================================================================
// EXPLICIT TASK LIST
// ============================================================================

/**
 * Recomputes the given tasks with at most `workers` running at once.
 * Outcomes are returned in input order; tasks never started after
 * cancellation come back as `cancelled`.
 */
export async function recomputeTasks(
    taskIds: readonly string[],
    recompute: RecomputeFn,
    options: PoolOptions = {}
): Promise<TaskOutcome[]> {
    const token = options.token ?? NEVER_CANCELLED;
    const outcomes: TaskOutcome[] = taskIds.map((taskId) => ({ taskId, status: 'cancelled' }));
    if (taskIds.length === 0) return outcomes;

    let next = 0;
    let stopped = false;

    const lane = async (): Promise<void> => {
        while (!stopped && next < taskIds.length) {
            if (token.isCancellationRequested()) {
                stopped = true;
                break;
            }
            const index = next++;
            const taskId = taskIds[index];
            try {
                await recompute(taskId);
                outcomes[index] = { taskId, status: 'ok' };
                logger.info(`Recomputed task ${taskId}`);
            } catch (error) {
                outcomes[index] = { taskId, status: 'failed', error: describeError(error) };
                reportFailure(taskId, error);
            }
        }
    };

    await Promise.all(Array.from({ length: laneCount(options.workers, taskIds.length) }, () => lane()));

    if (stopped) {
        const notStarted = outcomes.filter((o) => o.status === 'cancelled').length;
        reportMessage(
            `Recompute cancelled (${token.reason() ?? 'cancelled'}); ${notStarted} task(s) not started`,
            'warning',
            { module: 'WorkerManager', operation: 'recompute' }
        );
    }

    return outcomes;
}
