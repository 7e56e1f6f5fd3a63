/**
 * @fileoverview Cost Snapshot Aggregator
 *
 * Prices a task's closed timers into EUR cost snapshots: one task-level row
 * and one row per user who logged time.
 *
 * ## Module Responsibility
 * - Split every closed timer into business-local day segments (`bucketize.ts`)
 * - Pick the wage in force on each segment's date (`wages.ts`)
 * - Convert the wage currency to EUR on that date (`fx.ts`)
 * - Accumulate hours and cost per user and per task, split by pay bucket
 * - Rewrite the task's snapshots atomically
 *
 * ## Business Rules (DO NOT CHANGE WITHOUT UPDATING TESTS)
 *
 * ### Hourly rate
 * `hourlyRate = baseMonthly / wageMonthHours` with a fixed divisor of 225
 * hours per month. The divisor is configurable but never derived from the
 * calendar.
 *
 * ### Bucket pricing
 * - `weekday_work`: `hours × hourlyRate × fx`
 * - `after_hours`: `hours × hourlyRate × afterHoursMultiplier × fx`
 * - `sunday`: `hours × hourlyRate × sundayMultiplier × fx`
 *
 * ### Missing FX
 * When no rate exists for a segment's currency and date, the policy decides:
 * - `skip` (default): the segment contributes neither hours nor cost
 * - `zero-cost`: hours are kept, cost is 0
 *
 * Either way the segment is counted in `fxMissingSegments` and logged.
 *
 * ### Rounding
 * Hours and money accumulate at full precision and are rounded half-up to
 * 2 decimals only when the snapshot is built. `totalCost` is the rounded sum
 * of the already-rounded bucket costs, so the three costs always add up to it.
 *
 * ### Idempotence
 * Timers are processed in a fixed order (start, user, id) and snapshots are
 * sorted by user id, so two runs over the same data give identical values.
 * A task without closed timers ends with no snapshot at all, which is
 * distinct from a zero-cost snapshot.
 */

import { bucketizeInterval, DEFAULT_BUSINESS_CALENDAR } from './bucketize.js';
import { CONSTANTS } from './constants.js';
import { buildFxLookup } from './fx.js';
import { createLogger } from './logger.js';
import type {
    BucketTotals,
    BusinessCalendar,
    ClosedTimer,
    Currency,
    CostSnapshotSet,
    FxLookup,
    FxMissingPolicy,
    FxTable,
    PayBucket,
    SnapshotStore,
    TaskCostSnapshot,
    TaskDirectory,
    TimerFeed,
    UserCostSnapshot,
    WageTable,
} from './types.js';
import { round } from './utils.js';
import { buildAverageWageFallback, buildWagePicker, type WagePicker } from './wages.js';

const logger = createLogger('Calc');

// ============================================================================
// PURE AGGREGATION
// ============================================================================

export interface CostSettings {
    businessCalendar: BusinessCalendar;
    wageMonthHours: number;
    fxMissingPolicy: FxMissingPolicy;
    /** Snapshot currency and FX quote */
    reportingCurrency: TaskCostSnapshot['currency'];
}

export const DEFAULT_COST_SETTINGS: CostSettings = {
    businessCalendar: DEFAULT_BUSINESS_CALENDAR,
    wageMonthHours: CONSTANTS.WAGE_MONTH_HOURS,
    fxMissingPolicy: 'skip',
    reportingCurrency: CONSTANTS.REPORTING_CURRENCY,
};

export interface CostInput {
    taskId: string;
    jobNo: string;
    timers: readonly ClosedTimer[];
    pickWage: WagePicker;
    rateToEur: FxLookup;
    /** ISO timestamp written as `updatedAt` */
    updatedAt: string;
    settings?: Partial<CostSettings>;
}

export interface CostComputation {
    /** null when the task has no closed timers */
    snapshots: CostSnapshotSet | null;
    fxMissingSegments: number;
}

interface Accumulator extends BucketTotals {
    touched: boolean;
}

function emptyAccumulator(): Accumulator {
    return { hoursWw: 0, hoursAh: 0, hoursSu: 0, costWw: 0, costAh: 0, costSu: 0, touched: false };
}

function addToBucket(acc: Accumulator, bucket: PayBucket, hours: number, cost: number): void {
    acc.touched = true;
    switch (bucket) {
        case 'weekday_work':
            acc.hoursWw += hours;
            acc.costWw += cost;
            break;
        case 'after_hours':
            acc.hoursAh += hours;
            acc.costAh += cost;
            break;
        case 'sunday':
            acc.hoursSu += hours;
            acc.costSu += cost;
            break;
    }
}

function roundedTotals(acc: Accumulator): BucketTotals & { totalCost: number } {
    const costWw = round(acc.costWw);
    const costAh = round(acc.costAh);
    const costSu = round(acc.costSu);
    return {
        hoursWw: round(acc.hoursWw),
        hoursAh: round(acc.hoursAh),
        hoursSu: round(acc.hoursSu),
        costWw,
        costAh,
        costSu,
        totalCost: round(costWw + costAh + costSu),
    };
}

/**
 * Orders timers deterministically: by start, then user, then id.
 */
export function sortTimers<T extends ClosedTimer>(timers: readonly T[]): T[] {
    return [...timers].sort(
        (a, b) => a.startMs - b.startMs || a.userId.localeCompare(b.userId) || a.id.localeCompare(b.id)
    );
}

/**
 * Computes a task's snapshots from its closed timers. Pure: all lookups are
 * injected and nothing is written.
 */
export function computeCostSnapshots(input: CostInput): CostComputation {
    const settings: CostSettings = { ...DEFAULT_COST_SETTINGS, ...input.settings };
    const timers = input.timers.filter((t) => t.finishMs > t.startMs);
    if (timers.length === 0) {
        return { snapshots: null, fxMissingSegments: 0 };
    }

    const taskAcc = emptyAccumulator();
    const userAccs = new Map<string, Accumulator>();
    let fxMissingSegments = 0;

    for (const timer of sortTimers(timers)) {
        const segments = bucketizeInterval(timer.startMs, timer.finishMs, settings.businessCalendar);
        for (const seg of segments) {
            const wage = input.pickWage(timer.userId, seg.date);
            const fx = input.rateToEur(wage.currency, seg.date);
            const hours = seg.seconds / 3600;

            let cost = 0;
            if (fx > 0) {
                const hourlyRate = wage.baseMonthly / settings.wageMonthHours;
                const multiplier =
                    seg.bucket === 'after_hours'
                        ? wage.afterHoursMultiplier
                        : seg.bucket === 'sunday'
                          ? wage.sundayMultiplier
                          : 1;
                cost = hours * hourlyRate * multiplier * fx;
            } else {
                fxMissingSegments++;
                if (settings.fxMissingPolicy === 'skip') continue;
            }

            const userAcc = userAccs.get(timer.userId) ?? emptyAccumulator();
            userAccs.set(timer.userId, userAcc);
            addToBucket(userAcc, seg.bucket, hours, cost);
            addToBucket(taskAcc, seg.bucket, hours, cost);
        }
    }

    const base = {
        taskId: input.taskId,
        jobNoCached: input.jobNo,
        currency: settings.reportingCurrency,
        updatedAt: input.updatedAt,
    };

    const task: TaskCostSnapshot = { ...base, ...roundedTotals(taskAcc) };
    const users: UserCostSnapshot[] = Array.from(userAccs.entries())
        .filter(([, acc]) => acc.touched)
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([userId, acc]) => ({ ...base, userId, ...roundedTotals(acc) }));

    return { snapshots: { task, users }, fxMissingSegments };
}

// ============================================================================
// TRANSACTIONAL RECOMPUTE
// ============================================================================

export interface RecomputeSettings extends CostSettings {
    /** Currency whose wage average is used for users without wage rows */
    defaultCurrency: Currency;
}

export interface RecomputeDeps {
    timers: TimerFeed;
    wages: WageTable;
    fx: FxTable;
    tasks: TaskDirectory;
    snapshots: SnapshotStore;
    settings?: Partial<RecomputeSettings>;
    now?: () => Date;
}

export interface RecomputeResult {
    taskId: string;
    /** False when the task had no closed timers and was left without a snapshot */
    written: boolean;
    userCount: number;
    fxMissingSegments: number;
}

/**
 * Rebuilds one task's snapshots inside a single store transaction:
 * existing rows are wiped, then rewritten from current timers, wages and
 * rates. Readers see either the old rows or the new ones.
 */
export async function recomputeTaskCostSnapshot(taskId: string, deps: RecomputeDeps): Promise<RecomputeResult> {
    const now = deps.now ?? (() => new Date());

    return deps.snapshots.transaction(async (tx) => {
        await tx.deleteForTask(taskId);

        const task = await deps.tasks.getTask(taskId);
        if (!task) {
            logger.warn(`Task ${taskId} no longer exists; snapshots cleared`);
            return { taskId, written: false, userCount: 0, fxMissingSegments: 0 };
        }

        const timers = await deps.timers.closedTimersForTask(taskId);
        if (timers.length === 0) {
            logger.debug(`Task ${taskId} has no closed timers`);
            return { taskId, written: false, userCount: 0, fxMissingSegments: 0 };
        }

        const userIds = Array.from(new Set(timers.map((t) => t.userId)));
        const [rows, summary, fxSnapshots] = await Promise.all([
            deps.wages.wageRowsForUsers(userIds),
            deps.wages.wageSummaryByCurrency(),
            deps.fx.fxSnapshots(),
        ]);
        const fallback = buildAverageWageFallback(summary, deps.settings?.defaultCurrency);
        const reportingCurrency = deps.settings?.reportingCurrency ?? DEFAULT_COST_SETTINGS.reportingCurrency;

        const { snapshots, fxMissingSegments } = computeCostSnapshots({
            taskId,
            jobNo: task.jobNo,
            timers,
            pickWage: buildWagePicker(rows, fallback),
            rateToEur: buildFxLookup(fxSnapshots, reportingCurrency),
            updatedAt: now().toISOString(),
            settings: deps.settings,
        });

        if (fxMissingSegments > 0) {
            logger.warn(
                `Task ${taskId}: ${fxMissingSegments} segment(s) had no EUR rate ` +
                    `(policy: ${deps.settings?.fxMissingPolicy ?? DEFAULT_COST_SETTINGS.fxMissingPolicy})`
            );
        }

        if (!snapshots) {
            return { taskId, written: false, userCount: 0, fxMissingSegments };
        }

        await tx.insertTaskSnapshot(snapshots.task);
        await tx.insertUserSnapshots(snapshots.users);
        logger.debug(`Task ${taskId}: wrote snapshot total ${snapshots.task.totalCost} EUR`);

        return { taskId, written: true, userCount: snapshots.users.length, fxMissingSegments };
    });
}
