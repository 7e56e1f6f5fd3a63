/**
 * @fileoverview TypeScript Type Definitions
 * Centralized type definitions shared across the costing engine.
 */

import type { DateTime } from 'luxon';

// ==================== PRIMITIVES ====================

/** ISO calendar date, `YYYY-MM-DD`. */
export type IsoDate = string;

/** Epoch milliseconds, UTC. */
export type EpochMs = number;

export type Currency = 'TRY' | 'USD' | 'EUR';

/**
 * Payroll time-of-work classification.
 */
export type PayBucket = 'weekday_work' | 'after_hours' | 'sunday';

// ==================== TIMER TYPES ====================

/**
 * A start/stop timer recorded against a task.
 * `finishMs` is null while the timer is still running.
 */
export interface Timer {
    id: string;
    userId: string;
    taskId: string;
    startMs: EpochMs;
    finishMs: EpochMs | null;
}

/**
 * Timer with a known finish. Only these are costed.
 */
export interface ClosedTimer extends Timer {
    finishMs: EpochMs;
}

/**
 * Portion of an interval falling on one business-local day in one bucket.
 */
export interface DaySegment {
    date: IsoDate;
    bucket: PayBucket;
    seconds: number;
}

// ==================== TASK TYPES ====================

export interface Task {
    id: string;
    name: string;
    /** Job number label copied onto snapshots */
    jobNo: string;
    machineId: string | null;
    /** Hold tasks render as `hold` on the timeline instead of `work` */
    isHold: boolean;
    plannedStartMs: EpochMs | null;
    plannedEndMs: EpochMs | null;
    planOrder: number | null;
    planLocked: boolean;
}

// ==================== WAGE & FX TYPES ====================

/**
 * Versioned wage row. Rows are superseded by later `effectiveFrom`, never deleted.
 */
export interface WageRate {
    userId: string;
    effectiveFrom: IsoDate;
    currency: Currency;
    baseMonthly: number;
    afterHoursMultiplier: number;
    sundayMultiplier: number;
}

/**
 * Wage values applied to a segment, whether picked from a user's history or a fallback.
 */
export interface EffectiveWage {
    currency: Currency;
    baseMonthly: number;
    afterHoursMultiplier: number;
    sundayMultiplier: number;
}

/**
 * Cross-user wage averages for one currency.
 */
export interface CurrencyWageSummary {
    currency: Currency;
    avgBaseMonthly: number | null;
    avgAfterHoursMultiplier: number | null;
    avgSundayMultiplier: number | null;
}

/**
 * Daily exchange rates. `1 base = rates[q] q`.
 */
export interface FxRateSnapshot {
    date: IsoDate;
    base: Currency;
    rates: Partial<Record<Currency, number>>;
}

/**
 * Returns the rate converting one unit of `currency` into the reporting
 * currency on `date`, or 0 when no rate is known.
 */
export type FxLookup = (currency: Currency, date: IsoDate) => number;

// ==================== CALENDAR TYPES ====================

export interface ShiftWindow {
    /** `HH:MM` */
    start: string;
    /** `HH:MM` */
    end: string;
    /** The window ends on the following local day */
    endNextDay?: boolean;
}

/** Weekday index (`'0'` = Monday … `'6'` = Sunday) to ordered shifts. */
export type WeekTemplate = Record<string, ShiftWindow[]>;

export interface WorkException {
    date: IsoDate;
    windows: ShiftWindow[];
}

/**
 * Per-machine shift calendar as stored. Any field may be empty.
 */
export interface MachineCalendar {
    machineId: string;
    timezone: string;
    weekTemplate: WeekTemplate;
    workExceptions: WorkException[];
}

/**
 * Machine calendar with defaults applied.
 */
export interface ResolvedCalendar {
    timezone: string;
    weekTemplate: WeekTemplate;
    workExceptions: WorkException[];
}

/**
 * Concrete working window in the machine's timezone.
 */
export interface LocalWindow {
    start: DateTime;
    end: DateTime;
}

/**
 * Fixed payroll calendar. Deliberately separate from `MachineCalendar`:
 * payroll buckets never depend on machine shifts.
 */
export interface BusinessCalendar {
    timezone: string;
    /** `HH:MM` */
    workStart: string;
    /** `HH:MM` */
    workEnd: string;
}

// ==================== SNAPSHOT TYPES ====================

export interface BucketTotals {
    hoursWw: number;
    hoursAh: number;
    hoursSu: number;
    costWw: number;
    costAh: number;
    costSu: number;
}

export interface TaskCostSnapshot extends BucketTotals {
    taskId: string;
    jobNoCached: string;
    currency: 'EUR';
    totalCost: number;
    updatedAt: string;
}

export interface UserCostSnapshot extends TaskCostSnapshot {
    userId: string;
}

export interface CostSnapshotSet {
    task: TaskCostSnapshot;
    users: UserCostSnapshot[];
}

export type FxMissingPolicy = 'skip' | 'zero-cost';

// ==================== TIMELINE TYPES ====================

export type SegmentCategory = 'work' | 'hold' | 'idle' | 'planned';

export interface TimelineSegment {
    startMs: EpochMs;
    endMs: EpochMs;
    taskId: string | null;
    taskName: string | null;
    isHold: boolean;
    category: SegmentCategory;
}

export interface TimeWindow {
    startMs: EpochMs;
    endMs: EpochMs;
}

export interface PlanSegment extends TimelineSegment {
    planOrder: number | null;
    planLocked: boolean;
    machineId: string;
}

export interface PlanOverlap {
    planOrder: number | null;
    prevTaskId: string;
    curTaskId: string;
}

// ==================== QUEUE TYPES ====================

export interface RecalcQueueEntry {
    taskId: string;
    enqueuedAt: EpochMs;
    claimedBy: string | null;
    claimedAt: EpochMs | null;
    /** Re-enqueued while claimed; the entry survives the pending ack */
    dirty: boolean;
}

// ==================== COLLABORATOR INTERFACES ====================

/**
 * Read access to recorded timers.
 */
export interface TimerFeed {
    /** Finished timers of a task with `finishMs > startMs` */
    closedTimersForTask(taskId: string): Promise<ClosedTimer[]>;
    /** Timers (open ones included) of tasks on the machine overlapping the window */
    timersForMachine(machineId: string, window: TimeWindow): Promise<Timer[]>;
    /** Ids of every task the user has a timer on */
    taskIdsForUser(userId: string): Promise<string[]>;
    /** Every timer, ordered by start */
    listTimers(): Promise<Timer[]>;
}

export interface WageTable {
    wageRowsForUsers(userIds: readonly string[]): Promise<WageRate[]>;
    wageSummaryByCurrency(): Promise<CurrencyWageSummary[]>;
}

export interface FxTable {
    fxSnapshots(): Promise<FxRateSnapshot[]>;
}

export interface CalendarStore {
    calendarFor(machineId: string): Promise<MachineCalendar | null>;
    saveCalendar(calendar: MachineCalendar): Promise<void>;
}

export interface PlanUpdate {
    plannedStartMs: EpochMs | null;
    plannedEndMs: EpochMs | null;
}

export interface TaskDirectory {
    getTask(taskId: string): Promise<Task | null>;
    tasksForMachine(machineId: string): Promise<Task[]>;
    listTasks(): Promise<Task[]>;
    updatePlan(taskId: string, plan: PlanUpdate): Promise<Task>;
    renameJobNo(taskId: string, jobNo: string): Promise<Task>;
}

/**
 * Write side of the snapshot store. Only reachable inside a transaction.
 */
export interface SnapshotWriter {
    deleteForTask(taskId: string): Promise<void>;
    insertTaskSnapshot(snapshot: TaskCostSnapshot): Promise<void>;
    insertUserSnapshots(snapshots: readonly UserCostSnapshot[]): Promise<void>;
    relabelTask(taskId: string, jobNo: string): Promise<number>;
}

export interface SnapshotStore {
    taskSnapshot(taskId: string): Promise<TaskCostSnapshot | null>;
    userSnapshots(taskId: string): Promise<UserCostSnapshot[]>;
    /**
     * Runs `work` atomically: its writes become visible together when the
     * returned promise resolves, and are discarded if it rejects.
     */
    transaction<T>(work: (tx: SnapshotWriter) => Promise<T>): Promise<T>;
}

/**
 * Durable list of tasks awaiting recompute.
 */
export interface RecalcQueue {
    /** Idempotent upsert */
    enqueue(taskId: string): Promise<void>;
    /** Claims up to `limit` unleased entries not in `exclude`, oldest first */
    claimBatch(limit: number, workerId: string, exclude?: ReadonlySet<string>): Promise<RecalcQueueEntry[]>;
    /** Removes the entry after a successful recompute */
    ack(taskId: string, workerId: string): Promise<void>;
    /** Drops the claim and keeps the entry for a later run */
    release(taskId: string, workerId: string): Promise<void>;
    size(): Promise<number>;
}

/**
 * Change notification emitted by a store after a write commits.
 */
export type StoreEvent =
    | { type: 'timer-saved'; timer: Timer; previousTaskId: string | null }
    | { type: 'timer-deleted'; timer: Timer }
    | { type: 'wage-saved'; rate: WageRate }
    | { type: 'wage-deleted'; rate: WageRate }
    | { type: 'task-saved'; task: Task; previousJobNo: string | null };

export type StoreListener = (event: StoreEvent) => void | Promise<void>;

export interface ChangeFeed {
    /** Returns an unsubscribe function */
    subscribe(listener: StoreListener): () => void;
}

// ==================== ERROR TYPES ====================

/**
 * Structured error object
 */
export interface FriendlyError {
    /** Error type from ERROR_TYPES */
    type: string;
    /** Error title */
    title: string;
    /** Generic message for the error type */
    message: string;
    /** Specific description of what went wrong */
    detail: string;
    /** Suggested action */
    action: 'retry' | 'fix-input' | 'none';
    /** Original error object */
    originalError?: Error | string;
    /** ISO timestamp of when error occurred */
    timestamp: string;
    /** Error stack trace for debugging */
    stack?: string;
}
