/**
 * @fileoverview In-Memory Store
 *
 * `MemoryStore` holds a costing dataset in memory and implements every
 * collaborator contract the engine reads from and writes to:
 * `TimerFeed`, `WageTable`, `FxTable`, `CalendarStore`, `TaskDirectory` and
 * `SnapshotStore`. The recalc queue lives alongside it as `store.queue`.
 *
 * ## Snapshot transactions
 *
 * Snapshot writes are only reachable through `transaction()`. Writes are
 * staged and applied together once the transaction body resolves; a body
 * that rejects leaves committed state untouched. Readers never observe the
 * wipe half of a wipe-then-rewrite.
 *
 * ## Change feed
 *
 * Source-data writes (timers, wage rows, tasks) notify subscribers after the
 * write is applied, which is how recalc triggers in `enqueue.ts` hook in.
 * `notify()` waits for every listener, so a write's follow-up enqueues have
 * happened by the time the write resolves.
 *
 * ## Validation
 *
 * - Wage rows: at most one per `(userId, effectiveFrom)`
 * - Calendars: checked with `validateCalendarDefinition` before saving
 * - Timers: must reference an existing task and must not finish before they start
 */

import { validateCalendarDefinition } from './calendar.js';
import type { CostingDataset } from './dataset.js';
import { createLogger } from './logger.js';
import { MemoryRecalcQueue, type QueueOptions } from './queue.js';
import type {
    CalendarStore,
    ChangeFeed,
    ClosedTimer,
    CurrencyWageSummary,
    FxRateSnapshot,
    FxTable,
    MachineCalendar,
    PlanUpdate,
    SnapshotStore,
    SnapshotWriter,
    StoreEvent,
    StoreListener,
    Task,
    TaskCostSnapshot,
    TaskDirectory,
    Timer,
    TimerFeed,
    TimeWindow,
    UserCostSnapshot,
    WageRate,
    WageTable,
} from './types.js';
import { createNotFoundError, createValidationError } from './utils.js';
import { summarizeWagesByCurrency } from './wages.js';

const logger = createLogger('Store');

type StagedWrite =
    | { kind: 'delete'; taskId: string }
    | { kind: 'insert-task'; snapshot: TaskCostSnapshot }
    | { kind: 'insert-users'; snapshots: UserCostSnapshot[] }
    | { kind: 'relabel'; taskId: string; jobNo: string };

function wageKey(userId: string, effectiveFrom: string): string {
    return `${userId}|${effectiveFrom}`;
}

function isClosed(timer: Timer): timer is ClosedTimer {
    return timer.finishMs !== null && timer.finishMs > timer.startMs;
}

export class MemoryStore
    implements TimerFeed, WageTable, FxTable, CalendarStore, TaskDirectory, SnapshotStore, ChangeFeed
{
    readonly queue: MemoryRecalcQueue;

    private readonly tasks = new Map<string, Task>();
    private readonly timers = new Map<string, Timer>();
    private readonly wages = new Map<string, WageRate>();
    private fxRates: FxRateSnapshot[] = [];
    private readonly calendars = new Map<string, MachineCalendar>();
    private readonly taskSnapshots = new Map<string, TaskCostSnapshot>();
    private readonly userSnapshotsByTask = new Map<string, Map<string, UserCostSnapshot>>();

    /** Set of subscriber functions. */
    private readonly listeners: Set<StoreListener> = new Set();

    constructor(dataset?: Partial<CostingDataset>, queueOptions: QueueOptions = {}) {
        for (const task of dataset?.tasks ?? []) this.tasks.set(task.id, { ...task });
        for (const timer of dataset?.timers ?? []) this.timers.set(timer.id, { ...timer });
        for (const row of dataset?.wageRates ?? []) {
            const key = wageKey(row.userId, row.effectiveFrom);
            if (this.wages.has(key)) {
                throw createValidationError(`Duplicate wage row for ${row.userId} effective ${row.effectiveFrom}`);
            }
            this.wages.set(key, { ...row });
        }
        this.fxRates = [...(dataset?.fxRates ?? [])];
        for (const calendar of dataset?.calendars ?? []) this.calendars.set(calendar.machineId, calendar);
        for (const snap of dataset?.taskSnapshots ?? []) this.taskSnapshots.set(snap.taskId, { ...snap });
        for (const snap of dataset?.userSnapshots ?? []) this.userMap(snap.taskId).set(snap.userId, { ...snap });
        this.queue = new MemoryRecalcQueue(dataset?.queue ?? [], queueOptions);
    }

    // ==================== CHANGE FEED ====================

    subscribe(listener: StoreListener): () => void {
        this.listeners.add(listener);
        return () => this.listeners.delete(listener);
    }

    private async notify(event: StoreEvent): Promise<void> {
        await Promise.all(Array.from(this.listeners, (listener) => listener(event)));
    }

    // ==================== TIMER FEED ====================

    async closedTimersForTask(taskId: string): Promise<ClosedTimer[]> {
        return Array.from(this.timers.values())
            .filter((t) => t.taskId === taskId)
            .filter(isClosed)
            .map((t) => ({ ...t }));
    }

    async timersForMachine(machineId: string, window: TimeWindow): Promise<Timer[]> {
        return Array.from(this.timers.values())
            .filter((t) => this.tasks.get(t.taskId)?.machineId === machineId)
            .filter((t) => t.startMs <= window.endMs && (t.finishMs === null || t.finishMs >= window.startMs))
            .sort((a, b) => a.startMs - b.startMs)
            .map((t) => ({ ...t }));
    }

    async taskIdsForUser(userId: string): Promise<string[]> {
        const ids = new Set<string>();
        for (const timer of this.timers.values()) {
            if (timer.userId === userId) ids.add(timer.taskId);
        }
        return Array.from(ids).sort();
    }

    async listTimers(): Promise<Timer[]> {
        return Array.from(this.timers.values())
            .sort((a, b) => a.startMs - b.startMs || a.id.localeCompare(b.id))
            .map((t) => ({ ...t }));
    }

    /**
     * Inserts or replaces a timer.
     *
     * @throws FriendlyError with VALIDATION type for a finish before the start
     *   or an unknown task.
     */
    async saveTimer(timer: Timer): Promise<void> {
        if (timer.finishMs !== null && timer.finishMs < timer.startMs) {
            throw createValidationError(`Timer ${timer.id} finishes before it starts`);
        }
        if (!this.tasks.has(timer.taskId)) {
            throw createValidationError(`Timer ${timer.id} refers to unknown task ${timer.taskId}`);
        }
        const previous = this.timers.get(timer.id);
        this.timers.set(timer.id, { ...timer });
        await this.notify({ type: 'timer-saved', timer: { ...timer }, previousTaskId: previous?.taskId ?? null });
    }

    async deleteTimer(timerId: string): Promise<boolean> {
        const timer = this.timers.get(timerId);
        if (!timer) return false;
        this.timers.delete(timerId);
        await this.notify({ type: 'timer-deleted', timer });
        return true;
    }

    // ==================== WAGE TABLE ====================

    async wageRowsForUsers(userIds: readonly string[]): Promise<WageRate[]> {
        const wanted = new Set(userIds);
        return Array.from(this.wages.values())
            .filter((w) => wanted.has(w.userId))
            .sort((a, b) => a.userId.localeCompare(b.userId) || a.effectiveFrom.localeCompare(b.effectiveFrom))
            .map((w) => ({ ...w }));
    }

    async wageSummaryByCurrency(): Promise<CurrencyWageSummary[]> {
        return summarizeWagesByCurrency(Array.from(this.wages.values()));
    }

    /**
     * @throws FriendlyError with VALIDATION type when the user already has a
     *   row effective on the same date.
     */
    async addWageRate(rate: WageRate): Promise<void> {
        const key = wageKey(rate.userId, rate.effectiveFrom);
        if (this.wages.has(key)) {
            throw createValidationError(`Duplicate wage row for ${rate.userId} effective ${rate.effectiveFrom}`);
        }
        this.wages.set(key, { ...rate });
        await this.notify({ type: 'wage-saved', rate: { ...rate } });
    }

    async deleteWageRate(userId: string, effectiveFrom: string): Promise<boolean> {
        const key = wageKey(userId, effectiveFrom);
        const rate = this.wages.get(key);
        if (!rate) return false;
        this.wages.delete(key);
        await this.notify({ type: 'wage-deleted', rate });
        return true;
    }

    // ==================== FX TABLE ====================

    async fxSnapshots(): Promise<FxRateSnapshot[]> {
        return this.fxRates.map((s) => ({ ...s, rates: { ...s.rates } }));
    }

    /**
     * Stores the day's rates, replacing any snapshot already held for that date.
     */
    async saveFxSnapshot(snapshot: FxRateSnapshot): Promise<void> {
        this.fxRates = this.fxRates.filter((s) => s.date !== snapshot.date);
        this.fxRates.push({ ...snapshot, rates: { ...snapshot.rates } });
        this.fxRates.sort((a, b) => a.date.localeCompare(b.date));
    }

    // ==================== CALENDAR STORE ====================

    async calendarFor(machineId: string): Promise<MachineCalendar | null> {
        return this.calendars.get(machineId) ?? null;
    }

    /**
     * @throws FriendlyError with VALIDATION type listing every problem in the definition.
     */
    async saveCalendar(calendar: MachineCalendar): Promise<void> {
        const check = validateCalendarDefinition(calendar);
        if (!check.ok) {
            throw createValidationError(`Invalid calendar for ${calendar.machineId}: ${check.errors.join('; ')}`);
        }
        this.calendars.set(check.calendar.machineId, check.calendar);
    }

    // ==================== TASK DIRECTORY ====================

    async getTask(taskId: string): Promise<Task | null> {
        const task = this.tasks.get(taskId);
        return task ? { ...task } : null;
    }

    async tasksForMachine(machineId: string): Promise<Task[]> {
        return Array.from(this.tasks.values())
            .filter((t) => t.machineId === machineId)
            .map((t) => ({ ...t }));
    }

    async listTasks(): Promise<Task[]> {
        return Array.from(this.tasks.values()).map((t) => ({ ...t }));
    }

    async saveTask(task: Task): Promise<void> {
        const previous = this.tasks.get(task.id);
        this.tasks.set(task.id, { ...task });
        await this.notify({ type: 'task-saved', task: { ...task }, previousJobNo: previous?.jobNo ?? null });
    }

    async updatePlan(taskId: string, plan: PlanUpdate): Promise<Task> {
        const task = this.requireTask(taskId);
        task.plannedStartMs = plan.plannedStartMs;
        task.plannedEndMs = plan.plannedEndMs;
        return { ...task };
    }

    async renameJobNo(taskId: string, jobNo: string): Promise<Task> {
        const task = this.requireTask(taskId);
        const previousJobNo = task.jobNo;
        task.jobNo = jobNo;
        await this.notify({ type: 'task-saved', task: { ...task }, previousJobNo });
        return { ...task };
    }

    private requireTask(taskId: string): Task {
        const task = this.tasks.get(taskId);
        if (!task) {
            throw createNotFoundError(`Task ${taskId} not found`);
        }
        return task;
    }

    // ==================== SNAPSHOT STORE ====================

    async taskSnapshot(taskId: string): Promise<TaskCostSnapshot | null> {
        const snap = this.taskSnapshots.get(taskId);
        return snap ? { ...snap } : null;
    }

    async userSnapshots(taskId: string): Promise<UserCostSnapshot[]> {
        return Array.from(this.userSnapshotsByTask.get(taskId)?.values() ?? [])
            .sort((a, b) => a.userId.localeCompare(b.userId))
            .map((s) => ({ ...s }));
    }

    async transaction<T>(work: (tx: SnapshotWriter) => Promise<T>): Promise<T> {
        const staged: StagedWrite[] = [];
        const writer: SnapshotWriter = {
            deleteForTask: async (taskId) => {
                staged.push({ kind: 'delete', taskId });
            },
            insertTaskSnapshot: async (snapshot) => {
                staged.push({ kind: 'insert-task', snapshot: { ...snapshot } });
            },
            insertUserSnapshots: async (snapshots) => {
                staged.push({ kind: 'insert-users', snapshots: snapshots.map((s) => ({ ...s })) });
            },
            relabelTask: async (taskId, jobNo) => {
                staged.push({ kind: 'relabel', taskId, jobNo });
                return (this.taskSnapshots.has(taskId) ? 1 : 0) + (this.userSnapshotsByTask.get(taskId)?.size ?? 0);
            },
        };

        const result = await work(writer);
        this.commit(staged);
        return result;
    }

    private commit(staged: readonly StagedWrite[]): void {
        for (const write of staged) {
            switch (write.kind) {
                case 'delete':
                    this.taskSnapshots.delete(write.taskId);
                    this.userSnapshotsByTask.delete(write.taskId);
                    break;
                case 'insert-task':
                    this.taskSnapshots.set(write.snapshot.taskId, write.snapshot);
                    break;
                case 'insert-users':
                    for (const snap of write.snapshots) {
                        this.userMap(snap.taskId).set(snap.userId, snap);
                    }
                    break;
                case 'relabel': {
                    const taskSnap = this.taskSnapshots.get(write.taskId);
                    if (taskSnap) taskSnap.jobNoCached = write.jobNo;
                    for (const snap of this.userSnapshotsByTask.get(write.taskId)?.values() ?? []) {
                        snap.jobNoCached = write.jobNo;
                    }
                    break;
                }
            }
        }
        if (staged.length > 0) {
            logger.debug(`Committed ${staged.length} snapshot write(s)`);
        }
    }

    private userMap(taskId: string): Map<string, UserCostSnapshot> {
        let map = this.userSnapshotsByTask.get(taskId);
        if (!map) {
            map = new Map();
            this.userSnapshotsByTask.set(taskId, map);
        }
        return map;
    }

    // ==================== PERSISTENCE ====================

    /**
     * Plain copy of the store contents, suitable for `saveDataset`.
     */
    toDataset(): CostingDataset {
        return {
            tasks: Array.from(this.tasks.values()).map((t) => ({ ...t })),
            timers: Array.from(this.timers.values()).map((t) => ({ ...t })),
            wageRates: Array.from(this.wages.values()).map((w) => ({ ...w })),
            fxRates: this.fxRates.map((s) => ({ ...s, rates: { ...s.rates } })),
            calendars: Array.from(this.calendars.values()),
            taskSnapshots: Array.from(this.taskSnapshots.values()).map((s) => ({ ...s })),
            userSnapshots: Array.from(this.userSnapshotsByTask.values()).flatMap((m) =>
                Array.from(m.values()).map((s) => ({ ...s }))
            ),
            queue: this.queue.snapshot(),
        };
    }
}
