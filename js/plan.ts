/**
 * @fileoverview Machine Plan
 * Planned bars of a machine in plan order, soft overlap warnings, and the
 * plan-editing guardrail that checks a bar against the machine calendar
 * before it is stored.
 */

import { resolveMachineCalendar } from './calendar.js';
import { validatePlanInterval, type PlanValidationOptions } from './calendar-validator.js';
import { CONSTANTS } from './constants.js';
import { createLogger } from './logger.js';
import { clipToWindow } from './timeline.js';
import type {
    CalendarStore,
    EpochMs,
    PlanOverlap,
    PlanSegment,
    Task,
    TaskDirectory,
    TimeWindow,
} from './types.js';
import { createNotFoundError } from './utils.js';

const logger = createLogger('Plan');

export interface MachinePlan {
    machineId: string;
    window: TimeWindow;
    planned: PlanSegment[];
    overlaps: PlanOverlap[];
}

export interface PlanDeps {
    tasks: TaskDirectory;
    calendars: CalendarStore;
    defaultTimezone?: string;
    validation?: PlanValidationOptions;
}

export type PlanUpdateResult = { ok: true; task: Task } | { ok: false; error: string };

// Unordered tasks sort after ordered ones
function orderKey(order: number | null): number {
    return order ?? Number.POSITIVE_INFINITY;
}

/**
 * Overlapping bars that share a plan order, checked pairwise in start order.
 */
export function findPlanOverlaps(segments: readonly PlanSegment[]): PlanOverlap[] {
    const byOrder = new Map<number | null, PlanSegment[]>();
    for (const seg of segments) {
        const group = byOrder.get(seg.planOrder) ?? [];
        group.push(seg);
        byOrder.set(seg.planOrder, group);
    }

    const overlaps: PlanOverlap[] = [];
    for (const [planOrder, group] of byOrder) {
        const sorted = [...group].sort((a, b) => a.startMs - b.startMs);
        for (let i = 1; i < sorted.length; i++) {
            const prev = sorted[i - 1];
            const cur = sorted[i];
            if (cur.startMs < prev.endMs && prev.taskId !== null && cur.taskId !== null) {
                overlaps.push({ planOrder, prevTaskId: prev.taskId, curTaskId: cur.taskId });
            }
        }
    }
    return overlaps;
}

/**
 * Planned bars of a machine overlapping the window, ordered by plan order,
 * planned start and task id.
 */
export async function buildMachinePlan(
    machineId: string,
    window: TimeWindow,
    deps: Pick<PlanDeps, 'tasks'>
): Promise<MachinePlan> {
    const tasks = await deps.tasks.tasksForMachine(machineId);

    const ordered = tasks
        .filter((t) => t.plannedStartMs !== null && t.plannedEndMs !== null)
        .sort(
            (a, b) =>
                orderKey(a.planOrder) - orderKey(b.planOrder) ||
                (a.plannedStartMs ?? 0) - (b.plannedStartMs ?? 0) ||
                a.id.localeCompare(b.id)
        );

    const planned: PlanSegment[] = [];
    for (const task of ordered) {
        if (task.plannedStartMs === null || task.plannedEndMs === null) continue;
        const seg = clipToWindow(
            {
                startMs: task.plannedStartMs,
                endMs: task.plannedEndMs,
                taskId: task.id,
                taskName: task.name,
                isHold: task.isHold,
                category: 'planned' as const,
                planOrder: task.planOrder,
                planLocked: task.planLocked,
                machineId,
            },
            window.startMs,
            window.endMs
        );
        if (seg) planned.push(seg);
    }

    const overlaps = findPlanOverlaps(planned);
    if (overlaps.length > 0) {
        logger.warn(`Machine ${machineId}: ${overlaps.length} overlapping bar(s) share a plan order`);
    }

    return { machineId, window, planned, overlaps };
}

/**
 * Stores a new planned interval for a task after checking it against the
 * machine calendar. Rejections come back as values.
 *
 * @throws FriendlyError with NOT_FOUND type when the task does not exist.
 */
export async function updateTaskPlan(
    taskId: string,
    startMs: EpochMs,
    endMs: EpochMs,
    deps: PlanDeps
): Promise<PlanUpdateResult> {
    const task = await deps.tasks.getTask(taskId);
    if (!task) {
        throw createNotFoundError(`Task ${taskId} not found`);
    }
    if (task.planLocked) {
        return { ok: false, error: `task ${taskId} has a locked plan` };
    }
    if (task.machineId === null) {
        return { ok: false, error: `task ${taskId} is not assigned to a machine` };
    }

    const stored = await deps.calendars.calendarFor(task.machineId);
    const calendar = resolveMachineCalendar(stored, deps.defaultTimezone ?? CONSTANTS.DEFAULT_TIMEZONE);
    const violation = validatePlanInterval(calendar, startMs, endMs, deps.validation);
    if (violation) {
        logger.info(`Rejected plan for task ${taskId}: ${violation}`);
        return { ok: false, error: violation };
    }

    const updated = await deps.tasks.updatePlan(taskId, { plannedStartMs: startMs, plannedEndMs: endMs });
    return { ok: true, task: updated };
}
