/**
 * @fileoverview Unit tests for cost snapshot aggregation
 */

import { describe, it, expect } from '@jest/globals';
import { computeCostSnapshots, recomputeTaskCostSnapshot, sortTimers, type RecomputeDeps } from '../../js/calc.js';
import { buildFxLookup } from '../../js/fx.js';
import { MemoryStore } from '../../js/state.js';
import type { ClosedTimer } from '../../js/types.js';
import { buildWagePicker } from '../../js/wages.js';
import { TRY_EUR, ist, makeTask, makeWage } from '../helpers/fixtures.js';

const UPDATED_AT = '2024-02-01T00:00:00.000Z';

function closed(id: string, userId: string, start: string, finish: string): ClosedTimer {
    return { id, taskId: 't1', userId, startMs: ist(start), finishMs: ist(finish) };
}

// u1: 2h Monday inside the work window. u2: Friday 16:00 to Saturday 08:00.
const timers: ClosedTimer[] = [
    closed('a', 'u1', '2024-01-08T08:00', '2024-01-08T10:00'),
    closed('b', 'u2', '2024-01-05T16:00', '2024-01-06T08:00'),
];

const wages = [makeWage('u1', '2024-01-01', 2250), makeWage('u2', '2024-01-01', 4500)];
const fallback = { currency: 'TRY' as const, baseMonthly: 1, afterHoursMultiplier: 1.5, sundayMultiplier: 2 };

function compute(input: ClosedTimer[], policy: 'skip' | 'zero-cost' = 'skip') {
    return computeCostSnapshots({
        taskId: 't1',
        jobNo: 'JOB-1',
        timers: input,
        pickWage: buildWagePicker(
            [...wages, makeWage('u3', '2024-01-01', 2250, { currency: 'USD' })],
            fallback
        ),
        rateToEur: buildFxLookup([TRY_EUR]),
        updatedAt: UPDATED_AT,
        settings: { fxMissingPolicy: policy },
    });
}

describe('computeCostSnapshots', () => {
    it('prices every bucket with the hourly rate, multipliers and EUR rate', () => {
        const { snapshots, fxMissingSegments } = compute(timers);

        expect(fxMissingSegments).toBe(0);
        expect(snapshots?.task).toEqual({
            taskId: 't1',
            jobNoCached: 'JOB-1',
            currency: 'EUR',
            updatedAt: UPDATED_AT,
            hoursWw: 3,
            hoursAh: 15,
            hoursSu: 0,
            costWw: 1.6,
            costAh: 18,
            costSu: 0,
            totalCost: 19.6,
        });
    });

    it('writes one row per user, sorted by user id', () => {
        const { snapshots } = compute([...timers].reverse());

        expect(snapshots?.users.map((u) => u.userId)).toEqual(['u1', 'u2']);
        expect(snapshots?.users[0]).toMatchObject({ hoursWw: 2, hoursAh: 0, costWw: 0.8, totalCost: 0.8 });
        expect(snapshots?.users[1]).toMatchObject({ hoursWw: 1, hoursAh: 15, costWw: 0.8, costAh: 18, totalCost: 18.8 });
    });

    it('gives identical results regardless of timer order', () => {
        expect(compute([...timers].reverse())).toEqual(compute(timers));
    });

    it('prices Sunday with the Sunday multiplier', () => {
        const { snapshots } = compute([closed('s', 'u1', '2024-01-07T10:00', '2024-01-07T13:00')]);
        // 3h x (2250 / 225) x 2 x 0.04
        expect(snapshots?.task).toMatchObject({ hoursSu: 3, costSu: 2.4, totalCost: 2.4 });
    });

    it('returns no snapshots when there are no usable timers', () => {
        const t = ist('2024-01-08T09:00');
        expect(compute([])).toEqual({ snapshots: null, fxMissingSegments: 0 });
        expect(compute([{ id: 'z', taskId: 't1', userId: 'u1', startMs: t, finishMs: t }]).snapshots).toBeNull();
    });

    it('drops segments without an EUR rate under the skip policy', () => {
        const { snapshots, fxMissingSegments } = compute([
            closed('a', 'u1', '2024-01-08T08:00', '2024-01-08T10:00'),
            closed('c', 'u3', '2024-01-08T08:00', '2024-01-08T10:00'),
        ]);

        expect(fxMissingSegments).toBe(1);
        expect(snapshots?.users.map((u) => u.userId)).toEqual(['u1']);
        expect(snapshots?.task.hoursWw).toBe(2);
    });

    it('keeps hours at zero cost under the zero-cost policy', () => {
        const { snapshots, fxMissingSegments } = compute(
            [closed('c', 'u3', '2024-01-08T08:00', '2024-01-08T10:00')],
            'zero-cost'
        );

        expect(fxMissingSegments).toBe(1);
        expect(snapshots?.users[0]).toMatchObject({ userId: 'u3', hoursWw: 2, costWw: 0, totalCost: 0 });
    });

    it('falls back to the average wage for users without rows', () => {
        const { snapshots } = compute([closed('x', 'nobody', '2024-01-08T08:00', '2024-01-08T10:00')]);
        // 2h x (1 / 225) x 0.04 rounds to 0
        expect(snapshots?.users[0]).toMatchObject({ userId: 'nobody', hoursWw: 2, costWw: 0 });
    });
});

describe('sortTimers', () => {
    it('orders by start, then user, then id', () => {
        const t = ist('2024-01-08T08:00');
        const sorted = sortTimers([
            { id: '2', taskId: 't1', userId: 'u2', startMs: t, finishMs: t + 1 },
            { id: '3', taskId: 't1', userId: 'u1', startMs: t, finishMs: t + 1 },
            { id: '1', taskId: 't1', userId: 'u1', startMs: t, finishMs: t + 1 },
            { id: '0', taskId: 't1', userId: 'u9', startMs: t - 1, finishMs: t + 1 },
        ]);
        expect(sorted.map((s) => s.id)).toEqual(['0', '1', '3', '2']);
    });
});

describe('recomputeTaskCostSnapshot', () => {
    function setup() {
        const store = new MemoryStore({
            tasks: [makeTask('t1', { jobNo: 'JOB-1' })],
            timers: timers.map((t) => ({ ...t })),
            wageRates: wages,
            fxRates: [TRY_EUR],
        });
        const deps: RecomputeDeps = {
            timers: store,
            wages: store,
            fx: store,
            tasks: store,
            snapshots: store,
            now: () => new Date(UPDATED_AT),
        };
        return { store, deps };
    }

    it('writes task and user snapshots', async () => {
        const { store, deps } = setup();

        const result = await recomputeTaskCostSnapshot('t1', deps);

        expect(result).toEqual({ taskId: 't1', written: true, userCount: 2, fxMissingSegments: 0 });
        expect(await store.taskSnapshot('t1')).toMatchObject({ totalCost: 19.6, updatedAt: UPDATED_AT });
        expect((await store.userSnapshots('t1')).map((u) => u.userId)).toEqual(['u1', 'u2']);
    });

    it('converts through the configured reporting currency', async () => {
        const { store, deps } = setup();
        await store.saveFxSnapshot({ date: '2024-01-02', base: 'EUR', rates: { TRY: 25 } });

        await recomputeTaskCostSnapshot('t1', { ...deps, settings: { reportingCurrency: 'EUR' } });

        expect(await store.taskSnapshot('t1')).toMatchObject({ currency: 'EUR', totalCost: 19.6 });
    });

    it('is idempotent', async () => {
        const { store, deps } = setup();

        await recomputeTaskCostSnapshot('t1', deps);
        const first = { task: await store.taskSnapshot('t1'), users: await store.userSnapshots('t1') };
        await recomputeTaskCostSnapshot('t1', deps);
        const second = { task: await store.taskSnapshot('t1'), users: await store.userSnapshots('t1') };

        expect(second).toEqual(first);
    });

    it('clears snapshots once the task has no closed timers', async () => {
        const { store, deps } = setup();
        await recomputeTaskCostSnapshot('t1', deps);

        await store.deleteTimer('a');
        await store.deleteTimer('b');
        const result = await recomputeTaskCostSnapshot('t1', deps);

        expect(result.written).toBe(false);
        expect(await store.taskSnapshot('t1')).toBeNull();
        expect(await store.userSnapshots('t1')).toEqual([]);
    });

    it('clears snapshots of a task that no longer exists', async () => {
        const { store, deps } = setup();
        await recomputeTaskCostSnapshot('t1', deps);

        const result = await recomputeTaskCostSnapshot('t1', { ...deps, tasks: new MemoryStore() });

        expect(result).toEqual({ taskId: 't1', written: false, userCount: 0, fxMissingSegments: 0 });
        expect(await store.taskSnapshot('t1')).toBeNull();
    });

    it('leaves existing snapshots untouched when the recompute fails', async () => {
        const { store, deps } = setup();
        await recomputeTaskCostSnapshot('t1', deps);

        const failing: RecomputeDeps = {
            ...deps,
            fx: {
                fxSnapshots: async () => {
                    throw new Error('rates unavailable');
                },
            },
        };

        await expect(recomputeTaskCostSnapshot('t1', failing)).rejects.toThrow('rates unavailable');
        expect(await store.taskSnapshot('t1')).toMatchObject({ totalCost: 19.6 });
        expect(await store.userSnapshots('t1')).toHaveLength(2);
    });
});
