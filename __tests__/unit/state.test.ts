/**
 * @fileoverview Unit tests for the in-memory store
 */

import { describe, it, expect } from '@jest/globals';
import { parseDataset } from '../../js/dataset.js';
import { MemoryStore } from '../../js/state.js';
import { TRY_EUR, caught, ist, makeTask, makeTimer, makeWage } from '../helpers/fixtures.js';

describe('MemoryStore', () => {
    it('rejects duplicate wage rows on load and on insert', async () => {
        expect(
            caught(() => new MemoryStore({ wageRates: [makeWage('u1', '2024-01-01', 1), makeWage('u1', '2024-01-01', 2)] }))
        ).toMatchObject({ type: 'VALIDATION_ERROR', detail: 'Duplicate wage row for u1 effective 2024-01-01' });

        const store = new MemoryStore({ wageRates: [makeWage('u1', '2024-01-01', 1)] });
        await expect(store.addWageRate(makeWage('u1', '2024-01-01', 2))).rejects.toMatchObject({
            type: 'VALIDATION_ERROR',
        });
    });

    it('validates timers before saving them', async () => {
        const store = new MemoryStore({ tasks: [makeTask('t1')] });

        await expect(
            store.saveTimer(makeTimer('a', 't1', 'u1', '2024-01-08T10:00', '2024-01-08T09:00'))
        ).rejects.toMatchObject({ detail: 'Timer a finishes before it starts' });
        await expect(
            store.saveTimer(makeTimer('b', 'nope', 'u1', '2024-01-08T10:00', null))
        ).rejects.toMatchObject({ detail: 'Timer b refers to unknown task nope' });
    });

    it('returns only finished, non-empty timers as closed', async () => {
        const store = new MemoryStore({
            tasks: [makeTask('t1')],
            timers: [
                makeTimer('a', 't1', 'u1', '2024-01-08T08:00', '2024-01-08T09:00'),
                makeTimer('b', 't1', 'u1', '2024-01-08T09:00', null),
                makeTimer('c', 't1', 'u1', '2024-01-08T10:00', '2024-01-08T10:00'),
            ],
        });
        expect((await store.closedTimersForTask('t1')).map((t) => t.id)).toEqual(['a']);
    });

    it('rejects invalid calendars', async () => {
        const store = new MemoryStore();
        await expect(
            store.saveCalendar({
                machineId: 'm1',
                timezone: 'Europe/Istanbul',
                weekTemplate: { '0': [{ start: '12:00', end: '08:00' }] },
                workExceptions: [],
            })
        ).rejects.toMatchObject({ type: 'VALIDATION_ERROR' });
        expect(await store.calendarFor('m1')).toBeNull();
    });

    it('replaces the rate snapshot of the same date', async () => {
        const store = new MemoryStore({ fxRates: [TRY_EUR] });
        await store.saveFxSnapshot({ ...TRY_EUR, rates: { EUR: 0.03 } });
        expect(await store.fxSnapshots()).toEqual([{ date: '2024-01-01', base: 'TRY', rates: { EUR: 0.03 } }]);
    });

    it('discards staged snapshot writes when a transaction fails', async () => {
        const store = new MemoryStore({
            tasks: [makeTask('t1')],
            taskSnapshots: [
                {
                    taskId: 't1',
                    jobNoCached: 'JOB-t1',
                    currency: 'EUR',
                    hoursWw: 1,
                    hoursAh: 0,
                    hoursSu: 0,
                    costWw: 5,
                    costAh: 0,
                    costSu: 0,
                    totalCost: 5,
                    updatedAt: '2024-02-01T00:00:00.000Z',
                },
            ],
        });

        await expect(
            store.transaction(async (tx) => {
                await tx.deleteForTask('t1');
                expect(await store.taskSnapshot('t1')).not.toBeNull();
                throw new Error('abort');
            })
        ).rejects.toThrow('abort');

        expect((await store.taskSnapshot('t1'))?.totalCost).toBe(5);
    });

    it('lists machine timers overlapping a window', async () => {
        const store = new MemoryStore({
            tasks: [makeTask('t1'), makeTask('t2', { machineId: 'm2' })],
            timers: [
                makeTimer('early', 't1', 'u1', '2024-01-08T06:00', '2024-01-08T07:00'),
                makeTimer('open', 't1', 'u1', '2024-01-08T07:30', null),
                makeTimer('in', 't1', 'u2', '2024-01-08T08:30', '2024-01-08T09:00'),
                makeTimer('other', 't2', 'u2', '2024-01-08T08:30', '2024-01-08T09:00'),
            ],
        });

        const timers = await store.timersForMachine('m1', {
            startMs: ist('2024-01-08T08:00'),
            endMs: ist('2024-01-08T12:00'),
        });
        expect(timers.map((t) => t.id)).toEqual(['open', 'in']);
    });

    it('exports a dataset that parses back to the same contents', async () => {
        const store = new MemoryStore({
            tasks: [makeTask('t1')],
            timers: [makeTimer('a', 't1', 'u1', '2024-01-08T08:00', '2024-01-08T09:00')],
            wageRates: [makeWage('u1', '2024-01-01', 2250)],
            fxRates: [TRY_EUR],
        });
        await store.queue.enqueue('t1');

        const dataset = store.toDataset();
        expect(parseDataset(JSON.parse(JSON.stringify(dataset)))).toEqual(dataset);
    });
});
