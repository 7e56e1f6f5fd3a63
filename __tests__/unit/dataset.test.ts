/**
 * @fileoverview Unit tests for dataset parsing and persistence
 */

import { describe, it, expect } from '@jest/globals';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { emptyDataset, loadDataset, parseDataset, saveDataset } from '../../js/dataset.js';
import { caught, makeTask } from '../helpers/fixtures.js';

const dir = mkdtempSync(join(tmpdir(), 'costing-dataset-'));

describe('parseDataset', () => {
    it('fills defaults for missing sections and fields', () => {
        const dataset = parseDataset({ tasks: [{ id: 't1' }] });

        expect(dataset.tasks).toEqual([
            {
                id: 't1',
                name: '',
                jobNo: '',
                machineId: null,
                isHold: false,
                plannedStartMs: null,
                plannedEndMs: null,
                planOrder: null,
                planLocked: false,
            },
        ]);
        expect(dataset.timers).toEqual([]);
        expect(dataset.queue).toEqual([]);
    });

    it('reads small timestamps as epoch seconds', () => {
        const dataset = parseDataset({
            timers: [{ id: 'a', userId: 'u1', taskId: 't1', startMs: 1704700800, finishMs: 1704704400000 }],
        });
        expect(dataset.timers[0]).toMatchObject({ startMs: 1704700800000, finishMs: 1704704400000 });
    });

    it('lists every problem with its path', () => {
        expect(
            caught(() =>
                parseDataset({
                    wageRates: [
                        {
                            userId: 'u1',
                            effectiveFrom: '2024/01/01',
                            currency: 'TRY',
                            baseMonthly: 1,
                            afterHoursMultiplier: 1.5,
                            sundayMultiplier: 2,
                        },
                    ],
                })
            )
        ).toMatchObject({
            type: 'VALIDATION_ERROR',
            detail: 'Invalid dataset: wageRates.0.effectiveFrom: expected YYYY-MM-DD',
        });
    });

    it('checks calendars with the calendar rules', () => {
        expect(
            caught(() =>
                parseDataset({
                    calendars: [
                        {
                            machineId: 'm1',
                            timezone: 'Europe/Istanbul',
                            weekTemplate: {
                                '0': [
                                    { start: '07:00', end: '12:00' },
                                    { start: '11:00', end: '13:00' },
                                ],
                            },
                            workExceptions: [],
                        },
                    ],
                })
            )
        ).toMatchObject({ detail: 'Invalid dataset: calendars.0.weekTemplate.0: windows overlap' });
    });
});

describe('loadDataset / saveDataset', () => {
    it('writes a dataset and reads it back', async () => {
        const path = join(dir, 'nested', 'data.json');
        const dataset = { ...emptyDataset(), tasks: [makeTask('t1')] };

        await saveDataset(path, dataset);

        expect(await loadDataset(path)).toEqual(dataset);
    });

    it('reports a missing file as a storage error', async () => {
        await expect(loadDataset(join(dir, 'missing.json'))).rejects.toMatchObject({ type: 'STORAGE_ERROR' });
    });

    it('reports malformed JSON as a validation error', async () => {
        const path = join(dir, 'broken.json');
        writeFileSync(path, '{ not json');

        await expect(loadDataset(path)).rejects.toMatchObject({ type: 'VALIDATION_ERROR' });
    });
});
