/**
 * @fileoverview Unit tests for snapshot CSV export
 */

import { describe, it, expect } from '@jest/globals';
import { mkdtempSync, readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { buildSnapshotCsv, sanitizeFormulaInjection, writeSnapshotCsv, type SnapshotExportRow } from '../../js/export.js';

const HEADER =
    'TaskId,JobNo,UserId,Currency,HoursWeekdayWork,HoursAfterHours,HoursSunday,' +
    'CostWeekdayWork,CostAfterHours,CostSunday,TotalCost,UpdatedAt';

const task = {
    taskId: 't1',
    jobNoCached: '=JOB,1',
    currency: 'EUR' as const,
    hoursWw: 1.5,
    hoursAh: 2,
    hoursSu: 0,
    costWw: 12.3,
    costAh: 4,
    costSu: 0,
    totalCost: 16.3,
    updatedAt: '2024-02-01T00:00:00.000Z',
};

const rows: SnapshotExportRow[] = [{ task, users: [{ ...task, userId: 'u1' }] }];

describe('sanitizeFormulaInjection', () => {
    it('prefixes cells a spreadsheet would evaluate', () => {
        expect(sanitizeFormulaInjection('=1+1')).toBe("'=1+1");
        expect(sanitizeFormulaInjection('@cmd')).toBe("'@cmd");
        expect(sanitizeFormulaInjection('JOB-1')).toBe('JOB-1');
        expect(sanitizeFormulaInjection(null)).toBe('');
    });
});

describe('buildSnapshotCsv', () => {
    it('writes the task row then its user rows with two-decimal amounts', () => {
        expect(buildSnapshotCsv(rows)).toBe(
            [
                HEADER,
                `t1,"'=JOB,1",,EUR,1.50,2.00,0.00,12.30,4.00,0.00,16.30,2024-02-01T00:00:00.000Z`,
                `t1,"'=JOB,1",u1,EUR,1.50,2.00,0.00,12.30,4.00,0.00,16.30,2024-02-01T00:00:00.000Z`,
            ].join('\n') + '\n'
        );
    });

    it('writes only the header without snapshots', () => {
        expect(buildSnapshotCsv([])).toBe(`${HEADER}\n`);
    });
});

describe('writeSnapshotCsv', () => {
    it('writes the file and returns the number of task snapshots', async () => {
        const path = join(mkdtempSync(join(tmpdir(), 'costing-export-')), 'snapshots.csv');

        expect(await writeSnapshotCsv(path, rows)).toBe(1);
        expect(readFileSync(path, 'utf8')).toBe(buildSnapshotCsv(rows));
    });

    it('reports an unwritable path as a storage error', async () => {
        const path = join(tmpdir(), 'costing-missing-dir', 'nested', 'snapshots.csv');
        await expect(writeSnapshotCsv(path, rows)).rejects.toMatchObject({ type: 'STORAGE_ERROR' });
    });
});
