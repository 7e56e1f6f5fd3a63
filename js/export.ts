/**
 * @fileoverview Export Module
 * Renders cost snapshots as CSV. Text fields are guarded against spreadsheet
 * formula injection and escaped for commas, quotes and newlines.
 */

import { writeFile } from 'node:fs/promises';
import { ERROR_TYPES } from './constants.js';
import type { TaskCostSnapshot, UserCostSnapshot } from './types.js';
import { createUserFriendlyError, escapeCsv, toError } from './utils.js';

/**
 * Sanitizes a string to prevent CSV formula injection.
 * If a field starts with =, +, -, @, tab, or carriage return, Excel/Sheets might execute it.
 * We prepend a single quote to force it to be treated as text.
 */
export function sanitizeFormulaInjection(str: string | null | undefined): string {
    if (!str) return '';
    if (/^[=+\-@\t\r]/.test(str)) {
        return "'" + str;
    }
    return str;
}

const HEADERS = [
    'TaskId',
    'JobNo',
    'UserId',
    'Currency',
    'HoursWeekdayWork',
    'HoursAfterHours',
    'HoursSunday',
    'CostWeekdayWork',
    'CostAfterHours',
    'CostSunday',
    'TotalCost',
    'UpdatedAt',
];

export interface SnapshotExportRow {
    task: TaskCostSnapshot;
    users: UserCostSnapshot[];
}

function money(value: number): string {
    return value.toFixed(2);
}

/**
 * One line per snapshot: the task-level row (empty UserId) followed by its
 * per-user rows.
 */
export function buildSnapshotCsv(rows: readonly SnapshotExportRow[]): string {
    const lines: string[] = [HEADERS.join(',')];

    for (const { task, users } of rows) {
        const snaps: (TaskCostSnapshot | UserCostSnapshot)[] = [task, ...users];
        for (const snap of snaps) {
            const userId = 'userId' in snap ? snap.userId : '';
            const row = [
                sanitizeFormulaInjection(snap.taskId),
                sanitizeFormulaInjection(snap.jobNoCached),
                sanitizeFormulaInjection(userId),
                snap.currency,
                money(snap.hoursWw),
                money(snap.hoursAh),
                money(snap.hoursSu),
                money(snap.costWw),
                money(snap.costAh),
                money(snap.costSu),
                money(snap.totalCost),
                snap.updatedAt,
            ].map(escapeCsv);
            lines.push(row.join(','));
        }
    }

    return lines.join('\n') + '\n';
}

/**
 * @throws FriendlyError with STORAGE type when the file cannot be written.
 */
export async function writeSnapshotCsv(path: string, rows: readonly SnapshotExportRow[]): Promise<number> {
    try {
        await writeFile(path, buildSnapshotCsv(rows), 'utf8');
    } catch (error) {
        throw createUserFriendlyError(toError(error), ERROR_TYPES.STORAGE);
    }
    return rows.length;
}
