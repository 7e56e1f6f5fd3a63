/**
 * @fileoverview Wage Picker
 *
 * Selects the wage in force for a user on a date.
 *
 * ## Precedence
 * 1. Latest row with `effectiveFrom <= date`
 * 2. The user's earliest row, when every row starts after the date
 * 3. The system-wide fallback, when the user has no rows at all
 *
 * The fallback is built by a pure function from a currency-grouped summary,
 * so callers can cache it or inject it in tests. It always yields a wage:
 * hours are never dropped for lack of a rate.
 */

import { CONSTANTS } from './constants.js';
import type { Currency, CurrencyWageSummary, EffectiveWage, IsoDate, WageRate } from './types.js';

export type WagePicker = (userId: string, date: IsoDate) => EffectiveWage;

/**
 * Index of the last element `<= target` in an ascending list, or -1.
 */
export function lastIndexAtOrBefore(sorted: readonly string[], target: string): number {
    let lo = 0;
    let hi = sorted.length;
    while (lo < hi) {
        const mid = (lo + hi) >>> 1;
        if (sorted[mid] <= target) {
            lo = mid + 1;
        } else {
            hi = mid;
        }
    }
    return lo - 1;
}

function toEffective(row: WageRate): EffectiveWage {
    return {
        currency: row.currency,
        baseMonthly: row.baseMonthly,
        afterHoursMultiplier: row.afterHoursMultiplier,
        sundayMultiplier: row.sundayMultiplier,
    };
}

/**
 * Fallback wage from cross-user averages. Prefers `defaultCurrency`, then the
 * alphabetically first summarized currency, then a nominal placeholder.
 */
export function buildAverageWageFallback(
    summary: readonly CurrencyWageSummary[],
    defaultCurrency: Currency = CONSTANTS.DEFAULT_CURRENCY
): EffectiveWage {
    const usable = summary.filter((s) => s.avgBaseMonthly !== null);
    const preferred =
        usable.find((s) => s.currency === defaultCurrency) ??
        [...usable].sort((a, b) => a.currency.localeCompare(b.currency))[0];

    if (!preferred) {
        return {
            currency: defaultCurrency,
            baseMonthly: CONSTANTS.PLACEHOLDER_BASE_MONTHLY,
            afterHoursMultiplier: CONSTANTS.PLACEHOLDER_AFTER_HOURS_MULTIPLIER,
            sundayMultiplier: CONSTANTS.PLACEHOLDER_SUNDAY_MULTIPLIER,
        };
    }

    return {
        currency: preferred.currency,
        baseMonthly: preferred.avgBaseMonthly ?? CONSTANTS.PLACEHOLDER_BASE_MONTHLY,
        afterHoursMultiplier:
            preferred.avgAfterHoursMultiplier ?? CONSTANTS.PLACEHOLDER_AFTER_HOURS_MULTIPLIER,
        sundayMultiplier: preferred.avgSundayMultiplier ?? CONSTANTS.PLACEHOLDER_SUNDAY_MULTIPLIER,
    };
}

/**
 * Averages wage rows per currency. Used by stores that hold rows in memory.
 */
export function summarizeWagesByCurrency(rows: readonly WageRate[]): CurrencyWageSummary[] {
    const groups = new Map<Currency, WageRate[]>();
    for (const row of rows) {
        const group = groups.get(row.currency) ?? [];
        group.push(row);
        groups.set(row.currency, group);
    }

    const avg = (values: number[]) => values.reduce((sum, v) => sum + v, 0) / values.length;

    return Array.from(groups.entries()).map(([currency, group]) => ({
        currency,
        avgBaseMonthly: avg(group.map((r) => r.baseMonthly)),
        avgAfterHoursMultiplier: avg(group.map((r) => r.afterHoursMultiplier)),
        avgSundayMultiplier: avg(group.map((r) => r.sundayMultiplier)),
    }));
}

/**
 * Builds a picker over the given users' wage rows.
 */
export function buildWagePicker(rows: readonly WageRate[], fallback: EffectiveWage): WagePicker {
    const byUser = new Map<string, WageRate[]>();
    for (const row of rows) {
        const list = byUser.get(row.userId) ?? [];
        list.push(row);
        byUser.set(row.userId, list);
    }

    const datesByUser = new Map<string, string[]>();
    for (const [userId, list] of byUser) {
        list.sort((a, b) => a.effectiveFrom.localeCompare(b.effectiveFrom));
        datesByUser.set(
            userId,
            list.map((r) => r.effectiveFrom)
        );
    }

    return (userId, date) => {
        const list = byUser.get(userId);
        const dates = datesByUser.get(userId);
        if (!list || !dates || list.length === 0) {
            return fallback;
        }
        const idx = lastIndexAtOrBefore(dates, date);
        return toEffective(list[Math.max(idx, 0)]);
    };
}
