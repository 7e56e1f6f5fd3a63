/**
 * @fileoverview Currency Conversion Lookup
 * Day-keyed exchange rates into the reporting currency, read from stored
 * rate snapshots. The snapshot on or before the date applies; dates before
 * the first snapshot use the earliest one. A result of 0 means "no rate".
 */

import { CONSTANTS } from './constants.js';
import type { Currency, FxLookup, FxRateSnapshot } from './types.js';
import { lastIndexAtOrBefore } from './wages.js';

function positive(value: number | undefined): number {
    return value !== undefined && Number.isFinite(value) && value > 0 ? value : 0;
}

/**
 * Rate converting one unit of `currency` into `quote` within one snapshot.
 * The snapshot's base currency counts as 1 even when it is not listed.
 */
export function rateFromSnapshot(snapshot: FxRateSnapshot, currency: Currency, quote: Currency): number {
    if (currency === quote) return 1;
    const perBase = (c: Currency) => (c === snapshot.base ? 1 : positive(snapshot.rates[c]));
    const toQuote = perBase(quote);
    const toCurrency = perBase(currency);
    if (toQuote === 0 || toCurrency === 0) return 0;
    return toQuote / toCurrency;
}

/**
 * Builds a lookup over the given snapshots.
 */
export function buildFxLookup(
    snapshots: readonly FxRateSnapshot[],
    quote: Currency = CONSTANTS.REPORTING_CURRENCY
): FxLookup {
    const sorted = [...snapshots].sort((a, b) => a.date.localeCompare(b.date));
    const dates = sorted.map((s) => s.date);

    return (currency, date) => {
        if (currency === quote) return 1;
        if (sorted.length === 0) return 0;
        const idx = Math.max(lastIndexAtOrBefore(dates, date), 0);
        return rateFromSnapshot(sorted[idx], currency, quote);
    };
}
