/**
 * @fileoverview Unit tests for exchange rate lookup
 */

import { describe, it, expect } from '@jest/globals';
import { buildFxLookup, rateFromSnapshot } from '../../js/fx.js';
import type { FxRateSnapshot } from '../../js/types.js';

const tryBased: FxRateSnapshot = { date: '2024-01-01', base: 'TRY', rates: { EUR: 0.04, USD: 0.05 } };
const later: FxRateSnapshot = { date: '2024-02-01', base: 'TRY', rates: { EUR: 0.025, USD: 0.04 } };

describe('rateFromSnapshot', () => {
    it('reads base-currency rates directly', () => {
        expect(rateFromSnapshot(tryBased, 'TRY', 'EUR')).toBe(0.04);
    });

    it('crosses through the base for other currencies', () => {
        expect(rateFromSnapshot(tryBased, 'USD', 'EUR')).toBeCloseTo(0.8, 10);
    });

    it('treats the base as 1 when the quote is the base', () => {
        const eurBased: FxRateSnapshot = { date: '2024-01-01', base: 'EUR', rates: { TRY: 32 } };
        expect(rateFromSnapshot(eurBased, 'TRY', 'EUR')).toBe(1 / 32);
    });

    it('returns 0 for missing or non-positive rates', () => {
        expect(rateFromSnapshot({ date: '2024-01-01', base: 'TRY', rates: {} }, 'TRY', 'EUR')).toBe(0);
        expect(rateFromSnapshot({ date: '2024-01-01', base: 'TRY', rates: { EUR: 0 } }, 'TRY', 'EUR')).toBe(0);
    });

    it('returns 1 for the quote currency itself', () => {
        expect(rateFromSnapshot(tryBased, 'EUR', 'EUR')).toBe(1);
    });
});

describe('buildFxLookup', () => {
    const fx = buildFxLookup([later, tryBased]);

    it('uses the snapshot on or before the date', () => {
        expect(fx('TRY', '2024-01-01')).toBe(0.04);
        expect(fx('TRY', '2024-01-31')).toBe(0.04);
        expect(fx('TRY', '2024-02-01')).toBe(0.025);
        expect(fx('TRY', '2024-12-31')).toBe(0.025);
    });

    it('uses the earliest snapshot for dates before it', () => {
        expect(fx('TRY', '2023-06-01')).toBe(0.04);
    });

    it('returns 0 without snapshots, except for EUR itself', () => {
        const none = buildFxLookup([]);
        expect(none('TRY', '2024-01-01')).toBe(0);
        expect(none('EUR', '2024-01-01')).toBe(1);
    });
});
