/**
 * @fileoverview Unit tests for cancellation tokens
 */

import { describe, it, expect, afterEach } from '@jest/globals';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CancellationSource, NEVER_CANCELLED, anyToken, stopFileToken } from '../../js/cancellation.js';

describe('CancellationSource', () => {
    it('keeps the first reason', () => {
        const source = new CancellationSource();
        expect(source.token.isCancellationRequested()).toBe(false);
        expect(source.token.reason()).toBeNull();

        source.cancel('interrupted');
        source.cancel('again');

        expect(source.token.isCancellationRequested()).toBe(true);
        expect(source.token.reason()).toBe('interrupted');
    });
});

describe('stopFileToken', () => {
    const dir = mkdtempSync(join(tmpdir(), 'costing-stop-'));
    const path = join(dir, 'recompute.stop');

    afterEach(() => {
        rmSync(path, { force: true });
    });

    it('is cancelled while the file exists', () => {
        const token = stopFileToken(path);
        expect(token.isCancellationRequested()).toBe(false);

        writeFileSync(path, '');

        expect(token.isCancellationRequested()).toBe(true);
        expect(token.reason()).toBe(`stop file ${path} present`);
    });
});

describe('anyToken', () => {
    it('reports the first cancelled token', () => {
        const first = new CancellationSource();
        const second = new CancellationSource();
        const token = anyToken(NEVER_CANCELLED, first.token, second.token);

        expect(token.isCancellationRequested()).toBe(false);
        second.cancel('second');
        expect(token.isCancellationRequested()).toBe(true);
        expect(token.reason()).toBe('second');
    });
});
