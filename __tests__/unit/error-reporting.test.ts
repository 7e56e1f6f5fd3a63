/**
 * @fileoverview Unit tests for error reporting and scrubbing
 */

import { describe, it, expect, jest } from '@jest/globals';
import * as Sentry from '@sentry/node';
import {
    flushErrorReports,
    initErrorReporting,
    isErrorReportingEnabled,
    reportError,
    scrubRecord,
    scrubSensitiveData,
} from '../../js/error-reporting.js';

const mockScope = { setLevel: jest.fn(), setTag: jest.fn(), setExtras: jest.fn() };

jest.mock('@sentry/node', () => ({
    init: jest.fn(),
    setTag: jest.fn(),
    withScope: jest.fn((callback: (scope: typeof mockScope) => void) => callback(mockScope)),
    captureException: jest.fn(),
    captureMessage: jest.fn(),
    addBreadcrumb: jest.fn(),
    flush: jest.fn(async () => true),
}));

describe('scrubbing', () => {
    it('redacts tokens, secrets and email addresses in text', () => {
        expect(scrubSensitiveData('Bearer test-secret failed')).toBe('[REDACTED] failed');
        expect(scrubSensitiveData('mail ops@example.com now')).toBe('mail [REDACTED] now');
    });

    it('redacts sensitive keys and nested strings', () => {
        expect(scrubRecord({ taskId: 't1', apiKey: 'test-secret', nested: { note: 'password=hunter' } })).toEqual({
            taskId: 't1',
            apiKey: '[REDACTED]',
            nested: { note: '[REDACTED]' },
        });
    });
});

// Sentry state is module-wide, so these run in order
describe('reporting lifecycle', () => {
    it('stays disabled without a DSN', async () => {
        expect(initErrorReporting({ dsn: '', environment: 'test', release: 'test' })).toBe(false);
        reportError(new Error('ignored'));

        expect(isErrorReportingEnabled()).toBe(false);
        expect(Sentry.captureException).not.toHaveBeenCalled();
        expect(await flushErrorReports()).toBe(true);
    });

    it('initializes once a DSN is configured', () => {
        const enabled = initErrorReporting({
            dsn: 'https://test-secret@example.invalid/1',
            environment: 'test',
            release: 'test',
        });

        expect(enabled).toBe(true);
        expect(Sentry.init).toHaveBeenCalledWith(
            expect.objectContaining({ dsn: 'https://test-secret@example.invalid/1', environment: 'test' })
        );
        expect(Sentry.setTag).toHaveBeenCalledWith('service', 'costing-engine');
    });

    it('captures errors with module and operation tags', () => {
        const error = new Error('recompute failed');
        reportError(error, { module: 'WorkerManager', operation: 'recompute t1', metadata: { taskId: 't1' } });

        expect(Sentry.captureException).toHaveBeenCalledWith(error);
        expect(mockScope.setTag).toHaveBeenCalledWith('module', 'WorkerManager');
        expect(mockScope.setTag).toHaveBeenCalledWith('operation', 'recompute t1');
        expect(mockScope.setExtras).toHaveBeenCalledWith({ taskId: 't1' });
    });
});
