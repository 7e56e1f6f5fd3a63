/**
 * @fileoverview Cooperative Cancellation
 * Tokens polled by the batch runner between tasks. Cancelling never
 * interrupts a recompute already in progress; it only stops new ones from
 * starting.
 */

import { existsSync } from 'node:fs';

export interface CancellationToken {
    isCancellationRequested(): boolean;
    /** Why cancellation was requested, once it has been */
    reason(): string | null;
}

/**
 * In-process cancellation, e.g. from a signal handler.
 */
export class CancellationSource {
    private cancelledWith: string | null = null;

    readonly token: CancellationToken = {
        isCancellationRequested: () => this.cancelledWith !== null,
        reason: () => this.cancelledWith,
    };

    cancel(reason = 'cancelled'): void {
        if (this.cancelledWith === null) {
            this.cancelledWith = reason;
        }
    }
}

/**
 * Token that reports cancellation while a sentinel file exists.
 */
export function stopFileToken(path: string): CancellationToken {
    return {
        isCancellationRequested: () => existsSync(path),
        reason: () => (existsSync(path) ? `stop file ${path} present` : null),
    };
}

/**
 * Token cancelled as soon as any of the given tokens is.
 */
export function anyToken(...tokens: CancellationToken[]): CancellationToken {
    return {
        isCancellationRequested: () => tokens.some((t) => t.isCancellationRequested()),
        reason: () => {
            for (const t of tokens) {
                const r = t.reason();
                if (r !== null) return r;
            }
            return null;
        },
    };
}

export const NEVER_CANCELLED: CancellationToken = {
    isCancellationRequested: () => false,
    reason: () => null,
};
