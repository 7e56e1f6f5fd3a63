/**
 * @fileoverview Recalc Queue
 *
 * In-memory implementation of the recompute work list. One entry per task;
 * workers lease entries in batches and remove them only after a successful
 * recompute, so delivery is at-least-once.
 *
 * ## Entry lifecycle
 *
 * ```
 * enqueue ──► pending ──claimBatch──► claimed ──ack──► (deleted)
 *                ▲                      │  │
 *                │                      │  └──release──► pending
 *                └────── lease expiry ──┘
 * ```
 *
 * A task enqueued again while claimed is marked `dirty`: its data changed
 * during the recompute, so `ack` keeps the entry (released) instead of
 * deleting it and the next claim recomputes it.
 */

import { QUEUE_DEFAULTS } from './constants.js';
import { createLogger } from './logger.js';
import type { EpochMs, RecalcQueue, RecalcQueueEntry } from './types.js';

const logger = createLogger('Queue');

export interface QueueOptions {
    /** Claims older than this are treated as abandoned */
    leaseMs?: number;
    now?: () => EpochMs;
}

export class MemoryRecalcQueue implements RecalcQueue {
    private readonly entries = new Map<string, RecalcQueueEntry>();
    private readonly leaseMs: number;
    private readonly now: () => EpochMs;

    constructor(initial: readonly RecalcQueueEntry[] = [], options: QueueOptions = {}) {
        this.leaseMs = options.leaseMs ?? QUEUE_DEFAULTS.LEASE_MS;
        this.now = options.now ?? (() => Date.now());
        const ordered = [...initial].sort((a, b) => a.enqueuedAt - b.enqueuedAt);
        for (const entry of ordered) {
            this.entries.set(entry.taskId, { ...entry });
        }
    }

    private isLeased(entry: RecalcQueueEntry, at: EpochMs): boolean {
        return entry.claimedBy !== null && entry.claimedAt !== null && at - entry.claimedAt < this.leaseMs;
    }

    async enqueue(taskId: string): Promise<void> {
        const existing = this.entries.get(taskId);
        if (!existing) {
            this.entries.set(taskId, {
                taskId,
                enqueuedAt: this.now(),
                claimedBy: null,
                claimedAt: null,
                dirty: false,
            });
            return;
        }
        if (this.isLeased(existing, this.now())) {
            existing.dirty = true;
        }
    }

    /**
     * Leases up to `limit` entries not held by another worker, oldest first.
     * Tasks in `exclude` are left alone.
     */
    async claimBatch(
        limit: number,
        workerId: string,
        exclude: ReadonlySet<string> = new Set()
    ): Promise<RecalcQueueEntry[]> {
        const at = this.now();
        const claimed: RecalcQueueEntry[] = [];
        const candidates = Array.from(this.entries.values()).sort((a, b) => a.enqueuedAt - b.enqueuedAt);

        for (const entry of candidates) {
            if (claimed.length >= limit) break;
            if (exclude.has(entry.taskId) || this.isLeased(entry, at)) continue;
            if (entry.claimedBy !== null) {
                logger.warn(`Lease of ${entry.claimedBy} on task ${entry.taskId} expired; reclaiming`);
            }
            entry.claimedBy = workerId;
            entry.claimedAt = at;
            entry.dirty = false;
            claimed.push({ ...entry });
        }
        return claimed;
    }

    async ack(taskId: string, workerId: string): Promise<void> {
        const entry = this.entries.get(taskId);
        if (!entry || entry.claimedBy !== workerId) {
            logger.warn(`Ack for task ${taskId} by ${workerId} ignored: not the lease holder`);
            return;
        }
        if (entry.dirty) {
            logger.debug(`Task ${taskId} changed during recompute; keeping it queued`);
            this.clearClaim(entry);
            return;
        }
        this.entries.delete(taskId);
    }

    async release(taskId: string, workerId: string): Promise<void> {
        const entry = this.entries.get(taskId);
        if (entry && entry.claimedBy === workerId) {
            this.clearClaim(entry);
        }
    }

    async size(): Promise<number> {
        return this.entries.size;
    }

    /**
     * Copy of every entry, oldest first.
     */
    snapshot(): RecalcQueueEntry[] {
        return Array.from(this.entries.values())
            .sort((a, b) => a.enqueuedAt - b.enqueuedAt)
            .map((e) => ({ ...e }));
    }

    private clearClaim(entry: RecalcQueueEntry): void {
        entry.claimedBy = null;
        entry.claimedAt = null;
        entry.dirty = false;
    }
}
