/**
 * @fileoverview Unit tests for the in-memory recalc queue
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { MemoryRecalcQueue } from '../../js/queue.js';

describe('MemoryRecalcQueue', () => {
    let now: number;
    let queue: MemoryRecalcQueue;

    beforeEach(async () => {
        now = 1_000;
        queue = new MemoryRecalcQueue([], { leaseMs: 100, now: () => now });
        await queue.enqueue('a');
        now = 1_001;
        await queue.enqueue('b');
        now = 1_002;
        await queue.enqueue('c');
    });

    it('keeps one entry per task', async () => {
        await queue.enqueue('a');
        expect(await queue.size()).toBe(3);
        expect(queue.snapshot()[0]).toMatchObject({ taskId: 'a', enqueuedAt: 1_000 });
    });

    it('claims the oldest entries first, up to the limit', async () => {
        const batch = await queue.claimBatch(2, 'w1');
        expect(batch.map((e) => e.taskId)).toEqual(['a', 'b']);
        expect(batch[0]).toMatchObject({ claimedBy: 'w1', claimedAt: 1_002 });
    });

    it('skips entries leased by another worker', async () => {
        await queue.claimBatch(2, 'w1');
        const batch = await queue.claimBatch(10, 'w2');
        expect(batch.map((e) => e.taskId)).toEqual(['c']);
    });

    it('skips excluded tasks', async () => {
        const batch = await queue.claimBatch(10, 'w1', new Set(['a', 'c']));
        expect(batch.map((e) => e.taskId)).toEqual(['b']);
    });

    it('deletes an entry when its holder acks it', async () => {
        await queue.claimBatch(1, 'w1');
        await queue.ack('a', 'w1');
        expect(queue.snapshot().map((e) => e.taskId)).toEqual(['b', 'c']);
    });

    it('ignores an ack from a worker that does not hold the lease', async () => {
        await queue.claimBatch(1, 'w1');
        await queue.ack('a', 'w2');
        expect(await queue.size()).toBe(3);
    });

    it('makes a released entry claimable again', async () => {
        await queue.claimBatch(1, 'w1');
        await queue.release('a', 'w1');
        expect(queue.snapshot()[0]).toMatchObject({ taskId: 'a', claimedBy: null, claimedAt: null });
        expect((await queue.claimBatch(1, 'w2'))[0].taskId).toBe('a');
    });

    it('keeps an entry re-enqueued while it was being recomputed', async () => {
        await queue.claimBatch(1, 'w1');
        await queue.enqueue('a');
        await queue.ack('a', 'w1');

        expect(queue.snapshot()[0]).toMatchObject({ taskId: 'a', claimedBy: null, dirty: false });
        expect((await queue.claimBatch(1, 'w2'))[0].taskId).toBe('a');
    });

    it('lets another worker reclaim an expired lease', async () => {
        await queue.claimBatch(1, 'w1');
        now += 100;
        const batch = await queue.claimBatch(1, 'w2');
        expect(batch[0]).toMatchObject({ taskId: 'a', claimedBy: 'w2' });

        await queue.ack('a', 'w1');
        expect(await queue.size()).toBe(3);
    });

    it('restores persisted entries in age order', async () => {
        const restored = new MemoryRecalcQueue(queue.snapshot().reverse(), { now: () => now });
        expect(restored.snapshot().map((e) => e.taskId)).toEqual(['a', 'b', 'c']);
    });
});
