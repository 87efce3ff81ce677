/**
 * Run Status Unit Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { SyncStatusTracker } from '../sync-status';
import { InternalSyncError } from '../../../errors/types';
import type { SyncResult } from '../../core/types';
import { BASE_TIME } from '@/test/fixtures';

function result(runId: string): SyncResult {
    return {
        runId,
        mode: 'full',
        success: true,
        added: 0,
        updated: 0,
        deleted: 0,
        unchanged: 0,
        failures: [],
        durationMs: 1,
        commitId: 'c1',
    };
}

describe('SyncStatusTracker', () => {
    it('walks the happy path back to idle', () => {
        const tracker = new SyncStatusTracker(10, () => BASE_TIME);
        const seen: string[] = [];
        tracker.onStateChange(e => seen.push(e.currentState));

        tracker.transition('checkpointing');
        expect(tracker.isBusy()).toBe(true);
        tracker.transition('detecting');
        tracker.transition('applying');
        tracker.transition('persisting');
        tracker.transition('idle');

        expect(seen).toEqual(['checkpointing', 'detecting', 'applying', 'persisting', 'idle']);
        expect(tracker.isBusy()).toBe(false);
    });

    it('rejects transitions the state machine forbids', () => {
        const tracker = new SyncStatusTracker();

        expect(() => tracker.transition('applying')).toThrow(InternalSyncError);
        expect(() => tracker.transition('applying')).toThrow('Invalid sync state transition: idle -> applying');
        expect(tracker.getState()).toBe('idle');
    });

    it('passes through rolled_back after a failure', () => {
        const tracker = new SyncStatusTracker();
        tracker.transition('checkpointing');
        tracker.transition('detecting');
        tracker.transition('failed');

        expect(tracker.canTransition('rolled_back')).toBe(true);
        tracker.transition('rolled_back');
        tracker.transition('idle');
        expect(tracker.getState()).toBe('idle');
    });

    it('resets from a mid-run state', () => {
        const tracker = new SyncStatusTracker();
        tracker.transition('checkpointing');
        tracker.transition('detecting');

        tracker.reset();

        expect(tracker.getState()).toBe('idle');
    });

    it('keeps state change handlers isolated from each other', () => {
        const tracker = new SyncStatusTracker();
        const second = vi.fn();
        tracker.onStateChange(() => {
            throw new Error('handler bug');
        });
        const unsubscribe = tracker.onStateChange(second);

        tracker.transition('checkpointing');
        unsubscribe();
        tracker.transition('detecting');

        expect(second).toHaveBeenCalledTimes(1);
        expect(second).toHaveBeenCalledWith({
            previousState: 'idle',
            currentState: 'checkpointing',
            timestamp: expect.any(Number),
            reason: undefined,
        });
    });

    it('keeps the most recent results first, bounded', () => {
        const tracker = new SyncStatusTracker(2);
        tracker.recordResult(result('r1'));
        tracker.recordResult(result('r2'));
        tracker.recordResult(result('r3'));

        expect(tracker.getLastResult()?.runId).toBe('r3');
        expect(tracker.getHistory().map(r => r.runId)).toEqual(['r3', 'r2']);
        expect(tracker.getHistory(1).map(r => r.runId)).toEqual(['r3']);
    });
});
