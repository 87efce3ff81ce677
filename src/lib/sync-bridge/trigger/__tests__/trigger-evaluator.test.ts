/**
 * Trigger Evaluator Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { evaluateTrigger } from '../trigger-evaluator';
import type { TriggerConfig } from '../trigger-evaluator';
import { BASE_TIME } from '@/test/fixtures';

const config: TriggerConfig = {
    stalenessThresholdMs: 60_000,
    sessionThreshold: 5,
    scheduleIntervalMs: 30_000,
};

const freshState = { lastSyncAt: BASE_TIME, lastKnowledgeCommit: 'c1' };

describe('evaluateTrigger', () => {
    it('runs on a manual request before anything else', () => {
        expect(evaluateTrigger(config, { lastSyncAt: null, lastKnowledgeCommit: null }, {
            now: BASE_TIME,
            manualRequested: true,
        })).toEqual({ shouldSync: true, reason: 'manual' });
    });

    it('treats a scope that never synced as stale', () => {
        expect(evaluateTrigger(config, { lastSyncAt: null, lastKnowledgeCommit: null }, { now: BASE_TIME }))
            .toEqual({ shouldSync: true, reason: 'stale' });
    });

    it('fires at the staleness threshold', () => {
        expect(evaluateTrigger(config, freshState, { now: BASE_TIME + 60_000 }).reason).toBe('stale');
        expect(evaluateTrigger(config, freshState, { now: BASE_TIME + 29_999 }).reason).toBe('not_due');
    });

    it('fires once enough sessions started', () => {
        expect(evaluateTrigger(config, freshState, { now: BASE_TIME + 1, sessionCount: 5 }).reason)
            .toBe('session_threshold');
        expect(evaluateTrigger(config, freshState, { now: BASE_TIME + 1, sessionCount: 4 }).reason)
            .toBe('not_due');
    });

    it('fires on the schedule, measured from the last scheduled run', () => {
        expect(evaluateTrigger(config, freshState, { now: BASE_TIME + 30_000 }).reason).toBe('scheduled');
        expect(evaluateTrigger(config, freshState, {
            now: BASE_TIME + 30_000,
            lastScheduledRunAt: BASE_TIME + 10_000,
        }).reason).toBe('not_due');
    });

    it('fires when the knowledge head moved', () => {
        expect(evaluateTrigger(config, freshState, { now: BASE_TIME + 1, knowledgeHeadCommit: 'c2' }))
            .toEqual({ shouldSync: true, reason: 'commit_changed' });
        expect(evaluateTrigger(config, freshState, { now: BASE_TIME + 1, knowledgeHeadCommit: 'c1' }))
            .toEqual({ shouldSync: false, reason: 'not_due' });
    });

    it('reports the first matching reason', () => {
        const decision = evaluateTrigger(config, freshState, {
            now: BASE_TIME + 60_000,
            sessionCount: 10,
            knowledgeHeadCommit: 'c9',
        });

        expect(decision.reason).toBe('stale');
    });
});
