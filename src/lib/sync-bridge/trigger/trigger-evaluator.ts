/**
 * Sync Bridge - Trigger Evaluator
 * @module lib/sync-bridge/trigger/trigger-evaluator
 *
 * Decides whether a sync should run now. Checks run in a fixed order and the
 * first match wins.
 */

import type { SyncBridgeConfig } from '../core/config';
import type { SyncState } from '../core/types';

export type TriggerReason =
    | 'manual'
    | 'stale'
    | 'session_threshold'
    | 'scheduled'
    | 'commit_changed'
    | 'not_due';

export interface TriggerContext {
    now: number;
    manualRequested?: boolean;
    /** Sessions started since the last sync */
    sessionCount?: number;
    /** Last time the scheduler fired; falls back to lastSyncAt */
    lastScheduledRunAt?: number | null;
    /** Current knowledge repository head, when known */
    knowledgeHeadCommit?: string | null;
}

export interface TriggerDecision {
    shouldSync: boolean;
    reason: TriggerReason;
}

export type TriggerConfig = SyncBridgeConfig['triggers'];

function due(reason: TriggerReason): TriggerDecision {
    return { shouldSync: true, reason };
}

export function evaluateTrigger(
    config: TriggerConfig,
    state: Pick<SyncState, 'lastSyncAt' | 'lastKnowledgeCommit'>,
    context: TriggerContext
): TriggerDecision {
    if (context.manualRequested) {
        return due('manual');
    }

    // Never synced counts as stale
    if (state.lastSyncAt === null || context.now - state.lastSyncAt >= config.stalenessThresholdMs) {
        return due('stale');
    }

    if ((context.sessionCount ?? 0) >= config.sessionThreshold) {
        return due('session_threshold');
    }

    const lastScheduled = context.lastScheduledRunAt ?? state.lastSyncAt;
    if (context.now - lastScheduled >= config.scheduleIntervalMs) {
        return due('scheduled');
    }

    if (context.knowledgeHeadCommit && context.knowledgeHeadCommit !== state.lastKnowledgeCommit) {
        return due('commit_changed');
    }

    return { shouldSync: false, reason: 'not_due' };
}
