/**
 * Sync Bridge - Scheduler
 * @module lib/sync-bridge/scheduler/sync-scheduler
 *
 * Periodically evaluates the sync trigger for each registered scope and runs
 * an incremental sync (and optionally a conflict pass) when one is due.
 */

import { getErrorCode, getErrorMessage } from '../../errors/types';
import { createLogger } from '../core/config';
import { scopeKey } from '../core/hashing';
import type { SyncResult, SyncScope } from '../core/types';
import type { ConflictPassResult, SyncOrchestrator } from '../orchestrator/sync-orchestrator';
import { evaluateTrigger } from '../trigger/trigger-evaluator';
import type { TriggerDecision } from '../trigger/trigger-evaluator';

const logger = createLogger('SyncBridge:Scheduler');

// ============================================================================
// TYPES
// ============================================================================

export interface SyncSchedulerConfig {
    /** How often triggers are evaluated */
    pollIntervalMs: number;
    runConflictPass: boolean;
    resolveConflicts: boolean;
    /** Compare the knowledge head with the last synced commit on each tick */
    checkKnowledgeHead: boolean;
    /** Sessions started since the last sync for a scope */
    sessionCount: (scope: SyncScope) => number;
}

export type TickOutcome =
    | { status: 'not_due'; decision: TriggerDecision }
    | { status: 'synced'; decision: TriggerDecision; result: SyncResult; conflicts: ConflictPassResult | null }
    | { status: 'skipped'; reason: 'lease_unavailable' | 'in_flight' | 'stopped' }
    | { status: 'error'; code: string; error: string };

const DEFAULT_CONFIG: SyncSchedulerConfig = {
    pollIntervalMs: 60_000,
    runConflictPass: false,
    resolveConflicts: false,
    checkKnowledgeHead: true,
    sessionCount: () => 0,
};

// ============================================================================
// SYNC SCHEDULER CLASS
// ============================================================================

export class SyncScheduler {
    private readonly config: SyncSchedulerConfig;
    private readonly scopes: Map<string, SyncScope> = new Map();
    private readonly lastScheduledRunAt: Map<string, number> = new Map();
    private readonly manualRequests: Set<string> = new Set();
    private readonly inFlight: Set<string> = new Set();
    private controller: AbortController = new AbortController();
    private timer: ReturnType<typeof setInterval> | null = null;

    constructor(
        private readonly orchestrator: SyncOrchestrator,
        config: Partial<SyncSchedulerConfig> = {},
        private readonly now: () => number = () => Date.now()
    ) {
        this.config = { ...DEFAULT_CONFIG, ...config };
    }

    addScope(scope: SyncScope): void {
        this.scopes.set(scopeKey(scope), scope);
    }

    removeScope(scope: SyncScope): void {
        const key = scopeKey(scope);
        this.scopes.delete(key);
        this.lastScheduledRunAt.delete(key);
        this.manualRequests.delete(key);
    }

    /**
     * Force a sync on the next tick for this scope.
     */
    requestSync(scope: SyncScope): void {
        const key = scopeKey(scope);
        this.addScope(scope);
        this.manualRequests.add(key);
    }

    isRunning(): boolean {
        return this.timer !== null;
    }

    start(): void {
        if (this.timer) return;

        if (this.controller.signal.aborted) {
            this.controller = new AbortController();
        }

        this.timer = setInterval(() => {
            this.tickAll().catch((error: unknown) => {
                logger.error('Scheduler tick failed', error);
            });
        }, this.config.pollIntervalMs);

        // Don't prevent process exit
        if (this.timer.unref) {
            this.timer.unref();
        }

        logger.info(`Scheduler started, polling every ${this.config.pollIntervalMs}ms`, {
            scopes: this.scopes.size,
        });
    }

    /**
     * Stop polling and cancel any in-flight run.
     */
    stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
        this.controller.abort();
        logger.info('Scheduler stopped');
    }

    async tickAll(): Promise<Map<string, TickOutcome>> {
        const outcomes = new Map<string, TickOutcome>();
        for (const [key, scope] of this.scopes) {
            outcomes.set(key, await this.tick(scope));
        }
        return outcomes;
    }

    /**
     * Evaluate and, when due, run one scope. Never throws.
     */
    async tick(scope: SyncScope): Promise<TickOutcome> {
        const key = scopeKey(scope);
        const signal = this.controller.signal;

        if (signal.aborted) {
            return { status: 'skipped', reason: 'stopped' };
        }
        if (this.inFlight.has(key)) {
            return { status: 'skipped', reason: 'in_flight' };
        }

        this.inFlight.add(key);
        try {
            const state = await this.orchestrator.getState(scope);
            const knowledgeHeadCommit = this.config.checkKnowledgeHead
                ? await this.orchestrator.getKnowledgeHead(scope, signal)
                : null;

            const decision = evaluateTrigger(this.orchestrator.config.triggers, state, {
                now: this.now(),
                manualRequested: this.manualRequests.has(key),
                sessionCount: this.config.sessionCount(scope),
                lastScheduledRunAt: this.lastScheduledRunAt.get(key) ?? null,
                knowledgeHeadCommit,
            });

            if (!decision.shouldSync) {
                return { status: 'not_due', decision };
            }

            logger.debug(`Sync due for ${key}`, { reason: decision.reason });
            this.lastScheduledRunAt.set(key, this.now());

            const result = await this.orchestrator.syncIncremental(scope, { abortSignal: signal });
            this.manualRequests.delete(key);

            const conflicts = this.config.runConflictPass
                ? await this.orchestrator.runConflictPass(scope, {
                    resolve: this.config.resolveConflicts,
                    abortSignal: signal,
                })
                : null;

            return { status: 'synced', decision, result, conflicts };
        } catch (error) {
            const code = getErrorCode(error);
            if (code === 'LEASE_UNAVAILABLE') {
                logger.debug(`Lease held elsewhere, skipping ${key}`);
                return { status: 'skipped', reason: 'lease_unavailable' };
            }
            if (code === 'ABORTED' && signal.aborted) {
                return { status: 'skipped', reason: 'stopped' };
            }
            logger.error(`Scheduled sync failed for ${key}`, error);
            return { status: 'error', code, error: getErrorMessage(error) };
        } finally {
            this.inFlight.delete(key);
        }
    }
}
