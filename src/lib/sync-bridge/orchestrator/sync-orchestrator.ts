/**
 * Sync Bridge - Sync Orchestrator
 * @module lib/sync-bridge/orchestrator/sync-orchestrator
 *
 * Runs full, incremental and single-item syncs plus conflict passes for a
 * scope. Each run holds the scope lease, checkpoints the persisted state,
 * works on a draft copy and persists it once at the end. A run-level failure
 * after the checkpoint restores it.
 */

import { randomUUID } from 'crypto';
import { RetryHandler } from '../../errors/retry';
import {
    LeaseLostError,
    LeaseUnavailableError,
    SyncAbortedError,
    getErrorCode,
    getErrorMessage,
    wrapError,
} from '../../errors/types';
import { createLogger, createSyncBridgeConfig } from '../core/config';
import type { SyncBridgeConfig, ConflictPolicyOverrides } from '../core/config';
import { pointerMemoryId, scopeKey } from '../core/hashing';
import type {
    DeltaResult,
    KnowledgeItem,
    KnowledgeRepository,
    MemoryStore,
    RunMode,
    SyncConflict,
    SyncFailure,
    SyncMode,
    SyncResult,
    SyncScope,
    SyncState,
} from '../core/types';
import { ConflictDetector } from '../conflict/conflict-detector';
import type { ConflictLookupError } from '../conflict/conflict-detector';
import { ConflictResolver } from '../conflict/conflict-resolver';
import type { ResolutionOutcome } from '../conflict/conflict-resolver';
import { applyForce, detectDelta, manifestHashes, restrictHashes, summarizeDelta } from '../delta/delta-detector';
import { SyncEventEmitter } from '../events/sync-events';
import { SYNC_METRICS, SyncMetrics } from '../metrics/sync-metrics';
import { PointerManager } from '../pointer/pointer-manager';
import { cloneSyncState } from '../state/state-store';
import type { StateStore } from '../state/state-store';
import { ManifestFetcher } from './manifest-fetcher';
import { InMemoryLeaseManager, LeaseKeeper, leaseKey } from './sync-lease';
import type { SyncLeaseManager } from './sync-lease';
import { SyncStatusTracker } from './sync-status';
import { runWithConcurrency } from './worker-pool';

const logger = createLogger('SyncBridge:Orchestrator');

// ============================================================================
// TYPES
// ============================================================================

export interface SyncOrchestratorDeps {
    knowledge: KnowledgeRepository;
    memory: MemoryStore;
    stateStore: StateStore;
    config?: SyncBridgeConfig;
    leases?: SyncLeaseManager;
    events?: SyncEventEmitter;
    metrics?: SyncMetrics;
    now?: () => number;
    /** Identifies this process in lease records */
    holderId?: string;
}

export interface SyncRunOptions {
    force?: boolean;
    abortSignal?: AbortSignal;
}

export interface ConflictPassOptions {
    resolve?: boolean;
    overrides?: ConflictPolicyOverrides;
    abortSignal?: AbortSignal;
}

export interface ConflictPassResult {
    runId: string;
    conflicts: SyncConflict[];
    errors: ConflictLookupError[];
    outcomes: ResolutionOutcome[];
    resolved: number;
    /** Outcomes that need a person: manual policy or a failed action */
    unresolved: ResolutionOutcome[];
    durationMs: number;
}

interface SyncPlan {
    delta: DeltaResult;
    commitId: string | null;
    /** Items already fetched while planning */
    prefetched: Map<string, KnowledgeItem | null>;
    touchesSyncTime: boolean;
}

type ItemOutcome =
    | { kind: 'added' | 'updated'; id: string; item: KnowledgeItem; memoryId: string; replacedMemoryIds: string[] }
    | { kind: 'deleted'; id: string }
    | { kind: 'skipped'; id: string }
    | { kind: 'failed'; id: string; error: Error };

interface RunContext {
    runId: string;
    mode: RunMode;
    scope: SyncScope;
    key: string;
    lease: LeaseKeeper;
    signal?: AbortSignal;
}

// ============================================================================
// HELPERS
// ============================================================================

function memoryIdsFor(state: SyncState, knowledgeId: string): string[] {
    return Object.entries(state.pointerMapping)
        .filter(([, id]) => id === knowledgeId)
        .map(([memoryId]) => memoryId)
        .sort();
}

function throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) {
        throw new SyncAbortedError('Sync run aborted');
    }
}

// ============================================================================
// SYNC ORCHESTRATOR CLASS
// ============================================================================

export class SyncOrchestrator {
    readonly config: SyncBridgeConfig;
    readonly events: SyncEventEmitter;
    readonly metrics: SyncMetrics;

    private readonly stateStore: StateStore;
    private readonly leases: SyncLeaseManager;
    private readonly fetcher: ManifestFetcher;
    private readonly pointers: PointerManager;
    private readonly detector: ConflictDetector;
    private readonly resolver: ConflictResolver;
    private readonly now: () => number;
    private readonly holderId: string;
    private trackers: Map<string, SyncStatusTracker> = new Map();

    constructor(deps: SyncOrchestratorDeps) {
        this.config = deps.config ?? createSyncBridgeConfig();
        this.now = deps.now ?? (() => Date.now());
        this.stateStore = deps.stateStore;
        this.leases = deps.leases ?? new InMemoryLeaseManager(this.now);
        this.events = deps.events ?? new SyncEventEmitter(this.now);
        this.metrics = deps.metrics ?? new SyncMetrics();
        this.holderId = deps.holderId ?? `sync-bridge-${randomUUID()}`;

        const retry = new RetryHandler(this.config.retry);
        this.fetcher = new ManifestFetcher(deps.knowledge, retry, this.config.callTimeoutMs);
        this.pointers = new PointerManager(deps.memory, retry, {
            callTimeoutMs: this.config.callTimeoutMs,
            content: this.config.pointer,
            now: this.now,
        });
        this.detector = new ConflictDetector(this.fetcher, this.pointers);
        this.resolver = new ConflictResolver(this.fetcher, this.pointers);
    }

    // ============================================================================
    // STATUS
    // ============================================================================

    getStatus(scope: SyncScope): SyncStatusTracker {
        const key = scopeKey(scope);
        let tracker = this.trackers.get(key);
        if (!tracker) {
            tracker = new SyncStatusTracker(100, this.now);
            this.trackers.set(key, tracker);
        }
        return tracker;
    }

    /**
     * Current persisted state of a scope.
     */
    getState(scope: SyncScope): Promise<SyncState> {
        return this.stateStore.load(scope);
    }

    /**
     * Head commit of the knowledge repository, for trigger evaluation.
     */
    async getKnowledgeHead(scope: SyncScope, abortSignal?: AbortSignal): Promise<string> {
        const manifest = await this.fetcher.getManifest(scope, { abortSignal });
        return manifest.commitId;
    }

    // ============================================================================
    // ENTRY POINTS
    // ============================================================================

    /**
     * Reconcile every knowledge item in the manifest.
     */
    syncFull(scope: SyncScope, options: SyncRunOptions = {}): Promise<SyncResult> {
        return this.runSync(scope, 'full', options, async (state, ctx) => {
            const manifest = await this.fetcher.getManifest(scope, { abortSignal: ctx.signal });
            const delta = detectDelta(manifestHashes(manifest), state.knowledgeHashes);
            return {
                delta: options.force ? applyForce(delta) : delta,
                commitId: manifest.commitId,
                prefetched: new Map(),
                touchesSyncTime: true,
            };
        });
    }

    /**
     * Reconcile only items touched since the last synced commit, plus every
     * previously failed item. Falls back to a full sync when no commit has
     * been synced yet.
     */
    async syncIncremental(scope: SyncScope, options: SyncRunOptions = {}): Promise<SyncResult> {
        const current = await this.stateStore.load(scope);
        const since = current.lastKnowledgeCommit;
        if (since === null) {
            logger.info('No synced commit yet, running full sync', { scopeKey: scopeKey(scope) });
            return this.syncFull(scope, options);
        }

        return this.runSync(scope, 'incremental', options, async (state, ctx) => {
            const manifest = await this.fetcher.getManifest(scope, { abortSignal: ctx.signal });
            const affected = new Set(await this.fetcher.getAffectedIds(
                scope,
                state.lastKnowledgeCommit ?? since,
                { abortSignal: ctx.signal }
            ));
            for (const failure of state.failedItems) {
                affected.add(failure.knowledgeId);
            }

            const delta = detectDelta(
                restrictHashes(manifestHashes(manifest), affected),
                restrictHashes(state.knowledgeHashes, affected)
            );
            return {
                delta: options.force ? applyForce(delta) : delta,
                commitId: manifest.commitId,
                prefetched: new Map(),
                touchesSyncTime: true,
            };
        });
    }

    /**
     * Reconcile a single knowledge item. Does not advance lastSyncAt or the
     * synced commit.
     */
    syncItem(scope: SyncScope, knowledgeId: string, options: SyncRunOptions = {}): Promise<SyncResult> {
        return this.runSync(scope, 'single_item', options, async (state, ctx) => {
            const item = await this.fetcher.getItem(scope, knowledgeId, { abortSignal: ctx.signal });
            const current: Record<string, string> = item ? { [knowledgeId]: item.contentHash } : {};
            const delta = detectDelta(current, restrictHashes(state.knowledgeHashes, [knowledgeId]));
            return {
                delta: options.force ? applyForce(delta) : delta,
                commitId: null,
                prefetched: new Map([[knowledgeId, item]]),
                touchesSyncTime: false,
            };
        });
    }

    /**
     * Detect conflicts over the persisted state and, when `resolve` is set,
     * apply the configured resolutions under the scope lease.
     */
    async runConflictPass(scope: SyncScope, options: ConflictPassOptions = {}): Promise<ConflictPassResult> {
        const runId = randomUUID();
        const key = scopeKey(scope);
        const startedAt = this.now();
        const signal = options.abortSignal;

        if (!options.resolve) {
            const snapshot = await this.stateStore.load(scope);
            const report = await this.detector.detect(scope, snapshot, { abortSignal: signal });
            await this.reportConflicts(key, report.conflicts);
            return {
                runId,
                conflicts: report.conflicts,
                errors: report.errors,
                outcomes: [],
                resolved: 0,
                unresolved: [],
                durationMs: this.now() - startedAt,
            };
        }

        return this.withLease(scope, async lease => {
            const tracker = this.getStatus(scope);
            const ctx: RunContext = { runId, mode: 'conflict_pass', scope, key, lease, signal };

            tracker.transition('checkpointing', 'conflict pass');
            const state = await this.loadAndCheckpoint(ctx, tracker);

            return this.guard(ctx, tracker, async () => {
                tracker.transition('detecting');
                const report = await this.detector.detect(scope, state, { abortSignal: signal });
                await this.reportConflicts(key, report.conflicts);
                throwIfAborted(signal);

                tracker.transition('applying');
                const draft = cloneSyncState(state);
                const outcomes = await this.resolver.resolveAll(scope, report.conflicts, draft, {
                    abortSignal: signal,
                    overrides: { ...this.config.conflictPolicy, ...options.overrides },
                });
                throwIfAborted(signal);

                const resolved = outcomes.filter(o => o.status === 'applied').length;
                draft.stats.totalConflictsResolved += resolved;

                tracker.transition('persisting');
                await this.persist(ctx, draft);
                tracker.transition('idle');

                this.metrics.increment(SYNC_METRICS.conflictsResolved, resolved);
                for (const outcome of outcomes) {
                    await this.events.emit('conflict.resolved', { scopeKey: key, outcome });
                }

                const unresolved = outcomes.filter(o => o.status === 'manual' || o.status === 'failed');
                logger.info('Conflict pass completed', {
                    runId,
                    scopeKey: key,
                    detected: report.conflicts.length,
                    resolved,
                    unresolved: unresolved.length,
                });

                return {
                    runId,
                    conflicts: report.conflicts,
                    errors: report.errors,
                    outcomes,
                    resolved,
                    unresolved,
                    durationMs: this.now() - startedAt,
                };
            });
        });
    }

    // ============================================================================
    // RUN PIPELINE
    // ============================================================================

    private runSync(
        scope: SyncScope,
        mode: SyncMode,
        options: SyncRunOptions,
        plan: (state: SyncState, ctx: RunContext) => Promise<SyncPlan>
    ): Promise<SyncResult> {
        return this.withLease(scope, async lease => {
            const ctx: RunContext = {
                runId: randomUUID(),
                mode,
                scope,
                key: scopeKey(scope),
                lease,
                signal: options.abortSignal,
            };
            const tracker = this.getStatus(scope);
            const startedAt = this.now();

            this.metrics.increment(SYNC_METRICS.runsTotal);
            await this.events.emit('sync.started', { runId: ctx.runId, mode, scopeKey: ctx.key });
            logger.info('Sync run started', { runId: ctx.runId, mode, scopeKey: ctx.key });

            tracker.transition('checkpointing');
            const state = await this.loadAndCheckpoint(ctx, tracker);

            return this.guard(ctx, tracker, async () => {
                throwIfAborted(ctx.signal);

                tracker.transition('detecting');
                const syncPlan = await plan(state, ctx);
                logger.debug('Delta planned', { runId: ctx.runId, ...summarizeDelta(syncPlan.delta) });

                tracker.transition('applying');
                const outcomes = await this.applyDelta(ctx, state, syncPlan);
                throwIfAborted(ctx.signal);

                const draft = cloneSyncState(state);
                const result = this.fold(ctx, mode, draft, syncPlan, outcomes, startedAt);

                tracker.transition('persisting');
                await this.persist(ctx, draft);
                tracker.transition('idle');

                this.metrics.increment(SYNC_METRICS.itemsSynced, result.added + result.updated + result.deleted);
                this.metrics.increment(SYNC_METRICS.itemsFailed, result.failures.length);
                this.metrics.observe(SYNC_METRICS.runDurationMs, result.durationMs);
                tracker.recordResult(result);

                for (const failure of result.failures) {
                    await this.events.emit('sync.item_failed', { runId: ctx.runId, scopeKey: ctx.key, failure });
                }
                await this.events.emit('sync.completed', { scopeKey: ctx.key, result });

                logger.info('Sync run completed', {
                    runId: result.runId,
                    mode,
                    scopeKey: ctx.key,
                    added: result.added,
                    updated: result.updated,
                    deleted: result.deleted,
                    unchanged: result.unchanged,
                    failed: result.failures.length,
                    durationMs: result.durationMs,
                });

                return result;
            });
        });
    }

    /**
     * Hold the scope lease for the length of `body`, renewing it in the
     * background.
     */
    private async withLease<T>(scope: SyncScope, body: (lease: LeaseKeeper) => Promise<T>): Promise<T> {
        const key = leaseKey(scope);
        const lease = await this.leases.acquire(key, this.holderId, this.config.leaseTtlMs);

        if (!lease) {
            this.metrics.increment(SYNC_METRICS.leaseSkipped);
            throw new LeaseUnavailableError(key);
        }

        const keeper = new LeaseKeeper(this.leases, lease, this.config.leaseTtlMs);
        keeper.start();
        try {
            return await body(keeper);
        } finally {
            await keeper.stop();
            await this.leases.release(keeper.current);
        }
    }

    /**
     * Save the draft if the lease is still ours, then drop the checkpoint.
     * A failed discard is logged only.
     */
    private async persist(ctx: RunContext, draft: SyncState): Promise<void> {
        await ctx.lease.assertHeld();
        await this.stateStore.save(ctx.scope, draft);

        try {
            await this.stateStore.discardCheckpoint(ctx.scope);
        } catch (error) {
            logger.warn('Failed to discard checkpoint', {
                runId: ctx.runId,
                scopeKey: ctx.key,
                error: getErrorMessage(error),
            });
        }
    }

    /**
     * Load the persisted state and checkpoint it. Nothing has changed yet if
     * either step fails, so no rollback is attempted.
     */
    private async loadAndCheckpoint(ctx: RunContext, tracker: SyncStatusTracker): Promise<SyncState> {
        try {
            const state = await this.stateStore.load(ctx.scope);
            await this.stateStore.checkpoint(ctx.scope);
            return state;
        } catch (error) {
            tracker.transition('failed', getErrorCode(error));
            tracker.transition('idle');
            await this.recordRunFailure(ctx, error);
            throw wrapError(error, { runId: ctx.runId });
        }
    }

    /**
     * Run the post-checkpoint phases; on any error restore the checkpoint and
     * rethrow. A failed rollback surfaces as ROLLBACK_FAILED instead.
     */
    private async guard<T>(ctx: RunContext, tracker: SyncStatusTracker, body: () => Promise<T>): Promise<T> {
        try {
            return await body();
        } catch (error) {
            const failure = wrapError(error, { runId: ctx.runId });
            if (tracker.getState() !== 'failed') {
                tracker.transition('failed', failure.code);
            }
            await this.recordRunFailure(ctx, failure);

            if (failure instanceof LeaseLostError) {
                // The new holder owns the persisted state and its checkpoint
                tracker.transition('idle', 'lease lost');
                throw failure;
            }

            try {
                await this.stateStore.rollback(ctx.scope, failure);
            } catch (rollbackError) {
                tracker.transition('idle', 'rollback failed');
                logger.error('Rollback failed', rollbackError);
                throw wrapError(rollbackError, { runId: ctx.runId });
            }

            tracker.transition('rolled_back', failure.code);
            tracker.transition('idle');
            this.metrics.increment(SYNC_METRICS.rollbacksTotal);
            await this.events.emit('sync.rolled_back', { runId: ctx.runId, scopeKey: ctx.key, code: failure.code });

            throw failure;
        }
    }

    private async recordRunFailure(ctx: RunContext, error: unknown): Promise<void> {
        this.metrics.increment(SYNC_METRICS.runsFailed);
        logger.error('Sync run failed', {
            runId: ctx.runId,
            mode: ctx.mode,
            scopeKey: ctx.key,
            code: getErrorCode(error),
            error: getErrorMessage(error),
        });
        await this.events.emit('sync.failed', {
            runId: ctx.runId,
            mode: ctx.mode,
            scopeKey: ctx.key,
            code: getErrorCode(error),
            error: getErrorMessage(error),
        });
    }

    // ============================================================================
    // APPLY
    // ============================================================================

    private applyDelta(ctx: RunContext, state: SyncState, plan: SyncPlan): Promise<ItemOutcome[]> {
        const work: Array<{ id: string; kind: 'added' | 'updated' | 'deleted' }> = [
            ...plan.delta.added.map(id => ({ id, kind: 'added' as const })),
            ...plan.delta.updated.map(id => ({ id, kind: 'updated' as const })),
            ...plan.delta.deleted.map(id => ({ id, kind: 'deleted' as const })),
        ].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

        return runWithConcurrency(
            work,
            this.config.concurrency,
            async ({ id, kind }) => {
                try {
                    return kind === 'deleted'
                        ? await this.applyDeletion(ctx, state, id)
                        : await this.applyUpsert(ctx, state, plan, id, kind);
                } catch (error) {
                    if (getErrorCode(error) === 'ABORTED') {
                        throw error;
                    }
                    const failure = error instanceof Error ? error : new Error(String(error));
                    logger.warn(`Item failed: ${id}`, {
                        runId: ctx.runId,
                        knowledgeId: id,
                        code: getErrorCode(error),
                        error: failure.message,
                    });
                    const outcome: ItemOutcome = { kind: 'failed', id, error: failure };
                    return outcome;
                }
            },
            ctx.signal
        );
    }

    private async applyUpsert(
        ctx: RunContext,
        state: SyncState,
        plan: SyncPlan,
        id: string,
        kind: 'added' | 'updated'
    ): Promise<ItemOutcome> {
        const options = { abortSignal: ctx.signal };
        const item = plan.prefetched.has(id)
            ? plan.prefetched.get(id) ?? null
            : await this.fetcher.getItem(ctx.scope, id, options);

        if (!item) {
            // Removed between manifest and fetch
            return state.knowledgeHashes[id] !== undefined
                ? this.applyDeletion(ctx, state, id)
                : { kind: 'skipped', id };
        }

        const mapped = memoryIdsFor(state, id);
        const targetId = pointerMemoryId(id);
        const previousLayer = state.knowledgeLayers[id];

        if (mapped.includes(targetId)) {
            await this.pointers.update(ctx.scope, targetId, item, { ...options, previousLayer });
            return { kind, id, item, memoryId: targetId, replacedMemoryIds: [] };
        }

        const memoryId = await this.pointers.create(ctx.scope, item, options);
        return {
            kind,
            id,
            item,
            memoryId,
            replacedMemoryIds: mapped.filter(m => m !== memoryId),
        };
    }

    private async applyDeletion(ctx: RunContext, state: SyncState, id: string): Promise<ItemOutcome> {
        const layer = state.knowledgeLayers[id];
        if (layer) {
            for (const memoryId of memoryIdsFor(state, id)) {
                await this.pointers.markOrphaned(ctx.scope, memoryId, layer, { abortSignal: ctx.signal });
            }
        }
        return { kind: 'deleted', id };
    }

    // ============================================================================
    // FOLD
    // ============================================================================

    /**
     * Fold worker outcomes into the draft in id order and build the result.
     */
    private fold(
        ctx: RunContext,
        mode: SyncMode,
        draft: SyncState,
        plan: SyncPlan,
        outcomes: ItemOutcome[],
        startedAt: number
    ): SyncResult {
        const now = this.now();
        const failures: SyncFailure[] = [];
        let added = 0;
        let updated = 0;
        let deleted = 0;

        const clearFailure = (id: string): void => {
            draft.failedItems = draft.failedItems.filter(f => f.knowledgeId !== id);
        };

        for (const outcome of outcomes) {
            switch (outcome.kind) {
                case 'added':
                case 'updated': {
                    for (const stale of outcome.replacedMemoryIds) {
                        delete draft.pointerMapping[stale];
                    }
                    draft.pointerMapping[outcome.memoryId] = outcome.id;
                    draft.knowledgeHashes[outcome.id] = outcome.item.contentHash;
                    draft.knowledgeLayers[outcome.id] = outcome.item.layer;
                    clearFailure(outcome.id);
                    if (outcome.kind === 'added') added++;
                    else updated++;
                    break;
                }
                case 'deleted':
                    // Mapping and layer stay as tombstones for the conflict pass
                    delete draft.knowledgeHashes[outcome.id];
                    clearFailure(outcome.id);
                    deleted++;
                    break;
                case 'skipped':
                    clearFailure(outcome.id);
                    break;
                case 'failed': {
                    const previous = draft.failedItems.find(f => f.knowledgeId === outcome.id);
                    const failure: SyncFailure = {
                        knowledgeId: outcome.id,
                        error: outcome.error.message,
                        code: getErrorCode(outcome.error),
                        failedAt: now,
                        retryCount: previous ? previous.retryCount + 1 : 0,
                    };
                    draft.failedItems = [
                        ...draft.failedItems.filter(f => f.knowledgeId !== outcome.id),
                        failure,
                    ];
                    failures.push(failure);
                    break;
                }
            }
        }

        const retentionCutoff = now - this.config.failedItemRetentionMs;
        draft.failedItems = draft.failedItems
            .filter(f => f.failedAt >= retentionCutoff)
            .sort((a, b) => (a.knowledgeId < b.knowledgeId ? -1 : a.knowledgeId > b.knowledgeId ? 1 : 0));

        const durationMs = now - startedAt;
        const stats = draft.stats;
        stats.totalSyncs += 1;
        stats.totalItemsSynced += added + updated + deleted;
        stats.avgSyncDurationMs = stats.avgSyncDurationMs + (durationMs - stats.avgSyncDurationMs) / stats.totalSyncs;

        if (plan.touchesSyncTime) {
            draft.lastSyncAt = now;
            if (plan.commitId !== null) {
                draft.lastKnowledgeCommit = plan.commitId;
            }
        }

        return {
            runId: ctx.runId,
            mode,
            success: failures.length === 0,
            added,
            updated,
            deleted,
            unchanged: plan.delta.unchanged.length,
            failures,
            durationMs,
            commitId: plan.commitId,
        };
    }

    // ============================================================================
    // CONFLICT REPORTING
    // ============================================================================

    private async reportConflicts(key: string, conflicts: SyncConflict[]): Promise<void> {
        this.metrics.increment(SYNC_METRICS.conflictsDetected, conflicts.length);
        for (const conflict of conflicts) {
            await this.events.emit('conflict.detected', { scopeKey: key, conflict });
        }
    }
}

export function createSyncOrchestrator(deps: SyncOrchestratorDeps): SyncOrchestrator {
    return new SyncOrchestrator(deps);
}
