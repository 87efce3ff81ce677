/**
 * Sync Bridge
 * @module lib/sync-bridge
 *
 * Keeps agent-facing pointer memories consistent with the authoritative
 * knowledge repository.
 */

// Core
export * from './core/types';
export {
    createLogger,
    createSyncBridgeConfig,
    readEnvOverrides,
    getLogLevel,
    syncBridgeConfigSchema,
    DEFAULT_SYNC_BRIDGE_CONFIG,
    PERSISTENCE_CONFIG,
} from './core/config';
export type {
    Logger,
    LogLevel,
    SyncBridgeConfig,
    SyncBridgeConfigOverrides,
    ConflictPolicyOverrides,
} from './core/config';
export { computeKnowledgeHash, scopeKey, pointerMemoryId } from './core/hashing';
export { validateSyncState, parseMemoryMetadata, syncStateSchema } from './core/schemas';

// Delta
export {
    detectDelta,
    applyForce,
    summarizeDelta,
    hasChanges,
    manifestHashes,
    restrictHashes,
} from './delta/delta-detector';
export type { DeltaSummary, HashMap } from './delta/delta-detector';

// Pointers
export { generatePointerContent, formatConstraint, knowledgeReference } from './pointer/pointer-content';
export type { PointerContentOptions } from './pointer/pointer-content';
export { PointerManager, buildPointerMetadata } from './pointer/pointer-manager';
export type { PointerReadResult, PointerManagerConfig } from './pointer/pointer-manager';

// Conflicts
export { ConflictDetector } from './conflict/conflict-detector';
export type { ConflictReport, ConflictLookupError } from './conflict/conflict-detector';
export { ConflictResolver, resolveAction, DEFAULT_RESOLUTION_POLICY } from './conflict/conflict-resolver';
export type { ResolutionOutcome, ResolutionStatus } from './conflict/conflict-resolver';

// Triggers
export { evaluateTrigger } from './trigger/trigger-evaluator';
export type { TriggerContext, TriggerDecision, TriggerReason } from './trigger/trigger-evaluator';

// State
export {
    FileStateStore,
    InMemoryStateStore,
    BaseStateStore,
    createEmptySyncState,
    cloneSyncState,
    parseSyncState,
    serializeSyncState,
} from './state/state-store';
export type { StateStore } from './state/state-store';

// Orchestration
export { SyncOrchestrator, createSyncOrchestrator } from './orchestrator/sync-orchestrator';
export type {
    SyncOrchestratorDeps,
    SyncRunOptions,
    ConflictPassOptions,
    ConflictPassResult,
} from './orchestrator/sync-orchestrator';
export { ManifestFetcher } from './orchestrator/manifest-fetcher';
export { InMemoryLeaseManager, LeaseKeeper, leaseKey } from './orchestrator/sync-lease';
export type { SyncLease, SyncLeaseManager } from './orchestrator/sync-lease';
export { SyncStatusTracker, SYNC_TRANSITIONS } from './orchestrator/sync-status';
export type { SyncRunState, StateChangeEvent } from './orchestrator/sync-status';
export { runWithConcurrency } from './orchestrator/worker-pool';

// Scheduling, events, metrics
export { SyncScheduler } from './scheduler/sync-scheduler';
export type { SyncSchedulerConfig, TickOutcome } from './scheduler/sync-scheduler';
export { SyncEventEmitter, SYNC_EVENT_TYPES } from './events/sync-events';
export type { SyncEvent, SyncEventType, SyncEventPayloads, SyncEventHandler } from './events/sync-events';
export { SyncMetrics, SYNC_METRICS } from './metrics/sync-metrics';
export type { MetricsSnapshot, HistogramSnapshot } from './metrics/sync-metrics';

// Errors
export * from '../errors/types';
export { RetryHandler, createRetryHandler, DEFAULT_RETRY_CONFIG } from '../errors/retry';
export type { RetryConfig, RetryOptions } from '../errors/retry';
