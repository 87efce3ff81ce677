/**
 * Sync Bridge - Core Types
 * @module lib/sync-bridge/core/types
 *
 * Data model shared by the reconciliation components and the narrow
 * interfaces of the knowledge repository and memory store collaborators.
 */

// ============================================================================
// ENUMERATIONS
// ============================================================================

export const KNOWLEDGE_LAYERS = ['company', 'org', 'team', 'project'] as const;
export type KnowledgeLayer = (typeof KNOWLEDGE_LAYERS)[number];

export const KNOWLEDGE_TYPES = ['adr', 'policy', 'pattern', 'spec'] as const;
export type KnowledgeType = (typeof KNOWLEDGE_TYPES)[number];

export const KNOWLEDGE_STATUSES = ['draft', 'proposed', 'accepted', 'deprecated', 'superseded'] as const;
export type KnowledgeStatus = (typeof KNOWLEDGE_STATUSES)[number];

export const CONSTRAINT_SEVERITIES = ['info', 'warn', 'block'] as const;
export type ConstraintSeverity = (typeof CONSTRAINT_SEVERITIES)[number];

export const CONSTRAINT_OPERATORS = [
    'mustUse',
    'mustNotUse',
    'mustMatch',
    'mustNotMatch',
    'mustExist',
    'mustNotExist',
] as const;
export type ConstraintOperator = (typeof CONSTRAINT_OPERATORS)[number];

export const CONSTRAINT_TARGETS = ['file', 'code', 'dependency', 'import', 'config'] as const;
export type ConstraintTarget = (typeof CONSTRAINT_TARGETS)[number];

/**
 * Memory layers that can hold pointers. Knowledge layers map onto the memory
 * layer of the same name.
 */
export type MemoryLayer = KnowledgeLayer;

// ============================================================================
// SCOPE
// ============================================================================

/**
 * The tenant and identifier set a sync run is bound to. One writer at a time
 * per scope.
 */
export interface SyncScope {
    tenantId: string;
    identifiers?: Record<string, string>;
}

// ============================================================================
// KNOWLEDGE REPOSITORY
// ============================================================================

export interface KnowledgeConstraint {
    operator: ConstraintOperator;
    pattern: string;
    target: ConstraintTarget;
    severity: ConstraintSeverity;
    message?: string;
}

/**
 * A single authoritative knowledge item as returned by `getItem`.
 */
export interface KnowledgeItem {
    id: string;
    title: string;
    summary: string;
    content: string;
    constraints: KnowledgeConstraint[];
    status: KnowledgeStatus;
    layer: KnowledgeLayer;
    type: KnowledgeType;
    contentHash: string;
}

export interface ManifestEntry {
    contentHash: string;
    layer: KnowledgeLayer;
    type: KnowledgeType;
}

/**
 * Immutable snapshot of the repository as of one commit.
 */
export interface KnowledgeManifest {
    commitId: string;
    items: Record<string, ManifestEntry>;
}

export interface KnowledgeCommit {
    commitId: string;
    affectedItemIds: string[];
}

export interface KnowledgeRepository {
    getManifest(scope: SyncScope): Promise<KnowledgeManifest>;
    /** Resolves to null when the item does not exist */
    getItem(scope: SyncScope, id: string): Promise<KnowledgeItem | null>;
    getCommitsSince(scope: SyncScope, commitId: string): Promise<KnowledgeCommit[]>;
}

// ============================================================================
// MEMORY STORE
// ============================================================================

/**
 * A memory record as the store hands it over. Metadata is untyped at this
 * boundary and validated by the pointer manager.
 */
export interface StoredMemoryRecord {
    id: string;
    content: string;
    layer: MemoryLayer;
    metadata: Record<string, unknown>;
    createdAt: number;
    updatedAt: number;
}

export interface MemoryRecordInput {
    id: string;
    content: string;
    metadata: Record<string, unknown>;
}

export interface MemoryRecordPatch {
    content?: string;
    metadata?: Record<string, unknown>;
}

export interface MemoryStore {
    add(scope: SyncScope, layer: MemoryLayer, record: MemoryRecordInput): Promise<string>;
    update(scope: SyncScope, layer: MemoryLayer, id: string, patch: MemoryRecordPatch): Promise<void>;
    get(scope: SyncScope, layer: MemoryLayer, id: string): Promise<StoredMemoryRecord | null>;
    /** Resolves to false when nothing was deleted */
    delete(scope: SyncScope, layer: MemoryLayer, id: string): Promise<boolean>;
}

// ============================================================================
// POINTERS
// ============================================================================

export const KNOWLEDGE_POINTER_TYPE = 'knowledge_pointer';

export interface KnowledgePointer {
    sourceType: KnowledgeType;
    sourceId: string;
    /** Hash of the source item at sync time */
    contentHash: string;
    syncedAt: number;
    sourceLayer: KnowledgeLayer;
    /** Status the generated content reflects */
    sourceStatus: KnowledgeStatus;
    isOrphaned: boolean;
}

export interface KnowledgePointerMetadata {
    type: typeof KNOWLEDGE_POINTER_TYPE;
    knowledgePointer: KnowledgePointer;
    tags: string[];
}

/**
 * Any memory record not owned by the sync bridge.
 */
export interface ForeignMemoryMetadata {
    type: 'foreign';
    kind: string;
    raw: Record<string, unknown>;
}

export type MemoryRecordMetadata = KnowledgePointerMetadata | ForeignMemoryMetadata;

export interface PointerMemory {
    id: string;
    content: string;
    layer: MemoryLayer;
    metadata: MemoryRecordMetadata;
    createdAt: number;
    updatedAt: number;
}

// ============================================================================
// SYNC STATE
// ============================================================================

export const SYNC_STATE_VERSION = '1.0';

export interface SyncFailure {
    knowledgeId: string;
    error: string;
    code: string;
    failedAt: number;
    retryCount: number;
}

export interface SyncStats {
    totalSyncs: number;
    totalItemsSynced: number;
    totalConflictsResolved: number;
    avgSyncDurationMs: number;
}

export interface SyncState {
    version: string;
    lastSyncAt: number | null;
    lastKnowledgeCommit: string | null;
    knowledgeHashes: Record<string, string>;
    pointerMapping: Record<string, string>;
    knowledgeLayers: Record<string, KnowledgeLayer>;
    failedItems: SyncFailure[];
    stats: SyncStats;
}

// ============================================================================
// DELTA
// ============================================================================

export interface DeltaResult {
    added: string[];
    updated: string[];
    deleted: string[];
    unchanged: string[];
}

// ============================================================================
// CONFLICTS
// ============================================================================

export type ConflictType =
    | 'hash_mismatch'
    | 'orphaned_pointer'
    | 'duplicate_pointer'
    | 'status_change'
    | 'layer_mismatch';

export type ResolutionAction =
    | 'update_memory'
    | 'delete_memory'
    | 'keep_memory'
    | 'merge'
    | 'manual';

interface ConflictBase {
    memoryId: string;
    knowledgeId: string;
    suggestedResolution: ResolutionAction;
}

export interface HashMismatchConflict extends ConflictBase {
    type: 'hash_mismatch';
    details: {
        reason: 'hash_changed' | 'content_drift' | 'invalid_metadata';
        storedHash: string | null;
        currentHash: string;
    };
}

export interface OrphanedPointerConflict extends ConflictBase {
    type: 'orphaned_pointer';
    details: {
        reason: 'knowledge_deleted' | 'memory_deleted';
    };
}

export interface DuplicatePointerConflict extends ConflictBase {
    type: 'duplicate_pointer';
    details: {
        memoryIds: string[];
        keepMemoryId: string;
    };
}

export interface StatusChangeConflict extends ConflictBase {
    type: 'status_change';
    details: {
        status: 'deprecated' | 'superseded';
        previousStatus: KnowledgeStatus | null;
    };
}

export interface LayerMismatchConflict extends ConflictBase {
    type: 'layer_mismatch';
    details: {
        expectedLayer: KnowledgeLayer;
        actualLayer: KnowledgeLayer;
    };
}

export type SyncConflict =
    | HashMismatchConflict
    | OrphanedPointerConflict
    | DuplicatePointerConflict
    | StatusChangeConflict
    | LayerMismatchConflict;

// ============================================================================
// RUN RESULTS
// ============================================================================

export type SyncMode = 'full' | 'incremental' | 'single_item';
export type RunMode = SyncMode | 'conflict_pass';

export interface SyncResult {
    runId: string;
    mode: SyncMode;
    success: boolean;
    added: number;
    updated: number;
    deleted: number;
    unchanged: number;
    failures: SyncFailure[];
    durationMs: number;
    commitId: string | null;
}
