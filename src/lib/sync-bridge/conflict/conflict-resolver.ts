/**
 * Sync Bridge - Conflict Resolver
 * @module lib/sync-bridge/conflict/conflict-resolver
 *
 * Maps conflicts to resolution actions and applies them against a draft
 * SyncState. Every action re-checks its triggering condition first, so
 * applying the same conflict twice is a no-op the second time.
 */

import { ConflictUnresolvedError, getErrorCode, getErrorMessage } from '../../errors/types';
import { createLogger } from '../core/config';
import type { ConflictPolicyOverrides } from '../core/config';
import type {
    ConflictType,
    KnowledgeItem,
    KnowledgeLayer,
    ResolutionAction,
    SyncConflict,
    SyncScope,
    SyncState,
} from '../core/types';
import type { ManifestFetcher } from '../orchestrator/manifest-fetcher';
import type { PointerManager } from '../pointer/pointer-manager';

const logger = createLogger('SyncBridge:Resolver');

// ============================================================================
// POLICY
// ============================================================================

export const DEFAULT_RESOLUTION_POLICY: Readonly<Record<ConflictType, ResolutionAction>> = {
    hash_mismatch: 'update_memory',
    orphaned_pointer: 'delete_memory',
    duplicate_pointer: 'delete_memory',
    status_change: 'update_memory',
    layer_mismatch: 'update_memory',
};

/**
 * Pick the action for a conflict. Per-type overrides win over the default
 * policy.
 */
export function resolveAction(conflict: SyncConflict, overrides: ConflictPolicyOverrides = {}): ResolutionAction {
    return overrides[conflict.type] ?? DEFAULT_RESOLUTION_POLICY[conflict.type];
}

// ============================================================================
// TYPES
// ============================================================================

export type ResolutionStatus = 'applied' | 'skipped' | 'manual' | 'failed';

export interface ResolutionOutcome {
    conflict: SyncConflict;
    action: ResolutionAction;
    status: ResolutionStatus;
    /** Why an action was skipped */
    reason?: string;
    error?: { code: string; message: string };
}

export interface ResolveOptions {
    abortSignal?: AbortSignal;
    overrides?: ConflictPolicyOverrides;
}

// ============================================================================
// DRAFT STATE HELPERS
// ============================================================================

function dropMapping(draft: SyncState, memoryId: string): void {
    delete draft.pointerMapping[memoryId];
}

function isStillMapped(draft: SyncState, memoryId: string, knowledgeId: string): boolean {
    return draft.pointerMapping[memoryId] === knowledgeId;
}

/**
 * Forget a knowledge id entirely once no pointer maps to it any more.
 */
function forgetKnowledgeIfUnmapped(draft: SyncState, knowledgeId: string): void {
    const stillMapped = Object.values(draft.pointerMapping).includes(knowledgeId);
    if (!stillMapped) {
        delete draft.knowledgeHashes[knowledgeId];
        delete draft.knowledgeLayers[knowledgeId];
    }
}

function recordSynced(draft: SyncState, item: KnowledgeItem, memoryId: string): void {
    draft.pointerMapping[memoryId] = item.id;
    draft.knowledgeHashes[item.id] = item.contentHash;
    draft.knowledgeLayers[item.id] = item.layer;
}

// ============================================================================
// CONFLICT RESOLVER CLASS
// ============================================================================

export class ConflictResolver {
    constructor(
        private readonly fetcher: ManifestFetcher,
        private readonly pointers: PointerManager
    ) {}

    /**
     * Apply resolutions in order, folding their effects into `draft`.
     * Per-conflict failures are reported, not thrown; aborts are rethrown.
     */
    async resolveAll(
        scope: SyncScope,
        conflicts: SyncConflict[],
        draft: SyncState,
        options: ResolveOptions = {}
    ): Promise<ResolutionOutcome[]> {
        const outcomes: ResolutionOutcome[] = [];

        for (const conflict of conflicts) {
            outcomes.push(await this.resolve(scope, conflict, draft, options));
        }

        return outcomes;
    }

    async resolve(
        scope: SyncScope,
        conflict: SyncConflict,
        draft: SyncState,
        options: ResolveOptions = {}
    ): Promise<ResolutionOutcome> {
        const action = resolveAction(conflict, options.overrides);

        if (action === 'manual') {
            const error = new ConflictUnresolvedError(conflict.type, conflict.memoryId, conflict.knowledgeId);
            logger.warn(error.message);
            return {
                conflict,
                action,
                status: 'manual',
                error: { code: error.code, message: error.message },
            };
        }

        try {
            const skipReason = await this.apply(scope, conflict, action, draft, options);
            if (skipReason) {
                return { conflict, action, status: 'skipped', reason: skipReason };
            }
            logger.info(`Resolved ${conflict.type} on ${conflict.memoryId}`, { action });
            return { conflict, action, status: 'applied' };
        } catch (error) {
            if (getErrorCode(error) === 'ABORTED') {
                throw error;
            }
            logger.error(`Failed to resolve ${conflict.type} on ${conflict.memoryId}`, error);
            return {
                conflict,
                action,
                status: 'failed',
                error: { code: getErrorCode(error), message: getErrorMessage(error) },
            };
        }
    }

    /**
     * Returns a skip reason, or null when the action took effect.
     */
    private async apply(
        scope: SyncScope,
        conflict: SyncConflict,
        action: Exclude<ResolutionAction, 'manual'>,
        draft: SyncState,
        options: ResolveOptions
    ): Promise<string | null> {
        const { memoryId, knowledgeId } = conflict;

        if (!isStillMapped(draft, memoryId, knowledgeId)) {
            return 'mapping already changed';
        }

        if (action === 'keep_memory') {
            return 'kept by policy';
        }

        switch (conflict.type) {
            case 'orphaned_pointer':
                return conflict.details.reason === 'knowledge_deleted'
                    ? this.resolveDeletedKnowledge(scope, conflict, action, draft, options)
                    : this.resolveDeletedMemory(scope, conflict, draft, options);

            case 'duplicate_pointer': {
                const layer = draft.knowledgeLayers[knowledgeId];
                if (!layer) {
                    dropMapping(draft, memoryId);
                    return null;
                }
                if (action === 'merge') {
                    await this.pointers.markOrphaned(scope, memoryId, layer, options);
                } else if (action === 'delete_memory') {
                    await this.pointers.remove(scope, memoryId, layer, options);
                } else {
                    return 'duplicate pointers are not refreshed';
                }
                dropMapping(draft, memoryId);
                return null;
            }

            case 'hash_mismatch':
            case 'status_change':
            case 'layer_mismatch':
                return this.resolveStalePointer(scope, conflict, action, draft, options);
        }
    }

    private async resolveDeletedKnowledge(
        scope: SyncScope,
        conflict: SyncConflict,
        action: Exclude<ResolutionAction, 'manual' | 'keep_memory'>,
        draft: SyncState,
        options: ResolveOptions
    ): Promise<string | null> {
        const { memoryId, knowledgeId } = conflict;

        const item = await this.fetcher.getItem(scope, knowledgeId, options);
        if (item) {
            return 'knowledge item exists again';
        }
        if (action !== 'delete_memory') {
            return 'nothing to refresh from';
        }

        const layer = draft.knowledgeLayers[knowledgeId];
        if (layer) {
            await this.pointers.remove(scope, memoryId, layer, options);
        }
        dropMapping(draft, memoryId);
        forgetKnowledgeIfUnmapped(draft, knowledgeId);
        return null;
    }

    private async resolveDeletedMemory(
        scope: SyncScope,
        conflict: SyncConflict,
        draft: SyncState,
        options: ResolveOptions
    ): Promise<string | null> {
        const { memoryId, knowledgeId } = conflict;
        const layer = draft.knowledgeLayers[knowledgeId];

        if (layer) {
            const current = await this.pointers.read(scope, memoryId, layer, options);
            if (current.status !== 'missing') {
                return 'memory record exists again';
            }
        }

        // The record is already gone: recreate it, or forget the pair once the item is gone too
        const item = await this.fetcher.getItem(scope, knowledgeId, options);
        if (!item) {
            dropMapping(draft, memoryId);
            forgetKnowledgeIfUnmapped(draft, knowledgeId);
            return null;
        }
        const createdId = await this.pointers.create(scope, item, options);
        if (createdId !== memoryId) {
            dropMapping(draft, memoryId);
        }
        recordSynced(draft, item, createdId);
        return null;
    }

    private async resolveStalePointer(
        scope: SyncScope,
        conflict: SyncConflict,
        action: Exclude<ResolutionAction, 'manual' | 'keep_memory'>,
        draft: SyncState,
        options: ResolveOptions
    ): Promise<string | null> {
        const { memoryId, knowledgeId } = conflict;

        const item = await this.fetcher.getItem(scope, knowledgeId, options);
        if (!item) {
            return 'knowledge item no longer exists';
        }

        const layer: KnowledgeLayer = draft.knowledgeLayers[knowledgeId] ?? item.layer;

        if (action === 'delete_memory') {
            await this.pointers.remove(scope, memoryId, layer, options);
            dropMapping(draft, memoryId);
            forgetKnowledgeIfUnmapped(draft, knowledgeId);
            return null;
        }

        if (await this.isCurrent(scope, memoryId, layer, item, options)) {
            recordSynced(draft, item, memoryId);
            return 'pointer already current';
        }

        await this.pointers.update(scope, memoryId, item, { ...options, previousLayer: layer });
        recordSynced(draft, item, memoryId);
        return null;
    }

    private async isCurrent(
        scope: SyncScope,
        memoryId: string,
        layer: KnowledgeLayer,
        item: KnowledgeItem,
        options: ResolveOptions
    ): Promise<boolean> {
        if (layer !== item.layer) {
            return false;
        }
        const read = await this.pointers.read(scope, memoryId, layer, options);
        if (read.status !== 'pointer') {
            return false;
        }
        const pointer = read.metadata.knowledgePointer;
        return pointer.contentHash === item.contentHash
            && pointer.sourceStatus === item.status
            && !pointer.isOrphaned
            && read.record.content === this.pointers.renderContent(item);
    }
}
