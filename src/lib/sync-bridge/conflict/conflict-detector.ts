/**
 * Sync Bridge - Conflict Detector
 * @module lib/sync-bridge/conflict/conflict-detector
 *
 * Classifies inconsistencies between the pointer mapping, the memory store
 * and the knowledge repository. Read-only: nothing is mutated here.
 */

import { getErrorCode, getErrorMessage } from '../../errors/types';
import { createLogger } from '../core/config';
import type {
    KnowledgeItem,
    KnowledgeLayer,
    SyncConflict,
    SyncScope,
    SyncState,
} from '../core/types';
import type { ManifestFetcher } from '../orchestrator/manifest-fetcher';
import type { PointerManager, PointerReadResult } from '../pointer/pointer-manager';

const logger = createLogger('SyncBridge:Conflicts');

// ============================================================================
// TYPES
// ============================================================================

export interface ConflictLookupError {
    knowledgeId: string;
    memoryId: string | null;
    code: string;
    error: string;
}

export interface ConflictReport {
    conflicts: SyncConflict[];
    errors: ConflictLookupError[];
    scannedPairs: number;
}

export interface DetectOptions {
    abortSignal?: AbortSignal;
}

export interface PresentPointer {
    memoryId: string;
    read: Exclude<PointerReadResult, { status: 'missing' }>;
}

type TerminalStatus = 'deprecated' | 'superseded';

export function isTerminalStatus(status: string): status is TerminalStatus {
    return status === 'deprecated' || status === 'superseded';
}

// ============================================================================
// TIE-BREAK
// ============================================================================

function syncedAtOf(pointer: PresentPointer): number {
    return pointer.read.status === 'pointer'
        ? pointer.read.metadata.knowledgePointer.syncedAt
        : Number.NEGATIVE_INFINITY;
}

/**
 * Order duplicates so the one to keep comes first: most recent syncedAt,
 * then most recent record update, then smallest memory id.
 */
export function compareDuplicates(a: PresentPointer, b: PresentPointer): number {
    const syncedDiff = syncedAtOf(b) - syncedAtOf(a);
    if (syncedDiff !== 0 && !Number.isNaN(syncedDiff)) return syncedDiff;

    const updatedDiff = b.read.record.updatedAt - a.read.record.updatedAt;
    if (updatedDiff !== 0) return updatedDiff;

    return a.memoryId < b.memoryId ? -1 : a.memoryId > b.memoryId ? 1 : 0;
}

// ============================================================================
// CONFLICT DETECTOR CLASS
// ============================================================================

export class ConflictDetector {
    constructor(
        private readonly fetcher: ManifestFetcher,
        private readonly pointers: PointerManager
    ) {}

    /**
     * Scan every (memoryId, knowledgeId) pair of the given state.
     */
    async detect(scope: SyncScope, state: Readonly<SyncState>, options: DetectOptions = {}): Promise<ConflictReport> {
        const conflicts: SyncConflict[] = [];
        const errors: ConflictLookupError[] = [];

        const byKnowledge = new Map<string, string[]>();
        const entries = Object.entries(state.pointerMapping);
        for (const [memoryId, knowledgeId] of entries) {
            const group = byKnowledge.get(knowledgeId) ?? [];
            group.push(memoryId);
            byKnowledge.set(knowledgeId, group);
        }

        const knowledgeIds = [...byKnowledge.keys()].sort();

        for (const knowledgeId of knowledgeIds) {
            const memoryIds = (byKnowledge.get(knowledgeId) ?? []).sort();

            let item: KnowledgeItem | null;
            try {
                item = await this.fetcher.getItem(scope, knowledgeId, options);
            } catch (error) {
                errors.push({
                    knowledgeId,
                    memoryId: null,
                    code: getErrorCode(error),
                    error: getErrorMessage(error),
                });
                continue;
            }

            if (!item) {
                for (const memoryId of memoryIds) {
                    conflicts.push({
                        type: 'orphaned_pointer',
                        memoryId,
                        knowledgeId,
                        details: { reason: 'knowledge_deleted' },
                        suggestedResolution: 'delete_memory',
                    });
                }
                continue;
            }

            const layer: KnowledgeLayer = state.knowledgeLayers[knowledgeId] ?? item.layer;
            const present: PresentPointer[] = [];

            for (const memoryId of memoryIds) {
                let read: PointerReadResult;
                try {
                    read = await this.pointers.read(scope, memoryId, layer, options);
                } catch (error) {
                    errors.push({
                        knowledgeId,
                        memoryId,
                        code: getErrorCode(error),
                        error: getErrorMessage(error),
                    });
                    continue;
                }

                if (read.status === 'missing') {
                    conflicts.push({
                        type: 'orphaned_pointer',
                        memoryId,
                        knowledgeId,
                        details: { reason: 'memory_deleted' },
                        suggestedResolution: 'delete_memory',
                    });
                    continue;
                }

                present.push({ memoryId, read });
            }

            if (present.length === 0) {
                continue;
            }

            const ranked = [...present].sort(compareDuplicates);
            const [kept, ...redundant] = ranked;

            for (const duplicate of redundant) {
                conflicts.push({
                    type: 'duplicate_pointer',
                    memoryId: duplicate.memoryId,
                    knowledgeId,
                    details: {
                        memoryIds: present.map(p => p.memoryId),
                        keepMemoryId: kept.memoryId,
                    },
                    suggestedResolution: 'delete_memory',
                });
            }

            conflicts.push(...this.inspect(kept, item, layer));
        }

        if (conflicts.length > 0 || errors.length > 0) {
            logger.info('Conflict scan finished', {
                conflicts: conflicts.length,
                errors: errors.length,
            });
        }

        return { conflicts, errors, scannedPairs: entries.length };
    }

    /**
     * Content-level checks on the pointer that stays.
     */
    private inspect(pointer: PresentPointer, item: KnowledgeItem, layer: KnowledgeLayer): SyncConflict[] {
        const { memoryId, read } = pointer;
        const knowledgeId = item.id;

        if (read.status !== 'pointer') {
            return [{
                type: 'hash_mismatch',
                memoryId,
                knowledgeId,
                details: { reason: 'invalid_metadata', storedHash: null, currentHash: item.contentHash },
                suggestedResolution: 'update_memory',
            }];
        }

        const found: SyncConflict[] = [];
        const stored = read.metadata.knowledgePointer;

        if (layer !== item.layer) {
            found.push({
                type: 'layer_mismatch',
                memoryId,
                knowledgeId,
                details: { expectedLayer: item.layer, actualLayer: layer },
                suggestedResolution: 'update_memory',
            });
        }

        if (stored.contentHash !== item.contentHash) {
            found.push({
                type: 'hash_mismatch',
                memoryId,
                knowledgeId,
                details: { reason: 'hash_changed', storedHash: stored.contentHash, currentHash: item.contentHash },
                suggestedResolution: 'update_memory',
            });
        } else if (read.record.content !== this.pointers.renderContent(item)) {
            found.push({
                type: 'hash_mismatch',
                memoryId,
                knowledgeId,
                details: { reason: 'content_drift', storedHash: stored.contentHash, currentHash: item.contentHash },
                suggestedResolution: 'update_memory',
            });
        }

        if (isTerminalStatus(item.status) && stored.sourceStatus !== item.status) {
            found.push({
                type: 'status_change',
                memoryId,
                knowledgeId,
                details: { status: item.status, previousStatus: stored.sourceStatus },
                suggestedResolution: 'update_memory',
            });
        }

        return found;
    }
}
