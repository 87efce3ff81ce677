/**
 * Sync Bridge - Schemas
 * @module lib/sync-bridge/core/schemas
 *
 * Runtime validation at the persistence and memory-store boundaries.
 */

import { z } from 'zod';
import {
    KNOWLEDGE_LAYERS,
    KNOWLEDGE_POINTER_TYPE,
    KNOWLEDGE_STATUSES,
    KNOWLEDGE_TYPES,
    SYNC_STATE_VERSION,
} from './types';
import type { MemoryRecordMetadata, SyncState } from './types';

// ============================================================================
// SYNC STATE
// ============================================================================

export const knowledgeLayerSchema = z.enum(KNOWLEDGE_LAYERS);

export const syncFailureSchema = z.object({
    knowledgeId: z.string().min(1),
    error: z.string(),
    code: z.string(),
    failedAt: z.number(),
    retryCount: z.number().int().nonnegative(),
});

export const syncStateSchema = z.object({
    version: z.literal(SYNC_STATE_VERSION),
    lastSyncAt: z.number().nullable(),
    lastKnowledgeCommit: z.string().nullable(),
    knowledgeHashes: z.record(z.string()),
    pointerMapping: z.record(z.string()),
    knowledgeLayers: z.record(knowledgeLayerSchema),
    failedItems: z.array(syncFailureSchema),
    stats: z.object({
        totalSyncs: z.number().int().nonnegative(),
        totalItemsSynced: z.number().int().nonnegative(),
        totalConflictsResolved: z.number().int().nonnegative(),
        avgSyncDurationMs: z.number().nonnegative(),
    }),
});

export type StateValidationResult =
    | { success: true; data: SyncState }
    | { success: false; errors: string[] };

/**
 * Validate a parsed state document. A version other than the current one is
 * reported as its own issue so callers can fail closed.
 */
export function validateSyncState(value: unknown): StateValidationResult {
    const result = syncStateSchema.safeParse(value);

    if (result.success) {
        return { success: true, data: result.data };
    }

    return {
        success: false,
        errors: result.error.errors.map(e => `${e.path.join('.') || '(root)'}: ${e.message}`),
    };
}

// ============================================================================
// POINTER METADATA
// ============================================================================

export const knowledgePointerSchema = z.object({
    sourceType: z.enum(KNOWLEDGE_TYPES),
    sourceId: z.string().min(1),
    contentHash: z.string().min(1),
    syncedAt: z.number(),
    sourceLayer: knowledgeLayerSchema,
    sourceStatus: z.enum(KNOWLEDGE_STATUSES),
    isOrphaned: z.boolean(),
});

export const knowledgePointerMetadataSchema = z.object({
    type: z.literal(KNOWLEDGE_POINTER_TYPE),
    knowledgePointer: knowledgePointerSchema,
    tags: z.array(z.string()),
});

export type MetadataParseResult =
    | { success: true; metadata: MemoryRecordMetadata }
    | { success: false; errors: string[] };

/**
 * Parse raw memory metadata into the closed union. Records not tagged as
 * pointers are foreign; records tagged as pointers but malformed fail.
 */
export function parseMemoryMetadata(raw: Record<string, unknown>): MetadataParseResult {
    if (raw.type !== KNOWLEDGE_POINTER_TYPE) {
        return {
            success: true,
            metadata: {
                type: 'foreign',
                kind: typeof raw.type === 'string' ? raw.type : 'unknown',
                raw,
            },
        };
    }

    const result = knowledgePointerMetadataSchema.safeParse(raw);
    if (!result.success) {
        return {
            success: false,
            errors: result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`),
        };
    }

    return { success: true, metadata: result.data };
}
