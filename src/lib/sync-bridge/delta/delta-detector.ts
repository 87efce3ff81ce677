/**
 * Sync Bridge - Delta Detector
 * @module lib/sync-bridge/delta/delta-detector
 *
 * Classifies knowledge ids into added, updated, deleted and unchanged by
 * comparing the current manifest hashes with the last synced hashes.
 */

import { createLogger } from '../core/config';
import type { DeltaResult, KnowledgeManifest } from '../core/types';

const logger = createLogger('SyncBridge:Delta');

// ============================================================================
// TYPES
// ============================================================================

/** knowledgeId -> contentHash */
export type HashMap = Readonly<Record<string, string>>;

export interface DeltaSummary {
    added: number;
    updated: number;
    deleted: number;
    unchanged: number;
    totalChanges: number;
}

// ============================================================================
// DETECTION
// ============================================================================

function byId(a: string, b: string): number {
    return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Compute the delta between two hash maps.
 *
 * The four lists are disjoint, sorted, and together cover exactly the union
 * of both key sets. Neither input is mutated.
 */
export function detectDelta(current: HashMap, previous: HashMap): DeltaResult {
    const added: string[] = [];
    const updated: string[] = [];
    const deleted: string[] = [];
    const unchanged: string[] = [];

    for (const id of Object.keys(current)) {
        if (!Object.prototype.hasOwnProperty.call(previous, id)) {
            added.push(id);
        } else if (previous[id] !== current[id]) {
            updated.push(id);
        } else {
            unchanged.push(id);
        }
    }

    for (const id of Object.keys(previous)) {
        if (!Object.prototype.hasOwnProperty.call(current, id)) {
            deleted.push(id);
        }
    }

    const delta: DeltaResult = {
        added: added.sort(byId),
        updated: updated.sort(byId),
        deleted: deleted.sort(byId),
        unchanged: unchanged.sort(byId),
    };

    logger.debug('Delta calculated', summarizeDelta(delta));

    return delta;
}

/**
 * Project a manifest onto its id -> hash map.
 */
export function manifestHashes(manifest: KnowledgeManifest): Record<string, string> {
    const hashes: Record<string, string> = {};
    for (const [id, entry] of Object.entries(manifest.items)) {
        hashes[id] = entry.contentHash;
    }
    return hashes;
}

/**
 * Restrict a hash map to the given ids.
 */
export function restrictHashes(hashes: HashMap, ids: Iterable<string>): Record<string, string> {
    const restricted: Record<string, string> = {};
    for (const id of ids) {
        if (Object.prototype.hasOwnProperty.call(hashes, id)) {
            restricted[id] = hashes[id];
        }
    }
    return restricted;
}

/**
 * Treat every unchanged id as updated. Used by forced syncs.
 */
export function applyForce(delta: DeltaResult): DeltaResult {
    return {
        added: [...delta.added],
        updated: [...delta.updated, ...delta.unchanged].sort(byId),
        deleted: [...delta.deleted],
        unchanged: [],
    };
}

export function summarizeDelta(delta: DeltaResult): DeltaSummary {
    return {
        added: delta.added.length,
        updated: delta.updated.length,
        deleted: delta.deleted.length,
        unchanged: delta.unchanged.length,
        totalChanges: delta.added.length + delta.updated.length + delta.deleted.length,
    };
}

export function hasChanges(delta: DeltaResult): boolean {
    return delta.added.length > 0 || delta.updated.length > 0 || delta.deleted.length > 0;
}
