/**
 * Sync Bridge - Hashing
 * @module lib/sync-bridge/core/hashing
 */

import crypto from 'crypto';
import type { KnowledgeConstraint, KnowledgeStatus, SyncScope } from './types';

/**
 * Deterministic hash of the fields that define a knowledge item's pointer:
 * content, constraints and status, serialized as one JSON document so field
 * boundaries are unambiguous. Constraint key order is normalized so the hash
 * does not depend on how the object was built.
 */
export function computeKnowledgeHash(
    content: string,
    constraints: KnowledgeConstraint[],
    status: KnowledgeStatus
): string {
    const normalized = constraints.map(c => ({
        operator: c.operator,
        pattern: c.pattern,
        target: c.target,
        severity: c.severity,
        message: c.message ?? null,
    }));

    return crypto
        .createHash('sha256')
        .update(JSON.stringify({ content, constraints: normalized, status }))
        .digest('hex');
}

/**
 * Stable key for a scope: tenant plus identifiers sorted by name.
 */
export function scopeKey(scope: SyncScope): string {
    const identifiers = Object.entries(scope.identifiers ?? {})
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, value]) => `${key}=${value}`);

    return identifiers.length > 0
        ? `${scope.tenantId}/${identifiers.join(',')}`
        : scope.tenantId;
}

/**
 * Deterministic memory id of the pointer for a knowledge item.
 */
export function pointerMemoryId(knowledgeId: string): string {
    return `ptr_${knowledgeId}`;
}
