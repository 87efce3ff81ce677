/**
 * Sync Bridge - Pointer Content
 * @module lib/sync-bridge/pointer/pointer-content
 *
 * Renders the compact, agent-facing summary stored in a pointer memory.
 */

import type { KnowledgeConstraint, KnowledgeItem } from '../core/types';

export interface PointerContentOptions {
    maxLength?: number;
    maxBlockingConstraints?: number;
}

export const DEFAULT_POINTER_MAX_LENGTH = 1000;
export const DEFAULT_MAX_BLOCKING_CONSTRAINTS = 3;

const ELLIPSIS = '…';

export function knowledgeReference(id: string): string {
    return `Source: knowledge://${id}`;
}

export function formatConstraint(constraint: KnowledgeConstraint): string {
    const message = constraint.message?.trim();
    if (message) {
        return `- ${message}`;
    }
    return `- ${constraint.operator}: ${constraint.pattern} [${constraint.target}]`;
}

/**
 * Generate pointer content for a knowledge item.
 *
 * Layout: title, summary, `[type] [status] [layer]`, up to N blocking
 * constraints, then the reference line. The result never exceeds
 * `maxLength` characters and always ends with the reference line.
 */
export function generatePointerContent(item: KnowledgeItem, options: PointerContentOptions = {}): string {
    const maxLength = options.maxLength ?? DEFAULT_POINTER_MAX_LENGTH;
    const maxBlocking = options.maxBlockingConstraints ?? DEFAULT_MAX_BLOCKING_CONSTRAINTS;

    const lines: string[] = [item.title];
    if (item.summary.trim()) {
        lines.push(item.summary.trim());
    }
    lines.push(`[${item.type}] [${item.status}] [${item.layer}]`);

    const blocking = item.constraints
        .filter(c => c.severity === 'block')
        .slice(0, maxBlocking);
    if (blocking.length > 0) {
        lines.push('Constraints:');
        for (const constraint of blocking) {
            lines.push(formatConstraint(constraint));
        }
    }

    const reference = knowledgeReference(item.id);
    const body = lines.join('\n');
    const full = `${body}\n${reference}`;

    if (full.length <= maxLength) {
        return full;
    }

    // Room left for the body once the newline and reference are reserved
    const budget = maxLength - reference.length - 1;
    if (budget <= ELLIPSIS.length) {
        return reference.slice(0, maxLength);
    }

    return `${body.slice(0, budget - ELLIPSIS.length).trimEnd()}${ELLIPSIS}\n${reference}`;
}
