/**
 * Hashing Unit Tests
 */

import { describe, it, expect } from 'vitest';
import crypto from 'crypto';
import { computeKnowledgeHash, pointerMemoryId, scopeKey } from '../hashing';
import type { KnowledgeConstraint } from '../types';

const constraint: KnowledgeConstraint = {
    operator: 'mustUse',
    pattern: 'zod',
    target: 'dependency',
    severity: 'block',
};

describe('computeKnowledgeHash', () => {
    it('hashes one JSON document of content, constraints and status', () => {
        const expected = crypto
            .createHash('sha256')
            .update(JSON.stringify({
                content: 'body',
                constraints: [{ operator: 'mustUse', pattern: 'zod', target: 'dependency', severity: 'block', message: null }],
                status: 'accepted',
            }))
            .digest('hex');

        expect(computeKnowledgeHash('body', [constraint], 'accepted')).toBe(expected);
    });

    it('ignores constraint key order', () => {
        const reordered: KnowledgeConstraint = {
            severity: 'block',
            target: 'dependency',
            pattern: 'zod',
            operator: 'mustUse',
        };

        expect(computeKnowledgeHash('body', [reordered], 'accepted'))
            .toBe(computeKnowledgeHash('body', [constraint], 'accepted'));
    });

    it('changes with the status', () => {
        expect(computeKnowledgeHash('body', [], 'accepted'))
            .not.toBe(computeKnowledgeHash('body', [], 'deprecated'));
    });
});

describe('scopeKey', () => {
    it('sorts identifiers by name', () => {
        expect(scopeKey({ tenantId: 't', identifiers: { repo: 'r', branch: 'main' } })).toBe('t/branch=main,repo=r');
        expect(scopeKey({ tenantId: 't' })).toBe('t');
    });
});

describe('pointerMemoryId', () => {
    it('prefixes the knowledge id', () => {
        expect(pointerMemoryId('adr-7')).toBe('ptr_adr-7');
    });
});
