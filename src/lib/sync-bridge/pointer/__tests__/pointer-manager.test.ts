/**
 * PointerManager Unit Tests
 *
 * Exercises the pointer lifecycle against the in-process memory store.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { PointerManager } from '../pointer-manager';
import { RetryHandler } from '../../../errors/retry';
import { MemoryUnavailableError } from '../../../errors/types';
import {
    BASE_TIME,
    InMemoryMemoryStore,
    createKnowledgeItem,
    createTestClock,
    testScope,
} from '@/test/fixtures';
import type { TestClock } from '@/test/fixtures';

// ============================================================================
// TEST FIXTURES
// ============================================================================

const createRetry = () => new RetryHandler({ maxAttempts: 2, initialDelayMs: 0, maxDelayMs: 0, jitterFactor: 0 });

describe('PointerManager', () => {
    let clock: TestClock;
    let store: InMemoryMemoryStore;
    let manager: PointerManager;

    beforeEach(() => {
        clock = createTestClock();
        store = new InMemoryMemoryStore(clock.now);
        manager = new PointerManager(store, createRetry(), { callTimeoutMs: 0, now: clock.now });
    });

    describe('create', () => {
        it('writes a pointer under the deterministic id', async () => {
            const item = createKnowledgeItem({ id: 'adr-1', layer: 'team', status: 'proposed' });

            const memoryId = await manager.create(testScope, item);

            expect(memoryId).toBe('ptr_adr-1');
            const record = store.peek(testScope, 'team', 'ptr_adr-1');
            expect(record?.content).toBe(manager.renderContent(item));
            expect(record?.metadata).toEqual({
                type: 'knowledge_pointer',
                knowledgePointer: {
                    sourceType: 'adr',
                    sourceId: 'adr-1',
                    contentHash: item.contentHash,
                    syncedAt: BASE_TIME,
                    sourceLayer: 'team',
                    sourceStatus: 'proposed',
                    isOrphaned: false,
                },
                tags: ['knowledge', 'adr', 'proposed'],
            });
        });

        it('refreshes an existing record instead of failing', async () => {
            const item = createKnowledgeItem({ id: 'adr-1' });
            await manager.create(testScope, item);

            const changed = createKnowledgeItem({ id: 'adr-1', title: 'Renamed' });
            clock.advance(1000);
            const memoryId = await manager.create(testScope, changed);

            expect(memoryId).toBe('ptr_adr-1');
            expect(store.list(testScope)).toHaveLength(1);
            expect(store.peek(testScope, 'project', 'ptr_adr-1')?.content.startsWith('Renamed\n')).toBe(true);
        });

        it('fails with MEMORY_UNAVAILABLE when the store is unreachable', async () => {
            store.unavailable = true;

            await expect(manager.create(testScope, createKnowledgeItem({ id: 'x' })))
                .rejects.toBeInstanceOf(MemoryUnavailableError);
            expect(store.calls.get).toBe(2);
        });

        it('retries a transient failure', async () => {
            store.failNext('add', 1);

            await expect(manager.create(testScope, createKnowledgeItem({ id: 'x' }))).resolves.toBe('ptr_x');
            expect(store.calls.add).toBe(2);
        });
    });

    describe('update', () => {
        it('regenerates content and keeps the id', async () => {
            await manager.create(testScope, createKnowledgeItem({ id: 'p-1' }));
            const next = createKnowledgeItem({ id: 'p-1', content: 'v2' });

            await manager.update(testScope, 'ptr_p-1', next);

            const read = await manager.read(testScope, 'ptr_p-1', 'project');
            expect(read.status).toBe('pointer');
            if (read.status === 'pointer') {
                expect(read.metadata.knowledgePointer.contentHash).toBe(next.contentHash);
            }
        });

        it('moves the record when the layer changed', async () => {
            await manager.create(testScope, createKnowledgeItem({ id: 'p-1', layer: 'team' }));
            const moved = createKnowledgeItem({ id: 'p-1', layer: 'org' });

            await manager.update(testScope, 'ptr_p-1', moved, { previousLayer: 'team' });

            expect(store.peek(testScope, 'team', 'ptr_p-1')).toBeNull();
            expect(store.peek(testScope, 'org', 'ptr_p-1')?.content).toBe(manager.renderContent(moved));
        });

        it('recreates a record that disappeared', async () => {
            const item = createKnowledgeItem({ id: 'p-2' });

            await manager.update(testScope, 'ptr_p-2', item);

            expect(store.peek(testScope, 'project', 'ptr_p-2')).not.toBeNull();
        });
    });

    describe('markOrphaned', () => {
        it('sets isOrphaned and keeps the record', async () => {
            await manager.create(testScope, createKnowledgeItem({ id: 'a' }));

            await expect(manager.markOrphaned(testScope, 'ptr_a', 'project')).resolves.toBe(true);

            const read = await manager.read(testScope, 'ptr_a', 'project');
            expect(read.status === 'pointer' && read.metadata.knowledgePointer.isOrphaned).toBe(true);
        });

        it('is a no-op when already orphaned or missing', async () => {
            await manager.create(testScope, createKnowledgeItem({ id: 'a' }));
            await manager.markOrphaned(testScope, 'ptr_a', 'project');
            const updatesBefore = store.calls.update;

            await expect(manager.markOrphaned(testScope, 'ptr_a', 'project')).resolves.toBe(false);
            await expect(manager.markOrphaned(testScope, 'ptr_missing', 'project')).resolves.toBe(false);
            expect(store.calls.update).toBe(updatesBefore);
        });
    });

    describe('remove', () => {
        it('hard deletes the record', async () => {
            await manager.create(testScope, createKnowledgeItem({ id: 'a' }));

            await expect(manager.remove(testScope, 'ptr_a', 'project')).resolves.toBe(true);
            await expect(manager.remove(testScope, 'ptr_a', 'project')).resolves.toBe(false);
        });
    });

    describe('read', () => {
        it('reports missing records', async () => {
            await expect(manager.read(testScope, 'nope', 'project')).resolves.toEqual({ status: 'missing' });
        });

        it('classifies foreign metadata', async () => {
            store.seed(testScope, 'project', {
                id: 'note-1',
                content: 'user note',
                metadata: { type: 'episodic', mood: 'fine' },
                createdAt: BASE_TIME,
                updatedAt: BASE_TIME,
            });

            const read = await manager.read(testScope, 'note-1', 'project');

            expect(read.status).toBe('foreign');
            if (read.status === 'foreign') {
                expect(read.record.metadata).toEqual({
                    type: 'foreign',
                    kind: 'episodic',
                    raw: { type: 'episodic', mood: 'fine' },
                });
            }
        });

        it('flags malformed pointer metadata as invalid', async () => {
            store.seed(testScope, 'project', {
                id: 'ptr_bad',
                content: 'x',
                metadata: { type: 'knowledge_pointer', knowledgePointer: { sourceId: 'bad' } },
                createdAt: BASE_TIME,
                updatedAt: BASE_TIME,
            });

            const read = await manager.read(testScope, 'ptr_bad', 'project');

            expect(read.status).toBe('invalid');
        });
    });
});
