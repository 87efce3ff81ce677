/**
 * Test Fixtures
 *
 * Deterministic data factories and in-process stand-ins for the knowledge
 * repository, memory store and state store, with failure injection.
 */

import { PersistenceFailedError, CheckpointFailedError, RollbackFailedError } from '@/lib/errors/types';
import { createSyncBridgeConfig } from '@/lib/sync-bridge/core/config';
import type { SyncBridgeConfig, SyncBridgeConfigOverrides } from '@/lib/sync-bridge/core/config';
import { computeKnowledgeHash, scopeKey } from '@/lib/sync-bridge/core/hashing';
import type {
    KnowledgeCommit,
    KnowledgeItem,
    KnowledgeManifest,
    KnowledgeRepository,
    MemoryLayer,
    MemoryRecordInput,
    MemoryRecordPatch,
    MemoryStore,
    StoredMemoryRecord,
    SyncScope,
    SyncState,
} from '@/lib/sync-bridge/core/types';
import { InMemoryStateStore } from '@/lib/sync-bridge/state/state-store';

// ============================================================
// CLOCK
// ============================================================

export const BASE_TIME = 1_700_000_000_000;

export interface TestClock {
    now: () => number;
    advance: (ms: number) => void;
    set: (ms: number) => void;
}

export function createTestClock(start: number = BASE_TIME): TestClock {
    let current = start;
    return {
        now: () => current,
        advance: (ms) => {
            current += ms;
        },
        set: (ms) => {
            current = ms;
        },
    };
}

// ============================================================
// DATA FACTORIES
// ============================================================

export const testScope: SyncScope = { tenantId: 'tenant-a', identifiers: { project: 'checkout' } };

export type KnowledgeItemInput = Partial<Omit<KnowledgeItem, 'contentHash'>> & { id: string };

export function createKnowledgeItem(overrides: KnowledgeItemInput): KnowledgeItem {
    const base: Omit<KnowledgeItem, 'contentHash'> = {
        title: `Item ${overrides.id}`,
        summary: `Summary of ${overrides.id}`,
        content: `Full content of ${overrides.id}`,
        constraints: [],
        status: 'accepted',
        layer: 'project',
        type: 'adr',
        ...overrides,
    };
    return {
        ...base,
        contentHash: computeKnowledgeHash(base.content, base.constraints, base.status),
    };
}

/**
 * Fast retries and no per-call timers.
 */
export function createTestConfig(overrides: SyncBridgeConfigOverrides = {}): SyncBridgeConfig {
    return createSyncBridgeConfig(
        {
            stateDir: '/tmp/sync-bridge-test',
            callTimeoutMs: 0,
            concurrency: 2,
            ...overrides,
            retry: {
                maxAttempts: 2,
                initialDelayMs: 0,
                maxDelayMs: 0,
                jitterFactor: 0,
                ...overrides.retry,
            },
        },
        {}
    );
}

// ============================================================
// KNOWLEDGE REPOSITORY
// ============================================================

type KnowledgeOperation = 'getManifest' | 'getItem' | 'getCommitsSince';

/**
 * Versioned in-process knowledge repository. Every put or remove is a commit.
 */
export class InMemoryKnowledgeRepository implements KnowledgeRepository {
    private items: Map<string, KnowledgeItem> = new Map();
    private commits: KnowledgeCommit[] = [];
    private pendingFailures: Map<KnowledgeOperation, number> = new Map();
    private failingItems: Set<string> = new Set();
    readonly calls: Record<KnowledgeOperation, number> = { getManifest: 0, getItem: 0, getCommitsSince: 0 };

    constructor(initial: KnowledgeItemInput[] = []) {
        if (initial.length > 0) {
            for (const input of initial) {
                const item = createKnowledgeItem(input);
                this.items.set(item.id, item);
            }
            this.commit(initial.map(i => i.id));
        }
    }

    get head(): string {
        return this.commits.length > 0 ? this.commits[this.commits.length - 1].commitId : 'c0';
    }

    put(input: KnowledgeItemInput): KnowledgeItem {
        const item = createKnowledgeItem(input);
        this.items.set(item.id, item);
        this.commit([item.id]);
        return item;
    }

    remove(id: string): void {
        this.items.delete(id);
        this.commit([id]);
    }

    /**
     * Make the next `times` calls of an operation throw.
     */
    failNext(operation: KnowledgeOperation, times: number = 1): void {
        this.pendingFailures.set(operation, times);
    }

    /** getItem for this id throws until `recoverItem` */
    failItem(id: string): void {
        this.failingItems.add(id);
    }

    recoverItem(id: string): void {
        this.failingItems.delete(id);
    }

    async getManifest(_scope: SyncScope): Promise<KnowledgeManifest> {
        this.track('getManifest');
        const items: KnowledgeManifest['items'] = {};
        for (const item of this.items.values()) {
            items[item.id] = { contentHash: item.contentHash, layer: item.layer, type: item.type };
        }
        return { commitId: this.head, items };
    }

    async getItem(_scope: SyncScope, id: string): Promise<KnowledgeItem | null> {
        this.track('getItem');
        if (this.failingItems.has(id)) {
            throw new Error(`knowledge read failed for ${id}`);
        }
        const item = this.items.get(id);
        return item ? { ...item, constraints: [...item.constraints] } : null;
    }

    async getCommitsSince(_scope: SyncScope, commitId: string): Promise<KnowledgeCommit[]> {
        this.track('getCommitsSince');
        const index = this.commits.findIndex(c => c.commitId === commitId);
        return this.commits.slice(index + 1);
    }

    private commit(ids: string[]): void {
        this.commits.push({ commitId: `c${this.commits.length + 1}`, affectedItemIds: ids });
    }

    private track(operation: KnowledgeOperation): void {
        this.calls[operation]++;
        const remaining = this.pendingFailures.get(operation) ?? 0;
        if (remaining > 0) {
            this.pendingFailures.set(operation, remaining - 1);
            throw new Error(`knowledge repository unavailable (${operation})`);
        }
    }
}

// ============================================================
// MEMORY STORE
// ============================================================

type MemoryOperation = 'add' | 'update' | 'get' | 'delete';

/**
 * In-process memory store keyed by scope, layer and id.
 */
export class InMemoryMemoryStore implements MemoryStore {
    private records: Map<string, StoredMemoryRecord> = new Map();
    private pendingFailures: Map<MemoryOperation, number> = new Map();
    private failingIds: Set<string> = new Set();
    unavailable = false;
    readonly calls: Record<MemoryOperation, number> = { add: 0, update: 0, get: 0, delete: 0 };

    constructor(private readonly now: () => number = () => BASE_TIME) {}

    failNext(operation: MemoryOperation, times: number = 1): void {
        this.pendingFailures.set(operation, times);
    }

    /** Writes to this id throw until `recoverId` */
    failId(id: string): void {
        this.failingIds.add(id);
    }

    recoverId(id: string): void {
        this.failingIds.delete(id);
    }

    async add(scope: SyncScope, layer: MemoryLayer, record: MemoryRecordInput): Promise<string> {
        this.track('add', record.id);
        const key = this.key(scope, layer, record.id);
        if (this.records.has(key)) {
            throw new Error(`memory ${record.id} already exists`);
        }
        const now = this.now();
        this.records.set(key, { ...record, layer, createdAt: now, updatedAt: now });
        return record.id;
    }

    async update(scope: SyncScope, layer: MemoryLayer, id: string, patch: MemoryRecordPatch): Promise<void> {
        this.track('update', id);
        const key = this.key(scope, layer, id);
        const existing = this.records.get(key);
        if (!existing) {
            throw new Error(`memory ${id} not found`);
        }
        this.records.set(key, {
            ...existing,
            content: patch.content ?? existing.content,
            metadata: patch.metadata ?? existing.metadata,
            updatedAt: this.now(),
        });
    }

    async get(scope: SyncScope, layer: MemoryLayer, id: string): Promise<StoredMemoryRecord | null> {
        this.track('get');
        return this.peek(scope, layer, id);
    }

    async delete(scope: SyncScope, layer: MemoryLayer, id: string): Promise<boolean> {
        this.track('delete', id);
        return this.records.delete(this.key(scope, layer, id));
    }

    /** Read without counting a call or triggering failures */
    peek(scope: SyncScope, layer: MemoryLayer, id: string): StoredMemoryRecord | null {
        const record = this.records.get(this.key(scope, layer, id));
        return record ? { ...record } : null;
    }

    /** Insert a record directly, bypassing the sync bridge */
    seed(scope: SyncScope, layer: MemoryLayer, record: Omit<StoredMemoryRecord, 'layer'>): void {
        this.records.set(this.key(scope, layer, record.id), { ...record, layer });
    }

    /** Delete directly, as an out-of-band actor would */
    drop(scope: SyncScope, layer: MemoryLayer, id: string): void {
        this.records.delete(this.key(scope, layer, id));
    }

    list(scope: SyncScope): StoredMemoryRecord[] {
        const prefix = `${scopeKey(scope)}|`;
        return [...this.records.entries()]
            .filter(([key]) => key.startsWith(prefix))
            .map(([, record]) => ({ ...record }))
            .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    }

    private key(scope: SyncScope, layer: MemoryLayer, id: string): string {
        return `${scopeKey(scope)}|${layer}|${id}`;
    }

    private track(operation: MemoryOperation, id?: string): void {
        this.calls[operation]++;
        if (this.unavailable) {
            throw new Error('memory store unreachable');
        }
        if (id !== undefined && operation !== 'get' && this.failingIds.has(id)) {
            throw new Error(`memory write rejected for ${id}`);
        }
        const remaining = this.pendingFailures.get(operation) ?? 0;
        if (remaining > 0) {
            this.pendingFailures.set(operation, remaining - 1);
            throw new Error(`memory store unavailable (${operation})`);
        }
    }
}

// ============================================================
// STATE STORE
// ============================================================

/**
 * In-memory state store whose checkpoint, save and rollback can be made to
 * fail.
 */
export class FlakyStateStore extends InMemoryStateStore {
    failCheckpoint = false;
    failSave = false;
    failRollback = false;
    saves = 0;

    async checkpoint(scope: SyncScope): Promise<void> {
        if (this.failCheckpoint) {
            throw new CheckpointFailedError(scopeKey(scope), new Error('checkpoint volume offline'));
        }
        return super.checkpoint(scope);
    }

    async save(scope: SyncScope, state: SyncState): Promise<void> {
        if (this.failSave) {
            throw new PersistenceFailedError(scopeKey(scope), new Error('disk full'));
        }
        this.saves++;
        return super.save(scope, state);
    }

    async rollback(scope: SyncScope, triggeredBy?: Error): Promise<void> {
        if (this.failRollback) {
            throw new RollbackFailedError(scopeKey(scope), new Error('checkpoint lost'), triggeredBy);
        }
        return super.rollback(scope, triggeredBy);
    }
}
