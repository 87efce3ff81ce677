/**
 * Sync Bridge - Pointer Memory Manager
 * @module lib/sync-bridge/pointer/pointer-manager
 *
 * Creates, refreshes, tombstones and removes pointer memories. Every memory
 * store call runs through the retry handler with a per-call timeout.
 */

import { RetryHandler } from '../../errors/retry';
import { MemoryUnavailableError, getErrorMessage, isSyncBridgeError } from '../../errors/types';
import { createLogger } from '../core/config';
import { pointerMemoryId } from '../core/hashing';
import { parseMemoryMetadata } from '../core/schemas';
import { KNOWLEDGE_POINTER_TYPE } from '../core/types';
import type {
    KnowledgeItem,
    KnowledgePointerMetadata,
    MemoryLayer,
    MemoryStore,
    PointerMemory,
    StoredMemoryRecord,
    SyncScope,
} from '../core/types';
import { generatePointerContent } from './pointer-content';
import type { PointerContentOptions } from './pointer-content';

const logger = createLogger('SyncBridge:Pointer');

// ============================================================================
// TYPES
// ============================================================================

export interface PointerManagerConfig {
    callTimeoutMs: number;
    content: PointerContentOptions;
    now: () => number;
}

export interface PointerCallOptions {
    abortSignal?: AbortSignal;
}

export interface PointerUpdateOptions extends PointerCallOptions {
    /** Layer the pointer currently lives in, when it differs from the item's */
    previousLayer?: MemoryLayer;
}

export type PointerReadResult =
    | { status: 'missing' }
    | { status: 'pointer'; record: PointerMemory; metadata: KnowledgePointerMetadata }
    | { status: 'foreign'; record: PointerMemory }
    | { status: 'invalid'; record: StoredMemoryRecord; errors: string[] };

const DEFAULT_CONFIG: PointerManagerConfig = {
    callTimeoutMs: 10_000,
    content: {},
    now: () => Date.now(),
};

// ============================================================================
// HELPERS
// ============================================================================

export function buildPointerMetadata(item: KnowledgeItem, syncedAt: number): KnowledgePointerMetadata {
    return {
        type: KNOWLEDGE_POINTER_TYPE,
        knowledgePointer: {
            sourceType: item.type,
            sourceId: item.id,
            contentHash: item.contentHash,
            syncedAt,
            sourceLayer: item.layer,
            sourceStatus: item.status,
            isOrphaned: false,
        },
        tags: ['knowledge', item.type, item.status],
    };
}

function toRecordMetadata(metadata: KnowledgePointerMetadata): Record<string, unknown> {
    return {
        type: metadata.type,
        knowledgePointer: { ...metadata.knowledgePointer },
        tags: [...metadata.tags],
    };
}

// ============================================================================
// POINTER MANAGER CLASS
// ============================================================================

export class PointerManager {
    private readonly config: PointerManagerConfig;

    constructor(
        private readonly store: MemoryStore,
        private readonly retry: RetryHandler,
        config: Partial<PointerManagerConfig> = {}
    ) {
        this.config = { ...DEFAULT_CONFIG, ...config };
    }

    /**
     * Render the content a pointer for this item should hold.
     */
    renderContent(item: KnowledgeItem): string {
        return generatePointerContent(item, this.config.content);
    }

    /**
     * Write the pointer for an item under its deterministic id. An existing
     * record with that id is refreshed in place.
     */
    async create(scope: SyncScope, item: KnowledgeItem, options: PointerCallOptions = {}): Promise<string> {
        const memoryId = pointerMemoryId(item.id);
        const content = this.renderContent(item);
        const metadata = toRecordMetadata(buildPointerMetadata(item, this.config.now()));

        const existing = await this.call(
            'memory.get',
            () => this.store.get(scope, item.layer, memoryId),
            options
        );

        if (existing) {
            await this.call(
                'memory.update',
                () => this.store.update(scope, item.layer, memoryId, { content, metadata }),
                options
            );
            logger.debug(`Pointer refreshed: ${memoryId}`);
            return memoryId;
        }

        const storedId = await this.call(
            'memory.add',
            () => this.store.add(scope, item.layer, { id: memoryId, content, metadata }),
            options
        );
        logger.debug(`Pointer created: ${storedId}`, { knowledgeId: item.id, layer: item.layer });
        return storedId;
    }

    /**
     * Regenerate content and metadata, keeping the memory id. When the item
     * moved layers the record is rewritten in the new layer.
     */
    async update(
        scope: SyncScope,
        memoryId: string,
        item: KnowledgeItem,
        options: PointerUpdateOptions = {}
    ): Promise<void> {
        const content = this.renderContent(item);
        const metadata = toRecordMetadata(buildPointerMetadata(item, this.config.now()));
        const previousLayer = options.previousLayer;

        if (previousLayer && previousLayer !== item.layer) {
            await this.call(
                'memory.delete',
                () => this.store.delete(scope, previousLayer, memoryId),
                options
            );
            await this.call(
                'memory.add',
                () => this.store.add(scope, item.layer, { id: memoryId, content, metadata }),
                options
            );
            logger.debug(`Pointer moved: ${memoryId}`, { from: previousLayer, to: item.layer });
            return;
        }

        const existing = await this.call(
            'memory.get',
            () => this.store.get(scope, item.layer, memoryId),
            options
        );

        if (!existing) {
            await this.call(
                'memory.add',
                () => this.store.add(scope, item.layer, { id: memoryId, content, metadata }),
                options
            );
            logger.debug(`Pointer recreated: ${memoryId}`);
            return;
        }

        await this.call(
            'memory.update',
            () => this.store.update(scope, item.layer, memoryId, { content, metadata }),
            options
        );
        logger.debug(`Pointer updated: ${memoryId}`);
    }

    /**
     * Tombstone a pointer. Returns false when the record is missing, foreign
     * or already orphaned. Never deletes.
     */
    async markOrphaned(
        scope: SyncScope,
        memoryId: string,
        layer: MemoryLayer,
        options: PointerCallOptions = {}
    ): Promise<boolean> {
        const result = await this.read(scope, memoryId, layer, options);

        if (result.status !== 'pointer' || result.metadata.knowledgePointer.isOrphaned) {
            return false;
        }

        const metadata = toRecordMetadata({
            ...result.metadata,
            knowledgePointer: { ...result.metadata.knowledgePointer, isOrphaned: true },
        });

        await this.call(
            'memory.update',
            () => this.store.update(scope, layer, memoryId, { metadata }),
            options
        );
        logger.info(`Pointer orphaned: ${memoryId}`);
        return true;
    }

    /**
     * Hard delete. Only conflict resolution calls this.
     */
    async remove(
        scope: SyncScope,
        memoryId: string,
        layer: MemoryLayer,
        options: PointerCallOptions = {}
    ): Promise<boolean> {
        const removed = await this.call(
            'memory.delete',
            () => this.store.delete(scope, layer, memoryId),
            options
        );
        if (removed) {
            logger.info(`Pointer removed: ${memoryId}`);
        }
        return removed;
    }

    /**
     * Read a record and validate its metadata.
     */
    async read(
        scope: SyncScope,
        memoryId: string,
        layer: MemoryLayer,
        options: PointerCallOptions = {}
    ): Promise<PointerReadResult> {
        const record = await this.call(
            'memory.get',
            () => this.store.get(scope, layer, memoryId),
            options
        );

        if (!record) {
            return { status: 'missing' };
        }

        const parsed = parseMemoryMetadata(record.metadata);
        if (!parsed.success) {
            return { status: 'invalid', record, errors: parsed.errors };
        }

        const pointerRecord: PointerMemory = { ...record, metadata: parsed.metadata };
        if (parsed.metadata.type === KNOWLEDGE_POINTER_TYPE) {
            return { status: 'pointer', record: pointerRecord, metadata: parsed.metadata };
        }
        return { status: 'foreign', record: pointerRecord };
    }

    private call<T>(operation: string, fn: () => Promise<T>, options: PointerCallOptions): Promise<T> {
        return this.retry.execute(
            async () => {
                try {
                    return await fn();
                } catch (error) {
                    if (isSyncBridgeError(error)) {
                        throw error;
                    }
                    throw new MemoryUnavailableError(
                        `${operation} failed: ${getErrorMessage(error)}`,
                        error instanceof Error ? error : undefined,
                        { operation }
                    );
                }
            },
            {
                operation,
                timeoutMs: this.config.callTimeoutMs,
                abortSignal: options.abortSignal,
                onRetry: (error, attempt, delayMs) => {
                    logger.warn(`Retrying ${operation}`, { attempt, delayMs, error: error.message });
                },
            }
        );
    }
}
