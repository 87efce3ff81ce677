/**
 * Sync Bridge - State Store
 * @module lib/sync-bridge/state/state-store
 *
 * Durable per-scope SyncState with checkpoint and rollback. A checkpoint is
 * the serialized state document as it was, so a rollback restores it
 * byte for byte (or removes the state if none existed).
 */

import { promises as fs } from 'fs';
import { dirname, join } from 'path';
import {
    CheckpointFailedError,
    PersistenceFailedError,
    RollbackFailedError,
    StateCorruptedError,
    getErrorMessage,
} from '../../errors/types';
import { PERSISTENCE_CONFIG, createLogger } from '../core/config';
import { scopeKey } from '../core/hashing';
import { validateSyncState } from '../core/schemas';
import { SYNC_STATE_VERSION } from '../core/types';
import type { SyncScope, SyncState } from '../core/types';

const logger = createLogger('SyncBridge:State');

// ============================================================================
// STATE HELPERS
// ============================================================================

export function createEmptySyncState(): SyncState {
    return {
        version: SYNC_STATE_VERSION,
        lastSyncAt: null,
        lastKnowledgeCommit: null,
        knowledgeHashes: {},
        pointerMapping: {},
        knowledgeLayers: {},
        failedItems: [],
        stats: {
            totalSyncs: 0,
            totalItemsSynced: 0,
            totalConflictsResolved: 0,
            avgSyncDurationMs: 0,
        },
    };
}

export function cloneSyncState(state: SyncState): SyncState {
    return structuredClone(state);
}

export function serializeSyncState(state: SyncState): string {
    return JSON.stringify(state, null, PERSISTENCE_CONFIG.prettyPrint ? 2 : 0);
}

/**
 * Parse and validate a state document.
 *
 * @throws StateCorruptedError for malformed JSON, an unknown version or a
 * schema violation
 */
export function parseSyncState(raw: string, key: string): SyncState {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new StateCorruptedError(`Sync state for ${key} is not valid JSON`, [getErrorMessage(error)], {
            scopeKey: key,
        });
    }

    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed) {
        const version = parsed.version;
        if (version !== SYNC_STATE_VERSION) {
            throw new StateCorruptedError(
                `Unsupported sync state version for ${key}: ${String(version)}`,
                [`version: expected ${SYNC_STATE_VERSION}`],
                { scopeKey: key }
            );
        }
    }

    const result = validateSyncState(parsed);
    if (!result.success) {
        throw new StateCorruptedError(`Sync state for ${key} failed validation`, result.errors, {
            scopeKey: key,
        });
    }
    return result.data;
}

// ============================================================================
// STATE STORE INTERFACE
// ============================================================================

export interface StateStore {
    /** Returns an empty state when none was persisted yet */
    load(scope: SyncScope): Promise<SyncState>;
    save(scope: SyncScope, state: SyncState): Promise<void>;
    checkpoint(scope: SyncScope): Promise<void>;
    rollback(scope: SyncScope, triggeredBy?: Error): Promise<void>;
    discardCheckpoint(scope: SyncScope): Promise<void>;
    hasCheckpoint(scope: SyncScope): Promise<boolean>;
}

export type DocumentKind = 'state' | 'checkpoint';

interface CheckpointEnvelope {
    takenAt: number;
    state: string | null;
}

function parseEnvelope(raw: string): CheckpointEnvelope | null {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        return null;
    }
    if (typeof parsed !== 'object' || parsed === null) return null;
    if (!('takenAt' in parsed) || !('state' in parsed)) return null;

    const { takenAt, state } = parsed;
    if (typeof takenAt !== 'number') return null;
    if (state !== null && typeof state !== 'string') return null;
    return { takenAt, state };
}

// ============================================================================
// BASE STATE STORE
// ============================================================================

/**
 * Checkpoint and validation logic shared by the storage backends, which only
 * provide raw document access.
 */
export abstract class BaseStateStore implements StateStore {
    protected abstract readDocument(key: string, kind: DocumentKind): Promise<string | null>;
    protected abstract writeDocument(key: string, kind: DocumentKind, content: string): Promise<void>;
    protected abstract deleteDocument(key: string, kind: DocumentKind): Promise<void>;

    constructor(protected readonly now: () => number = () => Date.now()) {}

    async load(scope: SyncScope): Promise<SyncState> {
        const key = scopeKey(scope);
        const raw = await this.readDocument(key, 'state');

        if (raw === null) {
            logger.debug(`No sync state for ${key}, starting empty`);
            return createEmptySyncState();
        }

        return parseSyncState(raw, key);
    }

    async save(scope: SyncScope, state: SyncState): Promise<void> {
        const key = scopeKey(scope);
        const validation = validateSyncState(state);
        if (!validation.success) {
            throw new PersistenceFailedError(
                key,
                new StateCorruptedError('Refusing to persist invalid sync state', validation.errors)
            );
        }

        try {
            await this.writeDocument(key, 'state', serializeSyncState(state));
        } catch (error) {
            throw new PersistenceFailedError(key, error instanceof Error ? error : undefined);
        }
        logger.debug(`Sync state persisted: ${key}`);
    }

    async checkpoint(scope: SyncScope): Promise<void> {
        const key = scopeKey(scope);
        try {
            const state = await this.readDocument(key, 'state');
            const envelope: CheckpointEnvelope = { takenAt: this.now(), state };
            await this.writeDocument(key, 'checkpoint', JSON.stringify(envelope));
        } catch (error) {
            throw new CheckpointFailedError(key, error instanceof Error ? error : undefined);
        }
        logger.debug(`Checkpoint taken: ${key}`);
    }

    async rollback(scope: SyncScope, triggeredBy?: Error): Promise<void> {
        const key = scopeKey(scope);
        try {
            const raw = await this.readDocument(key, 'checkpoint');
            if (raw === null) {
                throw new Error('no checkpoint to restore');
            }
            const envelope = parseEnvelope(raw);
            if (!envelope) {
                throw new Error('checkpoint is unreadable');
            }

            if (envelope.state === null) {
                await this.deleteDocument(key, 'state');
            } else {
                await this.writeDocument(key, 'state', envelope.state);
            }
            await this.deleteDocument(key, 'checkpoint');
        } catch (error) {
            throw new RollbackFailedError(key, error instanceof Error ? error : undefined, triggeredBy);
        }
        logger.warn(`Sync state rolled back: ${key}`, { cause: triggeredBy?.message });
    }

    async discardCheckpoint(scope: SyncScope): Promise<void> {
        await this.deleteDocument(scopeKey(scope), 'checkpoint');
    }

    async hasCheckpoint(scope: SyncScope): Promise<boolean> {
        return (await this.readDocument(scopeKey(scope), 'checkpoint')) !== null;
    }
}

// ============================================================================
// FILE STATE STORE
// ============================================================================

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

/**
 * JSON files under `stateDir`, one state and one checkpoint per scope.
 * Writes are atomic (temp file + rename) and serialized per path.
 */
export class FileStateStore extends BaseStateStore {
    private writeQueue: Map<string, Promise<void>> = new Map();

    constructor(private readonly stateDir: string, now?: () => number) {
        super(now);
    }

    getPath(key: string, kind: DocumentKind): string {
        const file = `${encodeURIComponent(key)}${PERSISTENCE_CONFIG.stateFileSuffix}`;
        return kind === 'state'
            ? join(this.stateDir, file)
            : join(this.stateDir, 'checkpoints', file);
    }

    protected async readDocument(key: string, kind: DocumentKind): Promise<string | null> {
        const filePath = this.getPath(key, kind);
        try {
            return await fs.readFile(filePath, 'utf-8');
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                return null;
            }
            logger.error(`Failed to read: ${filePath}`, error);
            throw error;
        }
    }

    protected async writeDocument(key: string, kind: DocumentKind, content: string): Promise<void> {
        const filePath = this.getPath(key, kind);
        await this.queueWrite(filePath, async () => {
            await fs.mkdir(dirname(filePath), { recursive: true });

            const tempPath = `${filePath}.tmp`;
            await fs.writeFile(tempPath, content, 'utf-8');
            await fs.rename(tempPath, filePath);

            logger.debug(`Written: ${filePath}`, { size: content.length });
        });
    }

    protected async deleteDocument(key: string, kind: DocumentKind): Promise<void> {
        const filePath = this.getPath(key, kind);
        await this.queueWrite(filePath, async () => {
            try {
                await fs.unlink(filePath);
            } catch (error) {
                if (isErrnoException(error) && error.code === 'ENOENT') {
                    return;
                }
                throw error;
            }
        });
    }

    /**
     * Chain writes to the same file so they never interleave.
     */
    private async queueWrite(filePath: string, operation: () => Promise<void>): Promise<void> {
        const previous = this.writeQueue.get(filePath) ?? Promise.resolve();
        const current = previous.catch(() => undefined).then(operation);
        this.writeQueue.set(filePath, current);

        try {
            await current;
        } finally {
            if (this.writeQueue.get(filePath) === current) {
                this.writeQueue.delete(filePath);
            }
        }
    }
}

// ============================================================================
// IN-MEMORY STATE STORE
// ============================================================================

/**
 * Process-local backend for tests and embedded use.
 */
export class InMemoryStateStore extends BaseStateStore {
    private readonly documents: Map<string, string> = new Map();

    protected async readDocument(key: string, kind: DocumentKind): Promise<string | null> {
        return this.documents.get(`${kind}:${key}`) ?? null;
    }

    protected async writeDocument(key: string, kind: DocumentKind, content: string): Promise<void> {
        this.documents.set(`${kind}:${key}`, content);
    }

    protected async deleteDocument(key: string, kind: DocumentKind): Promise<void> {
        this.documents.delete(`${kind}:${key}`);
    }

    /**
     * Raw persisted document, for inspection.
     */
    getRaw(scope: SyncScope, kind: DocumentKind = 'state'): string | null {
        return this.documents.get(`${kind}:${scopeKey(scope)}`) ?? null;
    }

    setRaw(scope: SyncScope, content: string, kind: DocumentKind = 'state'): void {
        this.documents.set(`${kind}:${scopeKey(scope)}`, content);
    }
}
