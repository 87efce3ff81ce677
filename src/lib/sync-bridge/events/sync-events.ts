/**
 * Sync Bridge - Events
 * @module lib/sync-bridge/events/sync-events
 *
 * Typed pub/sub for run lifecycle and conflict events. Handler failures are
 * logged and never reach the emitter's caller.
 */

import { randomUUID } from 'crypto';
import { createLogger } from '../core/config';
import type { RunMode, SyncConflict, SyncFailure, SyncResult } from '../core/types';
import type { ResolutionOutcome } from '../conflict/conflict-resolver';

const logger = createLogger('SyncBridge:Events');

// ============================================================================
// EVENT TYPES
// ============================================================================

export interface SyncEventPayloads {
    'sync.started': { runId: string; mode: RunMode; scopeKey: string };
    'sync.completed': { scopeKey: string; result: SyncResult };
    'sync.failed': { runId: string; mode: RunMode; scopeKey: string; code: string; error: string };
    'sync.rolled_back': { runId: string; scopeKey: string; code: string };
    'sync.item_failed': { runId: string; scopeKey: string; failure: SyncFailure };
    'conflict.detected': { scopeKey: string; conflict: SyncConflict };
    'conflict.resolved': { scopeKey: string; outcome: ResolutionOutcome };
}

export type SyncEventType = keyof SyncEventPayloads;

export const SYNC_EVENT_TYPES: readonly SyncEventType[] = [
    'sync.started',
    'sync.completed',
    'sync.failed',
    'sync.rolled_back',
    'sync.item_failed',
    'conflict.detected',
    'conflict.resolved',
];

export interface SyncEvent<K extends SyncEventType = SyncEventType> {
    id: string;
    type: K;
    timestamp: number;
    payload: SyncEventPayloads[K];
}

export type SyncEventHandler<K extends SyncEventType = SyncEventType> =
    (event: SyncEvent<K>) => void | Promise<void>;

export interface Subscription {
    unsubscribe: () => void;
}

type HandlerTable = { [K in SyncEventType]: Set<SyncEventHandler<K>> };

// ============================================================================
// SYNC EVENT EMITTER CLASS
// ============================================================================

export class SyncEventEmitter {
    private handlers: HandlerTable = {
        'sync.started': new Set(),
        'sync.completed': new Set(),
        'sync.failed': new Set(),
        'sync.rolled_back': new Set(),
        'sync.item_failed': new Set(),
        'conflict.detected': new Set(),
        'conflict.resolved': new Set(),
    };
    private wildcardHandlers: Set<SyncEventHandler> = new Set();

    constructor(private readonly now: () => number = () => Date.now()) {}

    on<K extends SyncEventType>(type: K, handler: SyncEventHandler<K>): Subscription {
        const set: Set<SyncEventHandler<K>> = this.handlers[type];
        set.add(handler);

        return {
            unsubscribe: () => {
                set.delete(handler);
            },
        };
    }

    onAll(handler: SyncEventHandler): Subscription {
        this.wildcardHandlers.add(handler);

        return {
            unsubscribe: () => {
                this.wildcardHandlers.delete(handler);
            },
        };
    }

    /**
     * Emit an event to typed and wildcard subscribers. Never rejects.
     */
    async emit<K extends SyncEventType>(type: K, payload: SyncEventPayloads[K]): Promise<void> {
        const event: SyncEvent<K> = {
            id: randomUUID(),
            type,
            timestamp: this.now(),
            payload,
        };

        const typed: Set<SyncEventHandler<K>> = this.handlers[type];
        const calls: Array<() => void | Promise<void>> = [];
        for (const handler of typed) {
            calls.push(() => handler(event));
        }
        for (const handler of this.wildcardHandlers) {
            calls.push(() => handler(event));
        }

        if (calls.length === 0) {
            return;
        }

        const results = await Promise.allSettled(
            calls.map(call => {
                try {
                    return Promise.resolve(call());
                } catch (error) {
                    return Promise.reject(error);
                }
            })
        );

        for (const result of results) {
            if (result.status === 'rejected') {
                logger.error(`Event handler error for ${type}`, result.reason);
            }
        }
    }

    removeAllListeners(): void {
        for (const type of SYNC_EVENT_TYPES) {
            this.handlers[type].clear();
        }
        this.wildcardHandlers.clear();
    }

    listenerCount(type?: SyncEventType): number {
        if (type) {
            return this.handlers[type].size;
        }
        return SYNC_EVENT_TYPES.reduce((sum, t) => sum + this.handlers[t].size, this.wildcardHandlers.size);
    }
}
