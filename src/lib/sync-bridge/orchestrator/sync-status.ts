/**
 * Sync Bridge - Run Status
 * @module lib/sync-bridge/orchestrator/sync-status
 *
 * Run state machine and recent run history for one scope.
 */

import { InternalSyncError } from '../../errors/types';
import { createLogger } from '../core/config';
import type { SyncResult } from '../core/types';

const logger = createLogger('SyncBridge:Status');

// ============================================================================
// TYPES
// ============================================================================

export type SyncRunState =
    | 'idle'
    | 'checkpointing'
    | 'detecting'
    | 'applying'
    | 'persisting'
    | 'failed'
    | 'rolled_back';

/**
 * Allowed transitions. Any phase may fail; a failed run either rolls back or,
 * when the rollback itself fails, returns straight to idle.
 */
export const SYNC_TRANSITIONS: Readonly<Record<SyncRunState, readonly SyncRunState[]>> = {
    idle: ['checkpointing'],
    checkpointing: ['detecting', 'failed'],
    detecting: ['applying', 'failed'],
    applying: ['persisting', 'failed'],
    persisting: ['idle', 'failed'],
    failed: ['rolled_back', 'idle'],
    rolled_back: ['idle'],
};

export interface StateChangeEvent {
    previousState: SyncRunState;
    currentState: SyncRunState;
    timestamp: number;
    reason?: string;
}

// ============================================================================
// SYNC STATUS TRACKER CLASS
// ============================================================================

export class SyncStatusTracker {
    private state: SyncRunState = 'idle';
    private history: SyncResult[] = [];
    private stateChangeHandlers: Set<(event: StateChangeEvent) => void> = new Set();

    constructor(
        private readonly maxHistoryLength: number = 100,
        private readonly now: () => number = () => Date.now()
    ) {}

    getState(): SyncRunState {
        return this.state;
    }

    isBusy(): boolean {
        return this.state !== 'idle';
    }

    canTransition(to: SyncRunState): boolean {
        return SYNC_TRANSITIONS[this.state].includes(to);
    }

    /**
     * @throws InternalSyncError on a transition the state machine forbids
     */
    transition(to: SyncRunState, reason?: string): void {
        if (!this.canTransition(to)) {
            throw new InternalSyncError(`Invalid sync state transition: ${this.state} -> ${to}`, undefined, {
                from: this.state,
                to,
            });
        }

        const event: StateChangeEvent = {
            previousState: this.state,
            currentState: to,
            timestamp: this.now(),
            reason,
        };
        this.state = to;

        logger.debug(`State: ${event.previousState} -> ${to}`, reason ? { reason } : undefined);

        for (const handler of this.stateChangeHandlers) {
            try {
                handler(event);
            } catch (error) {
                logger.error('State change handler failed', error);
            }
        }
    }

    /**
     * Return to idle from whatever state a failed run left behind.
     */
    reset(): void {
        if (this.state === 'idle') return;
        if (this.canTransition('idle')) {
            this.transition('idle', 'reset');
            return;
        }
        this.transition('failed', 'reset');
        this.transition('idle', 'reset');
    }

    onStateChange(handler: (event: StateChangeEvent) => void): () => void {
        this.stateChangeHandlers.add(handler);
        return () => {
            this.stateChangeHandlers.delete(handler);
        };
    }

    // ============================================================================
    // HISTORY
    // ============================================================================

    recordResult(result: SyncResult): void {
        this.history.unshift(result);
        if (this.history.length > this.maxHistoryLength) {
            this.history = this.history.slice(0, this.maxHistoryLength);
        }
    }

    getLastResult(): SyncResult | null {
        return this.history[0] ?? null;
    }

    getHistory(limit?: number): SyncResult[] {
        return limit ? this.history.slice(0, limit) : [...this.history];
    }
}
