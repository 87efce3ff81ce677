/**
 * Sync Bridge - Scope Lease
 * @module lib/sync-bridge/orchestrator/sync-lease
 *
 * One writer per scope. Leases carry a TTL so a crashed holder cannot block
 * the scope forever.
 */

import { randomUUID } from 'crypto';
import { LeaseLostError } from '../../errors/types';
import { PERSISTENCE_CONFIG, createLogger } from '../core/config';
import { scopeKey } from '../core/hashing';
import type { SyncScope } from '../core/types';

const logger = createLogger('SyncBridge:Lease');

export interface SyncLease {
    key: string;
    holder: string;
    token: string;
    acquiredAt: number;
    expiresAt: number;
}

export interface SyncLeaseManager {
    /** Resolves to null when another holder owns an unexpired lease */
    acquire(key: string, holder: string, ttlMs: number): Promise<SyncLease | null>;
    /** Extends a lease still owned by its token; null once another holder took it */
    renew(lease: SyncLease, ttlMs: number): Promise<SyncLease | null>;
    /** True while the token owns the key and the lease has not expired */
    isCurrent(lease: SyncLease): Promise<boolean>;
    /** Releasing a lease that was lost or already released is a no-op */
    release(lease: SyncLease): Promise<void>;
}

export function leaseKey(scope: SyncScope): string {
    return `${PERSISTENCE_CONFIG.leaseKeyPrefix}${scopeKey(scope)}`;
}

/**
 * Process-local lease table, keyed like the shared lock it stands for.
 */
export class InMemoryLeaseManager implements SyncLeaseManager {
    private leases: Map<string, SyncLease> = new Map();

    constructor(private readonly now: () => number = () => Date.now()) {}

    async acquire(key: string, holder: string, ttlMs: number): Promise<SyncLease | null> {
        const now = this.now();
        const current = this.leases.get(key);

        if (current && current.expiresAt > now) {
            logger.debug(`Lease busy: ${key}`, { holder: current.holder });
            return null;
        }

        if (current) {
            logger.warn(`Reclaiming expired lease: ${key}`, { previousHolder: current.holder });
        }

        const lease: SyncLease = {
            key,
            holder,
            token: randomUUID(),
            acquiredAt: now,
            expiresAt: now + ttlMs,
        };
        this.leases.set(key, lease);
        return lease;
    }

    async renew(lease: SyncLease, ttlMs: number): Promise<SyncLease | null> {
        const current = this.leases.get(lease.key);
        if (current?.token !== lease.token) {
            return null;
        }

        const renewed: SyncLease = { ...current, expiresAt: this.now() + ttlMs };
        this.leases.set(lease.key, renewed);
        return renewed;
    }

    async isCurrent(lease: SyncLease): Promise<boolean> {
        const current = this.leases.get(lease.key);
        return current?.token === lease.token && current.expiresAt > this.now();
    }

    async release(lease: SyncLease): Promise<void> {
        const current = this.leases.get(lease.key);
        if (current?.token === lease.token) {
            this.leases.delete(lease.key);
        }
    }

    isHeld(key: string): boolean {
        const current = this.leases.get(key);
        return current !== undefined && current.expiresAt > this.now();
    }
}

// ============================================================================
// LEASE KEEPER
// ============================================================================

/**
 * Renews a held lease on an interval for the length of a run. Once a renewal
 * finds the lease taken, the keeper stays lost and `assertHeld` throws.
 */
export class LeaseKeeper {
    private timer: ReturnType<typeof setInterval> | null = null;
    private pending: Promise<void> = Promise.resolve();
    private lost = false;

    constructor(
        private readonly manager: SyncLeaseManager,
        private lease: SyncLease,
        private readonly ttlMs: number
    ) {}

    get current(): SyncLease {
        return this.lease;
    }

    start(): void {
        const intervalMs = Math.max(1, Math.floor(this.ttlMs / 3));
        this.timer = setInterval(() => {
            this.pending = this.pending.then(() => this.renew());
        }, intervalMs);
        this.timer.unref?.();
    }

    async stop(): Promise<void> {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
        await this.pending;
    }

    /**
     * Renew once more and confirm ownership. Call right before persisting.
     */
    async assertHeld(): Promise<void> {
        await this.pending;
        await this.renew();
        if (this.lost || !(await this.manager.isCurrent(this.lease))) {
            this.lost = true;
            throw new LeaseLostError(this.lease.key);
        }
    }

    private async renew(): Promise<void> {
        if (this.lost) {
            return;
        }
        try {
            const renewed = await this.manager.renew(this.lease, this.ttlMs);
            if (renewed) {
                this.lease = renewed;
            } else {
                this.lost = true;
                logger.warn(`Lease lost: ${this.lease.key}`, { holder: this.lease.holder });
            }
        } catch (error) {
            logger.warn(`Lease renewal failed: ${this.lease.key}`, error);
        }
    }
}
