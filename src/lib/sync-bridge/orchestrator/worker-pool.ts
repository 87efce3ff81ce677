/**
 * Sync Bridge - Worker Pool
 * @module lib/sync-bridge/orchestrator/worker-pool
 */

import { SyncAbortedError } from '../../errors/types';

/**
 * Run `worker` over `items` with at most `limit` in flight. Results keep the
 * input order. The first thrown error stops new work from starting and is
 * rethrown once the in-flight workers settle.
 */
export async function runWithConcurrency<T, R>(
    items: readonly T[],
    limit: number,
    worker: (item: T, index: number) => Promise<R>,
    abortSignal?: AbortSignal
): Promise<R[]> {
    const results: R[] = new Array<R>(items.length);
    let next = 0;
    const failures: unknown[] = [];

    const runLane = async (): Promise<void> => {
        while (failures.length === 0 && next < items.length) {
            if (abortSignal?.aborted) {
                failures.push(new SyncAbortedError('Sync run aborted'));
                return;
            }
            const index = next++;
            try {
                results[index] = await worker(items[index], index);
            } catch (error) {
                failures.push(error);
            }
        }
    };

    const lanes = Math.max(1, Math.min(limit, items.length));
    await Promise.all(Array.from({ length: lanes }, runLane));

    if (failures.length > 0) {
        throw failures[0];
    }
    return results;
}
