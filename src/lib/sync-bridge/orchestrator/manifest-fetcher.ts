/**
 * Sync Bridge - Manifest Fetcher
 * @module lib/sync-bridge/orchestrator/manifest-fetcher
 *
 * Knowledge repository access with retry, per-call timeout and error
 * normalization to KNOWLEDGE_UNAVAILABLE.
 */

import { RetryHandler } from '../../errors/retry';
import { KnowledgeUnavailableError, getErrorMessage, isSyncBridgeError } from '../../errors/types';
import { createLogger } from '../core/config';
import type { KnowledgeItem, KnowledgeManifest, KnowledgeRepository, SyncScope } from '../core/types';

const logger = createLogger('SyncBridge:Manifest');

export interface FetchOptions {
    abortSignal?: AbortSignal;
}

export class ManifestFetcher {
    constructor(
        private readonly repository: KnowledgeRepository,
        private readonly retry: RetryHandler,
        private readonly callTimeoutMs: number = 10_000
    ) {}

    async getManifest(scope: SyncScope, options: FetchOptions = {}): Promise<KnowledgeManifest> {
        const manifest = await this.call('knowledge.getManifest', () => this.repository.getManifest(scope), options);
        logger.debug('Manifest fetched', {
            commitId: manifest.commitId,
            items: Object.keys(manifest.items).length,
        });
        return manifest;
    }

    getItem(scope: SyncScope, id: string, options: FetchOptions = {}): Promise<KnowledgeItem | null> {
        return this.call('knowledge.getItem', () => this.repository.getItem(scope, id), options);
    }

    /**
     * Ids touched by any commit after `commitId`, sorted and deduplicated.
     */
    async getAffectedIds(scope: SyncScope, commitId: string, options: FetchOptions = {}): Promise<string[]> {
        const commits = await this.call(
            'knowledge.getCommitsSince',
            () => this.repository.getCommitsSince(scope, commitId),
            options
        );

        const ids = new Set<string>();
        for (const commit of commits) {
            for (const id of commit.affectedItemIds) {
                ids.add(id);
            }
        }
        return [...ids].sort();
    }

    private call<T>(operation: string, fn: () => Promise<T>, options: FetchOptions): Promise<T> {
        return this.retry.execute(
            async () => {
                try {
                    return await fn();
                } catch (error) {
                    if (isSyncBridgeError(error)) {
                        throw error;
                    }
                    throw new KnowledgeUnavailableError(
                        `${operation} failed: ${getErrorMessage(error)}`,
                        error instanceof Error ? error : undefined,
                        { operation }
                    );
                }
            },
            {
                operation,
                timeoutMs: this.callTimeoutMs,
                abortSignal: options.abortSignal,
                onRetry: (error, attempt, delayMs) => {
                    logger.warn(`Retrying ${operation}`, { attempt, delayMs, error: error.message });
                },
            }
        );
    }
}
