/**
 * Sync Bridge - Retry Handler
 * @module lib/errors/retry
 *
 * Exponential backoff with jitter and a per-attempt timeout for collaborator
 * calls. Backoff sleeps are cancellable through an AbortSignal.
 */

import {
    MaxRetriesExceededError,
    SyncAbortedError,
    TimeoutError,
    isRetryableError,
    wrapError,
} from './types';

// ============================================================================
// CONFIGURATION
// ============================================================================

export interface RetryConfig {
    maxAttempts: number;
    initialDelayMs: number;
    maxDelayMs: number;
    backoffMultiplier: number;
    jitterFactor: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
    maxAttempts: 3,
    initialDelayMs: 200,
    maxDelayMs: 5000,
    backoffMultiplier: 2,
    jitterFactor: 0.1,
};

// ============================================================================
// RETRY OPTIONS
// ============================================================================

export interface RetryOptions {
    /** Label used in timeout errors and retry logs */
    operation?: string;
    /** Per-attempt timeout; 0 or undefined disables it */
    timeoutMs?: number;
    onRetry?: (error: Error, attempt: number, delayMs: number) => void;
    shouldRetry?: (error: Error, attempt: number) => boolean;
    abortSignal?: AbortSignal;
}

// ============================================================================
// RETRY HANDLER CLASS
// ============================================================================

export class RetryHandler {
    private readonly config: RetryConfig;

    constructor(config: Partial<RetryConfig> = {}) {
        this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
    }

    getConfig(): RetryConfig {
        return { ...this.config };
    }

    /**
     * Execute an operation, retrying transient failures.
     * Non-retryable errors and the last failed attempt's error are rethrown
     * as sync bridge errors; aborts are never retried.
     */
    async execute<T>(
        operation: () => Promise<T>,
        options: RetryOptions = {}
    ): Promise<T> {
        const startTime = Date.now();
        let lastError: Error | null = null;

        for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
            if (options.abortSignal?.aborted) {
                throw new SyncAbortedError('Operation aborted', { operation: options.operation });
            }

            try {
                return await this.runAttempt(operation, options);
            } catch (error) {
                lastError = error instanceof Error ? error : new Error(String(error));

                if (lastError instanceof SyncAbortedError) {
                    throw lastError;
                }

                const shouldRetry = this.shouldRetry(lastError, attempt, options);

                if (!shouldRetry || attempt >= this.config.maxAttempts) {
                    throw wrapError(lastError, {
                        attempts: attempt,
                        totalTimeMs: Date.now() - startTime,
                    });
                }

                const delay = this.calculateDelay(attempt);
                options.onRetry?.(lastError, attempt, delay);

                await this.sleep(delay, options.abortSignal);
            }
        }

        // Unreachable while maxAttempts >= 1
        throw new MaxRetriesExceededError(
            this.config.maxAttempts,
            lastError ?? new Error('Unknown error'),
            { totalTimeMs: Date.now() - startTime }
        );
    }

    /**
     * Calculate delay with exponential backoff and jitter.
     */
    calculateDelay(attempt: number): number {
        const exponentialDelay =
            this.config.initialDelayMs *
            Math.pow(this.config.backoffMultiplier, attempt - 1);

        const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);

        // Jitter range: [delay * (1 - jitter), delay * (1 + jitter)]
        const jitterRange = cappedDelay * this.config.jitterFactor;
        const jitter = (Math.random() * 2 - 1) * jitterRange;

        return Math.max(0, Math.round(cappedDelay + jitter));
    }

    private async runAttempt<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
        const timeoutMs = options.timeoutMs ?? 0;
        const signal = options.abortSignal;

        if (timeoutMs <= 0 && !signal) {
            return operation();
        }

        return new Promise<T>((resolve, reject) => {
            let settled = false;
            let timer: ReturnType<typeof setTimeout> | null = null;

            const finish = (): void => {
                settled = true;
                if (timer) {
                    clearTimeout(timer);
                }
                signal?.removeEventListener('abort', onAbort);
            };

            const onAbort = (): void => {
                if (settled) return;
                finish();
                reject(new SyncAbortedError('Operation aborted', { operation: options.operation }));
            };

            if (timeoutMs > 0) {
                timer = setTimeout(() => {
                    if (settled) return;
                    finish();
                    reject(new TimeoutError(options.operation ?? 'operation', timeoutMs));
                }, timeoutMs);
            }

            signal?.addEventListener('abort', onAbort, { once: true });

            operation().then(
                value => {
                    if (settled) return;
                    finish();
                    resolve(value);
                },
                (error: unknown) => {
                    if (settled) return;
                    finish();
                    reject(error);
                }
            );
        });
    }

    private shouldRetry(error: Error, attempt: number, options: RetryOptions): boolean {
        if (options.shouldRetry) {
            return options.shouldRetry(error, attempt);
        }

        return isRetryableError(error);
    }

    /**
     * Sleep with abort signal support.
     */
    private sleep(ms: number, abortSignal?: AbortSignal): Promise<void> {
        return new Promise((resolve, reject) => {
            if (abortSignal?.aborted) {
                reject(new SyncAbortedError());
                return;
            }

            const abortHandler = (): void => {
                clearTimeout(timeout);
                reject(new SyncAbortedError());
            };

            const timeout = setTimeout(() => {
                abortSignal?.removeEventListener('abort', abortHandler);
                resolve();
            }, ms);

            abortSignal?.addEventListener('abort', abortHandler, { once: true });
        });
    }
}

// ============================================================================
// CONVENIENCE FUNCTIONS
// ============================================================================

/**
 * Create a retry handler with custom configuration.
 */
export function createRetryHandler(config: Partial<RetryConfig> = {}): RetryHandler {
    return new RetryHandler(config);
}
