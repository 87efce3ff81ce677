/**
 * Sync Bridge - Error Types
 * @module lib/errors/types
 *
 * Error taxonomy shared by every sync component.
 */

// ============================================================================
// ERROR CODES
// ============================================================================

export type SyncErrorCode =
    | 'KNOWLEDGE_UNAVAILABLE'
    | 'MEMORY_UNAVAILABLE'
    | 'TIMEOUT'
    | 'STATE_CORRUPTED'
    | 'CHECKPOINT_FAILED'
    | 'PERSIST_FAILED'
    | 'ROLLBACK_FAILED'
    | 'CONFLICT_UNRESOLVED'
    | 'LEASE_UNAVAILABLE'
    | 'ABORTED'
    | 'MAX_RETRIES_EXCEEDED'
    | 'INVALID_CONFIG'
    | 'INTERNAL_ERROR';

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class SyncBridgeError extends Error {
    public readonly code: SyncErrorCode;
    public readonly retryable: boolean;
    public readonly timestamp: Date;
    public readonly context: Record<string, unknown>;

    constructor(
        message: string,
        code: SyncErrorCode,
        retryable: boolean = false,
        context: Record<string, unknown> = {}
    ) {
        super(message);
        this.name = this.constructor.name;
        this.code = code;
        this.retryable = retryable;
        this.timestamp = new Date();
        this.context = context;

        Object.setPrototypeOf(this, new.target.prototype);

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            message: this.message,
            code: this.code,
            retryable: this.retryable,
            timestamp: this.timestamp.toISOString(),
            context: this.context,
            stack: this.stack,
        };
    }
}

// ============================================================================
// COLLABORATOR ERRORS (retryable)
// ============================================================================

export class KnowledgeUnavailableError extends SyncBridgeError {
    public readonly originalError?: Error;

    constructor(message: string, originalError?: Error, context: Record<string, unknown> = {}) {
        super(message, 'KNOWLEDGE_UNAVAILABLE', true, context);
        this.originalError = originalError;
    }
}

export class MemoryUnavailableError extends SyncBridgeError {
    public readonly originalError?: Error;

    constructor(message: string, originalError?: Error, context: Record<string, unknown> = {}) {
        super(message, 'MEMORY_UNAVAILABLE', true, context);
        this.originalError = originalError;
    }
}

export class TimeoutError extends SyncBridgeError {
    public readonly timeoutMs: number;

    constructor(operation: string, timeoutMs: number, context: Record<string, unknown> = {}) {
        super(`${operation} timed out after ${timeoutMs}ms`, 'TIMEOUT', true, { ...context, operation });
        this.timeoutMs = timeoutMs;
    }
}

// ============================================================================
// STATE ERRORS (fatal)
// ============================================================================

export class StateCorruptedError extends SyncBridgeError {
    public readonly issues: string[];

    constructor(message: string, issues: string[] = [], context: Record<string, unknown> = {}) {
        super(message, 'STATE_CORRUPTED', false, context);
        this.issues = issues;
    }
}

export class CheckpointFailedError extends SyncBridgeError {
    public readonly originalError?: Error;

    constructor(scopeKey: string, originalError?: Error) {
        super(
            `Failed to checkpoint sync state for ${scopeKey}: ${originalError?.message ?? 'unknown error'}`,
            'CHECKPOINT_FAILED',
            false,
            { scopeKey }
        );
        this.originalError = originalError;
    }
}

export class PersistenceFailedError extends SyncBridgeError {
    public readonly originalError?: Error;

    constructor(scopeKey: string, originalError?: Error) {
        super(
            `Failed to persist sync state for ${scopeKey}: ${originalError?.message ?? 'unknown error'}`,
            'PERSIST_FAILED',
            false,
            { scopeKey }
        );
        this.originalError = originalError;
    }
}

export class RollbackFailedError extends SyncBridgeError {
    public readonly originalError?: Error;
    public readonly triggeredBy?: Error;

    constructor(scopeKey: string, originalError?: Error, triggeredBy?: Error) {
        super(
            `Rollback failed for ${scopeKey}; sync state must be presumed unreliable: ${originalError?.message ?? 'unknown error'}`,
            'ROLLBACK_FAILED',
            false,
            { scopeKey, triggeredBy: triggeredBy?.message }
        );
        this.originalError = originalError;
        this.triggeredBy = triggeredBy;
    }
}

// ============================================================================
// RUN ERRORS
// ============================================================================

export class ConflictUnresolvedError extends SyncBridgeError {
    public readonly conflictType: string;
    public readonly memoryId: string;

    constructor(conflictType: string, memoryId: string, knowledgeId: string) {
        super(
            `Conflict ${conflictType} on ${memoryId} requires a manual decision`,
            'CONFLICT_UNRESOLVED',
            false,
            { conflictType, memoryId, knowledgeId }
        );
        this.conflictType = conflictType;
        this.memoryId = memoryId;
    }
}

export class LeaseUnavailableError extends SyncBridgeError {
    public readonly leaseKey: string;

    constructor(leaseKey: string) {
        super(`Sync lease already held: ${leaseKey}`, 'LEASE_UNAVAILABLE', false, { leaseKey });
        this.leaseKey = leaseKey;
    }
}

/**
 * The run's lease expired and another holder took the scope. The new holder
 * owns the persisted state, so the run neither saves nor rolls back.
 */
export class LeaseLostError extends SyncBridgeError {
    public readonly leaseKey: string;

    constructor(leaseKey: string) {
        super(`Sync lease lost before persisting: ${leaseKey}`, 'LEASE_UNAVAILABLE', false, { leaseKey, lost: true });
        this.leaseKey = leaseKey;
    }
}

export class SyncAbortedError extends SyncBridgeError {
    constructor(reason: string = 'Operation aborted', context: Record<string, unknown> = {}) {
        super(reason, 'ABORTED', false, context);
    }
}

export class MaxRetriesExceededError extends SyncBridgeError {
    public readonly attempts: number;
    public readonly lastError: Error;

    constructor(attempts: number, lastError: Error, context: Record<string, unknown> = {}) {
        super(
            `Max retries exceeded after ${attempts} attempts. Last error: ${lastError.message}`,
            'MAX_RETRIES_EXCEEDED',
            false,
            context
        );
        this.attempts = attempts;
        this.lastError = lastError;
    }
}

export class InvalidConfigError extends SyncBridgeError {
    public readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid sync bridge configuration: ${issues.join('; ')}`, 'INVALID_CONFIG', false, { issues });
        this.issues = issues;
    }
}

export class InternalSyncError extends SyncBridgeError {
    public readonly originalError?: Error;

    constructor(message: string, originalError?: Error, context: Record<string, unknown> = {}) {
        super(message, 'INTERNAL_ERROR', false, context);
        this.originalError = originalError;
    }
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

export function isSyncBridgeError(error: unknown): error is SyncBridgeError {
    return error instanceof SyncBridgeError;
}

export function isRetryableError(error: unknown): boolean {
    if (isSyncBridgeError(error)) {
        return error.retryable;
    }
    return false;
}

export function getErrorCode(error: unknown): SyncErrorCode {
    if (isSyncBridgeError(error)) {
        return error.code;
    }
    return 'INTERNAL_ERROR';
}

export function getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function wrapError(error: unknown, context: Record<string, unknown> = {}): SyncBridgeError {
    if (isSyncBridgeError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new InternalSyncError(error.message, error, context);
    }

    return new InternalSyncError(String(error), undefined, context);
}
