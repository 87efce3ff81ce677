/**
 * Sync Bridge - Configuration
 * @module lib/sync-bridge/core/config
 *
 * Configuration defaults, environment overrides and the namespaced logger.
 */

import path from 'path';
import os from 'os';
import { z } from 'zod';
import { InvalidConfigError } from '../../errors/types';
import type { ConflictType, ResolutionAction } from './types';

// ============================================================================
// ENVIRONMENT DETECTION
// ============================================================================

const isDevelopment = process.env.NODE_ENV === 'development';

// ============================================================================
// LOGGING
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
    return value in LOG_LEVEL_ORDER;
}

/**
 * Resolve the active log level. Read on every call so tests can stub the
 * environment variable.
 */
export function getLogLevel(): LogLevel {
    const raw = process.env.SYNC_BRIDGE_LOG_LEVEL?.toLowerCase();
    if (raw && isLogLevel(raw)) {
        return raw;
    }
    return isDevelopment ? 'debug' : 'info';
}

function enabled(level: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[getLogLevel()];
}

export interface Logger {
    debug(message: string, data?: unknown): void;
    info(message: string, data?: unknown): void;
    warn(message: string, data?: unknown): void;
    error(message: string, error?: unknown): void;
}

/**
 * Create a namespaced console logger, e.g. `createLogger('SyncBridge:Delta')`.
 */
export function createLogger(namespace: string): Logger {
    return {
        debug: (message, data) => {
            if (enabled('debug')) {
                console.log(`[${namespace}:DEBUG] ${message}`, data ?? '');
            }
        },
        info: (message, data) => {
            if (enabled('info')) {
                console.log(`[${namespace}:INFO] ${message}`, data ?? '');
            }
        },
        warn: (message, data) => {
            if (enabled('warn')) {
                console.warn(`[${namespace}:WARN] ${message}`, data ?? '');
            }
        },
        error: (message, error) => {
            if (enabled('error')) {
                console.error(`[${namespace}:ERROR] ${message}`, error ?? '');
            }
        },
    };
}

// ============================================================================
// CONFIGURATION SCHEMA
// ============================================================================

const resolutionActionSchema = z.enum(['update_memory', 'delete_memory', 'keep_memory', 'merge', 'manual']);

const conflictPolicySchema = z
    .object({
        hash_mismatch: resolutionActionSchema,
        orphaned_pointer: resolutionActionSchema,
        duplicate_pointer: resolutionActionSchema,
        status_change: resolutionActionSchema,
        layer_mismatch: resolutionActionSchema,
    })
    .partial();

export const syncBridgeConfigSchema = z.object({
    stateDir: z.string().min(1),
    concurrency: z.number().int().min(1).max(64),
    callTimeoutMs: z.number().int().nonnegative(),
    retry: z.object({
        maxAttempts: z.number().int().min(1),
        initialDelayMs: z.number().nonnegative(),
        maxDelayMs: z.number().nonnegative(),
        backoffMultiplier: z.number().min(1),
        jitterFactor: z.number().min(0).max(1),
    }),
    leaseTtlMs: z.number().int().positive(),
    pointer: z.object({
        maxLength: z.number().int().min(64),
        maxBlockingConstraints: z.number().int().nonnegative(),
    }),
    failedItemRetentionMs: z.number().int().positive(),
    triggers: z.object({
        stalenessThresholdMs: z.number().int().positive(),
        sessionThreshold: z.number().int().positive(),
        scheduleIntervalMs: z.number().int().positive(),
    }),
    conflictPolicy: conflictPolicySchema,
});

export type SyncBridgeConfig = z.infer<typeof syncBridgeConfigSchema>;
export type ConflictPolicyOverrides = Partial<Record<ConflictType, ResolutionAction>>;

/**
 * Deep-partial overrides accepted by `createSyncBridgeConfig`.
 */
export interface SyncBridgeConfigOverrides {
    stateDir?: string;
    concurrency?: number;
    callTimeoutMs?: number;
    retry?: Partial<SyncBridgeConfig['retry']>;
    leaseTtlMs?: number;
    pointer?: Partial<SyncBridgeConfig['pointer']>;
    failedItemRetentionMs?: number;
    triggers?: Partial<SyncBridgeConfig['triggers']>;
    conflictPolicy?: ConflictPolicyOverrides;
}

// ============================================================================
// DEFAULTS
// ============================================================================

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_SYNC_BRIDGE_CONFIG: SyncBridgeConfig = {
    stateDir: path.join(os.tmpdir(), 'sync-bridge'),
    concurrency: 4,
    callTimeoutMs: 10_000,
    retry: {
        maxAttempts: 3,
        initialDelayMs: 200,
        maxDelayMs: 5000,
        backoffMultiplier: 2,
        jitterFactor: 0.1,
    },
    leaseTtlMs: 5 * 60 * 1000,
    pointer: {
        maxLength: 1000,
        maxBlockingConstraints: 3,
    },
    failedItemRetentionMs: 30 * DAY_MS,
    triggers: {
        stalenessThresholdMs: 60 * 60 * 1000,
        sessionThreshold: 10,
        scheduleIntervalMs: 15 * 60 * 1000,
    },
    conflictPolicy: {},
};

// ============================================================================
// ENVIRONMENT OVERRIDES
// ============================================================================

type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string): number | undefined {
    const raw = env[key];
    if (raw === undefined || raw.trim() === '') {
        return undefined;
    }
    // NaN is left for the schema to reject
    return Number(raw);
}

/**
 * Read `SYNC_BRIDGE_*` variables into overrides.
 */
export function readEnvOverrides(env: Env = process.env): SyncBridgeConfigOverrides {
    const overrides: SyncBridgeConfigOverrides = {};

    if (env.SYNC_BRIDGE_STATE_DIR) overrides.stateDir = env.SYNC_BRIDGE_STATE_DIR;

    const concurrency = readNumber(env, 'SYNC_BRIDGE_CONCURRENCY');
    if (concurrency !== undefined) overrides.concurrency = concurrency;

    const callTimeoutMs = readNumber(env, 'SYNC_BRIDGE_CALL_TIMEOUT_MS');
    if (callTimeoutMs !== undefined) overrides.callTimeoutMs = callTimeoutMs;

    const maxAttempts = readNumber(env, 'SYNC_BRIDGE_MAX_ATTEMPTS');
    if (maxAttempts !== undefined) overrides.retry = { maxAttempts };

    const leaseTtlMs = readNumber(env, 'SYNC_BRIDGE_LEASE_TTL_MS');
    if (leaseTtlMs !== undefined) overrides.leaseTtlMs = leaseTtlMs;

    const maxLength = readNumber(env, 'SYNC_BRIDGE_POINTER_MAX_LENGTH');
    if (maxLength !== undefined) overrides.pointer = { maxLength };

    const staleness = readNumber(env, 'SYNC_BRIDGE_STALENESS_MS');
    const interval = readNumber(env, 'SYNC_BRIDGE_SCHEDULE_INTERVAL_MS');
    if (staleness !== undefined || interval !== undefined) {
        overrides.triggers = {};
        if (staleness !== undefined) overrides.triggers.stalenessThresholdMs = staleness;
        if (interval !== undefined) overrides.triggers.scheduleIntervalMs = interval;
    }

    return overrides;
}

// ============================================================================
// CONFIGURATION FACTORY
// ============================================================================

function merge(base: SyncBridgeConfig, overrides: SyncBridgeConfigOverrides): SyncBridgeConfig {
    return {
        stateDir: overrides.stateDir ?? base.stateDir,
        concurrency: overrides.concurrency ?? base.concurrency,
        callTimeoutMs: overrides.callTimeoutMs ?? base.callTimeoutMs,
        retry: { ...base.retry, ...overrides.retry },
        leaseTtlMs: overrides.leaseTtlMs ?? base.leaseTtlMs,
        pointer: { ...base.pointer, ...overrides.pointer },
        failedItemRetentionMs: overrides.failedItemRetentionMs ?? base.failedItemRetentionMs,
        triggers: { ...base.triggers, ...overrides.triggers },
        conflictPolicy: { ...base.conflictPolicy, ...overrides.conflictPolicy },
    };
}

/**
 * Create a validated configuration. Precedence: explicit overrides, then
 * environment variables, then defaults.
 *
 * @throws InvalidConfigError listing every schema issue
 */
export function createSyncBridgeConfig(
    overrides: SyncBridgeConfigOverrides = {},
    env: Env = process.env
): SyncBridgeConfig {
    const merged = merge(merge(DEFAULT_SYNC_BRIDGE_CONFIG, readEnvOverrides(env)), overrides);
    const result = syncBridgeConfigSchema.safeParse(merged);

    if (!result.success) {
        throw new InvalidConfigError(
            result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`)
        );
    }

    return result.data;
}

// ============================================================================
// PERSISTENCE CONFIG
// ============================================================================

export const PERSISTENCE_CONFIG = {
    stateFileSuffix: '.sync-state.json',
    prettyPrint: isDevelopment,
    leaseKeyPrefix: 'sync_lock:',
} as const;
