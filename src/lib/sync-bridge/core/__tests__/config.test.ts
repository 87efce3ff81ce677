/**
 * Configuration and Logger Unit Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
    DEFAULT_SYNC_BRIDGE_CONFIG,
    createLogger,
    createSyncBridgeConfig,
    getLogLevel,
    readEnvOverrides,
} from '../config';
import { InvalidConfigError } from '../../../errors/types';

describe('createSyncBridgeConfig', () => {
    it('returns the defaults with no overrides', () => {
        expect(createSyncBridgeConfig({}, {})).toEqual(DEFAULT_SYNC_BRIDGE_CONFIG);
    });

    it('applies environment variables over defaults', () => {
        const config = createSyncBridgeConfig({}, {
            SYNC_BRIDGE_CONCURRENCY: '8',
            SYNC_BRIDGE_STATE_DIR: '/var/lib/sync',
            SYNC_BRIDGE_STALENESS_MS: '120000',
        });

        expect(config.concurrency).toBe(8);
        expect(config.stateDir).toBe('/var/lib/sync');
        expect(config.triggers).toEqual({
            stalenessThresholdMs: 120_000,
            sessionThreshold: 10,
            scheduleIntervalMs: 900_000,
        });
    });

    it('lets explicit overrides win over the environment', () => {
        const config = createSyncBridgeConfig(
            { concurrency: 2, retry: { maxAttempts: 5 } },
            { SYNC_BRIDGE_CONCURRENCY: '8', SYNC_BRIDGE_MAX_ATTEMPTS: '1' }
        );

        expect(config.concurrency).toBe(2);
        expect(config.retry).toEqual({ ...DEFAULT_SYNC_BRIDGE_CONFIG.retry, maxAttempts: 5 });
    });

    it('merges conflict policy overrides', () => {
        const config = createSyncBridgeConfig({ conflictPolicy: { orphaned_pointer: 'keep_memory' } }, {});

        expect(config.conflictPolicy).toEqual({ orphaned_pointer: 'keep_memory' });
    });

    it('rejects out of range values with every issue listed', () => {
        try {
            createSyncBridgeConfig({ concurrency: 0, pointer: { maxLength: 10 } }, {});
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(InvalidConfigError);
            if (error instanceof InvalidConfigError) {
                expect(error.issues).toEqual([
                    'concurrency: Number must be greater than or equal to 1',
                    'pointer.maxLength: Number must be greater than or equal to 64',
                ]);
            }
        }
    });

    it('rejects non-numeric environment values', () => {
        expect(() => createSyncBridgeConfig({}, { SYNC_BRIDGE_LEASE_TTL_MS: 'soon' })).toThrow(InvalidConfigError);
    });
});

describe('readEnvOverrides', () => {
    it('ignores unset and blank variables', () => {
        expect(readEnvOverrides({ SYNC_BRIDGE_CONCURRENCY: '  ' })).toEqual({});
    });
});

describe('createLogger', () => {
    afterEach(() => {
        vi.stubEnv('SYNC_BRIDGE_LOG_LEVEL', 'silent');
        vi.restoreAllMocks();
    });

    it('is silenced for tests', () => {
        expect(getLogLevel()).toBe('silent');
    });

    it('prefixes the namespace and filters by level', () => {
        vi.stubEnv('SYNC_BRIDGE_LOG_LEVEL', 'warn');
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

        const logger = createLogger('SyncBridge:Test');
        logger.info('hidden');
        logger.warn('visible', { attempt: 2 });

        expect(log).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledWith('[SyncBridge:Test:WARN] visible', { attempt: 2 });
    });
});
