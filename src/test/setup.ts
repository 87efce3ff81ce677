/**
 * Global Test Setup
 *
 * Executed before every test file. Keeps sync bridge logging quiet and
 * resets mocks between tests.
 */

import { afterEach, vi } from 'vitest';

vi.stubEnv('SYNC_BRIDGE_LOG_LEVEL', 'silent');

afterEach(() => {
    vi.clearAllMocks();
});
