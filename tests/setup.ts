/**
 * Vitest setup file
 * Runs before all tests
 */

// Required for tsyringe DI decorators
import 'reflect-metadata';

import { afterAll } from 'vitest';

// Loaded lazily so the setup file does not cache application modules
// before a test file's vi.mock() calls are applied.
afterAll(async () => {
  const { teardownTest } = await import('./di/test-container.js');
  teardownTest();
});

// NOTE: Do not register process-level signal handlers in tests.
// Vitest owns the process lifecycle; cleanup should happen via test hooks above.
