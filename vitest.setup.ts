/**
 * Centralized Vitest setup for the action engine.
 *
 * Keeps engine logging quiet during tests unless ACTION_ENGINE_LOG_LEVEL is
 * set explicitly, and restores spies between tests.
 */

import { afterEach, beforeAll, vi } from 'vitest';
import { setLogLevel } from './src/telemetry/logger.js';

beforeAll(() => {
  if (!process.env.ACTION_ENGINE_LOG_LEVEL) {
    setLogLevel('silent');
  }
});

afterEach(() => {
  vi.restoreAllMocks();
});
