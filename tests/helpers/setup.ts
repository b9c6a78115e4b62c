/**
 * Vitest Global Setup
 * This file runs before all tests
 */

import { config } from 'dotenv';
import { afterEach, vi } from 'vitest';

// Optional test environment; tests pass their own env to the config loaders
config({ path: '.env.test' });

afterEach(() => {
  vi.unstubAllGlobals();
});
