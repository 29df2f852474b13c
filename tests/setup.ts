/**
 * Vitest global test setup
 */
import { afterEach } from 'vitest';
import { resetConfig, resetLogger } from '@kubemend/shared';

// Set test environment variables
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
process.env.API_TOKEN = 'test-secret';
process.env.K8S_DRY_RUN = 'false';
process.env.REMEDIATION_RETRY_DELAY_MS = '0';

// Config and logger are cached singletons; tests that touch env must not leak
afterEach(() => {
  resetConfig();
  resetLogger();
});
