/**
 * @kubemend/core
 * Remediation pipeline: resolve the owning Deployment, decide, patch
 */

export * from './remediation/index.js';
