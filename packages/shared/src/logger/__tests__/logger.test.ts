/**
 * Logger tests
 */
import { describe, it, expect, vi } from 'vitest';
import { getLogger, logRemediationOutcome, resetLogger } from '../index.js';

describe('logger', () => {
  it('should reuse one instance until reset', () => {
    const first = getLogger();

    expect(getLogger()).toBe(first);

    resetLogger();
    expect(getLogger()).not.toBe(first);
  });

  it('should take its level from LOG_LEVEL', () => {
    expect(getLogger().level).toBe('error');
  });

  it('should log successful remediations at info', () => {
    const info = vi.spyOn(getLogger(), 'info');

    logRemediationOutcome({
      status: 'success',
      action: 'scale',
      resourceName: 'web',
      namespace: 'default',
      previousValue: '1',
      newValue: '2',
      attempts: 1,
      dryRun: true,
    });

    expect(info).toHaveBeenCalledWith(
      {
        event: 'remediation_outcome',
        status: 'success',
        action: 'scale',
        resourceName: 'web',
        namespace: 'default',
        previousValue: '1',
        newValue: '2',
        attempts: 1,
        dryRun: true,
      },
      'Remediation scale on default/web: success (dry-run)'
    );
  });

  it('should log failed remediations at error', () => {
    const error = vi.spyOn(getLogger(), 'error');

    logRemediationOutcome({
      status: 'failure',
      action: 'increment_memory',
      resourceName: 'api',
      namespace: 'prod',
      attempts: 3,
      dryRun: false,
      errorCode: 'E3005',
      errorDetail: 'conflict',
    });

    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0]?.[1]).toBe('Remediation increment_memory on prod/api: failure');
  });
});
