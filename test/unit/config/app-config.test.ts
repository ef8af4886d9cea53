import { describe, it, expect } from '@jest/globals';
import { createAppConfig } from '../../../src/config/app-config';
import { DEFAULT_PUSH_RETRY, DEFAULT_STATE_DIR, DEFAULT_TIMEOUTS } from '../../../src/config/defaults';
import { InvalidConfigurationError } from '../../../src/errors';

describe('createAppConfig', () => {
  it('should fall back to defaults for an empty environment', () => {
    const config = createAppConfig({});

    expect(config).toEqual({
      logLevel: 'info',
      gcp: {},
      docker: {},
      state: { dir: DEFAULT_STATE_DIR },
      reconcile: {
        timeoutMs: DEFAULT_TIMEOUTS.reconcile,
        pollIntervalMs: DEFAULT_TIMEOUTS.readinessPoll,
      },
      push: {
        maxAttempts: DEFAULT_PUSH_RETRY.maxAttempts,
        delayMs: DEFAULT_PUSH_RETRY.delayMs,
      },
    });
  });

  it('should read and coerce environment values', () => {
    const config = createAppConfig({
      LOG_LEVEL: 'debug',
      GOOGLE_CLOUD_PROJECT: 'test-project',
      CLOUDSDK_RUN_REGION: 'europe-west1',
      GOOGLE_OAUTH_ACCESS_TOKEN: 'test-secret',
      DEPLOYER_RECONCILE_TIMEOUT_MS: '60000',
      DEPLOYER_PUSH_ATTEMPTS: '5',
    });

    expect(config.logLevel).toBe('debug');
    expect(config.gcp).toEqual({
      project: 'test-project',
      region: 'europe-west1',
      accessToken: 'test-secret',
    });
    expect(config.reconcile.timeoutMs).toBe(60000);
    expect(config.push.maxAttempts).toBe(5);
  });

  it('should treat blank values as unset', () => {
    const config = createAppConfig({ GOOGLE_CLOUD_PROJECT: '  ', GCLOUD_PROJECT: 'fallback' });
    expect(config.gcp.project).toBe('fallback');
  });

  it('should reject invalid values with their paths', () => {
    expect.assertions(2);
    try {
      createAppConfig({ LOG_LEVEL: 'loud', DEPLOYER_PUSH_ATTEMPTS: '0' });
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidConfigurationError);
      if (error instanceof InvalidConfigurationError) {
        expect(error.violations.map((violation) => violation.split(':')[0])).toEqual([
          'logLevel',
          'push.maxAttempts',
        ]);
      }
    }
  });
});
