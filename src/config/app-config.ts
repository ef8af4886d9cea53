/**
 * Runtime Configuration
 *
 * Settings that come from the environment rather than from a deployment file,
 * validated with Zod.
 */

import { z } from 'zod';
import { InvalidConfigurationError } from '../errors';
import { DEFAULT_PUSH_RETRY, DEFAULT_STATE_DIR, DEFAULT_TIMEOUTS } from './defaults';

const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

const AppConfigSchema = z.object({
  logLevel: LogLevelSchema.default('info'),
  gcp: z.object({
    project: z.string().min(1).optional(),
    region: z.string().min(1).optional(),
    accessToken: z.string().min(1).optional(),
  }),
  docker: z.object({
    socketPath: z.string().min(1).optional(),
  }),
  state: z.object({
    dir: z.string().min(1).default(DEFAULT_STATE_DIR),
  }),
  reconcile: z.object({
    timeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUTS.reconcile),
    pollIntervalMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUTS.readinessPoll),
  }),
  push: z.object({
    maxAttempts: z.coerce.number().int().min(1).max(10).default(DEFAULT_PUSH_RETRY.maxAttempts),
    delayMs: z.coerce.number().int().nonnegative().default(DEFAULT_PUSH_RETRY.delayMs),
  }),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Treat empty strings as unset so that defaults apply
 */
function envValue(env: NodeJS.ProcessEnv, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      return value.trim();
    }
  }
  return undefined;
}

/**
 * Create configuration from environment variables
 */
export function createAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const rawConfig = {
    logLevel: envValue(env, 'LOG_LEVEL'),
    gcp: {
      project: envValue(env, 'GOOGLE_CLOUD_PROJECT', 'GCLOUD_PROJECT'),
      region: envValue(env, 'GOOGLE_CLOUD_REGION', 'CLOUDSDK_RUN_REGION'),
      accessToken: envValue(env, 'GOOGLE_OAUTH_ACCESS_TOKEN'),
    },
    docker: {
      socketPath: envValue(env, 'DOCKER_SOCKET'),
    },
    state: {
      dir: envValue(env, 'DEPLOYER_STATE_DIR'),
    },
    reconcile: {
      timeoutMs: envValue(env, 'DEPLOYER_RECONCILE_TIMEOUT_MS'),
      pollIntervalMs: envValue(env, 'DEPLOYER_POLL_INTERVAL_MS'),
    },
    push: {
      maxAttempts: envValue(env, 'DEPLOYER_PUSH_ATTEMPTS'),
      delayMs: envValue(env, 'DEPLOYER_PUSH_DELAY_MS'),
    },
  };

  const result = AppConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new InvalidConfigurationError(
      'Runtime configuration validation failed',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  return result.data;
}
