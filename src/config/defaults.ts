/**
 * Centralized Configuration Defaults
 *
 * Single source of truth for the default values used throughout the deployer.
 */

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  reconcile: 300000, // 5 minutes until a service must report ready
  readinessPoll: 2000, // 2 seconds between readiness checks
  dockerBuild: 600000, // 10 minutes
  command: 30000, // 30 seconds for helper commands (access tokens)
  platformRequest: 30000, // 30 seconds per platform API call
} as const;

/**
 * Push retry policy
 */
export const DEFAULT_PUSH_RETRY = {
  maxAttempts: 3,
  delayMs: 1000,
  backoff: 2,
  maxDelayMs: 30000,
} as const;

/**
 * Default service settings, matching what a bare deployment gets
 */
export const DEFAULT_SERVICE = {
  cpu: '1',
  memory: '1Gi',
  minInstances: 0,
  maxInstances: 100,
  concurrency: 3,
  containerPort: 8080,
  ingress: 'all',
  allowUnauthenticated: false,
} as const;

/**
 * Default image settings
 */
export const DEFAULT_IMAGE = {
  context: './app',
  name: 'image',
  tag: 'latest',
  platform: 'linux/amd64',
} as const;

export const DEFAULT_STATE_DIR = '.deployer/state';

/**
 * Artifact Registry host for a region, e.g. `us-central1-docker.pkg.dev`
 */
export function defaultRegistryHost(region: string): string {
  return `${region}-docker.pkg.dev`;
}
