/**
 * OAuth access tokens for the registry and the platform API
 */

import type { Logger } from 'pino';
import { CommandExecutor } from '../command-executor';

export interface TokenProvider {
  getAccessToken(): Promise<string>;
}

/** gcloud tokens live an hour; refresh well before that */
const TOKEN_TTL_MS = 10 * 60 * 1000;

/**
 * A fixed token, e.g. from GOOGLE_OAUTH_ACCESS_TOKEN
 */
export function createStaticTokenProvider(token: string): TokenProvider {
  return {
    getAccessToken: () => Promise.resolve(token),
  };
}

/**
 * Tokens from `gcloud auth print-access-token`, cached for a few minutes.
 */
export function createGcloudTokenProvider(
  logger: Logger,
  executor: CommandExecutor = new CommandExecutor(logger),
): TokenProvider {
  let cached: { token: string; expiresAt: number } | undefined;

  return {
    async getAccessToken(): Promise<string> {
      if (cached && cached.expiresAt > Date.now()) {
        return cached.token;
      }

      const result = await executor.execute('gcloud', ['auth', 'print-access-token', '--quiet']);
      if (result.exitCode !== 0 || result.stdout === '') {
        throw new Error(
          `gcloud auth print-access-token failed (exit ${result.exitCode}): ${result.stderr || 'no output'}`,
        );
      }

      // Older SDKs print `token: <value>`
      const token = result.stdout.includes(':')
        ? (result.stdout.split(':')[1] ?? '').trim()
        : result.stdout.trim();
      cached = { token, expiresAt: Date.now() + TOKEN_TTL_MS };
      logger.debug('Obtained access token from gcloud');
      return token;
    },
  };
}
