/**
 * Docker Registry Client
 *
 * Asks a registry over the v2 HTTP API whether it already holds a manifest.
 */

import type { Logger } from 'pino';
import type { ResolvedImageRef } from '../../domain/types/image';
import type { RegistryCollaborator } from '../../domain/types/interfaces';
import type { TokenProvider } from '../auth/token-provider';
import { registryHost } from './client';

const MANIFEST_MEDIA_TYPES = [
  'application/vnd.oci.image.index.v1+json',
  'application/vnd.oci.image.manifest.v1+json',
  'application/vnd.docker.distribution.manifest.list.v2+json',
  'application/vnd.docker.distribution.manifest.v2+json',
].join(', ');

/**
 * `https://host/v2/<path>/<repository>/manifests/<digest>`
 */
export function manifestUrl(ref: ResolvedImageRef): string {
  const host = registryHost(ref);
  const prefix = ref.registry.slice(host.length).replace(/^\/+/, '');
  const name = prefix ? `${prefix}/${ref.repository}` : ref.repository;
  return `https://${host}/v2/${name}/manifests/${ref.digest}`;
}

/**
 * Create a registry client. Without a token provider requests are anonymous.
 */
export function createDockerRegistryClient(
  logger: Logger,
  tokenProvider?: TokenProvider,
): Pick<RegistryCollaborator, 'exists'> {
  return {
    async exists(ref: ResolvedImageRef): Promise<boolean> {
      const url = manifestUrl(ref);
      try {
        const headers: Record<string, string> = { Accept: MANIFEST_MEDIA_TYPES };
        if (tokenProvider) {
          const token = await tokenProvider.getAccessToken();
          headers.Authorization = `Basic ${Buffer.from(`oauth2accesstoken:${token}`).toString('base64')}`;
        }

        const response = await fetch(url, { method: 'HEAD', headers });
        if (response.ok) {
          return true;
        }
        if (response.status !== 404) {
          logger.debug({ url, status: response.status }, 'Unexpected registry response, assuming absent');
        }
        return false;
      } catch (error) {
        logger.debug({ error, url }, 'Registry lookup failed, assuming absent');
        return false;
      }
    },
  };
}
