/**
 * Artifact Registry Client - repositories API v1 over fetch
 *
 * Images under the default `<region>-docker.pkg.dev/<project>` registry need
 * their repository to exist before the first push.
 */

import type { Logger } from 'pino';
import { DEFAULT_TIMEOUTS } from '../../config/defaults';
import { Success, type Result } from '../../domain/types/result';
import type {
  PlatformFailure,
  RepositoryCollaborator,
  RepositoryRef,
} from '../../domain/types/interfaces';
import type { TokenProvider } from '../auth/token-provider';
import { createGcpRequest } from '../gcp/request';

const API_ROOT = 'https://artifactregistry.googleapis.com/v1';

export interface ArtifactRegistryClientOptions {
  requestTimeoutMs?: number;
}

export function repositoriesUrl(project: string, location: string): string {
  return `${API_ROOT}/projects/${encodeURIComponent(project)}/locations/${encodeURIComponent(location)}/repositories`;
}

export function createArtifactRegistryClient(
  logger: Logger,
  tokenProvider: TokenProvider,
  options: ArtifactRegistryClientOptions = {},
): RepositoryCollaborator {
  const request = createGcpRequest(logger, tokenProvider, {
    requestTimeoutMs: options.requestTimeoutMs ?? DEFAULT_TIMEOUTS.platformRequest,
    api: 'Artifact Registry',
  });

  return {
    async ensureRepository(repo: RepositoryRef): Promise<Result<boolean, PlatformFailure>> {
      const base = repositoriesUrl(repo.project, repo.location);

      const found = await request('GET', `${base}/${encodeURIComponent(repo.repositoryId)}`);
      if (found.ok) return Success(false);
      if (found.error.kind !== 'not-found') return found;

      logger.info(
        { repository: repo.repositoryId, project: repo.project, location: repo.location },
        'Creating Artifact Registry repository',
      );
      const created = await request('POST', `${base}?repositoryId=${encodeURIComponent(repo.repositoryId)}`, {
        format: 'DOCKER',
      });
      if (created.ok) return Success(true);
      // Lost a race with another pass creating the same repository
      if (created.error.kind === 'conflict') return Success(false);
      return created;
    },
  };
}
