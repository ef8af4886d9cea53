/**
 * Collaborator contracts - what the orchestration core needs from the outside
 * world, independent of Docker, the registry or the platform API
 */

import type { Result } from './result';
import type { BuildSpec, Digest, ImageRef, ResolvedImageRef } from './image';
import type { ServiceSpec, ServiceState } from './service';

/**
 * Local artifact produced by a build.
 */
export interface BuiltArtifact {
  imageId: string;
  /** Tag the build applied, `registry/repository:tag` */
  tag: string;
  /** `registry/repository@sha256:...` entries the engine already knows */
  repoDigests: string[];
}

export interface BuildCollaborator {
  build: (spec: BuildSpec, target: ImageRef) => Promise<Result<BuiltArtifact>>;
}

export interface RegistryCollaborator {
  push: (artifact: BuiltArtifact, target: ImageRef) => Promise<Result<Digest>>;
  /** Whether the registry holds `ref.digest` under `ref.repository` */
  exists: (ref: ResolvedImageRef) => Promise<boolean>;
}

/**
 * Artifact Registry repository that holds a unit's images
 */
export interface RepositoryRef {
  project: string;
  location: string;
  repositoryId: string;
}

export type PlatformErrorKind = 'rejected' | 'conflict' | 'not-found' | 'unavailable';

export interface PlatformFailure {
  kind: PlatformErrorKind;
  message: string;
  status?: number | undefined;
}

export type ServiceReadiness = 'ready' | 'not-ready' | 'failed';

export interface ServiceStatus {
  status: ServiceReadiness;
  url?: string | undefined;
  revisionId?: string | undefined;
  message?: string | undefined;
}

export interface PlatformCollaborator {
  createService: (spec: ServiceSpec) => Promise<Result<string, PlatformFailure>>;
  updateService: (
    name: string,
    region: string,
    spec: ServiceSpec,
  ) => Promise<Result<string, PlatformFailure>>;
  deleteService: (
    name: string,
    region: string,
    project: string,
  ) => Promise<Result<void, PlatformFailure>>;
  getServiceStatus: (
    name: string,
    region: string,
    project: string,
  ) => Promise<Result<ServiceStatus, PlatformFailure>>;
}

export interface RepositoryCollaborator {
  /** Create the Docker-format repository unless it already exists; true when created */
  ensureRepository: (repo: RepositoryRef) => Promise<Result<boolean, PlatformFailure>>;
}

/**
 * Host persistence keyed by resource id.
 */
export interface StateStore {
  read(resourceId: string): Promise<ServiceState | undefined>;
  write(resourceId: string, state: ServiceState): Promise<void>;
  remove(resourceId: string): Promise<void>;
  list(): Promise<Array<{ resourceId: string; state: ServiceState }>>;
}
