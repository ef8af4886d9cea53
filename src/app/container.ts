/**
 * Dependency Injection Container
 *
 * Creates the collaborators and components of a deployment pass from the
 * runtime configuration. Tests replace any of them through `DepsOverrides`.
 */

import { resolve } from 'node:path';
import type { Logger } from 'pino';
import { createAppConfig, type AppConfig, type LogLevel } from '../config/app-config';
import { createLogger } from '../lib/logger';
import {
  createGcloudTokenProvider,
  createStaticTokenProvider,
  type TokenProvider,
} from '../infrastructure/auth/token-provider';
import { createDockerClient } from '../infrastructure/docker/client';
import { createDockerRegistryClient } from '../infrastructure/docker/registry';
import { createCloudRunClient } from '../infrastructure/cloud-run/client';
import { createArtifactRegistryClient } from '../infrastructure/artifact-registry/client';
import { FileStateStore } from '../infrastructure/state/file-state-store';
import type {
  BuildCollaborator,
  PlatformCollaborator,
  RegistryCollaborator,
  RepositoryCollaborator,
  StateStore,
} from '../domain/types/interfaces';
import { DigestResolver } from '../workflows/deploy/digest-resolver';
import { ServiceReconciler } from '../workflows/deploy/service-reconciler';
import { DeploymentWorkflow } from '../workflows/deploy/deployment-workflow';

/**
 * All application dependencies with their types
 */
export interface Deps {
  // Configuration
  config: AppConfig;

  // Core services
  logger: Logger;
  tokenProvider: TokenProvider;

  // Collaborators
  builder: BuildCollaborator;
  registry: RegistryCollaborator;
  repositories: RepositoryCollaborator;
  platform: PlatformCollaborator;
  stateStore: StateStore;

  // Orchestration
  resolver: DigestResolver;
  reconciler: ServiceReconciler;
  workflow: DeploymentWorkflow;
}

/**
 * Configuration overrides for dependency creation
 */
export interface ContainerConfigOverrides {
  // Use custom configuration instead of the environment
  config?: AppConfig;
  logLevel?: LogLevel;
  // Keep stdout for machine-readable output
  logToStderr?: boolean;
}

/**
 * Partial dependency overrides for testing
 */
export type DepsOverrides = Partial<Deps>;

/**
 * Create application container with all dependencies
 */
export function createContainer(
  configOverrides: ContainerConfigOverrides = {},
  depsOverrides: DepsOverrides = {},
): Deps {
  const config = configOverrides.config ?? createAppConfig();
  const logLevel = configOverrides.logLevel ?? config.logLevel;

  // Create logger first as other services depend on it
  const logger =
    depsOverrides.logger ??
    createLogger({ level: logLevel, stderr: configOverrides.logToStderr ?? false });

  const tokenProvider =
    depsOverrides.tokenProvider ??
    (config.gcp.accessToken
      ? createStaticTokenProvider(config.gcp.accessToken)
      : createGcloudTokenProvider(logger));

  const docker = createDockerClient(logger, { socketPath: config.docker.socketPath, tokenProvider });
  const builder = depsOverrides.builder ?? docker;
  const registry = depsOverrides.registry ?? {
    push: docker.push,
    ...createDockerRegistryClient(logger, tokenProvider),
  };

  const repositories = depsOverrides.repositories ?? createArtifactRegistryClient(logger, tokenProvider);
  const platform = depsOverrides.platform ?? createCloudRunClient(logger, tokenProvider);
  const stateStore =
    depsOverrides.stateStore ?? new FileStateStore(resolve(config.state.dir), logger);

  const resolver =
    depsOverrides.resolver ??
    new DigestResolver(builder, registry, logger, {
      retry: { maxAttempts: config.push.maxAttempts, delayMs: config.push.delayMs },
    });
  const reconciler =
    depsOverrides.reconciler ??
    new ServiceReconciler(platform, logger, {
      timeoutMs: config.reconcile.timeoutMs,
      pollIntervalMs: config.reconcile.pollIntervalMs,
    });
  const workflow =
    depsOverrides.workflow ?? new DeploymentWorkflow({ stateStore, resolver, reconciler, repositories, logger });

  logger.debug(
    {
      config: {
        logLevel,
        project: config.gcp.project,
        region: config.gcp.region,
        stateDir: config.state.dir,
        dockerSocket: config.docker.socketPath,
        reconcileTimeoutMs: config.reconcile.timeoutMs,
        pushAttempts: config.push.maxAttempts,
      },
      staticToken: config.gcp.accessToken !== undefined,
    },
    'Dependency container created',
  );

  return {
    config,
    logger,
    tokenProvider,
    builder,
    registry,
    repositories,
    platform,
    stateStore,
    resolver,
    reconciler,
    workflow,
  };
}
