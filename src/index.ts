/**
 * Public API of the deployer
 */

export { createContainer, type Deps, type DepsOverrides, type ContainerConfigOverrides } from './app/container';
export { createAppConfig, type AppConfig } from './config/app-config';
export {
  loadDeploymentFile,
  parseDeploymentFile,
  resolveDeploymentUnits,
  type DeploymentFile,
  type DeploymentUnit,
} from './config/deployment-config';

export { previewDeployment } from './tools/preview-deployment';
export { applyDeployment } from './tools/apply-deployment';
export { destroyDeployment } from './tools/destroy-deployment';
export { listOutputs, type DeploymentOutput } from './tools/list-outputs';
export type { ToolContext, DeploymentTargetParams } from './tools/types';

export * from './workflows/deploy';
export * from './errors';

export { FileStateStore } from './infrastructure/state/file-state-store';
export { MemoryStateStore } from './infrastructure/state/memory-state-store';
export { hashBuildContext, listBuildContext } from './lib/context-hash';

export type { Result } from './domain/types/result';
export type { Action, GraphNode, NodeKind, PlannedStep } from './domain/types/graph';
export type { BuildSpec, Digest, ImageRef, ResolvedImage, ResolvedImageRef } from './domain/types/image';
export type { AppliedImage, Ingress, ServiceSpec, ServiceState } from './domain/types/service';
export type {
  BuildCollaborator,
  BuiltArtifact,
  PlatformCollaborator,
  PlatformFailure,
  RegistryCollaborator,
  RepositoryCollaborator,
  RepositoryRef,
  ServiceStatus,
  StateStore,
} from './domain/types/interfaces';
