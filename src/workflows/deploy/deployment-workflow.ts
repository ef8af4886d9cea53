/**
 * Deployment Workflow
 *
 * Runs every chain of a deployment file in one of three modes:
 * - preview: plan only; reads state, calls no collaborator that mutates
 * - apply: plan and apply node by node, then persist the new state
 * - destroy: delete services that have state and forget them
 *
 * Chains are independent and run concurrently. A failed chain leaves its
 * state record untouched and does not stop the others. Cancellation stops
 * work between calls; already applied mutations are not rolled back.
 */

import type { Logger } from 'pino';
import type { DeploymentUnit } from '../../config/deployment-config';
import {
  CancelledError,
  InvalidConfigurationError,
  PlatformError,
  errorMessage,
  isDeploymentError,
  type DeploymentError,
} from '../../errors';
import {
  nodeId,
  type Action,
  type ImageNodeSpec,
  type NodeKind,
  type PlannedStep,
} from '../../domain/types/graph';
import { formatImageRef, type ResolvedImageRef } from '../../domain/types/image';
import type {
  BuiltArtifact,
  RepositoryCollaborator,
  StateStore,
} from '../../domain/types/interfaces';
import { Failure, Success, type Result } from '../../domain/types/result';
import type { AppliedImage, ServiceState } from '../../domain/types/service';
import { hashBuildContext } from '../../lib/context-hash';
import { createTimer } from '../../lib/logger';
import type { DigestResolver } from './digest-resolver';
import { buildGraph, planChain, validateGraph, type DeploymentGraph } from './resource-graph';
import { toDeploymentError, type ServiceReconciler } from './service-reconciler';

export type DeploymentMode = 'preview' | 'apply' | 'destroy';

export interface StepRecord {
  nodeId: string;
  kind: NodeKind;
  action: Action;
  forced: boolean;
  changes: string[];
}

export interface ChainOutputs {
  /** Digest-pinned image reference the service runs */
  imageRef: string;
  url?: string | undefined;
}

export type ChainOutcome =
  | { resourceId: string; status: 'planned'; steps: StepRecord[] }
  | {
      resourceId: string;
      status: 'applied';
      steps: StepRecord[];
      outputs: ChainOutputs;
      /** True when any collaborator mutated something */
      changed: boolean;
    }
  | { resourceId: string; status: 'destroyed'; existed: boolean }
  | {
      resourceId: string;
      status: 'failed' | 'cancelled';
      /** Node being worked on when the chain stopped */
      failedNode?: string | undefined;
      error: DeploymentError;
      completed: StepRecord[];
      /** Collaborators already mutated state that was not rolled back */
      partial: boolean;
    };

export interface DeploymentResult {
  mode: DeploymentMode;
  chains: ChainOutcome[];
  succeeded: boolean;
}

export interface DeploymentRequest {
  units: DeploymentUnit[];
  mode: DeploymentMode;
  signal?: AbortSignal | undefined;
}

export interface DeploymentWorkflowDeps {
  stateStore: StateStore;
  resolver: DigestResolver;
  reconciler: ServiceReconciler;
  repositories: RepositoryCollaborator;
  logger: Logger;
  hashContext?: typeof hashBuildContext;
}

type ChainFailure = Extract<ChainOutcome, { status: 'failed' | 'cancelled' }>;

function toRecord(step: PlannedStep): StepRecord {
  return {
    nodeId: step.node.id,
    kind: step.node.kind,
    action: step.action,
    forced: step.forced,
    changes: step.changes,
  };
}

function failure(
  resourceId: string,
  error: DeploymentError,
  completed: StepRecord[],
  partial: boolean,
  failedNode?: string,
): ChainFailure {
  return {
    resourceId,
    status: error instanceof CancelledError ? 'cancelled' : 'failed',
    failedNode,
    error,
    completed,
    partial,
  };
}

function asDeploymentError(error: unknown): DeploymentError {
  return isDeploymentError(error) ? error : new PlatformError(`Unexpected failure: ${errorMessage(error)}`);
}

/** Last-applied record of the image and push nodes */
function appliedImage(spec: ImageNodeSpec, target: ResolvedImageRef): AppliedImage {
  return {
    fingerprint: spec.fingerprint,
    contextHash: spec.contextHash,
    dockerfile: spec.build.dockerfile,
    buildArgs: { ...spec.build.buildArgs },
    platform: spec.build.platform,
    target,
  };
}

export class DeploymentWorkflow {
  private readonly logger: Logger;
  private readonly hashContext: typeof hashBuildContext;

  constructor(private readonly deps: DeploymentWorkflowDeps) {
    this.logger = deps.logger.child({ component: 'DeploymentWorkflow' });
    this.hashContext = deps.hashContext ?? hashBuildContext;
  }

  async runDeployment({ units, mode, signal }: DeploymentRequest): Promise<DeploymentResult> {
    switch (mode) {
      case 'preview':
        return this.preview(units, signal);
      case 'apply':
        return this.apply(units, signal);
      case 'destroy':
        return this.destroy(units, signal);
    }
  }

  /**
   * Plan every chain without touching build, registry or platform.
   */
  async preview(units: DeploymentUnit[], signal?: AbortSignal): Promise<DeploymentResult> {
    return this.runChains('preview', units, (unit) => this.previewChain(unit, signal));
  }

  async apply(units: DeploymentUnit[], signal?: AbortSignal): Promise<DeploymentResult> {
    return this.runChains('apply', units, (unit) => this.applyChain(unit, signal));
  }

  async destroy(units: DeploymentUnit[], signal?: AbortSignal): Promise<DeploymentResult> {
    return this.runChains('destroy', units, (unit) => this.destroyChain(unit.resourceId, signal));
  }

  private async runChains(
    mode: DeploymentMode,
    units: DeploymentUnit[],
    runChain: (unit: DeploymentUnit) => Promise<ChainOutcome>,
  ): Promise<DeploymentResult> {
    const timer = createTimer(this.logger, `deployment-${mode}`, { chains: units.length });

    const chains = await Promise.all(
      units.map(async (unit) => {
        try {
          return await runChain(unit);
        } catch (error) {
          return failure(unit.resourceId, asDeploymentError(error), [], false);
        }
      }),
    );

    const succeeded = chains.every(
      (chain) => chain.status !== 'failed' && chain.status !== 'cancelled',
    );
    if (succeeded) {
      timer.end({ succeeded });
    } else {
      timer.error(new Error(`${mode} finished with failed chains`), {
        failed: chains
          .filter((c) => c.status === 'failed' || c.status === 'cancelled')
          .map((c) => c.resourceId),
      });
    }

    return { mode, chains, succeeded };
  }

  private async loadGraph(
    unit: DeploymentUnit,
  ): Promise<Result<{ graph: DeploymentGraph; prior: ServiceState | undefined }, DeploymentError>> {
    const prior = await this.deps.stateStore.read(unit.resourceId);

    const hashed = await this.hashContext(unit.build.context, unit.build.dockerfile);
    if (!hashed.ok) return hashed;

    let graph: DeploymentGraph;
    try {
      graph = buildGraph(unit, hashed.value, this.logger);
    } catch (error) {
      return Failure(new InvalidConfigurationError(errorMessage(error)));
    }
    const problems = validateGraph(graph);
    if (problems.length > 0) {
      return Failure(
        new InvalidConfigurationError(`Invalid resource graph for ${unit.resourceId}`, problems),
      );
    }
    return Success({ graph, prior });
  }

  private async previewChain(unit: DeploymentUnit, signal?: AbortSignal): Promise<ChainOutcome> {
    if (signal?.aborted) {
      return failure(unit.resourceId, new CancelledError(), [], false);
    }

    const loaded = await this.loadGraph(unit);
    if (!loaded.ok) {
      return failure(unit.resourceId, loaded.error, [], false);
    }

    const steps = [...planChain(loaded.value.graph, loaded.value.prior)].map(toRecord);
    return { resourceId: unit.resourceId, status: 'planned', steps };
  }

  private async applyChain(unit: DeploymentUnit, signal?: AbortSignal): Promise<ChainOutcome> {
    const { resourceId } = unit;
    const log = this.logger.child({ resourceId });

    if (signal?.aborted) {
      return failure(resourceId, new CancelledError(), [], false);
    }

    const loaded = await this.loadGraph(unit);
    if (!loaded.ok) {
      return failure(resourceId, loaded.error, [], false);
    }
    const { graph, prior } = loaded.value;

    const completed: StepRecord[] = [];
    let partial = false;
    let imageSpec: ImageNodeSpec | undefined;
    let artifact: BuiltArtifact | undefined;
    let resolved: ResolvedImageRef | undefined = prior?.image.target;
    let state: ServiceState | undefined = prior;

    for (const step of planChain(graph, prior)) {
      if (signal?.aborted) {
        return failure(resourceId, new CancelledError(), completed, partial, step.node.id);
      }

      log.info(
        { node: step.node.id, action: step.action, forced: step.forced, changes: step.changes },
        'Applying step',
      );

      const node = step.node;
      switch (node.kind) {
        case 'image': {
          imageSpec = node.spec;
          if (step.action === 'unchanged') break;
          const built = await this.deps.resolver.build(node.spec.build, unit.target, signal);
          if (!built.ok) {
            return failure(resourceId, built.error, completed, partial, node.id);
          }
          artifact = built.value;
          break;
        }

        case 'push': {
          if (step.action === 'unchanged') break;
          if (unit.repository) {
            const ensured = await this.deps.repositories.ensureRepository(unit.repository);
            if (!ensured.ok) {
              const error = toDeploymentError(ensured.error, `Repository ${unit.repository.repositoryId}`);
              return failure(resourceId, error, completed, partial, node.id);
            }
            if (ensured.value) {
              log.info({ repository: unit.repository.repositoryId }, 'Created image repository');
            }
          }
          partial = true;
          const published = artifact
            ? await this.deps.resolver.publish(artifact, node.spec, signal)
            : await this.deps.resolver.resolve(unit.build, node.spec, signal);
          if (!published.ok) {
            return failure(resourceId, published.error, completed, partial, node.id);
          }
          resolved = published.value.ref;
          break;
        }

        case 'service': {
          if (!resolved || !imageSpec) {
            return failure(
              resourceId,
              new InvalidConfigurationError(`No image digest for ${resourceId}`),
              completed,
              partial,
              node.id,
            );
          }
          if (step.action !== 'unchanged') partial = true;
          const reconciled = await this.deps.reconciler.reconcile(
            { ...node.spec, image: resolved },
            step.action,
            prior,
            { image: appliedImage(imageSpec, resolved), signal },
          );
          if (!reconciled.ok) {
            return failure(resourceId, reconciled.error, completed, partial, node.id);
          }
          state = reconciled.value;
          break;
        }
      }

      completed.push(toRecord(step));
    }

    if (!state) {
      return failure(
        resourceId,
        new InvalidConfigurationError(`Chain ${resourceId} produced no state`),
        completed,
        partial,
      );
    }

    const changed = completed.some((step) => step.action !== 'unchanged');
    if (changed) {
      try {
        await this.deps.stateStore.write(resourceId, state);
      } catch (error) {
        return failure(resourceId, asDeploymentError(error), completed, partial);
      }
    } else {
      log.info('No changes');
    }

    return {
      resourceId,
      status: 'applied',
      steps: completed,
      outputs: { imageRef: formatImageRef(state.lastApplied.image), url: state.url },
      changed,
    };
  }

  private async destroyChain(resourceId: string, signal?: AbortSignal): Promise<ChainOutcome> {
    const state = await this.deps.stateStore.read(resourceId);
    if (!state) {
      this.logger.info({ resourceId }, 'Nothing to destroy');
      return { resourceId, status: 'destroyed', existed: false };
    }

    const deleted = await this.deps.reconciler.destroy(state, signal);
    if (!deleted.ok) {
      return failure(resourceId, deleted.error, [], false, nodeId(resourceId, 'service'));
    }

    await this.deps.stateStore.remove(resourceId);
    return { resourceId, status: 'destroyed', existed: true };
  }
}
