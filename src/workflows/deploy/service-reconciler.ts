/**
 * Service Reconciler
 *
 * Drives one service to its desired spec and waits until the platform
 * reports it ready.
 *
 * Phases: Absent -> Creating -> Ready, Ready -> Updating -> Ready,
 * Ready -> Replacing -> Creating -> Ready, and any of them -> Failed.
 * Replacement deletes before it creates; when the create fails the old
 * service is already gone and the error says so. Cancellation and timeouts
 * during that create surface as themselves.
 *
 * A service is ready only once the platform serves the revision this call
 * produced; a ready status for an older revision keeps the poll going.
 */

import type { Logger } from 'pino';
import { DEFAULT_TIMEOUTS } from '../../config/defaults';
import {
  CancelledError,
  InvalidConfigurationError,
  PlatformError,
  ReplaceFailedPostDeleteError,
  TimeoutError,
  type DeploymentError,
} from '../../errors';
import type { Action } from '../../domain/types/graph';
import type {
  PlatformCollaborator,
  PlatformFailure,
  ServiceStatus,
} from '../../domain/types/interfaces';
import { Failure, Success, type Result } from '../../domain/types/result';
import type {
  AppliedImage,
  ServicePhase,
  ServiceSpec,
  ServiceState,
} from '../../domain/types/service';
import { AbortedError, pollUntil, type PollOutcome } from '../../shared/async';

export interface ServiceReconcilerOptions {
  timeoutMs?: number;
  pollIntervalMs?: number;
}

export interface ReconcileContext {
  /** Image and push record persisted alongside the service */
  image: AppliedImage;
  signal?: AbortSignal | undefined;
}

/**
 * Map a platform failure onto the error taxonomy
 */
export function toDeploymentError(failure: PlatformFailure, operation: string): DeploymentError {
  const message = `${operation} failed: ${failure.message}`;
  if (failure.kind === 'rejected' || failure.kind === 'conflict') {
    return new InvalidConfigurationError(message, [failure.message], { status: failure.status });
  }
  return new PlatformError(message, { kind: failure.kind, status: failure.status });
}

export class ServiceReconciler {
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly pollIntervalMs: number;

  constructor(
    private readonly platform: PlatformCollaborator,
    logger: Logger,
    options: ServiceReconcilerOptions = {},
  ) {
    this.logger = logger.child({ component: 'ServiceReconciler' });
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUTS.reconcile;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_TIMEOUTS.readinessPoll;
  }

  /**
   * Apply `action` to the service. `spec.image` must carry the resolved digest.
   */
  async reconcile(
    spec: ServiceSpec,
    action: Action,
    prior: ServiceState | undefined,
    context: ReconcileContext,
  ): Promise<Result<ServiceState, DeploymentError>> {
    if (action === 'unchanged' && prior) {
      return Success(prior);
    }
    if (context.signal?.aborted) {
      return Failure(new CancelledError('Cancelled before service reconciliation', { service: spec.name }));
    }
    if (!spec.image.digest) {
      return Failure(
        new InvalidConfigurationError(`Service ${spec.name} image is not pinned to a digest`),
      );
    }

    if (!prior) {
      return this.create(spec, context, 'Absent');
    }
    if (action === 'replace') {
      return this.replace(spec, prior, context);
    }
    return this.update(spec, prior, context);
  }

  /**
   * Delete the service a state record describes. A service that is already
   * gone counts as deleted.
   */
  async destroy(state: ServiceState, signal?: AbortSignal): Promise<Result<void, DeploymentError>> {
    if (signal?.aborted) {
      return Failure(new CancelledError('Cancelled before delete', { service: state.name }));
    }

    const deleted = await this.platform.deleteService(
      state.name,
      state.region,
      state.lastApplied.project,
    );
    if (!deleted.ok && deleted.error.kind !== 'not-found') {
      return Failure(toDeploymentError(deleted.error, `Delete of ${state.name}`));
    }

    this.transition(state.name, 'Ready', 'Absent');
    return Success(undefined);
  }

  private async create(
    spec: ServiceSpec,
    context: ReconcileContext,
    from: ServicePhase,
  ): Promise<Result<ServiceState, DeploymentError>> {
    this.transition(spec.name, from, 'Creating');

    const created = await this.platform.createService(spec);
    if (!created.ok) {
      if (created.error.kind === 'conflict') {
        // Exists but has no state record here: adopt it
        this.logger.warn({ service: spec.name, region: spec.region }, 'Service already exists, updating it');
        return this.patch(spec, context, 'Creating');
      }
      this.transition(spec.name, 'Creating', 'Failed');
      return Failure(toDeploymentError(created.error, `Create of ${spec.name}`));
    }

    return this.awaitReady(spec, created.value, context, 'Creating');
  }

  private async update(
    spec: ServiceSpec,
    prior: ServiceState,
    context: ReconcileContext,
  ): Promise<Result<ServiceState, DeploymentError>> {
    if (prior.name !== spec.name || prior.region !== spec.region) {
      return Failure(
        new InvalidConfigurationError(
          `Cannot update ${prior.region}/${prior.name} in place to ${spec.region}/${spec.name}`,
        ),
      );
    }
    this.transition(spec.name, 'Ready', 'Updating');
    return this.patch(spec, context, 'Updating');
  }

  private async patch(
    spec: ServiceSpec,
    context: ReconcileContext,
    phase: ServicePhase,
  ): Promise<Result<ServiceState, DeploymentError>> {
    const updated = await this.platform.updateService(spec.name, spec.region, spec);
    if (!updated.ok) {
      if (updated.error.kind === 'not-found' && phase === 'Updating') {
        this.logger.warn({ service: spec.name, region: spec.region }, 'Service vanished, recreating it');
        return this.create(spec, context, 'Absent');
      }
      this.transition(spec.name, phase, 'Failed');
      return Failure(toDeploymentError(updated.error, `Update of ${spec.name}`));
    }

    return this.awaitReady(spec, updated.value, context, phase);
  }

  private async replace(
    spec: ServiceSpec,
    prior: ServiceState,
    context: ReconcileContext,
  ): Promise<Result<ServiceState, DeploymentError>> {
    this.transition(spec.name, 'Ready', 'Replacing');

    const deleted = await this.platform.deleteService(
      prior.name,
      prior.region,
      prior.lastApplied.project,
    );
    if (!deleted.ok && deleted.error.kind !== 'not-found') {
      this.transition(spec.name, 'Replacing', 'Failed');
      return Failure(toDeploymentError(deleted.error, `Delete of ${prior.name}`));
    }
    this.logger.info({ service: prior.name, region: prior.region }, 'Old service deleted');

    const created = await this.create(spec, context, 'Replacing');
    if (!created.ok) {
      if (created.error instanceof CancelledError || created.error instanceof TimeoutError) {
        this.logger.error(
          { service: prior.name, region: prior.region, error: created.error.code },
          'Replacement interrupted after the old service was deleted',
        );
        return created;
      }
      return Failure(
        new ReplaceFailedPostDeleteError(
          `Replacement of ${prior.region}/${prior.name} failed after the old service was deleted: ${created.error.message}`,
          { name: prior.name, region: prior.region },
          created.error,
        ),
      );
    }
    return created;
  }

  private async awaitReady(
    spec: ServiceSpec,
    revision: string,
    context: ReconcileContext,
    phase: ServicePhase,
  ): Promise<Result<ServiceState, DeploymentError>> {
    const check = async (): Promise<ServiceStatus> => {
      const status = await this.platform.getServiceStatus(spec.name, spec.region, spec.project);
      if (status.ok) return status.value;
      if (status.error.kind === 'rejected') {
        throw toDeploymentError(status.error, `Status of ${spec.name}`);
      }
      // Transient, or the resource is not visible yet
      return { status: 'not-ready', message: status.error.message };
    };

    // A failure without a revision id cannot be attributed to an older one
    const settled = (status: ServiceStatus): boolean =>
      (status.status === 'ready' && status.revisionId === revision) ||
      (status.status === 'failed' && (status.revisionId === undefined || status.revisionId === revision));

    let outcome: PollOutcome<ServiceStatus>;
    try {
      outcome = await pollUntil(check, settled, {
        intervalMs: this.pollIntervalMs,
        timeoutMs: this.timeoutMs,
        signal: context.signal,
      });
    } catch (error) {
      this.transition(spec.name, phase, 'Failed');
      if (error instanceof AbortedError) {
        return Failure(
          new CancelledError('Cancelled while waiting for readiness', { service: spec.name, revision }),
        );
      }
      if (error instanceof PlatformError || error instanceof InvalidConfigurationError) {
        return Failure(error);
      }
      throw error;
    }

    if (!outcome.done) {
      this.transition(spec.name, phase, 'Failed');
      return Failure(
        new TimeoutError(
          `Service ${spec.name} did not become ready within ${this.timeoutMs}ms`,
          this.timeoutMs,
          {
            service: spec.name,
            region: spec.region,
            revision,
            lastStatus: outcome.last?.message,
            lastRevision: outcome.last?.revisionId,
          },
        ),
      );
    }

    const status = outcome.value;
    if (status.status === 'failed') {
      this.transition(spec.name, phase, 'Failed');
      return Failure(
        new InvalidConfigurationError(
          `Revision ${revision} of ${spec.name} failed: ${status.message ?? 'no reason given'}`,
          status.message ? [status.message] : [],
          { service: spec.name, revision },
        ),
      );
    }

    this.transition(spec.name, phase, 'Ready');
    const digest = spec.image.digest ?? context.image.target.digest;
    return Success({
      name: spec.name,
      region: spec.region,
      revisionId: revision,
      imageDigest: digest,
      ready: true,
      url: status.url,
      lastApplied: spec,
      image: context.image,
      updatedAt: new Date().toISOString(),
    });
  }

  private transition(service: string, from: ServicePhase, to: ServicePhase): void {
    this.logger.info({ service, from, to }, `Service ${service}: ${from} -> ${to}`);
  }
}
