/**
 * Digest Resolver
 *
 * Turns a build spec into an immutable digest in the target registry.
 * Builds are not retried; pushes are, with exponential backoff.
 */

import type { Logger } from 'pino';
import { DEFAULT_PUSH_RETRY } from '../../config/defaults';
import {
  BuildFailedError,
  CancelledError,
  PushFailedError,
  errorMessage,
  type DeploymentError,
} from '../../errors';
import {
  formatImageTag,
  imageRepository,
  isDigest,
  withDigest,
  type BuildSpec,
  type ImageRef,
  type ResolvedImage,
  type ResolvedImageRef,
} from '../../domain/types/image';
import type {
  BuildCollaborator,
  BuiltArtifact,
  RegistryCollaborator,
} from '../../domain/types/interfaces';
import { Failure, Success, type Result } from '../../domain/types/result';
import { createTimer } from '../../lib/logger';
import { AbortedError, retry } from '../../shared/async';

export interface PushRetryPolicy {
  maxAttempts: number;
  delayMs: number;
  backoff: number;
  maxDelayMs: number;
}

export interface DigestResolverOptions {
  retry?: Partial<PushRetryPolicy>;
}

/**
 * Digest the engine already knows for the target repository, from entries
 * like `host/path/repo@sha256:...`
 */
export function knownDigest(artifact: BuiltArtifact, target: ImageRef): ResolvedImageRef | undefined {
  const prefix = `${imageRepository(target)}@`;
  for (const entry of artifact.repoDigests) {
    if (!entry.startsWith(prefix)) continue;
    const digest = entry.slice(prefix.length);
    if (isDigest(digest)) {
      return withDigest(target, digest);
    }
  }
  return undefined;
}

export class DigestResolver {
  private readonly logger: Logger;
  private readonly policy: PushRetryPolicy;

  constructor(
    private readonly builder: BuildCollaborator,
    private readonly registry: RegistryCollaborator,
    logger: Logger,
    options: DigestResolverOptions = {},
  ) {
    this.logger = logger.child({ component: 'DigestResolver' });
    this.policy = { ...DEFAULT_PUSH_RETRY, ...options.retry };
  }

  /**
   * Build and publish in one go.
   */
  async resolve(
    spec: BuildSpec,
    target: ImageRef,
    signal?: AbortSignal,
  ): Promise<Result<ResolvedImage, DeploymentError>> {
    const built = await this.build(spec, target, signal);
    if (!built.ok) return built;
    return this.publish(built.value, target, signal);
  }

  async build(
    spec: BuildSpec,
    target: ImageRef,
    signal?: AbortSignal,
  ): Promise<Result<BuiltArtifact, DeploymentError>> {
    if (signal?.aborted) {
      return Failure(new CancelledError('Cancelled before build'));
    }

    const timer = createTimer(this.logger, 'image-build', { tag: formatImageTag(target) });
    const result = await this.builder.build(spec, target);
    if (!result.ok) {
      timer.error(result.error);
      return Failure(
        new BuildFailedError(result.error, { context: spec.context, tag: formatImageTag(target) }),
      );
    }

    timer.end({ imageId: result.value.imageId });
    return Success(result.value);
  }

  /**
   * Push an artifact unless the registry already holds its digest.
   */
  async publish(
    artifact: BuiltArtifact,
    target: ImageRef,
    signal?: AbortSignal,
  ): Promise<Result<ResolvedImage, DeploymentError>> {
    const tag = formatImageTag(target);

    const known = knownDigest(artifact, target);
    if (known && (await this.registry.exists(known))) {
      this.logger.info({ tag, digest: known.digest }, 'Registry already holds digest, skipping push');
      return Success({ ref: known, pushSkipped: true });
    }

    let attempts = 0;
    try {
      const digest = await retry(
        async (attempt) => {
          attempts = attempt;
          if (signal?.aborted) throw new AbortedError();
          const pushed = await this.registry.push(artifact, target);
          if (!pushed.ok) {
            throw new PushFailedError(pushed.error, attempt, { tag });
          }
          return pushed.value;
        },
        {
          ...this.policy,
          signal,
          onRetry: (error, attempt, waitMs) => {
            this.logger.warn(
              { tag, attempt, waitMs, error: errorMessage(error) },
              'Push failed, retrying',
            );
          },
        },
      );

      this.logger.info({ tag, digest, attempts }, 'Image published');
      return Success({ ref: withDigest(target, digest), pushSkipped: false });
    } catch (error) {
      if (error instanceof AbortedError || signal?.aborted) {
        return Failure(new CancelledError('Cancelled during push', { tag, attempts }));
      }
      if (error instanceof PushFailedError) {
        this.logger.error({ tag, attempts: error.attempts, error: error.message }, 'Push failed');
        return Failure(error);
      }
      return Failure(new PushFailedError(errorMessage(error), attempts, { tag }));
    }
  }
}
