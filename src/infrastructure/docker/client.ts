/**
 * Docker client for the image half of a chain: build and push
 */

import Docker from 'dockerode';
import type { Logger } from 'pino';
import { Success, Failure, type Result } from '../../domain/types/result';
import { formatImageTag, isDigest, type BuildSpec, type Digest, type ImageRef } from '../../domain/types/image';
import type {
  BuildCollaborator,
  BuiltArtifact,
  RegistryCollaborator,
} from '../../domain/types/interfaces';
import type { TokenProvider } from '../auth/token-provider';
import { listBuildContext } from '../../lib/context-hash';

interface DockerProgressEvent {
  stream?: string;
  status?: string;
  error?: string;
  errorDetail?: { message?: string };
  aux?: { ID?: string; Digest?: string; Size?: number };
}

export interface DockerClientOptions {
  socketPath?: string | undefined;
  /** Supplies the password for `oauth2accesstoken` registry logins */
  tokenProvider?: TokenProvider | undefined;
}

export interface DockerClient extends BuildCollaborator {
  push: RegistryCollaborator['push'];
}

/**
 * Registry host of a ref, e.g. `us-central1-docker.pkg.dev`
 */
export function registryHost(ref: ImageRef): string {
  return ref.registry.split('/')[0] ?? ref.registry;
}

/**
 * First error reported inside a progress stream, if any
 */
function streamError(events: DockerProgressEvent[]): string | undefined {
  for (const event of events) {
    if (event.error) {
      return event.errorDetail?.message ?? event.error;
    }
  }
  return undefined;
}

/**
 * Create a Docker client backed by the local daemon
 */
export const createDockerClient = (logger: Logger, options: DockerClientOptions = {}): DockerClient => {
  const docker = options.socketPath ? new Docker({ socketPath: options.socketPath }) : new Docker();

  const follow = (stream: NodeJS.ReadableStream, label: string): Promise<DockerProgressEvent[]> =>
    new Promise<DockerProgressEvent[]>((resolve, reject) => {
      docker.modem.followProgress(
        stream,
        (err: Error | null, res: DockerProgressEvent[]) => (err ? reject(err) : resolve(res)),
        (event: DockerProgressEvent) => logger.debug(event, `Docker ${label} progress`),
      );
    });

  return {
    async build(spec: BuildSpec, target: ImageRef): Promise<Result<BuiltArtifact>> {
      const tag = formatImageTag(target);
      try {
        logger.debug({ context: spec.context, tag }, 'Starting Docker build');

        // Send exactly the files the context hash covers
        const listed = await listBuildContext(spec.context, spec.dockerfile);
        if (!listed.ok) {
          return Failure(`Build failed: ${listed.error.message}`);
        }

        const stream: NodeJS.ReadableStream = await docker.buildImage(
          { context: spec.context, src: listed.value },
          {
            t: tag,
            dockerfile: spec.dockerfile,
            buildargs: { ...spec.buildArgs },
            platform: spec.platform,
          },
        );

        const events = await follow(stream, 'build');
        const failure = streamError(events);
        if (failure) {
          logger.error({ tag, error: failure }, 'Docker build failed');
          return Failure(`Build failed: ${failure}`);
        }

        const inspect = await docker.getImage(tag).inspect();
        const artifact: BuiltArtifact = {
          imageId: inspect.Id,
          tag,
          repoDigests: inspect.RepoDigests ?? [],
        };

        logger.debug({ artifact }, 'Docker build completed');
        return Success(artifact);
      } catch (error) {
        const errorMessage = `Build failed: ${error instanceof Error ? error.message : 'Unknown error'}`;
        logger.error({ error: errorMessage, tag }, 'Docker build failed');
        return Failure(errorMessage);
      }
    },

    async push(artifact: BuiltArtifact, target: ImageRef): Promise<Result<Digest>> {
      const tag = formatImageTag(target);
      try {
        if (artifact.tag !== tag) {
          await docker.getImage(artifact.imageId).tag({
            repo: `${target.registry}/${target.repository}`,
            tag: target.tag,
          });
        }

        const host = registryHost(target);
        const authconfig = options.tokenProvider
          ? {
              username: 'oauth2accesstoken',
              password: await options.tokenProvider.getAccessToken(),
              serveraddress: `https://${host}`,
            }
          : undefined;

        const pushOptions = authconfig ? { authconfig } : {};
        const stream: NodeJS.ReadableStream = await docker.getImage(tag).push(pushOptions);
        const events = await follow(stream, 'push');

        const failure = streamError(events);
        if (failure) {
          return Failure(`Push rejected: ${failure}`);
        }

        const digest = events.map((event) => event.aux?.Digest).find((d) => d !== undefined);
        if (!digest || !isDigest(digest)) {
          return Failure(`Push of ${tag} completed without a digest`);
        }

        logger.info({ tag, digest }, 'Image pushed');
        return Success(digest);
      } catch (error) {
        return Failure(`Failed to push image: ${error instanceof Error ? error.message : 'Unknown error'}`);
      }
    },
  };
};
