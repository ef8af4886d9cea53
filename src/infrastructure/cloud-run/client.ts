/**
 * Cloud Run Client - Admin API v2 over fetch
 *
 * Implements the platform contract: create, update, delete and status of a
 * service. Mutations return once the platform accepted them; readiness is
 * observed through getServiceStatus.
 */

import { customAlphabet } from 'nanoid';
import type { Logger } from 'pino';
import { z } from 'zod';
import { DEFAULT_TIMEOUTS } from '../../config/defaults';
import { Failure, Success, type Result } from '../../domain/types/result';
import { formatImageRef } from '../../domain/types/image';
import type { Ingress, ServiceSpec } from '../../domain/types/service';
import type {
  PlatformCollaborator,
  PlatformFailure,
  ServiceStatus,
} from '../../domain/types/interfaces';
import type { TokenProvider } from '../auth/token-provider';
import { createGcpRequest } from '../gcp/request';

const API_ROOT = 'https://run.googleapis.com/v2';
const INVOKER_ROLE = 'roles/run.invoker';
const PUBLIC_MEMBER = 'allUsers';

const INGRESS_TRAFFIC: Record<Ingress, string> = {
  all: 'INGRESS_TRAFFIC_ALL',
  internal: 'INGRESS_TRAFFIC_INTERNAL_ONLY',
  'internal-and-cloud-load-balancing': 'INGRESS_TRAFFIC_INTERNAL_LOAD_BALANCER',
};

const revisionSuffix = customAlphabet('abcdefghijklmnopqrstuvwxyz0123456789', 8);

const ServiceResourceSchema = z.object({
  uri: z.string().optional(),
  reconciling: z.boolean().optional(),
  latestReadyRevision: z.string().optional(),
  latestCreatedRevision: z.string().optional(),
  terminalCondition: z
    .object({
      type: z.string().optional(),
      state: z.string().optional(),
      message: z.string().optional(),
    })
    .optional(),
});

const IamPolicySchema = z.object({
  version: z.number().optional(),
  etag: z.string().optional(),
  bindings: z.array(z.object({ role: z.string(), members: z.array(z.string()) })).optional(),
});

type IamPolicy = z.infer<typeof IamPolicySchema>;

export interface CloudRunClientOptions {
  requestTimeoutMs?: number;
}

/**
 * Request body of a v2 Service for a spec, pinned to `revision`
 */
export function toServiceBody(spec: ServiceSpec, revision: string): Record<string, unknown> {
  return {
    ingress: INGRESS_TRAFFIC[spec.ingress],
    template: {
      revision,
      scaling: {
        minInstanceCount: spec.minInstances,
        maxInstanceCount: spec.maxInstances,
      },
      maxInstanceRequestConcurrency: spec.concurrency,
      containers: [
        {
          image: formatImageRef(spec.image),
          ports: [{ containerPort: spec.containerPort }],
          env: Object.keys(spec.env)
            .sort()
            .map((name) => ({ name, value: spec.env[name] })),
          resources: {
            limits: { cpu: spec.cpu, memory: spec.memory },
          },
        },
      ],
    },
  };
}

/**
 * Readiness of a service resource as the platform reports it
 */
export function toServiceStatus(resource: z.infer<typeof ServiceResourceSchema>): ServiceStatus {
  const condition = resource.terminalCondition;
  const revisionId = resource.latestReadyRevision?.split('/').pop();

  if (condition?.state === 'CONDITION_FAILED') {
    // The failing revision is the latest created one, not the one still serving
    const failedRevision = resource.latestCreatedRevision?.split('/').pop() ?? revisionId;
    return { status: 'failed', url: resource.uri, revisionId: failedRevision, message: condition.message };
  }

  const settled =
    condition?.state === 'CONDITION_SUCCEEDED' &&
    resource.reconciling !== true &&
    resource.latestReadyRevision !== undefined &&
    resource.latestReadyRevision === resource.latestCreatedRevision;

  return {
    status: settled ? 'ready' : 'not-ready',
    url: resource.uri,
    revisionId,
    message: condition?.message,
  };
}

export function newRevisionId(serviceName: string): string {
  return `${serviceName}-${revisionSuffix()}`;
}

function servicesUrl(project: string, region: string): string {
  return `${API_ROOT}/projects/${encodeURIComponent(project)}/locations/${encodeURIComponent(region)}/services`;
}

/**
 * Create a Cloud Run client authenticated through `tokenProvider`
 */
export function createCloudRunClient(
  logger: Logger,
  tokenProvider: TokenProvider,
  options: CloudRunClientOptions = {},
): PlatformCollaborator {
  const request = createGcpRequest(logger, tokenProvider, {
    requestTimeoutMs: options.requestTimeoutMs ?? DEFAULT_TIMEOUTS.platformRequest,
    api: 'Cloud Run',
  });

  /**
   * Grant or revoke `roles/run.invoker` for allUsers; no write when already right.
   */
  async function applyPublicAccess(spec: ServiceSpec): Promise<Result<void, PlatformFailure>> {
    const resource = `${servicesUrl(spec.project, spec.region)}/${spec.name}`;
    const current = await request('GET', `${resource}:getIamPolicy`);
    if (!current.ok) return current;

    const parsed = IamPolicySchema.safeParse(current.value);
    const policy: IamPolicy = parsed.success ? parsed.data : {};
    const bindings = policy.bindings ?? [];
    const invoker = bindings.find((binding) => binding.role === INVOKER_ROLE);
    const isPublic = invoker?.members.includes(PUBLIC_MEMBER) ?? false;

    if (isPublic === spec.allowUnauthenticated) {
      return Success(undefined);
    }

    const others = bindings.filter((binding) => binding.role !== INVOKER_ROLE);
    const members = (invoker?.members ?? []).filter((member) => member !== PUBLIC_MEMBER);
    if (spec.allowUnauthenticated) {
      members.push(PUBLIC_MEMBER);
    }
    const next: IamPolicy = {
      ...policy,
      bindings: members.length > 0 ? [...others, { role: INVOKER_ROLE, members }] : others,
    };

    const updated = await request('POST', `${resource}:setIamPolicy`, { policy: next });
    if (!updated.ok) return updated;

    logger.info(
      { service: spec.name, public: spec.allowUnauthenticated },
      'Updated invoker policy',
    );
    return Success(undefined);
  }

  async function mutate(
    method: 'POST' | 'PATCH',
    url: string,
    spec: ServiceSpec,
  ): Promise<Result<string, PlatformFailure>> {
    const revision = newRevisionId(spec.name);
    const result = await request(method, url, toServiceBody(spec, revision));
    if (!result.ok) return result;

    const access = await applyPublicAccess(spec);
    if (!access.ok) return access;

    return Success(revision);
  }

  return {
    async createService(spec: ServiceSpec): Promise<Result<string, PlatformFailure>> {
      logger.info({ service: spec.name, region: spec.region }, 'Creating Cloud Run service');
      const url = `${servicesUrl(spec.project, spec.region)}?serviceId=${encodeURIComponent(spec.name)}`;
      return mutate('POST', url, spec);
    },

    async updateService(
      name: string,
      region: string,
      spec: ServiceSpec,
    ): Promise<Result<string, PlatformFailure>> {
      logger.info({ service: name, region }, 'Updating Cloud Run service');
      return mutate('PATCH', `${servicesUrl(spec.project, region)}/${name}`, spec);
    },

    async deleteService(
      name: string,
      region: string,
      project: string,
    ): Promise<Result<void, PlatformFailure>> {
      logger.info({ service: name, region }, 'Deleting Cloud Run service');
      const result = await request('DELETE', `${servicesUrl(project, region)}/${name}`);
      return result.ok ? Success(undefined) : result;
    },

    async getServiceStatus(
      name: string,
      region: string,
      project: string,
    ): Promise<Result<ServiceStatus, PlatformFailure>> {
      const result = await request('GET', `${servicesUrl(project, region)}/${name}`);
      if (!result.ok) return result;

      const parsed = ServiceResourceSchema.safeParse(result.value);
      if (!parsed.success) {
        return Failure<ServiceStatus, PlatformFailure>({
          kind: 'unavailable',
          message: `Unexpected service resource: ${parsed.error.message}`,
        });
      }
      return Success(toServiceStatus(parsed.data));
    },
  };
}
