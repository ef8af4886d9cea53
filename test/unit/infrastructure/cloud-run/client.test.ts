import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import {
  createCloudRunClient,
  toServiceBody,
  toServiceStatus,
} from '../../../../src/infrastructure/cloud-run/client';
import { createStaticTokenProvider } from '../../../../src/infrastructure/auth/token-provider';
import type { PlatformCollaborator } from '../../../../src/domain/types/interfaces';
import type { ServiceSpec } from '../../../../src/domain/types/service';
import { digestOf, makeUnit, silentLogger } from '../../../__support__/fakes';

interface RecordedRequest {
  method: string;
  url: string;
  authorization: string | undefined;
  body: unknown;
}

const SERVICES = 'https://run.googleapis.com/v2/projects/test-project/locations/us-central1/services';
const digest = digestOf('image-1');

function json(body: unknown, status = 200, statusText = 'OK'): Response {
  return new Response(JSON.stringify(body), {
    status,
    statusText,
    headers: { 'Content-Type': 'application/json' },
  });
}

function apiError(status: number, message: string): Response {
  return json({ error: { message, status: 'ERROR' } }, status, 'Error');
}

describe('Cloud Run client', () => {
  const base = makeUnit();
  const spec: ServiceSpec = {
    ...base.service,
    image: { ...base.target, digest },
    env: { ZED: 'z', ALPHA: 'a' },
  };

  let requests: RecordedRequest[];
  let responses: Response[];
  let client: PlatformCollaborator;

  beforeEach(() => {
    requests = [];
    responses = [];
    jest.spyOn(globalThis, 'fetch').mockImplementation(async (input, init) => {
      const headers = new Headers(init?.headers);
      const body = init?.body;
      requests.push({
        method: init?.method ?? 'GET',
        url: String(input),
        authorization: headers.get('Authorization') ?? undefined,
        body: typeof body === 'string' ? JSON.parse(body) : undefined,
      });
      const next = responses.shift();
      if (!next) throw new Error(`unexpected request ${String(input)}`);
      return next;
    });
    client = createCloudRunClient(silentLogger(), createStaticTokenProvider('test-secret'));
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('toServiceBody', () => {
    it('should pin the image by digest and sort env vars', () => {
      expect(toServiceBody(spec, 'api-rev1')).toEqual({
        ingress: 'INGRESS_TRAFFIC_ALL',
        template: {
          revision: 'api-rev1',
          scaling: { minInstanceCount: 0, maxInstanceCount: 100 },
          maxInstanceRequestConcurrency: 3,
          containers: [
            {
              image: `us-central1-docker.pkg.dev/test-project/api-repo/image@${digest}`,
              ports: [{ containerPort: 8080 }],
              env: [
                { name: 'ALPHA', value: 'a' },
                { name: 'ZED', value: 'z' },
              ],
              resources: { limits: { cpu: '1', memory: '1Gi' } },
            },
          ],
        },
      });
    });
  });

  describe('toServiceStatus', () => {
    const revision = 'projects/test-project/locations/us-central1/services/api/revisions/api-rev1';

    it('should report ready once the latest revision serves', () => {
      expect(
        toServiceStatus({
          uri: 'https://api.run.app',
          reconciling: false,
          latestReadyRevision: revision,
          latestCreatedRevision: revision,
          terminalCondition: { type: 'Ready', state: 'CONDITION_SUCCEEDED' },
        }),
      ).toEqual({ status: 'ready', url: 'https://api.run.app', revisionId: 'api-rev1' });
    });

    it('should report not-ready while reconciling', () => {
      expect(
        toServiceStatus({
          reconciling: true,
          latestReadyRevision: revision,
          latestCreatedRevision: `${revision}-next`,
          terminalCondition: { state: 'CONDITION_SUCCEEDED' },
        }).status,
      ).toBe('not-ready');
    });

    it('should report a failed terminal condition with its message', () => {
      expect(
        toServiceStatus({
          terminalCondition: { state: 'CONDITION_FAILED', message: 'container failed to start' },
        }),
      ).toEqual({ status: 'failed', message: 'container failed to start' });
    });

    it('should attribute a failure to the latest created revision', () => {
      expect(
        toServiceStatus({
          terminalCondition: { state: 'CONDITION_FAILED', message: 'container failed to start' },
          latestReadyRevision: 'projects/test-project/locations/us-central1/services/api/revisions/api-00001',
          latestCreatedRevision: 'projects/test-project/locations/us-central1/services/api/revisions/api-00002',
        }),
      ).toEqual({ status: 'failed', revisionId: 'api-00002', message: 'container failed to start' });
    });
  });

  describe('createService', () => {
    it('should post the service and leave a private invoker policy alone', async () => {
      responses.push(json({ name: 'operations/op-1' }), json({}));

      const result = await client.createService(spec);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value).toMatch(/^api-[a-z0-9]{8}$/);
      expect(requests.map((request) => [request.method, request.url])).toEqual([
        ['POST', `${SERVICES}?serviceId=api`],
        ['GET', `${SERVICES}/api:getIamPolicy`],
      ]);
      expect(requests[0]?.authorization).toBe('Bearer test-secret');
      expect(requests[0]?.body).toMatchObject({ template: { revision: result.value } });
    });

    it('should grant allUsers the invoker role for public services', async () => {
      responses.push(
        json({}),
        json({ etag: 'etag-1', bindings: [{ role: 'roles/viewer', members: ['user:dev@example.com'] }] }),
        json({}),
      );

      const result = await client.createService({ ...spec, allowUnauthenticated: true });

      expect(result.ok).toBe(true);
      expect(requests[2]).toMatchObject({
        method: 'POST',
        url: `${SERVICES}/api:setIamPolicy`,
        body: {
          policy: {
            etag: 'etag-1',
            bindings: [
              { role: 'roles/viewer', members: ['user:dev@example.com'] },
              { role: 'roles/run.invoker', members: ['allUsers'] },
            ],
          },
        },
      });
    });

    it('should map 409 to conflict', async () => {
      responses.push(apiError(409, 'Resource already exists'));

      const result = await client.createService(spec);

      expect(result).toEqual({
        ok: false,
        error: { kind: 'conflict', message: 'Resource already exists', status: 409 },
      });
    });
  });

  describe('updateService', () => {
    it('should patch the service and revoke public access when no longer wanted', async () => {
      responses.push(
        json({}),
        json({ bindings: [{ role: 'roles/run.invoker', members: ['allUsers', 'user:ops@example.com'] }] }),
        json({}),
      );

      const result = await client.updateService('api', 'us-central1', spec);

      expect(result.ok).toBe(true);
      expect(requests[0]).toMatchObject({ method: 'PATCH', url: `${SERVICES}/api` });
      expect(requests[2]?.body).toEqual({
        policy: { bindings: [{ role: 'roles/run.invoker', members: ['user:ops@example.com'] }] },
      });
    });

    it('should map 400 to rejected and keep the platform message', async () => {
      responses.push(apiError(400, 'memory must be at most 32Gi'));

      const result = await client.updateService('api', 'us-central1', spec);

      expect(result).toEqual({
        ok: false,
        error: { kind: 'rejected', message: 'memory must be at most 32Gi', status: 400 },
      });
    });
  });

  describe('deleteService', () => {
    it('should map 404 to not-found', async () => {
      responses.push(apiError(404, 'Service api not found'));

      const result = await client.deleteService('api', 'us-central1', 'test-project');

      expect(result).toEqual({
        ok: false,
        error: { kind: 'not-found', message: 'Service api not found', status: 404 },
      });
      expect(requests[0]).toMatchObject({ method: 'DELETE', url: `${SERVICES}/api` });
    });
  });

  describe('getServiceStatus', () => {
    it('should read the service resource', async () => {
      responses.push(
        json({
          uri: 'https://api.run.app',
          latestReadyRevision: 'services/api/revisions/api-rev2',
          latestCreatedRevision: 'services/api/revisions/api-rev2',
          terminalCondition: { state: 'CONDITION_SUCCEEDED' },
        }),
      );

      const result = await client.getServiceStatus('api', 'us-central1', 'test-project');

      expect(result).toEqual({
        ok: true,
        value: { status: 'ready', url: 'https://api.run.app', revisionId: 'api-rev2' },
      });
    });

    it('should treat throttling and server errors as unavailable', async () => {
      responses.push(apiError(429, 'quota exceeded'), new Response('upstream', { status: 502, statusText: 'Bad Gateway' }));

      const throttled = await client.getServiceStatus('api', 'us-central1', 'test-project');
      const broken = await client.getServiceStatus('api', 'us-central1', 'test-project');

      expect(throttled).toEqual({
        ok: false,
        error: { kind: 'unavailable', message: 'quota exceeded', status: 429 },
      });
      expect(broken).toEqual({
        ok: false,
        error: { kind: 'unavailable', message: '502 Bad Gateway', status: 502 },
      });
    });

    it('should report network errors as unavailable', async () => {
      jest.spyOn(globalThis, 'fetch').mockRejectedValueOnce(new TypeError('fetch failed'));

      const result = await client.getServiceStatus('api', 'us-central1', 'test-project');

      expect(result).toEqual({ ok: false, error: { kind: 'unavailable', message: 'fetch failed' } });
    });
  });
});
