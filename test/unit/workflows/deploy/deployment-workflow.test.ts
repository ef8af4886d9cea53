import { describe, it, expect, beforeEach } from '@jest/globals';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DeploymentWorkflow, type ChainOutcome } from '../../../../src/workflows/deploy/deployment-workflow';
import { DigestResolver } from '../../../../src/workflows/deploy/digest-resolver';
import { ServiceReconciler } from '../../../../src/workflows/deploy/service-reconciler';
import { MemoryStateStore } from '../../../../src/infrastructure/state/memory-state-store';
import { FileStateStore } from '../../../../src/infrastructure/state/file-state-store';
import { Success, type Result } from '../../../../src/domain/types/result';
import type { DeploymentError } from '../../../../src/errors';
import type { DeploymentUnit } from '../../../../src/config/deployment-config';
import {
  FakeBuilder,
  FakePlatform,
  FakeRegistry,
  FakeRepositories,
  digestOf,
  makeUnit,
  silentLogger,
  type CallLog,
} from '../../../__support__/fakes';

function actions(chain: ChainOutcome | undefined): string[] {
  if (!chain || (chain.status !== 'planned' && chain.status !== 'applied')) {
    throw new Error(`expected a planned or applied chain, got ${chain?.status ?? 'nothing'}`);
  }
  return chain.steps.map((step) => step.action);
}

describe('DeploymentWorkflow', () => {
  let log: CallLog;
  let builder: FakeBuilder;
  let registry: FakeRegistry;
  let platform: FakePlatform;
  let repositories: FakeRepositories;
  let stateStore: MemoryStateStore;
  let hashes: Record<string, string>;
  let workflow: DeploymentWorkflow;

  beforeEach(() => {
    log = [];
    builder = new FakeBuilder(log);
    registry = new FakeRegistry(log);
    platform = new FakePlatform(log);
    repositories = new FakeRepositories(log);
    stateStore = new MemoryStateStore();
    hashes = {};
    const logger = silentLogger();
    workflow = new DeploymentWorkflow({
      stateStore,
      logger,
      resolver: new DigestResolver(builder, registry, logger, {
        retry: { maxAttempts: 2, delayMs: 1 },
      }),
      reconciler: new ServiceReconciler(platform, logger, { timeoutMs: 30, pollIntervalMs: 1 }),
      repositories,
      hashContext: async (context: string): Promise<Result<string, DeploymentError>> =>
        Success(hashes[context] ?? 'hash-1'),
    });
  });

  async function applyOnce(units: DeploymentUnit[]): Promise<void> {
    const result = await workflow.apply(units);
    if (!result.succeeded) throw new Error('setup apply failed');
    log.length = 0;
  }

  describe('first apply', () => {
    it('should create image, push and service with a pinned digest', async () => {
      const result = await workflow.apply([makeUnit()]);

      expect(result.succeeded).toBe(true);
      const chain = result.chains[0];
      expect(actions(chain)).toEqual(['update', 'update', 'update']);

      const state = await stateStore.read('api');
      expect(state?.ready).toBe(true);
      expect(state?.imageDigest).toBe(digestOf('sha256:image-1'));
      expect(state?.lastApplied.image.digest).toBe(digestOf('sha256:image-1'));
      expect(FakePlatform.mutations(log)).toEqual([
        'build us-central1-docker.pkg.dev/test-project/api-repo/image:latest',
        'push us-central1-docker.pkg.dev/test-project/api-repo/image:latest',
        'create us-central1/api',
      ]);
    });

    it('should report the pinned image reference and url', async () => {
      const result = await workflow.apply([makeUnit()]);

      expect(result.chains[0]).toMatchObject({
        status: 'applied',
        outputs: {
          imageRef: `us-central1-docker.pkg.dev/test-project/api-repo/image@${digestOf('sha256:image-1')}`,
          url: 'https://api-us-central1.run.app',
        },
      });
    });
  });

  describe('idempotence', () => {
    it('should plan unchanged everywhere and call nothing on re-apply', async () => {
      await applyOnce([makeUnit()]);
      const before = await stateStore.read('api');

      const result = await workflow.apply([makeUnit()]);

      expect(actions(result.chains[0])).toEqual(['unchanged', 'unchanged', 'unchanged']);
      expect(result.chains[0]).toMatchObject({ status: 'applied', changed: false });
      expect(log).toEqual([]);
      expect(await stateStore.read('api')).toEqual(before);
    });

    it('should settle on a second apply with state persisted to disk', async () => {
      const dir = await mkdtemp(join(tmpdir(), 'deployer-workflow-'));
      try {
        const logger = silentLogger();
        const onDisk = new DeploymentWorkflow({
          stateStore: new FileStateStore(join(dir, 'state'), logger),
          logger,
          resolver: new DigestResolver(builder, registry, logger, { retry: { maxAttempts: 2, delayMs: 1 } }),
          reconciler: new ServiceReconciler(platform, logger, { timeoutMs: 30, pollIntervalMs: 1 }),
          repositories,
          hashContext: async (): Promise<Result<string, DeploymentError>> => Success('hash-1'),
        });
        const unit: DeploymentUnit = {
          ...makeUnit(),
          repository: { project: 'test-project', location: 'us-central1', repositoryId: 'api-repo' },
        };

        const first = await onDisk.apply([unit]);
        expect(first.succeeded).toBe(true);
        log.length = 0;

        const second = await onDisk.apply([unit]);

        expect(actions(second.chains[0])).toEqual(['unchanged', 'unchanged', 'unchanged']);
        expect(second.chains[0]).toMatchObject({ status: 'applied', changed: false });
        expect(log).toEqual([]);
      } finally {
        await rm(dir, { recursive: true, force: true });
      }
    });
  });

  describe('image repository', () => {
    const repository = { project: 'test-project', location: 'us-central1', repositoryId: 'api-repo' };

    it('should create the repository before the first push', async () => {
      const result = await workflow.apply([{ ...makeUnit(), repository }]);

      expect(result.succeeded).toBe(true);
      expect(log.slice(0, 3)).toEqual([
        'build us-central1-docker.pkg.dev/test-project/api-repo/image:latest',
        'create-repository test-project/us-central1/api-repo',
        'push us-central1-docker.pkg.dev/test-project/api-repo/image:latest',
      ]);
    });

    it('should leave an existing repository alone', async () => {
      repositories.existing.add('test-project/us-central1/api-repo');

      const result = await workflow.apply([{ ...makeUnit(), repository }]);

      expect(result.succeeded).toBe(true);
      expect(log.filter((entry) => entry.startsWith('create-repository'))).toEqual([]);
    });

    it('should fail the push step without pushing when the repository cannot be created', async () => {
      repositories.failure = { kind: 'rejected', message: 'permission denied', status: 403 };

      const result = await workflow.apply([{ ...makeUnit(), repository }]);

      expect(result.chains[0]).toMatchObject({
        status: 'failed',
        failedNode: 'api:push',
        partial: false,
        error: { code: 'INVALID_CONFIGURATION' },
      });
      expect(FakePlatform.mutations(log)).toEqual([
        'build us-central1-docker.pkg.dev/test-project/api-repo/image:latest',
      ]);
    });
  });

  describe('service-only changes', () => {
    it('should update only the service when an env var is added', async () => {
      await applyOnce([makeUnit()]);

      const result = await workflow.apply([makeUnit({ service: { env: { FOO: 'bar' } } })]);

      expect(actions(result.chains[0])).toEqual(['unchanged', 'unchanged', 'update']);
      expect(FakePlatform.mutations(log)).toEqual(['update us-central1/api']);
      const state = await stateStore.read('api');
      expect(state?.lastApplied.env).toEqual({ FOO: 'bar' });
      expect(state?.imageDigest).toBe(digestOf('sha256:image-1'));
    });

    it('should replace the service when the region changes, deleting first', async () => {
      await applyOnce([makeUnit()]);

      const result = await workflow.apply([makeUnit({ service: { region: 'europe-west1' } })]);

      expect(actions(result.chains[0])).toEqual(['unchanged', 'unchanged', 'replace']);
      expect(FakePlatform.mutations(log)).toEqual([
        'delete us-central1/api',
        'create europe-west1/api',
      ]);
      expect((await stateStore.read('api'))?.region).toBe('europe-west1');
    });

    it('should replace the service when its name changes', async () => {
      await applyOnce([makeUnit()]);

      const result = await workflow.preview([makeUnit({ service: { name: 'api-v2' } })]);

      expect(actions(result.chains[0])).toEqual(['unchanged', 'unchanged', 'replace']);
    });
  });

  describe('image changes', () => {
    it('should rebuild and roll the new digest out when sources change', async () => {
      await applyOnce([makeUnit()]);
      hashes['/work/api'] = 'hash-2';

      const result = await workflow.apply([makeUnit()]);

      expect(actions(result.chains[0])).toEqual(['replace', 'update', 'update']);
      const state = await stateStore.read('api');
      expect(state?.imageDigest).toBe(digestOf('sha256:image-2'));
      expect(state?.image.contextHash).toBe('hash-2');
      expect(FakePlatform.mutations(log)).toEqual([
        'build us-central1-docker.pkg.dev/test-project/api-repo/image:latest',
        'push us-central1-docker.pkg.dev/test-project/api-repo/image:latest',
        'update us-central1/api',
      ]);
    });
  });

  describe('preview', () => {
    it('should never build, push or touch the platform', async () => {
      await applyOnce([makeUnit()]);
      hashes['/work/api'] = 'hash-2';

      const result = await workflow.preview([
        makeUnit({ service: { region: 'europe-west1' } }),
        makeUnit({ resourceId: 'web' }),
      ]);

      expect(result.mode).toBe('preview');
      expect(actions(result.chains[0])).toEqual(['replace', 'update', 'replace']);
      expect(actions(result.chains[1])).toEqual(['update', 'update', 'update']);
      expect(log).toEqual([]);
      expect(await stateStore.list()).toHaveLength(1);
    });

    it('should mark forced steps and list changed fields', async () => {
      await applyOnce([makeUnit()]);
      hashes['/work/api'] = 'hash-2';

      const result = await workflow.preview([makeUnit()]);
      const chain = result.chains[0];
      if (chain?.status !== 'planned') throw new Error('expected a plan');

      expect(chain.steps).toEqual([
        { nodeId: 'api:image', kind: 'image', action: 'replace', forced: false, changes: ['contextHash'] },
        { nodeId: 'api:push', kind: 'push', action: 'update', forced: true, changes: [] },
        { nodeId: 'api:service', kind: 'service', action: 'update', forced: true, changes: [] },
      ]);
    });
  });

  describe('failures', () => {
    it('should not reconcile the service when the push fails', async () => {
      registry.failures = ['denied', 'denied'];

      const result = await workflow.apply([makeUnit()]);

      expect(result.succeeded).toBe(false);
      expect(result.chains[0]).toMatchObject({
        status: 'failed',
        failedNode: 'api:push',
        partial: true,
        completed: [{ nodeId: 'api:image', action: 'update' }],
      });
      expect(log.filter((entry) => entry.startsWith('create'))).toEqual([]);
      expect(await stateStore.read('api')).toBeUndefined();
    });

    it('should keep other chains going when one fails', async () => {
      const result = await workflow.apply([
        makeUnit({ resourceId: 'api' }),
        makeUnit({ resourceId: 'web' }),
      ]);
      expect(result.succeeded).toBe(true);
      log.length = 0;

      platform.failUpdate = { kind: 'rejected', message: 'memory too large', status: 400 };
      const next = await workflow.apply([
        makeUnit({ resourceId: 'api', service: { memory: '64Gi' } }),
        makeUnit({ resourceId: 'web' }),
      ]);

      expect(next.succeeded).toBe(false);
      expect(next.chains.map((chain) => chain.status)).toEqual(['failed', 'applied']);
      expect(next.chains[0]).toMatchObject({
        failedNode: 'api:service',
        error: { code: 'INVALID_CONFIGURATION' },
      });
    });

    it('should leave the state untouched when readiness times out', async () => {
      await applyOnce([makeUnit()]);
      const before = await stateStore.read('api');
      platform.stuck = true;

      const result = await workflow.apply([makeUnit({ service: { env: { FOO: 'bar' } } })]);

      expect(result.chains[0]).toMatchObject({ status: 'failed', error: { code: 'TIMEOUT' } });
      expect(await stateStore.read('api')).toEqual(before);
    });

    it('should fail the chain when the build context cannot be hashed', async () => {
      const failing = new DeploymentWorkflow({
        stateStore,
        logger: silentLogger(),
        resolver: new DigestResolver(builder, registry, silentLogger()),
        reconciler: new ServiceReconciler(platform, silentLogger()),
        repositories,
      });

      const result = await failing.apply([makeUnit({ build: { context: '/does/not/exist' } })]);

      expect(result.chains[0]).toMatchObject({
        status: 'failed',
        error: { code: 'INVALID_CONFIGURATION' },
      });
      expect(log).toEqual([]);
    });
  });

  describe('cancellation', () => {
    it('should cancel every chain before any call', async () => {
      const controller = new AbortController();
      controller.abort();

      const result = await workflow.apply(
        [makeUnit({ resourceId: 'api' }), makeUnit({ resourceId: 'web' })],
        controller.signal,
      );

      expect(result.chains.map((chain) => chain.status)).toEqual(['cancelled', 'cancelled']);
      expect(log).toEqual([]);
    });
  });

  describe('destroy', () => {
    it('should delete deployed services and drop their state', async () => {
      await applyOnce([makeUnit()]);

      const result = await workflow.runDeployment({
        units: [makeUnit(), makeUnit({ resourceId: 'web' })],
        mode: 'destroy',
      });

      expect(result.chains).toEqual([
        { resourceId: 'api', status: 'destroyed', existed: true },
        { resourceId: 'web', status: 'destroyed', existed: false },
      ]);
      expect(log).toEqual(['delete us-central1/api']);
      expect(await stateStore.read('api')).toBeUndefined();
    });
  });
});
