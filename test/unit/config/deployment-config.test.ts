import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  loadDeploymentFile,
  parseDeploymentFile,
  resolveDeploymentUnits,
} from '../../../src/config/deployment-config';
import { InvalidConfigurationError } from '../../../src/errors';

function violationsOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof InvalidConfigurationError) return error.violations;
    throw error;
  }
  throw new Error('expected InvalidConfigurationError');
}

describe('Deployment configuration', () => {
  describe('resolveDeploymentUnits', () => {
    it('should apply the defaults to a bare service', () => {
      const [unit] = resolveDeploymentUnits(
        { project: 'test-project', region: 'us-central1', services: { api: {} } },
        { baseDir: '/work' },
      );

      expect(unit).toEqual({
        resourceId: 'api',
        build: {
          context: '/work/app',
          dockerfile: undefined,
          buildArgs: {},
          platform: 'linux/amd64',
        },
        target: {
          registry: 'us-central1-docker.pkg.dev/test-project',
          repository: 'api-repo/image',
          tag: 'latest',
        },
        repository: { project: 'test-project', location: 'us-central1', repositoryId: 'api-repo' },
        service: {
          name: 'api',
          project: 'test-project',
          region: 'us-central1',
          image: {
            registry: 'us-central1-docker.pkg.dev/test-project',
            repository: 'api-repo/image',
            tag: 'latest',
          },
          env: {},
          cpu: '1',
          memory: '1Gi',
          minInstances: 0,
          maxInstances: 100,
          concurrency: 3,
          containerPort: 8080,
          ingress: 'all',
          allowUnauthenticated: false,
        },
      });
    });

    it('should take project and region from the defaults when the file has none', () => {
      const [unit] = resolveDeploymentUnits(
        { services: { api: { service: { env: { PORT_HINT: 8080, DEBUG: true } } } } },
        { project: 'env-project', region: 'europe-west1', baseDir: '/work' },
      );

      expect(unit?.service.project).toBe('env-project');
      expect(unit?.service.region).toBe('europe-west1');
      expect(unit?.service.env).toEqual({ PORT_HINT: '8080', DEBUG: 'true' });
      expect(unit?.target.registry).toBe('europe-west1-docker.pkg.dev/env-project');
    });

    it('should only manage the repository of the default registry', () => {
      const units = resolveDeploymentUnits({
        project: 'test-project',
        region: 'us-central1',
        services: {
          api: { image: { repository: 'shared/api' } },
          web: { image: { registry: 'ghcr.io/example', repository: 'web' } },
        },
      });

      expect(units.map((unit) => unit.repository)).toEqual([
        { project: 'test-project', location: 'us-central1', repositoryId: 'shared' },
        undefined,
      ]);
    });

    it('should let a service override the top-level region', () => {
      const [unit] = resolveDeploymentUnits({
        project: 'test-project',
        region: 'us-central1',
        services: { api: { service: { region: 'asia-east1', name: 'public-api' } } },
      });
      expect(unit?.service.region).toBe('asia-east1');
      expect(unit?.service.name).toBe('public-api');
    });

    it('should report every violation at once', () => {
      const violations = violationsOf(() =>
        resolveDeploymentUnits({
          services: {
            api: { service: { minInstances: 5, maxInstances: 2, env: { PORT: '80' } } },
          },
        }),
      );

      expect(violations).toEqual([
        'services.api.service.minInstances: must not exceed maxInstances (5 > 2)',
        'services.api.service.env.PORT: is reserved by the platform',
      ]);
    });

    it('should require a project and a region', () => {
      const violations = violationsOf(() => resolveDeploymentUnits({ services: { api: {} } }));

      expect(violations).toEqual([
        'project: missing, set it in the file or GOOGLE_CLOUD_PROJECT',
        'services.api.service.region: missing, set it here, at the top level or in GOOGLE_CLOUD_REGION',
      ]);
    });

    it('should reject two units claiming the same service', () => {
      const violations = violationsOf(() =>
        resolveDeploymentUnits({
          project: 'test-project',
          region: 'us-central1',
          services: { api: {}, web: { service: { name: 'api' } } },
        }),
      );

      expect(violations).toEqual([
        'services.web: targets service api in us-central1, already claimed by api',
      ]);
    });

    it('should reject unknown keys and bad names', () => {
      const violations = violationsOf(() =>
        resolveDeploymentUnits({
          project: 'test-project',
          region: 'us-central1',
          services: { api: { service: { name: 'Not_Valid', replicas: 3 } } },
        }),
      );

      expect(violations).toHaveLength(2);
      expect(violations[0]).toMatch(/^services\.api\.service\.name: must be at most 49/);
      expect(violations[1]).toMatch(/^services\.api\.service: Unrecognized key/);
    });

    it('should reject an empty services map', () => {
      const violations = violationsOf(() =>
        resolveDeploymentUnits({ project: 'test-project', region: 'us-central1', services: {} }),
      );
      expect(violations).toEqual(['services: at least one service is required']);
    });
  });

  describe('parseDeploymentFile', () => {
    it('should read YAML', () => {
      expect(parseDeploymentFile('project: p\nservices:\n  api: {}\n')).toEqual({
        project: 'p',
        services: { api: {} },
      });
    });

    it('should read JSON by extension', () => {
      expect(parseDeploymentFile('{"services":{}}', 'deploy.json')).toEqual({ services: {} });
    });

    it('should wrap syntax errors', () => {
      expect(() => parseDeploymentFile('services: [', 'broken.yaml')).toThrow(
        InvalidConfigurationError,
      );
    });
  });

  describe('loadDeploymentFile', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'deployer-config-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should resolve build contexts relative to the file', async () => {
      const file = join(dir, 'deployment.yaml');
      await writeFile(
        file,
        [
          'project: test-project',
          'region: us-central1',
          'services:',
          '  api:',
          '    image:',
          '      context: ./services/api',
          '      buildArgs:',
          '        MODE: prod',
          '',
        ].join('\n'),
      );

      const units = await loadDeploymentFile(file);

      expect(units).toHaveLength(1);
      expect(units[0]?.build.context).toBe(join(dir, 'services/api'));
      expect(units[0]?.build.buildArgs).toEqual({ MODE: 'prod' });
    });

    it('should fail with InvalidConfiguration for a missing file', async () => {
      await expect(loadDeploymentFile(join(dir, 'missing.yaml'))).rejects.toBeInstanceOf(
        InvalidConfigurationError,
      );
    });
  });
});
