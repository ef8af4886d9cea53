/**
 * Deployment File
 *
 * The declarative record a caller hands to the deployer: one entry per
 * deployment unit, each with an image section and a service section.
 * Parsing yields immutable specs, rebuilt on every pass.
 */

import { readFile } from 'node:fs/promises';
import { dirname, extname, resolve } from 'node:path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { InvalidConfigurationError, errorMessage } from '../errors';
import type { BuildSpec, ImageRef } from '../domain/types/image';
import type { RepositoryRef } from '../domain/types/interfaces';
import { INGRESS_SETTINGS, type ServiceSpec } from '../domain/types/service';
import { DEFAULT_IMAGE, DEFAULT_SERVICE, defaultRegistryHost } from './defaults';

/** Variables the platform sets itself */
const RESERVED_ENV_NAMES = new Set(['PORT', 'K_SERVICE', 'K_REVISION', 'K_CONFIGURATION']);

const ResourceIdSchema = z
  .string()
  .regex(/^[a-z][a-z0-9-]*$/, 'must start with a lowercase letter and contain only [a-z0-9-]');

const ServiceNameSchema = z
  .string()
  .regex(
    /^[a-z]([-a-z0-9]{0,47}[a-z0-9])?$/,
    'must be at most 49 lowercase letters, digits or hyphens, starting with a letter',
  );

const EnvNameSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'is not a valid environment variable name');

const EnvValueSchema = z.union([z.string(), z.number(), z.boolean()]).transform(String);

const ImageSectionSchema = z
  .object({
    context: z.string().min(1).default(DEFAULT_IMAGE.context),
    dockerfile: z.string().min(1).optional(),
    buildArgs: z.record(z.string(), EnvValueSchema).default({}),
    name: z.string().min(1).default(DEFAULT_IMAGE.name),
    registry: z.string().min(1).optional(),
    repository: z.string().min(1).optional(),
    tag: z
      .string()
      .regex(/^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/, 'is not a valid image tag')
      .default(DEFAULT_IMAGE.tag),
    platform: z.string().min(1).default(DEFAULT_IMAGE.platform),
  })
  .strict();

const ServiceSectionSchema = z
  .object({
    name: ServiceNameSchema.optional(),
    region: z.string().min(1).optional(),
    env: z.record(EnvNameSchema, EnvValueSchema).default({}),
    cpu: z.coerce
      .string()
      .regex(/^\d+(\.\d+)?m?$/, 'must be a CPU quantity such as 1, 2 or 1000m')
      .default(DEFAULT_SERVICE.cpu),
    memory: z
      .string()
      .regex(/^\d+(Mi|Gi)$/, 'must be a memory quantity such as 512Mi or 1Gi')
      .default(DEFAULT_SERVICE.memory),
    minInstances: z.number().int().min(0).default(DEFAULT_SERVICE.minInstances),
    maxInstances: z.number().int().min(1).default(DEFAULT_SERVICE.maxInstances),
    concurrency: z.number().int().min(1).max(1000).default(DEFAULT_SERVICE.concurrency),
    containerPort: z.number().int().min(1).max(65535).default(DEFAULT_SERVICE.containerPort),
    ingress: z.enum(INGRESS_SETTINGS).default(DEFAULT_SERVICE.ingress),
    allowUnauthenticated: z.boolean().default(DEFAULT_SERVICE.allowUnauthenticated),
  })
  .strict()
  .superRefine((service, ctx) => {
    if (service.minInstances > service.maxInstances) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['minInstances'],
        message: `must not exceed maxInstances (${service.minInstances} > ${service.maxInstances})`,
      });
    }
    for (const key of Object.keys(service.env)) {
      if (RESERVED_ENV_NAMES.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['env', key],
          message: 'is reserved by the platform',
        });
      }
    }
  });

const UnitSchema = z
  .object({
    image: ImageSectionSchema.default({}),
    service: ServiceSectionSchema.default({}),
  })
  .strict();

export const DeploymentFileSchema = z
  .object({
    project: z.string().min(1).optional(),
    region: z.string().min(1).optional(),
    services: z.record(ResourceIdSchema, UnitSchema),
  })
  .strict();

export type DeploymentFile = z.input<typeof DeploymentFileSchema>;

/**
 * Everything one chain needs: what to build, where to push it, what to run.
 */
export interface DeploymentUnit {
  resourceId: string;
  build: BuildSpec;
  target: ImageRef;
  /** Set when `target` lives in the default Artifact Registry, which the deployer creates */
  repository?: RepositoryRef | undefined;
  service: ServiceSpec;
}

export interface DeploymentDefaults {
  project?: string | undefined;
  region?: string | undefined;
  /** Directory relative build contexts resolve against */
  baseDir?: string | undefined;
}

function issuePath(path: Array<string | number>): string {
  return path.length > 0 ? path.join('.') : '(root)';
}

/**
 * Validate a raw deployment record and expand it into deployment units.
 * Every violation is collected before failing.
 */
export function resolveDeploymentUnits(
  raw: unknown,
  defaults: DeploymentDefaults = {},
): DeploymentUnit[] {
  const parsed = DeploymentFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidConfigurationError(
      'Invalid deployment configuration',
      parsed.error.issues.map((issue) => `${issuePath(issue.path)}: ${issue.message}`),
    );
  }

  const file = parsed.data;
  const project = file.project ?? defaults.project;
  const baseDir = defaults.baseDir ?? process.cwd();
  const violations: string[] = [];
  const units: DeploymentUnit[] = [];
  const claimed = new Map<string, string>();

  if (!project) {
    violations.push('project: missing, set it in the file or GOOGLE_CLOUD_PROJECT');
  }

  const entries = Object.entries(file.services);
  if (entries.length === 0) {
    violations.push('services: at least one service is required');
  }

  for (const [resourceId, unit] of entries) {
    const region = unit.service.region ?? file.region ?? defaults.region;
    if (!region) {
      violations.push(
        `services.${resourceId}.service.region: missing, set it here, at the top level or in GOOGLE_CLOUD_REGION`,
      );
      continue;
    }

    const name = unit.service.name ?? resourceId;
    const key = `${region}/${name}`;
    const owner = claimed.get(key);
    if (owner) {
      violations.push(
        `services.${resourceId}: targets service ${name} in ${region}, already claimed by ${owner}`,
      );
      continue;
    }
    claimed.set(key, resourceId);

    if (!project) {
      continue;
    }

    const target: ImageRef = {
      registry: unit.image.registry ?? `${defaultRegistryHost(region)}/${project}`,
      repository: unit.image.repository ?? `${resourceId}-repo/${unit.image.name}`,
      tag: unit.image.tag,
    };
    const repository: RepositoryRef | undefined = unit.image.registry
      ? undefined
      : { project, location: region, repositoryId: target.repository.split('/')[0] ?? target.repository };

    units.push({
      resourceId,
      build: {
        context: resolve(baseDir, unit.image.context),
        dockerfile: unit.image.dockerfile,
        buildArgs: unit.image.buildArgs,
        platform: unit.image.platform,
      },
      target,
      repository,
      service: {
        name,
        project,
        region,
        image: target,
        env: unit.service.env,
        cpu: unit.service.cpu,
        memory: unit.service.memory,
        minInstances: unit.service.minInstances,
        maxInstances: unit.service.maxInstances,
        concurrency: unit.service.concurrency,
        containerPort: unit.service.containerPort,
        ingress: unit.service.ingress,
        allowUnauthenticated: unit.service.allowUnauthenticated,
      },
    });
  }

  if (violations.length > 0) {
    throw new InvalidConfigurationError('Invalid deployment configuration', violations);
  }

  return units;
}

/**
 * Parse YAML or JSON deployment file content
 */
export function parseDeploymentFile(content: string, fileName = 'deployment.yaml'): unknown {
  try {
    return extname(fileName) === '.json' ? JSON.parse(content) : yaml.load(content);
  } catch (error) {
    throw new InvalidConfigurationError(`Cannot parse ${fileName}: ${errorMessage(error)}`);
  }
}

/**
 * Read a deployment file; build contexts resolve relative to the file.
 */
export async function loadDeploymentFile(
  filePath: string,
  defaults: Omit<DeploymentDefaults, 'baseDir'> = {},
): Promise<DeploymentUnit[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new InvalidConfigurationError(
      `Cannot read deployment file ${filePath}: ${errorMessage(error)}`,
    );
  }

  return resolveDeploymentUnits(parseDeploymentFile(content, filePath), {
    ...defaults,
    baseDir: dirname(resolve(filePath)),
  });
}
