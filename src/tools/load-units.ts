/**
 * Deployment units for a tool call: the file, narrowed to `only` when given
 */

import type { z } from 'zod';
import { loadDeploymentFile, type DeploymentUnit } from '../config/deployment-config';
import { InvalidConfigurationError, isDeploymentError, type DeploymentError } from '../errors';
import { Failure, Success, type Result } from '../domain/types/result';
import type { Deps } from '../app/container';
import { deploymentTargetSchema, type DeploymentTargetParams } from './types';

function issues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export async function loadUnits(
  params: DeploymentTargetParams,
  deps: Pick<Deps, 'config'>,
): Promise<Result<DeploymentUnit[], DeploymentError>> {
  const parsed = deploymentTargetSchema.safeParse(params);
  if (!parsed.success) {
    return Failure(new InvalidConfigurationError('Invalid parameters', issues(parsed.error)));
  }
  const { file, only } = parsed.data;

  let units: DeploymentUnit[];
  try {
    units = await loadDeploymentFile(file, {
      project: deps.config.gcp.project,
      region: deps.config.gcp.region,
    });
  } catch (error) {
    if (isDeploymentError(error)) return Failure(error);
    throw error;
  }

  if (!only || only.length === 0) {
    return Success(units);
  }

  const known = new Set(units.map((unit) => unit.resourceId));
  const unknown = only.filter((id) => !known.has(id));
  if (unknown.length > 0) {
    return Failure(
      new InvalidConfigurationError(
        `Unknown resource ids in ${file}`,
        unknown.map((id) => `${id}: not defined in services`),
      ),
    );
  }
  return Success(units.filter((unit) => only.includes(unit.resourceId)));
}
