/**
 * Delete the services of a deployment file and forget their state.
 * Units without a state record are skipped.
 */

import { createTimer } from '../../lib/logger';
import { Success, type Result } from '../../domain/types/result';
import type { DeploymentError } from '../../errors';
import type { DeploymentResult } from '../../workflows/deploy/deployment-workflow';
import { loadUnits } from '../load-units';
import type { ToolContext } from '../types';
import type { DestroyDeploymentParams } from './schema';

async function destroyDeploymentImpl(
  params: DestroyDeploymentParams,
  context: ToolContext,
): Promise<Result<DeploymentResult, DeploymentError>> {
  const { deps } = context;
  const timer = createTimer(deps.logger, 'destroy-deployment', { file: params.file });

  const units = await loadUnits(params, deps);
  if (!units.ok) {
    timer.error(units.error);
    return units;
  }

  const result = await deps.workflow.runDeployment({
    units: units.value,
    mode: 'destroy',
    signal: context.signal,
  });
  timer.end({ chains: result.chains.length, succeeded: result.succeeded });
  return Success(result);
}

export const destroyDeployment = destroyDeploymentImpl;
