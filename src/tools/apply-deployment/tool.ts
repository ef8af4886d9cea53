/**
 * Bring every service of a deployment file to its desired state.
 *
 * Chains that succeed are persisted; a failed chain keeps its previous
 * state record so that the next pass retries it.
 */

import { createTimer } from '../../lib/logger';
import { Success, type Result } from '../../domain/types/result';
import type { DeploymentError } from '../../errors';
import type { DeploymentResult } from '../../workflows/deploy/deployment-workflow';
import { loadUnits } from '../load-units';
import type { ToolContext } from '../types';
import type { ApplyDeploymentParams } from './schema';

async function applyDeploymentImpl(
  params: ApplyDeploymentParams,
  context: ToolContext,
): Promise<Result<DeploymentResult, DeploymentError>> {
  const { deps } = context;
  const timer = createTimer(deps.logger, 'apply-deployment', { file: params.file });

  const units = await loadUnits(params, deps);
  if (!units.ok) {
    timer.error(units.error);
    return units;
  }

  const result = await deps.workflow.runDeployment({
    units: units.value,
    mode: 'apply',
    signal: context.signal,
  });

  for (const chain of result.chains) {
    if (chain.status === 'failed' && chain.error.code === 'REPLACE_FAILED_POST_DELETE') {
      deps.logger.error(
        { resourceId: chain.resourceId, error: chain.error.toJSON() },
        'Service was deleted but not recreated; manual recovery may be needed',
      );
    }
  }

  timer.end({ chains: result.chains.length, succeeded: result.succeeded });
  return Success(result);
}

export const applyDeployment = applyDeploymentImpl;
