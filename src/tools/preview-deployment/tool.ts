/**
 * Plan a deployment file against the recorded state.
 * Reads state and build contexts only; nothing is built, pushed or changed.
 *
 * @example
 * ```typescript
 * const result = await previewDeployment({ file: 'deployment.yaml' }, { deps });
 * ```
 */

import { createTimer } from '../../lib/logger';
import { Success, type Result } from '../../domain/types/result';
import type { DeploymentError } from '../../errors';
import type { DeploymentResult } from '../../workflows/deploy/deployment-workflow';
import { loadUnits } from '../load-units';
import type { ToolContext } from '../types';
import type { PreviewDeploymentParams } from './schema';

async function previewDeploymentImpl(
  params: PreviewDeploymentParams,
  context: ToolContext,
): Promise<Result<DeploymentResult, DeploymentError>> {
  const { deps } = context;
  const timer = createTimer(deps.logger, 'preview-deployment', { file: params.file });

  const units = await loadUnits(params, deps);
  if (!units.ok) {
    timer.error(units.error);
    return units;
  }

  const result = await deps.workflow.runDeployment({
    units: units.value,
    mode: 'preview',
    signal: context.signal,
  });
  timer.end({ chains: result.chains.length, succeeded: result.succeeded });
  return Success(result);
}

export const previewDeployment = previewDeploymentImpl;
