/**
 * Outputs of every deployed unit, straight from the state store
 */

import { StateStoreError, errorMessage, isDeploymentError, type DeploymentError } from '../../errors';
import { formatImageRef } from '../../domain/types/image';
import { Failure, Success, type Result } from '../../domain/types/result';
import type { StateStore } from '../../domain/types/interfaces';
import type { ToolContext } from '../types';
import type { ListOutputsParams } from './schema';

export interface DeploymentOutput {
  resourceId: string;
  service: string;
  region: string;
  /** Pinned by digest */
  imageRef: string;
  url?: string | undefined;
  revisionId: string;
  updatedAt: string;
}

async function listOutputsImpl(
  params: ListOutputsParams,
  context: ToolContext,
): Promise<Result<DeploymentOutput[], DeploymentError>> {
  let records: Awaited<ReturnType<StateStore['list']>>;
  try {
    records = await context.deps.stateStore.list();
  } catch (error) {
    return Failure(isDeploymentError(error) ? error : new StateStoreError(errorMessage(error)));
  }

  const only = params.only && params.only.length > 0 ? new Set(params.only) : undefined;
  return Success(
    records
      .filter(({ resourceId }) => !only || only.has(resourceId))
      .map(({ resourceId, state }) => ({
        resourceId,
        service: state.name,
        region: state.region,
        imageRef: formatImageRef(state.lastApplied.image),
        url: state.url,
        revisionId: state.revisionId,
        updatedAt: state.updatedAt,
      })),
  );
}

export const listOutputs = listOutputsImpl;
