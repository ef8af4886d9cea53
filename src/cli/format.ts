/**
 * Human-readable rendering of deployment results
 */

import type { Action } from '../domain/types/graph';
import type { DeploymentOutput } from '../tools/list-outputs';
import type { ChainOutcome, DeploymentResult, StepRecord } from '../workflows/deploy/deployment-workflow';

const ACTION_SYMBOL: Record<Action, string> = {
  unchanged: '=',
  update: '~',
  replace: '!',
};

export function formatStep(step: StepRecord, width: number): string {
  const forced = step.forced ? ' (forced)' : '';
  const changes = step.changes.length > 0 ? `  [${step.changes.join(', ')}]` : '';
  return `  ${ACTION_SYMBOL[step.action]} ${step.nodeId.padEnd(width)}  ${step.action}${forced}${changes}`;
}

function formatSteps(steps: StepRecord[]): string[] {
  const width = Math.max(0, ...steps.map((step) => step.nodeId.length));
  return steps.map((step) => formatStep(step, width));
}

export function formatChain(chain: ChainOutcome): string[] {
  switch (chain.status) {
    case 'planned':
      return [chain.resourceId, ...formatSteps(chain.steps)];

    case 'applied': {
      const lines = [`✅ ${chain.resourceId}${chain.changed ? '' : ' (no changes)'}`];
      lines.push(...formatSteps(chain.steps));
      lines.push(`  image: ${chain.outputs.imageRef}`);
      if (chain.outputs.url) lines.push(`  url:   ${chain.outputs.url}`);
      return lines;
    }

    case 'destroyed':
      return [`🗑️  ${chain.resourceId}${chain.existed ? ' deleted' : ' had nothing to delete'}`];

    case 'failed':
    case 'cancelled': {
      const where = chain.failedNode ? ` at ${chain.failedNode}` : '';
      const lines = [
        `❌ ${chain.resourceId} ${chain.status}${where}: ${chain.error.code} ${chain.error.message}`,
      ];
      if (chain.completed.length > 0) {
        lines.push('  completed:', ...formatSteps(chain.completed));
      }
      if (chain.partial) {
        lines.push('  changes already made were not rolled back');
      }
      return lines;
    }
  }
}

export function formatResult(result: DeploymentResult): string[] {
  const lines = result.chains.flatMap(formatChain);
  const failed = result.chains.filter(
    (chain) => chain.status === 'failed' || chain.status === 'cancelled',
  ).length;
  lines.push(
    failed === 0
      ? `${result.mode}: ${result.chains.length} service(s) ok`
      : `${result.mode}: ${failed} of ${result.chains.length} service(s) failed`,
  );
  return lines;
}

export function formatOutputs(outputs: DeploymentOutput[]): string[] {
  if (outputs.length === 0) {
    return ['No deployed services'];
  }
  return outputs.flatMap((output) => [
    `${output.resourceId} (${output.region}/${output.service}, revision ${output.revisionId})`,
    `  image: ${output.imageRef}`,
    ...(output.url ? [`  url:   ${output.url}`] : []),
  ]);
}
