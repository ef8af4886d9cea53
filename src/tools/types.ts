/**
 * Shared types for the deployment tools
 */

import { z } from 'zod';
import type { Deps } from '../app/container';

export interface ToolContext {
  deps: Deps;
  signal?: AbortSignal | undefined;
}

const resourceIdSchema = z.string().regex(/^[a-z][a-z0-9-]*$/, 'is not a resource id');

export const deploymentTargetSchema = z.object({
  file: z.string().min(1).default('deployment.yaml').describe('Path to the deployment file'),
  only: z
    .array(resourceIdSchema)
    .optional()
    .describe('Restrict the pass to these resource ids'),
});

export type DeploymentTargetParams = z.input<typeof deploymentTargetSchema>;
