/**
 * Schema definition for apply-deployment tool
 */

import type { z } from 'zod';
import { deploymentTargetSchema } from '../types';

export const applyDeploymentSchema = deploymentTargetSchema;

export type ApplyDeploymentParams = z.input<typeof applyDeploymentSchema>;
