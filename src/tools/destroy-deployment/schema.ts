/**
 * Schema definition for destroy-deployment tool
 */

import type { z } from 'zod';
import { deploymentTargetSchema } from '../types';

export const destroyDeploymentSchema = deploymentTargetSchema;

export type DestroyDeploymentParams = z.input<typeof destroyDeploymentSchema>;
