/**
 * Schema definition for preview-deployment tool
 */

import type { z } from 'zod';
import { deploymentTargetSchema } from '../types';

export const previewDeploymentSchema = deploymentTargetSchema;

export type PreviewDeploymentParams = z.input<typeof previewDeploymentSchema>;
