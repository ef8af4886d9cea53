/**
 * Schemas for persisted records. Anything read back from disk passes through
 * these before the orchestration core sees it.
 */

import { z } from 'zod';
import { INGRESS_SETTINGS } from './types/service';

export const DigestSchema = z.string().regex(/^sha256:[a-f0-9]{64}$/, 'is not a sha256 digest');

export const ImageRefSchema = z.object({
  registry: z.string().min(1),
  repository: z.string().min(1),
  tag: z.string().min(1),
  digest: DigestSchema.optional(),
});

export const ResolvedImageRefSchema = ImageRefSchema.extend({ digest: DigestSchema });

export const ServiceSpecSchema = z.object({
  name: z.string().min(1),
  project: z.string().min(1),
  region: z.string().min(1),
  image: ImageRefSchema,
  env: z.record(z.string()),
  cpu: z.string().min(1),
  memory: z.string().min(1),
  minInstances: z.number().int().nonnegative(),
  maxInstances: z.number().int().positive(),
  concurrency: z.number().int().positive(),
  containerPort: z.number().int().positive(),
  ingress: z.enum(INGRESS_SETTINGS),
  allowUnauthenticated: z.boolean(),
});

export const AppliedImageSchema = z.object({
  fingerprint: z.string().min(1),
  contextHash: z.string().min(1),
  dockerfile: z.string().optional(),
  buildArgs: z.record(z.string()),
  platform: z.string().min(1),
  target: ResolvedImageRefSchema,
});

export const ServiceStateSchema = z.object({
  name: z.string().min(1),
  region: z.string().min(1),
  revisionId: z.string().min(1),
  imageDigest: DigestSchema,
  ready: z.boolean(),
  url: z.string().optional(),
  lastApplied: ServiceSpecSchema,
  image: AppliedImageSchema,
  updatedAt: z.string().datetime(),
});
