/**
 * Service domain types: desired and observed state of a serverless service
 */

import type { Digest, ImageRef, ResolvedImageRef } from './image';

export const INGRESS_SETTINGS = ['all', 'internal', 'internal-and-cloud-load-balancing'] as const;

export type Ingress = (typeof INGRESS_SETTINGS)[number];

/**
 * Desired end state of one service.
 */
export interface ServiceSpec {
  readonly name: string;
  readonly project: string;
  readonly region: string;
  /** Desired coordinate; carries a digest once the push node resolved it */
  readonly image: ImageRef;
  readonly env: Readonly<Record<string, string>>;
  /** CPU limit, e.g. '1' or '2000m' */
  readonly cpu: string;
  /** Memory limit, e.g. '512Mi' or '1Gi' */
  readonly memory: string;
  readonly minInstances: number;
  readonly maxInstances: number;
  /** Maximum concurrent requests per instance */
  readonly concurrency: number;
  readonly containerPort: number;
  readonly ingress: Ingress;
  readonly allowUnauthenticated: boolean;
}

/**
 * Last-applied record of the image and push nodes of a chain.
 */
export interface AppliedImage {
  fingerprint: string;
  contextHash: string;
  dockerfile?: string | undefined;
  buildArgs: Record<string, string>;
  platform: string;
  target: ResolvedImageRef;
}

/**
 * Observed and persisted state of one deployment unit, owned by the state store.
 */
export interface ServiceState {
  name: string;
  region: string;
  revisionId: string;
  imageDigest: Digest;
  ready: boolean;
  url?: string | undefined;
  lastApplied: ServiceSpec;
  image: AppliedImage;
  updatedAt: string;
}

/**
 * Lifecycle of the service node during one pass.
 */
export type ServicePhase = 'Absent' | 'Creating' | 'Updating' | 'Replacing' | 'Ready' | 'Failed';
