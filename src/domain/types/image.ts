/**
 * Image domain types: what to build and where it lands
 */

import { createHash } from 'node:crypto';

/** Content-addressable image digest, `sha256:<64 hex>` */
export type Digest = string;

const DIGEST_PATTERN = /^sha256:[a-f0-9]{64}$/;

export function isDigest(value: string): value is Digest {
  return DIGEST_PATTERN.test(value);
}

/**
 * Inputs of a container build.
 */
export interface BuildSpec {
  readonly context: string;
  readonly dockerfile?: string | undefined;
  readonly buildArgs: Readonly<Record<string, string>>;
  /** Target platform, e.g. 'linux/amd64' */
  readonly platform: string;
}

/**
 * Registry coordinate of an image. Without a digest it names what should be
 * pushed; with one it pins an immutable artifact.
 */
export interface ImageRef {
  readonly registry: string;
  readonly repository: string;
  readonly tag: string;
  readonly digest?: Digest | undefined;
}

export type ResolvedImageRef = ImageRef & { readonly digest: Digest };

/**
 * Outcome of the image half of a chain.
 */
export interface ResolvedImage {
  ref: ResolvedImageRef;
  /** True when the registry already held the digest and no push happened */
  pushSkipped: boolean;
}

/**
 * Stable identity of a build spec. Keys are sorted so that
 * `{ A: '1', B: '2' }` and `{ B: '2', A: '1' }` hash alike.
 */
export function buildSpecFingerprint(spec: BuildSpec): string {
  const canonical = JSON.stringify({
    context: spec.context,
    dockerfile: spec.dockerfile ?? null,
    buildArgs: Object.keys(spec.buildArgs)
      .sort()
      .map((key) => [key, spec.buildArgs[key]]),
    platform: spec.platform,
  });
  return createHash('sha256').update(canonical).digest('hex');
}

/** `registry/repository` */
export function imageRepository(ref: ImageRef): string {
  return `${ref.registry}/${ref.repository}`;
}

/** `registry/repository:tag` */
export function formatImageTag(ref: ImageRef): string {
  return `${imageRepository(ref)}:${ref.tag}`;
}

/**
 * `registry/repository@digest` for resolved refs, the tag form otherwise.
 */
export function formatImageRef(ref: ImageRef): string {
  return ref.digest ? `${imageRepository(ref)}@${ref.digest}` : formatImageTag(ref);
}

export function withDigest(ref: ImageRef, digest: Digest): ResolvedImageRef {
  return { registry: ref.registry, repository: ref.repository, tag: ref.tag, digest };
}

/**
 * Compare two refs by location only (registry, repository, tag).
 */
export function sameImageLocation(a: ImageRef, b: ImageRef): boolean {
  return a.registry === b.registry && a.repository === b.repository && a.tag === b.tag;
}
