/**
 * Diff Engine
 *
 * Compares a node's desired spec with what was last applied and picks an
 * action. Pure and deterministic: identical inputs give identical output,
 * which is what makes previews meaningful.
 */

import type { Action } from '../../domain/types/graph';
import type { ImageNodeSpec } from '../../domain/types/graph';
import type { ImageRef } from '../../domain/types/image';
import type { AppliedImage, ServiceSpec } from '../../domain/types/service';

export type DiffInput =
  | { kind: 'image'; desired: ImageNodeSpec; lastApplied?: AppliedImage | undefined }
  | { kind: 'push'; desired: ImageRef; lastApplied?: ImageRef | undefined }
  | { kind: 'service'; desired: ServiceSpec; lastApplied?: ServiceSpec | undefined };

/** Fields whose change needs a new resource rather than a patch */
const IDENTITY_FIELDS: Record<DiffInput['kind'], ReadonlySet<string>> = {
  image: new Set(['contextHash']),
  push: new Set(),
  service: new Set(['name', 'region', 'project']),
};

function diffRecords(
  prefix: string,
  desired: Readonly<Record<string, string>>,
  applied: Readonly<Record<string, string>>,
): string[] {
  const keys = new Set([...Object.keys(desired), ...Object.keys(applied)]);
  return [...keys]
    .filter((key) => desired[key] !== applied[key])
    .sort()
    .map((key) => `${prefix}.${key}`);
}

function diffFields<T extends object>(desired: T, applied: T, fields: ReadonlyArray<keyof T & string>): string[] {
  return fields.filter((field) => desired[field] !== applied[field]);
}

function imageRefChanges(prefix: string, desired: ImageRef, applied: ImageRef): string[] {
  const changes = diffFields(desired, applied, ['registry', 'repository', 'tag']).map(
    (field) => `${prefix}${field}`,
  );
  // A desired ref only carries a digest when the caller pinned one
  if (desired.digest !== undefined && desired.digest !== applied.digest) {
    changes.push(`${prefix}digest`);
  }
  return changes;
}

/**
 * Field paths that differ between desired and last-applied state, sorted
 * within each group. Empty when nothing was applied before.
 */
export function describeChanges(input: DiffInput): string[] {
  switch (input.kind) {
    case 'image': {
      const { desired, lastApplied } = input;
      if (!lastApplied) return [];
      const changes: string[] = [];
      if (desired.contextHash !== lastApplied.contextHash) changes.push('contextHash');
      if ((desired.build.dockerfile ?? null) !== (lastApplied.dockerfile ?? null)) {
        changes.push('dockerfile');
      }
      changes.push(...diffRecords('buildArgs', desired.build.buildArgs, lastApplied.buildArgs));
      if (desired.build.platform !== lastApplied.platform) changes.push('platform');
      return changes;
    }

    case 'push': {
      const { desired, lastApplied } = input;
      if (!lastApplied) return [];
      return imageRefChanges('', desired, lastApplied);
    }

    case 'service': {
      const { desired, lastApplied } = input;
      if (!lastApplied) return [];
      return [
        ...diffFields(desired, lastApplied, ['name', 'project', 'region']),
        ...imageRefChanges('image.', desired.image, lastApplied.image),
        ...diffRecords('env', desired.env, lastApplied.env),
        ...diffFields(desired, lastApplied, [
          'cpu',
          'memory',
          'minInstances',
          'maxInstances',
          'concurrency',
          'containerPort',
          'ingress',
          'allowUnauthenticated',
        ]),
      ];
    }
  }
}

/**
 * Classify a node.
 * - nothing applied yet: `update` (the create path), never `replace`
 * - an identity field changed: `replace`
 * - any other field changed: `update`
 */
export function classify(input: DiffInput): Action {
  if (!input.lastApplied) {
    return 'update';
  }

  const changes = describeChanges(input);
  if (changes.length === 0) {
    return 'unchanged';
  }

  const identity = IDENTITY_FIELDS[input.kind];
  return changes.some((change) => identity.has(change)) ? 'replace' : 'update';
}
