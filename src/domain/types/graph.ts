/**
 * Resource graph types
 */

import type { BuildSpec, ImageRef } from './image';
import type { ServiceSpec } from './service';

export type NodeKind = 'image' | 'push' | 'service';

export type Action = 'unchanged' | 'update' | 'replace';

const ACTION_SEVERITY: Record<Action, number> = {
  unchanged: 0,
  update: 1,
  replace: 2,
};

/**
 * The more severe of two actions.
 */
export function maxAction(a: Action, b: Action): Action {
  return ACTION_SEVERITY[a] >= ACTION_SEVERITY[b] ? a : b;
}

/** Desired image build together with the content hash of its context */
export interface ImageNodeSpec {
  build: BuildSpec;
  fingerprint: string;
  contextHash: string;
}

interface NodeBase {
  /** `<resourceId>:<kind>` */
  id: string;
  resourceId: string;
  dependsOn: string[];
}

export interface ImageNode extends NodeBase {
  kind: 'image';
  spec: ImageNodeSpec;
}

export interface PushNode extends NodeBase {
  kind: 'push';
  spec: ImageRef;
}

export interface ServiceNode extends NodeBase {
  kind: 'service';
  spec: ServiceSpec;
}

export type GraphNode = ImageNode | PushNode | ServiceNode;

/**
 * One step of a plan: a node with the action the diff engine chose for it.
 */
export interface PlannedStep<N extends GraphNode = GraphNode> {
  node: N;
  action: Action;
  /** Field paths that differ from the last-applied state */
  changes: string[];
  /** True when the action was raised because an upstream node changed */
  forced: boolean;
}

export function nodeId(resourceId: string, kind: NodeKind): string {
  return `${resourceId}:${kind}`;
}
