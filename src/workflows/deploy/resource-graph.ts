/**
 * Resource Graph
 *
 * Each deployment unit is a chain of three nodes, Image -> Push -> Service.
 * Nodes are ordered topologically and planned lazily: an action is classified
 * only when the caller pulls the step, so a consumer that applies as it
 * iterates always plans against up-to-date upstream results.
 */

import type { Logger } from 'pino';
import { buildSpecFingerprint } from '../../domain/types/image';
import {
  maxAction,
  nodeId,
  type Action,
  type GraphNode,
  type PlannedStep,
} from '../../domain/types/graph';
import type { ServiceState } from '../../domain/types/service';
import type { DeploymentUnit } from '../../config/deployment-config';
import { classify, describeChanges, type DiffInput } from './diff-engine';

export interface DeploymentGraph {
  resourceId: string;
  nodes: Map<string, GraphNode>;
  /** Topological order, dependencies first */
  order: string[];
}

/**
 * Nodes of one chain. `contextHash` identifies the content of the build context.
 */
export function chainNodes(unit: DeploymentUnit, contextHash: string): GraphNode[] {
  const imageId = nodeId(unit.resourceId, 'image');
  const pushId = nodeId(unit.resourceId, 'push');

  return [
    {
      kind: 'image',
      id: imageId,
      resourceId: unit.resourceId,
      dependsOn: [],
      spec: {
        build: unit.build,
        fingerprint: buildSpecFingerprint(unit.build),
        contextHash,
      },
    },
    {
      kind: 'push',
      id: pushId,
      resourceId: unit.resourceId,
      dependsOn: [imageId],
      spec: unit.target,
    },
    {
      kind: 'service',
      id: nodeId(unit.resourceId, 'service'),
      resourceId: unit.resourceId,
      dependsOn: [pushId],
      spec: unit.service,
    },
  ];
}

/**
 * Depth-first topological sort. Throws on a cycle or a dangling edge.
 */
export function topologicalOrder(nodes: Map<string, GraphNode>): string[] {
  const tempMarked = new Set<string>();
  const permMarked = new Set<string>();
  const sorted: string[] = [];

  const visit = (id: string, path: string[]): void => {
    if (permMarked.has(id)) return;
    if (tempMarked.has(id)) {
      throw new Error(`Circular dependency: ${[...path, id].join(' -> ')}`);
    }
    const node = nodes.get(id);
    if (!node) {
      throw new Error(`Unknown node ${id} referenced by ${path[path.length - 1] ?? '(root)'}`);
    }

    tempMarked.add(id);
    for (const dependency of node.dependsOn) {
      visit(dependency, [...path, id]);
    }
    tempMarked.delete(id);
    permMarked.add(id);
    sorted.push(id);
  };

  for (const id of nodes.keys()) {
    visit(id, []);
  }
  return sorted;
}

/**
 * Structural problems of a graph; empty when it can be planned.
 */
export function validateGraph(graph: DeploymentGraph): string[] {
  const errors: string[] = [];

  for (const [id, node] of graph.nodes) {
    if (node.resourceId !== graph.resourceId) {
      errors.push(`Node ${id} belongs to ${node.resourceId}, not ${graph.resourceId}`);
    }
    for (const dependency of node.dependsOn) {
      const target = graph.nodes.get(dependency);
      if (!target) {
        errors.push(`Node ${id} depends on unknown node ${dependency}`);
      } else if (target.resourceId !== node.resourceId) {
        errors.push(`Node ${id} depends on ${dependency} from another chain`);
      }
    }
  }

  if (graph.order.length !== graph.nodes.size) {
    errors.push(`Order covers ${graph.order.length} of ${graph.nodes.size} nodes`);
  }

  return errors;
}

export function buildGraph(unit: DeploymentUnit, contextHash: string, logger?: Logger): DeploymentGraph {
  const nodes = new Map<string, GraphNode>();
  for (const node of chainNodes(unit, contextHash)) {
    nodes.set(node.id, node);
  }

  const order = topologicalOrder(nodes);
  logger?.debug({ resourceId: unit.resourceId, order }, 'Resource graph built');

  return { resourceId: unit.resourceId, nodes, order };
}

function diffInput(node: GraphNode, prior: ServiceState | undefined): DiffInput {
  switch (node.kind) {
    case 'image':
      return { kind: 'image', desired: node.spec, lastApplied: prior?.image };
    case 'push':
      return { kind: 'push', desired: node.spec, lastApplied: prior?.image.target };
    case 'service':
      return { kind: 'service', desired: node.spec, lastApplied: prior?.lastApplied };
  }
}

/**
 * Lazily plan a chain against its last-applied state.
 *
 * A node downstream of a changed node is at least `update`. The
 * generator is single-use; call again for a fresh plan.
 */
export function* planChain(
  graph: DeploymentGraph,
  prior: ServiceState | undefined,
): Generator<PlannedStep, void, undefined> {
  const changed = new Set<string>();

  for (const id of graph.order) {
    const node = graph.nodes.get(id);
    if (!node) continue;

    const input = diffInput(node, prior);
    const own = classify(input);
    const upstreamChanged = node.dependsOn.some((dependency) => changed.has(dependency));
    const action: Action = upstreamChanged ? maxAction(own, 'update') : own;

    if (action !== 'unchanged') {
      changed.add(id);
    }

    yield {
      node,
      action,
      changes: describeChanges(input),
      forced: action !== own,
    };
  }
}

export interface ChainInput {
  graph: DeploymentGraph;
  prior: ServiceState | undefined;
}

/**
 * Plan several chains, one after another. Chains share no edges, so any
 * interleaving of them is equally valid.
 */
export function* plan(chains: ChainInput[]): Generator<PlannedStep, void, undefined> {
  for (const { graph, prior } of chains) {
    yield* planChain(graph, prior);
  }
}
