/**
 * Consideration Queue Builder
 *
 * Layers an acyclic dependency graph (Kahn-style grouping). Each layer holds
 * nodes whose prerequisites all sit in strictly earlier layers, so members of
 * one layer never depend on each other.
 */

import { CyclicGraphError, SchedulerError } from '../errors.js';
import type { ConsiderationQueue, DependencyGraph } from '../types.js';
import type { ConsiderationQueueOptions, LayeringResult } from './types.js';

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === 'function'
  );
}

/**
 * Layer a dependency graph and report each node's depth.
 *
 * Order inside a layer follows first appearance (options.nodes, then graph
 * keys, then prerequisites) but carries no meaning.
 *
 * @throws CyclicGraphError if some nodes can never be layered
 * @throws SchedulerError if options.nodes is given and the graph names a node outside it
 */
export function layerDependencyGraph<N>(
  graph: DependencyGraph<N>,
  options: ConsiderationQueueOptions<N> = {}
): LayeringResult<N> {
  const known = options.nodes ? new Set(options.nodes) : undefined;
  const order: N[] = [];
  const prerequisites = new Map<N, Set<N>>();

  const admit = (node: N): void => {
    if (!prerequisites.has(node)) {
      prerequisites.set(node, new Set());
      order.push(node);
    }
  };

  if (known) {
    for (const node of known) {
      admit(node);
    }
  }

  for (const [node, deps] of graph) {
    if (known && !known.has(node)) {
      throw SchedulerError.unknownNode(node, 'dependency graph entry');
    }
    admit(node);

    for (const dep of deps) {
      if (known && !known.has(dep)) {
        throw SchedulerError.unknownNode(dep, `prerequisite of ${String(node)}`);
      }
      admit(dep);
      prerequisites.get(node)?.add(dep);
    }
  }

  const queue: Set<N>[] = [];
  const depth = new Map<N, number>();
  let remaining = order;

  while (remaining.length > 0) {
    const layer = new Set(
      remaining.filter((node) => {
        for (const dep of prerequisites.get(node) ?? []) {
          if (!depth.has(dep)) return false;
        }
        return true;
      })
    );

    if (layer.size === 0) {
      const unresolved = new Map<N, N[]>();
      for (const node of remaining) {
        const deps = Array.from(prerequisites.get(node) ?? []).filter((dep) => !depth.has(dep));
        unresolved.set(node, deps);
      }
      throw new CyclicGraphError(unresolved);
    }

    for (const node of layer) {
      depth.set(node, queue.length);
    }
    queue.push(layer);
    remaining = remaining.filter((node) => !layer.has(node));
  }

  return { queue, depth };
}

export function buildConsiderationQueue<N>(
  graph: DependencyGraph<N>,
  options: ConsiderationQueueOptions<N> = {}
): ConsiderationQueue<N> {
  return layerDependencyGraph(graph, options).queue;
}

/**
 * Check a caller-supplied layering against the node set and copy it into
 * immutable-by-convention sets. Every node must sit in exactly one layer.
 */
export function normalizeConsiderationQueue<N>(
  layers: Iterable<Iterable<N>>,
  nodes: readonly N[]
): ConsiderationQueue<N> {
  if (!isIterable(layers)) {
    throw SchedulerError.malformedQueue('expected an iterable of layers');
  }

  const known = new Set(nodes);
  const placed = new Set<N>();
  const queue: Set<N>[] = [];

  let index = 0;
  for (const layer of layers) {
    if (!isIterable(layer)) {
      throw SchedulerError.malformedQueue(
        `layer ${index} is not iterable; pass the layered output, not a flat node list`
      );
    }

    const members = new Set<N>();
    for (const node of layer) {
      if (!known.has(node)) {
        throw SchedulerError.unknownNode(node, `consideration queue layer ${index}`);
      }
      if (placed.has(node)) {
        throw SchedulerError.malformedQueue(`node ${String(node)} appears in more than one layer`);
      }
      placed.add(node);
      members.add(node);
    }
    queue.push(members);
    index++;
  }

  for (const node of nodes) {
    if (!placed.has(node)) {
      throw SchedulerError.malformedQueue(`node ${String(node)} does not appear in any layer`);
    }
  }

  return queue;
}

/** Build a graph from a plain `{ node: [prerequisites] }` object. */
export function dependencyGraphFromEntries(
  entries: Readonly<Record<string, readonly string[]>>
): DependencyGraph<string> {
  return new Map(Object.entries(entries).map(([node, deps]) => [node, [...deps]]));
}
