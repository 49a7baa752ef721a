import {
  buildConsiderationQueue,
  dependencyGraphFromEntries,
  layerDependencyGraph,
  normalizeConsiderationQueue,
} from '../../../src/scheduler/consideration-queue/index.js';
import { CyclicGraphError, SchedulerError } from '../../../src/scheduler/errors.js';
import type { ConsiderationQueue } from '../../../src/scheduler/types.js';

const layers = (queue: ConsiderationQueue<string>): string[][] =>
  queue.map((layer) => Array.from(layer).sort());

describe('buildConsiderationQueue', () => {
  it('layers a diamond', () => {
    const graph = dependencyGraphFromEntries({ B: ['A'], C: ['A'], D: ['B', 'C'] });

    expect(layers(buildConsiderationQueue(graph))).toEqual([['A'], ['B', 'C'], ['D']]);
  });

  it('places every prerequisite in a strictly earlier layer', () => {
    const entries = {
      E: ['A', 'D'],
      D: ['B'],
      C: ['A'],
      F: ['C', 'E'],
      B: [],
      G: [],
    };
    const { queue, depth } = layerDependencyGraph(dependencyGraphFromEntries(entries));

    const placed = queue.flatMap((layer) => Array.from(layer)).sort();
    expect(placed).toEqual(['A', 'B', 'C', 'D', 'E', 'F', 'G']);

    for (const [node, deps] of Object.entries(entries)) {
      for (const dep of deps) {
        expect(depth.get(dep)).toBeLessThan(depth.get(node) ?? -1);
      }
    }
    expect(depth.get('F')).toBe(3);
  });

  it('treats nodes without an entry as roots when a node list is given', () => {
    const graph = dependencyGraphFromEntries({ B: ['A'] });

    expect(layers(buildConsiderationQueue(graph, { nodes: ['A', 'B', 'C'] }))).toEqual([
      ['A', 'C'],
      ['B'],
    ]);
  });

  it('rejects a prerequisite outside the node list', () => {
    const graph = dependencyGraphFromEntries({ B: ['Z'] });

    expect(() => buildConsiderationQueue(graph, { nodes: ['A', 'B'] })).toThrow(SchedulerError);
    expect(() => buildConsiderationQueue(graph, { nodes: ['A', 'B'] })).toThrow(
      'Unknown node: Z (prerequisite of B)'
    );
  });

  it('raises CyclicGraphError with the unresolved remainder', () => {
    const graph = dependencyGraphFromEntries({ B: ['A'], C: ['B', 'D'], D: ['C'] });

    let caught: unknown;
    try {
      buildConsiderationQueue(graph);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CyclicGraphError);
    if (caught instanceof CyclicGraphError) {
      expect(caught.code).toBe('CYCLIC_GRAPH');
      expect(caught.remaining).toEqual(
        new Map([
          ['C', ['D']],
          ['D', ['C']],
        ])
      );
    }
  });

  it('treats a self-dependency as a cycle', () => {
    const graph = dependencyGraphFromEntries({ A: ['A'] });

    expect(() => buildConsiderationQueue(graph)).toThrow(CyclicGraphError);
  });

  it('works with non-string nodes', () => {
    const graph = new Map<number, number[]>([
      [2, [1]],
      [3, [1, 2]],
    ]);

    expect(buildConsiderationQueue(graph).map((layer) => Array.from(layer))).toEqual([[1], [2], [3]]);
  });
});

describe('normalizeConsiderationQueue', () => {
  it('copies a valid layering', () => {
    const queue = normalizeConsiderationQueue([['A', 'B'], new Set(['C'])], ['A', 'B', 'C']);

    expect(layers(queue)).toEqual([['A', 'B'], ['C']]);
  });

  it('rejects a flat node list', () => {
    expect(() => normalizeConsiderationQueue(['A', 'B'], ['A', 'B'])).toThrow(
      expect.objectContaining({ code: 'MALFORMED_CONSIDERATION_QUEUE' })
    );
  });

  it('rejects a node placed twice', () => {
    expect(() => normalizeConsiderationQueue([['A'], ['A', 'B']], ['A', 'B'])).toThrow(
      'Malformed consideration queue: node A appears in more than one layer'
    );
  });

  it('rejects a node missing from every layer', () => {
    expect(() => normalizeConsiderationQueue([['A']], ['A', 'B'])).toThrow(
      'Malformed consideration queue: node B does not appear in any layer'
    );
  });

  it('rejects unknown nodes', () => {
    expect(() => normalizeConsiderationQueue([['A', 'Z']], ['A'])).toThrow(
      expect.objectContaining({ code: 'UNKNOWN_NODE' })
    );
  });
});
