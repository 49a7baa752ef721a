/**
 * Consideration Queue Types
 */

import type { ConsiderationQueue, DependencyGraph } from '../types.js';

export interface ConsiderationQueueOptions<N> {
  /**
   * Full node set. Nodes without a graph entry become roots; a prerequisite
   * outside this set is rejected.
   */
  nodes?: Iterable<N>;
}

export interface LayeringResult<N> {
  queue: ConsiderationQueue<N>;
  /** Layer index per node */
  depth: ReadonlyMap<N, number>;
}

export type { ConsiderationQueue, DependencyGraph };
