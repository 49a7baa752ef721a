/**
 * Consideration Queue Module
 */

export type { ConsiderationQueueOptions, LayeringResult } from './types.js';

export {
  buildConsiderationQueue,
  layerDependencyGraph,
  normalizeConsiderationQueue,
  dependencyGraphFromEntries,
} from './consideration-queue.js';
