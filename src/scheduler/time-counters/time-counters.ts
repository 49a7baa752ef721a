/**
 * Time Counters Implementation
 *
 * Nested logical clocks plus the per-node execution counts that conditions
 * query. Pure bookkeeping: nothing here decides what runs.
 */

import { SchedulerError } from '../errors.js';
import { TIME_SCALES, createScaleRecord, type TimeScale } from '../types.js';
import type { ITimeCounters, TimeCountersSnapshot } from './types.js';

export class TimeCounters<N> implements ITimeCounters<N> {
  private readonly nodes: readonly N[];
  /** times[outer][inner] */
  private times: Record<TimeScale, Record<TimeScale, number>>;
  private totals: Record<TimeScale, Map<N, number>>;
  /** useable[producer][consumer] */
  private useable: Map<N, Map<N, number>>;

  constructor(nodes: Iterable<N>) {
    this.nodes = Array.from(new Set(nodes));
    this.times = createScaleRecord(() => createScaleRecord(() => 0));
    this.totals = createScaleRecord(() => this.zeroedNodeMap());
    this.useable = new Map(this.nodes.map((producer) => [producer, this.zeroedNodeMap()]));
  }

  getTime(outer: TimeScale, inner: TimeScale): number {
    return this.times[outer][inner];
  }

  getTotal(scale: TimeScale, node: N): number {
    const total = this.totals[scale].get(node);
    if (total === undefined) {
      throw SchedulerError.unknownNode(node, `counts for ${scale}`);
    }
    return total;
  }

  getUseable(producer: N, consumer: N): number {
    const credit = this.row(producer).get(consumer);
    if (credit === undefined) {
      throw SchedulerError.unknownNode(consumer, 'usable credit consumer');
    }
    return credit;
  }

  increment(scale: TimeScale): void {
    for (const outer of TIME_SCALES) {
      this.times[outer][scale] += 1;
    }
  }

  reset(scale: TimeScale): void {
    for (const inner of TIME_SCALES) {
      this.times[scale][inner] = 0;
    }
    this.totals[scale] = this.zeroedNodeMap();
  }

  resetUseable(): void {
    for (const producer of this.nodes) {
      this.useable.set(producer, this.zeroedNodeMap());
    }
  }

  /**
   * The node first spends all credit it holds as a consumer, then every node,
   * itself included, gains one unit of its credit. So right after `node` runs
   * getUseable(node, node) is 1.
   */
  recordExecution(node: N): void {
    const produced = this.row(node);

    for (const scale of TIME_SCALES) {
      this.totals[scale].set(node, (this.totals[scale].get(node) ?? 0) + 1);
    }

    for (const credits of this.useable.values()) {
      credits.set(node, 0);
    }

    for (const consumer of this.nodes) {
      produced.set(consumer, (produced.get(consumer) ?? 0) + 1);
    }
  }

  snapshot(): TimeCountersSnapshot<N> {
    return {
      times: createScaleRecord((outer) => ({ ...this.times[outer] })),
      totals: createScaleRecord((scale) => Array.from(this.totals[scale].entries())),
      useable: Array.from(this.useable.entries()).map(([producer, credits]) => [
        producer,
        Array.from(credits.entries()),
      ]),
    };
  }

  private row(producer: N): Map<N, number> {
    const credits = this.useable.get(producer);
    if (!credits) {
      throw SchedulerError.unknownNode(producer, 'usable credit producer');
    }
    return credits;
  }

  private zeroedNodeMap(): Map<N, number> {
    return new Map(this.nodes.map((node) => [node, 0]));
  }
}
