/**
 * Time Counter Types
 */

import type { TimeScale } from '../types.js';

/**
 * Read-only view of the counters. Conditions only ever see this side.
 */
export interface CounterView<N> {
  /** Ticks of `inner` elapsed in the current tick of `outer` */
  getTime(outer: TimeScale, inner: TimeScale): number;

  /** Times `node` was selected in the current tick of `scale` */
  getTotal(scale: TimeScale, node: N): number;

  /** Unspent executions of `producer` that `consumer` may use */
  getUseable(producer: N, consumer: N): number;
}

export interface ITimeCounters<N> extends CounterView<N> {
  /** Every clock's sub-count of `scale` advances by one */
  increment(scale: TimeScale): void;

  /** Zero `scale`'s sub-clocks and its per-node totals */
  reset(scale: TimeScale): void;

  /** Zero every usable-credit pair */
  resetUseable(): void;

  /** Book one selection of `node` */
  recordExecution(node: N): void;

  snapshot(): TimeCountersSnapshot<N>;
}

export interface TimeCountersSnapshot<N> {
  times: Record<TimeScale, Record<TimeScale, number>>;
  totals: Record<TimeScale, Array<[N, number]>>;
  useable: Array<[N, Array<[N, number]>]>;
}
