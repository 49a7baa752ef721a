/**
 * Time Counters Module
 */

export type { CounterView, ITimeCounters, TimeCountersSnapshot } from './types.js';

export { TimeCounters } from './time-counters.js';
