/**
 * Scheduler Module
 *
 * Condition-gated execution scheduling over a dependency graph:
 * - Consideration queue: topological layering of the graph
 * - Time counters: nested TIME_STEP / PASS / TRIAL / RUN / LIFE clocks
 * - Conditions: per-node predicates over execution history
 * - Core: the pass / layer / fixed-point run loop behind a resumable cursor
 */

// Core types
export type {
  TimeScale,
  DependencyGraph,
  ConsiderationQueue,
  SchedulableGraph,
  SchedulerStatus,
  TimeStep,
  ExecutionList,
  SchedulerLogger,
} from './types.js';

export { TIME_SCALES, isTimeScale, createScaleRecord } from './types.js';

// Errors
export type { SchedulerErrorCode } from './errors.js';
export { SchedulerError, CyclicGraphError, SchedulerErrorCodes } from './errors.js';

// Consideration Queue
export type { ConsiderationQueueOptions, LayeringResult } from './consideration-queue/index.js';

export {
  buildConsiderationQueue,
  layerDependencyGraph,
  normalizeConsiderationQueue,
  dependencyGraphFromEntries,
} from './consideration-queue/index.js';

// Time Counters
export type { CounterView, ITimeCounters, TimeCountersSnapshot } from './time-counters/index.js';

export { TimeCounters } from './time-counters/index.js';

// Conditions
export type {
  Condition,
  ConditionContext,
  ConditionPredicate,
  ConditionType,
  IConditionSet,
  TerminationConditions,
} from './conditions/index.js';

export {
  Always,
  Never,
  AtPass,
  BeforePass,
  AfterPass,
  AfterNPasses,
  EveryNPasses,
  AtTrial,
  AfterNTrials,
  EveryNCalls,
  AfterNCalls,
  AtNCalls,
  BeforeNCalls,
  AllHaveRun,
  While,
  NWhile,
  All,
  Any,
  NOf,
  Not,
  ConditionSet,
} from './conditions/index.js';

// Core
export type {
  IScheduler,
  IScheduleCursor,
  SchedulerConfig,
  SchedulerEvent,
  SchedulerEventHandler,
  SchedulerEventType,
  SchedulerInit,
} from './core/index.js';

export { Scheduler, ScheduleCursor } from './core/index.js';
