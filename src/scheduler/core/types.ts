/**
 * Scheduler Core Types
 */

import type { Condition, ConditionSet } from '../conditions/index.js';
import type { TimeCounters } from '../time-counters/index.js';
import type {
  ConsiderationQueue,
  DependencyGraph,
  ExecutionList,
  SchedulableGraph,
  SchedulerLogger,
  SchedulerStatus,
  TimeScale,
  TimeStep,
} from '../types.js';

export interface SchedulerConfig {
  /** Identifier attached to debug events; generated when omitted */
  id?: string;
  /** Enable verbose debug logging */
  debug: boolean;
  /** Warn when nodes fall back to Always */
  warnOnDefaultConditions: boolean;
  logger: SchedulerLogger;
}

/**
 * Where the node set and its layering come from. Checked in this order:
 * composition, graph, nodes + considerationQueue.
 */
export interface SchedulerInit<N> {
  composition?: SchedulableGraph<N>;
  /** Graph specification: node -> prerequisites */
  graph?: DependencyGraph<N>;
  nodes?: readonly N[];
  /** Precomputed layering over `nodes` */
  considerationQueue?: Iterable<Iterable<N>>;
  /** Initial bindings; a ConditionSet instance is used as-is */
  conditions?: Iterable<[N, Condition<N>]>;
}

// ============================================================================
// Events
// ============================================================================

export type SchedulerEventType =
  | 'run_started'
  | 'timestep_emitted'
  | 'pass_stalled'
  | 'trial_completed';

export interface SchedulerEvent<N> {
  type: SchedulerEventType;
  timestamp: number;
  runId: string;
  /** Set for timestep_emitted and pass_stalled */
  timeStep?: TimeStep<N>;
  /** Pass index within the trial */
  pass?: number;
  /** Set for trial_completed */
  terminatedEarly?: boolean;
}

export type SchedulerEventHandler<N> = (event: SchedulerEvent<N>) => void;

// ============================================================================
// Run State
// ============================================================================

/**
 * Everything one run reads and writes, owned by the scheduler and handed to
 * its cursor by reference.
 */
export interface RunState<N> {
  readonly runId: string;
  readonly nodes: readonly N[];
  readonly queue: ConsiderationQueue<N>;
  readonly counters: TimeCounters<N>;
  readonly conditionSet: ConditionSet<N>;
  readonly termination: Readonly<Record<TimeScale, Condition<N>>>;
  /** Scheduler-wide history, appended to in place */
  readonly executionList: Array<TimeStep<N>>;
  /** False once a newer run has started */
  isCurrent(): boolean;
  setStatus(status: SchedulerStatus): void;
  emit(event: SchedulerEvent<N>): void;
  log(...args: unknown[]): void;
}

export interface IScheduleCursor<N> extends Iterator<TimeStep<N>, ExecutionList<N>> {
  readonly runId: string;
  /** Time steps produced by this cursor so far */
  readonly history: ExecutionList<N>;
  readonly status: SchedulerStatus;
  isDone(): boolean;
}

export interface IScheduler<N> {
  readonly nodes: readonly N[];
  readonly considerationQueue: ConsiderationQueue<N>;
  readonly status: SchedulerStatus;
  /** Every time step produced across runs */
  readonly executionList: ExecutionList<N>;

  addCondition(owner: N, condition: Condition<N>): void;
  addConditionSet(conditions: Iterable<[N, Condition<N>]>): void;
  has(node: N): boolean;

  /** Evaluate the condition bound to `node` against current counters */
  isSatisfied(node: N): boolean;

  run(terminationConds?: Partial<Record<TimeScale, Condition<N> | null>>): IScheduleCursor<N>;

  onEvent(handler: SchedulerEventHandler<N>): void;
  offEvent(handler: SchedulerEventHandler<N>): void;
}
