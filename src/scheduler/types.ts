/**
 * Scheduler Core Types
 */

// ============================================================================
// Time Scales
// ============================================================================

/**
 * Logical clocks, finest first. A PASS is one walk through the consideration
 * queue, a TRIAL is a sequence of passes bounded by a termination condition.
 */
export const TIME_SCALES = ['TIME_STEP', 'PASS', 'TRIAL', 'RUN', 'LIFE'] as const;

export type TimeScale = (typeof TIME_SCALES)[number];

export function isTimeScale(value: unknown): value is TimeScale {
  return typeof value === 'string' && TIME_SCALES.some((scale) => scale === value);
}

/** Build a record with one entry per time scale. */
export function createScaleRecord<T>(make: (scale: TimeScale) => T): Record<TimeScale, T> {
  return {
    TIME_STEP: make('TIME_STEP'),
    PASS: make('PASS'),
    TRIAL: make('TRIAL'),
    RUN: make('RUN'),
    LIFE: make('LIFE'),
  };
}

// ============================================================================
// Graph
// ============================================================================

/**
 * Node -> the nodes that must be available before it is eligible.
 * Nodes that only appear as prerequisites are roots.
 */
export type DependencyGraph<N> = ReadonlyMap<N, Iterable<N>>;

/** Ordered layers; every prerequisite of a node sits in an earlier layer. */
export type ConsiderationQueue<N> = ReadonlyArray<ReadonlySet<N>>;

/**
 * A composition-like collaborator that owns a node list and the dependencies
 * among those nodes.
 */
export interface SchedulableGraph<N> {
  readonly nodes: readonly N[];
  readonly dependencies: DependencyGraph<N>;
}

// ============================================================================
// Scheduler State
// ============================================================================

export type SchedulerStatus = 'idle' | 'running' | 'terminated_early';

/** One emitted set of nodes that may execute together. */
export type TimeStep<N> = ReadonlySet<N>;

export type ExecutionList<N> = ReadonlyArray<TimeStep<N>>;

export type SchedulerLogger = Pick<Console, 'debug' | 'info' | 'warn'>;
