/**
 * Condition Types
 */

import type { TimeScale } from '../types.js';
import type { CounterView } from '../time-counters/index.js';

// ============================================================================
// Evaluation
// ============================================================================

/**
 * Everything a condition may read. Evaluation never mutates it.
 */
export interface ConditionContext<N> {
  readonly counters: CounterView<N>;
  readonly nodes: readonly N[];
  /** Node the condition gates; absent for termination conditions */
  readonly owner?: N;
}

export type ConditionType =
  | 'Always'
  | 'Never'
  | 'AtPass'
  | 'BeforePass'
  | 'AfterPass'
  | 'AfterNPasses'
  | 'EveryNPasses'
  | 'AtTrial'
  | 'AfterNTrials'
  | 'EveryNCalls'
  | 'AfterNCalls'
  | 'AtNCalls'
  | 'BeforeNCalls'
  | 'AllHaveRun'
  | 'While'
  | 'NWhile'
  | 'All'
  | 'Any'
  | 'NOf'
  | 'Not';

export interface Condition<N> {
  readonly type: ConditionType;

  /** Pure boolean over the scheduler state in `ctx` */
  isSatisfied(ctx: ConditionContext<N>): boolean;

  /** Nodes whose counts this condition reads, nested conditions included */
  dependencies(): N[];

  /** True when evaluation needs `ctx.owner` */
  requiresOwner(): boolean;

  /** Human-readable form, e.g. `EveryNCalls(A, 2)` */
  describe(): string;
}

/** Arbitrary external predicate polled by While/NWhile */
export type ConditionPredicate<A extends unknown[]> = (...args: A) => unknown;

// ============================================================================
// Condition Set
// ============================================================================

export interface IConditionSet<N> extends Iterable<[N, Condition<N>]> {
  readonly size: number;

  /** Bind (or replace) the condition gating `owner` */
  addCondition(owner: N, condition: Condition<N>): void;

  /** Bind every entry of `conditions` */
  addConditionSet(conditions: Iterable<[N, Condition<N>]>): void;

  has(owner: N): boolean;

  get(owner: N): Condition<N> | undefined;

  /** Evaluate the condition bound to `owner`; unbound owners behave as Always */
  isSatisfied(owner: N, ctx: Omit<ConditionContext<N>, 'owner'>): boolean;
}

export type TerminationConditions<N> = Partial<Record<TimeScale, Condition<N> | null>>;
