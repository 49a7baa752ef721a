/**
 * Condition Catalogue
 *
 * Flat set of predicates over scheduler state. Each class implements the
 * Condition capability directly; combinators hold child conditions.
 *
 * Conditions that read no node counts default their node type to `never`, so
 * a standalone `new Always()` fits any Scheduler<N>.
 */

import { SchedulerError } from '../errors.js';
import type { TimeScale } from '../types.js';
import type { Condition, ConditionContext, ConditionPredicate, ConditionType } from './types.js';

function requireCount(type: ConditionType, n: number, min = 0): number {
  if (!Number.isInteger(n) || n < min) {
    throw SchedulerError.invalidCondition(
      `${type} expects an integer >= ${min}, got ${String(n)}`
    );
  }
  return n;
}

function scaleSuffix(scale: TimeScale): string {
  return scale === 'TRIAL' ? '' : `, ${scale}`;
}

// ============================================================================
// Constant
// ============================================================================

export class Always<N = never> implements Condition<N> {
  readonly type = 'Always' as const;

  isSatisfied(): boolean {
    return true;
  }

  dependencies(): N[] {
    return [];
  }

  requiresOwner(): boolean {
    return false;
  }

  describe(): string {
    return 'Always';
  }
}

export class Never<N = never> implements Condition<N> {
  readonly type = 'Never' as const;

  isSatisfied(): boolean {
    return false;
  }

  dependencies(): N[] {
    return [];
  }

  requiresOwner(): boolean {
    return false;
  }

  describe(): string {
    return 'Never';
  }
}

// ============================================================================
// Pass / Trial clocks
// ============================================================================

type PassComparison = 'AtPass' | 'BeforePass' | 'AfterPass' | 'AfterNPasses' | 'EveryNPasses';

abstract class PassCondition<N> implements Condition<N> {
  abstract readonly type: PassComparison;
  readonly n: number;
  readonly timeScale: TimeScale;

  constructor(type: PassComparison, n: number, timeScale: TimeScale, min = 0) {
    this.n = requireCount(type, n, min);
    this.timeScale = timeScale;
  }

  protected passes(ctx: ConditionContext<N>): number {
    return ctx.counters.getTime(this.timeScale, 'PASS');
  }

  abstract isSatisfied(ctx: ConditionContext<N>): boolean;

  dependencies(): N[] {
    return [];
  }

  requiresOwner(): boolean {
    return false;
  }

  describe(): string {
    return `${this.type}(${this.n}${scaleSuffix(this.timeScale)})`;
  }
}

/** Current pass (counted within `timeScale`) equals n */
export class AtPass<N = never> extends PassCondition<N> {
  readonly type = 'AtPass' as const;

  constructor(n: number, timeScale: TimeScale = 'TRIAL') {
    super('AtPass', n, timeScale);
  }

  isSatisfied(ctx: ConditionContext<N>): boolean {
    return this.passes(ctx) === this.n;
  }
}

export class BeforePass<N = never> extends PassCondition<N> {
  readonly type = 'BeforePass' as const;

  constructor(n: number, timeScale: TimeScale = 'TRIAL') {
    super('BeforePass', n, timeScale);
  }

  isSatisfied(ctx: ConditionContext<N>): boolean {
    return this.passes(ctx) < this.n;
  }
}

export class AfterPass<N = never> extends PassCondition<N> {
  readonly type = 'AfterPass' as const;

  constructor(n: number, timeScale: TimeScale = 'TRIAL') {
    super('AfterPass', n, timeScale);
  }

  isSatisfied(ctx: ConditionContext<N>): boolean {
    return this.passes(ctx) > this.n;
  }
}

export class AfterNPasses<N = never> extends PassCondition<N> {
  readonly type = 'AfterNPasses' as const;

  constructor(n: number, timeScale: TimeScale = 'TRIAL') {
    super('AfterNPasses', n, timeScale);
  }

  isSatisfied(ctx: ConditionContext<N>): boolean {
    return this.passes(ctx) >= this.n;
  }
}

export class EveryNPasses<N = never> extends PassCondition<N> {
  readonly type = 'EveryNPasses' as const;

  constructor(n: number, timeScale: TimeScale = 'TRIAL') {
    super('EveryNPasses', n, timeScale, 1);
  }

  isSatisfied(ctx: ConditionContext<N>): boolean {
    return this.passes(ctx) % this.n === 0;
  }
}

/** Trials are counted within the RUN clock, which persists across run() calls */
export class AtTrial<N = never> implements Condition<N> {
  readonly type = 'AtTrial' as const;
  readonly n: number;

  constructor(n: number) {
    this.n = requireCount('AtTrial', n);
  }

  isSatisfied(ctx: ConditionContext<N>): boolean {
    return ctx.counters.getTime('RUN', 'TRIAL') === this.n;
  }

  dependencies(): N[] {
    return [];
  }

  requiresOwner(): boolean {
    return false;
  }

  describe(): string {
    return `AtTrial(${this.n})`;
  }
}

export class AfterNTrials<N = never> implements Condition<N> {
  readonly type = 'AfterNTrials' as const;
  readonly n: number;

  constructor(n: number) {
    this.n = requireCount('AfterNTrials', n);
  }

  isSatisfied(ctx: ConditionContext<N>): boolean {
    return ctx.counters.getTime('RUN', 'TRIAL') >= this.n;
  }

  dependencies(): N[] {
    return [];
  }

  requiresOwner(): boolean {
    return false;
  }

  describe(): string {
    return `AfterNTrials(${this.n})`;
  }
}

// ============================================================================
// Execution counts
// ============================================================================

/**
 * Satisfied once `dependency` has n unspent executions usable by the owner.
 * The owner's own execution spends them (see TimeCounters.recordExecution).
 */
export class EveryNCalls<N> implements Condition<N> {
  readonly type = 'EveryNCalls' as const;
  readonly n: number;

  constructor(
    readonly dependency: N,
    n: number
  ) {
    this.n = requireCount('EveryNCalls', n);
  }

  isSatisfied(ctx: ConditionContext<N>): boolean {
    if (ctx.owner === undefined) {
      throw SchedulerError.invalidCondition(`${this.describe()} needs an owner node`);
    }
    return ctx.counters.getUseable(this.dependency, ctx.owner) >= this.n;
  }

  dependencies(): N[] {
    return [this.dependency];
  }

  requiresOwner(): boolean {
    return true;
  }

  describe(): string {
    return `EveryNCalls(${String(this.dependency)}, ${this.n})`;
  }
}

type CallComparison = 'AfterNCalls' | 'AtNCalls' | 'BeforeNCalls';

abstract class CallCountCondition<N> implements Condition<N> {
  abstract readonly type: CallComparison;
  readonly n: number;

  constructor(
    type: CallComparison,
    readonly dependency: N,
    n: number,
    readonly timeScale: TimeScale
  ) {
    this.n = requireCount(type, n);
  }

  protected calls(ctx: ConditionContext<N>): number {
    return ctx.counters.getTotal(this.timeScale, this.dependency);
  }

  abstract isSatisfied(ctx: ConditionContext<N>): boolean;

  dependencies(): N[] {
    return [this.dependency];
  }

  requiresOwner(): boolean {
    return false;
  }

  describe(): string {
    return `${this.type}(${String(this.dependency)}, ${this.n}${scaleSuffix(this.timeScale)})`;
  }
}

export class AfterNCalls<N> extends CallCountCondition<N> {
  readonly type = 'AfterNCalls' as const;

  constructor(dependency: N, n: number, timeScale: TimeScale = 'TRIAL') {
    super('AfterNCalls', dependency, n, timeScale);
  }

  isSatisfied(ctx: ConditionContext<N>): boolean {
    return this.calls(ctx) >= this.n;
  }
}

export class AtNCalls<N> extends CallCountCondition<N> {
  readonly type = 'AtNCalls' as const;

  constructor(dependency: N, n: number, timeScale: TimeScale = 'TRIAL') {
    super('AtNCalls', dependency, n, timeScale);
  }

  isSatisfied(ctx: ConditionContext<N>): boolean {
    return this.calls(ctx) === this.n;
  }
}

export class BeforeNCalls<N> extends CallCountCondition<N> {
  readonly type = 'BeforeNCalls' as const;

  constructor(dependency: N, n: number, timeScale: TimeScale = 'TRIAL') {
    super('BeforeNCalls', dependency, n, timeScale);
  }

  isSatisfied(ctx: ConditionContext<N>): boolean {
    return this.calls(ctx) < this.n;
  }
}

/**
 * Every listed node (every scheduler node when none are listed) has been
 * selected at least once in the current tick of `timeScale`.
 */
export class AllHaveRun<N = never> implements Condition<N> {
  readonly type = 'AllHaveRun' as const;
  readonly nodes: readonly N[];

  constructor(
    nodes: readonly N[] = [],
    readonly timeScale: TimeScale = 'TRIAL'
  ) {
    this.nodes = [...nodes];
  }

  isSatisfied(ctx: ConditionContext<N>): boolean {
    const targets = this.nodes.length > 0 ? this.nodes : ctx.nodes;
    return targets.every((node) => ctx.counters.getTotal(this.timeScale, node) >= 1);
  }

  dependencies(): N[] {
    return [...this.nodes];
  }

  requiresOwner(): boolean {
    return false;
  }

  describe(): string {
    const listed = this.nodes.map(String).join(', ');
    const args = [listed, this.timeScale === 'TRIAL' ? '' : this.timeScale].filter(Boolean);
    return `AllHaveRun(${args.join(', ')})`;
  }
}

// ============================================================================
// External predicates
// ============================================================================

/**
 * Satisfied while `fn(...args)` is truthy. Errors thrown by `fn` propagate
 * to whoever is pulling the next time step.
 */
export class While<A extends unknown[] = unknown[], N = never> implements Condition<N> {
  readonly type: 'While' | 'NWhile' = 'While';
  readonly args: A;

  constructor(
    readonly predicate: ConditionPredicate<A>,
    ...args: A
  ) {
    this.args = args;
  }

  isSatisfied(): boolean {
    return Boolean(this.predicate(...this.args));
  }

  dependencies(): N[] {
    return [];
  }

  requiresOwner(): boolean {
    return false;
  }

  describe(): string {
    return `${this.type}(${this.predicate.name || 'anonymous'})`;
  }
}

/** Satisfied while `fn(...args)` is falsy */
export class NWhile<A extends unknown[] = unknown[], N = never> extends While<A, N> {
  readonly type = 'NWhile' as const;

  isSatisfied(): boolean {
    return !super.isSatisfied();
  }
}

// ============================================================================
// Combinators
// ============================================================================

abstract class CompositeCondition<N> implements Condition<N> {
  abstract readonly type: 'All' | 'Any' | 'NOf' | 'Not';
  readonly conditions: ReadonlyArray<Condition<N>>;

  constructor(conditions: ReadonlyArray<Condition<N>>) {
    this.conditions = [...conditions];
  }

  abstract isSatisfied(ctx: ConditionContext<N>): boolean;

  dependencies(): N[] {
    return this.conditions.flatMap((condition) => condition.dependencies());
  }

  requiresOwner(): boolean {
    return this.conditions.some((condition) => condition.requiresOwner());
  }

  describe(): string {
    return `${this.type}(${this.conditions.map((condition) => condition.describe()).join(', ')})`;
  }
}

export class All<N> extends CompositeCondition<N> {
  readonly type = 'All' as const;

  constructor(...conditions: Array<Condition<N>>) {
    super(conditions);
  }

  isSatisfied(ctx: ConditionContext<N>): boolean {
    return this.conditions.every((condition) => condition.isSatisfied(ctx));
  }
}

export class Any<N> extends CompositeCondition<N> {
  readonly type = 'Any' as const;

  constructor(...conditions: Array<Condition<N>>) {
    super(conditions);
  }

  isSatisfied(ctx: ConditionContext<N>): boolean {
    return this.conditions.some((condition) => condition.isSatisfied(ctx));
  }
}

/** At least `n` children hold; `NOf(0, ...)` always does */
export class NOf<N> extends CompositeCondition<N> {
  readonly type = 'NOf' as const;
  readonly n: number;

  constructor(n: number, ...conditions: Array<Condition<N>>) {
    super(conditions);
    this.n = requireCount('NOf', n);
  }

  isSatisfied(ctx: ConditionContext<N>): boolean {
    let holding = 0;
    for (const condition of this.conditions) {
      if (condition.isSatisfied(ctx) && ++holding >= this.n) {
        return true;
      }
    }
    return holding >= this.n;
  }

  describe(): string {
    const children = this.conditions.map((condition) => condition.describe());
    return `NOf(${[String(this.n), ...children].join(', ')})`;
  }
}

export class Not<N> extends CompositeCondition<N> {
  readonly type = 'Not' as const;

  constructor(condition: Condition<N>) {
    super([condition]);
  }

  isSatisfied(ctx: ConditionContext<N>): boolean {
    return !this.conditions.every((condition) => condition.isSatisfied(ctx));
  }
}
