/**
 * Scheduler Core Implementation
 *
 * Decides, time step by time step, which nodes of a dependency graph may
 * execute. Structural order comes from the consideration queue; conditions
 * bound per node can delay, repeat or withhold a node on top of that order.
 */

import { randomUUID } from 'crypto';
import { debug } from '../../debug/index.js';
import { AllHaveRun, ConditionSet } from '../conditions/index.js';
import type { Condition, TerminationConditions } from '../conditions/index.js';
import {
  buildConsiderationQueue,
  normalizeConsiderationQueue,
} from '../consideration-queue/index.js';
import { SchedulerError } from '../errors.js';
import { TimeCounters } from '../time-counters/index.js';
import {
  TIME_SCALES,
  createScaleRecord,
  type ConsiderationQueue,
  type ExecutionList,
  type SchedulerStatus,
  type TimeScale,
  type TimeStep,
} from '../types.js';
import { ScheduleCursor } from './schedule-cursor.js';
import type {
  IScheduler,
  RunState,
  SchedulerConfig,
  SchedulerEvent,
  SchedulerEventHandler,
  SchedulerInit,
} from './types.js';

const DEFAULT_CONFIG: SchedulerConfig = {
  debug: false,
  warnOnDefaultConditions: true,
  logger: console,
};

/** Scales whose termination condition must be given explicitly */
const REQUIRED_TERMINATION_SCALES: readonly TimeScale[] = ['TRIAL'];

export class Scheduler<N = string> implements IScheduler<N> {
  readonly id: string;
  readonly nodes: readonly N[];
  readonly considerationQueue: ConsiderationQueue<N>;
  readonly conditionSet: ConditionSet<N>;
  readonly counters: TimeCounters<N>;

  private config: SchedulerConfig;
  private nodeSet: Set<N>;
  private history: Array<TimeStep<N>> = [];
  private termination: Record<TimeScale, Condition<N>> | null = null;
  private _status: SchedulerStatus = 'idle';
  private generation = 0;
  private eventHandlers: Set<SchedulerEventHandler<N>> = new Set();

  constructor(init: SchedulerInit<N>, config?: Partial<SchedulerConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.id = this.config.id ?? randomUUID();

    const { nodes, queue } = this.resolveGraph(init);
    this.nodes = nodes;
    this.nodeSet = new Set(nodes);
    this.considerationQueue = queue;
    this.conditionSet =
      init.conditions instanceof ConditionSet ? init.conditions : new ConditionSet(init.conditions);
    this.counters = new TimeCounters(nodes);

    this.debug('Consideration queue:', queue.map((layer) => Array.from(layer)));
  }

  get status(): SchedulerStatus {
    return this._status;
  }

  get executionList(): ExecutionList<N> {
    return this.history;
  }

  /** Termination conditions resolved by the most recent run() */
  get terminationConditions(): Readonly<Record<TimeScale, Condition<N>>> | null {
    return this.termination;
  }

  // ==========================================================================
  // Conditions
  // ==========================================================================

  addCondition(owner: N, condition: Condition<N>): void {
    this.conditionSet.addCondition(owner, condition);
  }

  addConditionSet(conditions: Iterable<[N, Condition<N>]>): void {
    this.conditionSet.addConditionSet(conditions);
  }

  /** True when `node` has a condition bound */
  has(node: N): boolean {
    return this.conditionSet.has(node);
  }

  isSatisfied(node: N): boolean {
    this.requireNode(node, 'isSatisfied');
    return this.conditionSet.isSatisfied(node, { counters: this.counters, nodes: this.nodes });
  }

  // ==========================================================================
  // Run
  // ==========================================================================

  /**
   * Start a run. Validation happens here, before any time step exists.
   *
   * Without a mapping every scale terminates on AllHaveRun. With a mapping,
   * omitted scales fall back to AllHaveRun except TRIAL, which must be given.
   *
   * Starting a run invalidates cursors from earlier runs.
   */
  run(terminationConds?: TerminationConditions<N>): ScheduleCursor<N> {
    this.validateConditionSet();
    const termination = this.resolveTermination(terminationConds);

    this.termination = termination;
    const generation = ++this.generation;
    const runId = randomUUID();
    const ctx = { schedulerId: this.id, runId };

    this.counters.resetUseable();
    this.counters.reset('TRIAL');
    this._status = 'running';

    const state: RunState<N> = {
      runId,
      nodes: this.nodes,
      queue: this.considerationQueue,
      counters: this.counters,
      conditionSet: this.conditionSet,
      termination,
      executionList: this.history,
      isCurrent: () => generation === this.generation,
      setStatus: (status) => {
        this._status = status;
      },
      emit: (event) => this.dispatch(event, ctx),
      log: (...args) => this.debug(...args),
    };

    const described = createScaleRecord((scale) => termination[scale].describe());
    this.debug('Termination conditions:', described);
    debug.runStarted(ctx, described);
    this.dispatch({ type: 'run_started', timestamp: Date.now(), runId }, ctx);

    return new ScheduleCursor(state);
  }

  // ==========================================================================
  // Events
  // ==========================================================================

  onEvent(handler: SchedulerEventHandler<N>): void {
    this.eventHandlers.add(handler);
  }

  offEvent(handler: SchedulerEventHandler<N>): void {
    this.eventHandlers.delete(handler);
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private resolveGraph(init: SchedulerInit<N>): { nodes: N[]; queue: ConsiderationQueue<N> } {
    if (init.composition) {
      const nodes = Array.from(new Set(init.composition.nodes));
      const queue = buildConsiderationQueue(init.composition.dependencies, { nodes });
      return { nodes, queue };
    }

    if (init.graph) {
      const queue = buildConsiderationQueue(init.graph);
      return { nodes: queue.flatMap((layer) => Array.from(layer)), queue };
    }

    if (init.nodes) {
      if (init.considerationQueue === undefined) {
        throw new SchedulerError(
          'MISSING_GRAPH_SOURCE',
          'A Scheduler built from a node list needs a consideration queue (considerationQueue)'
        );
      }
      const nodes = Array.from(new Set(init.nodes));
      return { nodes, queue: normalizeConsiderationQueue(init.considerationQueue, nodes) };
    }

    throw SchedulerError.missingGraphSource();
  }

  private requireNode(node: N, context: string): void {
    if (!this.nodeSet.has(node)) {
      throw SchedulerError.unknownNode(node, context);
    }
  }

  private requireDependencies(condition: Condition<N>, context: string): void {
    for (const dep of condition.dependencies()) {
      this.requireNode(dep, `${condition.describe()} in ${context}`);
    }
  }

  private validateConditionSet(): void {
    for (const [owner, condition] of this.conditionSet) {
      this.requireNode(owner, 'condition owner');
      this.requireDependencies(condition, `condition of ${String(owner)}`);
    }

    const defaulted = this.conditionSet.bindDefaults(this.nodes);
    if (defaulted.length > 0) {
      if (this.config.warnOnDefaultConditions) {
        this.config.logger.warn(
          '[Scheduler] These nodes have no conditions specified and will be scheduled with Always:',
          defaulted.map(String).join(', ')
        );
      }
      debug.conditionsDefaulted({ schedulerId: this.id }, defaulted);
    }
  }

  private resolveTermination(
    terminationConds: TerminationConditions<N> | undefined
  ): Record<TimeScale, Condition<N>> {
    if (terminationConds === undefined) {
      this.config.logger.warn(
        '[Scheduler] No termination conditions specified; every time scale will terminate on AllHaveRun'
      );
      return createScaleRecord(() => new AllHaveRun<N>());
    }

    for (const scale of REQUIRED_TERMINATION_SCALES) {
      if (!terminationConds[scale]) {
        throw SchedulerError.missingTermination(scale);
      }
    }

    const resolved = createScaleRecord(
      (scale): Condition<N> => terminationConds[scale] ?? new AllHaveRun<N>()
    );

    for (const scale of TIME_SCALES) {
      const condition = resolved[scale];
      if (condition.requiresOwner()) {
        throw SchedulerError.invalidCondition(
          `${condition.describe()} cannot terminate ${scale}: it needs an owner node`
        );
      }
      this.requireDependencies(condition, `${scale} termination`);
    }

    return resolved;
  }

  private dispatch(event: SchedulerEvent<N>, ctx: { schedulerId: string; runId: string }): void {
    if (event.type === 'timestep_emitted' && event.timeStep) {
      debug.timeStepEmitted(ctx, this.history.length - 1, Array.from(event.timeStep), event.pass ?? 0);
    } else if (event.type === 'pass_stalled') {
      debug.passStalled(ctx, event.pass ?? 0);
    } else if (event.type === 'trial_completed') {
      debug.trialCompleted(
        ctx,
        this.counters.getTime('RUN', 'TRIAL'),
        this.history.length,
        event.terminatedEarly ?? false
      );
    }

    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (error) {
        this.config.logger.warn('[Scheduler] Event handler error:', error);
        debug.error('scheduler', error, ctx);
      }
    }
  }

  private debug(...args: unknown[]): void {
    if (this.config.debug) {
      this.config.logger.debug('[Scheduler]', ...args);
    }
  }
}
