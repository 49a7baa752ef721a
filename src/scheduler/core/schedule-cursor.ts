/**
 * Schedule Cursor
 *
 * Resumable walk over one run. Each next() advances until it has a time step
 * to hand out: it opens passes, walks the consideration queue layer by layer,
 * and expands every layer to a fixed point before emitting it.
 *
 * The caller executes the returned nodes before asking for the next step;
 * conditions evaluated later may depend on what that execution changed.
 */

import { SchedulerError } from '../errors.js';
import type { ExecutionList, SchedulerStatus, TimeStep } from '../types.js';
import type { IScheduleCursor, RunState } from './types.js';

export class ScheduleCursor<N> implements IScheduleCursor<N>, Iterable<TimeStep<N>> {
  private done = false;
  private passOpen = false;
  private passChanged = false;
  private stoppedEarly = false;
  private layerIndex = 0;
  private pendingTimeStep = false;
  private produced: Array<TimeStep<N>> = [];
  private _status: SchedulerStatus = 'running';

  constructor(private readonly run: RunState<N>) {}

  get runId(): string {
    return this.run.runId;
  }

  get history(): ExecutionList<N> {
    return this.produced;
  }

  get status(): SchedulerStatus {
    return this._status;
  }

  isDone(): boolean {
    return this.done;
  }

  next(): IteratorResult<TimeStep<N>, ExecutionList<N>> {
    if (this.done) {
      return { done: true, value: this.run.executionList };
    }
    if (!this.run.isCurrent()) {
      throw SchedulerError.staleCursor();
    }
    this.settleTimeStep();

    const { queue, counters } = this.run;

    for (;;) {
      if (!this.passOpen) {
        if (this.trialTerminated()) {
          return this.finish();
        }
        this.openPass();
      }

      while (this.layerIndex < queue.length) {
        if (this.trialTerminated()) {
          this.stoppedEarly = true;
          break;
        }

        const step = this.considerLayer(queue[this.layerIndex]);
        this.layerIndex++;

        if (step.size > 0) {
          this.passChanged = true;
          return this.emitStep(step);
        }
      }

      this.passOpen = false;

      // A pass that selected nothing still surfaces as an empty step.
      if (!this.passChanged) {
        const stall = this.emitStep(new Set<N>());
        this.run.emit({
          type: 'pass_stalled',
          timestamp: Date.now(),
          runId: this.run.runId,
          timeStep: stall.value,
          pass: counters.getTime('TRIAL', 'PASS'),
        });
        counters.increment('PASS');
        return stall;
      }

      counters.increment('PASS');
    }
  }

  /**
   * Abandon the run. Counters keep whatever the steps handed out so far
   * recorded; the trial clock does not advance.
   */
  return(): IteratorResult<TimeStep<N>, ExecutionList<N>> {
    if (!this.done) {
      this.done = true;
      this._status = 'idle';
      if (this.run.isCurrent()) {
        this.settleTimeStep();
        this.run.setStatus('idle');
      }
      this.run.log('Run abandoned after', this.produced.length, 'time steps');
    }
    return { done: true, value: this.run.executionList };
  }

  [Symbol.iterator](): this {
    return this;
  }

  /**
   * TIME_STEP counts a step once the caller is done with it, so while the
   * caller executes a step the clocks still read the step's own index.
   */
  private settleTimeStep(): void {
    if (this.pendingTimeStep) {
      this.pendingTimeStep = false;
      this.run.counters.increment('TIME_STEP');
    }
  }

  private trialTerminated(): boolean {
    const { termination, counters, nodes } = this.run;
    return termination.TRIAL.isSatisfied({ counters, nodes });
  }

  private openPass(): void {
    this.run.counters.reset('PASS');
    this.passOpen = true;
    this.passChanged = false;
    this.stoppedEarly = false;
    this.layerIndex = 0;
    this.run.log('Pass', this.run.counters.getTime('TRIAL', 'PASS'), 'opened');
  }

  /**
   * Add every node whose condition holds, rescanning the layer until a scan
   * adds nothing. A node enters a step at most once.
   */
  private considerLayer(layer: ReadonlySet<N>): Set<N> {
    const { conditionSet, counters, nodes } = this.run;
    const step = new Set<N>();
    let changed = true;

    while (changed) {
      changed = false;
      for (const node of layer) {
        if (step.has(node)) continue;

        if (conditionSet.isSatisfied(node, { counters, nodes })) {
          step.add(node);
          counters.recordExecution(node);
          changed = true;
        }
      }
    }

    return step;
  }

  private emitStep(step: TimeStep<N>): IteratorYieldResult<TimeStep<N>> {
    const { counters, executionList } = this.run;
    const pass = counters.getTime('TRIAL', 'PASS');

    executionList.push(step);
    this.produced.push(step);
    this.pendingTimeStep = true;

    this.run.log('Time step', executionList.length - 1, 'pass', pass, Array.from(step));
    this.run.emit({
      type: 'timestep_emitted',
      timestamp: Date.now(),
      runId: this.run.runId,
      timeStep: step,
      pass,
    });

    return { done: false, value: step };
  }

  private finish(): IteratorReturnResult<ExecutionList<N>> {
    const { counters, executionList } = this.run;

    counters.increment('TRIAL');
    this.done = true;
    this._status = this.stoppedEarly ? 'terminated_early' : 'idle';
    this.run.setStatus(this._status);

    this.run.emit({
      type: 'trial_completed',
      timestamp: Date.now(),
      runId: this.run.runId,
      terminatedEarly: this.stoppedEarly,
    });

    return { done: true, value: executionList };
  }
}
