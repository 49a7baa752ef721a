/**
 * Typed facade over the debug emitter for scheduler events.
 */

import { debugEmitter } from './emitter.js';
import type { DebugContext, SchedulerDebugEventType } from './types.js';

const MAX_LISTED_NODES = 100;

function emit(
  type: SchedulerDebugEventType,
  data: Record<string, unknown>,
  ctx: DebugContext,
  source = 'scheduler'
): void {
  debugEmitter.emitDebug(type, source, data, ctx);
}

export const debug = {
  get enabled(): boolean {
    return debugEmitter.isEnabled();
  },

  setContext(ctx: DebugContext): void {
    debugEmitter.setContext(ctx);
  },

  getContext(): DebugContext {
    return debugEmitter.getContext();
  },

  clearContext(): void {
    debugEmitter.clearContext();
  },

  // ========== Run Events ==========

  /** `termination` maps each time scale to the description of its condition */
  runStarted(ctx: DebugContext, termination: Record<string, string>): void {
    emit('scheduler.run.started', { termination }, ctx);
  },

  /** Nodes bound to Always because nothing else was given */
  conditionsDefaulted(ctx: DebugContext, nodes: readonly unknown[]): void {
    emit('scheduler.conditions.defaulted', { nodes: listNodes(nodes) }, ctx);
  },

  timeStepEmitted(ctx: DebugContext, index: number, nodes: readonly unknown[], pass: number): void {
    emit('scheduler.timestep.emitted', { index, pass, nodes: listNodes(nodes) }, ctx);
  },

  passStalled(ctx: DebugContext, pass: number): void {
    emit('scheduler.pass.stalled', { pass }, ctx);
  },

  /**
   * @param trial - trial count on the RUN clock, this trial included
   * @param early - the termination condition fired before the pass walked every layer
   */
  trialCompleted(ctx: DebugContext, trial: number, timeSteps: number, early: boolean): void {
    emit('scheduler.trial.completed', { trial, timeSteps, early }, ctx);
  },

  // ========== Generic Events ==========

  error(source: string, error: unknown, ctx: DebugContext = {}): void {
    emit('scheduler.error', { error: serializeError(error) }, ctx, source);
  },

  custom(type: string, source: string, data: Record<string, unknown>): void {
    debugEmitter.emitDebug(type, source, data);
  },
};

function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  return { message: String(error) };
}

/** Node ids as strings; long lists are cut to a sample plus a count */
function listNodes(nodes: readonly unknown[]): unknown {
  const names = nodes.map(String);
  if (names.length > MAX_LISTED_NODES) {
    return {
      _truncated: true,
      count: names.length,
      sample: names.slice(0, MAX_LISTED_NODES),
    };
  }
  return names;
}
