/**
 * Process-wide debug channel. Schedulers publish through it; CLIs and tests
 * subscribe. Nothing is built or delivered until `enable()` is called.
 */

import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import type { DebugEvent, DebugContext, EventFilter } from './types.js';

const DEBUG_CHANNEL = 'debug';

class DebugEmitter extends EventEmitter {
  private _enabled = false;
  private context: DebugContext = {};

  enable(): void {
    this._enabled = true;
  }

  disable(): void {
    this._enabled = false;
  }

  isEnabled(): boolean {
    return this._enabled;
  }

  /** Ambient correlation fields, merged into every later event */
  setContext(ctx: DebugContext): void {
    this.context = { ...this.context, ...ctx };
  }

  getContext(): DebugContext {
    return { ...this.context };
  }

  clearContext(): void {
    this.context = {};
  }

  /**
   * Publish one event. `ctx` wins over the ambient context, so concurrent
   * schedulers can tag their own events without touching shared state.
   * @returns false when debugging is off and nothing was published
   */
  emitDebug(
    type: string,
    source: string,
    data: Record<string, unknown>,
    ctx: DebugContext = {}
  ): boolean {
    if (!this._enabled) {
      return false;
    }

    const { schedulerId, runId } = { ...this.context, ...ctx };
    const event: DebugEvent = {
      id: randomUUID(),
      timestamp: Date.now(),
      type,
      source,
      data,
      ...(schedulerId ? { schedulerId } : {}),
      ...(runId ? { runId } : {}),
    };

    return super.emit(DEBUG_CHANNEL, event);
  }

  onDebug(handler: (event: DebugEvent) => void): void {
    this.on(DEBUG_CHANNEL, handler);
  }

  offDebug(handler: (event: DebugEvent) => void): void {
    this.off(DEBUG_CHANNEL, handler);
  }
}

/**
 * Check whether an event passes a filter. Type filters ending in "." match
 * every event under that prefix.
 */
export function matchesFilter(event: DebugEvent, filter: EventFilter): boolean {
  if (filter.type) {
    const matchesType = filter.type.endsWith('.')
      ? event.type.startsWith(filter.type)
      : event.type === filter.type;
    if (!matchesType) return false;
  }
  if (filter.source && event.source !== filter.source) return false;
  if (filter.schedulerId && event.schedulerId !== filter.schedulerId) return false;
  if (filter.runId && event.runId !== filter.runId) return false;
  return true;
}

export const debugEmitter = new DebugEmitter();
