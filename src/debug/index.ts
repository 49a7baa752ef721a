/**
 * Debug instrumentation API.
 *
 * Scheduler runs emit events through this module so that tools can follow
 * a schedule step by step without the scheduler knowing who listens.
 *
 * @example
 * ```typescript
 * import { debugEmitter, Scheduler } from 'tickgraph';
 *
 * debugEmitter.enable();
 * debugEmitter.onDebug((event) => console.log(event.type, event.data));
 *
 * const cursor = new Scheduler({ graph }).run();
 * for (const step of cursor) execute(step);
 * ```
 */

export { debugEmitter, matchesFilter } from './emitter.js';
export { debug } from './debug.js';
export type { DebugEvent, DebugContext, EventFilter, SchedulerDebugEventType } from './types.js';
