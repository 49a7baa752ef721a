/**
 * Scheduler Core Module
 */

export type {
  IScheduler,
  IScheduleCursor,
  RunState,
  SchedulerConfig,
  SchedulerEvent,
  SchedulerEventHandler,
  SchedulerEventType,
  SchedulerInit,
} from './types.js';

export { Scheduler } from './scheduler.js';
export { ScheduleCursor } from './schedule-cursor.js';
