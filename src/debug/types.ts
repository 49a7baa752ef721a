/**
 * Debug event types for the instrumentation system.
 */

/**
 * Base debug event structure.
 * All debug events emitted by the scheduler follow this interface.
 */
export interface DebugEvent {
  /** Unique event identifier (UUID) */
  id: string;
  /** Event timestamp in milliseconds */
  timestamp: number;
  /** Event type in format "domain.action" (e.g., "scheduler.timestep.emitted") */
  type: string;
  /** Source module identifier (e.g., "scheduler", "schedule-file") */
  source: string;
  /** Event-specific data payload */
  data: Record<string, unknown>;
  /** Associated scheduler instance (if applicable) */
  schedulerId?: string;
  /** Associated run (if applicable) */
  runId?: string;
}

/** Events the scheduler itself publishes */
export type SchedulerDebugEventType =
  | 'scheduler.run.started'
  | 'scheduler.conditions.defaulted'
  | 'scheduler.timestep.emitted'
  | 'scheduler.pass.stalled'
  | 'scheduler.trial.completed'
  | 'scheduler.error';

/**
 * Context for associating events with a scheduler and one of its runs.
 */
export interface DebugContext {
  schedulerId?: string;
  runId?: string;
}

/**
 * Filter options for querying recorded events.
 */
export interface EventFilter {
  /** Filter by event type (prefix match supported) */
  type?: string;
  /** Filter by source module */
  source?: string;
  /** Filter by scheduler */
  schedulerId?: string;
  /** Filter by run */
  runId?: string;
}
