export * from './scheduler/index.js';

export { debug, debugEmitter, matchesFilter } from './debug/index.js';
export type { DebugEvent, DebugContext, EventFilter } from './debug/index.js';

export {
  buildCondition,
  buildSchedule,
  parseSchedule,
  loadScheduleFile,
  validateScheduleFile,
  SCHEDULE_FILE_SCHEMA,
} from './infra/schedule-file/index.js';
export type {
  ConditionSpec,
  LoadedSchedule,
  ScheduleFile,
  ScheduleFileIssue,
} from './infra/schedule-file/index.js';

export { loadRuntimeConfig, DEFAULT_RUNTIME_CONFIG } from './infra/config/index.js';
export type { TickgraphRuntimeConfig } from './infra/config/index.js';
