/**
 * Schedule File Module
 */

export type {
  ConditionSpec,
  ScheduleFile,
  ScheduleFileIssue,
} from './types.js';

export { SCHEDULE_FILE_SCHEMA, validateScheduleFile } from './schema.js';
export type { LoadedSchedule } from './loader.js';
export { buildCondition, buildSchedule, parseSchedule, loadScheduleFile } from './loader.js';
