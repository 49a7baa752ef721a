/**
 * Schedule File Types
 *
 * JSON form of a graph, its conditions and its termination conditions.
 * While/NWhile have no file form: a predicate is code.
 */

import type { TimeScale } from '../../scheduler/index.js';

export type PassConditionSpec = {
  type: 'AtPass' | 'BeforePass' | 'AfterPass' | 'AfterNPasses' | 'EveryNPasses';
  n: number;
  timeScale?: TimeScale;
};

export type TrialConditionSpec = {
  type: 'AtTrial' | 'AfterNTrials';
  n: number;
};

export type EveryNCallsSpec = {
  type: 'EveryNCalls';
  node: string;
  n: number;
};

export type CallCountConditionSpec = {
  type: 'AfterNCalls' | 'AtNCalls' | 'BeforeNCalls';
  node: string;
  n: number;
  timeScale?: TimeScale;
};

export type AllHaveRunSpec = {
  type: 'AllHaveRun';
  nodes?: string[];
  timeScale?: TimeScale;
};

export type ConditionSpec =
  | { type: 'Always' | 'Never' }
  | PassConditionSpec
  | TrialConditionSpec
  | EveryNCallsSpec
  | CallCountConditionSpec
  | AllHaveRunSpec
  | { type: 'All' | 'Any'; conditions: ConditionSpec[] }
  | { type: 'NOf'; n: number; conditions: ConditionSpec[] }
  | { type: 'Not'; condition: ConditionSpec };

export interface ScheduleFile {
  $schema?: string;
  /** Full node list; defaults to every node named in `dependencies` */
  nodes?: string[];
  /** node -> prerequisites */
  dependencies?: Record<string, string[]>;
  conditions?: Record<string, ConditionSpec>;
  termination?: Partial<Record<TimeScale, ConditionSpec | null>>;
}

export interface ScheduleFileIssue {
  path: string;
  message: string;
}
