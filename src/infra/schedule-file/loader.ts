/**
 * Schedule File Loader
 *
 * Turns a validated schedule file into a Scheduler plus the termination
 * conditions to run it with.
 */

import * as fs from 'fs';
import {
  AfterNCalls,
  AfterNPasses,
  AfterNTrials,
  AfterPass,
  All,
  AllHaveRun,
  Always,
  Any,
  AtNCalls,
  AtPass,
  AtTrial,
  BeforeNCalls,
  BeforePass,
  EveryNCalls,
  EveryNPasses,
  NOf,
  Never,
  Not,
  Scheduler,
  SchedulerError,
  dependencyGraphFromEntries,
  isTimeScale,
} from '../../scheduler/index.js';
import type { Condition, SchedulerConfig, TerminationConditions } from '../../scheduler/index.js';
import { validateScheduleFile } from './schema.js';
import type { ConditionSpec, ScheduleFile } from './types.js';

export interface LoadedSchedule {
  scheduler: Scheduler<string>;
  /** Undefined when the file has no termination block */
  termination: TerminationConditions<string> | undefined;
}

export function buildCondition(spec: ConditionSpec): Condition<string> {
  switch (spec.type) {
    case 'Always':
      return new Always();
    case 'Never':
      return new Never();
    case 'AtPass':
      return new AtPass(spec.n, spec.timeScale);
    case 'BeforePass':
      return new BeforePass(spec.n, spec.timeScale);
    case 'AfterPass':
      return new AfterPass(spec.n, spec.timeScale);
    case 'AfterNPasses':
      return new AfterNPasses(spec.n, spec.timeScale);
    case 'EveryNPasses':
      return new EveryNPasses(spec.n, spec.timeScale);
    case 'AtTrial':
      return new AtTrial(spec.n);
    case 'AfterNTrials':
      return new AfterNTrials(spec.n);
    case 'EveryNCalls':
      return new EveryNCalls(spec.node, spec.n);
    case 'AfterNCalls':
      return new AfterNCalls(spec.node, spec.n, spec.timeScale);
    case 'AtNCalls':
      return new AtNCalls(spec.node, spec.n, spec.timeScale);
    case 'BeforeNCalls':
      return new BeforeNCalls(spec.node, spec.n, spec.timeScale);
    case 'AllHaveRun':
      return new AllHaveRun(spec.nodes ?? [], spec.timeScale);
    case 'All':
      return new All(...spec.conditions.map(buildCondition));
    case 'Any':
      return new Any(...spec.conditions.map(buildCondition));
    case 'NOf':
      return new NOf(spec.n, ...spec.conditions.map(buildCondition));
    case 'Not':
      return new Not(buildCondition(spec.condition));
  }
}

export function buildSchedule(
  file: ScheduleFile,
  config?: Partial<SchedulerConfig>
): LoadedSchedule {
  const dependencies = dependencyGraphFromEntries(file.dependencies ?? {});
  const conditions = Object.entries(file.conditions ?? {}).map(
    ([owner, spec]): [string, Condition<string>] => [owner, buildCondition(spec)]
  );

  const scheduler = file.nodes
    ? new Scheduler<string>({ composition: { nodes: file.nodes, dependencies }, conditions }, config)
    : new Scheduler<string>({ graph: dependencies, conditions }, config);

  let termination: TerminationConditions<string> | undefined;
  if (file.termination) {
    termination = {};
    for (const [scale, spec] of Object.entries(file.termination)) {
      if (isTimeScale(scale) && spec !== undefined) {
        termination[scale] = spec === null ? null : buildCondition(spec);
      }
    }
  }

  return { scheduler, termination };
}

/**
 * Parse, validate and build in one step.
 * @throws SchedulerError (INVALID_SCHEDULE_FILE) for unparseable JSON or schema violations
 */
export function parseSchedule(text: string, config?: Partial<SchedulerConfig>): LoadedSchedule {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw SchedulerError.invalidScheduleFile(
      `not valid JSON (${error instanceof Error ? error.message : String(error)})`
    );
  }

  return buildSchedule(validateScheduleFile(document), config);
}

export function loadScheduleFile(filePath: string, config?: Partial<SchedulerConfig>): LoadedSchedule {
  return parseSchedule(fs.readFileSync(filePath, 'utf-8'), config);
}
