import type { LoadedSchedule } from '../../infra/schedule-file/index.js';
import type { SchedulerStatus } from '../../scheduler/index.js';

export interface ScheduleRunOutcome {
  timeSteps: string[][];
  status: SchedulerStatus;
  /** True when maxTimeSteps cut the run short */
  truncated: boolean;
}

/**
 * Pull time steps from a loaded schedule until the trial ends or
 * `maxTimeSteps` steps have been taken. Nodes are sorted within a step for
 * stable output; a step carries no order of its own.
 */
export function runLoadedSchedule(
  loaded: LoadedSchedule,
  maxTimeSteps: number,
  onStep?: (index: number, nodes: string[]) => void
): ScheduleRunOutcome {
  const cursor = loaded.scheduler.run(loaded.termination);
  const timeSteps: string[][] = [];

  for (;;) {
    const result = cursor.next();
    if (result.done) {
      return { timeSteps, status: cursor.status, truncated: false };
    }
    // The step past the limit is pulled only to learn whether the trial ended.
    if (timeSteps.length === maxTimeSteps) {
      cursor.return();
      return { timeSteps, status: cursor.status, truncated: true };
    }

    const nodes = Array.from(result.value).sort();
    onStep?.(timeSteps.length, nodes);
    timeSteps.push(nodes);
  }
}
