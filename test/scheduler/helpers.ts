import type { ExecutionList, SchedulerLogger, TimeStep } from '../../src/scheduler/index.js';

export function createSilentLogger(): jest.Mocked<SchedulerLogger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
  };
}

/** Render each time step as its sorted node names joined, e.g. "AB" */
export function names(steps: Iterable<TimeStep<string>>): string[] {
  return Array.from(steps, (step) => Array.from(step).sort().join(''));
}

export function nextStep<N>(cursor: Iterator<TimeStep<N>, ExecutionList<N>>): TimeStep<N> {
  const result = cursor.next();
  if (result.done) {
    throw new Error('cursor finished before producing a time step');
  }
  return result.value;
}
