import { TimeCounters } from '../../../src/scheduler/time-counters/index.js';

describe('TimeCounters', () => {
  let counters: TimeCounters<string>;

  beforeEach(() => {
    counters = new TimeCounters(['A', 'B']);
  });

  describe('clocks', () => {
    it('advances a scale on every enclosing clock', () => {
      counters.increment('PASS');
      counters.increment('PASS');

      expect(counters.getTime('TRIAL', 'PASS')).toBe(2);
      expect(counters.getTime('RUN', 'PASS')).toBe(2);
      expect(counters.getTime('LIFE', 'PASS')).toBe(2);
      expect(counters.getTime('TRIAL', 'TIME_STEP')).toBe(0);
    });

    it('resets only the clocks of the given scale', () => {
      counters.increment('PASS');
      counters.increment('TIME_STEP');

      counters.reset('TRIAL');

      expect(counters.getTime('TRIAL', 'PASS')).toBe(0);
      expect(counters.getTime('TRIAL', 'TIME_STEP')).toBe(0);
      expect(counters.getTime('RUN', 'PASS')).toBe(1);
      expect(counters.getTime('RUN', 'TIME_STEP')).toBe(1);
    });
  });

  describe('recordExecution', () => {
    it('counts the node under every scale', () => {
      counters.recordExecution('A');

      expect(counters.getTotal('TIME_STEP', 'A')).toBe(1);
      expect(counters.getTotal('TRIAL', 'A')).toBe(1);
      expect(counters.getTotal('LIFE', 'A')).toBe(1);
      expect(counters.getTotal('TRIAL', 'B')).toBe(0);
    });

    it('drops totals of a reset scale only', () => {
      counters.recordExecution('A');
      counters.reset('PASS');

      expect(counters.getTotal('PASS', 'A')).toBe(0);
      expect(counters.getTotal('TRIAL', 'A')).toBe(1);
    });

    it('credits every consumer, the node itself included', () => {
      counters.recordExecution('A');

      expect(counters.getUseable('A', 'A')).toBe(1);
      expect(counters.getUseable('A', 'B')).toBe(1);
      expect(counters.getUseable('B', 'A')).toBe(0);
    });

    it('spends the credit a node holds as consumer', () => {
      counters.recordExecution('A');
      counters.recordExecution('A');
      counters.recordExecution('B');

      expect(counters.getUseable('A', 'B')).toBe(0);
      expect(counters.getUseable('A', 'A')).toBe(2);
      expect(counters.getUseable('B', 'A')).toBe(1);
      expect(counters.getUseable('B', 'B')).toBe(1);
    });

    it('clears all credit on resetUseable', () => {
      counters.recordExecution('A');
      counters.resetUseable();

      expect(counters.getUseable('A', 'B')).toBe(0);
      expect(counters.getTotal('RUN', 'A')).toBe(1);
    });
  });

  it('rejects unknown nodes', () => {
    expect(() => counters.getTotal('TRIAL', 'Z')).toThrow('Unknown node: Z (counts for TRIAL)');
    expect(() => counters.getUseable('Z', 'A')).toThrow(
      expect.objectContaining({ code: 'UNKNOWN_NODE' })
    );
    expect(() => counters.recordExecution('Z')).toThrow(
      expect.objectContaining({ code: 'UNKNOWN_NODE' })
    );
  });

  it('takes a plain-data snapshot', () => {
    counters.increment('PASS');
    counters.recordExecution('B');

    const snapshot = counters.snapshot();

    expect(snapshot.times.TRIAL.PASS).toBe(1);
    expect(snapshot.totals.TRIAL).toEqual([
      ['A', 0],
      ['B', 1],
    ]);
    expect(snapshot.useable).toEqual([
      ['A', [['A', 0], ['B', 0]]],
      ['B', [['A', 1], ['B', 1]]],
    ]);

    counters.recordExecution('A');
    expect(snapshot.totals.TRIAL).toEqual([
      ['A', 0],
      ['B', 1],
    ]);
  });
});
