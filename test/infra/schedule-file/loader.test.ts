import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  buildCondition,
  loadScheduleFile,
  parseSchedule,
  validateScheduleFile,
} from '../../../src/infra/schedule-file/index.js';
import { createSilentLogger, names } from '../../scheduler/helpers.js';

describe('schedule files', () => {
  let logger: ReturnType<typeof createSilentLogger>;

  beforeEach(() => {
    logger = createSilentLogger();
  });

  describe('parseSchedule', () => {
    it('builds a graph scheduler with its conditions', () => {
      const { scheduler, termination } = parseSchedule(
        JSON.stringify({
          dependencies: { B: ['A'], C: ['B'] },
          conditions: {
            B: { type: 'EveryNCalls', node: 'A', n: 2 },
            C: { type: 'EveryNCalls', node: 'B', n: 3 },
          },
        }),
        { logger }
      );

      expect(termination).toBeUndefined();
      expect(scheduler.nodes).toEqual(['A', 'B', 'C']);
      expect(names(scheduler.run(termination))).toEqual([
        'A', 'A', 'B', 'A', 'A', 'B', 'A', 'A', 'B', 'C',
      ]);
    });

    it('builds nested conditions and termination conditions', () => {
      const { scheduler, termination } = parseSchedule(
        JSON.stringify({
          nodes: ['A', 'B'],
          dependencies: { B: ['A'] },
          conditions: {
            A: {
              type: 'Any',
              conditions: [
                { type: 'AtPass', n: 0 },
                { type: 'EveryNCalls', node: 'B', n: 2 },
              ],
            },
            B: {
              type: 'Any',
              conditions: [
                { type: 'EveryNCalls', node: 'A', n: 1 },
                { type: 'EveryNCalls', node: 'B', n: 1 },
              ],
            },
          },
          termination: { TRIAL: { type: 'AfterNCalls', node: 'B', n: 4 } },
        }),
        { logger }
      );

      expect(termination?.TRIAL?.describe()).toBe('AfterNCalls(B, 4)');
      expect(names(scheduler.run(termination))).toEqual(['A', 'B', 'B', 'A', 'B', 'B']);
    });

    it('keeps an explicit null termination so run() can reject it', () => {
      const { scheduler, termination } = parseSchedule(
        JSON.stringify({ nodes: ['A'], termination: { TRIAL: null } }),
        { logger }
      );

      expect(termination).toEqual({ TRIAL: null });
      expect(() => scheduler.run(termination)).toThrow(
        expect.objectContaining({ code: 'MISSING_TERMINATION_CONDITION' })
      );
    });

    it('leaves node references to run()', () => {
      const { scheduler, termination } = parseSchedule(
        JSON.stringify({
          nodes: ['A'],
          conditions: { A: { type: 'EveryNCalls', node: 'Z', n: 1 } },
        }),
        { logger }
      );

      expect(() => scheduler.run(termination)).toThrow(
        expect.objectContaining({ code: 'UNKNOWN_NODE' })
      );
    });

    it('rejects text that is not JSON', () => {
      expect(() => parseSchedule('{ nodes: [A] }')).toThrow(
        /^Invalid schedule file: not valid JSON \(/
      );
    });
  });

  describe('validateScheduleFile', () => {
    it('needs nodes or dependencies', () => {
      expect(() => validateScheduleFile({})).toThrow(
        expect.objectContaining({
          code: 'INVALID_SCHEDULE_FILE',
          data: { errors: expect.arrayContaining([expect.objectContaining({ path: '/' })]) },
        })
      );
    });

    it('reports the path of a bad condition', () => {
      expect(() =>
        validateScheduleFile({ nodes: ['A'], conditions: { A: { type: 'Sometimes' } } })
      ).toThrow(
        expect.objectContaining({
          data: {
            errors: expect.arrayContaining([expect.objectContaining({ path: '/conditions/A' })]),
          },
        })
      );
    });

    it('rejects unknown properties and time scales', () => {
      expect(() => validateScheduleFile({ nodes: ['A'], extra: true })).toThrow(
        expect.objectContaining({ code: 'INVALID_SCHEDULE_FILE' })
      );
      expect(() =>
        validateScheduleFile({ nodes: ['A'], termination: { EPOCH: { type: 'Never' } } })
      ).toThrow(expect.objectContaining({ code: 'INVALID_SCHEDULE_FILE' }));
    });

    it('rejects negative counts', () => {
      expect(() =>
        validateScheduleFile({ nodes: ['A'], conditions: { A: { type: 'AtPass', n: -1 } } })
      ).toThrow(expect.objectContaining({ code: 'INVALID_SCHEDULE_FILE' }));
    });

    it('requires a threshold on NOf', () => {
      expect(() =>
        validateScheduleFile({ nodes: ['A'], conditions: { A: { type: 'NOf', conditions: [] } } })
      ).toThrow(expect.objectContaining({ code: 'INVALID_SCHEDULE_FILE' }));
    });

    it('returns a valid document unchanged', () => {
      const document = { nodes: ['A'], conditions: { A: { type: 'Always' } } };

      expect(validateScheduleFile(document)).toBe(document);
    });
  });

  it('buildCondition maps nested entries onto conditions', () => {
    expect(
      buildCondition({
        type: 'All',
        conditions: [
          { type: 'Not', condition: { type: 'AtTrial', n: 1 } },
          { type: 'AllHaveRun', nodes: ['A'], timeScale: 'PASS' },
          { type: 'BeforeNCalls', node: 'A', n: 3, timeScale: 'RUN' },
          { type: 'EveryNPasses', n: 2 },
        ],
      }).describe()
    ).toBe('All(Not(AtTrial(1)), AllHaveRun(A, PASS), BeforeNCalls(A, 3, RUN), EveryNPasses(2))');
  });

  it('buildCondition maps NOf with its threshold', () => {
    expect(
      buildCondition({
        type: 'NOf',
        n: 1,
        conditions: [{ type: 'AtPass', n: 0 }, { type: 'Never' }],
      }).describe()
    ).toBe('NOf(1, AtPass(0), Never)');
  });

  it('loadScheduleFile reads from disk', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tickgraph-schedule-'));
    const file = path.join(dir, 'single.json');
    fs.writeFileSync(
      file,
      JSON.stringify({
        nodes: ['A'],
        termination: { TRIAL: { type: 'AfterNCalls', node: 'A', n: 2 } },
      })
    );

    const { scheduler, termination } = loadScheduleFile(file, { logger });

    expect(names(scheduler.run(termination))).toEqual(['A', 'A']);
  });
});
