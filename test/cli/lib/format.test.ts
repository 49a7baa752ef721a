import { formatConsiderationQueue, formatIssues, formatTimeStep } from '../../../src/cli/lib/format.js';

describe('format', () => {
  it('formats time steps and stalled passes', () => {
    expect(formatTimeStep(3, ['A', 'B'])).toBe('[3] A, B');
    expect(formatTimeStep(0, [])).toBe('[0] (stalled pass)');
  });

  it('formats each layer with sorted nodes', () => {
    expect(formatConsiderationQueue([new Set(['C', 'A']), new Set(['B'])])).toEqual([
      'layer 0: A, C',
      'layer 1: B',
    ]);
  });

  it('indents schema issues', () => {
    expect(formatIssues([{ path: '/conditions/A', message: 'must be object' }])).toEqual([
      '  /conditions/A: must be object',
    ]);
  });
});
