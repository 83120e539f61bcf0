import { describe, it, expect } from 'vitest';
import { formatReport } from './report.js';

describe('formatReport', () => {
  it('should print one line per scenario and a summary', () => {
    const report = formatReport([
      { name: 'first', passed: true, failures: [] },
      { name: 'second', passed: false, failures: ['find_cohorts(2): expected ["1"], got []'] },
    ]);

    expect(report).toBe(
      [
        'PASS [1] first',
        'FAIL [2] second',
        '       find_cohorts(2): expected ["1"], got []',
        '',
        '1/2 scenarios passed',
        '',
      ].join('\n'),
    );
  });

  it('should colour the status when asked', () => {
    const report = formatReport([{ name: 'only', passed: true, failures: [] }], { color: true });

    expect(report.split('\n')[0]).toBe('\x1b[32m\x1b[1mPASS\x1b[0m [1] only');
    expect(report.split('\n')[2]).toBe('\x1b[32m1/1 scenarios passed\x1b[0m');
  });
});
