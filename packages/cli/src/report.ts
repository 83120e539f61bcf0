import type { ScenarioResult } from './types.js';

// ─── Terminal formatting ─────────────────────────────────────────────────────

const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const RESET = '\x1b[0m';
const GREEN = '\x1b[32m';
const RED = '\x1b[31m';

export interface ReportOptions {
  color?: boolean;
}

export function formatReport(results: readonly ScenarioResult[], options: ReportOptions = {}): string {
  const paint = (code: string, s: string): string => (options.color ? `${code}${s}${RESET}` : s);

  const lines: string[] = [];
  results.forEach((result, i) => {
    const status = result.passed ? paint(GREEN + BOLD, 'PASS') : paint(RED + BOLD, 'FAIL');
    lines.push(`${status} [${i + 1}] ${result.name}`);
    for (const failure of result.failures) {
      lines.push(paint(DIM, `       ${failure}`));
    }
  });

  const passed = results.filter((r) => r.passed).length;
  const summary = `${passed}/${results.length} scenarios passed`;
  lines.push('');
  lines.push(passed === results.length ? paint(GREEN, summary) : paint(RED, summary));

  return `${lines.join('\n')}\n`;
}
