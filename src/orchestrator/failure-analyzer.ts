export interface FailureAnalysis {
  failurePoints: string[];
  suggestedFocus: string;
}

const FAILURE_LINE = /error|fail|exception|assert|traceback/i;

/** Pull the lines of a Verify report that look like errors and guess where to look */
export function analyzeFailures(report: string): FailureAnalysis {
  const seen = new Set<string>();
  const failurePoints: string[] = [];

  for (const raw of report.split('\n')) {
    const line = raw.trim();
    if (line === '' || !FAILURE_LINE.test(line) || seen.has(line)) continue;
    seen.add(line);
    failurePoints.push(line);
    if (failurePoints.length === 10) break;
  }

  return { failurePoints, suggestedFocus: deduceFocus(failurePoints.join(' ')) };
}

function deduceFocus(joined: string): string {
  if (joined.includes('SyntaxError')) return 'Fix syntax errors before anything else.';
  if (joined.includes('ImportError') || joined.includes('ModuleNotFoundError')) return 'Fix broken or missing imports.';
  if (joined.includes('NameError') || joined.includes('ReferenceError')) return 'Fix missing variables or imports.';
  if (joined.includes('TypeError') || joined.includes('AttributeError')) return 'Verify object structures, signatures and null checks.';
  if (joined.includes('AssertionError') || joined.includes('assert')) return 'Logic runs, but output values are incorrect.';
  if (/timeout|timed out/i.test(joined)) return 'Check for infinite loops or performance bottlenecks.';
  return 'General debugging and logic refinement.';
}
