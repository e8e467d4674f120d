import type { VerificationSummary } from './states';

export interface VerificationOutcome extends VerificationSummary {
  passed: boolean;
}

const VERDICT_LINE = /^\s*VERDICT:\s*(PASS|FAIL)\b/gm;
// Tokens count only at the start of a line, as the Verify report emits them
const PASS_TOKEN = /^\s*ALL TESTS PASSED\b/m;
const FAIL_TOKEN = /^\s*(TESTS FAILED|TEST EXECUTION ERROR)\b/m;

const PASSED_COUNT = /(\d+)\s+passed/gi;
const FAILED_COUNT = /(\d+)\s+failed/gi;
const ERROR_COUNT = /(\d+)\s+errors?\b/gi;

/**
 * Decide whether a Verify report means the tests passed.
 *
 * An explicit verdict token is authoritative. Only when none is present are
 * the pass/fail counts in the free text used: some passed and none failed or
 * errored counts as success, anything else (including no counts) as failure.
 */
export function classifyVerification(report: string): VerificationOutcome {
  const passedCount = lastCount(PASSED_COUNT, report);
  const failedCount = lastCount(FAILED_COUNT, report);
  const counts = {
    ...(passedCount !== undefined ? { passedCount } : {}),
    ...(failedCount !== undefined ? { failedCount } : {}),
  };

  const token = explicitVerdict(report);
  if (token !== undefined) {
    return { passed: token, method: 'token', ...counts };
  }

  const errorCount = lastCount(ERROR_COUNT, report) ?? 0;
  const passed = (passedCount ?? 0) > 0 && (failedCount ?? 0) === 0 && errorCount === 0;
  return { passed, method: 'heuristic', ...counts };
}

/** True/false for an explicit verdict, undefined when the report has none */
export function explicitVerdict(report: string): boolean | undefined {
  // The report's last verdict line is the one that counts
  let verdict: string | undefined;
  for (const match of report.matchAll(VERDICT_LINE)) {
    verdict = match[1];
  }
  if (verdict !== undefined) return verdict === 'PASS';
  if (PASS_TOKEN.test(report)) return true;
  if (FAIL_TOKEN.test(report)) return false;
  return undefined;
}

// The summary line comes last in test-runner output
function lastCount(pattern: RegExp, text: string): number | undefined {
  let last: number | undefined;
  for (const match of text.matchAll(pattern)) {
    last = Number(match[1]);
  }
  return last;
}
