import type { TerminationReason, WorkflowState } from './states';
import { analyzeFailures } from './failure-analyzer';

export const DEFAULT_MAX_ITERATIONS = 3;

export type LoopDecision = { kind: 'terminate'; reason: TerminationReason } | { kind: 'continue'; nextStage: 'FIX'; feedback: string };

/**
 * Decides what follows a Verify stage. Pure: no I/O, no mutation.
 *
 *   testPassed                      → terminate (success)
 *   iterationCount >= maxIterations → terminate (exhausted)
 *   otherwise                       → Fix again, with feedback built from the report
 */
export class LoopController {
  constructor(private maxIterations: number = DEFAULT_MAX_ITERATIONS) {
    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new Error(`maxIterations must be a positive integer, got ${maxIterations}`);
    }
  }

  decide(state: Readonly<WorkflowState>): LoopDecision {
    if (state.testPassed) {
      return { kind: 'terminate', reason: 'success' };
    }
    if (state.iterationCount >= this.maxIterations) {
      return { kind: 'terminate', reason: 'exhausted' };
    }
    return { kind: 'continue', nextStage: 'FIX', feedback: buildFeedback(state.currentOutput, state.iterationCount) };
  }

  getMaxIterations(): number {
    return this.maxIterations;
  }
}

/** Wrap a failed Verify report with remediation guidance for the next Fix */
export function buildFeedback(report: string, iteration: number): string {
  const analysis = analyzeFailures(report);
  const specific = analysis.failurePoints.length > 0 ? `\nSpecific errors:\n${analysis.failurePoints.map((p) => `- ${p}`).join('\n')}\n` : '';

  return `=== TEST FAILURE FEEDBACK (after fix attempt ${iteration}) ===
The following issues were found during testing:

${report}
${specific}
Suggested focus: ${analysis.suggestedFocus}

Please fix the code to make the tests pass. Focus on:
1. Any runtime errors mentioned
2. Assertion failures
3. Missing functionality`;
}
