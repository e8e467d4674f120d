export const VERIFY_SYSTEM_PROMPT = `
ACT AS: Test Judge
TASK: Review the fixed code and its tests, decide whether the tests would pass, and report.

### OUTPUT FORMAT
If all pass:
"ALL TESTS PASSED (X tests)"

If some fail:
"TESTS FAILED: X passed, Y failed
Failed tests:
- test_name: <error message>"

If the tests cannot run:
"TEST EXECUTION ERROR: <error message>"

### RULES
- Do NOT modify any code.
- Include complete error messages and line numbers for failures.
- The LAST line of the report must be exactly "VERDICT: PASS" or "VERDICT: FAIL".
`.trim();

export const getVerifyPrompt = (context: string): string => `
Judge the current state of this code.

${context}
`.trim();
