import chalk from 'chalk';
import type { SessionResult } from '../orchestrator/workflow';
import type { Checkpoint, SessionPhase } from '../orchestrator/states';
import type { AttemptEvent } from '../orchestrator/events';

// ── Primitives ──────────────────────────────────────────────────────────

export function formatStep(message: string): string {
  return chalk.cyan(`> ${message}`);
}

export function formatInfo(message: string): string {
  return chalk.gray(`  ${message}`);
}

export function formatSuccess(message: string): string {
  return chalk.green(`  ${message}`);
}

export function formatError(message: string): string {
  return chalk.red(`  ${message}`);
}

export function formatWarning(message: string): string {
  return chalk.yellow(`  ${message}`);
}

// ── Session progress ────────────────────────────────────────────────────

const PHASE_LABELS: Record<SessionPhase, string> = {
  INITIALIZED: 'Session started',
  INSPECTED: 'Code inspected',
  FIXED: 'Fix applied',
  VERIFIED: 'Fix verified',
  FEEDBACK_READY: 'Feedback prepared for the next fix',
  TERMINATED: 'Done',
};

export function formatTransition(from: SessionPhase, to: SessionPhase): string {
  return chalk.cyan(`  [${from} -> ${to}] ${PHASE_LABELS[to]}`);
}

export function formatAttempt(event: AttemptEvent): string {
  if (event.outcome === 'success') {
    return formatSuccess(`${event.stage} answered by ${event.backend}`);
  }
  const detail = event.message ? `: ${event.message}` : '';
  const line = `${event.stage} failed on ${event.backend} (${event.outcome})${detail}`;
  return event.outcome === 'fatal' ? formatError(line) : formatWarning(line);
}

export function formatVerboseSection(title: string, body: string): string {
  const separator = chalk.gray('─'.repeat(60));
  return `${separator}\n${chalk.bold(title)}\n${body}\n${separator}`;
}

// ── Final result ────────────────────────────────────────────────────────

export function formatSessionResult(result: SessionResult, opts?: { verbose?: boolean }): string {
  const lines: string[] = [''];

  if (result.status === 'completed') {
    lines.push(chalk.green.bold('Session completed: verification passed.'));
  } else {
    lines.push(chalk.yellow.bold('Session exhausted: iteration limit reached without a passing verification.'));
  }

  lines.push(formatInfo(`Session:    ${result.sessionId}`));
  lines.push(formatInfo(`Target:     ${result.state.target}`));
  lines.push(formatInfo(`Iterations: ${result.state.iterationCount}`));
  lines.push(formatInfo(`Last model: ${result.state.modelUsed || '(none)'}`));
  if (result.verification) {
    const counts = result.verification.passedCount !== undefined || result.verification.failedCount !== undefined ? ` (${result.verification.passedCount ?? 0} passed, ${result.verification.failedCount ?? 0} failed)` : '';
    lines.push(formatInfo(`Verdict:    ${result.verification.method}${counts}`));
  }
  lines.push(formatInfo(`Duration:   ${(result.durationMs / 1000).toFixed(1)}s`));

  if (result.logWriteFailures > 0) {
    lines.push(formatWarning(`${result.logWriteFailures} experiment log write(s) failed; the log is incomplete`));
  }

  if (result.status === 'exhausted' || opts?.verbose) {
    lines.push('');
    lines.push(formatVerboseSection('Last verification report', result.lastReport));
  }

  return lines.join('\n');
}

export function formatCheckpoint(checkpoint: Checkpoint): string[] {
  const lines = [
    formatInfo(`session: ${checkpoint.sessionId}`),
    formatInfo(`target: ${checkpoint.state.target}`),
    formatInfo(`status: ${checkpoint.status}`),
    formatInfo(`phase: ${checkpoint.phase}`),
    formatInfo(`iterations: ${checkpoint.state.iterationCount}/${checkpoint.maxIterations}`),
    formatInfo(`testPassed: ${checkpoint.state.testPassed}`),
    formatInfo(`updatedAt: ${checkpoint.updatedAt}`),
  ];
  if (checkpoint.state.modelUsed) {
    lines.push(formatInfo(`model: ${checkpoint.state.modelUsed}`));
  }
  if (checkpoint.error) {
    const stage = checkpoint.failedStage ? ` (stage ${checkpoint.failedStage})` : '';
    lines.push(formatError(`error${stage}: ${checkpoint.error.code} - ${checkpoint.error.message}`));
  }
  return lines;
}
