import { StageExecutor } from '../../../src/orchestrator/stage-executor';
import { AgentCoordinator } from '../../../src/orchestrator/agent-coordinator';
import { ModelFallbackPolicy } from '../../../src/orchestrator/fallback-policy';
import { FallbackExhaustedError } from '../../../src/orchestrator/errors';
import { WorkflowEvents } from '../../../src/orchestrator/events';
import type { AttemptEvent } from '../../../src/orchestrator/events';
import { ExperimentLogger } from '../../../src/experiment/experiment-logger';
import { BackendAuthenticationError, BackendError, BackendRateLimitError } from '../../../src/llm/errors';
import { fakeAgent, MemoryLogSink } from '../../helpers/fakes';
import type { PerformMock } from '../../helpers/fakes';
import type { StageName } from '../../../src/orchestrator/states';

// ── Helpers ─────────────────────────────────────────────────────────────

interface Harness {
  executor: StageExecutor;
  sink: MemoryLogSink;
  perform: PerformMock;
  sleep: jest.Mock<Promise<void>, [number]>;
  attempts: AttemptEvent[];
}

function createHarness(stage: StageName, opts: { models?: string[]; fallbackDelayMs?: number } = {}): Harness {
  const sink = new MemoryLogSink();
  const agent = fakeAgent(stage);
  const coordinator = new AgentCoordinator();
  coordinator.registerAgent(agent);

  const events = new WorkflowEvents();
  const attempts: AttemptEvent[] = [];
  events.onAttempt((e) => attempts.push(e));

  const sleep = jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);
  const executor = new StageExecutor({
    coordinator,
    policy: new ModelFallbackPolicy(opts.models ?? ['m1', 'm2', 'm3']),
    experimentLogger: new ExperimentLogger({ sink, sessionId: 'session-1' }),
    events,
    fallbackDelayMs: opts.fallbackDelayMs,
    sleep,
  });

  return { executor, sink, perform: agent.perform, sleep, attempts };
}

const request = { target: './sandbox', currentOutput: '', iteration: 0 };

// ═══════════════════════════════════════════════════════════════════════

describe('StageExecutor', () => {
  it('should fall back past a rate-limited backend and stop at the first success', async () => {
    const h = createHarness('INSPECT');
    h.perform.mockRejectedValueOnce(new BackendRateLimitError('Rate limit exceeded on m1')).mockResolvedValueOnce('refactoring plan');

    const result = await h.executor.execute({ stage: 'INSPECT', ...request });

    expect(result.output).toBe('refactoring plan');
    expect(result.backend).toBe('m2');
    expect(result.attempts).toBe(2);
    expect(result.failures).toHaveLength(1);
    expect(result.failures[0]?.backend).toBe('m1');
    expect(result.failures[0]?.classification.code).toBe('BACKEND_RATE_LIMITED');

    expect(h.perform).toHaveBeenCalledTimes(2);
    expect(h.perform.mock.calls.map(([r]) => r.backend)).toEqual(['m1', 'm2']);
  });

  it('should write a start and a finish record for every attempt, in order', async () => {
    const h = createHarness('INSPECT');
    h.perform.mockRejectedValueOnce(new BackendRateLimitError('Rate limit exceeded on m1')).mockResolvedValueOnce('refactoring plan');

    await h.executor.execute({ stage: 'INSPECT', ...request });

    const records = h.sink.invocations();
    expect(records.map((r) => [r.backend, r.status])).toEqual([
      ['m1', 'IN_PROGRESS'],
      ['m1', 'FAILURE'],
      ['m2', 'IN_PROGRESS'],
      ['m2', 'SUCCESS'],
    ]);
    expect(records[1]?.startId).toBe(records[0]?.id);
    expect(records[1]?.errorCode).toBe('BACKEND_RATE_LIMITED');
    expect(records[1]?.outputSummary).toBe('Rate limit exceeded on m1');
    expect(records[3]?.startId).toBe(records[2]?.id);
    expect(records[3]?.outputSummary).toBe('refactoring plan');
    expect(records.every((r) => r.action === 'ANALYSIS' && r.stage === 'INSPECT' && r.sessionId === 'session-1')).toBe(true);
  });

  it('should summarize the target and current output as the attempt input', async () => {
    const h = createHarness('FIX');
    h.perform.mockResolvedValue('fixed');

    await h.executor.execute({ stage: 'FIX', target: './sandbox', currentOutput: 'the plan', iteration: 2 });

    const [start] = h.sink.invocations();
    expect(start?.inputSummary).toBe('target: ./sandbox\n\nthe plan');
    expect(start?.iteration).toBe(2);
    expect(start?.action).toBe('FIX');
  });

  it('should rethrow a fatal failure without trying other backends', async () => {
    const h = createHarness('FIX');
    const fatal = new BackendAuthenticationError('Invalid API key');
    h.perform.mockRejectedValueOnce(fatal);

    await expect(h.executor.execute({ stage: 'FIX', ...request })).rejects.toBe(fatal);

    expect(h.perform).toHaveBeenCalledTimes(1);
    expect(h.sink.invocations().map((r) => r.status)).toEqual(['IN_PROGRESS', 'FAILURE']);
    expect(h.attempts).toEqual([{ stage: 'FIX', backend: 'm1', outcome: 'fatal', message: 'Invalid API key' }]);
  });

  it('should raise FallbackExhaustedError when every backend fails retryably', async () => {
    const h = createHarness('VERIFY');
    h.perform.mockRejectedValueOnce(new BackendError('upstream down', 'UNAVAILABLE')).mockRejectedValueOnce(new BackendError('no endpoints', 'ENDPOINT_NOT_FOUND')).mockRejectedValueOnce(new BackendError('still down', 'UNAVAILABLE'));

    const error = await h.executor.execute({ stage: 'VERIFY', ...request }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FallbackExhaustedError);
    if (!(error instanceof FallbackExhaustedError)) return;
    expect(error.message).toBe('All 3 backend(s) failed for VERIFY; last error from m3: still down');
    expect(error.stage).toBe('VERIFY');
    expect(error.attempts.map((a) => a.backend)).toEqual(['m1', 'm2', 'm3']);
    expect(error.cause).toBeInstanceOf(BackendError);
    expect(h.sink.invocations()).toHaveLength(6);
  });

  it('should honor maxBackendAttempts', async () => {
    const h = createHarness('VERIFY');
    h.perform.mockRejectedValue(new BackendError('upstream down', 'UNAVAILABLE'));

    await expect(h.executor.execute({ stage: 'VERIFY', ...request, maxBackendAttempts: 2 })).rejects.toThrow('All 2 backend(s) failed for VERIFY; last error from m2: upstream down');
    expect(h.perform).toHaveBeenCalledTimes(2);
  });

  it('should reject a non-positive maxBackendAttempts', async () => {
    const h = createHarness('VERIFY');

    await expect(h.executor.execute({ stage: 'VERIFY', ...request, maxBackendAttempts: 0 })).rejects.toThrow('maxBackendAttempts must be a positive integer, got 0');
    expect(h.perform).not.toHaveBeenCalled();
  });

  it('should wait fallbackDelayMs between backends but not before the first', async () => {
    const h = createHarness('INSPECT', { fallbackDelayMs: 500 });
    h.perform.mockRejectedValueOnce(new BackendRateLimitError()).mockResolvedValueOnce('plan');

    await h.executor.execute({ stage: 'INSPECT', ...request });

    expect(h.sleep).toHaveBeenCalledTimes(1);
    expect(h.sleep).toHaveBeenCalledWith(500);
  });

  it('should restart from the first backend on every call', async () => {
    const h = createHarness('INSPECT', { models: ['m1', 'm2'] });
    h.perform.mockRejectedValueOnce(new BackendRateLimitError()).mockResolvedValueOnce('first').mockResolvedValueOnce('second');

    await h.executor.execute({ stage: 'INSPECT', ...request });
    const second = await h.executor.execute({ stage: 'INSPECT', ...request });

    expect(second.backend).toBe('m1');
    expect(h.perform.mock.calls.map(([r]) => r.backend)).toEqual(['m1', 'm2', 'm1']);
  });

  it('should emit an attempt event per backend call', async () => {
    const h = createHarness('INSPECT');
    h.perform.mockRejectedValueOnce(new BackendRateLimitError('slow down')).mockResolvedValueOnce('plan');

    await h.executor.execute({ stage: 'INSPECT', ...request });

    expect(h.attempts).toEqual([
      { stage: 'INSPECT', backend: 'm1', outcome: 'retryable', message: 'slow down' },
      { stage: 'INSPECT', backend: 'm2', outcome: 'success' },
    ]);
  });
});
