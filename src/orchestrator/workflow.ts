import crypto from 'crypto';
import type { AgentCoordinator } from './agent-coordinator';
import type { ModelFallbackPolicy } from './fallback-policy';
import { CheckpointStore } from './state-store';
import { StageExecutor } from './stage-executor';
import type { StageExecutionResult } from './stage-executor';
import { LoopController, DEFAULT_MAX_ITERATIONS } from './loop-controller';
import { classifyVerification } from './verdict';
import { WorkflowEvents } from './events';
import { IterationLimitError, SessionNotFoundError, errorCode } from './errors';
import { ConsoleWorkflowLogger } from './logger';
import type { WorkflowLogger } from './logger';
import { STAGE_ORDER, initialState } from './states';
import type { Checkpoint, SessionPhase, StageName, TerminationReason, VerificationSummary, WorkflowState } from './states';
import { ExperimentLogger, truncate } from '../experiment/experiment-logger';
import { JsonlLogSink } from '../experiment/log-sink';
import type { LogSink } from '../experiment/types';
import { RateLimiter } from '../llm/rate-limiter';

// ── Options ─────────────────────────────────────────────────────────────

/** Configuration for creating a WorkflowEngine */
export interface WorkflowEngineOptions {
  /** Coordinator with an agent registered for every stage */
  coordinator: AgentCoordinator;
  /** Ordered backend list and failure classification */
  policy: ModelFallbackPolicy;
  /** Session identifier (auto-generated if omitted) */
  sessionId?: string;
  /** Checkpoint persistence (default: `.codemender`) */
  checkpointStore?: CheckpointStore;
  /** Experiment log destination (default: `logs/experiment_data.jsonl`) */
  logSink?: LogSink;
  /** Pre-built experiment logger; must use the same session id */
  experimentLogger?: ExperimentLogger;
  /** Abort the session when an experiment log write fails */
  strictLogging?: boolean;
  /** Logger implementation (defaults to ConsoleWorkflowLogger) */
  logger?: WorkflowLogger;
  /** Cap on backends tried per stage call (default: all) */
  maxBackendAttempts?: number;
  /** Rate-limit cooldown before each repeated Fix (default: 60000) */
  cooldownMs?: number;
  /** Pause between fallback attempts inside a stage (default: 0) */
  fallbackDelayMs?: number;
  /** Sleep implementation, primarily for testing */
  sleep?: (ms: number) => Promise<void>;
}

/** What a finished session reports to its caller */
export interface SessionResult {
  sessionId: string;
  status: 'completed' | 'exhausted';
  termination: TerminationReason;
  state: WorkflowState;
  verification?: VerificationSummary;
  /** Last Verify report, for judging how close an exhausted session got */
  lastReport: string;
  durationMs: number;
  logWriteFailures: number;
}

export const DEFAULT_COOLDOWN_MS = 60000;

const FINAL_OUTPUT_LIMIT = 3000;

// ── Engine ──────────────────────────────────────────────────────────────

/**
 * WorkflowEngine drives one session of the Inspect → Fix → Verify loop.
 *
 * Responsibilities:
 *  - Owns the canonical WorkflowState and its checkpoint
 *  - Runs stages through the StageExecutor in the order the phases dictate
 *  - Asks the LoopController what follows each Verify
 *  - Persists a checkpoint after every transition
 *  - Aborts (checkpoint marked failed) on any stage failure; never retries itself
 */
export class WorkflowEngine {
  public events = new WorkflowEvents();

  private sessionId: string;
  private coordinator: AgentCoordinator;
  private policy: ModelFallbackPolicy;
  private store: CheckpointStore;
  private experimentLogger: ExperimentLogger;
  private executor: StageExecutor;
  private logger: WorkflowLogger;
  private maxBackendAttempts?: number;
  private cooldownMs: number;
  private sleep: (ms: number) => Promise<void>;
  private checkpoint: Checkpoint | null = null;
  private activeStage?: StageName;
  private startTime = 0;

  constructor(options: WorkflowEngineOptions) {
    this.sessionId = options.experimentLogger?.getSessionId() ?? options.sessionId ?? crypto.randomUUID();
    if (options.sessionId && options.sessionId !== this.sessionId) {
      throw new Error(`Experiment logger session ${this.sessionId} does not match ${options.sessionId}`);
    }

    this.coordinator = options.coordinator;
    this.policy = options.policy;
    this.store = options.checkpointStore ?? new CheckpointStore('.codemender');
    this.logger = options.logger ?? new ConsoleWorkflowLogger(this.sessionId);
    this.experimentLogger =
      options.experimentLogger ??
      new ExperimentLogger({
        sink: options.logSink ?? new JsonlLogSink('logs/experiment_data.jsonl'),
        sessionId: this.sessionId,
        logger: this.logger,
        strict: options.strictLogging,
      });
    this.maxBackendAttempts = options.maxBackendAttempts;
    this.cooldownMs = options.cooldownMs ?? DEFAULT_COOLDOWN_MS;
    this.sleep = options.sleep ?? RateLimiter.sleep;

    this.executor = new StageExecutor({
      coordinator: this.coordinator,
      policy: this.policy,
      experimentLogger: this.experimentLogger,
      logger: this.logger,
      events: this.events,
      fallbackDelayMs: options.fallbackDelayMs,
      sleep: this.sleep,
    });
  }

  // ── Public API ──────────────────────────────────────────────────────

  /** Run a new session against `target` until success, exhaustion or failure */
  async runSession(target: string, maxIterations: number = DEFAULT_MAX_ITERATIONS): Promise<SessionResult> {
    if (target.trim() === '') {
      throw new Error('A target is required to start a session');
    }
    this.assertAgentsRegistered();
    const controller = new LoopController(maxIterations);

    this.startTime = Date.now();
    const now = new Date().toISOString();
    const checkpoint: Checkpoint = {
      sessionId: this.sessionId,
      status: 'running',
      phase: 'INITIALIZED',
      maxIterations,
      state: initialState(target),
      history: [],
      createdAt: now,
      updatedAt: now,
    };
    this.checkpoint = checkpoint;

    this.logger.info('Starting session', { sessionId: this.sessionId, target, maxIterations, backends: [...this.policy.backends()] });

    try {
      await this.experimentLogger.recordSessionEvent('STARTUP', {
        target_directory: target,
        available_models: [...this.policy.backends()],
        max_iterations: maxIterations,
      });
      await this.store.save(this.sessionId, checkpoint);
    } catch (error) {
      await this.fail(checkpoint, error);
      throw error;
    }

    return this.drive(checkpoint, controller);
  }

  /**
   * Continue a session from its last checkpoint. A terminated session is
   * reported as-is; a failed or interrupted one re-runs the stage it was in.
   */
  async resumeSession(): Promise<SessionResult> {
    const checkpoint = await this.store.load(this.sessionId);
    if (!checkpoint) {
      throw new SessionNotFoundError(this.sessionId);
    }
    this.assertAgentsRegistered();
    const controller = new LoopController(checkpoint.maxIterations);

    this.startTime = Date.now();
    this.checkpoint = checkpoint;

    if (checkpoint.phase === 'TERMINATED') {
      this.logger.info('Session already terminated; nothing to resume', { sessionId: this.sessionId, status: checkpoint.status });
      return this.buildResult(checkpoint);
    }

    this.logger.info('Resuming session', { sessionId: this.sessionId, phase: checkpoint.phase, previousStatus: checkpoint.status });

    const previousStatus = checkpoint.status;
    const failedStage = checkpoint.failedStage;
    checkpoint.status = 'running';
    delete checkpoint.error;
    delete checkpoint.failedStage;

    try {
      await this.experimentLogger.recordSessionEvent('RESUME', {
        phase: checkpoint.phase,
        previous_status: previousStatus,
        failed_stage: failedStage ?? null,
        iteration: checkpoint.state.iterationCount,
      });
      await this.persist(checkpoint);
    } catch (error) {
      await this.fail(checkpoint, error);
      throw error;
    }

    return this.drive(checkpoint, controller);
  }

  getSessionId(): string {
    return this.sessionId;
  }

  /** Snapshot of the current checkpoint, or null before a session starts */
  getStatus(): Checkpoint | null {
    return this.checkpoint ? structuredClone(this.checkpoint) : null;
  }

  getExperimentLogger(): ExperimentLogger {
    return this.experimentLogger;
  }

  // ── Execution Loop ──────────────────────────────────────────────────

  private async drive(checkpoint: Checkpoint, controller: LoopController): Promise<SessionResult> {
    try {
      while (checkpoint.phase !== 'TERMINATED') {
        await this.step(checkpoint, controller);
      }
    } catch (error) {
      await this.fail(checkpoint, error);
      throw error;
    }

    return this.complete(checkpoint);
  }

  private async step(checkpoint: Checkpoint, controller: LoopController): Promise<void> {
    const state = checkpoint.state;

    switch (checkpoint.phase) {
      case 'INITIALIZED': {
        const result = await this.runStage('INSPECT', state);
        state.currentOutput = result.output;
        state.modelUsed = result.backend;
        await this.transition(checkpoint, 'INSPECTED', 'INSPECT');
        return;
      }

      case 'INSPECTED':
      case 'FEEDBACK_READY': {
        if (state.iterationCount >= controller.getMaxIterations()) {
          throw new IterationLimitError(state.iterationCount, controller.getMaxIterations());
        }
        const result = await this.runStage('FIX', state);
        state.iterationCount += 1;
        state.currentOutput = result.output;
        state.modelUsed = result.backend;
        await this.transition(checkpoint, 'FIXED', 'FIX');
        return;
      }

      case 'FIXED': {
        const result = await this.runStage('VERIFY', state);
        const outcome = classifyVerification(result.output);
        this.logger.info(`Verification ${outcome.passed ? 'passed' : 'failed'}`, {
          method: outcome.method,
          passedCount: outcome.passedCount,
          failedCount: outcome.failedCount,
          iteration: state.iterationCount,
        });

        state.currentOutput = result.output;
        state.testPassed = outcome.passed;
        state.modelUsed = result.backend;
        checkpoint.lastReport = result.output;
        checkpoint.verification = {
          method: outcome.method,
          ...(outcome.passedCount !== undefined ? { passedCount: outcome.passedCount } : {}),
          ...(outcome.failedCount !== undefined ? { failedCount: outcome.failedCount } : {}),
        };
        await this.transition(checkpoint, 'VERIFIED', 'VERIFY');
        return;
      }

      case 'VERIFIED': {
        const decision = controller.decide(state);
        if (decision.kind === 'terminate') {
          checkpoint.termination = decision.reason;
          checkpoint.status = decision.reason === 'success' ? 'completed' : 'exhausted';
          await this.transition(checkpoint, 'TERMINATED');
          return;
        }

        if (this.cooldownMs > 0) {
          this.logger.info(`Cooling down ${this.cooldownMs}ms before the next fix attempt`);
          await this.sleep(this.cooldownMs);
        }
        state.currentOutput = decision.feedback;
        await this.transition(checkpoint, 'FEEDBACK_READY');
        return;
      }

      case 'TERMINATED':
        return;
    }
  }

  private async runStage(stage: StageName, state: Readonly<WorkflowState>): Promise<StageExecutionResult> {
    this.activeStage = stage;
    this.logger.info(`Executing: ${stage}`, { iteration: state.iterationCount });
    const stageStart = Date.now();

    const result = await this.executor.execute({
      stage,
      target: state.target,
      currentOutput: state.currentOutput,
      iteration: state.iterationCount,
      maxBackendAttempts: this.maxBackendAttempts,
    });

    this.logger.info(`Completed: ${stage} (${Date.now() - stageStart}ms)`, { backend: result.backend, attempts: result.attempts });
    this.activeStage = undefined;
    return result;
  }

  // ── Persistence ─────────────────────────────────────────────────────

  private async transition(checkpoint: Checkpoint, to: SessionPhase, completedStage?: StageName): Promise<void> {
    const from = checkpoint.phase;
    checkpoint.phase = to;
    if (completedStage) {
      checkpoint.history.push(completedStage);
    }
    await this.persist(checkpoint);

    this.logger.debug('Phase transition', { from, to });
    this.events.emitTransition({ from, to, sessionId: this.sessionId, timestamp: checkpoint.updatedAt });
  }

  private async persist(checkpoint: Checkpoint): Promise<void> {
    checkpoint.updatedAt = new Date().toISOString();
    await this.store.save(this.sessionId, checkpoint);
  }

  private async fail(checkpoint: Checkpoint, error: unknown): Promise<void> {
    const message = error instanceof Error ? error.message : String(error);
    const code = errorCode(error);

    checkpoint.status = 'failed';
    checkpoint.error = { code, message, details: error instanceof Error ? error.stack : undefined };
    if (this.activeStage) {
      checkpoint.failedStage = this.activeStage;
    }
    this.logger.error('Session failed', { stage: this.activeStage, code, error: message });

    // Bookkeeping failures are logged; the caller receives the stage error
    try {
      await this.persist(checkpoint);
    } catch (persistError) {
      this.logger.error('Could not persist failed checkpoint', { error: persistError instanceof Error ? persistError.message : String(persistError) });
    }
    try {
      await this.experimentLogger.recordSessionEvent('FAILURE', {
        stage: this.activeStage ?? null,
        error_code: code,
        message,
        iteration: checkpoint.state.iterationCount,
      });
    } catch (logError) {
      this.logger.error('Could not record failure event', { error: logError instanceof Error ? logError.message : String(logError) });
    }
    this.activeStage = undefined;
  }

  private async complete(checkpoint: Checkpoint): Promise<SessionResult> {
    await this.experimentLogger.recordSessionEvent('COMPLETION', {
      total_iterations: checkpoint.state.iterationCount,
      test_passed: checkpoint.state.testPassed,
      termination: checkpoint.termination ?? null,
      verification_method: checkpoint.verification?.method ?? null,
      final_output: truncate(checkpoint.lastReport ?? checkpoint.state.currentOutput, FINAL_OUTPUT_LIMIT),
    });

    const result = this.buildResult(checkpoint);
    this.logger.info('Session result', {
      status: result.status,
      iterations: result.state.iterationCount,
      testPassed: result.state.testPassed,
      durationMs: result.durationMs,
    });
    return result;
  }

  // ── Helpers ─────────────────────────────────────────────────────────

  private buildResult(checkpoint: Checkpoint): SessionResult {
    const termination: TerminationReason = checkpoint.termination ?? (checkpoint.state.testPassed ? 'success' : 'exhausted');
    return {
      sessionId: this.sessionId,
      status: termination === 'success' ? 'completed' : 'exhausted',
      termination,
      state: { ...checkpoint.state },
      verification: checkpoint.verification,
      lastReport: checkpoint.lastReport ?? checkpoint.state.currentOutput,
      durationMs: Date.now() - this.startTime,
      logWriteFailures: this.experimentLogger.getWriteFailures().length,
    };
  }

  private assertAgentsRegistered(): void {
    for (const stage of STAGE_ORDER) {
      this.coordinator.getAgent(stage);
    }
  }
}
