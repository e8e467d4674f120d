import type { AgentCoordinator } from './agent-coordinator';
import type { ModelFallbackPolicy } from './fallback-policy';
import type { ExperimentLogger } from '../experiment/experiment-logger';
import type { WorkflowLogger } from './logger';
import { silentLogger } from './logger';
import type { WorkflowEvents } from './events';
import { FallbackExhaustedError } from './errors';
import type { BackendAttempt } from './errors';
import type { ActionKind, StageName } from './states';
import { RateLimiter } from '../llm/rate-limiter';

export interface StageExecutionRequest {
  stage: StageName;
  /** Audit tag; defaults to the registered agent's action */
  action?: ActionKind;
  target: string;
  currentOutput: string;
  /** iterationCount at the time of the call, recorded with each attempt */
  iteration: number;
  /** Cap on backends tried for this call (default: all of them) */
  maxBackendAttempts?: number;
}

export interface StageExecutionResult {
  output: string;
  backend: string;
  /** Backend calls made, including the successful one */
  attempts: number;
  /** Retryable failures absorbed before the success */
  failures: BackendAttempt[];
}

export interface StageExecutorOptions {
  coordinator: AgentCoordinator;
  policy: ModelFallbackPolicy;
  experimentLogger: ExperimentLogger;
  logger?: WorkflowLogger;
  events?: WorkflowEvents;
  /** Pause between a retryable failure and the next backend (default: 0) */
  fallbackDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * StageExecutor runs one stage against the fallback list.
 *
 *  - Backends are tried in policy order, always from the first.
 *  - The first success returns immediately.
 *  - A fatal failure is rethrown as-is; no other backend is tried.
 *  - When every tried backend failed retryably, FallbackExhaustedError.
 *  - Every attempt gets a start and a finish record before the next begins.
 */
export class StageExecutor {
  private coordinator: AgentCoordinator;
  private policy: ModelFallbackPolicy;
  private experimentLogger: ExperimentLogger;
  private logger: WorkflowLogger;
  private events?: WorkflowEvents;
  private fallbackDelayMs: number;
  private sleep: (ms: number) => Promise<void>;

  constructor(options: StageExecutorOptions) {
    this.coordinator = options.coordinator;
    this.policy = options.policy;
    this.experimentLogger = options.experimentLogger;
    this.logger = options.logger ?? silentLogger;
    this.events = options.events;
    this.fallbackDelayMs = options.fallbackDelayMs ?? 0;
    this.sleep = options.sleep ?? RateLimiter.sleep;
  }

  async execute(request: StageExecutionRequest): Promise<StageExecutionResult> {
    const { stage, target, currentOutput, iteration } = request;
    const action = request.action ?? this.coordinator.getAgent(stage).action;
    const backends = this.policy.backends();

    const limit = request.maxBackendAttempts ?? backends.length;
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error(`maxBackendAttempts must be a positive integer, got ${limit}`);
    }
    const candidates = backends.slice(0, limit);

    const failures: BackendAttempt[] = [];
    let lastError: unknown;

    for (const [index, backend] of candidates.entries()) {
      if (index > 0 && this.fallbackDelayMs > 0) {
        this.logger.debug(`Waiting ${this.fallbackDelayMs}ms before next backend`, { stage, backend });
        await this.sleep(this.fallbackDelayMs);
      }

      this.logger.debug(`Attempting ${stage}`, { backend, attempt: index + 1, of: candidates.length });
      const recordId = await this.experimentLogger.recordStart(stage, backend, action, summarizeInput(target, currentOutput), iteration);

      let output: string;
      try {
        output = await this.coordinator.perform(stage, { backend, target, currentOutput });
      } catch (error) {
        const classification = this.policy.classify(error);
        await this.experimentLogger.recordFinish(recordId, classification.message, 'FAILURE', { errorCode: classification.code });
        this.events?.emitAttempt({ stage, backend, outcome: classification.severity, message: classification.message });

        if (classification.severity === 'fatal') {
          this.logger.error(`${stage} failed fatally on ${backend}`, { code: classification.code, error: classification.message });
          throw error;
        }

        this.logger.warn(`${stage} failed on ${backend}; falling back`, { code: classification.code, error: classification.message });
        failures.push({ backend, classification });
        lastError = error;
        continue;
      }

      await this.experimentLogger.recordFinish(recordId, output, 'SUCCESS');
      this.events?.emitAttempt({ stage, backend, outcome: 'success' });
      return { output, backend, attempts: index + 1, failures };
    }

    throw new FallbackExhaustedError(stage, failures, lastError);
  }
}

function summarizeInput(target: string, currentOutput: string): string {
  return currentOutput ? `target: ${target}\n\n${currentOutput}` : `target: ${target}`;
}
