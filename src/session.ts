import crypto from 'crypto';
import type { Config } from './config/validator';
import { OpenRouterClient } from './llm/client';
import type { ChatBackend } from './llm/types';
import { InspectorAgent } from './agents/inspector';
import { FixerAgent } from './agents/fixer';
import { VerifierAgent } from './agents/verifier';
import { AgentCoordinator } from './orchestrator/agent-coordinator';
import { ModelFallbackPolicy } from './orchestrator/fallback-policy';
import { CheckpointStore } from './orchestrator/state-store';
import { WorkflowEngine } from './orchestrator/workflow';
import { ConsoleWorkflowLogger } from './orchestrator/logger';
import type { WorkflowLogger } from './orchestrator/logger';
import { ExperimentLogger } from './experiment/experiment-logger';
import { JsonlLogSink } from './experiment/log-sink';

export interface CreateSessionOptions {
  config: Config;
  logger?: WorkflowLogger;
  sessionId?: string;
  /** Backend override, primarily for testing (default: OpenRouterClient) */
  client?: ChatBackend;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Wire configuration into a ready engine: client → agents → coordinator,
 * policy, experiment log and checkpoint store.
 */
export function createSession(options: CreateSessionOptions): WorkflowEngine {
  const { config } = options;
  const sessionId = options.sessionId ?? crypto.randomUUID();
  const logger = options.logger ?? new ConsoleWorkflowLogger(sessionId);

  const client =
    options.client ??
    new OpenRouterClient({
      apiKey: config.backend.api_key,
      baseUrl: config.backend.base_url,
      timeoutMs: config.backend.timeout_ms,
      temperature: config.backend.temperature,
      maxTokens: config.backend.max_tokens,
    });

  const coordinator = new AgentCoordinator();
  coordinator.registerAgent(new InspectorAgent({ client }));
  coordinator.registerAgent(new FixerAgent({ client }));
  coordinator.registerAgent(new VerifierAgent({ client }));

  const experimentLogger = new ExperimentLogger({
    sink: new JsonlLogSink(config.storage.log_file),
    sessionId,
    logger,
    strict: config.storage.strict_logging,
  });

  return new WorkflowEngine({
    coordinator,
    policy: new ModelFallbackPolicy(config.backend.models),
    sessionId,
    checkpointStore: new CheckpointStore(config.storage.root_dir),
    experimentLogger,
    logger,
    maxBackendAttempts: config.pipeline.max_backend_attempts,
    cooldownMs: config.pipeline.cooldown_ms,
    fallbackDelayMs: config.pipeline.fallback_delay_ms,
    sleep: options.sleep,
  });
}
