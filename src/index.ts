export { createSession } from './session';
export type { CreateSessionOptions } from './session';
export { loadConfig } from './config/loader';
export type { Config } from './config/validator';
export { ConfigValidationError } from './config/validator';
export { WorkflowEngine } from './orchestrator/workflow';
export type { SessionResult, WorkflowEngineOptions } from './orchestrator/workflow';
export { StageExecutor } from './orchestrator/stage-executor';
export { ModelFallbackPolicy } from './orchestrator/fallback-policy';
export { AgentCoordinator } from './orchestrator/agent-coordinator';
export type { StageAgent, StageRequest } from './orchestrator/agent-coordinator';
export { LoopController, buildFeedback } from './orchestrator/loop-controller';
export { classifyVerification } from './orchestrator/verdict';
export { CheckpointStore } from './orchestrator/state-store';
export { FallbackExhaustedError, IterationLimitError, SessionNotFoundError } from './orchestrator/errors';
export type { Checkpoint, WorkflowState, StageName, ActionKind } from './orchestrator/states';
export { ExperimentLogger, LogWriteError, LogRecordStateError } from './experiment/experiment-logger';
export { JsonlLogSink } from './experiment/log-sink';
export { OpenRouterClient } from './llm/client';
export { BackendError } from './llm/errors';
export type { ChatBackend } from './llm/types';
export { InspectorAgent } from './agents/inspector';
export { FixerAgent } from './agents/fixer';
export { VerifierAgent } from './agents/verifier';
export { SandboxedWorkspace, SandboxViolationError } from './agents/workspace';
