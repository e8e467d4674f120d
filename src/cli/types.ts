import type { SessionStatus } from '../orchestrator/states';

/** Raw `run` options as commander hands them over */
export interface RunCommandOptions {
  target?: string;
  resume?: string;
  maxIterations?: string;
  models?: string;
  cooldown?: string;
  sessionId?: string;
  strictLogging?: boolean;
  verbose?: boolean;
}

export type ValidatedRunOptions =
  | { mode: 'new'; target: string; sessionId?: string; maxIterations?: number; models?: string[]; cooldownMs?: number; strictLogging: boolean; verbose: boolean }
  | { mode: 'resume'; sessionId: string; models?: string[]; cooldownMs?: number; strictLogging: boolean; verbose: boolean };

export interface HistoryCommandOptions {
  sessionId?: string;
  status?: string;
  target?: string;
  limit?: string;
  json?: boolean;
}

export const SESSION_STATUSES: readonly SessionStatus[] = ['running', 'completed', 'exhausted', 'failed'];
