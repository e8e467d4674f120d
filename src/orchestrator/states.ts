export type StageName = 'INSPECT' | 'FIX' | 'VERIFY';

export type ActionKind = 'ANALYSIS' | 'GENERATION' | 'FIX' | 'TEST';

export const STAGE_ORDER: readonly StageName[] = ['INSPECT', 'FIX', 'VERIFY'];

/** Default audit tag for each stage */
export const STAGE_ACTIONS: Record<StageName, ActionKind> = {
  INSPECT: 'ANALYSIS',
  FIX: 'FIX',
  VERIFY: 'TEST',
};

/** The single mutable record threaded through the pipeline */
export interface WorkflowState {
  /** Work unit identifier (a directory path); fixed for the session */
  target: string;
  currentOutput: string;
  iterationCount: number;
  testPassed: boolean;
  modelUsed: string;
}

/** Last transition the engine completed; resume picks up from here */
export type SessionPhase = 'INITIALIZED' | 'INSPECTED' | 'FIXED' | 'VERIFIED' | 'FEEDBACK_READY' | 'TERMINATED';

export type SessionStatus = 'running' | 'completed' | 'exhausted' | 'failed';

export type TerminationReason = 'success' | 'exhausted';

export interface VerificationSummary {
  method: 'token' | 'heuristic';
  passedCount?: number;
  failedCount?: number;
}

export interface Checkpoint {
  sessionId: string;
  status: SessionStatus;
  phase: SessionPhase;
  maxIterations: number;
  state: WorkflowState;
  /** Stages completed so far, in order */
  history: StageName[];
  verification?: VerificationSummary;
  /** Last Verify report; survives feedback replacing currentOutput */
  lastReport?: string;
  termination?: TerminationReason;
  failedStage?: StageName;
  error?: {
    code: string;
    message: string;
    details?: string;
  };
  createdAt: string;
  updatedAt: string;
}

export function initialState(target: string): WorkflowState {
  return { target, currentOutput: '', iterationCount: 0, testPassed: false, modelUsed: '' };
}
