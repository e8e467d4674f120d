import type { ActionKind, StageName } from '../orchestrator/states';

export type InvocationStatus = 'IN_PROGRESS' | 'SUCCESS' | 'FAILURE';

export type SessionEventKind = 'STARTUP' | 'RESUME' | 'COMPLETION' | 'FAILURE';

/** One stage attempt against one backend. Start and finish are separate records. */
export interface StageInvocationRecord {
  kind: 'invocation';
  id: string;
  /** On a finish record, the id of the start record it closes */
  startId?: string;
  sessionId: string;
  timestamp: string;
  stage: StageName;
  backend: string;
  action: ActionKind;
  iteration: number;
  inputSummary: string;
  outputSummary: string;
  status: InvocationStatus;
  durationMs?: number;
  errorCode?: string;
}

export interface SessionEventRecord {
  kind: 'session';
  id: string;
  sessionId: string;
  timestamp: string;
  event: SessionEventKind;
  payload: Record<string, unknown>;
}

export type ExperimentLogEntry = StageInvocationRecord | SessionEventRecord;

/** Append-only structured storage for experiment log entries */
export interface LogSink {
  append(entry: ExperimentLogEntry): Promise<void>;
  readAll(): Promise<ExperimentLogEntry[]>;
}

export interface LogWriteFailure {
  entryId: string;
  timestamp: string;
  message: string;
}
