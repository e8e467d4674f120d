import crypto from 'crypto';
import type { ActionKind, StageName } from '../orchestrator/states';
import type { WorkflowLogger } from '../orchestrator/logger';
import type { ExperimentLogEntry, LogSink, LogWriteFailure, SessionEventKind, SessionEventRecord, StageInvocationRecord } from './types';

export const DEFAULT_INPUT_LIMIT = 2000;
export const DEFAULT_OUTPUT_LIMIT = 5000;

export interface ExperimentLoggerOptions {
  sink: LogSink;
  sessionId: string;
  /** Operational logger used to report degraded writes */
  logger?: WorkflowLogger;
  /** Throw LogWriteError instead of continuing when the sink fails */
  strict?: boolean;
  inputLimit?: number;
  outputLimit?: number;
  /** Clock override, primarily for testing */
  now?: () => Date;
}

export type FinishStatus = 'SUCCESS' | 'FAILURE';

export interface FinishDetails {
  errorCode?: string;
}

export class LogWriteError extends Error {
  constructor(
    message: string,
    public readonly entryId: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'LogWriteError';
  }
}

export class LogRecordStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LogRecordStateError';
  }
}

interface OpenRecord {
  start: StageInvocationRecord;
  startedAt: number;
}

/** Cut text to at most `limit` characters */
export function truncate(text: string, limit: number): string {
  return text.length > limit ? text.slice(0, limit) : text;
}

/**
 * Append-only audit trail of every stage attempt and session milestone.
 *
 * Each call persists before it resolves. Finishing an attempt appends a new
 * record pointing at its start record; earlier entries are never touched.
 */
export class ExperimentLogger {
  private sink: LogSink;
  private sessionId: string;
  private logger?: WorkflowLogger;
  private strict: boolean;
  private inputLimit: number;
  private outputLimit: number;
  private now: () => Date;
  private lastTimestamp = 0;
  private open = new Map<string, OpenRecord>();
  private finished = new Set<string>();
  private failures: LogWriteFailure[] = [];

  constructor(options: ExperimentLoggerOptions) {
    this.sink = options.sink;
    this.sessionId = options.sessionId;
    this.logger = options.logger;
    this.strict = options.strict ?? false;
    this.inputLimit = options.inputLimit ?? DEFAULT_INPUT_LIMIT;
    this.outputLimit = options.outputLimit ?? DEFAULT_OUTPUT_LIMIT;
    this.now = options.now ?? (() => new Date());
  }

  getSessionId(): string {
    return this.sessionId;
  }

  async recordStart(stage: StageName, backend: string, action: ActionKind, inputSummary: string, iteration = 0): Promise<string> {
    const record: StageInvocationRecord = {
      kind: 'invocation',
      id: crypto.randomUUID(),
      sessionId: this.sessionId,
      timestamp: this.timestamp(),
      stage,
      backend,
      action,
      iteration,
      inputSummary: truncate(inputSummary, this.inputLimit),
      outputSummary: '',
      status: 'IN_PROGRESS',
    };

    this.open.set(record.id, { start: record, startedAt: Date.now() });
    await this.write(record);
    return record.id;
  }

  async recordFinish(recordId: string, outputSummary: string, status: FinishStatus, details: FinishDetails = {}): Promise<void> {
    const open = this.open.get(recordId);
    if (!open) {
      const reason = this.finished.has(recordId) ? 'already finished' : 'unknown';
      throw new LogRecordStateError(`Cannot finish record ${recordId}: ${reason}`);
    }
    this.open.delete(recordId);
    this.finished.add(recordId);

    const record: StageInvocationRecord = {
      ...open.start,
      id: crypto.randomUUID(),
      startId: recordId,
      timestamp: this.timestamp(),
      outputSummary: truncate(outputSummary, this.outputLimit),
      status,
      durationMs: Date.now() - open.startedAt,
      ...(details.errorCode ? { errorCode: details.errorCode } : {}),
    };

    await this.write(record);
  }

  async recordSessionEvent(event: SessionEventKind, payload: Record<string, unknown>): Promise<void> {
    const record: SessionEventRecord = {
      kind: 'session',
      id: crypto.randomUUID(),
      sessionId: this.sessionId,
      timestamp: this.timestamp(),
      event,
      payload,
    };
    await this.write(record);
  }

  /** Storage failures absorbed in degraded mode */
  getWriteFailures(): LogWriteFailure[] {
    return [...this.failures];
  }

  /** Ids of attempts started but not yet finished */
  getOpenRecordIds(): string[] {
    return [...this.open.keys()];
  }

  /** Read back this session's entries from the sink */
  async readSession(): Promise<ExperimentLogEntry[]> {
    const all = await this.sink.readAll();
    return all.filter((entry) => entry.sessionId === this.sessionId);
  }

  // ── Private Helpers ─────────────────────────────────────────────────

  private timestamp(): string {
    const ms = Math.max(this.now().getTime(), this.lastTimestamp);
    this.lastTimestamp = ms;
    return new Date(ms).toISOString();
  }

  private async write(entry: ExperimentLogEntry): Promise<void> {
    try {
      await this.sink.append(entry);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (this.strict) {
        throw new LogWriteError(`Failed to persist log entry ${entry.id}: ${message}`, entry.id, { cause: error });
      }
      this.failures.push({ entryId: entry.id, timestamp: entry.timestamp, message });
      this.logger?.warn('Experiment log write failed; continuing without it', { entryId: entry.id, error: message });
    }
  }
}
