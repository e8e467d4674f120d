import fs from 'node:fs/promises';
import { CheckpointStore } from '../orchestrator/state-store';
import type { Checkpoint, SessionPhase, SessionStatus } from '../orchestrator/states';

export type HistoryStoreOptions = {
  rootDir?: string;
};

export type HistoryFilter = {
  status?: SessionStatus;
  target?: string;
  from?: Date;
  to?: Date;
  limit?: number;
};

export type HistoryEntrySummary = {
  sessionId: string;
  status: SessionStatus;
  phase: SessionPhase;
  target: string;
  iterationCount: number;
  testPassed: boolean;
  updatedAt: string;
  error?: Checkpoint['error'];
};

/** Read-only view over the checkpoints of past sessions */
export class HistoryStore {
  private store: CheckpointStore;

  constructor(opts?: HistoryStoreOptions) {
    this.store = new CheckpointStore(opts?.rootDir ?? '.codemender');
  }

  async load(sessionId: string): Promise<Checkpoint | null> {
    return this.store.load(sessionId);
  }

  async listSessionIds(): Promise<string[]> {
    try {
      const entries = await fs.readdir(this.store.getRootDir(), { withFileTypes: true });
      return entries.filter((e) => e.isDirectory()).map((e) => e.name);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
  }

  async list(filter: HistoryFilter = {}): Promise<HistoryEntrySummary[]> {
    const sessionIds = await this.listSessionIds();
    const checkpoints = await Promise.all(sessionIds.map((id) => this.load(id)));

    const summaries = checkpoints
      .filter((c): c is Checkpoint => c !== null)
      .map((c) => toSummary(c))
      .filter((s) => matchesFilter(s, filter))
      .sort((a, b) => Date.parse(b.updatedAt) - Date.parse(a.updatedAt));

    if (filter.limit && filter.limit > 0) {
      return summaries.slice(0, filter.limit);
    }
    return summaries;
  }

  async latest(): Promise<Checkpoint | null> {
    const [newest] = await this.list({ limit: 1 });
    return newest ? this.load(newest.sessionId) : null;
  }
}

function toSummary(checkpoint: Checkpoint): HistoryEntrySummary {
  return {
    sessionId: checkpoint.sessionId,
    status: checkpoint.status,
    phase: checkpoint.phase,
    target: checkpoint.state.target,
    iterationCount: checkpoint.state.iterationCount,
    testPassed: checkpoint.state.testPassed,
    updatedAt: checkpoint.updatedAt,
    ...(checkpoint.error ? { error: checkpoint.error } : {}),
  };
}

function matchesFilter(summary: HistoryEntrySummary, filter: HistoryFilter): boolean {
  if (filter.status && summary.status !== filter.status) return false;
  if (filter.target && summary.target !== filter.target) return false;

  const updatedAtMs = Date.parse(summary.updatedAt);
  if (Number.isFinite(updatedAtMs)) {
    if (filter.from && updatedAtMs < filter.from.getTime()) return false;
    if (filter.to && updatedAtMs > filter.to.getTime()) return false;
  }
  return true;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
