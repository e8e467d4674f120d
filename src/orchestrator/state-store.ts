import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { Checkpoint } from './states';

export const CHECKPOINT_FILE = 'checkpoint.json';

const StageNameSchema = z.enum(['INSPECT', 'FIX', 'VERIFY']);

export const CheckpointSchema: z.ZodType<Checkpoint> = z.object({
  sessionId: z.string().min(1),
  status: z.enum(['running', 'completed', 'exhausted', 'failed']),
  phase: z.enum(['INITIALIZED', 'INSPECTED', 'FIXED', 'VERIFIED', 'FEEDBACK_READY', 'TERMINATED']),
  maxIterations: z.number().int().min(1),
  state: z.object({
    target: z.string(),
    currentOutput: z.string(),
    iterationCount: z.number().int().min(0),
    testPassed: z.boolean(),
    modelUsed: z.string(),
  }),
  history: z.array(StageNameSchema),
  verification: z
    .object({
      method: z.enum(['token', 'heuristic']),
      passedCount: z.number().int().optional(),
      failedCount: z.number().int().optional(),
    })
    .optional(),
  lastReport: z.string().optional(),
  termination: z.enum(['success', 'exhausted']).optional(),
  failedStage: StageNameSchema.optional(),
  error: z
    .object({
      code: z.string(),
      message: z.string(),
      details: z.string().optional(),
    })
    .optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

/** One JSON checkpoint per session at `<rootDir>/<sessionId>/checkpoint.json` */
export class CheckpointStore {
  constructor(private rootDir: string) {}

  getRootDir(): string {
    return this.rootDir;
  }

  pathFor(sessionId: string): string {
    return path.join(this.rootDir, sessionId, CHECKPOINT_FILE);
  }

  async save(sessionId: string, checkpoint: Checkpoint): Promise<void> {
    const filePath = this.pathFor(sessionId);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    // Write-then-rename so external readers never see a half-written file
    const tmpPath = `${filePath}.tmp`;
    await fs.writeFile(tmpPath, JSON.stringify(checkpoint, null, 2), 'utf-8');
    await fs.rename(tmpPath, filePath);
  }

  /** The session's checkpoint; null when absent, unparseable or not checkpoint-shaped */
  async load(sessionId: string): Promise<Checkpoint | null> {
    let data: string;
    try {
      data = await fs.readFile(this.pathFor(sessionId), 'utf-8');
    } catch {
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch {
      return null;
    }
    const result = CheckpointSchema.safeParse(raw);
    return result.success ? result.data : null;
  }

  async exists(sessionId: string): Promise<boolean> {
    try {
      await fs.access(this.pathFor(sessionId));
      return true;
    } catch {
      return false;
    }
  }
}
