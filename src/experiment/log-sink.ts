import fs from 'node:fs/promises';
import path from 'node:path';
import type { ExperimentLogEntry, LogSink } from './types';

/**
 * Appends one JSON document per line. Writes are chained so that entries land
 * whole and in call order even when callers do not await each other.
 */
export class JsonlLogSink implements LogSink {
  private queue: Promise<void> = Promise.resolve();

  constructor(private filePath: string) {}

  getPath(): string {
    return this.filePath;
  }

  append(entry: ExperimentLogEntry): Promise<void> {
    const line = `${JSON.stringify(entry)}\n`;
    const write = this.queue.then(async () => {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.appendFile(this.filePath, line, 'utf-8');
    });
    // Keep the chain alive after a failed write; the caller still sees the rejection
    this.queue = write.catch(() => undefined);
    return write;
  }

  async readAll(): Promise<ExperimentLogEntry[]> {
    await this.queue;
    let data: string;
    try {
      data = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }

    const entries: ExperimentLogEntry[] = [];
    for (const line of data.split('\n')) {
      if (line.trim() === '') continue;
      const parsed = parseLine(line);
      if (isLogEntry(parsed)) entries.push(parsed);
    }
    return entries;
  }
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

// A line torn by an interrupted append reads as nothing
function parseLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}

function isLogEntry(value: unknown): value is ExperimentLogEntry {
  if (typeof value !== 'object' || value === null) return false;
  const kind: unknown = Reflect.get(value, 'kind');
  const id: unknown = Reflect.get(value, 'id');
  return (kind === 'invocation' || kind === 'session') && typeof id === 'string';
}
