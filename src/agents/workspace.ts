import fs from 'node:fs/promises';
import path from 'node:path';

export class SandboxViolationError extends Error {
  public readonly code = 'SANDBOX_VIOLATION';

  constructor(
    public readonly requestedPath: string,
    public readonly root: string,
  ) {
    super(`Path escapes the workspace: ${requestedPath} (root: ${root})`);
    this.name = 'SandboxViolationError';
  }
}

export interface SourceFile {
  /** Path relative to the workspace root, always with forward slashes */
  filePath: string;
  content: string;
}

export interface SourceLimits {
  /** Extensions treated as source (default: DEFAULT_SOURCE_EXTENSIONS) */
  extensions?: readonly string[];
  maxFiles?: number;
  /** Files larger than this are skipped */
  maxFileBytes?: number;
}

export const DEFAULT_SOURCE_EXTENSIONS: readonly string[] = ['.py', '.ts', '.js', '.mjs', '.cjs', '.tsx', '.jsx'];
export const DEFAULT_MAX_FILES = 20;
export const DEFAULT_MAX_FILE_BYTES = 64 * 1024;

const SKIPPED_DIRS = new Set(['node_modules', '.git', '__pycache__', 'dist', 'build', '.codemender', '.venv', 'venv']);

/**
 * File access confined to one target directory. Every read and write is
 * resolved against the root; anything resolving outside it is refused.
 */
export class SandboxedWorkspace {
  private root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  getRoot(): string {
    return this.root;
  }

  /** Absolute path for `relPath`, or SandboxViolationError */
  resolve(relPath: string): string {
    const resolved = path.resolve(this.root, relPath);
    const relative = path.relative(this.root, resolved);
    if (relative === '' || relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new SandboxViolationError(relPath, this.root);
    }
    return resolved;
  }

  /** Source files under the root, sorted, skipping vendored and build dirs */
  async listSources(extensions: readonly string[] = DEFAULT_SOURCE_EXTENSIONS): Promise<string[]> {
    const found: string[] = [];
    await this.walk(this.root, extensions, found);
    return found.sort();
  }

  async readSources(limits: SourceLimits = {}): Promise<SourceFile[]> {
    const maxFiles = limits.maxFiles ?? DEFAULT_MAX_FILES;
    const maxFileBytes = limits.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES;
    const files = await this.listSources(limits.extensions);

    const sources: SourceFile[] = [];
    for (const filePath of files) {
      if (sources.length >= maxFiles) break;
      const absolute = this.resolve(filePath);
      const stat = await fs.stat(absolute);
      if (stat.size > maxFileBytes) continue;
      sources.push({ filePath, content: await fs.readFile(absolute, 'utf8') });
    }
    return sources;
  }

  async readFile(relPath: string): Promise<string> {
    return fs.readFile(this.resolve(relPath), 'utf8');
  }

  /** Write `content`, creating parent directories; returns the normalized relative path */
  async writeFile(relPath: string, content: string): Promise<string> {
    const absolute = this.resolve(relPath);
    await fs.mkdir(path.dirname(absolute), { recursive: true });
    await fs.writeFile(absolute, content, 'utf8');
    return toPosix(path.relative(this.root, absolute));
  }

  private async walk(dir: string, extensions: readonly string[], found: string[]): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const absolute = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!SKIPPED_DIRS.has(entry.name)) {
          await this.walk(absolute, extensions, found);
        }
      } else if (entry.isFile() && extensions.includes(path.extname(entry.name))) {
        found.push(toPosix(path.relative(this.root, absolute)));
      }
    }
  }
}

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}
