import fs from 'node:fs/promises';
import path from 'node:path';
import { SandboxedWorkspace, SandboxViolationError } from '../../../src/agents/workspace';
import { ContextBuilder } from '../../../src/agents/context-builder';
import { makeTempDir, removeDir } from '../../helpers/fakes';

async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const absolute = path.join(root, rel);
    await fs.mkdir(path.dirname(absolute), { recursive: true });
    await fs.writeFile(absolute, content, 'utf8');
  }
}

describe('SandboxedWorkspace', () => {
  let root: string;
  let workspace: SandboxedWorkspace;

  beforeEach(async () => {
    root = await makeTempDir();
    workspace = new SandboxedWorkspace(root);
  });

  afterEach(async () => {
    await removeDir(root);
  });

  describe('resolve', () => {
    it('should resolve paths inside the root', () => {
      expect(workspace.resolve('pkg/calc.py')).toBe(path.join(root, 'pkg', 'calc.py'));
      expect(workspace.resolve('pkg/../calc.py')).toBe(path.join(root, 'calc.py'));
    });

    it.each(['../outside.py', 'pkg/../../outside.py', '/etc/passwd', '', '.'])('should refuse %p', (requested) => {
      expect(() => workspace.resolve(requested)).toThrow(SandboxViolationError);
    });

    it('should name the path and the root in the error', () => {
      const error = (() => {
        try {
          workspace.resolve('../x.py');
        } catch (e) {
          return e;
        }
        return undefined;
      })();

      expect(error).toMatchObject({ code: 'SANDBOX_VIOLATION', requestedPath: '../x.py', message: `Path escapes the workspace: ../x.py (root: ${path.resolve(root)})` });
    });
  });

  describe('listSources', () => {
    it('should list source files sorted and skip vendored directories', async () => {
      await writeTree(root, {
        'main.py': 'print(1)',
        'lib/util.ts': 'export {}',
        'README.md': '# readme',
        'node_modules/dep/index.js': '',
        '__pycache__/main.cpython.py': '',
        '.codemender/s-1/checkpoint.json': '{}',
      });

      expect(await workspace.listSources()).toEqual(['lib/util.ts', 'main.py']);
    });

    it('should honour custom extensions', async () => {
      await writeTree(root, { 'a.py': '', 'b.rb': '' });

      expect(await workspace.listSources(['.rb'])).toEqual(['b.rb']);
    });
  });

  describe('readSources', () => {
    it('should read contents and cap the file count', async () => {
      await writeTree(root, { 'a.py': 'A', 'b.py': 'B', 'c.py': 'C' });

      expect(await workspace.readSources({ maxFiles: 2 })).toEqual([
        { filePath: 'a.py', content: 'A' },
        { filePath: 'b.py', content: 'B' },
      ]);
    });

    it('should skip files over the size limit', async () => {
      await writeTree(root, { 'big.py': 'x'.repeat(100), 'small.py': 'ok' });

      expect(await workspace.readSources({ maxFileBytes: 10 })).toEqual([{ filePath: 'small.py', content: 'ok' }]);
    });
  });

  describe('writeFile', () => {
    it('should create parent directories and return the normalized path', async () => {
      const written = await workspace.writeFile('./pkg/new/mod.py', 'x = 1\n');

      expect(written).toBe('pkg/new/mod.py');
      expect(await workspace.readFile('pkg/new/mod.py')).toBe('x = 1\n');
    });

    it('should refuse to write outside the root', async () => {
      await expect(workspace.writeFile('../escape.py', 'x')).rejects.toThrow(SandboxViolationError);
      await expect(fs.access(path.join(root, '..', 'escape.py'))).rejects.toThrow();
    });
  });
});

describe('ContextBuilder', () => {
  it('should frame each source file', () => {
    expect(ContextBuilder.sources([{ filePath: 'a.py', content: 'A' }, { filePath: 'b.py', content: 'B' }])).toBe(
      '--- FILE: a.py ---\nA\n--- END FILE ---\n\n--- FILE: b.py ---\nB\n--- END FILE ---',
    );
  });

  it('should state that no sources were found', () => {
    expect(ContextBuilder.sources([])).toBe('(No source files were found in the target directory.)');
  });

  it('should append the previous output under its heading', () => {
    expect(ContextBuilder.build('./sandbox', [], 'NOTES', '  plan  ')).toBe(
      'TARGET DIRECTORY: ./sandbox\n\nSOURCE CODE:\n(No source files were found in the target directory.)\n\nNOTES:\nplan',
    );
  });

  it('should leave out an empty previous output', () => {
    expect(ContextBuilder.build('./sandbox', [], 'NOTES', '   ')).toBe('TARGET DIRECTORY: ./sandbox\n\nSOURCE CODE:\n(No source files were found in the target directory.)');
  });
});
