import fs from 'node:fs/promises';
import path from 'node:path';
import { CheckpointStore } from '../../../src/orchestrator/state-store';
import { initialState } from '../../../src/orchestrator/states';
import type { Checkpoint } from '../../../src/orchestrator/states';
import { AgentCoordinator } from '../../../src/orchestrator/agent-coordinator';
import { ModelFallbackPolicy } from '../../../src/orchestrator/fallback-policy';
import { SessionNotFoundError } from '../../../src/orchestrator/errors';
import { silentLogger } from '../../../src/orchestrator/logger';
import { WorkflowEngine } from '../../../src/orchestrator/workflow';
import { HistoryStore } from '../../../src/cli/history-store';
import { fakeAgent, makeTempDir, MemoryLogSink, removeDir } from '../../helpers/fakes';

function checkpoint(sessionId: string): Checkpoint {
  return {
    sessionId,
    status: 'running',
    phase: 'INSPECTED',
    maxIterations: 3,
    state: { ...initialState('./sandbox'), currentOutput: 'plan', modelUsed: 'm1' },
    history: ['INSPECT'],
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:01.000Z',
  };
}

describe('CheckpointStore', () => {
  let rootDir: string;
  let store: CheckpointStore;

  beforeEach(async () => {
    rootDir = await makeTempDir();
    store = new CheckpointStore(rootDir);
  });

  afterEach(async () => {
    await removeDir(rootDir);
  });

  it('should save under <root>/<sessionId>/checkpoint.json and load it back', async () => {
    await store.save('s-1', checkpoint('s-1'));

    expect(store.pathFor('s-1')).toBe(path.join(rootDir, 's-1', 'checkpoint.json'));
    expect(await store.load('s-1')).toEqual(checkpoint('s-1'));
    expect(await fs.readdir(path.join(rootDir, 's-1'))).toEqual(['checkpoint.json']);
  });

  it('should overwrite the previous checkpoint', async () => {
    await store.save('s-1', checkpoint('s-1'));
    await store.save('s-1', { ...checkpoint('s-1'), phase: 'FIXED', history: ['INSPECT', 'FIX'] });

    expect((await store.load('s-1'))?.phase).toBe('FIXED');
  });

  it('should return null for a missing session', async () => {
    expect(await store.load('missing')).toBeNull();
    expect(await store.exists('missing')).toBe(false);
  });

  it('should return null for an unreadable checkpoint', async () => {
    await fs.mkdir(path.join(rootDir, 'broken'), { recursive: true });
    await fs.writeFile(path.join(rootDir, 'broken', 'checkpoint.json'), '{ not json', 'utf-8');

    expect(await store.load('broken')).toBeNull();
    expect(await store.exists('broken')).toBe(true);
  });

  it.each([
    ['an empty object', {}],
    ['a state without an iteration count', { ...checkpoint('s-1'), state: { target: './sandbox', currentOutput: '', testPassed: false, modelUsed: '' } }],
    ['a non-numeric iteration count', { ...checkpoint('s-1'), state: { ...checkpoint('s-1').state, iterationCount: '2' } }],
    ['an unknown phase', { ...checkpoint('s-1'), phase: 'DONE' }],
    ['a zero iteration bound', { ...checkpoint('s-1'), maxIterations: 0 }],
  ])('should return null for %s', async (_label, content) => {
    await fs.mkdir(path.join(rootDir, 'bad'), { recursive: true });
    await fs.writeFile(path.join(rootDir, 'bad', 'checkpoint.json'), JSON.stringify(content), 'utf-8');

    expect(await store.load('bad')).toBeNull();
  });

  it('should refuse to resume from a checkpoint that fails validation', async () => {
    const { state, ...rest } = checkpoint('s-1');
    await fs.mkdir(path.join(rootDir, 's-1'), { recursive: true });
    await fs.writeFile(path.join(rootDir, 's-1', 'checkpoint.json'), JSON.stringify({ ...rest, state: { ...state, iterationCount: null } }), 'utf-8');
    const fix = fakeAgent('FIX');
    const coordinator = new AgentCoordinator();
    coordinator.registerAgent(fakeAgent('INSPECT'));
    coordinator.registerAgent(fix);
    coordinator.registerAgent(fakeAgent('VERIFY'));
    const engine = new WorkflowEngine({
      coordinator,
      policy: new ModelFallbackPolicy(['m1']),
      sessionId: 's-1',
      checkpointStore: store,
      logSink: new MemoryLogSink(),
      logger: silentLogger,
      cooldownMs: 0,
    });

    await expect(engine.resumeSession()).rejects.toBeInstanceOf(SessionNotFoundError);
    expect(fix.perform).not.toHaveBeenCalled();
  });

  it('should keep session history listing past a malformed checkpoint', async () => {
    await store.save('s-1', checkpoint('s-1'));
    await fs.mkdir(path.join(rootDir, 'stray'), { recursive: true });
    await fs.writeFile(path.join(rootDir, 'stray', 'checkpoint.json'), '{}', 'utf-8');

    const entries = await new HistoryStore({ rootDir }).list();

    expect(entries.map((e) => e.sessionId)).toEqual(['s-1']);
  });
});
