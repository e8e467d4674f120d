import fs from 'node:fs/promises';
import path from 'node:path';
import { InspectorAgent } from '../../../src/agents/inspector';
import { VerifierAgent } from '../../../src/agents/verifier';
import { INSPECT_SYSTEM_PROMPT } from '../../../src/agents/prompts/inspect';
import { VERIFY_SYSTEM_PROMPT } from '../../../src/agents/prompts/verify';
import type { ChatMessage, CompletionOptions, CompletionResult } from '../../../src/llm/types';
import { makeTempDir, removeDir } from '../../helpers/fakes';

describe('stage agents', () => {
  let root: string;
  const complete = jest.fn<Promise<CompletionResult>, [string, ChatMessage[], CompletionOptions?]>();

  beforeEach(async () => {
    root = await makeTempDir();
    await fs.writeFile(path.join(root, 'cart.py'), 'def total(items):\n    return sum(items)\n', 'utf8');
  });

  afterEach(async () => {
    await removeDir(root);
  });

  describe('InspectorAgent', () => {
    it('should declare the Inspect stage and the analysis action', () => {
      const agent = new InspectorAgent({ client: { complete } });

      expect(agent.stage).toBe('INSPECT');
      expect(agent.action).toBe('ANALYSIS');
    });

    it('should return the plan the backend wrote', async () => {
      complete.mockResolvedValueOnce({ content: 'Refactoring Instructions for cart.py:', model: 'm1' });

      const plan = await new InspectorAgent({ client: { complete } }).perform({ backend: 'm1', target: root, currentOutput: '' });

      expect(plan).toBe('Refactoring Instructions for cart.py:');
      const call = complete.mock.calls[0];
      const messages = call?.[1];
      expect(call?.[0]).toBe('m1');
      expect(messages?.[0]).toEqual({ role: 'system', content: INSPECT_SYSTEM_PROMPT });
      expect(messages?.[1]?.content).toBe(
        `Analyze the following code and produce refactoring plans.\n\nTARGET DIRECTORY: ${root}\n\nSOURCE CODE:\n--- FILE: cart.py ---\ndef total(items):\n    return sum(items)\n\n--- END FILE ---`,
      );
    });

    it('should apply the configured source limits', async () => {
      complete.mockResolvedValueOnce({ content: 'plan', model: 'm1' });

      await new InspectorAgent({ client: { complete }, sourceLimits: { extensions: ['.ts'] } }).perform({ backend: 'm1', target: root, currentOutput: '' });

      expect(complete.mock.calls[0]?.[1][1]?.content).toContain('(No source files were found in the target directory.)');
    });
  });

  describe('VerifierAgent', () => {
    it('should declare the Verify stage and the test action', () => {
      const agent = new VerifierAgent({ client: { complete } });

      expect(agent.stage).toBe('VERIFY');
      expect(agent.action).toBe('TEST');
    });

    it('should return the report verbatim with the fix summary in the prompt', async () => {
      complete.mockResolvedValueOnce({ content: 'TESTS FAILED: 0 passed, 1 failed\nVERDICT: FAIL', model: 'm2' });

      const report = await new VerifierAgent({ client: { complete } }).perform({ backend: 'm2', target: root, currentOutput: 'FIX SUMMARY: none\nFiles written:\n- cart.py' });

      expect(report).toBe('TESTS FAILED: 0 passed, 1 failed\nVERDICT: FAIL');
      const messages = complete.mock.calls[0]?.[1];
      expect(messages?.[0]).toEqual({ role: 'system', content: VERIFY_SYSTEM_PROMPT });
      expect(messages?.[1]?.content).toContain('FIX SUMMARY:\nFIX SUMMARY: none\nFiles written:\n- cart.py');
    });
  });
});
