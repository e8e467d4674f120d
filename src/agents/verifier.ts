import type { StageRequest } from '../orchestrator/agent-coordinator';
import { BackendAgent } from './base-agent';
import { ContextBuilder } from './context-builder';
import { VERIFY_SYSTEM_PROMPT, getVerifyPrompt } from './prompts/verify';

/**
 * Judges the fixed sources. The report is returned verbatim; the engine's
 * verdict classifier decides pass or fail from it.
 */
export class VerifierAgent extends BackendAgent {
  readonly stage = 'VERIFY' as const;
  readonly action = 'TEST' as const;

  async perform(request: StageRequest): Promise<string> {
    const workspace = this.workspace(request.target);
    const files = await this.readSources(workspace);
    const context = ContextBuilder.build(request.target, files, 'FIX SUMMARY', request.currentOutput);
    return this.ask(request.backend, VERIFY_SYSTEM_PROMPT, getVerifyPrompt(context));
  }
}
