import type { StageRequest } from '../orchestrator/agent-coordinator';
import { BackendAgent } from './base-agent';
import { ContextBuilder } from './context-builder';
import { INSPECT_SYSTEM_PROMPT, getInspectPrompt } from './prompts/inspect';

/** Reads the target's sources and returns a refactoring plan */
export class InspectorAgent extends BackendAgent {
  readonly stage = 'INSPECT' as const;
  readonly action = 'ANALYSIS' as const;

  async perform(request: StageRequest): Promise<string> {
    const workspace = this.workspace(request.target);
    const files = await this.readSources(workspace);
    const context = ContextBuilder.build(request.target, files, 'NOTES', request.currentOutput);
    return this.ask(request.backend, INSPECT_SYSTEM_PROMPT, getInspectPrompt(context));
  }
}
