import type { StageAgent, StageRequest } from '../orchestrator/agent-coordinator';
import type { ActionKind, StageName } from '../orchestrator/states';
import type { ChatBackend, CompletionOptions } from '../llm/types';
import { SandboxedWorkspace } from './workspace';
import type { SourceFile, SourceLimits } from './workspace';

export interface BackendAgentOptions {
  client: ChatBackend;
  completion?: CompletionOptions;
  sourceLimits?: SourceLimits;
}

/**
 * Shared plumbing for the backend-driven stage agents: open the target as a
 * sandboxed workspace, read its sources and ask one model for a completion.
 */
export abstract class BackendAgent implements StageAgent {
  abstract readonly stage: StageName;
  abstract readonly action: ActionKind;

  protected client: ChatBackend;
  protected completion: CompletionOptions;
  protected sourceLimits: SourceLimits;

  constructor(options: BackendAgentOptions) {
    this.client = options.client;
    this.completion = options.completion ?? {};
    this.sourceLimits = options.sourceLimits ?? {};
  }

  abstract perform(request: StageRequest): Promise<string>;

  protected workspace(target: string): SandboxedWorkspace {
    return new SandboxedWorkspace(target);
  }

  protected async readSources(workspace: SandboxedWorkspace): Promise<SourceFile[]> {
    return workspace.readSources(this.sourceLimits);
  }

  protected async ask(backend: string, system: string, user: string): Promise<string> {
    const result = await this.client.complete(
      backend,
      [
        { role: 'system', content: system },
        { role: 'user', content: user },
      ],
      this.completion,
    );
    return result.content;
  }
}
