import type { ActionKind, StageName } from './states';

/** What a stage agent receives for one attempt against one backend */
export interface StageRequest {
  backend: string;
  target: string;
  currentOutput: string;
}

/**
 * The uniform Stage capability. Inspect, Fix and Verify are three
 * implementations; the engine is written once against this interface.
 */
export interface StageAgent {
  readonly stage: StageName;
  readonly action: ActionKind;
  perform(request: StageRequest): Promise<string>;
}

/**
 * AgentCoordinator manages the mapping between pipeline stages and the agents
 * that perform them. Agents are registered externally (real backend-driven
 * agents in production, lightweight fakes in tests), so the coordinator has
 * no dependency on any particular implementation.
 */
export class AgentCoordinator {
  private agents = new Map<StageName, StageAgent>();

  /** Register the agent for its stage, replacing any previous one */
  registerAgent(agent: StageAgent): void {
    this.agents.set(agent.stage, agent);
  }

  hasAgent(stage: StageName): boolean {
    return this.agents.has(stage);
  }

  /**
   * Look up the agent for a stage.
   * @throws Error if no agent is registered for the stage.
   */
  getAgent(stage: StageName): StageAgent {
    const agent = this.agents.get(stage);
    if (!agent) {
      throw new Error(`No agent registered for stage: ${stage}`);
    }
    return agent;
  }

  /** Run one attempt of a stage against a single backend */
  async perform(stage: StageName, request: StageRequest): Promise<string> {
    return this.getAgent(stage).perform(request);
  }

  getRegisteredStages(): StageName[] {
    return [...this.agents.keys()];
  }
}
