import { EventEmitter } from 'events';
import type { SessionPhase, StageName } from './states';
import type { FailureSeverity } from './fallback-policy';

export interface PhaseChangeEvent {
  from: SessionPhase;
  to: SessionPhase;
  sessionId: string;
  timestamp: string;
}

export interface AttemptEvent {
  stage: StageName;
  backend: string;
  outcome: 'success' | FailureSeverity;
  message?: string;
}

export class WorkflowEvents extends EventEmitter {
  emitTransition(event: PhaseChangeEvent): void {
    this.emit('transition', event);
  }

  emitAttempt(event: AttemptEvent): void {
    this.emit('attempt', event);
  }

  onTransition(listener: (event: PhaseChangeEvent) => void): this {
    return this.on('transition', listener);
  }

  onAttempt(listener: (event: AttemptEvent) => void): this {
    return this.on('attempt', listener);
  }
}
