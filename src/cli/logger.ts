import type { WorkflowLogger } from '../orchestrator/logger';
import { formatError, formatInfo, formatWarning } from './formatters';

/** Terminal logger: info and debug only in verbose mode, warnings and errors always */
export class CLIWorkflowLogger implements WorkflowLogger {
  constructor(
    private sessionId: string,
    private verbose: boolean,
  ) {}

  info(message: string, data?: Record<string, unknown>): void {
    if (this.verbose) {
      console.log(formatInfo(`[${this.sessionId.slice(0, 8)}] ${message}${suffix(data)}`));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    console.warn(formatWarning(`WARN: ${message}${suffix(data)}`));
  }

  error(message: string, data?: Record<string, unknown>): void {
    console.error(formatError(`${message}${suffix(data)}`));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.verbose) {
      console.log(formatInfo(`DEBUG: ${message}${suffix(data)}`));
    }
  }
}

function suffix(data?: Record<string, unknown>): string {
  return data ? ` ${JSON.stringify(data)}` : '';
}
