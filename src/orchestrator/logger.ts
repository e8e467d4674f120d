/** Logger interface for workflow observability */
export interface WorkflowLogger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

/** Default console-based logger with session-id prefix */
export class ConsoleWorkflowLogger implements WorkflowLogger {
  private prefix: string;

  constructor(sessionId?: string) {
    this.prefix = sessionId ? `[mender:${sessionId.slice(0, 8)}]` : '[mender]';
  }

  info(message: string, data?: Record<string, unknown>): void {
    console.log(this.format('INFO', message, data));
  }

  warn(message: string, data?: Record<string, unknown>): void {
    console.warn(this.format('WARN', message, data));
  }

  error(message: string, data?: Record<string, unknown>): void {
    console.error(this.format('ERROR', message, data));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    console.debug(this.format('DEBUG', message, data));
  }

  private format(level: string, message: string, data?: Record<string, unknown>): string {
    const base = `${this.prefix} ${level.padEnd(5)} ${message}`;
    return data ? `${base} ${JSON.stringify(data)}` : base;
  }
}

/** Discards everything */
export const silentLogger: WorkflowLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};
