import type { RunCommandOptions, ValidatedRunOptions } from '../types';
import type { SessionStatus } from '../../orchestrator/states';
import { SESSION_STATUSES } from '../types';

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

const SESSION_ID_PATTERN = /^[\w.-]+$/;

/**
 * Validate `run` command options
 *
 * @throws {ValidationError} If validation fails
 */
export function validateRunOptions(options: RunCommandOptions): ValidatedRunOptions {
  const common = {
    models: options.models !== undefined ? parseModels(options.models) : undefined,
    cooldownMs: options.cooldown !== undefined ? parseInteger('--cooldown', options.cooldown, 0) : undefined,
    strictLogging: options.strictLogging === true,
    verbose: options.verbose === true,
  };

  if (options.resume !== undefined) {
    if (options.target !== undefined) {
      throw new ValidationError('--resume cannot be combined with --target; the session keeps its original target');
    }
    if (options.maxIterations !== undefined) {
      throw new ValidationError('--resume cannot be combined with --max-iterations; the session keeps its original bound');
    }
    return { mode: 'resume', sessionId: validateSessionId(options.resume), ...common };
  }

  if (options.target === undefined || options.target.trim() === '') {
    throw new ValidationError('Either --target <dir> or --resume <sessionId> is required');
  }

  return {
    mode: 'new',
    target: options.target.trim(),
    sessionId: options.sessionId !== undefined ? validateSessionId(options.sessionId) : undefined,
    maxIterations: options.maxIterations !== undefined ? parseInteger('--max-iterations', options.maxIterations, 1) : undefined,
    ...common,
  };
}

/** Session ids name checkpoint directories, so path separators are refused */
export function validateSessionId(input: string): string {
  const id = input.trim();
  if (!SESSION_ID_PATTERN.test(id) || id === '.' || id === '..') {
    throw new ValidationError(`Invalid session id: "${input}"`);
  }
  return id;
}

export function parseStatus(input: string | undefined): SessionStatus | undefined {
  if (input === undefined) return undefined;
  const status = SESSION_STATUSES.find((s) => s === input);
  if (!status) {
    throw new ValidationError(`Invalid status "${input}". Expected one of: ${SESSION_STATUSES.join(', ')}`);
  }
  return status;
}

export function parseInteger(flag: string, input: string, min: number): number {
  const trimmed = input.trim();
  const value = Number(trimmed);
  if (trimmed === '' || !Number.isInteger(value) || value < min) {
    throw new ValidationError(`${flag} must be an integer >= ${min}, got "${input}"`);
  }
  return value;
}

function parseModels(input: string): string[] {
  const models = input
    .split(',')
    .map((m) => m.trim())
    .filter(Boolean);
  if (models.length === 0) {
    throw new ValidationError('--models must name at least one model');
  }
  return models;
}
