import fs from 'node:fs/promises';
import crypto from 'crypto';
import { Command } from 'commander';
import { loadConfig } from '../../config/loader';
import type { Config } from '../../config/validator';
import type { DeepPartial } from '../../config/loader';
import { createSession } from '../../session';
import type { SessionResult } from '../../orchestrator/workflow';
import { CLIWorkflowLogger } from '../logger';
import { formatAttempt, formatError, formatInfo, formatSessionResult, formatStep, formatTransition } from '../formatters';
import { validateRunOptions, ValidationError } from '../validators/run';
import type { RunCommandOptions, ValidatedRunOptions } from '../types';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILED = 1;
export const EXIT_EXHAUSTED = 2;

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Run the inspect → fix → verify loop against a directory')
    .option('-t, --target <dir>', 'Directory to inspect and fix')
    .option('--resume <sessionId>', 'Continue a failed or interrupted session from its checkpoint')
    .option('--max-iterations <n>', 'Maximum fix attempts')
    .option('--models <list>', 'Comma-separated backend models, in fallback order')
    .option('--cooldown <ms>', 'Pause before each repeated fix attempt')
    .option('--session-id <id>', 'Session id for a new run (default: random)')
    .option('--strict-logging', 'Abort when the experiment log cannot be written')
    .option('--verbose', 'Show detailed output')
    .action(async (options: RunCommandOptions) => {
      process.exitCode = await executeRunCommand({ ...options, verbose: options.verbose === true || program.opts().verbose === true });
    });
}

/** Runs or resumes one session and returns the process exit code */
export async function executeRunCommand(options: RunCommandOptions): Promise<number> {
  let validated: ValidatedRunOptions;
  let config: Config;
  try {
    validated = validateRunOptions(options);
    config = loadConfig(toOverrides(validated));
    if (!config.backend.api_key) {
      throw new ValidationError('OPENROUTER_API_KEY is not set (environment, .env or codemender.yaml backend.api_key)');
    }
    if (validated.mode === 'new') {
      await assertDirectory(validated.target);
    }
  } catch (err) {
    console.error(formatError(err instanceof Error ? err.message : String(err)));
    return EXIT_FAILED;
  }

  const verbose = validated.verbose;
  const sessionId = validated.mode === 'resume' ? validated.sessionId : (validated.sessionId ?? crypto.randomUUID());
  const engine = createSession({
    config,
    sessionId,
    logger: new CLIWorkflowLogger(sessionId, verbose),
  });

  engine.events.onTransition((event) => console.log(formatTransition(event.from, event.to)));
  engine.events.onAttempt((event) => {
    if (event.outcome !== 'success' || verbose) {
      console.log(formatAttempt(event));
    }
  });

  console.log('');
  if (validated.mode === 'resume') {
    console.log(formatStep(`Resuming session ${sessionId}`));
  } else {
    console.log(formatStep(`Session ${sessionId}`));
    console.log(formatInfo(`target:         ${validated.target}`));
    console.log(formatInfo(`max iterations: ${config.pipeline.max_iterations}`));
  }
  console.log(formatInfo(`models:         ${config.backend.models.join(', ')}`));
  console.log('');

  let result: SessionResult;
  try {
    result = validated.mode === 'resume' ? await engine.resumeSession() : await engine.runSession(validated.target, config.pipeline.max_iterations);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(formatError(`Session failed: ${msg}`));
    console.error(formatInfo(`Resume with: codemender run --resume ${sessionId}`));
    return EXIT_FAILED;
  }

  console.log(formatSessionResult(result, { verbose }));
  return result.status === 'completed' ? EXIT_SUCCESS : EXIT_EXHAUSTED;
}

function toOverrides(options: ValidatedRunOptions): DeepPartial<Config> {
  return {
    backend: { models: options.models },
    pipeline: {
      max_iterations: options.mode === 'new' ? options.maxIterations : undefined,
      cooldown_ms: options.cooldownMs,
    },
    storage: { strict_logging: options.strictLogging ? true : undefined },
  };
}

async function assertDirectory(target: string): Promise<void> {
  let isDirectory = false;
  try {
    isDirectory = (await fs.stat(target)).isDirectory();
  } catch {
    throw new ValidationError(`Target directory not found: ${target}`);
  }
  if (!isDirectory) {
    throw new ValidationError(`Target is not a directory: ${target}`);
  }
}
