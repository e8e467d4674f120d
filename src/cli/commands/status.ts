import { Command } from 'commander';
import { loadConfig } from '../../config/loader';
import type { Checkpoint } from '../../orchestrator/states';
import { HistoryStore } from '../history-store';
import { formatCheckpoint, formatError, formatInfo, formatSuccess } from '../formatters';
import { validateSessionId } from '../validators/run';

type StatusCommandOptions = {
  sessionId?: string;
  json?: boolean;
};

async function resolveCheckpoint(store: HistoryStore, sessionId?: string): Promise<Checkpoint | null> {
  if (sessionId) {
    return store.load(validateSessionId(sessionId));
  }
  return store.latest();
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show the state of the latest (or a given) session')
    .option('--session-id <id>', 'Show status for a specific session')
    .option('--json', 'Output status as JSON', false)
    .action(async (options: StatusCommandOptions) => {
      try {
        const config = loadConfig();
        const store = new HistoryStore({ rootDir: config.storage.root_dir });

        const checkpoint = await resolveCheckpoint(store, options.sessionId);

        if (!checkpoint) {
          const msg = options.sessionId ? `No readable checkpoint found for session: ${options.sessionId}` : 'No sessions found.';
          console.log(formatInfo(msg));
          return;
        }

        if (options.json) {
          console.log(JSON.stringify(checkpoint, null, 2));
          return;
        }

        console.log(formatSuccess('Session status'));
        for (const line of formatCheckpoint(checkpoint)) {
          console.log(line);
        }
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        console.error(formatError(msg));
        process.exitCode = 1;
      }
    });
}
