import { Command } from 'commander';
import { loadConfig } from '../../config/loader';
import { HistoryStore } from '../history-store';
import { formatCheckpoint, formatError, formatInfo, formatSuccess } from '../formatters';
import { parseInteger, parseStatus, validateSessionId } from '../validators/run';
import type { HistoryCommandOptions } from '../types';

async function showDetail(store: HistoryStore, sessionId: string, json: boolean | undefined): Promise<void> {
  const checkpoint = await store.load(validateSessionId(sessionId));
  if (!checkpoint) {
    console.log(formatInfo(`No history found for session: ${sessionId}`));
    return;
  }

  if (json) {
    console.log(JSON.stringify(checkpoint, null, 2));
    return;
  }

  console.log(formatSuccess('Session details'));
  for (const line of formatCheckpoint(checkpoint)) {
    console.log(line);
  }
  console.log(formatInfo(`stages: ${checkpoint.history.join(' → ') || '(none)'}`));
  if (checkpoint.lastReport) {
    console.log(formatInfo(`last report:\n${checkpoint.lastReport}`));
  }
}

async function showList(store: HistoryStore, options: HistoryCommandOptions): Promise<void> {
  const entries = await store.list({
    status: parseStatus(options.status),
    target: options.target,
    limit: options.limit !== undefined ? parseInteger('--limit', options.limit, 1) : undefined,
  });

  if (options.json) {
    console.log(JSON.stringify(entries, null, 2));
    return;
  }

  if (!entries.length) {
    console.log(formatInfo('No history entries found.'));
    return;
  }

  console.log(formatSuccess('Session history'));
  for (const e of entries) {
    const verdict = e.testPassed ? 'passed' : 'not passed';
    console.log(formatInfo(`${e.updatedAt} ${e.sessionId} ${e.target} ${e.status} iterations=${e.iterationCount} ${verdict}`));
  }
}

export function registerHistoryCommand(program: Command): void {
  program
    .command('history')
    .description('List past sessions')
    .option('--session-id <id>', 'Show detailed view for a specific session')
    .option('--status <status>', 'Filter by session status (running, completed, exhausted, failed)')
    .option('--target <dir>', 'Filter by target directory')
    .option('--limit <n>', 'Limit number of results')
    .option('--json', 'Output as JSON', false)
    .action(async (options: HistoryCommandOptions) => {
      try {
        const config = loadConfig();
        const store = new HistoryStore({ rootDir: config.storage.root_dir });

        if (options.sessionId) {
          await showDetail(store, options.sessionId, options.json);
          return;
        }

        await showList(store, options);
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        console.error(formatError(msg));
        process.exitCode = 1;
      }
    });
}
