#!/usr/bin/env node
// =============================================================================
// relayq CLI - Main Entry Point
// =============================================================================

import { Command } from 'commander';
import chalk from 'chalk';
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

import { configureCli } from './context.js';
import {
  queueAdd,
  queueClear,
  queueConfigure,
  queueList,
  queuePause,
  queueResume,
  queueRetry,
  queueShow,
  queueSkip,
  queueStatus,
} from './commands/queue.js';
import { backoffReset, backoffStatus, backupsList, backupsRestore, cleanup } from './commands/maintenance.js';
import { run } from './commands/run.js';
import { withErrorHandling } from './utils/error-handler.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function getVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '../package.json'), 'utf-8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // fall through to the built-in version
  }
  return '0.1.0';
}

// =============================================================================
// CLI Setup
// =============================================================================
const program = new Command()
  .name('relayq')
  .description('relayq - run queued tasks one at a time through an interactive agent session')
  .version(getVersion())
  .option('-c, --config <path>', 'Path to the config file (default: ~/.relayq/config.yaml)')
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
    outputError: (str, write) => write(chalk.red(str)),
  })
  .hook('preAction', (thisCommand) => {
    configureCli(thisCommand.opts<{ config?: string }>());
  });

// =============================================================================
// Task Commands
// =============================================================================
program
  .command('add [command]')
  .description('Add a task (the command for custom tasks, or the number for issue/PR tasks)')
  .option('-t, --type <type>', 'Task type: custom, issue_reference, pr_reference', 'custom')
  .option('-d, --description <text>', 'Human-readable description')
  .option('-p, --priority <n>', 'Priority 1 (most urgent) to 10')
  .option('--timeout <seconds>', 'Per-task timeout in seconds')
  .option('--max-retries <n>', 'Retries before the task fails permanently')
  .option('-r, --reference <number>', 'Issue or PR number')
  .option('--clear-context <bool>', 'Override the context reset before this task (true/false)')
  .action(withErrorHandling(queueAdd));

program
  .command('list')
  .alias('ls')
  .description('List tasks in queue order')
  .option('-s, --status <status>', 'Filter by status')
  .option('-t, --type <type>', 'Filter by type')
  .option('--json', 'Output as JSON')
  .action(withErrorHandling(queueList));

program
  .command('show <task-id>')
  .description('Show task details')
  .option('--json', 'Output as JSON')
  .action(withErrorHandling(queueShow));

program
  .command('status')
  .description('Show queue status')
  .option('--json', 'Output as JSON')
  .action(withErrorHandling(queueStatus));

program
  .command('retry <task-id>')
  .description('Return a failed task to the queue with a fresh retry budget')
  .action(withErrorHandling(queueRetry));

program
  .command('skip <task-id>')
  .description('Give up on a pending or running task')
  .action(withErrorHandling(queueSkip));

program
  .command('configure <task-id>')
  .description('Change a task\'s priority, timeout or retry budget')
  .option('-p, --priority <n>', 'Priority 1 (most urgent) to 10')
  .option('--timeout <seconds>', 'Per-task timeout in seconds')
  .option('--max-retries <n>', 'Retries before the task fails permanently')
  .action(withErrorHandling(queueConfigure));

// =============================================================================
// Queue Control
// =============================================================================
program
  .command('pause [reason]')
  .description('Pause the queue')
  .action(withErrorHandling(queuePause));

program
  .command('resume')
  .description('Resume the queue (also ends a usage-limit wait)')
  .action(withErrorHandling(queueResume));

program
  .command('clear')
  .description('Remove every task (a backup is taken first)')
  .option('-y, --yes', 'Skip confirmation')
  .action(withErrorHandling(queueClear));

program
  .command('run')
  .description('Process the queue through a tmux session')
  .requiredOption('-s, --session <name>', 'tmux session running the agent')
  .option('--start-command <command>', 'Command that starts the agent when the session is recreated')
  .option('--cwd <dir>', 'Working directory for a recreated session')
  .option('--once', 'Run a single scheduler cycle and exit')
  .action(withErrorHandling(run));

// =============================================================================
// Maintenance
// =============================================================================
const backupsCmd = program
  .command('backups')
  .description('Queue document backups');

backupsCmd
  .command('list')
  .description('List backups')
  .action(withErrorHandling(backupsList));

backupsCmd
  .command('restore <name>')
  .description('Replace the queue with a backup')
  .option('-y, --yes', 'Skip confirmation')
  .action(withErrorHandling(backupsRestore));

program
  .command('cleanup')
  .description('Prune old backups, completed tasks and stale checkpoints')
  .action(withErrorHandling(cleanup));

const backoffCmd = program
  .command('backoff')
  .description('Usage-limit backoff state');

backoffCmd
  .command('status')
  .description('Show the current wait and occurrence statistics')
  .action(withErrorHandling(backoffStatus));

backoffCmd
  .command('reset')
  .description('Forget occurrence counts and drop the pause marker')
  .action(withErrorHandling(backoffReset));

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
  process.exit(1);
});
