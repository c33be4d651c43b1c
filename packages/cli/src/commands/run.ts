// =============================================================================
// Run Command
// =============================================================================

import chalk from 'chalk';
import { Scheduler, TmuxSession } from '@relayq/engine';
import { cliLogger, getQueueService } from '../context.js';
import { createError } from '../utils/error-handler.js';
import { describeCycleOutcome } from '../utils/format.js';

export interface RunOptions {
  session?: string;
  startCommand?: string;
  cwd?: string;
  once?: boolean;
}

export async function run(options: RunOptions): Promise<void> {
  if (!options.session) {
    throw createError('--session <name> is required');
  }

  const service = getQueueService();
  const session = new TmuxSession({
    sessionName: options.session,
    startCommand: options.startCommand,
    workingDirectory: options.cwd,
    logger: cliLogger,
  });

  const scheduler = new Scheduler({
    store: service.store,
    cache: service.cache,
    backoff: service.backoff,
    session,
    settings: service.settings,
    logger: cliLogger,
    onCycle: (outcome) => console.log(chalk.gray(`[${new Date().toLocaleTimeString()}] ${describeCycleOutcome(outcome)}`)),
  });

  const recovery = await scheduler.initialize();
  if (recovery.recoveredTaskIds.length > 0) {
    console.log(chalk.yellow(`Recovered ${recovery.recoveredTaskIds.length} interrupted task(s)`));
  }

  if (options.once) {
    await scheduler.runCycle();
    return;
  }

  const stop = () => {
    console.log(chalk.yellow('\nStopping after the current step...'));
    scheduler.requestStop();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  console.log(chalk.green(`▶ Processing queue in tmux session "${options.session}" (Ctrl+C to stop)`));
  cliLogger.info(`[CLI] Scheduler running against session ${options.session}`);

  try {
    await scheduler.start();
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
  }
}
