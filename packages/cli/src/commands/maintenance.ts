// =============================================================================
// Maintenance Commands
// =============================================================================

import chalk from 'chalk';
import * as clack from '@clack/prompts';
import { getQueueService } from '../context.js';
import { createError } from '../utils/error-handler.js';
import { printBackups, renderBackoffState, renderBackoffStatistics, renderCleanupReport } from '../utils/format.js';

export async function backupsList(): Promise<void> {
  printBackups(await getQueueService().listBackups());
}

export async function backupsRestore(name: string, options: { yes?: boolean }): Promise<void> {
  const service = getQueueService();
  const backups = await service.listBackups();
  if (!backups.some((backup) => backup.name === name)) {
    throw createError(`Backup not found: ${name}`, 2);
  }

  if (!options.yes) {
    const confirmed = await clack.confirm({
      message: `Replace the current queue with ${name}? The current state is backed up first.`,
    });
    if (clack.isCancel(confirmed) || !confirmed) {
      console.log(chalk.gray('Cancelled'));
      return;
    }
  }

  const document = await service.restoreBackup(name);
  console.log(chalk.green(`✓ Restored ${document.tasks.length} task(s) from ${name}`));
}

export async function cleanup(): Promise<void> {
  const spinner = clack.spinner();
  spinner.start('Cleaning up...');
  const report = await getQueueService().runCleanup();
  spinner.stop('Cleanup finished');
  console.log(chalk.green(`✓ ${renderCleanupReport(report)}`));
}

export async function backoffStatus(): Promise<void> {
  const { state, statistics } = await getQueueService().getBackoffStatus();
  if (state) {
    console.log(`${chalk.bold('Current wait:')} ${renderBackoffState(state)}`);
  }
  console.log(renderBackoffStatistics(statistics));
}

export async function backoffReset(): Promise<void> {
  await getQueueService().resetBackoff();
  console.log(chalk.green('✓ Usage-limit statistics reset'));
}
