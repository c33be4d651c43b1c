import { Logger, QueueService, loadSchedulerSettings } from '@relayq/engine';

let configPath: string | undefined;
let queueService: QueueService | null = null;

/** Engine log entries go to the log file only; the terminal gets the CLI's own output. */
export const cliLogger = new Logger({ console: false });

/** Record the global `--config` option before any command runs. */
export function configureCli(options: { config?: string }): void {
  configPath = options.config;
  queueService = null;
}

export function getQueueService(): QueueService {
  if (!queueService) {
    queueService = new QueueService({
      settings: loadSchedulerSettings({ configPath, logger: cliLogger }),
      logger: cliLogger,
    });
  }
  return queueService;
}

/** Point the CLI at a prepared service, e.g. one over a temporary queue directory. */
export function useQueueService(service: QueueService | null): void {
  queueService = service;
}
