// =============================================================================
// relayq CLI - Public API
// =============================================================================

export { configureCli, getQueueService, useQueueService } from './context.js';
export { parseAddOptions, parseConfigureOptions, parseListOptions } from './commands/queue.js';
export { CLIError, createError, exitCodeFor, handleError } from './utils/error-handler.js';
