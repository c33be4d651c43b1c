export * from './backoff-controller.js';
export * from './backoff-markers.js';
export * from './cleanup-service.js';
export * from './completion-monitor.js';
export * from './errors.js';
export * from './execution-lease-service.js';
export * from './execution-session.js';
export * from './logger.js';
export * from './queue-cache.js';
export * from './queue-service.js';
export * from './queue-storage.js';
export * from './queue-store.js';
export * from './relayq-home.js';
export * from './retry-handler.js';
export * from './scheduler.js';
export * from './settings-service.js';
export * from './startup-recovery.js';
export * from './state-transition.js';
export * from './task-validation.js';
export * from './task-variants.js';
export * from './tmux-session.js';
export * from './usage-limit-detector.js';
export * from './with-timeout.js';
