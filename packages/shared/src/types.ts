// =============================================================================
// relayq Shared Types
// =============================================================================
// Core type definitions for the single-session task queue scheduler

// =============================================================================
// Task Lifecycle
// =============================================================================

export type TaskStatus =
  | 'pending'
  | 'in_progress'
  | 'completed'
  | 'failed'
  | 'failed_permanent';

export const TASK_STATUSES: TaskStatus[] = [
  'pending',
  'in_progress',
  'completed',
  'failed',
  'failed_permanent',
];

export const TASK_STATUS_DISPLAY_NAMES: Record<TaskStatus, string> = {
  pending: 'Pending',
  in_progress: 'In Progress',
  completed: 'Completed',
  failed: 'Failed',
  failed_permanent: 'Failed (permanent)',
};

export function isTaskStatus(value: unknown): value is TaskStatus {
  return typeof value === 'string' && TASK_STATUSES.some((status) => status === value);
}

export type TaskType =
  | 'custom'
  | 'issue_reference'
  | 'pr_reference';

export const TASK_TYPES: TaskType[] = ['custom', 'issue_reference', 'pr_reference'];

export function isTaskType(value: unknown): value is TaskType {
  return typeof value === 'string' && TASK_TYPES.some((type) => type === value);
}

export const TASK_PRIORITY_MIN = 1;
export const TASK_PRIORITY_MAX = 10;

export interface Task {
  id: string;
  type: TaskType;
  description: string;
  /** Literal instruction sent to the execution session (custom tasks). */
  command: string;
  /** Issue or PR number for reference tasks. */
  reference?: string;
  status: TaskStatus;
  /** 1 is the most urgent, 10 the least. */
  priority: number;
  timeoutSeconds?: number;
  maxRetries?: number;
  retryCount: number;
  /** ISO timestamp before which a retried task is not picked up again. */
  retryAfter?: string;
  lastError?: string;
  /** Per-task override of the global session reset policy. */
  clearContext?: boolean;
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  completedAt?: string;
}

export interface CreateTaskRequest {
  type?: TaskType;
  description?: string;
  command?: string;
  reference?: string;
  priority?: number;
  timeoutSeconds?: number;
  maxRetries?: number;
  clearContext?: boolean;
  id?: string;
}

export interface ConfigureTaskRequest {
  priority?: number;
  timeoutSeconds?: number;
  maxRetries?: number;
}

// =============================================================================
// Queue Document
// =============================================================================

export const QUEUE_DOCUMENT_VERSION = 1;

export interface QueueStatistics {
  totalProcessed: number;
  totalCompleted: number;
  totalFailed: number;
  totalRetries: number;
  lastProcessedAt: string | null;
}

export const PAUSE_REASONS = {
  manual: 'manual',
  usageLimit: 'usage_limit',
  permanentFailure: 'permanent_failure',
  persistenceError: 'persistence_error',
} as const;

export interface QueueDocument {
  version: number;
  tasks: Task[];
  paused: boolean;
  /** One of PAUSE_REASONS or free text supplied by an operator. */
  pauseReason: string | null;
  pausedAt: string | null;
  lastModified: string;
  statistics: QueueStatistics;
}

export function createEmptyQueueStatistics(): QueueStatistics {
  return {
    totalProcessed: 0,
    totalCompleted: 0,
    totalFailed: 0,
    totalRetries: 0,
    lastProcessedAt: null,
  };
}

export function createEmptyQueueDocument(now: Date = new Date()): QueueDocument {
  return {
    version: QUEUE_DOCUMENT_VERSION,
    tasks: [],
    paused: false,
    pauseReason: null,
    pausedAt: null,
    lastModified: now.toISOString(),
    statistics: createEmptyQueueStatistics(),
  };
}

export type TaskStatusCounts = Record<TaskStatus, number>;

export function createEmptyStatusCounts(): TaskStatusCounts {
  return {
    pending: 0,
    in_progress: 0,
    completed: 0,
    failed: 0,
    failed_permanent: 0,
  };
}

// =============================================================================
// Backoff / Rate Limit State
// =============================================================================

export type DetectionKind = 'time_based' | 'generic';

export interface DetectionResult {
  kind: DetectionKind;
  /** Category key used for per-pattern occurrence counting (e.g. "generic:rate limit"). */
  pattern: string;
  /** The phrase that matched in the session output. */
  matchedText: string;
  /** Time text extracted from a time-based marker, e.g. "3pm" or "09:30". */
  extractedTime?: string;
  /** Absolute resume time for time-based markers (ISO). */
  resumeAt?: string;
  tomorrow?: boolean;
}

export interface BackoffState {
  active: boolean;
  detectedPattern: string;
  occurrenceCount: number;
  taskId: string | null;
  waitSeconds: number;
  pauseStartedAt: string;
  estimatedResumeAt: string;
}

/** On-disk record of an active rate-limit pause. */
export interface PauseMarker {
  pauseTime: string;
  estimatedWaitSeconds: number;
  estimatedResumeTime: string;
  taskId: string | null;
  pattern: string;
  occurrenceCount: number;
  pauseReason: 'usage_limit';
  ownerId: string;
}

export interface Checkpoint {
  taskId: string;
  reason: string;
  checkpointTime: string;
  pattern: string;
  extractedTime?: string;
  waitSeconds: number;
  estimatedResumeTime: string;
  occurrenceCount: number;
}

export interface BackoffStatistics {
  active: boolean;
  totalOccurrences: number;
  uniquePatterns: number;
  lastOccurrenceAt: string | null;
  pauseStartedAt: string | null;
  estimatedResumeAt: string | null;
  configuration: BackoffSettings;
}

// =============================================================================
// Scheduler Settings
// =============================================================================

export interface BackoffSettings {
  cooldownSeconds: number;
  factor: number;
  maxWaitSeconds: number;
  minWaitSeconds: number;
  minTimedWaitSeconds: number;
}

export interface SchedulerSettings {
  queueDir: string;
  defaultTimeoutSeconds: number;
  maxRetries: number;
  retryDelaySeconds: number;
  maxRetryDelaySeconds: number;
  defaultPriority: number;
  completionPattern: string;
  pollIntervalSeconds: number;
  cycleDelaySeconds: number;
  idleDelaySeconds: number;
  clearContextBetweenTasks: boolean;
  clearContextCommand: string;
  autoPauseOnPermanentFailure: boolean;
  backupRetentionDays: number;
  completedTaskRetentionDays: number;
  writeRetries: number;
  leaseTtlSeconds: number;
  backoff: BackoffSettings;
}

export const DEFAULT_BACKOFF_SETTINGS: BackoffSettings = {
  cooldownSeconds: 300,
  factor: 1.5,
  maxWaitSeconds: 1800,
  minWaitSeconds: 60,
  minTimedWaitSeconds: 60,
};

/** Defaults without a queue directory; the engine resolves that from the home dir. */
export const DEFAULT_SCHEDULER_SETTINGS: Omit<SchedulerSettings, 'queueDir'> = {
  defaultTimeoutSeconds: 3600,
  maxRetries: 3,
  retryDelaySeconds: 300,
  maxRetryDelaySeconds: 1800,
  defaultPriority: 5,
  completionPattern: '###TASK_COMPLETE###',
  pollIntervalSeconds: 5,
  cycleDelaySeconds: 30,
  idleDelaySeconds: 60,
  clearContextBetweenTasks: true,
  clearContextCommand: '/clear',
  autoPauseOnPermanentFailure: true,
  backupRetentionDays: 30,
  completedTaskRetentionDays: 7,
  writeRetries: 3,
  leaseTtlSeconds: 120,
  backoff: DEFAULT_BACKOFF_SETTINGS,
};

// =============================================================================
// Outcomes
// =============================================================================

export type CompletionResult =
  | { status: 'completed'; elapsedMs: number; output: string }
  | { status: 'timed_out'; elapsedMs: number; output: string }
  | { status: 'unavailable'; elapsedMs: number; output: string; detection: DetectionResult }
  | { status: 'stopped'; elapsedMs: number; output: string };

export type FailureOutcome =
  | { outcome: 'retried'; taskId: string; retryCount: number; delaySeconds: number; retryAfter: string }
  | { outcome: 'permanently_failed'; taskId: string; retryCount: number; queuePaused: boolean };

export type CycleOutcome =
  | { kind: 'paused'; reason: string | null; resumeAt: string | null }
  | { kind: 'resumed' }
  | { kind: 'idle' }
  | { kind: 'completed'; taskId: string }
  | { kind: 'rate_limited'; taskId: string; waitSeconds: number; resumeAt: string }
  | { kind: 'failed'; taskId: string; failure: FailureOutcome }
  | { kind: 'conflict'; taskId: string }
  | { kind: 'busy'; taskId: string; runningTaskId: string }
  | { kind: 'stopped'; taskId: string | null }
  | { kind: 'error'; message: string };

// =============================================================================
// Status Reporting
// =============================================================================

export type QueueHealth = 'healthy' | 'paused' | 'degraded';

export interface QueueStatus {
  paused: boolean;
  pauseReason: string | null;
  pausedAt: string | null;
  counts: TaskStatusCounts;
  total: number;
  currentTaskId: string | null;
  nextTaskId: string | null;
  backoff: BackoffState | null;
  statistics: QueueStatistics;
  health: QueueHealth;
  lastModified: string;
}

export interface BackupInfo {
  name: string;
  path: string;
  createdAt: string;
  sizeBytes: number;
}

export interface CleanupReport {
  removedBackups: number;
  removedCompletedTasks: number;
  removedCheckpoints: number;
}
