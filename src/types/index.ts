import { z } from 'zod';

// ============================================================
// Configuration Schema
// ============================================================

export const ConfigSchema = z.object({
  monitor: z.object({
    minIntervalSeconds: z.number().int().min(1),
    tickSeconds: z.number().int().min(1).max(3600),
    concurrency: z.number().int().min(1).max(64),
    degradedThreshold: z.number().int().min(0),
    dedupScope: z.enum(['global', 'task']),
  }),
  fetch: z.object({
    timeoutMs: z.number().int().min(100),
    maxAttempts: z.number().int().min(1).max(10),
    backoffMs: z.array(z.number().int().min(0)),
    userAgent: z.string().min(1),
    blockedMarkers: z.array(z.string().min(1)),
  }),
  normalize: z.object({
    stripElements: z.array(z.string().min(1)),
    textOnly: z.boolean(),
    volatilePresets: z.array(z.string().min(1)),
    volatilePatterns: z.array(z.string().min(1)),
  }),
  storage: z.object({
    driver: z.enum(['file', 'postgres', 'memory']),
    dataDir: z.string().min(1),
    snapshotKey: z.string().min(1),
  }),
  postgres: z.object({
    host: z.string(),
    port: z.number(),
    database: z.string(),
    user: z.string(),
    password: z.string(),
  }),
  telegram: z.object({
    botToken: z.string().optional(),
    apiBaseUrl: z.string().url(),
  }),
  classifier: z.object({
    enabled: z.boolean(),
    baseUrl: z.string().url(),
    apiKey: z.string(),
    model: z.string().min(1),
    timeoutMs: z.number().int().positive(),
    maxRetries: z.number().int().min(0),
    suppressIrrelevant: z.boolean(),
  }),
  renderer: z.object({
    enabled: z.boolean(),
    executablePath: z.string().optional(),
    waitMs: z.number().int().min(0),
  }),
  reminders: z.object({
    enabled: z.boolean(),
    hour: z.number().int().min(0).max(23),
    daysAhead: z.number().int().min(0).max(60),
  }),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
  logPretty: z.boolean(),
});

export type Config = z.infer<typeof ConfigSchema>;

// ============================================================
// Error Types
// ============================================================

export class WatchError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'WatchError';
  }
}

export class NetworkError extends WatchError {
  constructor(message: string, details?: unknown) {
    super(message, 'NETWORK_ERROR', details);
    this.name = 'NetworkError';
  }
}

export class TimeoutError extends WatchError {
  constructor(message: string, details?: unknown) {
    super(message, 'TIMEOUT_ERROR', details);
    this.name = 'TimeoutError';
  }
}

export class HttpError extends WatchError {
  constructor(
    message: string,
    public status: number,
    details?: unknown
  ) {
    super(message, 'HTTP_ERROR', details);
    this.name = 'HttpError';
  }
}

/**
 * The resource answered with an anti-automation challenge instead of content.
 */
export class BlockedError extends WatchError {
  constructor(message: string, details?: unknown) {
    super(message, 'BLOCKED_ERROR', details);
    this.name = 'BlockedError';
  }
}

export class ParseError extends WatchError {
  constructor(message: string, details?: unknown) {
    super(message, 'PARSE_ERROR', details);
    this.name = 'ParseError';
  }
}

export class PersistenceError extends WatchError {
  constructor(message: string, details?: unknown) {
    super(message, 'PERSISTENCE_ERROR', details);
    this.name = 'PersistenceError';
  }
}

/**
 * Another process holds the writer lock on the snapshot
 */
export class StoreLockedError extends PersistenceError {
  constructor(message: string, details?: unknown) {
    super(message, details);
    this.code = 'STORE_LOCKED';
    this.name = 'StoreLockedError';
  }
}

export class ConfigError extends WatchError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class TaskNotFoundError extends WatchError {
  constructor(taskId: string) {
    super(`Task not found: ${taskId}`, 'TASK_NOT_FOUND', { taskId });
    this.name = 'TaskNotFoundError';
  }
}

/**
 * A run was aborted through its AbortSignal
 */
export class CancelledError extends WatchError {
  constructor(message: string = 'Operation cancelled', details?: unknown) {
    super(message, 'CANCELLED', details);
    this.name = 'CancelledError';
  }
}

/**
 * Render any thrown value as a log-friendly message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
