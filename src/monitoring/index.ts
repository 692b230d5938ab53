/**
 * Change monitoring: periodic polling of pages and notice lists with
 * fingerprint-based change detection, item dedup and notification.
 */

// Types
export * from './types.js';

// Detection
export {
  VOLATILE_PRESETS,
  buildNormalizationRules,
  normalizeContent,
  extractTextFromHtml,
} from './normalizer.js';
export type { NormalizationRules, VolatilePattern } from './normalizer.js';
export { ChangeDetector, DEFAULT_ITEM_SELECTOR, resolveUrl } from './change-detector.js';
export { DedupStore, dedupKey } from './dedup-store.js';

// Collaborators
export { Fetcher, HttpRawFetcher, isRetryable } from './fetcher.js';
export type { RetryPolicy } from './fetcher.js';
export { PuppeteerRenderer } from './renderer.js';
export { OpenAIClassifier, createClassifier, parseClassification, normalizeDate } from './classifier.js';
export { Notifier, createNotifier, formatEvent, parseDestination } from './notifier.js';
export { TelegramTransport } from './transports/telegram.js';
export { LogTransport } from './transports/log.js';

// Service
export { TaskRegistry } from './task-registry.js';
export { TaskPipeline } from './task-pipeline.js';
export { NoticeBook, ReminderService } from './reminders.js';
export { MonitorService, createMonitorService } from './monitor-service.js';
export type { LoadOptions, MonitorStatus } from './monitor-service.js';
