/**
 * Types for the change monitoring pipeline
 */

/**
 * How a resource is watched
 * - page: the whole document is fingerprinted as one unit
 * - list: discrete items are enumerated and checked against the dedup store
 */
export type MonitorMode = 'page' | 'list';

/**
 * Options for list-style resources
 */
export interface ListOptions {
  /** CSS selector matching one element per item */
  itemSelector: string;
  /** Keep only items whose title contains one of these keywords */
  keywords?: string[];
}

/**
 * Deterministic digest of normalized content
 */
export interface Fingerprint {
  /** SHA-256 hex digest of the normalized content */
  digest: string;
  /** Short display text derived from the content */
  summary?: string;
}

/**
 * A monitored resource and its scheduling state
 */
export interface MonitorTask {
  id: string;
  resource: string;
  /** Poll interval in seconds */
  interval: number;
  enabled: boolean;
  mode: MonitorMode;
  list?: ListOptions;
  /** Extra volatile patterns (regex sources) stripped before fingerprinting */
  ignorePatterns?: string[];
  destination: string;
  lastFingerprint: Fingerprint | null;
  lastCheckedAt: Date | null;
  lastChangedAt: Date | null;
  failureCount: number;
  lastError: string | null;
  createdAt: Date;
}

/**
 * Options accepted when registering a task
 */
export interface AddTaskOptions {
  mode?: MonitorMode;
  list?: Partial<ListOptions>;
  ignorePatterns?: string[];
  enabled?: boolean;
}

/**
 * Observable task health
 */
export type TaskStatus = 'disabled' | 'pending' | 'healthy' | 'failing' | 'degraded';

/**
 * Task as presented to callers
 */
export interface TaskView extends MonitorTask {
  status: TaskStatus;
  nextDueAt: Date | null;
}

/**
 * Discrete item enumerated from a list resource
 */
export interface ListItem {
  /** Stable identifier, the absolute item URL */
  id: string;
  title: string;
  url: string;
  /** Date text shown next to the item, if any */
  postedAt?: string;
}

/**
 * Result of whole-resource change detection
 */
export type DetectionResult =
  | { kind: 'baseline'; fingerprint: Fingerprint }
  | { kind: 'unchanged'; fingerprint: Fingerprint }
  | { kind: 'changed'; fingerprint: Fingerprint; previous: Fingerprint; summary: string };

/**
 * Output of the external classification service
 */
export interface Classification {
  isRelevant: boolean;
  startDate: string | null;
  endDate: string | null;
}

export type NotificationKind = 'changed' | 'new_item' | 'reminder';

export interface NotificationEvent {
  taskId: string;
  resource: string;
  kind: NotificationKind;
  summary: string;
  item?: ListItem;
  classification?: Classification;
  timestamp: Date;
}

export type DeliveryResult = { ok: true } | { ok: false; error: Error };

/**
 * Outcome of one pipeline execution for a task
 */
export type CheckOutcome = 'baseline' | 'unchanged' | 'changed' | 'failed' | 'skipped' | 'cancelled';

export interface CheckResult {
  taskId: string;
  outcome: CheckOutcome;
  events: NotificationEvent[];
  deliveryFailures: number;
  /** Items newly seen in list mode (includes baseline items) */
  newItems: number;
  /** False when the snapshot write after this run failed and is pending retry */
  committed: boolean;
  error?: string;
  checkedAt: Date;
}

/**
 * Deadline window for a classified item, kept for reminders
 */
export interface Notice {
  id: string;
  taskId: string;
  title: string;
  url: string;
  startDate: string | null;
  endDate: string | null;
  anomaly?: 'start_equals_end' | 'end_before_start';
  lastRemindedOn: string | null;
  createdAt: Date;
}

export interface DedupEntry {
  id: string;
  firstSeen: Date;
}

// ============================================================
// Collaborator interfaces
// ============================================================

export interface RawFetchOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface RawResponse {
  status: number;
  body: string;
  contentType?: string;
}

/**
 * Plain HTTP retrieval of a resource
 */
export interface RawFetcher {
  fetchRaw(url: string, options: RawFetchOptions): Promise<RawResponse>;
}

/**
 * Headless-browser retrieval, used only after an anti-automation challenge
 */
export interface RenderedFetcher {
  fetchRendered(url: string): Promise<string>;
  close?(): Promise<void>;
}

export interface ClassifyOptions {
  /** Aborts the request when the owning run is cancelled */
  signal?: AbortSignal;
}

export interface Classifier {
  classify(content: string, options?: ClassifyOptions): Promise<Classification>;
}

export interface NotificationTransport {
  /** Destination scheme this transport handles, e.g. "telegram" */
  readonly scheme: string;
  deliver(target: string, message: string): Promise<void>;
}
