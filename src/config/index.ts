import { config as dotenvConfig } from 'dotenv';
import { Config, ConfigSchema } from '../types/index.js';

dotenvConfig();

function getEnvString(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvOptionalString(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value.trim() === '' ? undefined : value;
}

function getEnvNumber(key: string, defaultValue?: number): number {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number`);
  }
  return parsed;
}

function getEnvBoolean(key: string, defaultValue?: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value.toLowerCase() === 'true';
}

/**
 * Comma separated list; an empty value yields an empty list
 */
function getEnvList(key: string, defaultValue: string[]): string[] {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

function getEnvNumberList(key: string, defaultValue: number[]): number[] {
  const parts = getEnvList(key, defaultValue.map(String));
  return parts.map((part) => {
    const parsed = parseInt(part, 10);
    if (isNaN(parsed)) {
      throw new Error(`Environment variable ${key} must be a list of numbers`);
    }
    return parsed;
  });
}

/**
 * Volatile patterns are regex sources and may contain commas, so they are
 * given as a JSON array of strings.
 */
function getEnvPatterns(key: string): string[] {
  const value = process.env[key];
  if (value === undefined || value.trim() === '') {
    return [];
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    throw new Error(`Environment variable ${key} must be a JSON array of regex strings`);
  }
  if (!Array.isArray(parsed) || !parsed.every((p): p is string => typeof p === 'string')) {
    throw new Error(`Environment variable ${key} must be a JSON array of regex strings`);
  }
  return parsed;
}

export function loadConfig(): Config {
  const rawConfig = {
    monitor: {
      minIntervalSeconds: getEnvNumber('MIN_INTERVAL_SECONDS', 60),
      tickSeconds: getEnvNumber('TICK_SECONDS', 15),
      concurrency: getEnvNumber('MONITOR_CONCURRENCY', 4),
      degradedThreshold: getEnvNumber('DEGRADED_THRESHOLD', 3),
      dedupScope: getEnvString('DEDUP_SCOPE', 'global'),
    },
    fetch: {
      timeoutMs: getEnvNumber('FETCH_TIMEOUT_MS', 20000),
      maxAttempts: getEnvNumber('FETCH_MAX_ATTEMPTS', 3),
      backoffMs: getEnvNumberList('FETCH_BACKOFF_MS', [2000, 4000]),
      userAgent: getEnvString('FETCH_USER_AGENT', 'notice-watch/1.0 (+change monitor)'),
      blockedMarkers: getEnvList('FETCH_BLOCKED_MARKERS', [
        'dynamic_challenge',
        'cf-browser-verification',
        'challenge-platform',
      ]),
    },
    normalize: {
      stripElements: getEnvList('NORMALIZE_STRIP_ELEMENTS', ['script', 'style', 'noscript', 'template']),
      textOnly: getEnvBoolean('NORMALIZE_TEXT_ONLY', true),
      volatilePresets: getEnvList('NORMALIZE_VOLATILE_PRESETS', [
        'uuids',
        'csrf_tokens',
        'nonce',
        'session_ids',
      ]),
      volatilePatterns: getEnvPatterns('NORMALIZE_VOLATILE_PATTERNS'),
    },
    storage: {
      driver: getEnvString('STORAGE_DRIVER', 'file'),
      dataDir: getEnvString('DATA_DIR', './data'),
      snapshotKey: getEnvString('SNAPSHOT_KEY', 'snapshot'),
    },
    postgres: {
      host: getEnvString('POSTGRES_HOST', 'localhost'),
      port: getEnvNumber('POSTGRES_PORT', 5432),
      database: getEnvString('POSTGRES_DB', 'notice_watch'),
      user: getEnvString('POSTGRES_USER', 'postgres'),
      password: getEnvString('POSTGRES_PASSWORD', 'postgres'),
    },
    telegram: {
      botToken: getEnvOptionalString('TELEGRAM_BOT_TOKEN'),
      apiBaseUrl: getEnvString('TELEGRAM_API_BASE_URL', 'https://api.telegram.org'),
    },
    classifier: {
      enabled: getEnvBoolean('CLASSIFIER_ENABLED', false),
      baseUrl: getEnvString('CLASSIFIER_BASE_URL', 'http://localhost:1234/v1'),
      apiKey: getEnvString('CLASSIFIER_API_KEY', 'not-needed'),
      model: getEnvString('CLASSIFIER_MODEL', 'qwen2.5-7b-instruct'),
      timeoutMs: getEnvNumber('CLASSIFIER_TIMEOUT_MS', 60000),
      maxRetries: getEnvNumber('CLASSIFIER_MAX_RETRIES', 1),
      suppressIrrelevant: getEnvBoolean('CLASSIFIER_SUPPRESS_IRRELEVANT', true),
    },
    renderer: {
      enabled: getEnvBoolean('RENDERER_ENABLED', false),
      executablePath: getEnvOptionalString('RENDERER_EXECUTABLE_PATH'),
      waitMs: getEnvNumber('RENDERER_WAIT_MS', 4000),
    },
    reminders: {
      enabled: getEnvBoolean('REMINDERS_ENABLED', true),
      hour: getEnvNumber('REMINDER_HOUR', 9),
      daysAhead: getEnvNumber('REMINDER_DAYS_AHEAD', 3),
    },
    logLevel: getEnvString('LOG_LEVEL', 'info'),
    logPretty: getEnvBoolean('LOG_PRETTY', true),
  };

  return ConfigSchema.parse(rawConfig);
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

export function resetConfig(): void {
  configInstance = null;
}
