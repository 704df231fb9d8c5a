import 'dotenv/config';

function readBoolean(name: string, fallback: boolean): boolean {
  if (!String(process.env[name] ?? '').trim()) return fallback;
  return readBooleanFrom(process.env, name);
}

function readNonNegative(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) && value >= 0 ? value : fallback;
}

// --- Server ---
export const PORT = Math.max(1, Number(process.env.PORT) || 3000);
export const HOST = String(process.env.HOST || '0.0.0.0').trim();
export const IS_PRODUCTION = String(process.env.NODE_ENV || '').toLowerCase() === 'production';

// --- Database ---
export const DATABASE_URL = String(process.env.DATABASE_URL || '').trim();
export const DB_SSL = readBoolean('DB_SSL', IS_PRODUCTION);
export const DB_SSL_REJECT_UNAUTHORIZED = readBoolean('DB_SSL_REJECT_UNAUTHORIZED', true);
export const DB_POOL_MAX = Math.max(1, Number(process.env.DB_POOL_MAX) || 20);

// --- Universe ---
export const SYMBOLS_FILE = String(process.env.SYMBOLS_FILE || './symbols.txt').trim();

// --- Scan ---
export const SCAN_CONCURRENCY = Math.max(1, Number(process.env.SCAN_CONCURRENCY) || 8);
export const SCAN_LOOKBACK_SESSIONS = Math.max(2, Number(process.env.SCAN_LOOKBACK_SESSIONS) || 5);
export const PRICE_HISTORY_MONTHS = Math.max(3, Number(process.env.PRICE_HISTORY_MONTHS) || 9);
export const SCAN_PROGRESS_RETENTION_MS = readNonNegative('SCAN_PROGRESS_RETENTION_MS', 30_000);
/** Only the first N per-symbol errors are folded into a scan's error_message. */
export const SCAN_ERROR_SUMMARY_LIMIT = 10;
export const SCAN_ERROR_MESSAGE_MAX_LENGTH = 2000;

// --- Market data ---
export const FETCH_RETRIES = Math.max(1, Number(process.env.FETCH_RETRIES) || 2);
export const FETCH_BACKOFF_MS = readNonNegative('FETCH_BACKOFF_MS', 500);
export const FETCH_TIMEOUT_MS = Math.max(1_000, Number(process.env.FETCH_TIMEOUT_MS) || 8_000);
export const NETWORK_PROBE_TIMEOUT_MS = Math.max(500, Number(process.env.NETWORK_PROBE_TIMEOUT_MS) || 5_000);
export const FUNDAMENTALS_THROTTLE_MS = readNonNegative('FUNDAMENTALS_THROTTLE_MS', 300);
export const HISTORY_THROTTLE_MS = readNonNegative('HISTORY_THROTTLE_MS', 200);
export const MARKET_DATA_USER_AGENT = String(
  process.env.MARKET_DATA_USER_AGENT ||
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36',
);

// --- Scheduler ---
export const SCAN_SCHEDULER_ENABLED = readBoolean('SCAN_SCHEDULER_ENABLED', false);
export const SCAN_SCHEDULE_UTC = String(process.env.SCAN_SCHEDULE_UTC || '10:30').trim();

/** Parses an `HH:MM` string into hour/minute, or null when malformed. */
export function parseScheduleTime(value: string): { hour: number; minute: number } | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(String(value || '').trim());
  if (!match) return null;
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) return null;
  return { hour, minute };
}

// --- Startup validation ---
export function validateStartupEnvironment(env: NodeJS.ProcessEnv = process.env) {
  const errors: string[] = [];
  const warnings: string[] = [];
  const warnIfInvalidPositiveNumber = (name: string) => {
    const raw = env[name];
    if (raw === undefined || raw === '') return;
    const numeric = Number(raw);
    if (!Number.isFinite(numeric) || numeric <= 0) {
      warnings.push(`${name} should be a positive number (received: ${String(raw)})`);
    }
  };
  const warnIfInvalidNonNegativeNumber = (name: string) => {
    const raw = env[name];
    if (raw === undefined || raw === '') return;
    const numeric = Number(raw);
    if (!Number.isFinite(numeric) || numeric < 0) {
      warnings.push(`${name} should be a non-negative number (received: ${String(raw)})`);
    }
  };

  if (!String(env.DATABASE_URL || '').trim()) {
    errors.push('DATABASE_URL is required');
  }
  if (readBooleanFrom(env, 'SCAN_SCHEDULER_ENABLED') && !parseScheduleTime(String(env.SCAN_SCHEDULE_UTC || '10:30'))) {
    errors.push(`SCAN_SCHEDULE_UTC must be HH:MM (received: ${String(env.SCAN_SCHEDULE_UTC)})`);
  }

  ['PORT', 'SCAN_CONCURRENCY', 'SCAN_LOOKBACK_SESSIONS', 'PRICE_HISTORY_MONTHS', 'FETCH_RETRIES', 'FETCH_TIMEOUT_MS', 'NETWORK_PROBE_TIMEOUT_MS'].forEach(
    warnIfInvalidPositiveNumber,
  );
  ['FETCH_BACKOFF_MS', 'FUNDAMENTALS_THROTTLE_MS', 'HISTORY_THROTTLE_MS', 'SCAN_PROGRESS_RETENTION_MS'].forEach(
    warnIfInvalidNonNegativeNumber,
  );

  for (const warning of warnings) {
    console.warn(`[startup-env] ${warning}`);
  }
  if (errors.length > 0) {
    for (const error of errors) {
      console.error(`[startup-env] ${error}`);
    }
    throw new Error('Startup environment validation failed');
  }
  return { warnings };
}

function readBooleanFrom(env: NodeJS.ProcessEnv, name: string): boolean {
  const raw = String(env[name] ?? '').trim().toLowerCase();
  return raw !== '' && raw !== 'false' && raw !== '0' && raw !== 'no';
}
