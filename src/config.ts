import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

/**
 * Centralized application configuration
 */

// Server config
export const PORT = parseInt(process.env.PORT || '3000', 10);
export const NODE_ENV = process.env.NODE_ENV || 'development';
export const LOG_LEVEL = process.env.LOG_LEVEL || 'info';

// SQLite database file (":memory:" keeps everything in process)
export const DATABASE_PATH = process.env.DATABASE_PATH || 'data/budget.db';

// IANA time zone that defines "today" and the hour of day for schedules
export const TIME_ZONE = process.env.TIME_ZONE || 'UTC';

// Accepted bearer tokens - Set for fast lookup
export const API_KEYS: Set<string> = (() => {
  const envValue = process.env.API_KEYS;
  if (!envValue || envValue.trim() === '') {
    // No keys configured means the API is open (rejected in production)
    return new Set<string>();
  }
  return new Set(
    envValue
      .split(',')
      .map((key) => key.trim())
      .filter((key) => key.length > 0)
  );
})();

/**
 * Check whether the runtime knows an IANA time zone
 */
export function isTimeZoneSupported(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Validate configuration on startup
 */
export function validateConfig(): void {
  const errors: string[] = [];

  if (!Number.isInteger(PORT) || PORT <= 0) {
    errors.push('PORT must be a positive integer');
  }

  if (!isTimeZoneSupported(TIME_ZONE)) {
    errors.push(`TIME_ZONE '${TIME_ZONE}' is not a known IANA time zone`);
  }

  if (API_KEYS.size === 0 && NODE_ENV === 'production') {
    errors.push('API_KEYS is required in production');
  }

  if (errors.length > 0) {
    throw new Error(`Configuration errors:\n${errors.join('\n')}`);
  }
}
