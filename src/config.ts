/**
 * @fileoverview Centralized application configuration.
 *
 * All environment variables are loaded and validated here. This provides
 * a single source of truth for configuration and makes it easy to see
 * what external configuration the CLI reads.
 *
 * @see .env.example for supported environment variables
 */

import 'dotenv/config';
import os from 'os';
import path from 'path';

// ---------------------------------------------------------------------------
// Config helpers
// ---------------------------------------------------------------------------

/** Read an optional string env var with a default. */
function optional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/** Read an optional integer env var with a default. */
function optionalInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  return raw ? parseInt(raw, 10) : defaultValue;
}

/** Resolve a file under the per-user state directory unless overridden. */
function statePath(envKey: string, fileName: string): string {
  return process.env[envKey] || path.join(os.homedir(), '.gmail-query-cli', fileName);
}

export type LogLevelSetting = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevelSetting[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevelSetting {
  return LOG_LEVELS.some((level) => level === value);
}

// ---------------------------------------------------------------------------
// Config object
// ---------------------------------------------------------------------------

const rawLogLevel = optional('LOG_LEVEL', 'warn');

const config = {
  nodeEnv: optional('NODE_ENV', 'production'),

  /** OAuth client secrets and the persisted token */
  google: {
    credentialsPath: statePath('GMAIL_CREDENTIALS_PATH', 'credentials.json'),
    tokenPath: statePath('GMAIL_TOKEN_PATH', 'token.json'),
    redirectUri: optional('GMAIL_REDIRECT_URI', 'http://localhost'),
  },

  /** Retry policy for 429/5xx responses */
  retry: {
    maxAttempts: optionalInt('GMAIL_MAX_ATTEMPTS', 3),
    baseDelayMs: optionalInt('GMAIL_RETRY_BASE_DELAY_MS', 1000),
  },

  logging: {
    level: isLogLevel(rawLogLevel) ? rawLogLevel : 'warn',
    rawLevel: rawLogLevel,
    file: process.env.APP_LOG_FILE,
  },
};

/**
 * Validate critical configuration at startup.
 * Throws if values are present but invalid.
 */
export function validateConfig(): void {
  const errors: string[] = [];

  if (!isLogLevel(config.logging.rawLevel)) {
    errors.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got ${config.logging.rawLevel}`);
  }

  // Numeric bounds
  if (!Number.isInteger(config.retry.maxAttempts) || config.retry.maxAttempts < 1 || config.retry.maxAttempts > 10) {
    errors.push(`GMAIL_MAX_ATTEMPTS must be 1-10, got ${config.retry.maxAttempts}`);
  }
  if (!Number.isInteger(config.retry.baseDelayMs) || config.retry.baseDelayMs < 0) {
    errors.push(`GMAIL_RETRY_BASE_DELAY_MS must be >= 0, got ${config.retry.baseDelayMs}`);
  }

  if (config.google.credentialsPath === config.google.tokenPath) {
    errors.push('GMAIL_CREDENTIALS_PATH and GMAIL_TOKEN_PATH must point at different files');
  }

  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }
}

export default config;
