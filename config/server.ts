import { readFileSync } from 'fs';
import { resolve } from 'path';

/**
 * Server configuration
 *
 * All runtime settings are read from the environment on first use.
 * DATABASE_PATH may also come from .env.local.
 */

export const SERVER_DEFAULTS = {
  /** HTTP API */
  PORT: 5000,

  HOST: '127.0.0.1',

  /** SQLite database file, relative to the working directory */
  DATABASE_PATH: 'data/invoicing.db',
} as const;

function readEnvLocal(key: string): string | null {
  try {
    const envFile = readFileSync(resolve(process.cwd(), '.env.local'), 'utf8');
    const match = envFile.match(new RegExp(`^${key}=(.+)$`, 'm'));
    if (!match) return null;
    let value = match[1].trim();
    if (
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"))
    ) {
      value = value.slice(1, -1);
    }
    return value || null;
  } catch {
    // No .env.local; fall back to defaults
    return null;
  }
}

/**
 * Get the HTTP port from environment or default
 */
export function getServerPort(): number {
  const parsed = parseInt(process.env.PORT || String(SERVER_DEFAULTS.PORT), 10);
  return Number.isFinite(parsed) ? parsed : SERVER_DEFAULTS.PORT;
}

export function getServerHost(): string {
  return process.env.HOST?.trim() || SERVER_DEFAULTS.HOST;
}

/**
 * Get the database file path. `:memory:` is passed through untouched.
 */
export function getDatabasePath(): string {
  const configured = process.env.DATABASE_PATH?.trim() || readEnvLocal('DATABASE_PATH');
  const path = configured || SERVER_DEFAULTS.DATABASE_PATH;
  if (path === ':memory:') return path;
  return resolve(process.cwd(), path);
}
