/**
 * Avatar pool configuration.
 * Everything comes from the environment (see .env.example); `pool.ts` loads
 * the .env files before the first read.
 */

import { isAbsolute, resolve } from 'path';
import type { DatabaseConfig } from '../database/database-connection';

export interface AvatarConfig {
  // Directory holding the shared pool files
  poolDirectory: string;
  // Root of the per-user profile image directories (<root>/<userId>)
  userDataDirectory: string;
  startupDelayMs: number;
  collectOrphansOnStartup: boolean;
}

export const DEFAULT_STARTUP_DELAY_MS = 5000;

export function getAvatarConfig(env: NodeJS.ProcessEnv = process.env): AvatarConfig {
  return {
    poolDirectory: toDirectory(env.AVATAR_POOL_DIR, 'data/avatars'),
    userDataDirectory: toDirectory(env.AVATAR_USER_DATA_DIR, 'data/users'),
    startupDelayMs: toInt(env.AVATAR_STARTUP_DELAY_MS, DEFAULT_STARTUP_DELAY_MS, 0),
    collectOrphansOnStartup: toBool(env.AVATAR_COLLECT_ORPHANS_ON_STARTUP, true)
  };
}

export function getDatabaseSettings(env: NodeJS.ProcessEnv = process.env): DatabaseConfig & { maxPoolSize: number } {
  const connectionString = (env.POOL_DATABASE_URL || env.DATABASE_URL || '').trim();
  return {
    connectionString,
    ssl: toBool(env.DB_FORCE_SSL, false),
    maxPoolSize: toInt(env.DB_MAX_POOL_SIZE, 10, 1)
  };
}

function toDirectory(raw: string | undefined, fallback: string): string {
  const value = (raw || '').trim() || fallback;
  const absolute = isAbsolute(value) ? value : resolve(process.cwd(), value);
  return absolute.replace(/[\\/]+$/, '') || absolute;
}

function toInt(value: string | undefined, fallback: number, min: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < min) return fallback;
  return Math.floor(parsed);
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  const normalized = value.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes') return true;
  if (normalized === '0' || normalized === 'false' || normalized === 'no') return false;
  return fallback;
}
