import { config } from 'dotenv';
import { join } from 'path';
import { createDatabasePool, DatabasePool } from './database-connection';
import { getDatabaseSettings } from '../config/avatar-config';

// Load environment variables
try {
  // In development, also load from .env.local and allow overriding
  if (process.env.NODE_ENV !== 'production') {
    config({ path: join(process.cwd(), '.env.local'), override: true });
  }
  // Always load from default .env without overriding already-set envs
  config({ override: false });
} catch (e) {
  console.error('[db] Failed to load environment variables:', e);
}

let pool: DatabasePool | null = null;

export function getPool(): DatabasePool {
  if (!pool) {
    const settings = getDatabaseSettings();
    pool = createDatabasePool(settings);
    const host = safeHost(settings.connectionString);
    console.log(`[db] Pool created${host ? ` for ${host}` : ''} (ssl=${settings.ssl ? 'on' : 'off'}, max=${settings.maxPoolSize})`);
  }
  return pool;
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  const current = pool;
  pool = null;
  await current.end();
}

function safeHost(connectionString: string): string | null {
  try {
    return new URL(connectionString).hostname;
  } catch {
    return null;
  }
}
