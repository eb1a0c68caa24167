// Avatar Pool - Database Connection

import { Pool, PoolClient } from 'pg';

export interface DatabaseConfig {
  connectionString: string;
  ssl?: boolean;
  maxPoolSize?: number;
  idleTimeoutMs?: number;
  connectionTimeoutMs?: number;
}

export type DatabaseRow = Record<string, unknown>;

export interface DatabaseResult {
  rows: DatabaseRow[];
  rowCount: number;
}

export interface DatabaseClient {
  query(text: string, params?: unknown[]): Promise<DatabaseResult>;
  release(): void;
}

export interface DatabasePool {
  query(text: string, params?: unknown[]): Promise<DatabaseResult>;
  connect(): Promise<DatabaseClient>;
  end(): Promise<void>;
}

class PostgresDatabaseClient implements DatabaseClient {
  constructor(private client: PoolClient) {}

  async query(text: string, params?: unknown[]): Promise<DatabaseResult> {
    const res = await this.client.query(text, params);
    return { rows: res.rows, rowCount: res.rowCount ?? res.rows.length };
  }

  release(): void {
    this.client.release();
  }
}

export class PostgresDatabasePool implements DatabasePool {
  private pool: Pool;

  constructor(config: DatabaseConfig) {
    this.pool = new Pool({
      connectionString: config.connectionString,
      ssl: config.ssl ? { rejectUnauthorized: false } : undefined,
      max: config.maxPoolSize ?? 10,
      idleTimeoutMillis: config.idleTimeoutMs ?? 30000,
      connectionTimeoutMillis: config.connectionTimeoutMs ?? 2000
    });
  }

  async query(text: string, params?: unknown[]): Promise<DatabaseResult> {
    const res = await this.pool.query(text, params);
    return { rows: res.rows, rowCount: res.rowCount ?? res.rows.length };
  }

  async connect(): Promise<DatabaseClient> {
    const client = await this.pool.connect();
    return new PostgresDatabaseClient(client);
  }

  async end(): Promise<void> {
    await this.pool.end();
  }
}

export function createDatabasePool(config: DatabaseConfig): DatabasePool {
  if (!config.connectionString) {
    throw new Error('No database URL found. Set DATABASE_URL or POOL_DATABASE_URL.');
  }
  return new PostgresDatabasePool(config);
}

// Row readers: pg hands back untyped rows, these narrow one column at a time.

export function readString(row: DatabaseRow, column: string): string {
  const value = row[column];
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint') return String(value);
  throw new Error(`Column ${column} is not a string`);
}

export function readNullableString(row: DatabaseRow, column: string): string | null {
  const value = row[column];
  if (value === null || value === undefined) return null;
  return readString(row, column);
}

export function readDate(row: DatabaseRow, column: string): Date {
  const value = row[column];
  if (value instanceof Date) return value;
  if (typeof value === 'string' || typeof value === 'number') {
    const parsed = new Date(value);
    if (!Number.isNaN(parsed.getTime())) return parsed;
  }
  throw new Error(`Column ${column} is not a timestamp`);
}

export function isPostgresError(e: unknown, code: string): boolean {
  return typeof e === 'object' && e !== null && 'code' in e && e.code === code;
}
