// Schema Evolution (Config-driven)
// Applies a MigrationConfig inside one transaction: steps, then post-checks.
// Any failing step or check rolls the whole migration back.

import { DatabaseClient, DatabasePool, DatabaseRow } from './database-connection';

export interface MigrationConfig {
  version: string;
  description: string;
  steps: MigrationStep[];
  postChecks: MigrationCheck[];
  rollback: RollbackStep[];
}

export interface MigrationCheck {
  name: string;
  sql: string;
  expected: DatabaseRow;
  errorMessage?: string;
}

export type MigrationStep =
  | { type: 'custom'; table: string; details: { sql: string } }
  | { type: 'addColumn'; table: string; details: { columnName: string; dataType: string; nullable?: boolean; defaultValue?: string } }
  | { type: 'addIndex'; table: string; details: { columns: string[]; indexName?: string; unique?: boolean } };

export interface RollbackStep {
  sql: string;
}

export interface MigrationResult {
  version: string;
  success: boolean;
  executionTime: number;
  appliedSteps: number;
}

export class MigrationError extends Error {
  constructor(message: string, public readonly code: 'STEP_FAILED' | 'CHECK_FAILED' | 'ROLLBACK_FAILED') {
    super(message);
    this.name = 'MigrationError';
  }
}

export function buildStepSql(step: MigrationStep): string {
  switch (step.type) {
    case 'custom':
      return step.details.sql;
    case 'addColumn': {
      const { columnName, dataType, nullable, defaultValue } = step.details;
      return `ALTER TABLE ${step.table} ADD COLUMN IF NOT EXISTS ${columnName} ${dataType}${nullable === false ? ' NOT NULL' : ''}${defaultValue ? ` DEFAULT ${defaultValue}` : ''}`;
    }
    case 'addIndex': {
      const { columns, indexName, unique } = step.details;
      const idx = indexName || `idx_${step.table}_${columns.join('_')}`;
      return `CREATE ${unique ? 'UNIQUE ' : ''}INDEX IF NOT EXISTS ${idx} ON ${step.table} (${columns.join(', ')})`;
    }
    default: {
      const neverStep: never = step;
      throw new Error(`Unsupported step type: ${JSON.stringify(neverStep)}`);
    }
  }
}

export class ConfigDrivenMigrationManager {
  constructor(private pool: DatabasePool) {}

  async run(cfg: MigrationConfig): Promise<MigrationResult> {
    const started = Date.now();
    const client = await this.pool.connect();
    let appliedSteps = 0;
    try {
      await client.query('BEGIN');
      for (const step of cfg.steps) {
        try {
          await client.query(buildStepSql(step));
        } catch (e) {
          const reason = e instanceof Error ? e.message : String(e);
          throw new MigrationError(`Step on ${step.table} failed: ${reason}`, 'STEP_FAILED');
        }
        appliedSteps++;
      }
      for (const check of cfg.postChecks) {
        await this.verify(client, check);
      }
      await client.query('COMMIT');
      console.log(`[db] Migration ${cfg.version} applied (${appliedSteps} steps)`);
      return { version: cfg.version, success: true, executionTime: Date.now() - started, appliedSteps };
    } catch (e) {
      await client.query('ROLLBACK');
      console.error(`[db] Migration ${cfg.version} rolled back:`, e instanceof Error ? e.message : e);
      throw e;
    } finally {
      client.release();
    }
  }

  async rollback(cfg: MigrationConfig): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      for (const step of cfg.rollback) {
        await client.query(step.sql);
      }
      await client.query('COMMIT');
      console.log(`[db] Migration ${cfg.version} reverted`);
    } catch (e) {
      await client.query('ROLLBACK');
      const reason = e instanceof Error ? e.message : String(e);
      throw new MigrationError(`Rollback of ${cfg.version} failed: ${reason}`, 'ROLLBACK_FAILED');
    } finally {
      client.release();
    }
  }

  private async verify(client: DatabaseClient, check: MigrationCheck): Promise<void> {
    const res = await client.query(check.sql);
    const row = res.rows[0] ?? {};
    for (const [key, expected] of Object.entries(check.expected)) {
      if (row[key] !== expected) {
        throw new MigrationError(check.errorMessage ?? `Post-check failed: ${check.name}`, 'CHECK_FAILED');
      }
    }
  }
}
