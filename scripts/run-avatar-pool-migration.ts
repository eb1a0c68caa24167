#!/usr/bin/env ts-node

/**
 * Creates the avatar pool tables and the users.profile_image_path column.
 * Pass --rollback to revert.
 */

import { getPool, closePool } from '../src/lib/database/pool';
import { ConfigDrivenMigrationManager } from '../src/lib/database/config-driven-migration';
import { AVATAR_POOL_TABLES } from '../src/lib/database/migrations/avatar-pool-tables';

async function runAvatarPoolMigration(rollback = false) {
  try {
    const pool = getPool();
    console.log('🔄 Connecting to database...');
    await pool.query('SELECT NOW()');
    console.log('✅ Database connection established');

    const manager = new ConfigDrivenMigrationManager(pool);
    if (rollback) {
      console.log(`🔄 Reverting: ${AVATAR_POOL_TABLES.description}`);
      await manager.rollback(AVATAR_POOL_TABLES);
      console.log('✅ Avatar pool migration reverted');
      return;
    }

    console.log(`🔄 Running: ${AVATAR_POOL_TABLES.description}`);
    const result = await manager.run(AVATAR_POOL_TABLES);
    console.log(`✅ Avatar pool migration completed in ${result.executionTime}ms`);
  } finally {
    await closePool();
    console.log('🔌 Database connection closed');
  }
}

if (require.main === module) {
  runAvatarPoolMigration(process.argv.includes('--rollback')).then(() => {
    process.exit(0);
  }).catch((error) => {
    console.error('💥 Migration script failed:', error);
    process.exit(1);
  });
}

export { runAvatarPoolMigration };
