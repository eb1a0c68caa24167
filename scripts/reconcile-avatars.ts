#!/usr/bin/env ts-node

/**
 * On-demand avatar maintenance: repairs bindings, then removes orphaned
 * profile images. Pass --skip-orphans to only validate.
 */

import { getPool, closePool } from '../src/lib/database/pool';
import { getAvatarConfig } from '../src/lib/config/avatar-config';
import { createAvatarService } from '../src/lib/services/avatar-service';
import { AvatarValidationService } from '../src/lib/services/avatar-validation-service';

async function reconcileAvatars(collectOrphans = true) {
  const controller = new AbortController();
  const onSignal = () => controller.abort();
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  try {
    const config = getAvatarConfig();
    const service = await createAvatarService(config, getPool());
    const validation = new AvatarValidationService(service, { startupDelayMs: 0, collectOrphans });
    const report = await validation.runOnce(controller.signal);
    console.log(`Repaired: ${report.repaired}, removed: ${report.removed.length}, orphans deleted: ${report.orphansDeleted}`);
    return report;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await closePool();
  }
}

if (require.main === module) {
  reconcileAvatars(!process.argv.includes('--skip-orphans')).then(() => {
    process.exit(0);
  }).catch((error) => {
    console.error('💥 Avatar reconciliation failed:', error);
    process.exit(1);
  });
}

export { reconcileAvatars };
