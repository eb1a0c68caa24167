// Avatar Pool - startup validation
// Runs one reconciliation + orphan collection pass shortly after the host
// process starts, once the identity subsystem has finished booting.

import { setTimeout as delay } from 'timers/promises';
import { AvatarMaintenanceReport, AvatarOperationOptions, AvatarValidationReport } from '../../types/avatar';
import { DEFAULT_STARTUP_DELAY_MS } from '../config/avatar-config';
import { describeError } from './avatar-errors';

export interface AvatarMaintenance {
  validate(options?: AvatarOperationOptions): Promise<AvatarValidationReport>;
  collectOrphans(options?: AvatarOperationOptions): Promise<number>;
}

export interface AvatarValidationOptions {
  startupDelayMs?: number;
  collectOrphans?: boolean;
}

export class AvatarValidationService {
  private controller: AbortController | null = null;
  private running: Promise<AvatarMaintenanceReport | null> | null = null;
  private readonly startupDelayMs: number;
  private readonly collectOrphansEnabled: boolean;

  constructor(private maintenance: AvatarMaintenance, options: AvatarValidationOptions = {}) {
    this.startupDelayMs = options.startupDelayMs ?? DEFAULT_STARTUP_DELAY_MS;
    this.collectOrphansEnabled = options.collectOrphans ?? true;
  }

  /**
   * Schedules the startup pass. Never rejects: failures are logged and the
   * promise resolves with null.
   */
  start(): Promise<AvatarMaintenanceReport | null> {
    if (this.running) return this.running;
    console.log('[avatar-validation] Avatar validation service starting...');
    const controller = new AbortController();
    this.controller = controller;
    this.running = this.runAfterDelay(controller.signal).finally(() => {
      if (this.controller === controller) this.controller = null;
    });
    return this.running;
  }

  async stop(): Promise<void> {
    console.log('[avatar-validation] Avatar validation service stopping...');
    this.controller?.abort();
    const running = this.running;
    this.running = null;
    if (running) await running;
  }

  async runOnce(signal?: AbortSignal): Promise<AvatarMaintenanceReport> {
    const report = await this.maintenance.validate({ signal });
    if (report.repaired > 0) {
      console.log(`[avatar-validation] Avatar validation completed. Repaired ${report.repaired} missing avatar(s).`);
    } else {
      console.log('[avatar-validation] Avatar validation completed. All avatars are valid.');
    }

    let orphansDeleted = 0;
    if (this.collectOrphansEnabled && !signal?.aborted) {
      orphansDeleted = await this.maintenance.collectOrphans({ signal });
      if (orphansDeleted > 0) {
        console.log(`[avatar-validation] Cleaned up ${orphansDeleted} orphaned profile image(s).`);
      }
    }
    return { ...report, orphansDeleted };
  }

  private async runAfterDelay(signal: AbortSignal): Promise<AvatarMaintenanceReport | null> {
    try {
      if (this.startupDelayMs > 0) {
        await delay(this.startupDelayMs, undefined, { signal });
      }
      return await this.runOnce(signal);
    } catch (e) {
      if (signal.aborted) {
        console.log('[avatar-validation] Startup validation cancelled');
      } else {
        console.error('[avatar-validation] Error during avatar validation at startup:', describeError(e));
      }
      return null;
    }
  }
}
