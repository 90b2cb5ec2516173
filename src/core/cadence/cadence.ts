/**
 * Polling cadence
 */

import type { CadenceConfig, ControllerPhase } from './types';

/**
 * Phase to report after an enabled cycle
 * @param adSeen - An ad marker was found during the cycle
 */
export function phaseAfterCycle(adSeen: boolean): ControllerPhase {
  return adSeen ? 'ad-active' : 'idle';
}

/**
 * Wait before the next cycle
 */
export function pollInterval(phase: ControllerPhase, config: CadenceConfig): number {
  switch (phase) {
    case 'ad-active':
      return config.POLL_AD_ACTIVE_MS;
    case 'idle':
      return config.POLL_IDLE_MS;
    case 'paused':
      return config.POLL_PAUSED_MS;
  }
}
