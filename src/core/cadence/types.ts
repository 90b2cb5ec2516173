/**
 * Cadence type definitions
 */

/**
 * Controller phase; selects the polling interval
 */
export type ControllerPhase = 'paused' | 'idle' | 'ad-active';

/**
 * Poll intervals per phase, in milliseconds
 */
export interface CadenceConfig {
  POLL_AD_ACTIVE_MS: number;
  POLL_IDLE_MS: number;
  POLL_PAUSED_MS: number;
}
