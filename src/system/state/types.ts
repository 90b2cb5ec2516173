import type { ControllerPhase } from '@core/cadence';

/**
 * Counters reported when the muter shuts down
 */
export interface CycleStats {
  cycles: number;
  adsDetected: number;
  muteCalls: number;
  unmuteCalls: number;
  actuatorFailures: number;
  reconciliations: number;
  cycleErrors: number;
}

export interface ControllerState {
    // ═══════════════════════════════════════════════════════════════
    // CORE: MUTE BELIEF (written by the loop only)
    // ═══════════════════════════════════════════════════════════════
    believedMuted: boolean;
    phase: ControllerPhase;

    // ═══════════════════════════════════════════════════════════════
    // CORE: LIFECYCLE FLAGS (written by the shell only)
    // ═══════════════════════════════════════════════════════════════
    enabled: boolean;
    alive: boolean;

    // ═══════════════════════════════════════════════════════════════
    // CORE: TIMING
    // ═══════════════════════════════════════════════════════════════
    startTime: number;
    lastCycleTime: number;

    // ═══════════════════════════════════════════════════════════════
    // STATISTICS
    // ═══════════════════════════════════════════════════════════════
    stats: CycleStats;
}
