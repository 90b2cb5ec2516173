/**
 * State management functions
 * Provides initial state structure for the mute controller
 */

import type { ControllerState, CycleStats } from './types';

export * from './types';

/**
 * Create zeroed cycle statistics
 */
export function createStats(): CycleStats {
  return {
    cycles: 0,
    adsDetected: 0,
    muteCalls: 0,
    unmuteCalls: 0,
    actuatorFailures: 0,
    reconciliations: 0,
    cycleErrors: 0
  };
}

/**
 * Create initial controller state
 *
 * The controller starts paused and believing the player is unmuted; the
 * first enabled cycle corrects that belief from the on-screen icon if it
 * can see one.
 *
 * @param nowMs - Current time in milliseconds
 */
export function createInitialState(nowMs: number): ControllerState {
  return {
    believedMuted: false,   // What the controller thinks the player's mute state is
    phase: 'paused',        // Selects the poll interval

    enabled: false,         // Shell: detection running (false = paused)
    alive: true,            // Shell: false asks the loop to release and exit

    startTime: nowMs,
    lastCycleTime: 0,       // When the last enabled cycle started

    stats: createStats()
  };
}
