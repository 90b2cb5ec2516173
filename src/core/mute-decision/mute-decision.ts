/**
 * Mute decision logic
 *
 * Pure functions: the controller owns the believed state and the actuator,
 * these only say what should happen next.
 */

import type { ObservedMuteState } from '$types';
import type { MuteAction } from './types';

/**
 * Reconcile the believed mute state with what the player shows on screen
 *
 * An on-screen state that disagrees with the belief always wins (the user
 * may have muted or unmuted by hand). Unknown never changes the belief.
 *
 * @param believedMuted - Current belief
 * @param observed - Mute state read from the player's volume icon
 * @returns The belief to adopt, or null when nothing changes
 */
export function reconcileBelief(believedMuted: boolean, observed: ObservedMuteState): boolean | null {
  if (observed === 'unknown') {
    return null;
  }

  const observedMuted = observed === 'muted';
  if (observedMuted === believedMuted) {
    return null;
  }

  return observedMuted;
}

/**
 * Decide whether an actuator call is needed
 * @param adPresent - An ad marker is on screen this cycle
 * @param believedMuted - Belief after reconciliation
 */
export function decideMuteAction(adPresent: boolean, believedMuted: boolean): MuteAction {
  if (adPresent && !believedMuted) {
    return 'mute';
  }
  if (!adPresent && believedMuted) {
    return 'unmute';
  }
  return 'none';
}
