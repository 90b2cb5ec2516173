/**
 * Control loop helper functions
 */

import { formatDuration } from '@utils/time';

import type { CycleStats } from '@system/state';
import type { Controller } from './types';

/**
 * Ask the actuator for a mute state and count the outcome
 * @returns true when applied
 */
export async function requestMute(controller: Controller, target: boolean): Promise<boolean> {
  const stats = controller.state.stats;
  if (target) {
    stats.muteCalls++;
  } else {
    stats.unmuteCalls++;
  }

  let applied: boolean;
  try {
    applied = await controller.actuator.applyMute(target);
  } catch (err) {
    controller.logger.warning(controller.actuator.name + " threw: " + String(err));
    applied = false;
  }

  if (!applied) {
    stats.actuatorFailures++;
  }
  return applied;
}

/**
 * Unmute if the loop believes it muted the player, then clear the belief
 *
 * The belief is cleared even when the unmute fails: nothing would retry it
 * once the loop is paused or gone.
 *
 * @param reason - Shown in the log line ("paused", "stopping")
 */
export async function releaseMute(controller: Controller, reason: string): Promise<void> {
  const state = controller.state;
  if (!state.believedMuted) {
    return;
  }

  const ok = await requestMute(controller, false);
  state.believedMuted = false;

  if (ok) {
    controller.logger.info("Unmuted (" + reason + ")");
  } else {
    controller.logger.warning("Could not unmute while " + reason + "; check the player's volume");
  }
}

/**
 * One-line summary of the cycle counters
 */
export function formatStats(stats: CycleStats, uptimeMs: number): string {
  return "Uptime " + formatDuration(uptimeMs) +
    ", cycles " + stats.cycles +
    ", ads " + stats.adsDetected +
    ", mutes " + stats.muteCalls +
    ", unmutes " + stats.unmuteCalls +
    ", failures " + stats.actuatorFailures +
    ", corrections " + stats.reconciliations +
    ", errors " + stats.cycleErrors;
}
