/**
 * Core cycle logic for the mute controller
 */

import { phaseAfterCycle } from '@core/cadence';
import { decideMuteAction, reconcileBelief } from '@core/mute-decision';
import { fmtPoint } from '@logging';

import { requestMute } from './helpers';
import type { Controller } from './types';

/**
 * Run one enabled cycle: capture, reconcile, detect, act
 *
 * Never throws. An unexpected error is logged critical and counted; the
 * phase then keeps its previous value so the cadence does not change.
 */
export async function runCycle(controller: Controller): Promise<void> {
  const state = controller.state;
  const logger = controller.logger;
  const detector = controller.detector;

  state.stats.cycles++;
  state.lastCycleTime = controller.timeSource();

  try {
    await detector.refresh();

    // Reconcile with the on-screen icon before deciding anything
    const observed = await detector.observeMuteIconState();
    const adopted = reconcileBelief(state.believedMuted, observed);
    if (adopted !== null) {
      logger.info("Volume icon shows " + observed + "; mute state corrected");
      state.believedMuted = adopted;
      state.stats.reconciliations++;
    }

    const adPoint = await detector.detectAd(controller.templates);
    const adPresent = adPoint !== null;
    if (adPresent && state.phase !== 'ad-active') {
      state.stats.adsDetected++;
    }

    const action = decideMuteAction(adPresent, state.believedMuted);
    if (action === 'mute') {
      if (await requestMute(controller, true)) {
        state.believedMuted = true;
        logger.info("Ad detected at " + fmtPoint(adPoint) + "; muted");
      } else {
        logger.warning("Mute failed; retrying next cycle");
      }
    } else if (action === 'unmute') {
      if (await requestMute(controller, false)) {
        state.believedMuted = false;
        logger.info("Ad gone; unmuted");
      } else {
        logger.warning("Unmute failed; retrying next cycle");
      }
    }

    state.phase = phaseAfterCycle(adPresent);
  } catch (err) {
    logger.critical("Cycle failed: " + String(err));
    state.stats.cycleErrors++;
  }
}
