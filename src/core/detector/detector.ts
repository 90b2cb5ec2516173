/**
 * Ad/state detector
 *
 * Wraps the screen matcher so that nothing it throws reaches the
 * controller: a failed capture or lookup is logged at debug level and
 * reads as "not on screen".
 */

import { fmtPoint } from '@logging';
import type { Logger } from '@logging';
import type { MatchResult, ObservedMuteState, Template } from '$types';
import type { Detector, MuteIcons, ScreenMatcher } from './types';

/**
 * Create a detector over a matcher and the (optional) mute icons
 */
export function createDetector(matcher: ScreenMatcher, icons: MuteIcons, logger: Logger): Detector {
  let frameOk = false;

  async function safeLocate(template: Template): Promise<MatchResult> {
    if (!frameOk) {
      return null;
    }
    try {
      return await matcher.locate(template);
    } catch (err) {
      logger.debug("Lookup of " + template.name + " failed: " + String(err));
      return null;
    }
  }

  async function refresh(): Promise<boolean> {
    try {
      await matcher.refresh();
      frameOk = true;
    } catch (err) {
      logger.debug("Screen capture failed: " + String(err));
      frameOk = false;
    }
    return frameOk;
  }

  async function detectAd(templates: readonly Template[]): Promise<MatchResult> {
    for (let i = 0; i < templates.length; i++) {
      const point = await safeLocate(templates[i]);
      if (point !== null) {
        logger.debug("Ad marker " + templates[i].name + " at " + fmtPoint(point));
        return point;
      }
    }
    logger.debug("No ad marker on screen");
    return null;
  }

  async function observeMuteIconState(): Promise<ObservedMuteState> {
    if (icons.muted !== null && await safeLocate(icons.muted) !== null) {
      return 'muted';
    }
    if (icons.unmuted !== null && await safeLocate(icons.unmuted) !== null) {
      return 'unmuted';
    }
    return 'unknown';
  }

  return {
    refresh: refresh,
    detectAd: detectAd,
    observeMuteIconState: observeMuteIconState
  };
}
