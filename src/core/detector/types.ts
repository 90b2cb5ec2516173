/**
 * Ad/state detector type definitions
 */

import type { MatchResult, ObservedMuteState, Template } from '$types';

/**
 * Screen matching primitive
 *
 * `refresh` grabs one frame of the screen; `locate` searches the most
 * recent frame. Either may throw; the detector absorbs those errors.
 */
export interface ScreenMatcher {
  refresh(): Promise<void>;
  locate(template: Template): Promise<MatchResult>;
}

/**
 * The player's volume icon in both looks; either may be missing
 */
export interface MuteIcons {
  muted: Template | null;
  unmuted: Template | null;
}

/**
 * Per-cycle questions about what is on screen
 */
export interface Detector {
  /**
   * Grab the frame this cycle's lookups run against
   * @returns false when the capture failed (every lookup then misses)
   */
  refresh(): Promise<boolean>;
  /** First template (in priority order) found on screen, or null */
  detectAd(templates: readonly Template[]): Promise<MatchResult>;
  observeMuteIconState(): Promise<ObservedMuteState>;
}
