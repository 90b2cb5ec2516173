/**
 * Volume icon click muting
 * Mutes by clicking the player's unmuted volume icon, unmutes by clicking
 * the muted one. Works where native sessions do not (remote desktop).
 */

import type { MuteIcons, ScreenMatcher } from '@core/detector';
import type { PowerShellRunner } from '@hardware/powershell';
import { fmtPoint } from '@logging';
import type { Logger } from '@logging';
import { StartupError } from '$types/errors';

import type { MuteActuator } from './types';

export function createClickActuator(
  matcher: ScreenMatcher,
  icons: MuteIcons,
  runner: PowerShellRunner,
  logger: Logger
): MuteActuator {
  async function applyMute(mute: boolean): Promise<boolean> {
    const icon = mute ? icons.unmuted : icons.muted;
    if (icon === null) {
      logger.warning("Cannot click to " + (mute ? "mute" : "unmute") + ": icon template not loaded");
      return false;
    }

    try {
      await matcher.refresh();
      const point = await matcher.locate(icon);
      if (point === null) {
        logger.warning("Volume icon " + icon.name + " not found on screen");
        return false;
      }
      await runner.run('click.ps1', ['-X', String(point.x), '-Y', String(point.y)]);
      logger.debug("Clicked " + icon.name + " at " + fmtPoint(point));
      return true;
    } catch (err) {
      logger.warning("Volume icon click failed: " + String(err));
      return false;
    }
  }

  async function probe(): Promise<void> {
    if (icons.muted === null || icons.unmuted === null) {
      throw new StartupError("Click muting needs both volume icon templates");
    }
    try {
      await matcher.refresh();
    } catch (err) {
      throw new StartupError("Screen capture unavailable: " + String(err));
    }
  }

  return {
    name: "volume icon click",
    applyMute: applyMute,
    probe: probe
  };
}
