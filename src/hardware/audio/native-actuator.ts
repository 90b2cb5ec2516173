/**
 * Native audio-session muting
 * Sets the mute flag of the player's own session on the default playback device.
 */

import type { PowerShellRunner } from '@hardware/powershell';
import type { Logger } from '@logging';
import { StartupError } from '$types/errors';

import { listAudioSessions, parseSetResult } from './helpers';
import type { AudioConfig, MuteActuator } from './types';

export function createNativeActuator(runner: PowerShellRunner, config: AudioConfig, logger: Logger): MuteActuator {
  const target = config.TARGET_PROCESS_NAME;

  async function applyMute(mute: boolean): Promise<boolean> {
    try {
      const matched = parseSetResult(await runner.run('audio-session.ps1', [
        '-Action', 'set',
        '-ProcessName', target,
        '-Mute', mute ? 'true' : 'false'
      ]));
      if (matched === 0) {
        logger.warning("No audio session found for " + target);
        return false;
      }
      return true;
    } catch (err) {
      logger.warning("Audio session " + (mute ? "mute" : "unmute") + " failed: " + String(err));
      return false;
    }
  }

  async function probe(): Promise<void> {
    try {
      const sessions = await listAudioSessions(runner);
      logger.debug("Audio backend reachable, " + sessions.length + " session(s) visible");
    } catch (err) {
      throw new StartupError("Native audio backend unavailable: " + String(err));
    }
  }

  return {
    name: "native audio session",
    applyMute: applyMute,
    probe: probe
  };
}
