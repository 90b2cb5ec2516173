/**
 * Audio session helpers
 */

import { isRecord } from '@hardware/powershell';
import type { PowerShellRunner } from '@hardware/powershell';
import { PowerShellError } from '$types/errors';

import type { AudioSession } from './types';

/**
 * Validate the session list written by audio-session.ps1
 * @throws {PowerShellError} On an unexpected shape
 */
export function parseSessionList(value: unknown): AudioSession[] {
  if (!Array.isArray(value)) {
    throw new PowerShellError("audio-session.ps1 list did not return an array", 'audio-session.ps1');
  }
  return value.map(function(entry: unknown): AudioSession {
    if (!isRecord(entry) || typeof entry.processName !== 'string' || typeof entry.pid !== 'number' ||
        typeof entry.muted !== 'boolean') {
      throw new PowerShellError("audio-session.ps1 list returned a malformed session", 'audio-session.ps1');
    }
    return { processName: entry.processName, pid: entry.pid, muted: entry.muted };
  });
}

/**
 * Number of sessions changed by a set call
 * @throws {PowerShellError} On an unexpected shape
 */
export function parseSetResult(value: unknown): number {
  if (!isRecord(value) || typeof value.matched !== 'number') {
    throw new PowerShellError("audio-session.ps1 set returned no match count", 'audio-session.ps1');
  }
  return value.matched;
}

/**
 * Case-insensitive process name comparison
 */
export function isTargetProcess(session: AudioSession, target: string): boolean {
  return session.processName.toLowerCase() === target.toLowerCase();
}

/**
 * List the audio sessions on the default playback device
 */
export async function listAudioSessions(runner: PowerShellRunner): Promise<AudioSession[]> {
  return parseSessionList(await runner.run('audio-session.ps1', ['-Action', 'list']));
}
