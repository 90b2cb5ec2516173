/**
 * Mute actuator type definitions
 */

/**
 * Applies a mute state to the player
 *
 * applyMute never rejects: false means "not applied, try again later".
 */
export interface MuteActuator {
  /** Strategy name for logs ("native audio session", "volume icon click") */
  readonly name: string;
  applyMute(target: boolean): Promise<boolean>;
  /**
   * Check the backend is usable before the loop starts
   * @throws {StartupError} When it is not
   */
  probe(): Promise<void>;
}

/**
 * One audio session as reported by audio-session.ps1
 */
export interface AudioSession {
  processName: string;
  pid: number;
  muted: boolean;
}

export interface AudioConfig {
  TARGET_PROCESS_NAME: string;
}
