/**
 * Type definition for ad-mute configuration
 */

import type { LogLevels } from '@logging';

/**
 * User-configurable settings
 * Everything a user might reasonably tune for detection, muting, cadence, and observability
 */
export interface AdMuteUserConfig {
  // ───────── TARGET PLAYER ─────────
  readonly TARGET_PROCESS_NAME: string;
  readonly USE_NATIVE_AUDIO: boolean;
  readonly USE_MENU: boolean;

  // ───────── TEMPLATES ─────────
  readonly ASSET_ROOT: string;
  readonly ADS_DIR: string;
  readonly MUTED_ICON_PATH: string;
  readonly UNMUTED_ICON_PATH: string;

  // ───────── MATCHING ─────────
  readonly MATCH_CONFIDENCE: number;
  readonly MATCH_GRAYSCALE: boolean;

  // ───────── CADENCE ─────────
  readonly POLL_AD_ACTIVE_MS: number;
  readonly POLL_IDLE_MS: number;
  readonly POLL_PAUSED_MS: number;

  // ───────── LOGGING ─────────
  readonly CONSOLE_ENABLED: boolean;
  readonly CONSOLE_LOG_LEVEL: number;
  readonly GLOBAL_LOG_LEVEL: number;
  readonly LOG_TO_FILE: boolean;
  readonly LOG_FILE_PATH: string;
  readonly FILE_LOG_LEVEL: number;

  // ───────── POWERSHELL BRIDGE ─────────
  readonly POWERSHELL_PATH: string;
  readonly POWERSHELL_TIMEOUT_MS: number;
}

/**
 * Application constants
 * Internal engine constants that should rarely change
 */
export interface AdMuteAppConstants {
  readonly LOG_LEVELS: LogLevels;
  readonly IMAGE_EXTENSIONS: readonly string[];
  readonly MIN_POLL_INTERVAL_MS: number;
  readonly MAX_POLL_INTERVAL_MS: number;
  readonly CAPTURE_MAX_BUFFER_BYTES: number;
}

/**
 * Complete configuration (user config + app constants)
 */
export type AdMuteConfig = AdMuteUserConfig & AdMuteAppConstants;
