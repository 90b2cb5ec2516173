import * as path from 'path';

import * as dotenv from 'dotenv';

import type { AdMuteUserConfig, AdMuteAppConstants, AdMuteConfig } from '$types';
import type { ValidationError } from '@validation';

export const APP_VERSION = '1.0.0';

// ─────────────────────────────────────────────────────────────
// USER CONFIGURATION
//   Everything a user might reasonably tune for detection,
//   muting, cadence, and observability. Every key can be
//   overridden by an environment variable of the same name.
// ─────────────────────────────────────────────────────────────

export const USER_CONFIG: Readonly<AdMuteUserConfig> = {
  // TARGET_PROCESS_NAME
  //   Role: Executable name of the player whose audio session is muted.
  //   Critical: Non-empty; matched case-insensitively against session process names.
  //   Recommended: Include the .exe suffix, e.g. spotify.exe.
  TARGET_PROCESS_NAME: 'spotify.exe',

  // USE_NATIVE_AUDIO
  //   Role: true = mute the player's audio session directly (Windows Core Audio).
  //         false = click the player's own volume icon on screen.
  //   Critical: Boolean only. Click muting needs both icon templates.
  //   Recommended: true locally; false over remote desktop, where the native
  //                session only affects the local machine.
  USE_NATIVE_AUDIO: true,

  // USE_MENU
  //   Role: Show the interactive key menu. false starts the muter immediately
  //         and runs until Ctrl+C, which keeps debug output readable.
  //   Critical: Boolean only.
  USE_MENU: true,

  // ASSET_ROOT
  //   Role: Directory that relative template paths below are resolved against.
  //   Critical: Non-empty.
  //   Recommended: '.' (the working directory) or an absolute install path.
  ASSET_ROOT: '.',

  // ADS_DIR
  //   Role: Directory of ad marker screenshots; every PNG or JPEG in it is one template.
  //   Critical: Must exist at startup (an empty directory only warns).
  ADS_DIR: 'assets/ads',

  // MUTED_ICON_PATH / UNMUTED_ICON_PATH
  //   Role: Screenshots of the player's volume icon in its muted / unmuted look.
  //   Critical: Either may be missing or '' (on-screen state then reads as unknown),
  //             but click muting needs both.
  MUTED_ICON_PATH: 'assets/volume/mute.png',
  UNMUTED_ICON_PATH: 'assets/volume/volume.png',

  // MATCH_CONFIDENCE
  //   Role: Minimum similarity (0-1) for a template to count as found on screen.
  //   Critical: 0.5–1.0.
  //   Recommended: 0.9; lower values start matching unrelated UI.
  MATCH_CONFIDENCE: 0.9,

  // MATCH_GRAYSCALE
  //   Role: Compare luminance only instead of the green channel.
  //   Critical: Boolean only.
  //   Recommended: true; tolerant of small color shifts in the player theme.
  MATCH_GRAYSCALE: true,

  // POLL_AD_ACTIVE_MS
  //   Role: Re-check interval while an ad is on screen.
  //   Critical: MIN_POLL_INTERVAL_MS–MAX_POLL_INTERVAL_MS and ≤ POLL_IDLE_MS.
  //   Recommended: 200–2000 ms; 500 ms catches the end of an ad promptly.
  POLL_AD_ACTIVE_MS: 500,

  // POLL_IDLE_MS
  //   Role: Re-check interval during normal playback.
  //   Critical: MIN_POLL_INTERVAL_MS–MAX_POLL_INTERVAL_MS.
  //   Recommended: 1000–10000 ms; 5000 ms keeps screen matching cheap.
  POLL_IDLE_MS: 5000,

  // POLL_PAUSED_MS
  //   Role: Check interval while paused (no detection, just waiting for resume).
  //   Critical: MIN_POLL_INTERVAL_MS–MAX_POLL_INTERVAL_MS.
  //   Recommended: 100–500 ms.
  POLL_PAUSED_MS: 200,

  // CONSOLE_ENABLED / CONSOLE_LOG_LEVEL
  //   Role: Console logging switch and its minimum level (0=DEBUG..3=CRITICAL).
  //   Recommended: 1 (INFO).
  CONSOLE_ENABLED: true,
  CONSOLE_LOG_LEVEL: 1,

  // GLOBAL_LOG_LEVEL
  //   Role: Master verbosity (0=DEBUG..3=CRITICAL); sinks never see anything below it.
  //   Recommended: 1 (INFO); 0 (DEBUG) while diagnosing detection issues.
  GLOBAL_LOG_LEVEL: 1,

  // LOG_TO_FILE / LOG_FILE_PATH / FILE_LOG_LEVEL
  //   Role: Optional append-only log file and its minimum level.
  //   Critical: LOG_FILE_PATH non-empty when LOG_TO_FILE is true.
  LOG_TO_FILE: false,
  LOG_FILE_PATH: 'logs/ad-mute.log',
  FILE_LOG_LEVEL: 0,

  // POWERSHELL_PATH / POWERSHELL_TIMEOUT_MS
  //   Role: PowerShell executable used for screen capture, clicks and audio
  //         sessions, and the per-call time limit.
  //   Critical: Non-empty path; timeout 1000–120000 ms.
  //   Recommended: powershell.exe; 15000 ms (a first call compiles helper types).
  POWERSHELL_PATH: 'powershell.exe',
  POWERSHELL_TIMEOUT_MS: 15000,
};

// ─────────────────────────────────────────────────────────────
// APPLICATION CONSTANTS
//   Internal engine constants that should rarely change.
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: Readonly<AdMuteAppConstants> = {
  // LOG_LEVELS
  //   Role: Canonical mapping of log level names to numeric codes.
  LOG_LEVELS: {
    DEBUG: 0,
    INFO: 1,
    WARNING: 2,
    CRITICAL: 3,
  },

  // IMAGE_EXTENSIONS
  //   Role: File extensions recognised as images in ADS_DIR.
  IMAGE_EXTENSIONS: ['.png', '.jpg', '.jpeg'],

  // MIN_POLL_INTERVAL_MS / MAX_POLL_INTERVAL_MS
  //   Role: Hard bounds for every poll interval.
  MIN_POLL_INTERVAL_MS: 50,
  MAX_POLL_INTERVAL_MS: 60000,

  // CAPTURE_MAX_BUFFER_BYTES
  //   Role: Largest stdout accepted from the screen capture script
  //         (base64 PNG of the whole virtual desktop).
  CAPTURE_MAX_BUFFER_BYTES: 64 * 1024 * 1024,
};

// ─────────────────────────────────────────────────────────────
// LOADING
// ─────────────────────────────────────────────────────────────

/**
 * Result of reading configuration from the environment
 */
export interface ConfigLoadResult {
  config: AdMuteConfig;
  /** Environment values that could not be parsed; the default was kept */
  problems: ValidationError[];
}

type EnvSource = Record<string, string | undefined>;

/**
 * Load a .env file into process.env (values in the file win)
 * @param envPath - Path of the .env file; a missing file is ignored
 */
export function loadDotenv(envPath: string): void {
  dotenv.config({ path: path.resolve(envPath), override: true });
}

function readString(env: EnvSource, key: keyof AdMuteUserConfig, fallback: string): string {
  const raw = env[key];
  return raw === undefined ? fallback : raw.trim();
}

function readBoolean(env: EnvSource, key: keyof AdMuteUserConfig, fallback: boolean, problems: ValidationError[]): boolean {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = raw.trim().toLowerCase();
  if (value === 'true' || value === '1' || value === 'yes') {
    return true;
  }
  if (value === 'false' || value === '0' || value === 'no') {
    return false;
  }
  problems.push({ level: 'CRITICAL', field: key, message: key + ' must be true or false (got "' + raw + '")' });
  return fallback;
}

function readNumber(env: EnvSource, key: keyof AdMuteUserConfig, fallback: number, problems: ValidationError[]): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw.trim());
  if (!Number.isFinite(value)) {
    problems.push({ level: 'CRITICAL', field: key, message: key + ' must be a number (got "' + raw + '")' });
    return fallback;
  }
  return value;
}

/**
 * Build the configuration from defaults, environment and explicit overrides
 *
 * Precedence: overrides (CLI flags) > environment > USER_CONFIG defaults.
 * The returned config object is frozen and is passed by reference to
 * every component; nothing reads the environment after this point.
 *
 * @param env - Environment variables (usually process.env after loadDotenv)
 * @param overrides - Values that win over everything else
 */
export function loadConfig(env: EnvSource, overrides?: Partial<AdMuteUserConfig>): ConfigLoadResult {
  const problems: ValidationError[] = [];
  const d = USER_CONFIG;

  const fromEnv: AdMuteUserConfig = {
    TARGET_PROCESS_NAME: readString(env, 'TARGET_PROCESS_NAME', d.TARGET_PROCESS_NAME),
    USE_NATIVE_AUDIO: readBoolean(env, 'USE_NATIVE_AUDIO', d.USE_NATIVE_AUDIO, problems),
    USE_MENU: readBoolean(env, 'USE_MENU', d.USE_MENU, problems),
    ASSET_ROOT: readString(env, 'ASSET_ROOT', d.ASSET_ROOT),
    ADS_DIR: readString(env, 'ADS_DIR', d.ADS_DIR),
    MUTED_ICON_PATH: readString(env, 'MUTED_ICON_PATH', d.MUTED_ICON_PATH),
    UNMUTED_ICON_PATH: readString(env, 'UNMUTED_ICON_PATH', d.UNMUTED_ICON_PATH),
    MATCH_CONFIDENCE: readNumber(env, 'MATCH_CONFIDENCE', d.MATCH_CONFIDENCE, problems),
    MATCH_GRAYSCALE: readBoolean(env, 'MATCH_GRAYSCALE', d.MATCH_GRAYSCALE, problems),
    POLL_AD_ACTIVE_MS: readNumber(env, 'POLL_AD_ACTIVE_MS', d.POLL_AD_ACTIVE_MS, problems),
    POLL_IDLE_MS: readNumber(env, 'POLL_IDLE_MS', d.POLL_IDLE_MS, problems),
    POLL_PAUSED_MS: readNumber(env, 'POLL_PAUSED_MS', d.POLL_PAUSED_MS, problems),
    CONSOLE_ENABLED: readBoolean(env, 'CONSOLE_ENABLED', d.CONSOLE_ENABLED, problems),
    CONSOLE_LOG_LEVEL: readNumber(env, 'CONSOLE_LOG_LEVEL', d.CONSOLE_LOG_LEVEL, problems),
    GLOBAL_LOG_LEVEL: readNumber(env, 'GLOBAL_LOG_LEVEL', d.GLOBAL_LOG_LEVEL, problems),
    LOG_TO_FILE: readBoolean(env, 'LOG_TO_FILE', d.LOG_TO_FILE, problems),
    LOG_FILE_PATH: readString(env, 'LOG_FILE_PATH', d.LOG_FILE_PATH),
    FILE_LOG_LEVEL: readNumber(env, 'FILE_LOG_LEVEL', d.FILE_LOG_LEVEL, problems),
    POWERSHELL_PATH: readString(env, 'POWERSHELL_PATH', d.POWERSHELL_PATH),
    POWERSHELL_TIMEOUT_MS: readNumber(env, 'POWERSHELL_TIMEOUT_MS', d.POWERSHELL_TIMEOUT_MS, problems),
  };

  const config: AdMuteConfig = Object.freeze(Object.assign({}, APP_CONSTANTS, fromEnv, overrides));

  return { config: config, problems: problems };
}

/**
 * Resolve a configured path against ASSET_ROOT (absolute paths pass through)
 */
export function resolveAssetPath(config: AdMuteConfig, configured: string): string {
  return path.resolve(config.ASSET_ROOT, configured);
}
