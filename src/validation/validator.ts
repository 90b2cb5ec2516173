import {
  addError,
  addWarning,
  validateBoolean,
  validateIntegerRange,
  validateLogLevel,
  validateNonEmptyString,
  validateNumberRange
} from './helpers';

import type { AdMuteConfig } from '$types';
import type { ValidationResult, ValidationError, ValidationWarning } from './types';

/**
 * Validate the merged configuration
 *
 * Errors abort startup; warnings are logged and startup continues.
 */
export function validateConfig(config: AdMuteConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  // Target player
  validateNonEmptyString(config.TARGET_PROCESS_NAME, 'TARGET_PROCESS_NAME', errors);
  if (typeof config.TARGET_PROCESS_NAME === 'string' && config.TARGET_PROCESS_NAME.trim().length > 0 &&
      !config.TARGET_PROCESS_NAME.toLowerCase().endsWith('.exe')) {
    addWarning(warnings, 'TARGET_PROCESS_NAME', 'TARGET_PROCESS_NAME usually ends in .exe (got ' + config.TARGET_PROCESS_NAME + ')');
  }
  validateBoolean(config.USE_NATIVE_AUDIO, 'USE_NATIVE_AUDIO', errors);
  validateBoolean(config.USE_MENU, 'USE_MENU', errors);

  // Templates
  validateNonEmptyString(config.ASSET_ROOT, 'ASSET_ROOT', errors);
  validateNonEmptyString(config.ADS_DIR, 'ADS_DIR', errors);
  if (!config.USE_NATIVE_AUDIO && (config.MUTED_ICON_PATH === '' || config.UNMUTED_ICON_PATH === '')) {
    addError(errors, 'USE_NATIVE_AUDIO', 'Click muting needs both MUTED_ICON_PATH and UNMUTED_ICON_PATH');
  }

  // Matching
  validateNumberRange(config.MATCH_CONFIDENCE, 'MATCH_CONFIDENCE', 0.5, 1, errors, warnings, { min: 0.8, max: 0.99 });
  validateBoolean(config.MATCH_GRAYSCALE, 'MATCH_GRAYSCALE', errors);

  // Cadence
  const minPoll = config.MIN_POLL_INTERVAL_MS;
  const maxPoll = config.MAX_POLL_INTERVAL_MS;
  validateIntegerRange(config.POLL_AD_ACTIVE_MS, 'POLL_AD_ACTIVE_MS', minPoll, maxPoll, errors, warnings, { min: 200, max: 2000 });
  validateIntegerRange(config.POLL_IDLE_MS, 'POLL_IDLE_MS', minPoll, maxPoll, errors, warnings, { min: 1000, max: 10000 });
  validateIntegerRange(config.POLL_PAUSED_MS, 'POLL_PAUSED_MS', minPoll, maxPoll, errors, warnings, { min: 100, max: 500 });
  if (config.POLL_AD_ACTIVE_MS > config.POLL_IDLE_MS) {
    addError(errors, 'POLL_AD_ACTIVE_MS', 'POLL_AD_ACTIVE_MS must not exceed POLL_IDLE_MS');
  }

  // Logging
  validateBoolean(config.CONSOLE_ENABLED, 'CONSOLE_ENABLED', errors);
  validateLogLevel(config.CONSOLE_LOG_LEVEL, 'CONSOLE_LOG_LEVEL', errors);
  validateLogLevel(config.GLOBAL_LOG_LEVEL, 'GLOBAL_LOG_LEVEL', errors);
  validateLogLevel(config.FILE_LOG_LEVEL, 'FILE_LOG_LEVEL', errors);
  validateBoolean(config.LOG_TO_FILE, 'LOG_TO_FILE', errors);
  if (config.LOG_TO_FILE) {
    validateNonEmptyString(config.LOG_FILE_PATH, 'LOG_FILE_PATH', errors);
  }
  if (!config.CONSOLE_ENABLED && !config.LOG_TO_FILE) {
    addWarning(warnings, 'CONSOLE_ENABLED', 'Console and file logging are both off; nothing will be logged');
  }

  // PowerShell bridge
  validateNonEmptyString(config.POWERSHELL_PATH, 'POWERSHELL_PATH', errors);
  validateIntegerRange(config.POWERSHELL_TIMEOUT_MS, 'POWERSHELL_TIMEOUT_MS', 1000, 120000, errors, warnings, { min: 5000, max: 30000 });

  return {
    valid: errors.length === 0,
    errors: errors,
    warnings: warnings
  };
}
