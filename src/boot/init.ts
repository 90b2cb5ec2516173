/**
 * Application initialization
 *
 * Every fatal startup condition surfaces here, before the loop starts:
 * invalid configuration, a missing template directory, an unusable
 * actuator backend.
 */

import { createDetector } from '@core/detector';
import type { MuteIcons } from '@core/detector';
import { createWorkerSearch } from '@core/template-match';
import type { TemplateSearch } from '@core/template-match';
import { createClickActuator, createNativeActuator } from '@hardware/audio';
import type { MuteActuator } from '@hardware/audio';
import { createPowerShellRunner } from '@hardware/powershell';
import type { PowerShellRunner } from '@hardware/powershell';
import { createScreenMatcher } from '@hardware/screen';
import { loadAdTemplates, loadOptionalTemplate } from '@hardware/templates';
import { createConsoleSink, createFileSink, createLogger, toLogLevel } from '@logging';
import type { ConsoleAPI, InitMessage, LogLevel, Logger, SinkWithLevel } from '@logging';
import { createMuteController, formatStats } from '@system/control';
import { logDiagnoseReport, runDiagnose } from '@system/diagnose';
import { ConfigValidationError } from '$types/errors';
import type { AdMuteConfig } from '$types';
import { createWaiter, nowMs } from '@utils/time';
import { validateConfig } from '@validation';
import type { ValidationError, ValidationWarning } from '@validation';

import { APP_VERSION, resolveAssetPath } from './config';
import type { App, InitDeps, InitOptions } from './types';

function levelOf(value: number): LogLevel {
  return toLogLevel(value) ?? 1;
}

/**
 * Resolve an icon path; '' stays '' (icon not configured)
 */
function iconPath(config: AdMuteConfig, configured: string): string {
  return configured === '' ? '' : resolveAssetPath(config, configured);
}

/**
 * Build the logger and its sinks from configuration
 */
export function createAppLogger(config: AdMuteConfig, consoleApi: ConsoleAPI, timeSource: () => number): Logger {
  const sinks: SinkWithLevel[] = [];

  if (config.CONSOLE_ENABLED) {
    sinks.push({ sink: createConsoleSink(consoleApi, { colors: true }), minLevel: levelOf(config.CONSOLE_LOG_LEVEL) });
  }
  if (config.LOG_TO_FILE) {
    sinks.push({ sink: createFileSink({ path: config.LOG_FILE_PATH }), minLevel: levelOf(config.FILE_LOG_LEVEL) });
  }

  return createLogger({ level: levelOf(config.GLOBAL_LOG_LEVEL) }, { timeSource: timeSource, sinks: sinks }, config.LOG_LEVELS);
}

/**
 * Validate configuration, merging in environment values that failed to parse
 * @throws {ConfigValidationError} Listing every invalid field
 */
export function checkConfig(config: AdMuteConfig, problems: ValidationError[]): ValidationWarning[] {
  const validation = validateConfig(config);
  const errors = problems.concat(validation.errors);

  if (errors.length > 0) {
    const lines = errors.map(function(err) { return "  [" + err.field + "]: " + err.message; });
    throw new ConfigValidationError(
      "Invalid configuration\n" + lines.join("\n"),
      errors.map(function(err) { return err.field; })
    );
  }

  return validation.warnings;
}

/**
 * Pick the mute strategy named by USE_NATIVE_AUDIO
 */
export function selectActuator(
  config: AdMuteConfig,
  runner: PowerShellRunner,
  icons: MuteIcons,
  search: TemplateSearch,
  logger: Logger
): MuteActuator {
  if (config.USE_NATIVE_AUDIO) {
    return createNativeActuator(runner, config, logger);
  }
  return createClickActuator(createScreenMatcher(runner, config, search), icons, runner, logger);
}

/**
 * Start everything up to (not including) the loop
 *
 * @param config - Frozen configuration from loadConfig
 * @param problems - Environment values loadConfig could not parse
 * @throws {ConfigValidationError} Invalid configuration
 * @throws {StartupError} Missing template directory or unusable actuator
 */
export async function initialize(
  config: AdMuteConfig,
  problems: ValidationError[],
  options: InitOptions,
  deps?: InitDeps
): Promise<App> {
  const warnings = checkConfig(config, problems);

  const timeSource = deps?.timeSource ?? nowMs;
  const logger = createAppLogger(config, deps?.consoleApi ?? console, timeSource);

  logger.initialize(function(_success: boolean, messages: InitMessage[]) {
    for (let i = 0; i < messages.length; i++) {
      if (!messages[i].success) {
        console.warn('[WARNING]  ' + messages[i].message);
      }
    }
  });

  logger.info("ad-mute v" + APP_VERSION);
  warnings.forEach(function(warn) {
    logger.warning("[" + warn.field + "]: " + warn.message);
  });

  const search = deps?.search ?? createWorkerSearch(logger);

  try {
    const templateSet = await loadAdTemplates(resolveAssetPath(config, config.ADS_DIR), config, logger);
    const icons: MuteIcons = {
      muted: await loadOptionalTemplate(iconPath(config, config.MUTED_ICON_PATH), config.MATCH_GRAYSCALE, "muted icon", logger),
      unmuted: await loadOptionalTemplate(iconPath(config, config.UNMUTED_ICON_PATH), config.MATCH_GRAYSCALE, "unmuted icon", logger)
    };

    const runner = deps?.runner ?? createPowerShellRunner(config);
    const actuator = selectActuator(config, runner, icons, search, logger);
    if (options.probeActuator) {
      await actuator.probe();
    }

    const detector = createDetector(createScreenMatcher(runner, config, search), icons, logger);
    const controller = createMuteController({
      config: config,
      logger: logger,
      detector: detector,
      actuator: actuator,
      waiter: deps?.waiter ?? createWaiter(),
      templates: templateSet.templates,
      timeSource: timeSource
    });

    logger.info("Target: " + config.TARGET_PROCESS_NAME + " | Mute: " + actuator.name +
      " | Poll: " + config.POLL_AD_ACTIVE_MS + "ms ad / " + config.POLL_IDLE_MS + "ms idle");
    logger.info("Templates: " + templateSet.templates.length + " ad | icons muted=" + (icons.muted !== null ? "yes" : "no") +
      " unmuted=" + (icons.unmuted !== null ? "yes" : "no"));

    return {
      config: config,
      logger: logger,
      runner: runner,
      templateSet: templateSet,
      icons: icons,
      search: search,
      actuator: actuator,
      controller: controller
    };
  } catch (err) {
    logger.critical("Startup failed: " + (err instanceof Error ? err.message : String(err)));
    await search.close();
    await logger.close();
    throw err;
  }
}

/**
 * Run the one-shot diagnostics with a matcher of its own
 */
export async function diagnose(app: App): Promise<void> {
  const report = await runDiagnose({
    targetProcess: app.config.TARGET_PROCESS_NAME,
    strategy: app.actuator.name,
    runner: app.runner,
    detector: createDetector(createScreenMatcher(app.runner, app.config, app.search), app.icons, app.logger),
    icons: app.icons,
    templateSet: app.templateSet
  });
  logDiagnoseReport(report, app.logger);
}

/**
 * Stop the loop (unmuting if needed), stop the match worker, report statistics, close sinks
 */
export async function shutdown(app: App, timeSource?: () => number): Promise<void> {
  await app.controller.stop();
  await app.search.close();
  const state = app.controller.getState();
  const now = timeSource ?? nowMs;
  app.logger.info(formatStats(state.stats, now() - state.startTime));
  app.logger.info("Muter stopped");
  await app.logger.close();
}
