/**
 * One-shot diagnostics
 *
 * Reports audio-session visibility, the on-screen mute state, what was
 * loaded from disk, and which ad templates match right now. Never calls
 * an actuator.
 */

import type { Detector, MuteIcons } from '@core/detector';
import { isTargetProcess, listAudioSessions } from '@hardware/audio';
import type { AudioSession } from '@hardware/audio';
import type { PowerShellRunner } from '@hardware/powershell';
import type { TemplateSet } from '@hardware/templates';
import { fmtPoint } from '@logging';
import type { Logger } from '@logging';

import type { DiagnoseReport, TemplateProbe } from './types';

export interface DiagnoseDeps {
  targetProcess: string;
  strategy: string;
  runner: PowerShellRunner;
  /** Detector with its own matcher, separate from the running loop's */
  detector: Detector;
  icons: MuteIcons;
  templateSet: TemplateSet;
}

/**
 * Collect the report
 */
export async function runDiagnose(deps: DiagnoseDeps): Promise<DiagnoseReport> {
  let sessions: AudioSession[] | null = null;
  let sessionsError: string | null = null;
  try {
    sessions = await listAudioSessions(deps.runner);
  } catch (err) {
    sessionsError = String(err);
  }

  const screenCaptured = await deps.detector.refresh();
  const onScreenState = await deps.detector.observeMuteIconState();

  const templates: TemplateProbe[] = [];
  for (const template of deps.templateSet.templates) {
    templates.push({ name: template.name, point: await deps.detector.detectAd([template]) });
  }

  return {
    strategy: deps.strategy,
    targetProcess: deps.targetProcess,
    sessions: sessions,
    sessionsError: sessionsError,
    targetSessionFound: sessions !== null && sessions.some(function(s) { return isTargetProcess(s, deps.targetProcess); }),
    screenCaptured: screenCaptured,
    onScreenState: onScreenState,
    iconsLoaded: { muted: deps.icons.muted !== null, unmuted: deps.icons.unmuted !== null },
    adTemplateCount: deps.templateSet.templates.length,
    skippedTemplates: deps.templateSet.skipped,
    templates: templates
  };
}

/**
 * Write the report to the log, one finding per line
 */
export function logDiagnoseReport(report: DiagnoseReport, logger: Logger): void {
  logger.info("--- DIAGNOSE START ---");
  logger.info("Mute method: " + report.strategy);

  if (report.sessions === null) {
    logger.warning("Audio sessions unavailable: " + (report.sessionsError ?? "unknown error"));
  } else {
    const names = report.sessions.map(function(s) { return s.processName; });
    logger.info("Active audio sessions: " + (names.length > 0 ? names.join(", ") : "none"));
    logger.info(report.targetProcess + " audio session found: " + (report.targetSessionFound ? "yes" : "no"));
  }

  if (!report.screenCaptured) {
    logger.warning("Screen capture failed; on-screen checks skipped");
  }
  if (report.onScreenState === 'muted') {
    logger.info("On-screen mute state: MUTED (mute icon visible)");
  } else if (report.onScreenState === 'unmuted') {
    logger.info("On-screen mute state: UNMUTED (volume icon visible)");
  } else {
    logger.warning("On-screen mute state: UNKNOWN (neither icon found; is the player visible?)");
  }
  logger.info("Volume icons loaded: muted=" + (report.iconsLoaded.muted ? "yes" : "no") +
    ", unmuted=" + (report.iconsLoaded.unmuted ? "yes" : "no"));

  logger.info("Ad templates loaded: " + report.adTemplateCount);
  report.skippedTemplates.forEach(function(name) {
    logger.info("  skipped: " + name);
  });

  let anyFound = false;
  report.templates.forEach(function(probe) {
    if (probe.point !== null) {
      anyFound = true;
      logger.info("  FOUND " + probe.name + " at " + fmtPoint(probe.point));
    } else {
      logger.info("  not found: " + probe.name);
    }
  });
  if (!anyFound) {
    logger.info("No ad templates matched on screen. Is an ad showing right now?");
  }

  logger.info("--- DIAGNOSE END ---");
}
