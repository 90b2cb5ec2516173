/**
 * Diagnose type definitions
 */

import type { AudioSession } from '@hardware/audio';
import type { MatchResult, ObservedMuteState } from '$types';

export interface TemplateProbe {
  name: string;
  point: MatchResult;
}

/**
 * Read-only snapshot of everything the muter depends on
 */
export interface DiagnoseReport {
  strategy: string;
  targetProcess: string;
  /** null when the session list could not be read */
  sessions: AudioSession[] | null;
  sessionsError: string | null;
  targetSessionFound: boolean;
  screenCaptured: boolean;
  onScreenState: ObservedMuteState;
  iconsLoaded: { muted: boolean; unmuted: boolean };
  adTemplateCount: number;
  skippedTemplates: string[];
  templates: TemplateProbe[];
}
