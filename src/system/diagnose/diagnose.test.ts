import { createFakeScreen, createRecordingLogger, fakeTemplate } from '$test-utils/fakes';
import { createDetector } from '@core/detector';
import type { BridgeScript, PowerShellRunner } from '@hardware/powershell';

import { logDiagnoseReport, runDiagnose } from './diagnose';
import type { DiagnoseReport } from './types';

function sessionRunner(result: Promise<unknown>): PowerShellRunner & { scripts: BridgeScript[] } {
  const scripts: BridgeScript[] = [];
  return {
    scripts: scripts,
    run: function(script: BridgeScript) {
      scripts.push(script);
      return result;
    }
  };
}

const icons = { muted: fakeTemplate('mute.png'), unmuted: fakeTemplate('volume.png') };
const templateSet = {
  templates: [fakeTemplate('a-banner.png'), fakeTemplate('b-video.png')],
  skipped: ['c-photo.jpg']
};

describe('diagnose', () => {
  describe('runDiagnose', () => {
    it('should report sessions, screen state and per-template matches', async () => {
      const screen = createFakeScreen();
      screen.visible.set('volume.png', { x: 1, y: 1 });
      screen.visible.set('b-video.png', { x: 300, y: 400 });
      const runner = sessionRunner(Promise.resolve([
        { processName: 'Spotify.exe', pid: 7, muted: false },
        { processName: 'chrome.exe', pid: 8, muted: false }
      ]));

      const report = await runDiagnose({
        targetProcess: 'spotify.exe',
        strategy: 'native audio session',
        runner: runner,
        detector: createDetector(screen, icons, createRecordingLogger()),
        icons: icons,
        templateSet: templateSet
      });

      expect(report).toEqual({
        strategy: 'native audio session',
        targetProcess: 'spotify.exe',
        sessions: [
          { processName: 'Spotify.exe', pid: 7, muted: false },
          { processName: 'chrome.exe', pid: 8, muted: false }
        ],
        sessionsError: null,
        targetSessionFound: true,
        screenCaptured: true,
        onScreenState: 'unmuted',
        iconsLoaded: { muted: true, unmuted: true },
        adTemplateCount: 2,
        skippedTemplates: ['c-photo.jpg'],
        templates: [
          { name: 'a-banner.png', point: null },
          { name: 'b-video.png', point: { x: 300, y: 400 } }
        ]
      });
      expect(runner.scripts).toEqual(['audio-session.ps1']);
    });

    it('should keep going when sessions cannot be listed', async () => {
      const runner = sessionRunner(Promise.reject(new Error('no backend')));

      const report = await runDiagnose({
        targetProcess: 'spotify.exe',
        strategy: 'volume icon click',
        runner: runner,
        detector: createDetector(createFakeScreen(), icons, createRecordingLogger()),
        icons: icons,
        templateSet: templateSet
      });

      expect(report.sessions).toBeNull();
      expect(report.sessionsError).toBe('Error: no backend');
      expect(report.targetSessionFound).toBe(false);
      expect(report.onScreenState).toBe('unknown');
    });
  });

  describe('logDiagnoseReport', () => {
    const base: DiagnoseReport = {
      strategy: 'native audio session',
      targetProcess: 'spotify.exe',
      sessions: [{ processName: 'Spotify.exe', pid: 7, muted: false }],
      sessionsError: null,
      targetSessionFound: true,
      screenCaptured: true,
      onScreenState: 'muted',
      iconsLoaded: { muted: true, unmuted: false },
      adTemplateCount: 1,
      skippedTemplates: [],
      templates: [{ name: 'a-banner.png', point: { x: 10, y: 20 } }]
    };

    it('should log one line per finding', () => {
      const logger = createRecordingLogger();

      logDiagnoseReport(base, logger);

      expect(logger.at(1)).toEqual([
        '--- DIAGNOSE START ---',
        'Mute method: native audio session',
        'Active audio sessions: Spotify.exe',
        'spotify.exe audio session found: yes',
        'On-screen mute state: MUTED (mute icon visible)',
        'Volume icons loaded: muted=yes, unmuted=no',
        'Ad templates loaded: 1',
        '  FOUND a-banner.png at (10, 20)',
        '--- DIAGNOSE END ---'
      ]);
      expect(logger.at(2)).toHaveLength(0);
    });

    it('should warn about missing sessions, capture and screen state', () => {
      const logger = createRecordingLogger();

      logDiagnoseReport({
        ...base,
        sessions: null,
        sessionsError: 'Error: no backend',
        screenCaptured: false,
        onScreenState: 'unknown',
        templates: [{ name: 'a-banner.png', point: null }]
      }, logger);

      expect(logger.at(2)).toEqual([
        'Audio sessions unavailable: Error: no backend',
        'Screen capture failed; on-screen checks skipped',
        'On-screen mute state: UNKNOWN (neither icon found; is the player visible?)'
      ]);
      expect(logger.at(1)).toContain('No ad templates matched on screen. Is an ad showing right now?');
    });
  });
});
