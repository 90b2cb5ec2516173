/**
 * Tests for startup and shutdown
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { PNG } from 'pngjs';

import { createScriptedWaiter } from '$test-utils/fakes';
import type { BridgeScript, PowerShellRunner } from '@hardware/powershell';
import type { TemplateSearch } from '@core/template-match';
import type { ConsoleAPI } from '@logging';
import { ConfigValidationError, StartupError } from '$types/errors';
import type { AdMuteUserConfig } from '$types';

import { loadConfig } from './config';
import { checkConfig, initialize, shutdown } from './init';

function writePng(file: string): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, PNG.sync.write(new PNG({ width: 2, height: 2 })));
}

function createCountingSearch(): TemplateSearch & { closed: number } {
  const search = {
    closed: 0,
    find: function() { return Promise.resolve(null); },
    close: function() {
      search.closed++;
      return Promise.resolve();
    }
  };
  return search;
}

function createRecordingConsole(): ConsoleAPI & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines: lines,
    log: function(message: string) { lines.push(message); },
    warn: function(message: string) { lines.push(message); }
  };
}

function createFakeRunner(sessions: unknown): PowerShellRunner & { calls: BridgeScript[] } {
  const calls: BridgeScript[] = [];
  return {
    calls: calls,
    run: function(script: BridgeScript) {
      calls.push(script);
      if (script === 'audio-session.ps1') {
        return sessions instanceof Error ? Promise.reject(sessions) : Promise.resolve(sessions);
      }
      return Promise.reject(new Error(script + ' not scripted'));
    }
  };
}

describe('init', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ad-mute-init-'));
    writePng(path.join(dir, 'assets', 'ads', 'banner.png'));
    writePng(path.join(dir, 'assets', 'volume', 'mute.png'));
    writePng(path.join(dir, 'assets', 'volume', 'volume.png'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function configFor(overrides?: Partial<AdMuteUserConfig>) {
    return loadConfig({ ASSET_ROOT: dir }, overrides);
  }

  describe('checkConfig', () => {
    it('should return warnings for a usable configuration', () => {
      const loaded = configFor({ TARGET_PROCESS_NAME: 'player' });

      const warnings = checkConfig(loaded.config, loaded.problems);

      expect(warnings).toHaveLength(1);
      expect(warnings[0].field).toBe('TARGET_PROCESS_NAME');
    });

    it('should throw listing every bad field', () => {
      const loaded = loadConfig({ ASSET_ROOT: dir, USE_MENU: 'maybe' }, { POLL_AD_ACTIVE_MS: 9000 });

      let caught: unknown = null;
      try {
        checkConfig(loaded.config, loaded.problems);
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(ConfigValidationError);
      if (caught instanceof ConfigValidationError) {
        expect(caught.fields).toEqual(['USE_MENU', 'POLL_AD_ACTIVE_MS']);
        expect(caught.message.split('\n')[0]).toBe('Invalid configuration');
        expect(caught.message).toContain('  [USE_MENU]: USE_MENU must be true or false (got "maybe")');
      }
    });
  });

  describe('initialize', () => {
    it('should build the app and log the banner', async () => {
      const loaded = configFor();
      const consoleApi = createRecordingConsole();
      const runner = createFakeRunner([{ processName: 'spotify.exe', pid: 42, muted: false }]);

      const app = await initialize(loaded.config, loaded.problems, { probeActuator: true }, {
        runner: runner,
        consoleApi: consoleApi,
        waiter: createScriptedWaiter(),
        timeSource: function() { return 0; }
      });

      expect(app.templateSet.templates.map(function(t) { return t.name; })).toEqual(['banner.png']);
      expect(app.icons.muted).not.toBeNull();
      expect(app.icons.unmuted).not.toBeNull();
      expect(app.actuator.name).toBe('native audio session');
      expect(runner.calls).toEqual(['audio-session.ps1']);
      expect(app.controller.isEnabled()).toBe(false);

      const text = consoleApi.lines.join('\n');
      expect(text).toContain('ad-mute v1.0.0');
      expect(text).toContain('Target: spotify.exe | Mute: native audio session | Poll: 500ms ad / 5000ms idle');
      expect(text).toContain('Templates: 1 ad | icons muted=yes unmuted=yes');
    });

    it('should pick the click strategy when native audio is off', async () => {
      const loaded = configFor({ USE_NATIVE_AUDIO: false });
      const runner = createFakeRunner([]);

      const app = await initialize(loaded.config, loaded.problems, { probeActuator: false }, {
        runner: runner,
        consoleApi: createRecordingConsole(),
        waiter: createScriptedWaiter()
      });

      expect(app.actuator.name).toBe('volume icon click');
      expect(runner.calls).toHaveLength(0);
    });

    it('should fail when the ads directory is missing', async () => {
      const loaded = configFor({ ADS_DIR: 'nowhere' });
      const consoleApi = createRecordingConsole();
      const search = createCountingSearch();

      await expect(initialize(loaded.config, loaded.problems, { probeActuator: false }, {
        runner: createFakeRunner([]),
        search: search,
        consoleApi: consoleApi
      })).rejects.toBeInstanceOf(StartupError);

      expect(consoleApi.lines.join('\n')).toContain('Startup failed: Ad template directory not found: ');
      expect(search.closed).toBe(1);
    });

    it('should fail when the audio backend cannot be reached', async () => {
      const loaded = configFor();

      await expect(initialize(loaded.config, loaded.problems, { probeActuator: true }, {
        runner: createFakeRunner(new Error('powershell.exe not found')),
        consoleApi: createRecordingConsole()
      })).rejects.toThrow('Native audio backend unavailable: Error: powershell.exe not found');
    });

    it('should reject invalid configuration before touching the assets', async () => {
      const loaded = configFor({ ADS_DIR: '' });
      const runner = createFakeRunner([]);

      await expect(initialize(loaded.config, loaded.problems, { probeActuator: true }, {
        runner: runner,
        consoleApi: createRecordingConsole()
      })).rejects.toBeInstanceOf(ConfigValidationError);

      expect(runner.calls).toHaveLength(0);
    });
  });

  describe('shutdown', () => {
    it('should stop the controller, close the search and log statistics', async () => {
      const loaded = configFor();
      const consoleApi = createRecordingConsole();
      const search = createCountingSearch();
      const app = await initialize(loaded.config, loaded.problems, { probeActuator: false }, {
        runner: createFakeRunner([]),
        search: search,
        consoleApi: consoleApi,
        waiter: createScriptedWaiter(),
        timeSource: function() { return 0; }
      });

      await shutdown(app, function() { return 120000; });

      const text = consoleApi.lines.join('\n');
      expect(text).toContain('Uptime 2m, cycles 0, ads 0, mutes 0, unmutes 0, failures 0, corrections 0, errors 0');
      expect(text).toContain('Muter stopped');
      expect(app.controller.getState().alive).toBe(false);
      expect(search.closed).toBe(1);
    });
  });
});
