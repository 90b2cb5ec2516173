import { createRecordingLogger } from '$test-utils/fakes';
import { PowerShellError, StartupError } from '$types/errors';
import type { BridgeScript, PowerShellRunner } from '@hardware/powershell';

import { createNativeActuator } from './native-actuator';
import { isTargetProcess, parseSessionList, parseSetResult } from './helpers';

interface RunCall {
  script: BridgeScript;
  args: readonly string[];
}

function scriptedRunner(respond: (args: readonly string[]) => Promise<unknown>): PowerShellRunner & { calls: RunCall[] } {
  const calls: RunCall[] = [];
  return {
    calls: calls,
    run: function(script: BridgeScript, args: readonly string[]) {
      calls.push({ script: script, args: args });
      return respond(args);
    }
  };
}

const config = { TARGET_PROCESS_NAME: 'spotify.exe' };

describe('native audio session', () => {
  describe('helpers', () => {
    it('should parse a session list', () => {
      expect(parseSessionList([{ processName: 'Spotify.exe', pid: 42, muted: false }])).toEqual([
        { processName: 'Spotify.exe', pid: 42, muted: false }
      ]);
    });

    it('should reject a malformed session', () => {
      expect(function() { parseSessionList([{ processName: 'x.exe' }]); }).toThrow(PowerShellError);
    });

    it('should reject a non-array list', () => {
      expect(function() { parseSessionList({}); }).toThrow('audio-session.ps1 list did not return an array');
    });

    it('should read the match count', () => {
      expect(parseSetResult({ matched: 2 })).toBe(2);
      expect(function() { parseSetResult({}); }).toThrow(PowerShellError);
    });

    it('should compare process names without case', () => {
      expect(isTargetProcess({ processName: 'Spotify.EXE', pid: 1, muted: false }, 'spotify.exe')).toBe(true);
      expect(isTargetProcess({ processName: 'chrome.exe', pid: 1, muted: false }, 'spotify.exe')).toBe(false);
    });
  });

  describe('applyMute', () => {
    it('should set the mute flag on the target session', async () => {
      const runner = scriptedRunner(function() { return Promise.resolve({ matched: 1 }); });
      const actuator = createNativeActuator(runner, config, createRecordingLogger());

      expect(await actuator.applyMute(true)).toBe(true);
      expect(runner.calls).toEqual([{
        script: 'audio-session.ps1',
        args: ['-Action', 'set', '-ProcessName', 'spotify.exe', '-Mute', 'true']
      }]);
    });

    it('should pass false when unmuting', async () => {
      const runner = scriptedRunner(function() { return Promise.resolve({ matched: 1 }); });
      const actuator = createNativeActuator(runner, config, createRecordingLogger());

      await actuator.applyMute(false);

      expect(runner.calls[0].args[5]).toBe('false');
    });

    it('should report failure when no session matches', async () => {
      const logger = createRecordingLogger();
      const runner = scriptedRunner(function() { return Promise.resolve({ matched: 0 }); });
      const actuator = createNativeActuator(runner, config, logger);

      expect(await actuator.applyMute(true)).toBe(false);
      expect(logger.at(2)).toEqual(['No audio session found for spotify.exe']);
    });

    it('should resolve false instead of rejecting when the bridge fails', async () => {
      const logger = createRecordingLogger();
      const runner = scriptedRunner(function() {
        return Promise.reject(new PowerShellError('audio-session.ps1 failed: boom', 'audio-session.ps1'));
      });
      const actuator = createNativeActuator(runner, config, logger);

      expect(await actuator.applyMute(false)).toBe(false);
      expect(logger.at(2)).toEqual(['Audio session unmute failed: PowerShellError: audio-session.ps1 failed: boom']);
    });
  });

  describe('probe', () => {
    it('should pass when sessions can be listed', async () => {
      const runner = scriptedRunner(function() { return Promise.resolve([]); });
      const actuator = createNativeActuator(runner, config, createRecordingLogger());

      await expect(actuator.probe()).resolves.toBeUndefined();
      expect(runner.calls[0].args).toEqual(['-Action', 'list']);
    });

    it('should raise StartupError when the backend is unavailable', async () => {
      const runner = scriptedRunner(function() { return Promise.reject(new Error('spawn powershell.exe ENOENT')); });
      const actuator = createNativeActuator(runner, config, createRecordingLogger());

      await expect(actuator.probe()).rejects.toThrow(StartupError);
    });
  });
});
