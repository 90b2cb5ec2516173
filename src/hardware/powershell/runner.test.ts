import * as path from 'path';

import { PowerShellError } from '$types/errors';

import { createPowerShellRunner } from './runner';
import { buildArgs, parseScriptOutput, scriptPath, isRecord } from './helpers';
import type { ExecCallback, ExecFileFn, ExecOptions } from './types';

const config = {
  POWERSHELL_PATH: 'powershell.exe',
  POWERSHELL_TIMEOUT_MS: 15000,
  CAPTURE_MAX_BUFFER_BYTES: 1024
};

interface ExecCall {
  file: string;
  args: readonly string[];
  options: ExecOptions;
}

function fakeExec(error: Error | null, stdout: string, stderr: string): { exec: ExecFileFn; calls: ExecCall[] } {
  const calls: ExecCall[] = [];
  const exec: ExecFileFn = function(file: string, args: readonly string[], options: ExecOptions, callback: ExecCallback) {
    calls.push({ file: file, args: args, options: options });
    callback(error, stdout, stderr);
  };
  return { exec: exec, calls: calls };
}

describe('PowerShell bridge', () => {
  describe('helpers', () => {
    it('should locate scripts under resources/powershell', () => {
      const file = scriptPath('click.ps1');
      expect(path.basename(file)).toBe('click.ps1');
      expect(path.basename(path.dirname(file))).toBe('powershell');
      expect(path.basename(path.dirname(path.dirname(file)))).toBe('resources');
    });

    it('should run scripts without profile or prompts', () => {
      expect(buildArgs('C:\\x\\click.ps1', ['-X', '5'])).toEqual([
        '-NoProfile', '-NonInteractive', '-ExecutionPolicy', 'Bypass', '-File', 'C:\\x\\click.ps1', '-X', '5'
      ]);
    });

    it('should parse JSON output with surrounding whitespace', () => {
      expect(parseScriptOutput('\r\n{"matched":1}\r\n', 'audio-session.ps1')).toEqual({ matched: 1 });
    });

    it('should reject empty output', () => {
      expect(function() { parseScriptOutput('  ', 'click.ps1'); }).toThrow('click.ps1 produced no output');
    });

    it('should reject malformed output as a PowerShellError', () => {
      expect(function() { parseScriptOutput('oops', 'click.ps1'); }).toThrow(PowerShellError);
    });

    it('should recognise plain objects only', () => {
      expect(isRecord({ a: 1 })).toBe(true);
      expect(isRecord([])).toBe(false);
      expect(isRecord(null)).toBe(false);
      expect(isRecord('x')).toBe(false);
    });
  });

  describe('createPowerShellRunner', () => {
    it('should launch the configured executable with script and arguments', async () => {
      const fake = fakeExec(null, '{"ok":true}', '');
      const runner = createPowerShellRunner(config, fake.exec);

      const result = await runner.run('click.ps1', ['-X', '10', '-Y', '20']);

      expect(result).toEqual({ ok: true });
      expect(fake.calls).toHaveLength(1);
      expect(fake.calls[0].file).toBe('powershell.exe');
      expect(fake.calls[0].args.slice(-5)).toEqual([scriptPath('click.ps1'), '-X', '10', '-Y', '20']);
      expect(fake.calls[0].options).toEqual({ timeout: 15000, maxBuffer: 1024, windowsHide: true });
    });

    it('should reject with stderr when the script fails', async () => {
      const fake = fakeExec(new Error('Command failed'), '', 'Access denied\r\n');
      const runner = createPowerShellRunner(config, fake.exec);

      await expect(runner.run('audio-session.ps1', [])).rejects.toThrow('audio-session.ps1 failed: Access denied');
    });

    it('should fall back to the error message without stderr', async () => {
      const fake = fakeExec(new Error('spawn powershell.exe ENOENT'), '', '');
      const runner = createPowerShellRunner(config, fake.exec);

      await expect(runner.run('capture-screen.ps1', [])).rejects.toThrow('capture-screen.ps1 failed: spawn powershell.exe ENOENT');
    });

    it('should tag failures with the script name', async () => {
      const fake = fakeExec(null, 'not json', '');
      const runner = createPowerShellRunner(config, fake.exec);

      const error = await runner.run('click.ps1', []).catch(function(err: unknown) { return err; });

      expect(error).toBeInstanceOf(PowerShellError);
      expect(error instanceof PowerShellError ? error.script : '').toBe('click.ps1');
    });
  });
});
