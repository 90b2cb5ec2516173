/**
 * PowerShell bridge runner
 * Screen capture, mouse clicks and audio sessions are reached through
 * small scripts run by powershell.exe; each prints one JSON document.
 */

import { execFile } from 'child_process';

import { PowerShellError } from '$types/errors';

import { buildArgs, parseScriptOutput, scriptPath } from './helpers';
import type { BridgeScript, ExecCallback, ExecFileFn, ExecOptions, PowerShellRunner, PowerShellRunnerConfig } from './types';

/**
 * execFile with text output
 */
export function nodeExecFile(file: string, args: readonly string[], options: ExecOptions, callback: ExecCallback): void {
  execFile(file, args, {
    timeout: options.timeout,
    maxBuffer: options.maxBuffer,
    windowsHide: options.windowsHide,
    encoding: 'utf8'
  }, callback);
}

/**
 * Create a runner bound to the configured PowerShell executable
 * @param config - Executable path, timeout and output limit
 * @param exec - Process launcher; defaults to child_process.execFile
 */
export function createPowerShellRunner(config: PowerShellRunnerConfig, exec?: ExecFileFn): PowerShellRunner {
  const launch = exec ?? nodeExecFile;

  function run(script: BridgeScript, args: readonly string[]): Promise<unknown> {
    const options: ExecOptions = {
      timeout: config.POWERSHELL_TIMEOUT_MS,
      maxBuffer: config.CAPTURE_MAX_BUFFER_BYTES,
      windowsHide: true
    };

    return new Promise(function(resolve, reject) {
      launch(config.POWERSHELL_PATH, buildArgs(scriptPath(script), args), options, function(error, stdout, stderr) {
        if (error !== null) {
          const detail = stderr.trim().length > 0 ? stderr.trim() : error.message;
          reject(new PowerShellError(script + " failed: " + detail, script));
          return;
        }
        try {
          resolve(parseScriptOutput(stdout, script));
        } catch (err) {
          reject(err);
        }
      });
    });
  }

  return {
    run: run
  };
}
