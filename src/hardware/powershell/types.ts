/**
 * PowerShell bridge type definitions
 */

/**
 * Bridge scripts shipped in resources/powershell
 */
export type BridgeScript = 'capture-screen.ps1' | 'click.ps1' | 'audio-session.ps1';

/**
 * Runs one bridge script and returns its parsed JSON output
 */
export interface PowerShellRunner {
  run(script: BridgeScript, args: readonly string[]): Promise<unknown>;
}

export interface PowerShellRunnerConfig {
  POWERSHELL_PATH: string;
  POWERSHELL_TIMEOUT_MS: number;
  CAPTURE_MAX_BUFFER_BYTES: number;
}

export interface ExecOptions {
  timeout: number;
  maxBuffer: number;
  windowsHide: boolean;
}

export type ExecCallback = (error: Error | null, stdout: string, stderr: string) => void;

/**
 * Process launcher (child_process.execFile in production)
 */
export type ExecFileFn = (file: string, args: readonly string[], options: ExecOptions, callback: ExecCallback) => void;
