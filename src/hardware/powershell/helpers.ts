/**
 * PowerShell bridge helpers
 */

import * as path from 'path';
import { fileURLToPath } from 'url';

import { PowerShellError } from '$types/errors';

import type { BridgeScript } from './types';

const SCRIPT_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../../resources/powershell');

/**
 * Absolute path of a bridge script
 */
export function scriptPath(script: BridgeScript): string {
  return path.join(SCRIPT_DIR, script);
}

/**
 * Command line for running a script non-interactively
 */
export function buildArgs(file: string, args: readonly string[]): string[] {
  return ['-NoProfile', '-NonInteractive', '-ExecutionPolicy', 'Bypass', '-File', file].concat(args);
}

/**
 * Parse the single JSON document a script writes to stdout
 * @throws {PowerShellError} On empty or malformed output
 */
export function parseScriptOutput(stdout: string, script: BridgeScript): unknown {
  const text = stdout.trim();
  if (text.length === 0) {
    throw new PowerShellError(script + " produced no output", script);
  }
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (err) {
    const preview = text.length > 80 ? text.slice(0, 80) + "..." : text;
    throw new PowerShellError(script + " returned invalid JSON (" + String(err) + "): " + preview, script);
  }
}

/**
 * Narrow an unknown value to a plain object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
