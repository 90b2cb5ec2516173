/**
 * Screen capture helpers
 */

import { PNG } from 'pngjs';

import { toGray } from '@core/template-match';
import { isRecord } from '@hardware/powershell';
import { PowerShellError } from '$types/errors';
import type { GrayImage } from '$types';

import type { CapturePayload } from './types';

/**
 * Decode PNG bytes to a single-channel image
 * @throws {Error} If the bytes are not a valid PNG
 */
export function decodePng(buffer: Buffer, grayscale: boolean): GrayImage {
  const png = PNG.sync.read(buffer);
  return toGray({ width: png.width, height: png.height, data: png.data }, grayscale);
}

/**
 * Validate the capture script's output
 * @throws {PowerShellError} When a field is missing or has the wrong type
 */
export function parseCapturePayload(value: unknown): CapturePayload {
  if (!isRecord(value)) {
    throw new PowerShellError("capture-screen.ps1 returned a non-object", 'capture-screen.ps1');
  }
  const left = value.left;
  const top = value.top;
  const png = value.png;
  if (typeof left !== 'number' || typeof top !== 'number' || typeof png !== 'string' || png.length === 0) {
    throw new PowerShellError("capture-screen.ps1 returned an incomplete capture", 'capture-screen.ps1');
  }
  return { left: left, top: top, png: png };
}
