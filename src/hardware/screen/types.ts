/**
 * Screen capture type definitions
 */

import type { GrayImage } from '$types';

/**
 * JSON written by capture-screen.ps1
 */
export interface CapturePayload {
  /** Desktop x of the captured image's left edge (negative with monitors left of primary) */
  left: number;
  top: number;
  /** Base64 PNG of the whole virtual desktop */
  png: string;
}

/**
 * One decoded capture
 */
export interface ScreenFrame {
  originX: number;
  originY: number;
  image: GrayImage;
}

export interface ScreenMatcherConfig {
  MATCH_CONFIDENCE: number;
  MATCH_GRAYSCALE: boolean;
}
