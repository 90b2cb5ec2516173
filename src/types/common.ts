/**
 * Common type definitions used throughout the project
 */

/**
 * Screen coordinate in desktop pixels (center of a match)
 */
export interface ScreenPoint {
  x: number;
  y: number;
}

/**
 * Result of a single template lookup - null when the template is not on screen
 */
export type MatchResult = ScreenPoint | null;

/**
 * Mute state as shown by the player's own volume icon
 */
export type ObservedMuteState = 'muted' | 'unmuted' | 'unknown';

/**
 * Single-channel image, row-major, one byte per pixel (0-255)
 */
export interface GrayImage {
  width: number;
  height: number;
  data: Uint8Array;
}

/**
 * Reference image loaded from disk
 */
export interface Template {
  /** File name, used in logs and diagnostics */
  name: string;
  /** Absolute path the template was read from */
  path: string;
  image: GrayImage;
}
