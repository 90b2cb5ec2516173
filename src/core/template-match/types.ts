/**
 * Template matching type definitions
 */

import type { GrayImage } from '$types';

/**
 * Best placement of a template inside a larger image
 */
export interface TemplateHit {
  /** Left edge of the placement, in haystack pixels */
  left: number;
  /** Top edge of the placement, in haystack pixels */
  top: number;
  /** Zero-mean normalized cross-correlation in [-1, 1]; 1 means the same pattern */
  similarity: number;
}

/**
 * Pixel layout of a decoded bitmap handed to toGray
 */
export interface RgbaBitmap {
  width: number;
  height: number;
  /** 4 bytes per pixel, row-major (R, G, B, A) */
  data: Uint8Array;
}

/**
 * Template lookup that may run away from the calling thread
 */
export interface TemplateSearch {
  /**
   * Best placement of `needle` in `frame` scoring at least `confidence`, or null
   * @throws {Error} When the lookup cannot run
   */
  find(frame: GrayImage, needle: GrayImage, confidence: number): Promise<TemplateHit | null>;
  /** Stop any background thread; pending lookups reject */
  close(): Promise<void>;
}

// ═══════════════════════════════════════════════════════════════
// WORKER MESSAGES
// ═══════════════════════════════════════════════════════════════

/**
 * Sent to the match worker. A frame stays current until the next one.
 */
export type MatchRequest =
  | { type: 'frame'; frame: GrayImage }
  | { type: 'find'; id: number; needle: GrayImage; confidence: number };

/**
 * Sent back by the match worker, one per find request
 */
export type MatchReply =
  | { type: 'hit'; id: number; hit: TemplateHit | null }
  | { type: 'error'; id: number; message: string };

/**
 * Main-thread side of a match worker
 */
export interface MatchPort {
  postMessage(message: MatchRequest): void;
  onMessage(listener: (message: unknown) => void): void;
  /** Called when the worker errors or exits on its own */
  onFailure(listener: (err: Error) => void): void;
  /** Keep the process alive while lookups are outstanding */
  setHeld(held: boolean): void;
  terminate(): Promise<void>;
}

export type SpawnMatchPort = () => MatchPort;
