/**
 * Match worker message handling
 *
 * Shared by the worker entry and the main-thread search. Messages cross a
 * thread boundary, so both ends check what they receive.
 */

import type { GrayImage } from '$types';

import { findTemplate } from './template-match';
import type { MatchReply, MatchRequest, TemplateHit } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isGrayImage(value: unknown): value is GrayImage {
  return isRecord(value) &&
    typeof value.width === 'number' &&
    typeof value.height === 'number' &&
    value.data instanceof Uint8Array &&
    value.data.length === value.width * value.height;
}

function isTemplateHit(value: unknown): value is TemplateHit {
  return isRecord(value) &&
    typeof value.left === 'number' &&
    typeof value.top === 'number' &&
    typeof value.similarity === 'number';
}

export function isMatchRequest(value: unknown): value is MatchRequest {
  if (!isRecord(value)) {
    return false;
  }
  if (value.type === 'frame') {
    return isGrayImage(value.frame);
  }
  return value.type === 'find' &&
    typeof value.id === 'number' &&
    typeof value.confidence === 'number' &&
    isGrayImage(value.needle);
}

export function isMatchReply(value: unknown): value is MatchReply {
  if (!isRecord(value) || typeof value.id !== 'number') {
    return false;
  }
  if (value.type === 'hit') {
    return value.hit === null || isTemplateHit(value.hit);
  }
  return value.type === 'error' && typeof value.message === 'string';
}

/**
 * Worker-side state machine: remembers the last frame, answers finds against it
 * @returns Handler giving the reply to send, or null when there is none
 */
export function createMatchHandler(): (message: unknown) => MatchReply | null {
  let frame: GrayImage | null = null;

  return function(message: unknown): MatchReply | null {
    if (!isMatchRequest(message)) {
      return null;
    }
    if (message.type === 'frame') {
      frame = message.frame;
      return null;
    }
    if (frame === null) {
      return { type: 'error', id: message.id, message: 'No frame posted' };
    }
    try {
      return { type: 'hit', id: message.id, hit: findTemplate(frame, message.needle, message.confidence) };
    } catch (err) {
      return { type: 'error', id: message.id, message: String(err) };
    }
  };
}
