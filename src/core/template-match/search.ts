/**
 * Template search backends
 *
 * The worker search keeps the capture loop's thread free while a frame is
 * scanned. If the worker cannot start or dies, lookups move to the main
 * thread for the rest of the run.
 */

import type { Logger } from '@logging';
import type { GrayImage } from '$types';

import { isMatchReply } from './protocol';
import { findTemplate } from './template-match';
import { spawnMatchWorker } from './worker-port';
import type { MatchPort, SpawnMatchPort, TemplateHit, TemplateSearch } from './types';

interface PendingFind {
  frame: GrayImage;
  needle: GrayImage;
  confidence: number;
  resolve: (hit: TemplateHit | null) => void;
  reject: (err: Error) => void;
}

/**
 * Search on the calling thread
 */
export function createInlineSearch(): TemplateSearch {
  return {
    find: async function(frame: GrayImage, needle: GrayImage, confidence: number) {
      return findTemplate(frame, needle, confidence);
    },
    close: function() {
      return Promise.resolve();
    }
  };
}

/**
 * Search on a worker thread, started on the first lookup
 * @param spawn - Worker factory (tests pass an in-process port)
 */
export function createWorkerSearch(logger: Logger, spawn: SpawnMatchPort = spawnMatchWorker): TemplateSearch {
  const inline = createInlineSearch();
  const pending = new Map<number, PendingFind>();
  let port: MatchPort | null = null;
  /** Frame the worker currently holds */
  let portFrame: GrayImage | null = null;
  let nextId = 1;
  let onMainThread = false;

  function runInline(entry: PendingFind): void {
    inline.find(entry.frame, entry.needle, entry.confidence).then(entry.resolve, entry.reject);
  }

  function settle(message: unknown): void {
    if (!isMatchReply(message)) {
      return;
    }
    const entry = pending.get(message.id);
    if (entry === undefined) {
      return;
    }
    pending.delete(message.id);
    if (pending.size === 0 && port !== null) {
      port.setHeld(false);
    }
    if (message.type === 'hit') {
      entry.resolve(message.hit);
    } else {
      entry.reject(new Error(message.message));
    }
  }

  function fail(failed: MatchPort, err: Error): void {
    if (port !== failed) {
      return;
    }
    port = null;
    portFrame = null;
    onMainThread = true;
    logger.warning("Match worker failed: " + err.message + "; searching on the main thread");

    const waiting = Array.from(pending.values());
    pending.clear();
    waiting.forEach(runInline);

    failed.terminate().catch(function(termErr: unknown) {
      logger.debug("Match worker terminate failed: " + String(termErr));
    });
  }

  function currentPort(): MatchPort | null {
    if (onMainThread) {
      return null;
    }
    if (port !== null) {
      return port;
    }
    try {
      const started = spawn();
      started.onMessage(settle);
      started.onFailure(function(err: Error) { fail(started, err); });
      port = started;
      return started;
    } catch (err) {
      onMainThread = true;
      logger.warning("Match worker unavailable: " + String(err) + "; searching on the main thread");
      return null;
    }
  }

  function find(frame: GrayImage, needle: GrayImage, confidence: number): Promise<TemplateHit | null> {
    const target = currentPort();
    if (target === null) {
      return inline.find(frame, needle, confidence);
    }

    if (portFrame !== frame) {
      target.postMessage({ type: 'frame', frame: frame });
      portFrame = frame;
    }

    const id = nextId++;
    return new Promise<TemplateHit | null>(function(resolve, reject) {
      pending.set(id, { frame: frame, needle: needle, confidence: confidence, resolve: resolve, reject: reject });
      if (pending.size === 1) {
        target.setHeld(true);
      }
      target.postMessage({ type: 'find', id: id, needle: needle, confidence: confidence });
    });
  }

  async function close(): Promise<void> {
    const closing = port;
    port = null;
    portFrame = null;

    const waiting = Array.from(pending.values());
    pending.clear();
    waiting.forEach(function(entry) { entry.reject(new Error("Template search closed")); });

    if (closing !== null) {
      await closing.terminate();
    }
  }

  return {
    find: find,
    close: close
  };
}
