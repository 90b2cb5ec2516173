/**
 * Match worker thread
 */

import { Worker } from 'node:worker_threads';

import type { MatchPort, MatchRequest } from './types';

const WORKER_URL = new URL('./match-worker.ts', import.meta.url);

/**
 * Start a match worker
 *
 * The worker is bootstrapped from an inline script that imports the entry
 * module, so it loads through the same module hooks as the main thread
 * (inherited via execArgv).
 */
export function spawnMatchWorker(): MatchPort {
  const worker = new Worker('import(' + JSON.stringify(WORKER_URL.href) + ');', { eval: true });
  worker.unref();

  return {
    postMessage: function(message: MatchRequest) {
      worker.postMessage(message);
    },
    onMessage: function(listener: (message: unknown) => void) {
      worker.on('message', listener);
    },
    onFailure: function(listener: (err: Error) => void) {
      worker.on('error', listener);
      worker.on('exit', function(code: number) {
        if (code !== 0) {
          listener(new Error("Match worker exited with code " + code));
        }
      });
    },
    setHeld: function(held: boolean) {
      if (held) {
        worker.ref();
      } else {
        worker.unref();
      }
    },
    terminate: async function() {
      await worker.terminate();
    }
  };
}
