/**
 * Match worker entry; loaded by spawnMatchWorker
 */

import { parentPort } from 'node:worker_threads';

import { createMatchHandler } from './protocol';

const port = parentPort;

if (port !== null) {
  const handle = createMatchHandler();
  port.on('message', function(message: unknown) {
    const reply = handle(message);
    if (reply !== null) {
      port.postMessage(reply);
    }
  });
}
