import { parentPort } from 'node:worker_threads';

import { wrapStorageImage } from './image.js';
import { runJuliaCpu } from './juliaKernel.js';
import type { TileWorkerRequest, TileWorkerResponse } from './tilePool.js';

const port = parentPort;
if (!port) {
  throw new Error('[tile-worker] must be started from a TilePool');
}

port.on('message', (message: TileWorkerRequest) => {
  let response: TileWorkerResponse;
  try {
    const image = wrapStorageImage(message.width, message.height, message.buffer);
    const result = runJuliaCpu(image, message.shape, message.range);
    response = { kind: 'done', id: message.id, ...result };
  } catch (error) {
    response = {
      kind: 'error',
      id: message.id,
      message: error instanceof Error ? error.message : String(error),
    };
  }
  port.postMessage(response);
});
