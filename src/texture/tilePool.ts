import { extname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Worker } from 'node:worker_threads';

import type { StorageImage } from './image.js';
import type { CpuDispatchResult } from './juliaKernel.js';
import { splitTiles, type DispatchShape, type TileRange } from './tiling.js';

export type TileDispatchMessage = {
  kind: 'dispatch';
  id: number;
  shape: DispatchShape;
  range: TileRange;
  width: number;
  height: number;
  buffer: SharedArrayBuffer;
};

export type TileWorkerRequest = TileDispatchMessage;

type TileDoneMessage = {
  kind: 'done';
  id: number;
  invocations: number;
  discarded: number;
};

type TileErrorMessage = {
  kind: 'error';
  id: number;
  message: string;
};

export type TileWorkerResponse = TileDoneMessage | TileErrorMessage;

export type TilePoolOptions = {
  workers: number;
  label?: string;
  /** Worker script; defaults to the tile worker next to this module. */
  entry?: URL;
};

type PendingPart = {
  worker: Worker;
  resolve: (result: CpuDispatchResult) => void;
  reject: (error: Error) => void;
};

// Sources run as .ts under tsx, the build runs the emitted .js.
const resolveWorkerEntry = () =>
  new URL(`./tileWorker${extname(fileURLToPath(import.meta.url))}`, import.meta.url);

// Worker threads do not inherit tsx's loader hooks, so a .ts entry registers them first.
const spawnWorker = (entry: URL): Worker => {
  if (extname(entry.pathname) !== '.ts') {
    return new Worker(entry);
  }
  const tsxApi = import.meta.resolve('tsx/esm/api');
  const bootstrap =
    `import(${JSON.stringify(tsxApi)})` +
    `.then(({ register }) => { register(); return import(${JSON.stringify(entry.href)}); });`;
  return new Worker(bootstrap, { eval: true });
};

/**
 * Fixed set of worker threads running the CPU kernel over disjoint tile
 * ranges of one shared image. Writes never overlap, so no locking is needed.
 */
export class TilePool {
  private readonly workers: Worker[];
  private readonly pending = new Map<number, PendingPart>();
  private readonly label: string;
  private nextId = 1;
  private destroyed = false;
  private failure: Error | null = null;

  private constructor(workers: Worker[], label: string) {
    this.workers = workers;
    this.label = label;
    for (const worker of workers) {
      worker.on('message', (message: TileWorkerResponse) => this.handleMessage(message));
      worker.on('error', (error) => this.failWorker(worker, error));
      worker.on('exit', (code) => {
        if (!this.destroyed) {
          this.failWorker(worker, new Error(`[${this.label}] worker exited with code ${code}`));
        }
      });
    }
  }

  static create(options: TilePoolOptions): TilePool {
    const count = Math.max(1, Math.trunc(options.workers));
    const entry = options.entry ?? resolveWorkerEntry();
    const workers: Worker[] = [];
    for (let index = 0; index < count; index++) {
      workers.push(spawnWorker(entry));
    }
    return new TilePool(workers, options.label ?? 'tile-pool');
  }

  get size(): number {
    return this.workers.length;
  }

  async dispatch(image: StorageImage, shape: DispatchShape): Promise<CpuDispatchResult> {
    if (this.destroyed) {
      throw new Error(`[${this.label}] pool has been destroyed`);
    }
    if (this.failure) {
      throw new Error(`[${this.label}] pool is unusable: ${this.failure.message}`, {
        cause: this.failure,
      });
    }
    const buffer = image.data.buffer;
    if (!(buffer instanceof SharedArrayBuffer)) {
      throw new Error(`[${this.label}] image must be created with { shared: true }`);
    }
    const ranges = splitTiles(shape.x * shape.y, this.workers.length);
    const parts = ranges.map((range, index) =>
      this.post(this.workers[index], {
        kind: 'dispatch',
        id: this.nextId++,
        shape,
        range,
        width: image.width,
        height: image.height,
        buffer,
      }),
    );
    const results = await Promise.all(parts);
    return results.reduce(
      (total, part) => ({
        invocations: total.invocations + part.invocations,
        discarded: total.discarded + part.discarded,
      }),
      { invocations: 0, discarded: 0 },
    );
  }

  async destroy(): Promise<void> {
    if (this.destroyed) return;
    this.destroyed = true;
    for (const [id, part] of this.pending) {
      part.reject(new Error(`[${this.label}] pool destroyed during dispatch`));
      this.pending.delete(id);
    }
    await Promise.all(this.workers.map((worker) => worker.terminate()));
  }

  private post(worker: Worker, message: TileWorkerRequest): Promise<CpuDispatchResult> {
    return new Promise((resolve, reject) => {
      this.pending.set(message.id, { worker, resolve, reject });
      worker.postMessage(message);
    });
  }

  private handleMessage(message: TileWorkerResponse) {
    const part = this.pending.get(message.id);
    if (!part) {
      console.warn(`[${this.label}] response for unknown dispatch part ${message.id}`);
      return;
    }
    this.pending.delete(message.id);
    if (message.kind === 'error') {
      part.reject(new Error(`[${this.label}] ${message.message}`));
      return;
    }
    part.resolve({ invocations: message.invocations, discarded: message.discarded });
  }

  // The first failure sticks: later dispatches reject with it.
  private failWorker(worker: Worker, error: Error) {
    if (!this.failure) {
      this.failure = error;
      console.error(`[${this.label}] worker failed`, error);
    }
    for (const [id, part] of this.pending) {
      if (part.worker === worker) {
        part.reject(error);
        this.pending.delete(id);
      }
    }
  }
}
