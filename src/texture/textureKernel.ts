import { readFile } from 'node:fs/promises';

import type { GpuBuffer, GpuComputePipeline, GpuTexture, TextureGpuDevice } from './gpuDevice.js';
import { IMAGE_CHANNELS, fromRgba8Unorm, toRgba8Unorm, type StorageImage } from './image.js';
import { runJuliaCpu, type CpuDispatchResult } from './juliaKernel.js';
import { TilePool } from './tilePool.js';
import {
  TILE_SIZE,
  assertDispatchShape,
  planDispatch,
  resolutionFromShape,
  tileCount,
  type DispatchShape,
  type Resolution,
} from './tiling.js';

const ENTRY_POINT = 'julia';
const TEXTURE_FORMAT: GPUTextureFormat = 'rgba8unorm';
const BYTES_PER_ROW_ALIGNMENT = 256;

type BufferUsageFlags = {
  readonly MAP_READ: number;
  readonly COPY_SRC: number;
  readonly COPY_DST: number;
};

type TextureUsageFlags = {
  readonly COPY_SRC: number;
  readonly COPY_DST: number;
  readonly STORAGE_BINDING: number;
};

type MapModeFlags = {
  readonly READ: number;
};

const FALLBACK_GPU_BUFFER_USAGE: BufferUsageFlags = {
  MAP_READ: 0x0001,
  COPY_SRC: 0x0004,
  COPY_DST: 0x0008,
};

const FALLBACK_GPU_TEXTURE_USAGE: TextureUsageFlags = {
  COPY_SRC: 0x01,
  COPY_DST: 0x02,
  STORAGE_BINDING: 0x08,
};

const FALLBACK_GPU_MAP_MODE: MapModeFlags = {
  READ: 0x0001,
};

type MaybeGpuEnvironment = {
  GPUBufferUsage?: BufferUsageFlags;
  GPUTextureUsage?: TextureUsageFlags;
  GPUMapMode?: MapModeFlags;
  navigator?: { gpu?: GPU };
};

// Node has no WebGPU globals unless a binding installs them.
const gpuEnvironment: MaybeGpuEnvironment = globalThis;

const GPU_BUFFER_USAGE = gpuEnvironment.GPUBufferUsage ?? FALLBACK_GPU_BUFFER_USAGE;
const GPU_TEXTURE_USAGE = gpuEnvironment.GPUTextureUsage ?? FALLBACK_GPU_TEXTURE_USAGE;
const GPU_MAP_MODE = gpuEnvironment.GPUMapMode ?? FALLBACK_GPU_MAP_MODE;

let cachedKernelSource: string | null = null;

export const getJuliaKernelSource = async (): Promise<string> => {
  if (cachedKernelSource) {
    return cachedKernelSource;
  }
  cachedKernelSource = await readFile(new URL('./juliaKernel.wgsl', import.meta.url), 'utf8');
  return cachedKernelSource;
};

export type BackendKind = 'gpu' | 'cpu';

export type BackendPreference = 'auto' | 'gpu-first' | 'cpu-only';

export type DispatchReport = {
  backend: BackendKind;
  shape: DispatchShape;
  resolution: Resolution;
  invocations: number;
  /** Invocations whose store fell outside the image. */
  discarded: number;
  timeMs: number;
};

export type TextureKernelInitOptions = {
  backend?: BackendPreference;
  /** Injected device; the kernel requests its own from `navigator.gpu` otherwise. */
  device?: TextureGpuDevice | null;
  /** CPU worker threads; 0 runs the kernel on the calling thread. */
  workers?: number;
  now?: () => number;
  label?: string;
};

export type TextureReadbackLayout = {
  width: number;
  height: number;
  unpaddedBytesPerRow: number;
  bytesPerRow: number;
  byteLength: number;
};

/** `copyTextureToBuffer` needs rows aligned to 256 bytes. */
export const planTextureReadback = (width: number, height: number): TextureReadbackLayout => {
  const unpaddedBytesPerRow = width * IMAGE_CHANNELS;
  const bytesPerRow =
    Math.ceil(unpaddedBytesPerRow / BYTES_PER_ROW_ALIGNMENT) * BYTES_PER_ROW_ALIGNMENT;
  return {
    width,
    height,
    unpaddedBytesPerRow,
    bytesPerRow,
    byteLength: bytesPerRow * height,
  };
};

export const unpadRows = (
  padded: Uint8Array,
  layout: TextureReadbackLayout,
  target?: Uint8Array | null,
): Uint8Array => {
  if (padded.length < layout.byteLength) {
    throw new Error(
      `[texture-kernel] readback holds ${padded.length} bytes, expected ${layout.byteLength}`,
    );
  }
  const size = layout.unpaddedBytesPerRow * layout.height;
  const output = target && target.length === size ? target : new Uint8Array(size);
  for (let row = 0; row < layout.height; row++) {
    const start = row * layout.bytesPerRow;
    output.set(
      padded.subarray(start, start + layout.unpaddedBytesPerRow),
      row * layout.unpaddedBytesPerRow,
    );
  }
  return output;
};

/** Invocations of `shape` that land outside `image`; the GPU drops these stores. */
export const countDiscarded = (shape: DispatchShape, image: StorageImage): number => {
  const resolution = resolutionFromShape(shape);
  const written =
    Math.min(resolution.width, image.width) * Math.min(resolution.height, image.height);
  return tileCount(shape) * TILE_SIZE * TILE_SIZE - written;
};

const defaultNow = () => {
  if (typeof performance !== 'undefined' && typeof performance.now === 'function') {
    return performance.now();
  }
  return Date.now();
};

const requestNavigatorDevice = async (): Promise<TextureGpuDevice | null> => {
  const gpu = gpuEnvironment.navigator?.gpu;
  if (!gpu) {
    return null;
  }
  try {
    const adapter = await gpu.requestAdapter({ powerPreference: 'high-performance' });
    return adapter ? await adapter.requestDevice() : null;
  } catch (error) {
    console.warn('[texture-kernel] WebGPU device request failed', error);
    return null;
  }
};

const compileKernel = async (
  device: TextureGpuDevice,
  label: string,
): Promise<GpuComputePipeline> => {
  const code = await getJuliaKernelSource();
  const module = device.createShaderModule({ label, code });
  const info = await module.getCompilationInfo();
  const errors = info.messages.filter((message) => message.type === 'error');
  if (errors.length) {
    const details = errors
      .map((message) => `${message.lineNum}:${message.linePos} ${message.message}`)
      .join('\n');
    throw new Error(`[texture-kernel] WGSL compilation failed:\n${details}`);
  }
  return device.createComputePipelineAsync({
    label,
    layout: 'auto',
    compute: {
      module,
      entryPoint: ENTRY_POINT,
    },
  });
};

type GpuTarget = {
  width: number;
  height: number;
  texture: GpuTexture;
  readbackBuffer: GpuBuffer;
  bindGroup: object;
  layout: TextureReadbackLayout;
};

type GpuState = {
  device: TextureGpuDevice;
  /** Set when the kernel requested the device itself and must destroy it. */
  ownsDevice: boolean;
  pipeline: GpuComputePipeline;
  target: GpuTarget | null;
  /** GPU dispatches share one texture and readback buffer, so they run one at a time. */
  queue: Promise<unknown>;
};

export class TextureKernel {
  private readonly backend: BackendKind;
  private readonly now: () => number;
  private readonly label: string;
  private gpu: GpuState | null;
  private pool: TilePool | null;
  private lastReport: DispatchReport | null = null;

  private constructor(
    backend: BackendKind,
    nowFn: () => number,
    gpu: GpuState | null,
    pool: TilePool | null,
    options: TextureKernelInitOptions,
  ) {
    this.backend = backend;
    this.now = nowFn;
    this.gpu = gpu;
    this.pool = pool;
    this.label = options.label ?? 'texture-kernel';
  }

  static async create(options: TextureKernelInitOptions = {}): Promise<TextureKernel> {
    const backendPref = options.backend ?? 'auto';
    const nowFn = options.now ?? defaultNow;
    if (backendPref === 'cpu-only') {
      return TextureKernel.createCpu(nowFn, options);
    }

    const ownsDevice = !options.device;
    const device = options.device ?? (await requestNavigatorDevice());
    if (!device) {
      if (backendPref === 'gpu-first') {
        throw new Error('[texture-kernel] WebGPU device unavailable');
      }
      return TextureKernel.createCpu(nowFn, options);
    }

    try {
      const pipeline = await compileKernel(device, options.label ?? 'texture-kernel');
      const gpu: GpuState = {
        device,
        ownsDevice,
        pipeline,
        target: null,
        queue: Promise.resolve(),
      };
      return new TextureKernel('gpu', nowFn, gpu, null, options);
    } catch (error) {
      if (ownsDevice) {
        device.destroy();
      }
      if (backendPref === 'gpu-first') {
        throw new Error('[texture-kernel] failed to initialize GPU backend', { cause: error });
      }
      console.warn('[texture-kernel] falling back to CPU backend', error);
      return TextureKernel.createCpu(nowFn, options);
    }
  }

  private static createCpu(nowFn: () => number, options: TextureKernelInitOptions) {
    const workers = Math.max(0, Math.trunc(options.workers ?? 0));
    const pool =
      workers > 0
        ? TilePool.create({ workers, label: `${options.label ?? 'texture-kernel'}-pool` })
        : null;
    return new TextureKernel('cpu', nowFn, null, pool, options);
  }

  getBackend(): BackendKind {
    return this.backend;
  }

  getWorkerCount(): number {
    return this.pool?.size ?? 0;
  }

  getLastReport(): DispatchReport | null {
    return this.lastReport;
  }

  /**
   * Runs one dispatch of the `julia` kernel against `image`. The shape defaults
   * to the one planned from the image size. A shape that does not match the
   * image is not an error here: surplus stores are dropped and counted, and
   * pixels outside the dispatch keep their previous contents.
   */
  async dispatch(image: StorageImage, shape?: DispatchShape): Promise<DispatchReport> {
    const dispatchShape = shape ?? planDispatch(image.width, image.height);
    assertDispatchShape(dispatchShape);
    const start = this.now();
    let result: CpuDispatchResult;
    if (this.backend === 'gpu') {
      result = await this.enqueueGpu(image, dispatchShape);
    } else if (this.pool && image.shared) {
      result = await this.pool.dispatch(image, dispatchShape);
    } else {
      result = runJuliaCpu(image, dispatchShape);
    }
    const report: DispatchReport = {
      backend: this.backend,
      shape: dispatchShape,
      resolution: resolutionFromShape(dispatchShape),
      invocations: result.invocations,
      discarded: result.discarded,
      timeMs: this.now() - start,
    };
    this.lastReport = report;
    return report;
  }

  async dispose(): Promise<void> {
    const gpu = this.gpu;
    this.gpu = null;
    if (gpu) {
      await Promise.allSettled([gpu.queue]);
      gpu.target?.texture.destroy();
      gpu.target?.readbackBuffer.destroy();
      gpu.target = null;
      if (gpu.ownsDevice) {
        gpu.device.destroy();
      }
    }
    const pool = this.pool;
    this.pool = null;
    await pool?.destroy();
  }

  private enqueueGpu(image: StorageImage, shape: DispatchShape): Promise<CpuDispatchResult> {
    const gpu = this.gpu;
    if (!gpu) {
      return Promise.reject(new Error(`[${this.label}] kernel has been disposed`));
    }
    const run = gpu.queue.then(
      () => this.dispatchGpu(gpu, image, shape),
      () => this.dispatchGpu(gpu, image, shape),
    );
    gpu.queue = run;
    return run;
  }

  private ensureGpuTarget(gpu: GpuState, width: number, height: number): GpuTarget {
    if (gpu.target && gpu.target.width === width && gpu.target.height === height) {
      return gpu.target;
    }
    gpu.target?.texture.destroy();
    gpu.target?.readbackBuffer.destroy();
    const { device } = gpu;
    const layout = planTextureReadback(width, height);
    const texture = device.createTexture({
      label: `${this.label}-output`,
      size: { width, height, depthOrArrayLayers: 1 },
      format: TEXTURE_FORMAT,
      usage:
        GPU_TEXTURE_USAGE.STORAGE_BINDING | GPU_TEXTURE_USAGE.COPY_SRC | GPU_TEXTURE_USAGE.COPY_DST,
    });
    const readbackBuffer = device.createBuffer({
      label: `${this.label}-readback`,
      size: layout.byteLength,
      usage: GPU_BUFFER_USAGE.COPY_DST | GPU_BUFFER_USAGE.MAP_READ,
    });
    const bindGroup = device.createBindGroup({
      label: `${this.label}-bind-group`,
      layout: gpu.pipeline.getBindGroupLayout(0),
      entries: [{ binding: 0, resource: texture.createView() }],
    });
    gpu.target = { width, height, texture, readbackBuffer, bindGroup, layout };
    return gpu.target;
  }

  private async dispatchGpu(
    gpu: GpuState,
    image: StorageImage,
    shape: DispatchShape,
  ): Promise<CpuDispatchResult> {
    const target = this.ensureGpuTarget(gpu, image.width, image.height);
    const { device } = gpu;
    const { queue } = device;
    const extent = { width: image.width, height: image.height, depthOrArrayLayers: 1 };

    // Pixels the dispatch does not reach must keep their prior contents.
    const upload = new Uint8Array(image.data.length);
    toRgba8Unorm(image, upload);
    queue.writeTexture(
      { texture: target.texture },
      upload,
      { bytesPerRow: target.layout.unpaddedBytesPerRow, rowsPerImage: image.height },
      extent,
    );

    const encoder = device.createCommandEncoder({ label: `${this.label}-commands` });
    const pass = encoder.beginComputePass({ label: `${this.label}-pass` });
    pass.setPipeline(gpu.pipeline);
    pass.setBindGroup(0, target.bindGroup);
    pass.dispatchWorkgroups(shape.x, shape.y, shape.z);
    pass.end();
    encoder.copyTextureToBuffer(
      { texture: target.texture },
      {
        buffer: target.readbackBuffer,
        bytesPerRow: target.layout.bytesPerRow,
        rowsPerImage: image.height,
      },
      extent,
    );
    queue.submit([encoder.finish()]);

    await target.readbackBuffer.mapAsync(GPU_MAP_MODE.READ, 0, target.layout.byteLength);
    try {
      const padded = new Uint8Array(
        target.readbackBuffer.getMappedRange(0, target.layout.byteLength),
      );
      fromRgba8Unorm(image, unpadRows(padded, target.layout));
    } finally {
      target.readbackBuffer.unmap();
    }

    return {
      invocations: tileCount(shape) * TILE_SIZE * TILE_SIZE,
      discarded: countDiscarded(shape, image),
    };
  }
}
