import test from 'node:test';
import assert from 'node:assert/strict';

import { createStorageImage, digestImage, loadTexel } from '../src/texture/image.js';
import { runJuliaCpu } from '../src/texture/juliaKernel.js';
import {
  TextureKernel,
  countDiscarded,
  getJuliaKernelSource,
  planTextureReadback,
  unpadRows,
} from '../src/texture/textureKernel.js';
import { DispatchError } from '../src/texture/tiling.js';
import { FakeGpuDevice } from './helpers/fakeGpuDevice.js';

// 0.5 survives the rgba8unorm round trip as 128 / 255.
const HALF_UNORM8 = Math.fround(128 / 255);

test('cpu-only kernel plans the dispatch from the image size', async () => {
  const kernel = await TextureKernel.create({ backend: 'cpu-only' });
  assert.equal(kernel.getBackend(), 'cpu');
  const image = createStorageImage(16, 8);
  const report = await kernel.dispatch(image);
  assert.equal(report.backend, 'cpu');
  assert.deepEqual(report.shape, { x: 2, y: 1, z: 1 });
  assert.deepEqual(report.resolution, { width: 16, height: 8 });
  assert.equal(report.invocations, 128);
  assert.equal(report.discarded, 0);
  assert.deepEqual(loadTexel(image, 8, 4), [0.5, 0.5, 1, 1]);
  assert.equal(kernel.getLastReport(), report);
  await kernel.dispose();
});

test('auto backend falls back to the CPU when no WebGPU device exists', async () => {
  const kernel = await TextureKernel.create({ backend: 'auto' });
  assert.equal(kernel.getBackend(), 'cpu');
  await kernel.dispose();
});

test('gpu-first backend fails without a WebGPU device', async () => {
  await assert.rejects(TextureKernel.create({ backend: 'gpu-first' }), /WebGPU device unavailable/);
});

test('kernel leaves size mismatches to the caller', async () => {
  const kernel = await TextureKernel.create({ backend: 'cpu-only' });
  const image = createStorageImage(8, 8);
  const report = await kernel.dispatch(image, { x: 2, y: 2, z: 1 });
  assert.equal(report.invocations, 256);
  assert.equal(report.discarded, 192);
  assert.equal(countDiscarded({ x: 2, y: 2, z: 1 }, image), 192);
  await assert.rejects(kernel.dispatch(image, { x: 1, y: 1, z: 2 }), DispatchError);
  await assert.rejects(kernel.dispatch(createStorageImage(12, 8)), /not a multiple/);
  await kernel.dispose();
});

test('worker-backed kernel matches the inline kernel', async () => {
  const kernel = await TextureKernel.create({ backend: 'cpu-only', workers: 2 });
  assert.equal(kernel.getWorkerCount(), 2);
  const shared = createStorageImage(32, 24, { shared: true });
  await kernel.dispatch(shared);
  await kernel.dispose();

  const inline = createStorageImage(32, 24);
  runJuliaCpu(inline, { x: 4, y: 3, z: 1 });
  assert.equal(digestImage(shared), digestImage(inline));
});

test('kernel reports the time each dispatch took', async () => {
  const ticks = [10, 12.5];
  const kernel = await TextureKernel.create({ backend: 'cpu-only', now: () => ticks.shift() ?? 0 });
  const report = await kernel.dispatch(createStorageImage(8, 8));
  assert.equal(report.timeMs, 2.5);
  await kernel.dispose();
});

test('gpu backend uploads, dispatches 8x8 workgroups and unpads the readback', async () => {
  const device = new FakeGpuDevice();
  const kernel = await TextureKernel.create({ backend: 'gpu-first', device });
  assert.equal(kernel.getBackend(), 'gpu');
  assert.equal(device.entryPoint, 'julia');

  const image = createStorageImage(16, 8);
  const report = await kernel.dispatch(image, { x: 1, y: 1, z: 1 });
  assert.equal(report.backend, 'gpu');
  assert.equal(report.invocations, 64);
  assert.equal(report.discarded, 0);
  assert.deepEqual(device.calls, [
    { kind: 'writeTexture', bytesPerRow: 64, byteLength: 512 },
    { kind: 'dispatchWorkgroups', x: 1, y: 1, z: 1 },
    { kind: 'copyTextureToBuffer', bytesPerRow: 256, width: 16, height: 8 },
  ]);
  assert.equal(device.buffers[0].bytes.length, 2048);
  assert.deepEqual(loadTexel(image, 4, 4), [HALF_UNORM8, HALF_UNORM8, 1, 1]);
  assert.deepEqual(loadTexel(image, 7, 0), [Math.fround(223 / 255), 0, 1, 1]);
  // Outside the dispatched tile the uploaded contents come back unchanged.
  assert.deepEqual(loadTexel(image, 12, 4), [0, 0, 0, 1]);

  await kernel.dispose();
  assert.equal(device.textures[0].destroyed, true);
  assert.equal(device.buffers[0].destroyed, true);
  assert.equal(device.destroyed, false, 'an injected device belongs to the caller');
});

test('gpu dispatches issued together run one after another', async () => {
  const device = new FakeGpuDevice();
  const kernel = await TextureKernel.create({ backend: 'gpu-first', device });
  const small = createStorageImage(8, 8);
  const large = createStorageImage(16, 16);
  const [smallReport, largeReport] = await Promise.all([
    kernel.dispatch(small),
    kernel.dispatch(large),
  ]);
  assert.equal(smallReport.invocations, 64);
  assert.equal(largeReport.invocations, 256);
  assert.deepEqual(loadTexel(small, 4, 0), [HALF_UNORM8, 0, 1, 1]);
  assert.deepEqual(loadTexel(large, 8, 8), [HALF_UNORM8, HALF_UNORM8, 1, 1]);
  assert.equal(device.textures.length, 2);
  await kernel.dispose();
});

test('WGSL compile errors fall back to the CPU under auto and fail gpu-first', async () => {
  const brokenDevice = () =>
    new FakeGpuDevice({
      compilationMessages: [
        { type: 'warning', message: 'unused variable', lineNum: 2, linePos: 1 },
        { type: 'error', message: 'unresolved identifier', lineNum: 3, linePos: 5 },
      ],
    });

  const injected = brokenDevice();
  const kernel = await TextureKernel.create({ backend: 'auto', device: injected });
  assert.equal(kernel.getBackend(), 'cpu');
  assert.equal(injected.destroyed, false);
  await kernel.dispose();

  await assert.rejects(
    TextureKernel.create({ backend: 'gpu-first', device: brokenDevice() }),
    (error: unknown) => {
      assert.ok(error instanceof Error);
      assert.match(error.message, /failed to initialize GPU backend/);
      assert.ok(error.cause instanceof Error);
      assert.equal(
        error.cause.message,
        '[texture-kernel] WGSL compilation failed:\n3:5 unresolved identifier',
      );
      return true;
    },
  );
});

test('dispose destroys a device the kernel requested from navigator.gpu', async () => {
  const device = new FakeGpuDevice();
  const original = Object.getOwnPropertyDescriptor(globalThis, 'navigator');
  Object.defineProperty(globalThis, 'navigator', {
    configurable: true,
    value: { gpu: { requestAdapter: async () => ({ requestDevice: async () => device }) } },
  });
  try {
    const kernel = await TextureKernel.create({ backend: 'gpu-first' });
    assert.equal(kernel.getBackend(), 'gpu');
    await kernel.dispatch(createStorageImage(8, 8));
    await kernel.dispose();
    assert.equal(device.destroyed, true);
    await assert.rejects(kernel.dispatch(createStorageImage(8, 8)), /kernel has been disposed/);
  } finally {
    if (original) {
      Object.defineProperty(globalThis, 'navigator', original);
    } else {
      Reflect.deleteProperty(globalThis, 'navigator');
    }
  }
});

test('planTextureReadback pads rows to 256 bytes', () => {
  assert.deepEqual(planTextureReadback(8, 8), {
    width: 8,
    height: 8,
    unpaddedBytesPerRow: 32,
    bytesPerRow: 256,
    byteLength: 2048,
  });
  assert.equal(planTextureReadback(64, 1).bytesPerRow, 256);
  assert.equal(planTextureReadback(100, 2).bytesPerRow, 512);
  assert.equal(planTextureReadback(100, 2).byteLength, 1024);
});

test('unpadRows strips the row padding', () => {
  const layout = planTextureReadback(1, 2);
  const padded = new Uint8Array(layout.byteLength);
  padded.set([1, 2, 3, 4], 0);
  padded.set([5, 6, 7, 8], 256);
  assert.deepEqual(Array.from(unpadRows(padded, layout)), [1, 2, 3, 4, 5, 6, 7, 8]);
  assert.throws(() => unpadRows(new Uint8Array(10), layout), /expected 512/);
});

test('WGSL source declares the julia entry point on 8x8 tiles', async () => {
  const source = await getJuliaKernelSource();
  assert.match(source, /const TILE_SIZE: u32 = 8u;/);
  assert.match(source, /@compute @workgroup_size\(TILE_SIZE, TILE_SIZE, 1\)/);
  assert.match(source, /fn julia\(/);
  assert.match(source, /texture_storage_2d<rgba8unorm, write>/);
});
