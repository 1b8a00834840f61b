import test from 'node:test';
import assert from 'node:assert/strict';

import { renderTexture } from '../src/runtime/renderService.js';
import { createStorageImage, digestImage, loadTexel } from '../src/texture/image.js';
import { runJuliaCpu } from '../src/texture/juliaKernel.js';
import { FakeGpuDevice } from './helpers/fakeGpuDevice.js';

test('renderTexture dispatches once and digests the image', async () => {
  const result = await renderTexture({ width: 16, height: 8, backend: 'cpu-only' });
  assert.equal(result.backend, 'cpu');
  assert.deepEqual(result.shape, { x: 2, y: 1, z: 1 });
  assert.equal(result.report.invocations, 128);
  assert.equal(result.report.discarded, 0);

  const expected = createStorageImage(16, 8);
  runJuliaCpu(expected, { x: 2, y: 1, z: 1 });
  assert.equal(result.digest, digestImage(expected));
  assert.deepEqual(loadTexel(result.image, 15, 7), [0.9375, 0.875, 1, 1]);
});

test('renderTexture with workers matches the inline render', async () => {
  const inline = await renderTexture({ width: 32, height: 16, backend: 'cpu-only' });
  const pooled = await renderTexture({ width: 32, height: 16, backend: 'cpu-only', workers: 2 });
  assert.equal(pooled.image.shared, true);
  assert.equal(pooled.digest, inline.digest);
});

test('renderTexture on a GPU device matches the CPU render byte for byte', async () => {
  const device = new FakeGpuDevice();
  const gpu = await renderTexture({ width: 24, height: 16, backend: 'gpu-first' }, { device });
  const cpu = await renderTexture({ width: 24, height: 16, backend: 'cpu-only' });
  assert.equal(gpu.backend, 'gpu');
  assert.equal(gpu.digest, cpu.digest);
  assert.equal(device.textures[0].destroyed, true);
});

test('renderTexture rejects a resolution that is not whole tiles', async () => {
  await assert.rejects(renderTexture({ width: 30, height: 16, backend: 'cpu-only' }), /not a multiple/);
});
