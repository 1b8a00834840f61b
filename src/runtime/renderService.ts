import type { TextureGpuDevice } from '../texture/gpuDevice.js';
import { createStorageImage, digestImage, type StorageImage } from '../texture/image.js';
import { createTextureConfig, type TextureConfigInit } from '../texture/textureConfig.js';
import { TextureKernel, type BackendKind, type DispatchReport } from '../texture/textureKernel.js';
import { planDispatch, type DispatchShape } from '../texture/tiling.js';

export type RenderTextureOptions = {
  device?: TextureGpuDevice | null;
  now?: () => number;
};

export type RenderTextureResult = {
  image: StorageImage;
  width: number;
  height: number;
  shape: DispatchShape;
  backend: BackendKind;
  digest: string;
  report: DispatchReport;
};

/** Renders the texture once onto a fresh image; the kernel is disposed afterwards. */
export const renderTexture = async (
  init: TextureConfigInit = {},
  options: RenderTextureOptions = {},
): Promise<RenderTextureResult> => {
  const config = createTextureConfig(init);
  const shape = planDispatch(config.width, config.height);
  const kernel = await TextureKernel.create({
    backend: config.backend,
    device: options.device,
    workers: config.workers,
    now: options.now,
    label: config.label,
  });

  try {
    const image = createStorageImage(config.width, config.height, {
      shared: kernel.getWorkerCount() > 0,
    });
    const report = await kernel.dispatch(image, shape);
    return {
      image,
      width: config.width,
      height: config.height,
      shape,
      backend: kernel.getBackend(),
      digest: digestImage(image),
      report,
    };
  } finally {
    await kernel.dispose();
  }
};
