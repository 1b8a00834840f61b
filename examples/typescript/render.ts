/**
 * Example usage of the kernel as a library.
 *
 * Run from the repository root with:
 *   npx tsx examples/typescript/render.ts
 */

import { createStorageImage, digestImage, loadTexel } from '../../src/texture/image.js';
import { TextureKernel } from '../../src/texture/textureKernel.js';
import { planDispatch } from '../../src/texture/tiling.js';

async function main() {
  const kernel = await TextureKernel.create({ backend: 'auto', workers: 2 });
  try {
    const image = createStorageImage(256, 128, { shared: true });
    const report = await kernel.dispatch(image, planDispatch(image.width, image.height));
    console.log(`backend=${report.backend} tiles=${report.shape.x}x${report.shape.y} ${report.timeMs.toFixed(2)}ms`);
    console.log(`centre texel: ${loadTexel(image, 128, 64).join(', ')}`);
    console.log(`blake3: ${digestImage(image)}`);
  } finally {
    await kernel.dispose();
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
