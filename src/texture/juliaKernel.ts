import { storeTexel, type Rgba, type StorageImage } from './image.js';
import {
  deriveOutputLocation,
  forEachInvocation,
  normalizeLocation,
  resolutionFromShape,
  type DispatchShape,
  type InvocationId,
  type NormalizedCoord,
  type TileRange,
} from './tiling.js';

export type CpuDispatchResult = {
  invocations: number;
  discarded: number;
};

export const synthesizeColor = (coord: NormalizedCoord): Rgba => [coord.u, coord.v, 1, 1];

/**
 * One invocation of the `julia` entry point: red and green follow the pixel's
 * horizontal and vertical position, blue and alpha stay at full intensity.
 * Despite the name there is no escape-time iteration; the output is a plain
 * two-axis gradient.
 *
 * @returns whether the store landed inside the image.
 */
export const julia = (
  invocation: InvocationId,
  shape: DispatchShape,
  image: StorageImage,
): boolean => {
  const resolution = resolutionFromShape(shape);
  const location = deriveOutputLocation(invocation);
  const color = synthesizeColor(normalizeLocation(location, resolution));
  return storeTexel(image, location, color);
};

export const runJuliaCpu = (
  image: StorageImage,
  shape: DispatchShape,
  range?: TileRange,
): CpuDispatchResult => {
  let invocations = 0;
  let discarded = 0;
  forEachInvocation(
    shape,
    (invocation) => {
      invocations++;
      if (!julia(invocation, shape, image)) {
        discarded++;
      }
    },
    range,
  );
  return { invocations, discarded };
};
