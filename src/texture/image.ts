import { blake3 } from '@noble/hashes/blake3';
import { bytesToHex } from '@noble/hashes/utils';

import type { OutputLocation } from './tiling.js';

export const IMAGE_CHANNELS = 4;

export type Rgba = readonly [r: number, g: number, b: number, a: number];

/**
 * Host-side mirror of an `rgba8unorm` storage texture. Channels are kept as
 * floats so the CPU kernel stores exactly what the shader computes; the
 * unorm8 view is produced on demand.
 */
export type StorageImage = {
  readonly width: number;
  readonly height: number;
  readonly data: Float32Array;
  readonly shared: boolean;
};

export type StorageImageOptions = {
  fill?: Rgba;
  shared?: boolean;
};

export const OPAQUE_BLACK: Rgba = [0, 0, 0, 1];

const clampUnit = (value: number) => {
  if (Number.isNaN(value)) return 0;
  if (value < 0) return 0;
  if (value > 1) return 1;
  return value;
};

export const createStorageImage = (
  width: number,
  height: number,
  options: StorageImageOptions = {},
): StorageImage => {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new Error(`[storage-image] invalid size ${width}x${height}`);
  }
  const shared = options.shared ?? false;
  const length = width * height * IMAGE_CHANNELS;
  const data = shared
    ? new Float32Array(new SharedArrayBuffer(length * Float32Array.BYTES_PER_ELEMENT))
    : new Float32Array(length);
  const fill = options.fill ?? OPAQUE_BLACK;
  for (let offset = 0; offset < length; offset += IMAGE_CHANNELS) {
    data[offset + 0] = fill[0];
    data[offset + 1] = fill[1];
    data[offset + 2] = fill[2];
    data[offset + 3] = fill[3];
  }
  return { width, height, data, shared };
};

/** Wraps an existing buffer, e.g. one received by a worker thread. */
export const wrapStorageImage = (
  width: number,
  height: number,
  buffer: SharedArrayBuffer | ArrayBuffer,
): StorageImage => {
  const data = new Float32Array(buffer);
  if (data.length !== width * height * IMAGE_CHANNELS) {
    throw new Error(
      `[storage-image] buffer holds ${data.length} channels, expected ${width * height * IMAGE_CHANNELS}`,
    );
  }
  return { width, height, data, shared: buffer instanceof SharedArrayBuffer };
};

export const isInside = (image: StorageImage, x: number, y: number): boolean =>
  x >= 0 && y >= 0 && x < image.width && y < image.height;

/** Out-of-range stores are dropped, matching `textureStore` on a storage texture. */
export const storeTexel = (image: StorageImage, location: OutputLocation, color: Rgba): boolean => {
  if (!isInside(image, location.x, location.y)) {
    return false;
  }
  const offset = (location.y * image.width + location.x) * IMAGE_CHANNELS;
  image.data[offset + 0] = color[0];
  image.data[offset + 1] = color[1];
  image.data[offset + 2] = color[2];
  image.data[offset + 3] = color[3];
  return true;
};

export const loadTexel = (image: StorageImage, x: number, y: number): Rgba => {
  if (!isInside(image, x, y)) {
    throw new RangeError(`[storage-image] texel ${x},${y} outside ${image.width}x${image.height}`);
  }
  const offset = (y * image.width + x) * IMAGE_CHANNELS;
  return [
    image.data[offset + 0],
    image.data[offset + 1],
    image.data[offset + 2],
    image.data[offset + 3],
  ];
};

export const toRgba8Unorm = (image: StorageImage, target?: Uint8Array | null): Uint8Array => {
  const output =
    target && target.length === image.data.length ? target : new Uint8Array(image.data.length);
  for (let index = 0; index < image.data.length; index++) {
    output[index] = Math.round(clampUnit(image.data[index]) * 255);
  }
  return output;
};

export const fromRgba8Unorm = (image: StorageImage, bytes: Uint8Array): void => {
  if (bytes.length !== image.data.length) {
    throw new Error(
      `[storage-image] expected ${image.data.length} bytes for ${image.width}x${image.height}, received ${bytes.length}`,
    );
  }
  for (let index = 0; index < bytes.length; index++) {
    image.data[index] = bytes[index] / 255;
  }
};

/** blake3 of the rgba8unorm bytes, as hex. */
export const digestImage = (image: StorageImage): string =>
  bytesToHex(blake3(toRgba8Unorm(image)));
