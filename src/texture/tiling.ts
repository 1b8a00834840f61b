/** Invocations per tile along X and Y; must match `TILE_SIZE` in juliaKernel.wgsl. */
export const TILE_SIZE = 8;
export const TILE_DEPTH = 1;

export type InvocationId = readonly [x: number, y: number, z: number];

export type DispatchShape = {
  readonly x: number;
  readonly y: number;
  readonly z: number;
};

export type Resolution = {
  readonly width: number;
  readonly height: number;
};

export type OutputLocation = {
  readonly x: number;
  readonly y: number;
};

export type NormalizedCoord = {
  readonly u: number;
  readonly v: number;
};

/** Half-open range of linear tile indices, `index = tileY * shape.x + tileX`. */
export type TileRange = {
  readonly start: number;
  readonly end: number;
};

export class DispatchError extends Error {
  readonly width: number;
  readonly height: number;

  constructor(message: string, width: number, height: number) {
    super(`[texture-tiling] ${message}`);
    this.name = 'DispatchError';
    this.width = width;
    this.height = height;
  }
}

const isPositiveInteger = (value: number) => Number.isInteger(value) && value > 0;

export const resolutionFromShape = (shape: DispatchShape): Resolution => ({
  width: shape.x * TILE_SIZE,
  height: shape.y * TILE_SIZE,
});

export const tileCount = (shape: DispatchShape): number => shape.x * shape.y * shape.z;

export const invocationFromTile = (
  tileX: number,
  tileY: number,
  localX: number,
  localY: number,
): InvocationId => [tileX * TILE_SIZE + localX, tileY * TILE_SIZE + localY, 0];

// `| 0` is the u32 -> i32 reinterpretation; invocation ids stay far below 2^31.
export const deriveOutputLocation = (invocation: InvocationId): OutputLocation => ({
  x: invocation[0] | 0,
  y: invocation[1] | 0,
});

export const normalizeLocation = (
  location: OutputLocation,
  resolution: Resolution,
): NormalizedCoord => ({
  u: location.x / resolution.width,
  v: location.y / resolution.height,
});

export const assertDispatchShape = (shape: DispatchShape): void => {
  const { width, height } = resolutionFromShape(shape);
  if (!isPositiveInteger(shape.x) || !isPositiveInteger(shape.y)) {
    throw new DispatchError(
      `tile counts must be positive integers, received ${shape.x}x${shape.y}`,
      width,
      height,
    );
  }
  if (shape.z !== TILE_DEPTH) {
    throw new DispatchError(`dispatch depth must be ${TILE_DEPTH}, received ${shape.z}`, width, height);
  }
};

/**
 * Tile counts for an image of `width` x `height` pixels. Both extents must be
 * exact multiples of {@link TILE_SIZE}; anything else would leave pixels
 * unwritten or waste invocations, so it is rejected here instead of in the kernel.
 */
export const planDispatch = (width: number, height: number): DispatchShape => {
  if (!isPositiveInteger(width) || !isPositiveInteger(height)) {
    throw new DispatchError(
      `resolution must be positive integers, received ${width}x${height}`,
      width,
      height,
    );
  }
  if (width % TILE_SIZE !== 0 || height % TILE_SIZE !== 0) {
    throw new DispatchError(
      `resolution ${width}x${height} is not a multiple of the ${TILE_SIZE}x${TILE_SIZE} tile`,
      width,
      height,
    );
  }
  return { x: width / TILE_SIZE, y: height / TILE_SIZE, z: TILE_DEPTH };
};

export const splitTiles = (total: number, parts: number): TileRange[] => {
  const count = Math.max(1, Math.min(Math.trunc(parts), total));
  const base = Math.floor(total / count);
  const remainder = total % count;
  const ranges: TileRange[] = [];
  let start = 0;
  for (let index = 0; index < count; index++) {
    const size = base + (index < remainder ? 1 : 0);
    ranges.push({ start, end: start + size });
    start += size;
  }
  return ranges;
};

export const forEachInvocation = (
  shape: DispatchShape,
  visit: (invocation: InvocationId) => void,
  range: TileRange = { start: 0, end: shape.x * shape.y },
): void => {
  const end = Math.min(range.end, shape.x * shape.y);
  for (let tile = Math.max(0, range.start); tile < end; tile++) {
    const tileX = tile % shape.x;
    const tileY = Math.floor(tile / shape.x);
    for (let localY = 0; localY < TILE_SIZE; localY++) {
      for (let localX = 0; localX < TILE_SIZE; localX++) {
        visit(invocationFromTile(tileX, tileY, localX, localY));
      }
    }
  }
};
