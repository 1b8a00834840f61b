import type { BackendPreference } from './textureKernel.js';
import { planDispatch } from './tiling.js';

const clamp = (value: number, min: number, max: number) => {
  if (Number.isNaN(value)) return min;
  if (!Number.isFinite(value)) return value > 0 ? max : min;
  if (value < min) return min;
  if (value > max) return max;
  return value;
};

const BACKEND_PREFERENCES: readonly BackendPreference[] = ['auto', 'gpu-first', 'cpu-only'];

const TEXTURE_CONFIG_COUNT_KEYS = ['workers'] as const;
type TextureConfigCountKey = (typeof TEXTURE_CONFIG_COUNT_KEYS)[number];

/**
 * Host-side settings for rendering the texture. Width and height must be
 * multiples of the 8x8 tile; they are validated, never rounded.
 *  - workers: CPU worker threads (0 = render on the calling thread)
 */
export type TextureConfig = {
  width: number;
  height: number;
  backend: BackendPreference;
  workers: number;
  label: string;
};

export type TextureConfigInit = Partial<TextureConfig>;

// 1280x720: 160x90 tiles.
const INTERNAL_DEFAULT_TEXTURE_CONFIG: TextureConfig = {
  width: 1280,
  height: 720,
  backend: 'auto',
  workers: 0,
  label: 'julia-texture',
};

const TEXTURE_CONFIG_BOUNDS: Record<TextureConfigCountKey, { min: number; max: number }> = {
  workers: { min: 0, max: 64 },
};

const sanitizeCount = (key: TextureConfigCountKey, value: number | undefined): number => {
  if (value == null || Number.isNaN(value)) return INTERNAL_DEFAULT_TEXTURE_CONFIG[key];
  const bounds = TEXTURE_CONFIG_BOUNDS[key];
  return Math.trunc(clamp(value, bounds.min, bounds.max));
};

export const isBackendPreference = (value: unknown): value is BackendPreference =>
  typeof value === 'string' && BACKEND_PREFERENCES.some((candidate) => candidate === value);

const sanitizeBackend = (backend: string | undefined): BackendPreference =>
  isBackendPreference(backend) ? backend : INTERNAL_DEFAULT_TEXTURE_CONFIG.backend;

const sanitizeLabel = (label: string | undefined): string => {
  const trimmed = label?.trim();
  return trimmed ? trimmed : INTERNAL_DEFAULT_TEXTURE_CONFIG.label;
};

export const createTextureConfig = (init?: TextureConfigInit): TextureConfig => {
  const width = init?.width ?? INTERNAL_DEFAULT_TEXTURE_CONFIG.width;
  const height = init?.height ?? INTERNAL_DEFAULT_TEXTURE_CONFIG.height;
  planDispatch(width, height);
  return {
    width,
    height,
    backend: sanitizeBackend(init?.backend),
    workers: sanitizeCount('workers', init?.workers),
    label: sanitizeLabel(init?.label),
  };
};

export const DEFAULT_TEXTURE_CONFIG: Readonly<TextureConfig> = Object.freeze(
  createTextureConfig(INTERNAL_DEFAULT_TEXTURE_CONFIG),
);

export const getDefaultTextureConfig = (): TextureConfig => createTextureConfig();

export const getTextureConfigBounds = () => ({
  counts: { ...TEXTURE_CONFIG_BOUNDS },
  backends: [...BACKEND_PREFERENCES],
});
