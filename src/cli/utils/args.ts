import { isBackendPreference } from '../../texture/textureConfig.js';
import type { BackendPreference } from '../../texture/textureKernel.js';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export type RenderArgs = {
  output: string;
  width?: number;
  height?: number;
  backend?: BackendPreference;
  workers?: number;
  ffmpeg?: string;
  json: boolean;
};

const parseInteger = (flag: string, value: string | undefined): number => {
  if (value == null || value.startsWith('--')) {
    throw new UsageError(`${flag} requires a value.`);
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new UsageError(`${flag} expects an integer, received "${value}".`);
  }
  return parsed;
};

const requireValue = (flag: string, value: string | undefined): string => {
  if (value == null || value.startsWith('--')) {
    throw new UsageError(`${flag} requires a value.`);
  }
  return value;
};

export const parseRenderArgs = (args: readonly string[]): RenderArgs => {
  let output: string | undefined;
  const parsed: Omit<RenderArgs, 'output'> = { json: false };
  for (let index = 0; index < args.length; index++) {
    const arg = args[index];
    const next = args[index + 1];
    switch (arg) {
      case '--output':
        output = requireValue(arg, next);
        index += 1;
        break;
      case '--width':
        parsed.width = parseInteger(arg, next);
        index += 1;
        break;
      case '--height':
        parsed.height = parseInteger(arg, next);
        index += 1;
        break;
      case '--workers':
        parsed.workers = parseInteger(arg, next);
        index += 1;
        break;
      case '--backend': {
        const backend = requireValue(arg, next);
        if (!isBackendPreference(backend)) {
          throw new UsageError(`--backend must be auto, gpu-first or cpu-only, received "${backend}".`);
        }
        parsed.backend = backend;
        index += 1;
        break;
      }
      case '--ffmpeg':
        parsed.ffmpeg = requireValue(arg, next);
        index += 1;
        break;
      case '--json':
        parsed.json = true;
        break;
      default:
        throw new UsageError(
          arg.startsWith('--') ? `Unknown flag ${arg}.` : `Unexpected argument "${arg}".`,
        );
    }
  }
  if (!output) {
    throw new UsageError('render requires --output <file>.');
  }
  return { output, ...parsed };
};
