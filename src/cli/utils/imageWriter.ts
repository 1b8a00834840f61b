import { writeFile } from 'node:fs/promises';
import { extname } from 'node:path';

import { pipeToCommand } from './exec.js';

/** Netpbm PAM header for 8-bit RGBA. */
export const pamHeader = (width: number, height: number): string =>
  `P7\nWIDTH ${width}\nHEIGHT ${height}\nDEPTH 4\nMAXVAL 255\nTUPLTYPE RGB_ALPHA\nENDHDR\n`;

export const encodePam = (width: number, height: number, rgba: Uint8Array): Buffer => {
  const expected = width * height * 4;
  if (rgba.length !== expected) {
    throw new Error(`encodePam expected ${expected} bytes for ${width}x${height}, received ${rgba.length}`);
  }
  return Buffer.concat([Buffer.from(pamHeader(width, height), 'ascii'), rgba]);
};

export const ffmpegEncodeArgs = (width: number, height: number, outputPath: string): string[] => [
  '-v',
  'error',
  '-y',
  '-f',
  'rawvideo',
  '-pix_fmt',
  'rgba',
  '-s',
  `${width}x${height}`,
  '-i',
  '-',
  '-frames:v',
  '1',
  outputPath,
];

export type WriteImageOptions = {
  ffmpeg?: string;
};

/** `.pam` is written directly; every other format is encoded by ffmpeg. */
export const writeImageFile = async (
  outputPath: string,
  width: number,
  height: number,
  rgba: Uint8Array,
  options: WriteImageOptions = {},
): Promise<'pam' | 'ffmpeg'> => {
  if (extname(outputPath).toLowerCase() === '.pam') {
    await writeFile(outputPath, encodePam(width, height, rgba));
    return 'pam';
  }
  await pipeToCommand(options.ffmpeg ?? 'ffmpeg', ffmpegEncodeArgs(width, height, outputPath), rgba);
  return 'ffmpeg';
};
