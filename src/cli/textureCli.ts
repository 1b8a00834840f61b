#!/usr/bin/env node
import { resolve } from 'node:path';
import process from 'node:process';

import { renderTexture } from '../runtime/renderService.js';
import { toRgba8Unorm } from '../texture/image.js';
import { parseRenderArgs, UsageError } from './utils/args.js';
import { writeImageFile } from './utils/imageWriter.js';

const printMainUsage = () => {
  console.log(`texture-cli – render the julia gradient texture

Commands:
  render --output <file> [--width 1280] [--height 720] [--backend auto|gpu-first|cpu-only]
         [--workers N] [--ffmpeg path] [--json]

Run "texture-cli <command> --help" to learn more about a command.`);
};

const printRenderUsage = () => {
  console.log(`texture-cli render

Render the texture and write it to an image file.

Required:
  --output <file>        .pam is written directly, other formats are encoded with ffmpeg

Optional:
  --width <px>           Output width, multiple of 8 (default 1280)
  --height <px>          Output height, multiple of 8 (default 720)
  --backend <mode>       auto | gpu-first | cpu-only (default auto)
  --workers <count>      CPU worker threads, 0 renders inline (default 0)
  --ffmpeg <path>        ffmpeg executable (default "ffmpeg")
  --json                 Emit the summary as JSON
`);
};

const wantsHelp = (args: readonly string[]) => args.includes('--help') || args.includes('-h');

const handleRenderCommand = async (args: string[]) => {
  if (wantsHelp(args)) {
    printRenderUsage();
    return;
  }
  const options = parseRenderArgs(args);
  const result = await renderTexture({
    width: options.width,
    height: options.height,
    backend: options.backend,
    workers: options.workers,
  });
  const outputPath = resolve(process.cwd(), options.output);
  const format = await writeImageFile(
    outputPath,
    result.width,
    result.height,
    toRgba8Unorm(result.image),
    { ffmpeg: options.ffmpeg },
  );
  const summary = {
    output: outputPath,
    format,
    width: result.width,
    height: result.height,
    tiles: result.shape,
    backend: result.backend,
    invocations: result.report.invocations,
    dispatchMs: result.report.timeMs,
    digest: result.digest,
  };
  if (options.json) {
    console.log(JSON.stringify(summary, null, 2));
    return;
  }
  console.log(`Rendered ${result.width}x${result.height} on ${result.backend} → ${outputPath}`);
  console.log(`  tiles      ${result.shape.x}x${result.shape.y}x${result.shape.z}`);
  console.log(`  dispatch   ${result.report.timeMs.toFixed(3)} ms`);
  console.log(`  blake3     ${result.digest}`);
};

const main = async () => {
  const [, , ...argv] = process.argv;
  if (argv.length === 0 || argv[0] === '--help' || argv[0] === '-h') {
    printMainUsage();
    return;
  }
  const [command, ...rest] = argv;
  switch (command) {
    case 'render':
      await handleRenderCommand(rest);
      break;
    default:
      throw new UsageError(`Unknown command "${command}".`);
  }
};

main().catch((error: unknown) => {
  if (error instanceof UsageError) {
    console.error(error.message);
    printMainUsage();
  } else {
    console.error(error instanceof Error ? error.message : error);
  }
  process.exit(1);
});
