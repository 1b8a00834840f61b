import { copyFile, mkdir, readdir } from 'node:fs/promises';
import { dirname, join, relative } from 'node:path';
import { fileURLToPath } from 'node:url';

const rootDir = join(dirname(fileURLToPath(import.meta.url)), '..');
const sourceDir = join(rootDir, 'src');
const outputDir = join(rootDir, 'dist', 'src');

const findShaders = async (dir: string): Promise<string[]> => {
  const entries = await readdir(dir, { withFileTypes: true });
  const nested = await Promise.all(
    entries.map(async (entry) => {
      const path = join(dir, entry.name);
      if (entry.isDirectory()) return findShaders(path);
      return entry.name.endsWith('.wgsl') ? [path] : [];
    }),
  );
  return nested.flat();
};

const main = async () => {
  const shaders = await findShaders(sourceDir);
  for (const shader of shaders) {
    const target = join(outputDir, relative(sourceDir, shader));
    await mkdir(dirname(target), { recursive: true });
    await copyFile(shader, target);
    console.log(`[copy-shaders] ${relative(rootDir, shader)} -> ${relative(rootDir, target)}`);
  }
};

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
