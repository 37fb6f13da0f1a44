import { readFileSync } from 'fs';
import fs from 'fs/promises';
import path from 'path';

export async function ensureDirectories(dirs: string[]) {
  for (const dir of dirs) {
    await fs.mkdir(dir, { recursive: true });
  }
}

export async function makeTempDir(root: string, prefix: string): Promise<string> {
  await fs.mkdir(root, { recursive: true });
  return fs.mkdtemp(path.join(root, prefix));
}

export async function removeDir(dir: string) {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function findFile(dir: string, preferredExt: string): Promise<string | undefined> {
  const files = (await fs.readdir(dir)).filter((f) => !f.endsWith('.part'));
  const match = files.find((f) => f.endsWith(preferredExt)) ?? files[0];
  return match ? path.join(dir, match) : undefined;
}

export function readJson(filePath: string): unknown {
  return JSON.parse(readFileSync(filePath, 'utf8'));
}
