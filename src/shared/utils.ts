import { fileURLToPath } from 'node:url';
import fs from 'node:fs';
import path from 'node:path';
import { homedir } from 'node:os';

export function resolvePath(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return path.join(homedir(), p.slice(1));
  }
  return path.resolve(p);
}

/**
 * Accepts either a plain path or a `sqlite://` URL (DATABASE_URL style).
 */
export function databasePathFromUrl(url: string): string {
  return url.startsWith('sqlite://') ? url.slice('sqlite://'.length) : url;
}

export function getPackageRoot(): string {
  // Walk up from the current file to the directory holding package.json.
  // Works for both tsx/vitest (src/shared/utils.ts) and the build (dist/shared/utils.js).
  let dir = path.dirname(fileURLToPath(import.meta.url));
  while (true) {
    if (fs.existsSync(path.join(dir, 'package.json'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');
}

export function getGemfeedDir(): string {
  return resolvePath('~/.gemfeed');
}

export function getDefaultSeedFile(): string {
  return path.join(getPackageRoot(), 'fixtures', 'seed.yaml');
}
