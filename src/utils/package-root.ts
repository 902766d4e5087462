/**
 * Locate the package root (the nearest directory holding package.json),
 * starting from this module. Works from both `src/` and the compiled `dist/`.
 */

import { existsSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

let cachedRoot: string | null | undefined;

export function findPackageRoot(): string | null {
  if (cachedRoot !== undefined) {
    return cachedRoot;
  }

  let dir = dirname(fileURLToPath(import.meta.url));
  for (;;) {
    if (existsSync(join(dir, 'package.json'))) {
      cachedRoot = dir;
      return dir;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      cachedRoot = null;
      return null;
    }
    dir = parent;
  }
}
