import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

/**
 * Read and parse a JSON table from the package's `data/` directory.
 *
 * Looks upwards from this module, so it works from the sources and from the build output.
 *
 * @internal
 */
export function readDataFile(name: string): unknown {
  let dir = dirname(fileURLToPath(import.meta.url));
  while (true) {
    const candidate = join(dir, 'data', name);
    if (existsSync(candidate)) {
      return JSON.parse(readFileSync(candidate, 'utf8'));
    }
    const parent = dirname(dir);
    if (parent === dir) {
      throw new Error(`Data file '${name}' not found`);
    }
    dir = parent;
  }
}
