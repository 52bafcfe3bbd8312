import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

const here = dirname(fileURLToPath(import.meta.url));

let dataDir: string | undefined;

/**
 * Locate the package `data/` directory by walking up from this module.
 *
 * Works from both `src/data` (tests, tsx) and `dist/src/data` (built CLI).
 */
function findDataDir(): string {
  if (dataDir !== undefined) return dataDir;
  let dir = here;
  for (;;) {
    const candidate = join(dir, 'data', 'opcodes.json');
    if (existsSync(candidate)) {
      dataDir = join(dir, 'data');
      return dataDir;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      throw new Error(`mx65 data directory not found above ${here}`);
    }
    dir = parent;
  }
}

/**
 * Read and parse a bundled JSON table. Callers validate the shape.
 */
export function readDataFile(name: string): unknown {
  const text = readFileSync(join(findDataDir(), name), 'utf8');
  const parsed: unknown = JSON.parse(text);
  return parsed;
}

/** `version` from the package manifest beside `data/`, or `0.0.0` when it has none. */
export function packageVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(join(dirname(findDataDir()), 'package.json'), 'utf8'));
  if (manifest !== null && typeof manifest === 'object') {
    const version: unknown = Reflect.get(manifest, 'version');
    if (typeof version === 'string') return version;
  }
  return '0.0.0';
}
