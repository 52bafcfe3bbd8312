import { basename, extname, isAbsolute, resolve } from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';

import type { FileSystem } from './fs.js';

export const SOURCE_EXTENSIONS: readonly string[] = ['.asm', '.s', '.inc'];

/** Extensions scanned for references and renames. */
export const REFERENCE_EXTENSIONS: readonly string[] = ['.asm', '.s', '.inc', '.a'];

export function normalizePath(path: string): string {
  return resolve(path);
}

export function pathToUri(path: string): string {
  return pathToFileURL(normalizePath(path)).href;
}

/**
 * Filesystem path for a `file:` URI. Other schemes are returned unchanged.
 */
export function uriToPath(uri: string): string {
  if (!uri.startsWith('file:')) return uri;
  try {
    return fileURLToPath(uri);
  } catch {
    return decodeURIComponent(uri.replace(/^file:\/\//, ''));
  }
}

export function hasExtension(path: string, extensions: readonly string[]): boolean {
  return extensions.includes(extname(path).toLowerCase());
}

/**
 * `main.asm`, `game_main.asm` and `game-main.s` are entry-point candidates.
 */
export function isMainFileName(path: string): boolean {
  const ext = extname(path);
  const stem = basename(path, ext).toLowerCase();
  return stem === 'main' || stem.endsWith('_main') || stem.endsWith('-main');
}

/**
 * Resolve an include target: absolute paths must exist; relative paths are tried against
 * `baseDir` and then each include path, first match wins.
 */
export function resolveIncludePath(
  raw: string,
  baseDir: string,
  includePaths: readonly string[],
  fs: FileSystem,
): string | undefined {
  if (isAbsolute(raw)) {
    return fs.exists(raw) ? normalizePath(raw) : undefined;
  }
  for (const dir of [baseDir, ...includePaths]) {
    const candidate = resolve(dir, raw);
    if (fs.exists(candidate)) return candidate;
  }
  return undefined;
}

/** Resolve an `incdir` argument relative to `baseDir`. */
export function resolveIncdirPath(raw: string, baseDir: string, fs: FileSystem): string | undefined {
  const candidate = isAbsolute(raw) ? normalizePath(raw) : resolve(baseDir, raw);
  return fs.exists(candidate) ? candidate : undefined;
}

/** Normalized, `/`-separated form used for suffix comparisons. */
export function slashPath(path: string): string {
  return path.replace(/\\/g, '/');
}

/**
 * Whether `path` ends with `suffix` on a path-segment boundary.
 */
export function endsWithPath(path: string, suffix: string): boolean {
  const p = slashPath(path);
  const s = slashPath(suffix).replace(/^\.\//, '');
  if (s.length === 0 || !p.endsWith(s)) return false;
  if (p.length === s.length) return true;
  return p[p.length - s.length - 1] === '/';
}
