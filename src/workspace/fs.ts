import { readdirSync, readFileSync, statSync } from 'node:fs';

export interface DirectoryEntry {
  name: string;
  isDirectory: boolean;
  isFile: boolean;
}

/**
 * Synchronous filesystem seam for the workspace engine.
 *
 * `readText`, `readBytes` and `list` throw on failure; callers decide whether that is fatal.
 */
export interface FileSystem {
  /** Modification time in ms, or `undefined` when the path cannot be stat'ed. */
  mtimeMs(path: string): number | undefined;
  exists(path: string): boolean;
  readText(path: string): string;
  readBytes(path: string): Uint8Array;
  list(dir: string): DirectoryEntry[];
}

export const nodeFileSystem: FileSystem = {
  mtimeMs(path) {
    try {
      return statSync(path).mtimeMs;
    } catch {
      return undefined;
    }
  },
  exists(path) {
    return this.mtimeMs(path) !== undefined;
  },
  readText(path) {
    return readFileSync(path, 'utf8');
  },
  readBytes(path) {
    return new Uint8Array(readFileSync(path));
  },
  list(dir) {
    return readdirSync(dir, { withFileTypes: true }).map((d) => ({
      name: d.name,
      isDirectory: d.isDirectory(),
      isFile: d.isFile(),
    }));
  },
};
