import { formatError, nullLogger, type Logger } from '../logging.js';
import { nodeFileSystem, type FileSystem } from './fs.js';
import { parseText, type ParsedFile } from './parse.js';
import { normalizePath, pathToUri } from './paths.js';

interface CacheEntry<T> {
  mtimeMs: number;
  value: T;
}

/**
 * Single-entry-per-path cache invalidated by modification time only.
 *
 * A hit costs one stat and no reads. Entries are never evicted.
 */
export class MtimeCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();

  constructor(
    private readonly fs: FileSystem,
    private readonly load: (path: string) => T,
    private readonly logger: Logger = nullLogger,
  ) {}

  get(path: string): T | undefined {
    const key = normalizePath(path);
    const mtimeMs = this.fs.mtimeMs(key);
    if (mtimeMs === undefined) return undefined;
    const cached = this.entries.get(key);
    if (cached !== undefined && cached.mtimeMs === mtimeMs) return cached.value;
    let value: T;
    try {
      value = this.load(key);
    } catch (err) {
      this.logger.warn(`failed to load ${key}: ${formatError(err)}`);
      return undefined;
    }
    this.entries.set(key, { mtimeMs, value });
    return value;
  }

  has(path: string): boolean {
    return this.entries.has(normalizePath(path));
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Parsed-file cache keyed by absolute path. Symbols carry the file's URI.
 */
export class ParseCache {
  private readonly cache: MtimeCache<ParsedFile>;

  constructor(
    private readonly fs: FileSystem = nodeFileSystem,
    logger: Logger = nullLogger,
  ) {
    this.cache = new MtimeCache(fs, (path) => parseText(this.fs.readText(path), pathToUri(path)), logger);
  }

  /** Cached parse when the mtime is unchanged; otherwise read, parse and replace the entry. */
  loadAndCacheFromDisk(path: string): ParsedFile | undefined {
    return this.cache.get(path);
  }

  get size(): number {
    return this.cache.size;
  }
}

/**
 * Base ROM images, zero-extended to `minSize` when the file is shorter.
 */
export class RomCache {
  private readonly cache: MtimeCache<Uint8Array>;

  constructor(fs: FileSystem = nodeFileSystem, logger: Logger = nullLogger) {
    this.cache = new MtimeCache(fs, (path) => fs.readBytes(path), logger);
  }

  load(path: string, minSize = 0): Uint8Array | undefined {
    const bytes = this.cache.get(path);
    if (bytes === undefined || bytes.length >= minSize) return bytes;
    const padded = new Uint8Array(minSize);
    padded.set(bytes);
    return padded;
  }
}
