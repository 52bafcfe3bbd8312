import { describe, expect, it } from 'vitest';

import { MemoryLogger } from '../src/logging.js';
import { ParseCache, RomCache } from '../src/workspace/parse_cache.js';
import { MemoryFileSystem } from './helpers/memory_fs.js';

describe('ParseCache', () => {
  it('serves an unchanged file without reading it again', () => {
    const fs = new MemoryFileSystem({ '/proj/a.asm': 'Start:' });
    const cache = new ParseCache(fs);

    const first = cache.loadAndCacheFromDisk('/proj/a.asm');
    const second = cache.loadAndCacheFromDisk('/proj/a.asm');

    expect(second).toBe(first);
    expect(fs.readCount('/proj/a.asm')).toBe(1);
    expect(first?.symbols.map((s) => [s.name, s.uri])).toEqual([['Start', 'file:///proj/a.asm']]);
  });

  it('re-reads a file whose mtime changed', () => {
    const fs = new MemoryFileSystem({ '/proj/a.asm': 'Start:' });
    const cache = new ParseCache(fs);
    cache.loadAndCacheFromDisk('/proj/a.asm');

    fs.write('/proj/a.asm', 'Reset:');
    const reparsed = cache.loadAndCacheFromDisk('/proj/a.asm');

    expect(reparsed?.symbols.map((s) => s.name)).toEqual(['Reset']);
    expect(fs.readCount('/proj/a.asm')).toBe(2);
    expect(cache.size).toBe(1);
  });

  it('returns nothing for a missing file without trying to read it', () => {
    const fs = new MemoryFileSystem();
    const cache = new ParseCache(fs);
    expect(cache.loadAndCacheFromDisk('/proj/missing.asm')).toBeUndefined();
    expect(fs.totalReads()).toBe(0);
  });

  it('logs a read failure and caches nothing', () => {
    const fs = new MemoryFileSystem({ '/proj/lib/a.asm': 'A:' });
    const logger = new MemoryLogger();
    const cache = new ParseCache(fs, logger);

    expect(cache.loadAndCacheFromDisk('/proj/lib')).toBeUndefined();
    expect(cache.size).toBe(0);
    expect(logger.lines).toEqual([
      { level: 'warn', message: 'failed to load /proj/lib: ENOENT: no such file /proj/lib' },
    ]);
  });
});

describe('RomCache', () => {
  it('zero-extends a short image to the requested size', () => {
    const fs = new MemoryFileSystem();
    fs.write('/proj/base.sfc', new Uint8Array([1, 2]));
    const cache = new RomCache(fs);

    expect([...(cache.load('/proj/base.sfc', 4) ?? [])]).toEqual([1, 2, 0, 0]);
    expect([...(cache.load('/proj/base.sfc') ?? [])]).toEqual([1, 2]);
    expect(fs.readCount('/proj/base.sfc')).toBe(1);
  });

  it('returns nothing for a missing image', () => {
    expect(new RomCache(new MemoryFileSystem()).load('/proj/none.sfc', 16)).toBeUndefined();
  });
});
