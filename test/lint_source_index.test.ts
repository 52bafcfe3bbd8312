import { describe, expect, it } from 'vitest';

import { SourceIndex } from '../src/lint/source_index.js';

describe('SourceIndex', () => {
  const index = new SourceIndex({
    files: [{ id: 1, crc: 0, path: 'main.asm' }],
    entries: [
      { address: 0x8010, fileId: 1, line: 20 },
      { address: 0x8000, fileId: 1, line: 10 },
      { address: 0x8000, fileId: 1, line: 9 },
    ],
  });

  it('finds the greatest entry at or below the address', () => {
    expect(index.lookup(0x8000)).toEqual({ address: 0x8000, fileId: 1, line: 10 });
    expect(index.lookup(0x800f)?.line).toBe(10);
    expect(index.lookup(0x8010)?.line).toBe(20);
    expect(index.lookup(0xffffff)?.line).toBe(20);
  });

  it('has nothing for addresses before the first entry', () => {
    expect(index.lookup(0x7fff)).toBeUndefined();
    expect(new SourceIndex({ files: [], entries: [] }).lookup(0x8000)).toBeUndefined();
  });

  it('maps file ids to paths', () => {
    expect(index.fileForId(1)).toBe('main.asm');
    expect(index.fileForId(2)).toBeUndefined();
    expect(index.size).toBe(3);
  });
});
