import { describe, expect, it } from 'vitest';

import type { SourceMap } from '../src/assembler/types.js';
import { buildStateOverrides, parseAssumeHints } from '../src/workspace/hints.js';

describe('assume hints', () => {
  it('reads m, x and mx hints from comments by 1-based line', () => {
    const text = ['lda #0 ; assume m:16', 'nop', 'ldx #0 ; ASSUME X:8', 'rep #$30 ; assume mx:16'].join('\n');
    expect([...parseAssumeHints(text)]).toEqual([
      [1, { m: 2 }],
      [3, { x: 1 }],
      [4, { m: 2, x: 2 }],
    ]);
  });

  it('ignores hints outside comments and unsupported widths', () => {
    expect(parseAssumeHints('assume m:16\nnop ; assume m:32').size).toBe(0);
  });

  it('maps hints to addresses of lines in the document only', () => {
    const sourceMap: SourceMap = {
      files: [
        { id: 0, crc: 0, path: 'main.asm' },
        { id: 1, crc: 0, path: 'other.asm' },
      ],
      entries: [
        { address: 0x8000, fileId: 0, line: 1 },
        { address: 0x8003, fileId: 1, line: 1 },
        { address: 0x8005, fileId: 0, line: 4 },
      ],
    };
    const hints = parseAssumeHints(['lda #0 ; assume m:16', 'nop', 'nop', 'rep #$30 ; assume mx:16'].join('\n'));
    expect([...buildStateOverrides(hints, sourceMap, (p) => p === 'main.asm')]).toEqual([
      [0x8000, { m: 2 }],
      [0x8005, { m: 2, x: 2 }],
    ]);
  });

  it('applies a hint only at the first address of its line', () => {
    const sourceMap: SourceMap = {
      files: [{ id: 0, crc: 0, path: 'main.asm' }],
      entries: [
        { address: 0x8000, fileId: 0, line: 1 },
        { address: 0x8002, fileId: 0, line: 1 },
      ],
    };
    const hints = parseAssumeHints('%Setup() ; assume x:8');
    expect([...buildStateOverrides(hints, sourceMap, () => true)]).toEqual([[0x8000, { x: 1 }]]);
  });
});
