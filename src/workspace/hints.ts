import type { SourceMap } from '../assembler/types.js';
import type { WidthOverride } from '../lint/width_flow.js';
import type { Width } from '../isa/opcodes.js';
import { commentOf, splitLines } from './text.js';

const ASSUME_RE = /\bassume\s+(mx|m|x)\s*:\s*(8|16)\b/i;

/**
 * `; assume m:16` style comments, keyed by 1-based line.
 */
export function parseAssumeHints(text: string): Map<number, WidthOverride> {
  const hints = new Map<number, WidthOverride>();
  splitLines(text).forEach((line, index) => {
    const comment = commentOf(line);
    if (comment === undefined) return;
    const match = ASSUME_RE.exec(comment);
    if (!match?.[1] || !match[2]) return;
    const width: Width = match[2] === '16' ? 2 : 1;
    const flags = match[1].toLowerCase();
    const override: WidthOverride = {};
    if (flags.includes('m')) override.m = width;
    if (flags.includes('x')) override.x = width;
    hints.set(index + 1, override);
  });
  return hints;
}

/**
 * Translate line hints into lint state overrides. Each hinted line applies at the first address
 * the source map assigns to it in a file accepted by `isDocumentFile`.
 */
export function buildStateOverrides(
  hints: ReadonlyMap<number, WidthOverride>,
  sourceMap: SourceMap,
  isDocumentFile: (path: string) => boolean,
): Map<number, WidthOverride> {
  const overrides = new Map<number, WidthOverride>();
  if (hints.size === 0) return overrides;
  const fileIds = new Set(sourceMap.files.filter((f) => isDocumentFile(f.path)).map((f) => f.id));
  const placed = new Set<number>();
  for (const entry of sourceMap.entries) {
    if (!fileIds.has(entry.fileId) || placed.has(entry.line)) continue;
    const hint = hints.get(entry.line);
    if (hint === undefined) continue;
    placed.add(entry.line);
    overrides.set(entry.address, { ...overrides.get(entry.address), ...hint });
  }
  return overrides;
}
