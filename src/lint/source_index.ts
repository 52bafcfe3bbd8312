import type { SourceMap, SourceMapEntry } from '../assembler/types.js';

/**
 * Address → source line index over an assembler source map.
 *
 * Entries are sorted by `(address, line)`; a lookup returns the greatest entry whose address is
 * `<=` the query (floor semantics), or `undefined` when the query precedes every entry.
 */
export class SourceIndex {
  private readonly entries: readonly SourceMapEntry[];
  private readonly files: ReadonlyMap<number, string>;

  constructor(sourceMap: SourceMap) {
    this.entries = [...sourceMap.entries].sort((a, b) =>
      a.address !== b.address ? a.address - b.address : a.line - b.line,
    );
    this.files = new Map(sourceMap.files.map((f) => [f.id, f.path]));
  }

  lookup(address: number): SourceMapEntry | undefined {
    // Upper bound: first entry with address > query.
    let lo = 0;
    let hi = this.entries.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const midAddress = this.entries[mid]?.address ?? 0;
      if (midAddress <= address) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo === 0 ? undefined : this.entries[lo - 1];
  }

  fileForId(id: number): string | undefined {
    return this.files.get(id);
  }

  get size(): number {
    return this.entries.length;
  }
}
