import type { DocumentState } from '../../workspace/state.js';

export const BANK_USAGE_COMMAND = 'mx65.getBankUsage';

export interface BankUsageEntry {
  snes: number;
  pc: number;
  size: number;
}

/** Written blocks of every open document, first occurrence of each `(snes, pc, size)` kept. */
export function bankUsage(documents: Iterable<DocumentState>): BankUsageEntry[] {
  const seen = new Set<string>();
  const out: BankUsageEntry[] = [];
  for (const doc of documents) {
    for (const block of doc.writtenBlocks) {
      const key = `${block.snesOffset}:${block.pcOffset}:${block.numBytes}`;
      if (seen.has(key)) continue;
      seen.add(key);
      out.push({ snes: block.snesOffset, pc: block.pcOffset, size: block.numBytes });
    }
  }
  return out;
}
