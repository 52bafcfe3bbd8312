import { readDataFile } from '../data/load.js';

let names: string[] | undefined;
let lookup: Set<string> | undefined;

/** Assembler directive keywords, lower case and sorted. */
export function directives(): string[] {
  if (names === undefined) {
    const raw = readDataFile('directives.json');
    if (!Array.isArray(raw)) throw new Error('directives.json must be an array');
    names = raw
      .filter((d): d is string => typeof d === 'string')
      .map((d) => d.toLowerCase())
      .sort();
  }
  return names;
}

export function isDirective(token: string): boolean {
  lookup ??= new Set(directives());
  return lookup.has(token.toLowerCase());
}
