import type { Position, SignatureHelp } from 'vscode-languageserver/node.js';

import type { DocumentState } from '../../workspace/state.js';
import { isIdentifierChar, splitLines } from '../../workspace/text.js';
import { findMacro, macroSignature, type FeatureContext } from './context.js';

interface OpenCall {
  name: string;
  activeParameter: number;
}

/**
 * Walk left from the cursor to the innermost unmatched `(` and read the name before it.
 * Commas at the call's own nesting level count the active parameter.
 */
export function openCallAt(line: string, character: number): OpenCall | undefined {
  let depth = 0;
  let commas = 0;
  let p = Math.min(character, line.length) - 1;
  for (; p >= 0; p--) {
    const ch = line[p];
    if (ch === ')') {
      depth++;
    } else if (ch === '(') {
      if (depth === 0) break;
      depth--;
    } else if (ch === ',' && depth === 0) {
      commas++;
    }
  }
  if (p <= 0) return undefined;

  let end = p;
  while (end > 0 && /\s/.test(line[end - 1] ?? '')) end--;
  let start = end;
  while (start > 0 && isIdentifierChar(line[start - 1])) start--;
  const name = line.slice(start, end);
  return name.length > 0 ? { name, activeParameter: commas } : undefined;
}

export function signatureHelp(doc: DocumentState, position: Position, ctx: FeatureContext): SignatureHelp | null {
  const line = splitLines(doc.text)[position.line];
  if (line === undefined) return null;
  const call = openCallAt(line, position.character);
  if (call === undefined) return null;
  const macro = findMacro(call.name, doc, ctx);
  const parameters = macro?.parameters ?? [];
  if (macro === undefined || parameters.length === 0) return null;
  return {
    signatures: [{ label: macroSignature(macro), parameters: parameters.map((label) => ({ label })) }],
    activeSignature: 0,
    activeParameter: call.activeParameter,
  };
}
