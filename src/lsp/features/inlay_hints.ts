import lsp from 'vscode-languageserver/node.js';
import type { InlayHint, Range } from 'vscode-languageserver/node.js';

import type { DocumentState } from '../../workspace/state.js';
import { isIdentifierChar, splitLines, stripComment } from '../../workspace/text.js';
import { findMacro, type FeatureContext } from './context.js';

function addressHints(code: string, line: number, doc: DocumentState, out: InlayHint[]): void {
  for (const match of code.matchAll(/\$([0-9A-Fa-f]{2,})/g)) {
    const digits = match[1];
    if (digits === undefined || match.index === undefined) continue;
    const label = doc.addressToLabel.get(Number.parseInt(digits, 16));
    if (label === undefined) continue;
    out.push({
      position: { line, character: match.index + digits.length + 1 },
      label: ` :${label.name}`,
      kind: lsp.InlayHintKind.Type,
      paddingLeft: true,
    });
  }
}

function parameterHint(line: number, character: number, name: string): InlayHint {
  return {
    position: { line, character },
    label: `${name}:`,
    kind: lsp.InlayHintKind.Parameter,
    paddingRight: true,
  };
}

function macroArgumentHints(code: string, line: number, doc: DocumentState, ctx: FeatureContext, out: InlayHint[]): void {
  for (const match of code.matchAll(/%?([A-Za-z_.][A-Za-z0-9_.]*)\s*\(/g)) {
    const name = match[1];
    if (name === undefined || match.index === undefined) continue;
    if (isIdentifierChar(code[match.index - 1])) continue;
    const parameters = findMacro(name, doc, ctx)?.parameters ?? [];
    const first = parameters[0];
    if (first === undefined) continue;

    let k = match.index + match[0].length;
    out.push(parameterHint(line, k, first));
    let index = 1;
    let depth = 0;
    let inString = false;
    for (; k < code.length && index < parameters.length; k++) {
      const ch = code[k];
      if (ch === '"') {
        inString = !inString;
      } else if (inString) {
        continue;
      } else if (ch === '(') {
        depth++;
      } else if (ch === ')') {
        if (depth === 0) break;
        depth--;
      } else if (ch === ',' && depth === 0) {
        let at = k + 1;
        while (at < code.length && /\s/.test(code[at] ?? '')) at++;
        const param = parameters[index];
        if (param !== undefined) out.push(parameterHint(line, at, param));
        index++;
      }
    }
  }
}

/**
 * Label names after `$hex` operands that match an assembled label address, and parameter names
 * before macro call arguments. Lines outside `range` are skipped.
 */
export function inlayHints(doc: DocumentState, range: Range | undefined, ctx: FeatureContext): InlayHint[] {
  const hints: InlayHint[] = [];
  const first = range?.start.line ?? 0;
  const last = range?.end.line ?? Number.MAX_SAFE_INTEGER;
  splitLines(doc.text).forEach((raw, line) => {
    if (line < first || line > last) return;
    const code = stripComment(raw);
    addressHints(code, line, doc, hints);
    macroArgumentHints(code, line, doc, ctx, hints);
  });
  return hints;
}
