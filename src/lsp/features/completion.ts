import lsp from 'vscode-languageserver/node.js';
import type { CompletionItem, CompletionItemKind, Position } from 'vscode-languageserver/node.js';

import { directives } from '../../isa/directives.js';
import { mnemonics } from '../../isa/opcodes.js';
import type { DocumentState } from '../../workspace/state.js';
import { tokenPrefixAt } from '../../workspace/text.js';
import { toCompletionKind } from '../convert.js';
import type { FeatureContext } from './context.js';

export const COMPLETION_TRIGGERS = ['!', '.', '@'];

/**
 * Case-insensitive prefix completion over directives, indexed symbols, the document's assembled
 * labels and defines, its macros and the mnemonic set. The first item with a given label wins.
 */
export function completion(doc: DocumentState, position: Position, ctx: FeatureContext): CompletionItem[] {
  const prefix = tokenPrefixAt(doc.text, position.line, position.character).replace(/^!/, '');
  if (prefix.length === 0) return [];
  const lower = prefix.toLowerCase();

  const items: CompletionItem[] = [];
  const seen = new Set<string>();
  const push = (label: string, kind: CompletionItemKind, detail: string): void => {
    if (!label.toLowerCase().startsWith(lower) || seen.has(label)) return;
    seen.add(label);
    items.push(detail.length > 0 ? { label, kind, detail } : { label, kind });
  };

  for (const directive of directives()) push(directive, lsp.CompletionItemKind.Keyword, 'directive');
  for (const symbols of ctx.workspace.symbolIndex.values()) {
    for (const symbol of symbols) push(symbol.name, toCompletionKind(symbol.kind), symbol.detail);
  }
  for (const label of doc.labels) push(label.name, lsp.CompletionItemKind.Variable, 'label');
  for (const define of doc.defines) {
    push(define.name, lsp.CompletionItemKind.Constant, define.value.length > 0 ? define.value : 'define');
  }
  for (const symbol of doc.symbols) {
    if (symbol.kind === 'macro') push(symbol.name, lsp.CompletionItemKind.Function, 'macro');
  }
  for (const mnemonic of mnemonics()) push(mnemonic, lsp.CompletionItemKind.Keyword, 'opcode 65816');
  return items;
}
