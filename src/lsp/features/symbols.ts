import type { DocumentSymbol, SymbolInformation } from 'vscode-languageserver/node.js';

import type { DocumentState, WorkspaceState } from '../../workspace/state.js';
import { symbolRange, toSymbolKind } from '../convert.js';

/** Outline of the symbols declared in this document (not in its includes). */
export function documentSymbols(doc: DocumentState): DocumentSymbol[] {
  return doc.symbols
    .filter((s) => s.uri.length === 0 || s.uri === doc.uri)
    .map((s) => {
      const range = symbolRange(s);
      const symbol: DocumentSymbol = { name: s.name, kind: toSymbolKind(s.kind), range, selectionRange: range };
      if (s.detail.length > 0) symbol.detail = s.detail;
      return symbol;
    });
}

/** Case-insensitive substring search over the workspace symbol index. */
export function workspaceSymbols(query: string, workspace: WorkspaceState): SymbolInformation[] {
  const needle = query.toLowerCase();
  const out: SymbolInformation[] = [];
  for (const [indexUri, symbols] of workspace.symbolIndex) {
    for (const s of symbols) {
      if (!s.name.toLowerCase().includes(needle)) continue;
      const uri = s.uri.length > 0 ? s.uri : indexUri;
      const info: SymbolInformation = { name: s.name, kind: toSymbolKind(s.kind), location: { uri, range: symbolRange(s) } };
      if (s.detail.length > 0) info.containerName = s.detail;
      out.push(info);
    }
  }
  return out;
}
