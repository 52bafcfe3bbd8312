import lsp from 'vscode-languageserver/node.js';
import type {
  CompletionItemKind,
  Diagnostic as LspDiagnostic,
  Range,
  SymbolKind as LspSymbolKind,
} from 'vscode-languageserver/node.js';

import type { Diagnostic } from '../diagnostics/types.js';
import type { SymbolEntry, SymbolKind } from '../workspace/parse.js';

export const DIAGNOSTIC_SOURCE = 'mx65';

/** Single-line range for a 0-based position and length. */
export function lineRange(line: number, character: number, length = 0): Range {
  return {
    start: { line, character },
    end: { line, character: character + length },
  };
}

/**
 * Internal diagnostics carry 1-based positions; the protocol wants 0-based ones.
 */
export function toLspDiagnostic(diagnostic: Diagnostic): LspDiagnostic {
  const line = Math.max(0, (diagnostic.line ?? 1) - 1);
  const character = Math.max(0, (diagnostic.column ?? 1) - 1);
  return {
    range: { start: { line, character }, end: { line, character: character + 1 } },
    severity: diagnostic.severity === 'error' ? lsp.DiagnosticSeverity.Error : lsp.DiagnosticSeverity.Warning,
    code: diagnostic.id,
    source: DIAGNOSTIC_SOURCE,
    message: diagnostic.message,
  };
}

export function symbolRange(symbol: SymbolEntry): Range {
  return lineRange(Math.max(0, symbol.line), Math.max(0, symbol.column), symbol.name.length);
}

export function toSymbolKind(kind: SymbolKind): LspSymbolKind {
  switch (kind) {
    case 'label':
      return lsp.SymbolKind.Function;
    case 'macro':
      return lsp.SymbolKind.Method;
    case 'define':
      return lsp.SymbolKind.Constant;
    case 'data':
      return lsp.SymbolKind.Variable;
    case 'struct':
      return lsp.SymbolKind.Struct;
    case 'struct-field':
      return lsp.SymbolKind.Field;
  }
}

export function toCompletionKind(kind: SymbolKind): CompletionItemKind {
  switch (kind) {
    case 'label':
    case 'data':
      return lsp.CompletionItemKind.Variable;
    case 'macro':
      return lsp.CompletionItemKind.Function;
    case 'define':
      return lsp.CompletionItemKind.Constant;
    case 'struct':
      return lsp.CompletionItemKind.Struct;
    case 'struct-field':
      return lsp.CompletionItemKind.Field;
  }
}
