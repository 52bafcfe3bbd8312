import type { SemanticTokens, SemanticTokensLegend } from 'vscode-languageserver/node.js';

import { isDirective } from '../../isa/directives.js';
import { isMnemonic } from '../../isa/opcodes.js';
import type { SymbolKind } from '../../workspace/parse.js';
import type { DocumentState } from '../../workspace/state.js';
import { isSymbolChar, splitLines, stripComment } from '../../workspace/text.js';

export const SEMANTIC_TOKEN_TYPES = [
  'function',
  'macro',
  'variable',
  'keyword',
  'string',
  'number',
  'operator',
  'register',
] as const;

export type SemanticTokenType = (typeof SEMANTIC_TOKEN_TYPES)[number];

export const semanticTokensLegend: SemanticTokensLegend = {
  tokenTypes: [...SEMANTIC_TOKEN_TYPES],
  tokenModifiers: [],
};

export interface RawToken {
  line: number;
  column: number;
  length: number;
  type: SemanticTokenType;
}

const OPERATORS = new Set(['+', '-', '*', '/', ',', '#', '(', ')']);
const REGISTERS = new Set(['a', 'x', 'y', 's']);

function symbolTokenType(kind: SymbolKind): SemanticTokenType {
  if (kind === 'macro') return 'macro';
  if (kind === 'define') return 'variable';
  return 'function';
}

function stringRanges(code: string): Array<[number, number]> {
  const ranges: Array<[number, number]> = [];
  for (let i = 0; i < code.length; i++) {
    if (code[i] !== '"') continue;
    const start = i;
    let escaped = false;
    for (i++; i < code.length; i++) {
      if (escaped) {
        escaped = false;
      } else if (code[i] === '\\') {
        escaped = true;
      } else if (code[i] === '"') {
        break;
      }
    }
    ranges.push([start, Math.min(i + 1, code.length)]);
  }
  return ranges;
}

function scanLine(code: string, line: number, out: RawToken[]): void {
  const strings = stringRanges(code);
  const inString = (pos: number): boolean => strings.some(([s, e]) => pos >= s && pos < e);
  for (const [start, end] of strings) out.push({ line, column: start, length: end - start, type: 'string' });

  const lead = /^\s*(\S+)/.exec(code);
  let operandStart = 0;
  if (lead?.[1] !== undefined) {
    const column = lead[0].length - lead[1].length;
    operandStart = lead[0].length;
    const word = lead[1];
    if (!inString(column) && (isMnemonic(word) || isDirective(word))) {
      out.push({ line, column, length: word.length, type: 'keyword' });
    }
  }

  for (let i = 0; i < code.length; ) {
    const ch = code[i] ?? '';
    if (inString(i)) {
      i++;
      continue;
    }
    if (OPERATORS.has(ch)) {
      out.push({ line, column: i, length: 1, type: 'operator' });
      i++;
      continue;
    }
    if (ch === '$' || ch === '%') {
      const digits = ch === '$' ? /^[0-9A-Fa-f]+/ : /^[01]+/;
      const match = digits.exec(code.slice(i + 1));
      if (match !== null) {
        out.push({ line, column: i, length: match[0].length + 1, type: 'number' });
        i += match[0].length + 1;
      } else {
        i++;
      }
      continue;
    }
    if (/[0-9]/.test(ch) && !isSymbolChar(code[i - 1])) {
      const match = /^[0-9]+/.exec(code.slice(i));
      const length = match?.[0].length ?? 1;
      out.push({ line, column: i, length, type: 'number' });
      i += length;
      continue;
    }
    if (
      i >= operandStart &&
      REGISTERS.has(ch.toLowerCase()) &&
      !isSymbolChar(code[i - 1]) &&
      !isSymbolChar(code[i + 1])
    ) {
      const before = code.slice(operandStart, i).trimEnd();
      if (before.length === 0 || before.endsWith(',')) {
        out.push({ line, column: i, length: 1, type: 'register' });
      }
    }
    i++;
  }
}

/**
 * Tokens sorted by position with overlaps removed; on a tie the earlier-collected token wins
 * (declared symbols before lexical classes).
 */
export function collectTokens(doc: DocumentState): RawToken[] {
  const tokens: RawToken[] = [];
  for (const symbol of doc.symbols) {
    if (symbol.uri.length > 0 && symbol.uri !== doc.uri) continue;
    tokens.push({
      line: Math.max(0, symbol.line),
      column: Math.max(0, symbol.column),
      length: symbol.name.length,
      type: symbolTokenType(symbol.kind),
    });
  }
  splitLines(doc.text).forEach((raw, line) => scanLine(stripComment(raw), line, tokens));

  tokens.sort((a, b) => a.line - b.line || a.column - b.column);
  const kept: RawToken[] = [];
  for (const token of tokens) {
    const prev = kept[kept.length - 1];
    if (prev !== undefined && prev.line === token.line && token.column < prev.column + prev.length) continue;
    kept.push(token);
  }
  return kept;
}

/** Relative encoding: `[deltaLine, deltaStart, length, typeIndex, 0]` per token. */
export function encodeTokens(tokens: readonly RawToken[]): number[] {
  const data: number[] = [];
  let lastLine = 0;
  let lastColumn = 0;
  for (const token of tokens) {
    const deltaLine = token.line - lastLine;
    const deltaStart = deltaLine === 0 ? token.column - lastColumn : token.column;
    data.push(deltaLine, deltaStart, token.length, SEMANTIC_TOKEN_TYPES.indexOf(token.type), 0);
    lastLine = token.line;
    lastColumn = token.column;
  }
  return data;
}

export function semanticTokens(doc: DocumentState): SemanticTokens {
  return { data: encodeTokens(collectTokens(doc)) };
}
