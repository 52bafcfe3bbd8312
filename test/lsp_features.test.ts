import lsp from 'vscode-languageserver/node.js';
import { describe, expect, it } from 'vitest';

import type { Define, Label, SourceMap, WrittenBlock } from '../src/assembler/types.js';
import { toCompletionKind, toLspDiagnostic, toSymbolKind } from '../src/lsp/convert.js';
import { bankUsage } from '../src/lsp/features/bank_usage.js';
import { completion } from '../src/lsp/features/completion.js';
import type { FeatureContext } from '../src/lsp/features/context.js';
import { definition } from '../src/lsp/features/definition.js';
import { hover } from '../src/lsp/features/hover.js';
import { inlayHints } from '../src/lsp/features/inlay_hints.js';
import { references, rename } from '../src/lsp/features/references.js';
import { semanticTokens, semanticTokensLegend } from '../src/lsp/features/semantic_tokens.js';
import { openCallAt, signatureHelp } from '../src/lsp/features/signature_help.js';
import { documentSymbols, workspaceSymbols } from '../src/lsp/features/symbols.js';
import { MemoryLogger } from '../src/logging.js';
import { parseText } from '../src/workspace/parse.js';
import { buildLookupMaps, createDocumentState, emptyWorkspaceState, type DocumentState } from '../src/workspace/state.js';
import { MemoryFileSystem } from './helpers/memory_fs.js';

interface Analysis {
  labels?: Label[];
  defines?: Define[];
  sourceMap?: SourceMap;
  writtenBlocks?: WrittenBlock[];
  analysisRoot?: string;
}

function docOf(uri: string, text: string, analysis: Analysis = {}): DocumentState {
  const doc = createDocumentState(uri, text, 1, 0);
  doc.symbols = parseText(text, uri).symbols;
  doc.labels = analysis.labels ?? [];
  doc.defines = analysis.defines ?? [];
  if (analysis.sourceMap !== undefined) doc.sourceMap = analysis.sourceMap;
  if (analysis.writtenBlocks !== undefined) doc.writtenBlocks = analysis.writtenBlocks;
  if (analysis.analysisRoot !== undefined) doc.analysisRoot = analysis.analysisRoot;
  buildLookupMaps(doc);
  return doc;
}

function contextOf(
  index: Record<string, string> = {},
  files: Record<string, string> = {},
  documents: DocumentState[] = [],
): FeatureContext {
  const workspace = emptyWorkspaceState('/proj');
  for (const [uri, text] of Object.entries(index)) workspace.symbolIndex.set(uri, parseText(text, uri).symbols);
  return {
    workspace,
    fs: new MemoryFileSystem(files),
    logger: new MemoryLogger(),
    documents: new Map(documents.map((d) => [d.uri, d])),
    includePaths: [],
  };
}

const macros = { 'file:///proj/macros.asm': 'macro Draw(x, y)\nendmacro' };

describe('protocol conversion', () => {
  it('turns 1-based diagnostics into 0-based ranges', () => {
    expect(
      toLspDiagnostic({ id: 'MX010', severity: 'error', message: 'bad', file: 'a.asm', line: 3, column: 5 }),
    ).toEqual({
      range: { start: { line: 2, character: 4 }, end: { line: 2, character: 5 } },
      severity: lsp.DiagnosticSeverity.Error,
      code: 'MX010',
      source: 'mx65',
      message: 'bad',
    });
    expect(toLspDiagnostic({ id: 'MX011', severity: 'warning', message: 'w' }).range).toEqual({
      start: { line: 0, character: 0 },
      end: { line: 0, character: 1 },
    });
  });

  it('maps symbol kinds', () => {
    expect(toSymbolKind('label')).toBe(lsp.SymbolKind.Function);
    expect(toSymbolKind('macro')).toBe(lsp.SymbolKind.Method);
    expect(toCompletionKind('label')).toBe(lsp.CompletionItemKind.Variable);
    expect(toCompletionKind('define')).toBe(lsp.CompletionItemKind.Constant);
  });
});

describe('hover', () => {
  const doc = docOf('file:///proj/main.asm', 'Main:\n  lda Main\n  %Draw(1, 2)\n  !speed', {
    labels: [{ name: 'Main', address: 0x8000 }],
    defines: [{ name: 'speed', value: '4' }],
  });
  const ctx = contextOf(macros);

  it('shows label addresses', () => {
    expect(hover(doc, { line: 0, character: 1 }, ctx)).toEqual({
      contents: { kind: lsp.MarkupKind.Markdown, value: 'Main = $8000' },
    });
  });

  it('describes mnemonics', () => {
    expect(hover(doc, { line: 1, character: 3 }, ctx)).toEqual({
      contents: {
        kind: lsp.MarkupKind.Markdown,
        value:
          '**LDA** - Load Accumulator\n\nLoads memory into the accumulator.\n\n**Flags:** N Z\n\n**Cycles:** 2-8',
      },
    });
  });

  it('shows define values and macro signatures', () => {
    expect(hover(doc, { line: 3, character: 4 }, ctx)).toEqual({
      contents: { kind: lsp.MarkupKind.PlainText, value: '!speed = 4' },
    });
    expect(hover(doc, { line: 2, character: 4 }, ctx)).toEqual({
      contents: { kind: lsp.MarkupKind.PlainText, value: 'macro Draw(x, y)' },
    });
  });

  it('returns null off a token', () => {
    expect(hover(doc, { line: 1, character: 0 }, ctx)).toBeNull();
  });
});

describe('completion', () => {
  const ctx = contextOf({ 'file:///proj/a.asm': 'SpriteInit:\n!speed = 4\nOther:' });

  it('matches symbols case-insensitively, first occurrence wins', () => {
    const doc = docOf('file:///proj/main.asm', 'sp', { labels: [{ name: 'SpriteInit', address: 0x8000 }] });
    const expected = [
      { label: 'SpriteInit', kind: lsp.CompletionItemKind.Variable, detail: 'SpriteInit:' },
      { label: 'speed', kind: lsp.CompletionItemKind.Constant, detail: '!speed = 4' },
    ];
    expect(completion(doc, { line: 0, character: 2 }, ctx)).toEqual(expected);
    expect(completion(docOf('file:///proj/main.asm', '!sp'), { line: 0, character: 3 }, ctx)).toEqual(expected);
  });

  it('offers directives and mnemonics', () => {
    const items = completion(docOf('file:///proj/main.asm', 'inc'), { line: 0, character: 3 }, contextOf());
    expect(items.map((i) => i.label).sort()).toEqual([
      'INC',
      'incbin',
      'incdir',
      'incgfx',
      'include',
      'incmsg',
      'incsrc',
    ]);
    expect(items.find((i) => i.label === 'INC')).toEqual({
      label: 'INC',
      kind: lsp.CompletionItemKind.Keyword,
      detail: 'opcode 65816',
    });
  });

  it('returns nothing without a prefix', () => {
    expect(completion(docOf('file:///proj/main.asm', '  '), { line: 0, character: 2 }, ctx)).toEqual([]);
  });
});

describe('semantic tokens', () => {
  it('classifies labels, mnemonics, operators, numbers and registers', () => {
    const doc = docOf('file:///proj/main.asm', 'Main:\n  lda #$10, x ; c');
    expect(semanticTokens(doc).data).toEqual([
      0, 0, 4, 0, 0,
      1, 2, 3, 3, 0,
      0, 4, 1, 6, 0,
      0, 1, 3, 5, 0,
      0, 3, 1, 6, 0,
      0, 2, 1, 7, 0,
    ]);
  });

  it('keeps semicolons inside strings', () => {
    const doc = docOf('file:///proj/main.asm', 'db "a;b", 12');
    expect(semanticTokens(doc).data).toEqual([
      0, 0, 2, 3, 0,
      0, 3, 5, 4, 0,
      0, 5, 1, 6, 0,
      0, 2, 2, 5, 0,
    ]);
  });

  it('publishes a fixed legend', () => {
    expect(semanticTokensLegend.tokenTypes).toEqual([
      'function',
      'macro',
      'variable',
      'keyword',
      'string',
      'number',
      'operator',
      'register',
    ]);
  });
});

describe('signature help', () => {
  it('finds the innermost open call and counts top-level commas', () => {
    expect(openCallAt('  %Draw(1, 2', 12)).toEqual({ name: 'Draw', activeParameter: 1 });
    expect(openCallAt('Draw(f(1, 2), ', 14)).toEqual({ name: 'Draw', activeParameter: 1 });
    expect(openCallAt('(x', 2)).toBeUndefined();
  });

  it('shows the macro signature', () => {
    const doc = docOf('file:///proj/main.asm', '  %Draw(1, ');
    expect(signatureHelp(doc, { line: 0, character: 11 }, contextOf(macros))).toEqual({
      signatures: [{ label: 'Draw(x, y)', parameters: [{ label: 'x' }, { label: 'y' }] }],
      activeSignature: 0,
      activeParameter: 1,
    });
    expect(signatureHelp(doc, { line: 0, character: 11 }, contextOf())).toBeNull();
  });
});

describe('inlay hints', () => {
  const doc = docOf('file:///proj/main.asm', '  jsr $8000\n  %Draw(10, $20)', {
    labels: [{ name: 'Main', address: 0x8000 }],
  });
  const ctx = contextOf(macros);
  const parameterHints = [
    {
      position: { line: 1, character: 8 },
      label: 'x:',
      kind: lsp.InlayHintKind.Parameter,
      paddingRight: true,
    },
    {
      position: { line: 1, character: 12 },
      label: 'y:',
      kind: lsp.InlayHintKind.Parameter,
      paddingRight: true,
    },
  ];

  it('names label addresses and macro parameters', () => {
    expect(inlayHints(doc, undefined, ctx)).toEqual([
      {
        position: { line: 0, character: 11 },
        label: ' :Main',
        kind: lsp.InlayHintKind.Type,
        paddingLeft: true,
      },
      ...parameterHints,
    ]);
  });

  it('limits hints to the requested lines', () => {
    const range = { start: { line: 1, character: 0 }, end: { line: 1, character: 0 } };
    expect(inlayHints(doc, range, ctx)).toEqual(parameterHints);
  });
});

describe('references and rename', () => {
  const open = docOf('file:///proj/a.asm', 'Foo:\n  jsr Foo ; Foo');
  const ctx = contextOf({}, { '/proj/a.asm': '', '/proj/b.asm': 'jsr Foo\nFooBar:' }, [open]);

  it('finds whole-word hits across the workspace, reading open documents from memory', () => {
    expect(references(open, { line: 0, character: 1 }, ctx)).toEqual([
      { uri: 'file:///proj/a.asm', range: { start: { line: 0, character: 0 }, end: { line: 0, character: 3 } } },
      { uri: 'file:///proj/a.asm', range: { start: { line: 1, character: 6 }, end: { line: 1, character: 9 } } },
      { uri: 'file:///proj/a.asm', range: { start: { line: 1, character: 12 }, end: { line: 1, character: 15 } } },
      { uri: 'file:///proj/b.asm', range: { start: { line: 0, character: 4 }, end: { line: 0, character: 7 } } },
    ]);
  });

  it('renames every hit', () => {
    const edit = rename(open, { line: 0, character: 1 }, 'Bar', ctx);
    expect(edit?.changes?.['file:///proj/a.asm']).toHaveLength(3);
    expect(edit?.changes?.['file:///proj/b.asm']).toEqual([
      { range: { start: { line: 0, character: 4 }, end: { line: 0, character: 7 } }, newText: 'Bar' },
    ]);
    expect(rename(open, { line: 0, character: 1 }, '', ctx)).toBeNull();
  });
});

describe('definition', () => {
  const doc = docOf('file:///proj/main.asm', 'incsrc "lib/util.asm"\n  jsr Main\n  jsr Helper', {
    labels: [{ name: 'Main', address: 0x8000 }],
    sourceMap: {
      files: [{ id: 0, crc: 0, path: 'src/code.asm' }],
      entries: [{ address: 0x8000, fileId: 0, line: 5 }],
    },
    analysisRoot: 'file:///proj/main.asm',
  });
  const ctx = contextOf({ 'file:///proj/h.asm': '\n  Helper:' }, { '/proj/lib/util.asm': '' });

  it('opens included files', () => {
    expect(definition(doc, { line: 0, character: 10 }, ctx)).toEqual([
      { uri: 'file:///proj/lib/util.asm', range: { start: { line: 0, character: 0 }, end: { line: 0, character: 0 } } },
    ]);
  });

  it('resolves labels through the source map', () => {
    expect(definition(doc, { line: 1, character: 6 }, ctx)).toEqual([
      { uri: 'file:///proj/src/code.asm', range: { start: { line: 4, character: 0 }, end: { line: 4, character: 0 } } },
    ]);
  });

  it('falls back to scanned symbols', () => {
    expect(definition(doc, { line: 2, character: 6 }, ctx)).toEqual([
      { uri: 'file:///proj/h.asm', range: { start: { line: 1, character: 2 }, end: { line: 1, character: 8 } } },
    ]);
    expect(definition(doc, { line: 1, character: 1 }, ctx)).toBeNull();
  });
});

describe('symbols', () => {
  it('outlines the document without its includes', () => {
    const doc = docOf('file:///proj/m.asm', 'Main:\nmacro Draw(x)\nendmacro\n!speed = 4');
    doc.symbols.push({ name: 'Other', kind: 'label', line: 0, column: 0, detail: 'Other:', uri: 'file:///proj/o.asm' });
    expect(documentSymbols(doc)).toEqual([
      {
        name: 'Main',
        kind: lsp.SymbolKind.Function,
        range: { start: { line: 0, character: 0 }, end: { line: 0, character: 4 } },
        selectionRange: { start: { line: 0, character: 0 }, end: { line: 0, character: 4 } },
        detail: 'Main:',
      },
      {
        name: 'Draw',
        kind: lsp.SymbolKind.Method,
        range: { start: { line: 1, character: 6 }, end: { line: 1, character: 10 } },
        selectionRange: { start: { line: 1, character: 6 }, end: { line: 1, character: 10 } },
        detail: 'macro Draw(x)',
      },
      {
        name: 'speed',
        kind: lsp.SymbolKind.Constant,
        range: { start: { line: 3, character: 1 }, end: { line: 3, character: 6 } },
        selectionRange: { start: { line: 3, character: 1 }, end: { line: 3, character: 6 } },
        detail: '!speed = 4',
      },
    ]);
  });

  it('searches the workspace index by substring', () => {
    const { workspace } = contextOf(macros);
    expect(workspaceSymbols('dr', workspace)).toEqual([
      {
        name: 'Draw',
        kind: lsp.SymbolKind.Method,
        location: {
          uri: 'file:///proj/macros.asm',
          range: { start: { line: 0, character: 6 }, end: { line: 0, character: 10 } },
        },
        containerName: 'macro Draw(x, y)',
      },
    ]);
  });
});

describe('bankUsage', () => {
  it('merges written blocks of open documents without duplicates', () => {
    const a = docOf('file:///proj/a.asm', '', {
      writtenBlocks: [
        { pcOffset: 0, snesOffset: 0x8000, numBytes: 16 },
        { pcOffset: 0x10, snesOffset: 0x8010, numBytes: 4 },
      ],
    });
    const b = docOf('file:///proj/b.asm', '', {
      writtenBlocks: [{ pcOffset: 0, snesOffset: 0x8000, numBytes: 16 }],
    });
    expect(bankUsage([a, b])).toEqual([
      { snes: 0x8000, pc: 0, size: 16 },
      { snes: 0x8010, pc: 0x10, size: 4 },
    ]);
  });
});
