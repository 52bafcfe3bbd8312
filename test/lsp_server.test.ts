import lsp from 'vscode-languageserver/node.js';
import type { Diagnostic as LspDiagnostic, InitializeParams } from 'vscode-languageserver/node.js';
import { describe, expect, it } from 'vitest';

import { parseConfig } from '../src/config/loader.js';
import { FileLogger, MemoryLogger, nullLogger } from '../src/logging.js';
import { LanguageServer, loggerForConfig } from '../src/lsp/server.js';
import { noGitProbe } from '../src/workspace/git.js';
import { assembled, FakeAssembler } from './helpers/fake_assembler.js';
import { MemoryFileSystem } from './helpers/memory_fs.js';

const uri = 'file:///proj/main.asm';
const text = 'Main:\n  jsr Main';
const init: InitializeParams = { processId: null, rootUri: 'file:///proj', capabilities: {} };

function setup(options: { debounceMs?: number } = {}) {
  const published: Array<[string, LspDiagnostic[]]> = [];
  const logger = new MemoryLogger();
  const assembler = new FakeAssembler(() =>
    assembled({
      diagnostics: [
        { id: 'MX010', severity: 'error', message: "Label 'Foo' wasn't found", file: 'main.asm', line: 2, column: 3 },
      ],
      labels: [{ name: 'Main', address: 0x8000 }],
      writtenBlocks: [{ pcOffset: 0, snesOffset: 0x8000, numBytes: 3 }],
    }),
  );
  const clock = { t: 1000 };
  const server = new LanguageServer({
    publish: (target, diagnostics) => published.push([target, diagnostics]),
    fs: new MemoryFileSystem({ '/proj/main.asm': text }),
    git: noGitProbe,
    assemblerFactory: () => assembler,
    logger,
    now: () => clock.t,
    ...options,
  });
  return { server, published, logger, assembler, clock };
}

describe('LanguageServer', () => {
  it('advertises its capabilities', () => {
    const { server } = setup();
    const result = server.initialize(init);
    expect(result.serverInfo).toEqual({ name: 'mx65', version: '0.1.0' });
    expect(result.capabilities.textDocumentSync).toBe(lsp.TextDocumentSyncKind.Full);
    expect(result.capabilities.completionProvider).toEqual({ triggerCharacters: ['!', '.', '@'] });
    expect(result.capabilities.signatureHelpProvider).toEqual({ triggerCharacters: ['(', ','] });
    expect(result.capabilities.executeCommandProvider).toEqual({ commands: ['mx65.getBankUsage'] });
  });

  it('answers with empty results before initialize', () => {
    const { server } = setup();
    const textDocument = { uri };
    const position = { line: 0, character: 0 };
    expect(server.hover({ textDocument, position })).toBeNull();
    expect(server.completion({ textDocument, position })).toEqual([]);
    expect(server.semanticTokens({ textDocument })).toEqual({ data: [] });
    expect(server.executeCommand({ command: 'mx65.getBankUsage' })).toBeNull();
  });

  it('publishes protocol diagnostics when a document opens', () => {
    const { server, published } = setup();
    server.initialize(init);
    server.didOpen({ textDocument: { uri, languageId: 'asm', version: 1, text } });

    expect(published).toEqual([
      [
        uri,
        [
          {
            range: { start: { line: 1, character: 2 }, end: { line: 1, character: 3 } },
            severity: lsp.DiagnosticSeverity.Error,
            code: 'MX010',
            source: 'mx65',
            message: "Label 'Foo' wasn't found",
          },
        ],
      ],
    ]);
    expect(server.hover({ textDocument: { uri }, position: { line: 1, character: 7 } })).toEqual({
      contents: { kind: lsp.MarkupKind.Markdown, value: 'Main = $8000' },
    });
  });

  it('runs debounced analysis before answering a request', () => {
    const { server, assembler, clock } = setup({ debounceMs: 100 });
    server.initialize(init);
    server.didOpen({ textDocument: { uri, languageId: 'asm', version: 1, text } });

    clock.t = 1100;
    server.didChange({ textDocument: { uri, version: 2 }, contentChanges: [{ text: 'Main:\n  jsr Main\n  nop' }] });

    clock.t = 1150;
    server.documentSymbol({ textDocument: { uri } });
    expect(assembler.calls).toHaveLength(1);

    clock.t = 1201;
    server.documentSymbol({ textDocument: { uri } });
    expect(assembler.calls).toHaveLength(2);
    expect(assembler.calls[1]?.memoryFiles).toEqual([{ path: '/proj/main.asm', contents: 'Main:\n  jsr Main\n  nop' }]);
  });

  it('reports bank usage and rejects unknown commands', () => {
    const { server, logger } = setup();
    server.initialize(init);
    server.didOpen({ textDocument: { uri, languageId: 'asm', version: 1, text } });

    expect(server.executeCommand({ command: 'mx65.getBankUsage' })).toEqual([{ snes: 0x8000, pc: 0, size: 3 }]);
    expect(server.executeCommand({ command: 'mx65.other' })).toBeNull();
    expect(logger.lines).toContainEqual({ level: 'warn', message: 'unknown command mx65.other' });
  });

  it('clears diagnostics on close', () => {
    const { server, published } = setup();
    server.initialize(init);
    server.didOpen({ textDocument: { uri, languageId: 'asm', version: 1, text } });
    server.didClose({ textDocument: { uri } });

    expect(published[published.length - 1]).toEqual([uri, []]);
    expect(server.completion({ textDocument: { uri }, position: { line: 0, character: 2 } })).toEqual([]);
  });
});

describe('loggerForConfig', () => {
  it('logs nowhere unless the config enables it', () => {
    expect(loggerForConfig(undefined, undefined)).toBe(nullLogger);
    expect(loggerForConfig(parseConfig('lsp_log_enabled = false'), '/proj')).toBe(nullLogger);
  });

  it('writes to the configured path, resolved against the config directory', () => {
    const logger = loggerForConfig(parseConfig('lsp_log_enabled = true\nlsp_log_path = "logs/lsp.log"'), '/proj');
    expect(logger).toBeInstanceOf(FileLogger);
    expect(logger instanceof FileLogger ? logger.path : undefined).toBe('/proj/logs/lsp.log');
  });
});
