import { dirname } from 'node:path';

import lsp from 'vscode-languageserver/node.js';
import type {
  CompletionItem,
  CompletionParams,
  Connection,
  DefinitionParams,
  Diagnostic as LspDiagnostic,
  DidChangeTextDocumentParams,
  DidCloseTextDocumentParams,
  DidOpenTextDocumentParams,
  DocumentSymbol,
  DocumentSymbolParams,
  ExecuteCommandParams,
  Hover,
  HoverParams,
  InitializeParams,
  InitializeResult,
  InlayHint,
  InlayHintParams,
  Location,
  ReferenceParams,
  RenameParams,
  SemanticTokens,
  SemanticTokensParams,
  SignatureHelp,
  SignatureHelpParams,
  SymbolInformation,
  WorkspaceEdit,
  WorkspaceSymbolParams,
} from 'vscode-languageserver/node.js';

import { defaultAssemblerFactory, type AssemblerFactory } from '../assembler/external.js';
import { findConfigFile, loadConfigFile, resolveConfigPath, type ProjectConfig } from '../config/loader.js';
import { packageVersion } from '../data/load.js';
import { defaultLogPath, FileLogger, formatError, nullLogger, type Logger } from '../logging.js';
import { nodeFileSystem, type FileSystem } from '../workspace/fs.js';
import { nodeGitProbe, type GitProbe } from '../workspace/git.js';
import { WorkspaceSession } from '../workspace/session.js';
import type { DocumentState } from '../workspace/state.js';
import { buildWorkspaceState, createServices, selectWorkspaceRoot } from '../workspace/workspace.js';
import { toLspDiagnostic } from './convert.js';
import { BANK_USAGE_COMMAND, bankUsage, type BankUsageEntry } from './features/bank_usage.js';
import { COMPLETION_TRIGGERS, completion } from './features/completion.js';
import { featureContext, type FeatureContext } from './features/context.js';
import { definition } from './features/definition.js';
import { hover } from './features/hover.js';
import { inlayHints } from './features/inlay_hints.js';
import { references, rename } from './features/references.js';
import { semanticTokens, semanticTokensLegend } from './features/semantic_tokens.js';
import { signatureHelp } from './features/signature_help.js';
import { documentSymbols, workspaceSymbols } from './features/symbols.js';

export interface LanguageServerOptions {
  publish: (uri: string, diagnostics: LspDiagnostic[]) => void;
  fs?: FileSystem;
  git?: GitProbe;
  assemblerFactory?: AssemblerFactory;
  /** Overrides the log sink chosen from `lsp_log_enabled`. */
  logger?: Logger;
  now?: () => number;
  debounceMs?: number;
}

/** Log sink for the server process: a file when the project config asks for one. */
export function loggerForConfig(config: ProjectConfig | undefined, configDir: string | undefined): Logger {
  if (config?.lspLogEnabled !== true) return nullLogger;
  const path =
    config.lspLogPath !== undefined && configDir !== undefined
      ? resolveConfigPath(configDir, config.lspLogPath)
      : defaultLogPath();
  return new FileLogger(path);
}

/**
 * Protocol-facing handlers over a {@link WorkspaceSession}. Each request first runs any analysis
 * whose debounce window has passed; a handler that throws is logged and answers with its
 * empty result.
 */
export class LanguageServer {
  private session: WorkspaceSession | undefined;
  private logger: Logger = nullLogger;
  private readonly fs: FileSystem;

  constructor(private readonly options: LanguageServerOptions) {
    this.fs = options.fs ?? nodeFileSystem;
  }

  initialize(params: InitializeParams): InitializeResult {
    const root = selectWorkspaceRoot(params, this.fs);
    let config: ProjectConfig | undefined;
    let configDir: string | undefined;
    const configPath = root === undefined ? undefined : findConfigFile(root, this.fs);
    if (configPath !== undefined) {
      const loaded = loadConfigFile(configPath, this.fs);
      config = loaded.config;
      configDir = dirname(configPath);
    }
    this.logger = this.options.logger ?? loggerForConfig(config, configDir);

    const services = createServices(this.fs, this.logger);
    const workspace = buildWorkspaceState(params, services, this.options.git ?? nodeGitProbe);
    const factory = this.options.assemblerFactory ?? defaultAssemblerFactory;
    this.session = new WorkspaceSession(workspace, services, {
      assembler: factory(workspace.config, workspace.configDir, this.logger),
      publish: (uri, diagnostics) => this.options.publish(uri, diagnostics.map(toLspDiagnostic)),
      ...(this.options.now !== undefined ? { now: this.options.now } : {}),
      ...(this.options.debounceMs !== undefined ? { debounceMs: this.options.debounceMs } : {}),
    });

    return {
      capabilities: {
        textDocumentSync: lsp.TextDocumentSyncKind.Full,
        definitionProvider: true,
        hoverProvider: true,
        completionProvider: { triggerCharacters: COMPLETION_TRIGGERS },
        signatureHelpProvider: { triggerCharacters: ['(', ','] },
        inlayHintProvider: { resolveProvider: false },
        referencesProvider: true,
        renameProvider: true,
        documentSymbolProvider: true,
        workspaceSymbolProvider: true,
        semanticTokensProvider: { legend: semanticTokensLegend, full: true },
        executeCommandProvider: { commands: [BANK_USAGE_COMMAND] },
      },
      serverInfo: { name: 'mx65', version: packageVersion() },
    };
  }

  didOpen(params: DidOpenTextDocumentParams): void {
    const { uri, text, version } = params.textDocument;
    this.notify('didOpen', (session) => {
      session.open(uri, text, version);
    });
  }

  didChange(params: DidChangeTextDocumentParams): void {
    const last = params.contentChanges[params.contentChanges.length - 1];
    if (last === undefined) return;
    this.notify('didChange', (session) => {
      session.change(params.textDocument.uri, last.text, params.textDocument.version);
    });
  }

  didClose(params: DidCloseTextDocumentParams): void {
    this.notify('didClose', (session) => session.close(params.textDocument.uri));
  }

  definition(params: DefinitionParams): Location[] | null {
    return this.onDocument<Location[] | null>('definition', params.textDocument.uri, null, (doc, ctx) =>
      definition(doc, params.position, ctx),
    );
  }

  hover(params: HoverParams): Hover | null {
    return this.onDocument<Hover | null>('hover', params.textDocument.uri, null, (doc, ctx) =>
      hover(doc, params.position, ctx),
    );
  }

  completion(params: CompletionParams): CompletionItem[] {
    return this.onDocument<CompletionItem[]>('completion', params.textDocument.uri, [], (doc, ctx) =>
      completion(doc, params.position, ctx),
    );
  }

  documentSymbol(params: DocumentSymbolParams): DocumentSymbol[] {
    return this.onDocument<DocumentSymbol[]>('documentSymbol', params.textDocument.uri, [], (doc) =>
      documentSymbols(doc),
    );
  }

  workspaceSymbol(params: WorkspaceSymbolParams): SymbolInformation[] {
    return this.request<SymbolInformation[]>('workspaceSymbol', [], (session) =>
      workspaceSymbols(params.query, session.workspace),
    );
  }

  semanticTokens(params: SemanticTokensParams): SemanticTokens {
    return this.onDocument<SemanticTokens>('semanticTokens', params.textDocument.uri, { data: [] }, (doc) =>
      semanticTokens(doc),
    );
  }

  references(params: ReferenceParams): Location[] {
    return this.onDocument<Location[]>('references', params.textDocument.uri, [], (doc, ctx) =>
      references(doc, params.position, ctx),
    );
  }

  rename(params: RenameParams): WorkspaceEdit | null {
    return this.onDocument<WorkspaceEdit | null>('rename', params.textDocument.uri, null, (doc, ctx) =>
      rename(doc, params.position, params.newName, ctx),
    );
  }

  signatureHelp(params: SignatureHelpParams): SignatureHelp | null {
    return this.onDocument<SignatureHelp | null>('signatureHelp', params.textDocument.uri, null, (doc, ctx) =>
      signatureHelp(doc, params.position, ctx),
    );
  }

  inlayHint(params: InlayHintParams): InlayHint[] {
    return this.onDocument<InlayHint[]>('inlayHint', params.textDocument.uri, [], (doc, ctx) =>
      inlayHints(doc, params.range, ctx),
    );
  }

  executeCommand(params: ExecuteCommandParams): BankUsageEntry[] | null {
    return this.request<BankUsageEntry[] | null>('executeCommand', null, (session) => {
      if (params.command === BANK_USAGE_COMMAND) return bankUsage(session.openDocuments().values());
      this.logger.warn(`unknown command ${params.command}`);
      return null;
    });
  }

  /** Attach every handler to a protocol connection. */
  listen(connection: Connection): void {
    connection.onInitialize((params) => this.initialize(params));
    connection.onDidOpenTextDocument((params) => this.didOpen(params));
    connection.onDidChangeTextDocument((params) => this.didChange(params));
    connection.onDidCloseTextDocument((params) => this.didClose(params));
    connection.onDefinition((params) => this.definition(params));
    connection.onHover((params) => this.hover(params));
    connection.onCompletion((params) => this.completion(params));
    connection.onDocumentSymbol((params) => this.documentSymbol(params));
    connection.onWorkspaceSymbol((params) => this.workspaceSymbol(params));
    connection.languages.semanticTokens.on((params) => this.semanticTokens(params));
    connection.onReferences((params) => this.references(params));
    connection.onRenameRequest((params) => this.rename(params));
    connection.onSignatureHelp((params) => this.signatureHelp(params));
    connection.languages.inlayHint.on((params) => this.inlayHint(params));
    connection.onExecuteCommand((params) => this.executeCommand(params));
    connection.listen();
  }

  private notify(name: string, handler: (session: WorkspaceSession) => void): void {
    this.request(name, undefined, handler);
  }

  private request<R>(name: string, fallback: R, handler: (session: WorkspaceSession) => R): R {
    const session = this.session;
    if (session === undefined) return fallback;
    try {
      session.processPending();
      return handler(session);
    } catch (err) {
      this.logger.error(`${name} failed: ${formatError(err)}`);
      return fallback;
    }
  }

  private onDocument<R>(
    name: string,
    uri: string,
    fallback: R,
    handler: (doc: DocumentState, ctx: FeatureContext) => R,
  ): R {
    return this.request(name, fallback, (session) => {
      const doc = session.get(uri);
      return doc === undefined ? fallback : handler(doc, featureContext(session));
    });
  }
}

/** Serve the protocol on stdin/stdout until the client disconnects. */
export function startServer(): void {
  const connection = lsp.createConnection(lsp.ProposedFeatures.all, process.stdin, process.stdout);
  const server = new LanguageServer({
    publish: (uri, diagnostics) => {
      connection.sendDiagnostics({ uri, diagnostics }).catch((err: unknown) => {
        process.stderr.write(`mx65: publishing diagnostics for ${uri} failed: ${formatError(err)}\n`);
      });
    },
  });
  server.listen(connection);
}
