import { dirname } from 'node:path';

import type { Assembler } from '../assembler/types.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { formatError } from '../logging.js';
import { parseText } from './parse.js';
import { pathToUri, resolveIncdirPath, resolveIncludePath } from './paths.js';
import { analyzeDocument, editorLintDefaults, type LintDefaults } from './pipeline.js';
import { buildLookupMaps, createDocumentState, type DocumentState, type WorkspaceState } from './state.js';
import { configIncludePaths, type WorkspaceServices } from './workspace.js';

export const DEFAULT_DEBOUNCE_MS = 500;

export type DocumentPhase = 'idle' | 'awaiting-debounce' | 'analyzing';

export type PublishDiagnostics = (uri: string, diagnostics: Diagnostic[]) => void;

export interface SessionOptions {
  assembler: Assembler;
  publish: PublishDiagnostics;
  now?: () => number;
  debounceMs?: number;
  lintDefaults?: LintDefaults;
}

/**
 * Open documents and their analysis schedule.
 *
 * Single-threaded: every method runs to completion inside one message handler. Debounce is an
 * elapsed-time check made by {@link processPending} between messages, not a timer.
 */
export class WorkspaceSession {
  private readonly documents = new Map<string, DocumentState>();
  private readonly analyzing = new Set<string>();
  private readonly assembler: Assembler;
  private readonly publish: PublishDiagnostics;
  private readonly now: () => number;
  private readonly debounceMs: number;
  private readonly lintDefaults: LintDefaults;
  private lastChange = 0;

  constructor(
    readonly workspace: WorkspaceState,
    readonly services: WorkspaceServices,
    options: SessionOptions,
  ) {
    this.assembler = options.assembler;
    this.publish = options.publish;
    this.now = options.now ?? Date.now;
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.lintDefaults = options.lintDefaults ?? editorLintDefaults;
  }

  get(uri: string): DocumentState | undefined {
    return this.documents.get(uri);
  }

  openDocuments(): ReadonlyMap<string, DocumentState> {
    return this.documents;
  }

  phaseOf(uri: string): DocumentPhase | undefined {
    const doc = this.documents.get(uri);
    if (doc === undefined) return undefined;
    if (this.analyzing.has(uri)) return 'analyzing';
    return doc.needsAnalysis ? 'awaiting-debounce' : 'idle';
  }

  /** Register a document and analyze it immediately. */
  open(uri: string, text: string, version: number): DocumentState {
    const doc = createDocumentState(uri, text, version, this.now());
    this.documents.set(uri, doc);
    this.registerIncludes(doc);
    this.analyze(doc);
    return doc;
  }

  /**
   * Replace a document's text and schedule it (and its open analysis root) for re-analysis.
   * Only the edited text is re-parsed here.
   */
  change(uri: string, text: string, version: number): void {
    const doc = this.documents.get(uri);
    if (doc === undefined) return;
    const now = this.now();
    doc.text = text;
    doc.version = version;
    doc.needsAnalysis = true;
    doc.lastChange = now;
    this.lastChange = Math.max(this.lastChange, now);

    const own = parseText(text, uri).symbols;
    doc.symbols = [...own, ...doc.symbols.filter((s) => s.uri !== uri)];
    this.registerIncludes(doc);

    const rootUri = this.services.graph.selectRoot(uri, this.workspace.mainCandidates);
    const root = rootUri === uri ? undefined : this.documents.get(rootUri);
    if (root !== undefined) {
      root.needsAnalysis = true;
      root.lastChange = now;
    }
  }

  /** Clear the client's diagnostics for the document and forget it. */
  close(uri: string): void {
    if (!this.documents.delete(uri)) return;
    this.publish(uri, []);
  }

  /**
   * Analyze every flagged document once the quiet window since the latest edit has passed.
   *
   * @returns URIs analyzed on this call.
   */
  processPending(): string[] {
    const pending = [...this.documents.values()].filter((d) => d.needsAnalysis);
    if (pending.length === 0) return [];
    if (this.now() - this.lastChange <= this.debounceMs) return [];
    for (const doc of pending) this.analyze(doc);
    return pending.map((d) => d.uri);
  }

  /**
   * Run the full pipeline for one document and publish. When the assembler is unavailable the
   * previous assembler results are kept; on an internal failure all previous results are kept and
   * the failure is logged.
   */
  analyze(doc: DocumentState): void {
    this.analyzing.add(doc.uri);
    try {
      const outcome = analyzeDocument(doc, {
        workspace: this.workspace,
        services: this.services,
        assembler: this.assembler,
        openDocuments: this.documents,
        lintDefaults: this.lintDefaults,
      });
      doc.symbols = outcome.symbols;
      doc.analysisRoot = outcome.analysisRoot;
      if (!outcome.assemblerUnavailable) {
        doc.diagnostics = outcome.diagnostics;
        doc.labels = outcome.labels;
        doc.defines = outcome.defines;
        doc.sourceMap = outcome.sourceMap;
        doc.writtenBlocks = outcome.writtenBlocks;
        buildLookupMaps(doc);
      }
    } catch (err) {
      this.services.logger.error(`analysis of ${doc.uri} failed: ${formatError(err)}`);
    } finally {
      doc.needsAnalysis = false;
      this.analyzing.delete(doc.uri);
    }
    this.publish(doc.uri, doc.diagnostics);
  }

  private registerIncludes(doc: DocumentState): void {
    const { fs, graph } = this.services;
    const baseDir = dirname(doc.path);
    const searchPaths = configIncludePaths(this.workspace.config, this.workspace.configDir);
    for (const event of parseText(doc.text).events) {
      if (event.kind === 'incdir') {
        const dir = resolveIncdirPath(event.path, baseDir, fs);
        if (dir !== undefined) searchPaths.push(dir);
        continue;
      }
      const target = resolveIncludePath(event.path, baseDir, searchPaths, fs);
      if (target !== undefined) graph.registerDependency(doc.uri, pathToUri(target));
    }
  }
}
