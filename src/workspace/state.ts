import type { Define, Label, SourceMap, WrittenBlock } from '../assembler/types.js';
import { emptySourceMap } from '../assembler/types.js';
import type { ProjectConfig } from '../config/loader.js';
import type { Diagnostic } from '../diagnostics/types.js';
import type { SymbolEntry } from './parse.js';
import { normalizePath, uriToPath } from './paths.js';

/**
 * Everything known about one open document. Owned by the session.
 */
export interface DocumentState {
  uri: string;
  path: string;
  /** In-memory text; authoritative over the file on disk while the document is open. */
  text: string;
  version: number;
  diagnostics: Diagnostic[];
  labels: Label[];
  defines: Define[];
  symbols: SymbolEntry[];
  sourceMap: SourceMap;
  writtenBlocks: WrittenBlock[];
  labelMap: Map<string, Label>;
  defineMap: Map<string, Define>;
  /** First label seen at each address. */
  addressToLabel: Map<number, Label>;
  /** URI handed to the assembler on the last analysis. */
  analysisRoot?: string;
  needsAnalysis: boolean;
  lastChange: number;
}

/**
 * Project-wide facts gathered once at startup. Read-only during per-document analysis.
 */
export interface WorkspaceState {
  root?: string;
  config?: ProjectConfig;
  configDir?: string;
  gitRoot?: string;
  /** Absolute, normalized paths git reports as ignored. */
  ignoredPaths: Set<string>;
  symbolIndex: Map<string, SymbolEntry[]>;
  /** URIs preferred as analysis roots. */
  mainCandidates: Set<string>;
  symbolNames: Set<string>;
}

export function emptyWorkspaceState(root?: string): WorkspaceState {
  const state: WorkspaceState = {
    ignoredPaths: new Set(),
    symbolIndex: new Map(),
    mainCandidates: new Set(),
    symbolNames: new Set(),
  };
  if (root !== undefined) state.root = root;
  return state;
}

export function createDocumentState(uri: string, text: string, version: number, now: number): DocumentState {
  return {
    uri,
    path: normalizePath(uriToPath(uri)),
    text,
    version,
    diagnostics: [],
    labels: [],
    defines: [],
    symbols: [],
    sourceMap: emptySourceMap(),
    writtenBlocks: [],
    labelMap: new Map(),
    defineMap: new Map(),
    addressToLabel: new Map(),
    needsAnalysis: true,
    lastChange: now,
  };
}

export function buildLookupMaps(doc: DocumentState): void {
  doc.labelMap = new Map(doc.labels.map((l) => [l.name, l]));
  doc.defineMap = new Map(doc.defines.map((d) => [d.name, d]));
  doc.addressToLabel = new Map();
  for (const label of doc.labels) {
    if (!doc.addressToLabel.has(label.address)) doc.addressToLabel.set(label.address, label);
  }
}

export function isIgnoredPath(workspace: WorkspaceState, path: string): boolean {
  return workspace.ignoredPaths.has(normalizePath(path));
}
