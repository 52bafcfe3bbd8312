import { dirname } from 'node:path';

import type { AssembleOptions, Assembler, Define, Label, SourceMap, WrittenBlock } from '../assembler/types.js';
import {
  findConfigFile,
  loadConfigFile,
  parseDefines,
  resolveConfigPath,
  type ProjectConfig,
} from '../config/loader.js';
import type { Diagnostic } from '../diagnostics/types.js';
import { runLint, type LintOptions } from '../lint/width_flow.js';
import { filterDiagnostics, pathMatchesDocument, type MatchContext } from './filters.js';
import { buildStateOverrides, parseAssumeHints } from './hints.js';
import { collectSymbolsRecursive } from './include_graph.js';
import { parseText, type SymbolEntry } from './parse.js';
import { normalizePath, uriToPath } from './paths.js';
import type { DocumentState, WorkspaceState } from './state.js';
import { isIgnoredPath } from './state.js';
import {
  defaultSuppressionRules,
  documentHasOrg,
  isMissingOrgMessage,
  parentIncludesChildAfterOrg,
  shouldSuppressMissingLabel,
  type SuppressionRules,
} from './suppression.js';
import { configIncludePaths, type WorkspaceServices } from './workspace.js';

/**
 * Lint toggles used when the config does not set them. The editor keeps the noisier
 * width and branch checks off by default.
 */
export type LintDefaults = Pick<LintOptions, 'warnUnknownWidth' | 'warnBranchOutsideBank' | 'warnOrgCollision'>;

export const editorLintDefaults: LintDefaults = {
  warnUnknownWidth: false,
  warnBranchOutsideBank: false,
  warnOrgCollision: true,
};

export interface AnalysisContext {
  workspace: WorkspaceState;
  services: WorkspaceServices;
  assembler: Assembler;
  /** Every open document, including the one being analyzed. */
  openDocuments: ReadonlyMap<string, DocumentState>;
  lintDefaults: LintDefaults;
}

export interface AnalysisOutcome {
  diagnostics: Diagnostic[];
  labels: Label[];
  defines: Define[];
  symbols: SymbolEntry[];
  sourceMap: SourceMap;
  writtenBlocks: WrittenBlock[];
  analysisRoot: string;
  /** No assembler output was available; only `symbols` and `analysisRoot` are meaningful. */
  assemblerUnavailable: boolean;
}

interface ResolvedConfig {
  config?: ProjectConfig;
  configDir?: string;
}

function resolveConfig(doc: DocumentState, ctx: AnalysisContext): ResolvedConfig {
  const { workspace, services } = ctx;
  if (workspace.config !== undefined && workspace.configDir !== undefined) {
    return { config: workspace.config, configDir: workspace.configDir };
  }
  const local = findConfigFile(dirname(doc.path), services.fs);
  if (local === undefined) return {};
  const loaded = loadConfigFile(local, services.fs);
  if (loaded.config === undefined) {
    services.logger.error(`${local}: ${loaded.error.message}`);
    return {};
  }
  return { config: loaded.config, configDir: dirname(local) };
}

export function suppressionRulesFrom(config: ProjectConfig | undefined): SuppressionRules {
  if (config === undefined) return defaultSuppressionRules;
  return {
    labelPrefixes: config.suppressLabelPrefixes,
    matchAfterFirstUnderscore: config.suppressLabelUnderscoreSuffix,
    missingOrg: config.suppressMissingOrg,
  };
}

export function lintOptionsFrom(config: ProjectConfig | undefined, defaults: LintDefaults): Omit<LintOptions, 'stateOverrides'> {
  return {
    defaultMWidth: config?.lintMWidth ?? 1,
    defaultXWidth: config?.lintXWidth ?? 1,
    warnUnknownWidth: config?.warnUnknownWidth ?? defaults.warnUnknownWidth,
    warnBranchOutsideBank: config?.warnBranchOutsideBank ?? defaults.warnBranchOutsideBank,
    warnOrgCollision: config?.warnOrgCollision ?? defaults.warnOrgCollision,
  };
}

/** Resolve the assembler entry point for a document, falling back to the document itself. */
export function selectAnalysisRoot(doc: DocumentState, ctx: AnalysisContext): { uri: string; path: string } {
  const rootUri = ctx.services.graph.selectRoot(doc.uri, ctx.workspace.mainCandidates);
  const rootPath = normalizePath(uriToPath(rootUri));
  if (rootUri === doc.uri || ctx.openDocuments.has(rootUri) || ctx.services.fs.exists(rootPath)) {
    return { uri: rootUri, path: rootPath };
  }
  return { uri: doc.uri, path: doc.path };
}

function readDocumentText(path: string, ctx: AnalysisContext): string | undefined {
  for (const open of ctx.openDocuments.values()) {
    if (open.path === normalizePath(path)) return open.text;
  }
  try {
    return ctx.services.fs.readText(path);
  } catch {
    return undefined;
  }
}

function buildAssembleOptions(
  doc: DocumentState,
  rootPath: string,
  includePaths: string[],
  resolved: ResolvedConfig,
  ctx: AnalysisContext,
): AssembleOptions {
  const { config, configDir } = resolved;
  const memoryFiles = [...ctx.openDocuments.values()]
    .filter((open) => open.uri !== doc.uri)
    .map((open) => ({ path: open.path, contents: open.text }));
  memoryFiles.push({ path: doc.path, contents: doc.text });

  const options: AssembleOptions = {
    patchPath: rootPath,
    includePaths,
    defines: parseDefines(config?.defines ?? []),
    memoryFiles,
  };
  if (config !== undefined && configDir !== undefined) {
    if (config.romPath !== undefined) {
      const rom = ctx.services.romCache.load(resolveConfigPath(configDir, config.romPath), config.romSize ?? 0);
      if (rom !== undefined) options.romData = rom;
    } else if (config.romSize !== undefined && config.romSize > 0) {
      options.romData = new Uint8Array(config.romSize);
    }
    if (config.stdIncludes !== undefined) options.stdIncludesPath = resolveConfigPath(configDir, config.stdIncludes);
    if (config.stdDefines !== undefined) options.stdDefinesPath = resolveConfigPath(configDir, config.stdDefines);
  }
  return options;
}

/**
 * Full analysis of one document: root selection, assemble, width lint, filtering to this document,
 * and the suppression rules. Synchronous; throws only on unexpected internal errors. When the
 * assembler yields nothing readable the outcome is flagged and carries only the scanned symbols.
 */
export function analyzeDocument(doc: DocumentState, ctx: AnalysisContext): AnalysisOutcome {
  const { workspace, services } = ctx;
  const resolved = resolveConfig(doc, ctx);
  const root = selectAnalysisRoot(doc, ctx);
  const isRoot = root.path === doc.path;

  const includePaths = [...configIncludePaths(resolved.config, resolved.configDir), dirname(root.path)];
  const collected = collectSymbolsRecursive(
    {
      parsed: parseText(doc.text, doc.uri),
      uri: doc.uri,
      path: doc.path,
      baseDir: dirname(doc.path),
      includePaths: [...includePaths, dirname(doc.path)],
    },
    { cache: services.parseCache, graph: services.graph, fs: services.fs },
  );
  if (collected.truncated) {
    services.logger.warn(`include walk from ${doc.path} hit its bounds; symbols are partial`);
  }

  const outcome: AnalysisOutcome = {
    diagnostics: [],
    labels: [],
    defines: [],
    symbols: collected.symbols,
    sourceMap: { files: [], entries: [] },
    writtenBlocks: [],
    analysisRoot: root.uri,
    assemblerUnavailable: false,
  };
  if (isIgnoredPath(workspace, doc.path)) return outcome;

  const result = ctx.assembler.assemble(buildAssembleOptions(doc, root.path, includePaths, resolved, ctx));
  if (result.unavailable === true) {
    outcome.assemblerUnavailable = true;
    return outcome;
  }

  const match: MatchContext = {
    documentPath: doc.path,
    analysisRootDir: dirname(root.path),
    isRoot,
    ...(workspace.root !== undefined ? { workspaceRoot: workspace.root } : {}),
  };
  const stateOverrides = buildStateOverrides(parseAssumeHints(doc.text), result.sourceMap, (path) =>
    pathMatchesDocument(path, match),
  );
  const lint = runLint(result.romBytes, result.writtenBlocks, result.sourceMap, {
    ...lintOptionsFrom(resolved.config, ctx.lintDefaults),
    stateOverrides,
  });

  const knownSymbols = new Set(workspace.symbolNames);
  for (const symbol of collected.symbols) knownSymbols.add(symbol.name);
  const rules = suppressionRulesFrom(resolved.config);

  let diagnostics = [
    ...filterDiagnostics(result.diagnostics, match),
    ...filterDiagnostics(lint.diagnostics, match),
  ].filter((d) => !shouldSuppressMissingLabel(d, knownSymbols, rules));

  if (rules.missingOrg && !isRoot && diagnostics.some((d) => isMissingOrgMessage(d.message))) {
    if (!documentHasOrg(doc.text) && includedAfterOrg(doc, includePaths, ctx)) {
      diagnostics = diagnostics.filter((d) => !isMissingOrgMessage(d.message));
    }
  }

  outcome.diagnostics = diagnostics;
  outcome.labels = result.labels;
  outcome.defines = result.defines;
  outcome.sourceMap = result.sourceMap;
  outcome.writtenBlocks = result.writtenBlocks;
  return outcome;
}

function includedAfterOrg(doc: DocumentState, includePaths: string[], ctx: AnalysisContext): boolean {
  return ctx.services.graph.parentsOf(doc.uri).some((parentUri) => {
    const parentPath = normalizePath(uriToPath(parentUri));
    const text = readDocumentText(parentPath, ctx);
    if (text === undefined) return false;
    return parentIncludesChildAfterOrg(parentPath, text, doc.path, includePaths, ctx.services.fs);
  });
}
