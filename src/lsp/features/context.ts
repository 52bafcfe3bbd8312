import type { Logger } from '../../logging.js';
import type { FileSystem } from '../../workspace/fs.js';
import type { SymbolEntry } from '../../workspace/parse.js';
import type { WorkspaceSession } from '../../workspace/session.js';
import type { DocumentState, WorkspaceState } from '../../workspace/state.js';
import { configIncludePaths } from '../../workspace/workspace.js';

/**
 * What the language features read. They never mutate it.
 */
export interface FeatureContext {
  workspace: WorkspaceState;
  fs: FileSystem;
  logger: Logger;
  documents: ReadonlyMap<string, DocumentState>;
  /** Config include paths, resolved. */
  includePaths: readonly string[];
}

export function featureContext(session: WorkspaceSession): FeatureContext {
  const { workspace, services } = session;
  return {
    workspace,
    fs: services.fs,
    logger: services.logger,
    documents: session.openDocuments(),
    includePaths: configIncludePaths(workspace.config, workspace.configDir),
  };
}

/** A macro by name: the document's own symbols first, then the workspace index. */
export function findMacro(name: string, doc: DocumentState, ctx: FeatureContext): SymbolEntry | undefined {
  const own = doc.symbols.find((s) => s.kind === 'macro' && s.name === name);
  if (own !== undefined) return own;
  for (const symbols of ctx.workspace.symbolIndex.values()) {
    const found = symbols.find((s) => s.kind === 'macro' && s.name === name);
    if (found !== undefined) return found;
  }
  return undefined;
}

/** `Name(a, b)` */
export function macroSignature(macro: SymbolEntry): string {
  return `${macro.name}(${(macro.parameters ?? []).join(', ')})`;
}
