export type { Diagnostic, DiagnosticId, DiagnosticSeverity } from './diagnostics/types.js';
export { DiagnosticIds, hasErrors } from './diagnostics/types.js';

export * from './assembler/types.js';
export { decodeAssembleResult, encodeRequest, BridgeDecodeError, type BridgeRequest } from './assembler/bridge.js';
export {
  createAssembler,
  defaultAssemblerFactory,
  ExternalAssembler,
  UnavailableAssembler,
  type AssemblerFactory,
  type ExternalAssemblerOptions,
} from './assembler/external.js';

export {
  decode,
  describeMnemonic,
  isMnemonic,
  mnemonics,
  operandSize,
  type AddressingMode,
  type OpcodeInfo,
  type Width,
} from './isa/opcodes.js';
export { SourceIndex } from './lint/source_index.js';
export {
  defaultLintOptions,
  formatSnes,
  runLint,
  transition,
  type LintOptions,
  type LintResult,
  type RegisterWidthState,
  type WidthOverride,
} from './lint/width_flow.js';

export {
  CONFIG_FILE_NAME,
  ConfigError,
  findConfigFile,
  loadConfigFile,
  parseConfig,
  type ProjectConfig,
} from './config/loader.js';
export { FileLogger, MemoryLogger, nullLogger, StreamLogger, type Logger } from './logging.js';

export { nodeFileSystem, type FileSystem } from './workspace/fs.js';
export { parseText, type ParsedFile, type SymbolEntry } from './workspace/parse.js';
export { ParseCache, RomCache } from './workspace/parse_cache.js';
export { ProjectGraph } from './workspace/project_graph.js';
export { collectSymbolsRecursive, DEFAULT_INCLUDE_LIMITS } from './workspace/include_graph.js';
export { analyzeDocument, type AnalysisContext, type AnalysisOutcome } from './workspace/pipeline.js';
export { WorkspaceSession, type DocumentPhase } from './workspace/session.js';
export { buildWorkspaceState, createServices, type WorkspaceServices } from './workspace/workspace.js';

export { LanguageServer, startServer, type LanguageServerOptions } from './lsp/server.js';
export { runCli, type CliIo } from './cli.js';
