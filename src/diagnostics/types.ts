/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning';

/**
 * An assembler or lint diagnostic with an optional source location.
 *
 * Diagnostics carry stable IDs so the CLI output and editor clients can filter on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `MX100`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  /** Source file as reported by the producer; may be relative or absent. */
  file?: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
  /** Unformatted text from the external assembler, when it supplied one. */
  raw?: string;
}

/**
 * Known diagnostic IDs.
 */
export const DiagnosticIds = {
  /** Unknown/unclassified diagnostic. */
  Unknown: 'MX000',

  /** Failed to read a source, ROM or config file. */
  IoReadFailed: 'MX001',

  /** Malformed `mx65.toml`. */
  ConfigError: 'MX002',

  /** Error reported by the external assembler. */
  AssemblerError: 'MX010',

  /** Warning reported by the external assembler. */
  AssemblerWarning: 'MX011',

  /** No assembler command is configured, or it could not be run. */
  AssemblerUnavailable: 'MX012',

  /** Two written blocks overlap in SNES address space. */
  OrgCollision: 'MX100',

  /** Immediate operand width depends on an M/X flag whose state is unknown. */
  UnknownWidth: 'MX110',

  /** Relative branch target falls outside the current bank's ROM window. */
  BranchOutsideBank: 'MX120',
} as const;

export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}
