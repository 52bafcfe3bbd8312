import type { Diagnostic } from '../diagnostics/types.js';

/** One contiguous region the assembler wrote into the ROM image. */
export interface WrittenBlock {
  /** Offset into the ROM file. */
  pcOffset: number;
  /** SNES (CPU) address of the first byte. */
  snesOffset: number;
  numBytes: number;
}

export interface SourceMapFile {
  id: number;
  crc: number;
  path: string;
}

export interface SourceMapEntry {
  address: number;
  fileId: number;
  /** 1-based source line. */
  line: number;
}

export interface SourceMap {
  files: SourceMapFile[];
  entries: SourceMapEntry[];
}

export interface Label {
  name: string;
  address: number;
  used?: boolean;
}

export interface Define {
  name: string;
  value: string;
}

/** In-memory file contents that shadow the file on disk for one assemble. */
export interface MemoryFile {
  path: string;
  contents: string;
}

export interface AssembleOptions {
  /** Entry file handed to the assembler. */
  patchPath: string;
  includePaths: string[];
  defines: Array<[name: string, value: string]>;
  memoryFiles: MemoryFile[];
  /** Base ROM image to patch into, when configured. */
  romData?: Uint8Array;
  stdIncludesPath?: string;
  stdDefinesPath?: string;
}

export interface AssembleResult {
  success: boolean;
  diagnostics: Diagnostic[];
  labels: Label[];
  defines: Define[];
  sourceMap: SourceMap;
  writtenBlocks: WrittenBlock[];
  romBytes: Uint8Array;
  /**
   * Set when no assembler ran or its output could not be read. The other fields then carry no
   * data and callers keep what they had.
   */
  unavailable?: boolean;
}

/**
 * The assembly/patching engine. Synchronous: analysis runs inside a single message handler.
 */
export interface Assembler {
  assemble(options: AssembleOptions): AssembleResult;
}

export function emptySourceMap(): SourceMap {
  return { files: [], entries: [] };
}

export function emptyAssembleResult(success = false): AssembleResult {
  return {
    success,
    diagnostics: [],
    labels: [],
    defines: [],
    sourceMap: emptySourceMap(),
    writtenBlocks: [],
    romBytes: new Uint8Array(0),
  };
}

/** Result for an assemble that produced nothing readable. */
export function unavailableAssembleResult(): AssembleResult {
  return { ...emptyAssembleResult(), unavailable: true };
}
