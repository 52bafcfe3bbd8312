import { DiagnosticIds, type Diagnostic } from '../diagnostics/types.js';
import type {
  AssembleOptions,
  AssembleResult,
  Define,
  Label,
  SourceMap,
  SourceMapEntry,
  SourceMapFile,
  WrittenBlock,
} from './types.js';

/**
 * JSON request written to an external assembler's stdin.
 *
 * `romData` is base64. The command answers with one {@link AssembleResult}-shaped JSON object on
 * stdout, diagnostics using `filename` for the file field and `rom` (base64) for the bytes.
 */
export interface BridgeRequest {
  patchPath: string;
  includePaths: string[];
  defines: Array<[string, string]>;
  memoryFiles: Array<{ path: string; contents: string }>;
  romData?: string;
  stdIncludesPath?: string;
  stdDefinesPath?: string;
}

export class BridgeDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BridgeDecodeError';
  }
}

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isInt(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

function arrayField(obj: JsonRecord, key: string, where: string): unknown[] {
  const value = obj[key];
  if (value === undefined) return [];
  if (!Array.isArray(value)) throw new BridgeDecodeError(`${where}.${key} must be an array`);
  return value;
}

function recordAt(value: unknown, where: string): JsonRecord {
  if (!isRecord(value)) throw new BridgeDecodeError(`${where} must be an object`);
  return value;
}

function intField(obj: JsonRecord, key: string, where: string): number {
  const value = obj[key];
  if (!isInt(value)) throw new BridgeDecodeError(`${where}.${key} must be an integer`);
  return value;
}

function stringField(obj: JsonRecord, key: string, where: string): string {
  const value = obj[key];
  if (typeof value !== 'string') throw new BridgeDecodeError(`${where}.${key} must be a string`);
  return value;
}

function decodeDiagnostic(value: unknown, where: string): Diagnostic {
  const obj = recordAt(value, where);
  const severity = obj.severity;
  if (severity !== 'error' && severity !== 'warning') {
    throw new BridgeDecodeError(`${where}.severity must be "error" or "warning"`);
  }
  const diagnostic: Diagnostic = {
    id: severity === 'error' ? DiagnosticIds.AssemblerError : DiagnosticIds.AssemblerWarning,
    severity,
    message: stringField(obj, 'message', where),
  };
  if (typeof obj.filename === 'string' && obj.filename.length > 0) diagnostic.file = obj.filename;
  if (isInt(obj.line)) diagnostic.line = obj.line;
  if (isInt(obj.column)) diagnostic.column = obj.column;
  if (typeof obj.raw === 'string') diagnostic.raw = obj.raw;
  return diagnostic;
}

function decodeLabel(value: unknown, where: string): Label {
  const obj = recordAt(value, where);
  const label: Label = { name: stringField(obj, 'name', where), address: intField(obj, 'address', where) };
  if (typeof obj.used === 'boolean') label.used = obj.used;
  return label;
}

function decodeDefine(value: unknown, where: string): Define {
  const obj = recordAt(value, where);
  return { name: stringField(obj, 'name', where), value: stringField(obj, 'value', where) };
}

function decodeBlock(value: unknown, where: string): WrittenBlock {
  const obj = recordAt(value, where);
  return {
    pcOffset: intField(obj, 'pcOffset', where),
    snesOffset: intField(obj, 'snesOffset', where),
    numBytes: intField(obj, 'numBytes', where),
  };
}

function decodeSourceMap(value: unknown): SourceMap {
  if (value === undefined) return { files: [], entries: [] };
  const obj = recordAt(value, 'sourceMap');
  const files = arrayField(obj, 'files', 'sourceMap').map((f, i): SourceMapFile => {
    const where = `sourceMap.files[${i}]`;
    const file = recordAt(f, where);
    return { id: intField(file, 'id', where), crc: intField(file, 'crc', where), path: stringField(file, 'path', where) };
  });
  const entries = arrayField(obj, 'entries', 'sourceMap').map((e, i): SourceMapEntry => {
    const where = `sourceMap.entries[${i}]`;
    const entry = recordAt(e, where);
    return {
      address: intField(entry, 'address', where),
      fileId: intField(entry, 'fileId', where),
      line: intField(entry, 'line', where),
    };
  });
  return { files, entries };
}

/**
 * Validate one bridge response.
 *
 * @throws BridgeDecodeError when the shape does not match.
 */
export function decodeAssembleResult(raw: unknown): AssembleResult {
  const obj = recordAt(raw, 'result');
  if (typeof obj.success !== 'boolean') throw new BridgeDecodeError('result.success must be a boolean');
  const rom = obj.rom;
  if (rom !== undefined && typeof rom !== 'string') throw new BridgeDecodeError('result.rom must be base64 text');
  return {
    success: obj.success,
    diagnostics: arrayField(obj, 'diagnostics', 'result').map((d, i) => decodeDiagnostic(d, `diagnostics[${i}]`)),
    labels: arrayField(obj, 'labels', 'result').map((l, i) => decodeLabel(l, `labels[${i}]`)),
    defines: arrayField(obj, 'defines', 'result').map((d, i) => decodeDefine(d, `defines[${i}]`)),
    sourceMap: decodeSourceMap(obj.sourceMap),
    writtenBlocks: arrayField(obj, 'writtenBlocks', 'result').map((b, i) => decodeBlock(b, `writtenBlocks[${i}]`)),
    romBytes: rom === undefined ? new Uint8Array(0) : new Uint8Array(Buffer.from(rom, 'base64')),
  };
}

export function encodeRequest(options: AssembleOptions): BridgeRequest {
  const request: BridgeRequest = {
    patchPath: options.patchPath,
    includePaths: options.includePaths,
    defines: options.defines,
    memoryFiles: options.memoryFiles.map((f) => ({ path: f.path, contents: f.contents })),
  };
  if (options.romData !== undefined) request.romData = Buffer.from(options.romData).toString('base64');
  if (options.stdIncludesPath !== undefined) request.stdIncludesPath = options.stdIncludesPath;
  if (options.stdDefinesPath !== undefined) request.stdDefinesPath = options.stdDefinesPath;
  return request;
}
