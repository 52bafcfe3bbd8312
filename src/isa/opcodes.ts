import { readDataFile } from '../data/load.js';

/**
 * 65816 addressing modes.
 *
 * `imm-m` / `imm-x` immediates take their width from the current M / X flag.
 */
export const ADDRESSING_MODES = [
  'implied',
  'imm8',
  'imm16',
  'imm-m',
  'imm-x',
  'rel8',
  'rel16',
  'dp',
  'dp-x',
  'dp-y',
  'dp-ind',
  'dp-x-ind',
  'dp-ind-y',
  'dp-ind-long',
  'dp-ind-long-y',
  'sr',
  'sr-ind-y',
  'abs',
  'abs-x',
  'abs-y',
  'long',
  'long-x',
  'abs-ind',
  'abs-x-ind',
  'abs-ind-long',
  'block-move',
] as const;

export type AddressingMode = (typeof ADDRESSING_MODES)[number];

/** Register width in bytes. */
export type Width = 1 | 2;

export interface OpcodeInfo {
  opcode: number;
  mnemonic: string;
  mode: AddressingMode;
}

export interface OpcodeDescription {
  name: string;
  summary: string;
  flags: string;
  cycles: string;
}

function isAddressingMode(value: unknown): value is AddressingMode {
  return typeof value === 'string' && (ADDRESSING_MODES as readonly string[]).includes(value);
}

function parseOpcodeTable(raw: unknown): OpcodeInfo[] {
  if (!Array.isArray(raw) || raw.length !== 256) {
    throw new Error('opcodes.json must hold exactly 256 entries');
  }
  const table: OpcodeInfo[] = [];
  raw.forEach((entry: unknown, index) => {
    if (entry === null || typeof entry !== 'object') {
      throw new Error(`opcodes.json entry ${index} is not an object`);
    }
    const opcode: unknown = Reflect.get(entry, 'opcode');
    const mnemonic: unknown = Reflect.get(entry, 'mnemonic');
    const mode: unknown = Reflect.get(entry, 'mode');
    if (opcode !== index || typeof mnemonic !== 'string' || !isAddressingMode(mode)) {
      throw new Error(`opcodes.json entry ${index} is malformed`);
    }
    table.push({ opcode: index, mnemonic, mode });
  });
  return table;
}

function parseDescriptions(raw: unknown): Map<string, OpcodeDescription> {
  const out = new Map<string, OpcodeDescription>();
  if (raw === null || typeof raw !== 'object') return out;
  for (const [mnemonic, value] of Object.entries(raw)) {
    if (value === null || typeof value !== 'object') continue;
    const name: unknown = Reflect.get(value, 'name');
    const summary: unknown = Reflect.get(value, 'summary');
    const flags: unknown = Reflect.get(value, 'flags');
    const cycles: unknown = Reflect.get(value, 'cycles');
    if (
      typeof name === 'string' &&
      typeof summary === 'string' &&
      typeof flags === 'string' &&
      typeof cycles === 'string'
    ) {
      out.set(mnemonic, { name, summary, flags, cycles });
    }
  }
  return out;
}

let opcodeTable: OpcodeInfo[] | undefined;
let descriptions: Map<string, OpcodeDescription> | undefined;

function table(): OpcodeInfo[] {
  opcodeTable ??= parseOpcodeTable(readDataFile('opcodes.json'));
  return opcodeTable;
}

/**
 * Decode one opcode byte. Total over 0..255; the value is masked to a byte.
 */
export function decode(opcode: number): OpcodeInfo {
  const info = table()[opcode & 0xff];
  if (info === undefined) {
    throw new Error(`opcode table has no entry for ${opcode & 0xff}`);
  }
  return info;
}

/**
 * Operand length in bytes for an addressing mode under the given M/X widths.
 */
export function operandSize(mode: AddressingMode, mWidth: Width, xWidth: Width): 0 | 1 | 2 | 3 {
  switch (mode) {
    case 'implied':
      return 0;
    case 'imm-m':
      return mWidth;
    case 'imm-x':
      return xWidth;
    case 'imm8':
    case 'rel8':
    case 'dp':
    case 'dp-x':
    case 'dp-y':
    case 'dp-ind':
    case 'dp-x-ind':
    case 'dp-ind-y':
    case 'dp-ind-long':
    case 'dp-ind-long-y':
    case 'sr':
    case 'sr-ind-y':
      return 1;
    case 'imm16':
    case 'rel16':
    case 'abs':
    case 'abs-x':
    case 'abs-y':
    case 'abs-ind':
    case 'abs-x-ind':
    case 'abs-ind-long':
    case 'block-move':
      return 2;
    case 'long':
    case 'long-x':
      return 3;
  }
}

export function isRelative(mode: AddressingMode): mode is 'rel8' | 'rel16' {
  return mode === 'rel8' || mode === 'rel16';
}

/** Which flag an immediate's width follows, if any. */
export function immediateFlag(mode: AddressingMode): 'm' | 'x' | undefined {
  if (mode === 'imm-m') return 'm';
  if (mode === 'imm-x') return 'x';
  return undefined;
}

/** Distinct mnemonics in the table, sorted. */
export function mnemonics(): string[] {
  return [...new Set(table().map((info) => info.mnemonic))].sort();
}

export function isMnemonic(token: string): boolean {
  const upper = token.toUpperCase();
  return table().some((info) => info.mnemonic === upper);
}

export function describeMnemonic(mnemonic: string): OpcodeDescription | undefined {
  descriptions ??= parseDescriptions(readDataFile('opcode_descriptions.json'));
  return descriptions.get(mnemonic.toUpperCase());
}
