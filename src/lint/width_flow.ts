import type { SourceMap, WrittenBlock } from '../assembler/types.js';
import { DiagnosticIds, type Diagnostic, type DiagnosticId } from '../diagnostics/types.js';
import { decode, immediateFlag, isRelative, operandSize, type Width } from '../isa/opcodes.js';
import { SourceIndex } from './source_index.js';

/**
 * Accumulator (M) and index (X) register widths tracked through an instruction stream.
 */
export interface RegisterWidthState {
  mWidth: Width;
  xWidth: Width;
  mKnown: boolean;
  xKnown: boolean;
}

/** Widths forced at a given address, e.g. from an `; assume m:16` hint. */
export interface WidthOverride {
  m?: Width;
  x?: Width;
}

export interface LintOptions {
  /** Default M width in bytes at the start of each block; `0` means unknown. */
  defaultMWidth: number;
  /** Default X width in bytes at the start of each block; `0` means unknown. */
  defaultXWidth: number;
  warnUnknownWidth: boolean;
  warnBranchOutsideBank: boolean;
  warnOrgCollision: boolean;
  /** Keyed by SNES address. Applied before the instruction at that address is decoded. */
  stateOverrides: ReadonlyMap<number, WidthOverride>;
}

export const defaultLintOptions: LintOptions = {
  defaultMWidth: 1,
  defaultXWidth: 1,
  warnUnknownWidth: true,
  warnBranchOutsideBank: true,
  warnOrgCollision: true,
  stateOverrides: new Map(),
};

export interface LintResult {
  diagnostics: Diagnostic[];
}

interface AddressRange {
  start: number;
  end: number;
}

const M_FLAG = 0x20;
const X_FLAG = 0x10;

function toWidth(bytes: number): Width {
  return bytes >= 2 ? 2 : 1;
}

export function formatSnes(address: number): string {
  return `$${(address >>> 0).toString(16).toUpperCase().padStart(6, '0')}`;
}

/**
 * Register state at the start of a block, from configured defaults.
 */
export function initialWidthState(options: Pick<LintOptions, 'defaultMWidth' | 'defaultXWidth'>): RegisterWidthState {
  return {
    mWidth: toWidth(options.defaultMWidth),
    xWidth: toWidth(options.defaultXWidth),
    mKnown: options.defaultMWidth > 0,
    xKnown: options.defaultXWidth > 0,
  };
}

/**
 * Register state after executing `mnemonic` with an immediate `operand` byte (REP/SEP only).
 */
export function transition(
  state: RegisterWidthState,
  mnemonic: string,
  operand: number | undefined,
): RegisterWidthState {
  switch (mnemonic) {
    case 'REP':
    case 'SEP': {
      if (operand === undefined) return state;
      const width: Width = mnemonic === 'REP' ? 2 : 1;
      const next = { ...state };
      if ((operand & M_FLAG) !== 0) {
        next.mWidth = width;
        next.mKnown = true;
      }
      if ((operand & X_FLAG) !== 0) {
        next.xWidth = width;
        next.xKnown = true;
      }
      return next;
    }
    case 'PLP':
    case 'RTI':
      return { ...state, mKnown: false, xKnown: false };
    case 'XCE':
      return { mWidth: 1, xWidth: 1, mKnown: true, xKnown: true };
    default:
      return state;
  }
}

function applyOverride(state: RegisterWidthState, override: WidthOverride | undefined): RegisterWidthState {
  if (override === undefined) return state;
  const next = { ...state };
  if (override.m !== undefined) {
    next.mWidth = override.m;
    next.mKnown = true;
  }
  if (override.x !== undefined) {
    next.xWidth = override.x;
    next.xKnown = true;
  }
  return next;
}

function readSignedOffset(rom: Uint8Array, at: number, size: number): number {
  const lo = rom[at] ?? 0;
  if (size === 1) return (lo ^ 0x80) - 0x80;
  const hi = rom[at + 1] ?? 0;
  const word = lo | (hi << 8);
  return (word ^ 0x8000) - 0x8000;
}

class LintContext {
  readonly diagnostics: Diagnostic[] = [];

  constructor(private readonly index: SourceIndex) {}

  report(id: DiagnosticId, severity: Diagnostic['severity'], message: string, address: number): void {
    const entry = this.index.lookup(address);
    const file = entry ? this.index.fileForId(entry.fileId) : undefined;
    if (entry === undefined || file === undefined) {
      this.diagnostics.push({ id, severity, message });
      return;
    }
    this.diagnostics.push({ id, severity, message, file, line: entry.line, column: 1 });
  }
}

function checkOrgCollisions(blocks: readonly WrittenBlock[], ctx: LintContext): void {
  const ranges: AddressRange[] = blocks
    .filter((b) => b.numBytes > 0)
    .map((b) => ({ start: b.snesOffset, end: b.snesOffset + b.numBytes }))
    .sort((a, b) => (a.start !== b.start ? a.start - b.start : a.end - b.end));

  // Sweep in start order; `open` holds earlier ranges that still extend past the current start.
  let open: AddressRange[] = [];
  for (const curr of ranges) {
    open = open.filter((prev) => prev.end > curr.start);
    for (const prev of open) {
      ctx.report(
        DiagnosticIds.OrgCollision,
        'error',
        `ORG collision: overlap between ${formatSnes(prev.start)}-${formatSnes(prev.end - 1)} and ${formatSnes(curr.start)}-${formatSnes(curr.end - 1)}`,
        curr.start,
      );
    }
    open.push(curr);
  }
}

function walkBlock(rom: Uint8Array, block: WrittenBlock, options: LintOptions, ctx: LintContext): void {
  const end = block.pcOffset + block.numBytes;
  if (block.pcOffset < 0 || end > rom.length) return;

  const fallbackM = toWidth(options.defaultMWidth);
  const fallbackX = toWidth(options.defaultXWidth);
  let state = initialWidthState(options);
  let pc = block.pcOffset;
  let snes = block.snesOffset;

  while (pc < end) {
    state = applyOverride(state, options.stateOverrides.get(snes));
    const info = decode(rom[pc] ?? 0);
    const size = operandSize(
      info.mode,
      state.mKnown ? state.mWidth : fallbackM,
      state.xKnown ? state.xWidth : fallbackX,
    );
    if (pc + 1 + size > end) break;

    const flag = immediateFlag(info.mode);
    if (options.warnUnknownWidth && flag === 'm' && !state.mKnown) {
      ctx.report(DiagnosticIds.UnknownWidth, 'warning', 'Immediate size depends on M flag (unknown state)', snes);
    } else if (options.warnUnknownWidth && flag === 'x' && !state.xKnown) {
      ctx.report(DiagnosticIds.UnknownWidth, 'warning', 'Immediate size depends on X flag (unknown state)', snes);
    }

    if (options.warnBranchOutsideBank && isRelative(info.mode)) {
      const unbanked = (snes & 0xffff) + 1 + size + readSignedOffset(rom, pc + 1, size);
      if (unbanked < 0x8000 || unbanked > 0xffff) {
        const target = (snes & 0xff0000) | (unbanked & 0xffff);
        ctx.report(
          DiagnosticIds.BranchOutsideBank,
          'warning',
          `Branch target leaves current bank (target ${formatSnes(target)})`,
          snes,
        );
      }
    }

    state = transition(state, info.mnemonic, size === 1 ? rom[pc + 1] : undefined);
    pc += 1 + size;
    snes += 1 + size;
  }
}

/**
 * Width-flow lint over the blocks an assembler wrote.
 *
 * Each written block is an independent analysis unit: register widths start from the configured
 * defaults and never carry across blocks. Diagnostics are attributed through the source map when
 * their address resolves, and emitted without a location otherwise.
 */
export function runLint(
  rom: Uint8Array,
  blocks: readonly WrittenBlock[],
  sourceMap: SourceMap,
  options: Partial<LintOptions> = {},
): LintResult {
  const opts: LintOptions = { ...defaultLintOptions, ...options };
  if (rom.length === 0) return { diagnostics: [] };

  const ctx = new LintContext(new SourceIndex(sourceMap));
  if (opts.warnOrgCollision) checkOrgCollisions(blocks, ctx);
  for (const block of blocks) {
    if (block.numBytes <= 0) continue;
    walkBlock(rom, block, opts, ctx);
  }
  return { diagnostics: ctx.diagnostics };
}
