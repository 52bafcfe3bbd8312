#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { defaultAssemblerFactory, type AssemblerFactory } from './assembler/external.js';
import type { AssembleResult } from './assembler/types.js';
import {
  configDirOf,
  emptyConfig,
  findConfigFile,
  loadConfigFile,
  parseDefines,
  resolveConfigPath,
  type ProjectConfig,
} from './config/loader.js';
import { packageVersion } from './data/load.js';
import { DiagnosticIds, hasErrors, type Diagnostic } from './diagnostics/types.js';
import type { Width } from './isa/opcodes.js';
import { runLint, type LintOptions, type WidthOverride } from './lint/width_flow.js';
import { formatError, StreamLogger } from './logging.js';
import { startServer } from './lsp/server.js';
import { nodeFileSystem, type FileSystem } from './workspace/fs.js';
import { buildStateOverrides, parseAssumeHints } from './workspace/hints.js';
import { RomCache } from './workspace/parse_cache.js';
import { normalizePath } from './workspace/paths.js';
import { lintOptionsFrom, type LintDefaults } from './workspace/pipeline.js';
import { configIncludePaths } from './workspace/workspace.js';

type CliExit = { code: number };

type Writable = { write(chunk: string): unknown };

/** Streams and collaborators the CLI uses; tests replace them. */
export interface CliIo {
  stdout: Writable;
  stderr: Writable;
  cwd?: string;
  fs?: FileSystem;
  assemblerFactory?: AssemblerFactory;
  serve?: () => void;
}

type LintCliOptions = {
  entryFile: string;
  configPath?: string;
  includeDirs: string[];
  defines: string[];
  assembler?: string;
  romPath?: string;
  mWidth?: Width;
  xWidth?: Width;
  warnUnknownWidth: boolean;
  warnBranchOutsideBank: boolean;
  warnOrgCollision: boolean;
};

/** The CLI runs every check unless told otherwise. */
const cliLintDefaults: LintDefaults = {
  warnUnknownWidth: true,
  warnBranchOutsideBank: true,
  warnOrgCollision: true,
};

function usage(): string {
  return [
    'mx65 lint [options] <entry.asm>',
    'mx65 lsp [--stdio]',
    '',
    'Lint options:',
    '  -c, --config <file>    Project config (default: nearest mx65.toml above the entry)',
    '  -I, --include <dir>    Add include search path (repeatable)',
    '  -D, --define <n[=v]>   Add assembler define (repeatable)',
    '      --assembler <cmd>  Assembler bridge command (overrides config)',
    '      --rom <file>       Base ROM image (overrides config)',
    '      --m-width <8|16>   Accumulator width assumed at block start',
    '      --x-width <8|16>   Index width assumed at block start',
    '      --no-unknown-width Do not warn on immediates under an unknown M/X state',
    '      --no-branch        Do not warn on branches leaving the bank',
    '      --no-org           Do not report overlapping written blocks',
    '  -V, --version          Print version',
    '  -h, --help             Show help',
    '',
    'Notes:',
    '  - <entry.asm> must be the last argument (assembler-style).',
    '  - Exit status is 1 when any error is reported, 2 on usage errors.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function parseWidth(flag: string, value: string): Width {
  if (value === '8') return 1;
  if (value === '16') return 2;
  fail(`Unsupported ${flag} "${value}" (expected 8|16)`);
}

/** `--name value`, `--name=value` or the short form. Advances `state.i` past a separate value. */
function optionValue(argv: string[], state: { i: number }, arg: string, long: string): string {
  if (arg.startsWith(`${long}=`)) {
    const v = arg.slice(long.length + 1);
    if (!v) fail(`${long} expects a value`);
    return v;
  }
  const v = argv[++state.i];
  if (!v) fail(`${arg} expects a value`);
  return v;
}

function matches(arg: string, long: string, short?: string): boolean {
  return arg === long || arg === short || arg.startsWith(`${long}=`);
}

function parseLintArgs(argv: string[], io: CliIo): LintCliOptions | CliExit {
  const includeDirs: string[] = [];
  const defines: string[] = [];
  let configPath: string | undefined;
  let assembler: string | undefined;
  let romPath: string | undefined;
  let mWidth: Width | undefined;
  let xWidth: Width | undefined;
  let warnUnknownWidth = true;
  let warnBranchOutsideBank = true;
  let warnOrgCollision = true;
  let entryFile: string | undefined;

  const state = { i: 0 };
  for (; state.i < argv.length; state.i++) {
    const a = argv[state.i] ?? '';
    if (a === '-h' || a === '--help') {
      io.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      io.stdout.write(`${packageVersion()}\n`);
      return { code: 0 };
    }
    if (matches(a, '--config', '-c')) {
      configPath = optionValue(argv, state, a, '--config');
      continue;
    }
    if (matches(a, '--include', '-I')) {
      includeDirs.push(optionValue(argv, state, a, '--include'));
      continue;
    }
    if (matches(a, '--define', '-D')) {
      defines.push(optionValue(argv, state, a, '--define'));
      continue;
    }
    if (matches(a, '--assembler')) {
      assembler = optionValue(argv, state, a, '--assembler');
      continue;
    }
    if (matches(a, '--rom')) {
      romPath = optionValue(argv, state, a, '--rom');
      continue;
    }
    if (matches(a, '--m-width')) {
      mWidth = parseWidth('--m-width', optionValue(argv, state, a, '--m-width'));
      continue;
    }
    if (matches(a, '--x-width')) {
      xWidth = parseWidth('--x-width', optionValue(argv, state, a, '--x-width'));
      continue;
    }
    if (a === '--no-unknown-width') {
      warnUnknownWidth = false;
      continue;
    }
    if (a === '--no-branch') {
      warnBranchOutsideBank = false;
      continue;
    }
    if (a === '--no-org') {
      warnOrgCollision = false;
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (entryFile !== undefined || state.i !== argv.length - 1) {
      fail(`Expected exactly one <entry.asm> argument (and it must be last)`);
    }
    entryFile = a;
  }

  if (!entryFile) {
    fail(`Expected exactly one <entry.asm> argument (and it must be last)`);
  }

  return {
    entryFile,
    ...(configPath ? { configPath } : {}),
    includeDirs,
    defines,
    ...(assembler ? { assembler } : {}),
    ...(romPath ? { romPath } : {}),
    ...(mWidth !== undefined ? { mWidth } : {}),
    ...(xWidth !== undefined ? { xWidth } : {}),
    warnUnknownWidth,
    warnBranchOutsideBank,
    warnOrgCollision,
  };
}

function normalizeDiagnosticPath(file: string): string {
  const normalized = file.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

export function compareDiagnosticsForCli(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = normalizeDiagnosticPath(a.file ?? '').localeCompare(normalizeDiagnosticPath(b.file ?? ''));
  if (fileCmp !== 0) return fileCmp;

  const lineCmp = (a.line ?? Number.POSITIVE_INFINITY) - (b.line ?? Number.POSITIVE_INFINITY);
  if (lineCmp !== 0 && !Number.isNaN(lineCmp)) return lineCmp;

  const colCmp = (a.column ?? Number.POSITIVE_INFINITY) - (b.column ?? Number.POSITIVE_INFINITY);
  if (colCmp !== 0 && !Number.isNaN(colCmp)) return colCmp;

  const sevCmp = (a.severity === 'error' ? 0 : 1) - (b.severity === 'error' ? 0 : 1);
  if (sevCmp !== 0) return sevCmp;

  const idCmp = a.id.localeCompare(b.id);
  if (idCmp !== 0) return idCmp;

  return a.message.localeCompare(b.message);
}

export function formatDiagnosticForCli(d: Diagnostic, fallbackFile: string): string {
  const file = d.file ?? fallbackFile;
  const loc = d.line !== undefined && d.column !== undefined ? `${file}:${d.line}:${d.column}` : file;
  return `${loc}: ${d.severity}: [${d.id}] ${d.message}`;
}

interface LoadedConfig {
  config?: ProjectConfig;
  configDir?: string;
  diagnostic?: Diagnostic;
}

function loadLintConfig(opts: LintCliOptions, cwd: string, fs: FileSystem): LoadedConfig {
  const path =
    opts.configPath !== undefined ? resolve(cwd, opts.configPath) : findConfigFile(dirname(opts.entryFile), fs);
  if (path === undefined) return {};
  const loaded = loadConfigFile(path, fs);
  if (loaded.config === undefined) return { diagnostic: loaded.error };
  return { config: loaded.config, configDir: configDirOf(path) };
}

/** Assume hints from every file the source map names, turned into lint state overrides. */
function collectStateOverrides(result: AssembleResult, rootDir: string, fs: FileSystem): Map<number, WidthOverride> {
  const overrides = new Map<number, WidthOverride>();
  for (const file of result.sourceMap.files) {
    const path = normalizePath(resolve(rootDir, file.path));
    let text: string;
    try {
      text = fs.readText(path);
    } catch {
      continue;
    }
    const fileOverrides = buildStateOverrides(parseAssumeHints(text), result.sourceMap, (p) => p === file.path);
    for (const [address, override] of fileOverrides) {
      overrides.set(address, { ...overrides.get(address), ...override });
    }
  }
  return overrides;
}

function lintEntry(opts: LintCliOptions, io: CliIo): number {
  const fs = io.fs ?? nodeFileSystem;
  const cwd = io.cwd ?? process.cwd();
  const logger = new StreamLogger(io.stderr);
  const entryPath = resolve(cwd, opts.entryFile);
  const report = (diagnostics: Diagnostic[]): number => {
    for (const d of [...diagnostics].sort(compareDiagnosticsForCli)) {
      io.stderr.write(`${formatDiagnosticForCli(d, opts.entryFile)}\n`);
    }
    return hasErrors(diagnostics) ? 1 : 0;
  };

  const loaded = loadLintConfig({ ...opts, entryFile: entryPath }, cwd, fs);
  if (loaded.diagnostic !== undefined) return report([loaded.diagnostic]);
  const { config, configDir } = loaded;

  if (!fs.exists(entryPath)) {
    return report([
      { id: DiagnosticIds.IoReadFailed, severity: 'error', file: opts.entryFile, message: `Cannot read ${opts.entryFile}` },
    ]);
  }

  const command = opts.assembler ?? config?.assembler;
  if (command === undefined) {
    return report([
      {
        id: DiagnosticIds.AssemblerUnavailable,
        severity: 'error',
        file: opts.entryFile,
        message: 'No assembler configured (set "assembler" in mx65.toml or pass --assembler)',
      },
    ]);
  }
  const factory = io.assemblerFactory ?? defaultAssemblerFactory;
  const assembler = factory({ ...(config ?? emptyConfig()), assembler: command }, configDir ?? cwd, logger);

  const includePaths = [
    ...configIncludePaths(config, configDir),
    ...opts.includeDirs.map((dir) => resolve(cwd, dir)),
    dirname(entryPath),
  ];
  const romFile =
    opts.romPath !== undefined
      ? resolve(cwd, opts.romPath)
      : config?.romPath !== undefined && configDir !== undefined
        ? resolveConfigPath(configDir, config.romPath)
        : undefined;
  const romData = romFile === undefined ? undefined : new RomCache(fs, logger).load(romFile, config?.romSize ?? 0);
  if (romFile !== undefined && romData === undefined) {
    return report([{ id: DiagnosticIds.IoReadFailed, severity: 'error', message: `Cannot read ROM ${romFile}` }]);
  }

  const result = assembler.assemble({
    patchPath: entryPath,
    includePaths,
    defines: parseDefines([...(config?.defines ?? []), ...opts.defines]),
    memoryFiles: [],
    ...(romData !== undefined ? { romData } : {}),
    ...(config?.stdIncludes !== undefined && configDir !== undefined
      ? { stdIncludesPath: resolveConfigPath(configDir, config.stdIncludes) }
      : {}),
    ...(config?.stdDefines !== undefined && configDir !== undefined
      ? { stdDefinesPath: resolveConfigPath(configDir, config.stdDefines) }
      : {}),
  });
  if (result.unavailable === true) {
    return report([
      {
        id: DiagnosticIds.AssemblerUnavailable,
        severity: 'error',
        file: opts.entryFile,
        message: `Assembler "${command}" produced no usable result`,
      },
    ]);
  }
  const assemblyDiagnostics: Diagnostic[] = [...result.diagnostics];
  if (!result.success && !hasErrors(assemblyDiagnostics)) {
    assemblyDiagnostics.push({
      id: DiagnosticIds.AssemblerError,
      severity: 'error',
      file: opts.entryFile,
      message: 'Assembly failed',
    });
  }

  const fromConfig = lintOptionsFrom(config, cliLintDefaults);
  const lintOptions: LintOptions = {
    ...fromConfig,
    defaultMWidth: opts.mWidth ?? fromConfig.defaultMWidth,
    defaultXWidth: opts.xWidth ?? fromConfig.defaultXWidth,
    warnUnknownWidth: opts.warnUnknownWidth && fromConfig.warnUnknownWidth,
    warnBranchOutsideBank: opts.warnBranchOutsideBank && fromConfig.warnBranchOutsideBank,
    warnOrgCollision: opts.warnOrgCollision && fromConfig.warnOrgCollision,
    stateOverrides: collectStateOverrides(result, dirname(entryPath), fs),
  };
  const lint = runLint(result.romBytes, result.writtenBlocks, result.sourceMap, lintOptions);
  return report([...assemblyDiagnostics, ...lint.diagnostics]);
}

export async function runCli(
  argv: string[],
  io: CliIo = { stdout: process.stdout, stderr: process.stderr },
): Promise<number> {
  try {
    const [command, ...rest] = argv;
    if (command === undefined) fail('Expected a command (lint|lsp)');
    if (command === '-h' || command === '--help') {
      io.stdout.write(usage());
      return 0;
    }
    if (command === '-V' || command === '--version') {
      io.stdout.write(`${packageVersion()}\n`);
      return 0;
    }
    if (command === 'lsp') {
      const unknown = rest.find((a) => a !== '--stdio');
      if (unknown !== undefined) fail(`Unknown option "${unknown}"`);
      (io.serve ?? startServer)();
      return 0;
    }
    if (command !== 'lint') fail(`Unknown command "${command}" (expected lint|lsp)`);

    const parsed = parseLintArgs(rest, io);
    if ('code' in parsed) return parsed.code;
    return lintEntry(parsed, io);
  } catch (err) {
    if (err instanceof Error && err.name === 'CliError') {
      io.stderr.write(`mx65: ${err.message}\n`);
      io.stderr.write(`${usage()}\n`);
      return 2;
    }
    io.stderr.write(`mx65: ${formatError(err)}\n`);
    return 1;
  }
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  let real = resolved;
  try {
    real = realpathSync.native(resolved);
  } catch {
    real = resolved;
  }
  const normalized = real.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  const self = fileURLToPath(import.meta.url);
  if (normalizePathForCompare(invokedAs) === normalizePathForCompare(self)) return true;
  // npm's bin shim can surface a different spelling of the same file.
  const invoked = normalizePathForCompare(invokedAs);
  return invoked.endsWith('/dist/src/cli.js') && self.replace(/\\/g, '/').endsWith('/dist/src/cli.js');
}

if (isDirectCliInvocation(process.argv[1])) {
  void runCli(process.argv.slice(2)).then((code) => {
    process.exitCode = code;
  });
}
