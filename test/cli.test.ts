import { describe, expect, it } from 'vitest';

import { emptyAssembleResult, unavailableAssembleResult, type AssembleResult } from '../src/assembler/types.js';
import { compareDiagnosticsForCli, formatDiagnosticForCli, runCli, type CliIo } from '../src/cli.js';
import type { ProjectConfig } from '../src/config/loader.js';
import type { Diagnostic } from '../src/diagnostics/types.js';
import { assembled, CapturedStream, FakeAssembler } from './helpers/fake_assembler.js';
import { MemoryFileSystem } from './helpers/memory_fs.js';

interface Run {
  code: number;
  stdout: string;
  stderr: string;
  assembler: FakeAssembler;
  configs: Array<ProjectConfig | undefined>;
}

async function run(
  argv: string[],
  files: Record<string, string> = {},
  result: AssembleResult = assembled({}),
  extra: Partial<CliIo> = {},
): Promise<Run> {
  const stdout = new CapturedStream();
  const stderr = new CapturedStream();
  const assembler = new FakeAssembler(() => result);
  const configs: Array<ProjectConfig | undefined> = [];
  const code = await runCli(argv, {
    stdout,
    stderr,
    cwd: '/proj',
    fs: new MemoryFileSystem(files),
    assemblerFactory: (config) => {
      configs.push(config);
      return assembler;
    },
    ...extra,
  });
  return { code, stdout: stdout.text, stderr: stderr.text, assembler, configs };
}

const widthResult = assembled({
  diagnostics: [{ id: 'MX011', severity: 'warning', message: 'Unused label', file: 'main.asm', line: 1, column: 1 }],
  romBytes: new Uint8Array([0x28, 0xa9, 0x00]),
  writtenBlocks: [{ pcOffset: 0, snesOffset: 0x8000, numBytes: 3 }],
  sourceMap: {
    files: [{ id: 0, crc: 0, path: 'main.asm' }],
    entries: [
      { address: 0x8000, fileId: 0, line: 2 },
      { address: 0x8001, fileId: 0, line: 3 },
    ],
  },
});

const project = {
  '/proj/mx65.toml': 'include_paths = ["lib"]\ndefines = ["DEBUG"]\nassembler = "bridge"',
  '/proj/main.asm': 'Main:\n  plp\n  lda #$00',
};

describe('mx65 cli', () => {
  it('prints the version', async () => {
    expect((await run(['-V'])).stdout).toBe('0.1.0\n');
    expect((await run(['lint', '--version'])).stdout).toBe('0.1.0\n');
  });

  it('prints help', async () => {
    const { code, stdout } = await run(['--help']);
    expect(code).toBe(0);
    expect(stdout.startsWith('mx65 lint [options] <entry.asm>\nmx65 lsp [--stdio]\n')).toBe(true);
  });

  it.each([
    [[], 'Expected a command (lint|lsp)'],
    [['build'], 'Unknown command "build" (expected lint|lsp)'],
    [['lint'], 'Expected exactly one <entry.asm> argument (and it must be last)'],
    [['lint', 'a.asm', 'b.asm'], 'Expected exactly one <entry.asm> argument (and it must be last)'],
    [['lint', '--bogus', 'a.asm'], 'Unknown option "--bogus"'],
    [['lint', '--m-width', '12', 'a.asm'], 'Unsupported --m-width "12" (expected 8|16)'],
    [['lint', '--config'], '--config expects a value'],
    [['lsp', '--tcp'], 'Unknown option "--tcp"'],
  ])('rejects %j with usage', async (argv, message) => {
    const { code, stderr } = await run(argv);
    expect(code).toBe(2);
    expect(stderr.startsWith(`mx65: ${message}\nmx65 lint [options]`)).toBe(true);
  });

  it('starts the language server', async () => {
    let served = 0;
    const { code } = await run(['lsp', '--stdio'], {}, assembled({}), { serve: () => served++ });
    expect(code).toBe(0);
    expect(served).toBe(1);
  });

  it('lints an entry file with config and command-line settings', async () => {
    const { code, stderr, assembler, configs } = await run(['lint', '-D', 'LEVEL=2', 'main.asm'], project, widthResult);

    expect(code).toBe(0);
    expect(stderr).toBe(
      'main.asm:1:1: warning: [MX011] Unused label\n' +
        'main.asm:3:1: warning: [MX110] Immediate size depends on M flag (unknown state)\n',
    );
    expect(assembler.calls).toEqual([
      {
        patchPath: '/proj/main.asm',
        includePaths: ['/proj/lib', '/proj'],
        defines: [
          ['DEBUG', ''],
          ['LEVEL', '2'],
        ],
        memoryFiles: [],
      },
    ]);
    expect(configs[0]?.assembler).toBe('bridge');
  });

  it('honours assume hints and --no flags', async () => {
    const hinted = await run(
      ['lint', 'main.asm'],
      { ...project, '/proj/main.asm': 'Main:\n  plp\n  lda #$00 ; assume m:8' },
      widthResult,
    );
    expect(hinted.stderr).toBe('main.asm:1:1: warning: [MX011] Unused label\n');

    const quiet = await run(['lint', '--no-unknown-width', 'main.asm'], project, widthResult);
    expect(quiet.stderr).toBe('main.asm:1:1: warning: [MX011] Unused label\n');
  });

  it('exits 1 when an error is reported', async () => {
    const failing = assembled({
      diagnostics: [{ id: 'MX010', severity: 'error', message: 'Unknown command.', file: 'main.asm', line: 2, column: 3 }],
    });
    const { code, stderr } = await run(['lint', 'main.asm'], project, failing);
    expect(code).toBe(1);
    expect(stderr).toBe('main.asm:2:3: error: [MX010] Unknown command.\n');
  });

  it('fails when the assembler reports failure without an error', async () => {
    const { code, stderr } = await run(
      ['lint', '--assembler', 'bridge', 'main.asm'],
      { '/proj/main.asm': 'Main:' },
      emptyAssembleResult(false),
    );
    expect(code).toBe(1);
    expect(stderr).toBe('main.asm: error: [MX010] Assembly failed\n');
  });

  it('fails when the assembler output cannot be used', async () => {
    const { code, stderr } = await run(
      ['lint', '--assembler', 'bridge', 'main.asm'],
      { '/proj/main.asm': 'Main:' },
      unavailableAssembleResult(),
    );
    expect(code).toBe(1);
    expect(stderr).toBe('main.asm: error: [MX012] Assembler "bridge" produced no usable result\n');
  });

  it('reports a malformed config', async () => {
    const { code, stderr } = await run(['lint', 'main.asm'], {
      ...project,
      '/proj/mx65.toml': 'lint_m_width = 12',
    });
    expect(code).toBe(1);
    expect(stderr).toBe('/proj/mx65.toml:1:1: error: [MX002] lint_m_width expects 8 or 16\n');
  });

  it('reports a missing entry file', async () => {
    const { code, stderr } = await run(['lint', 'missing.asm'], project);
    expect(code).toBe(1);
    expect(stderr).toBe('missing.asm: error: [MX001] Cannot read missing.asm\n');
  });

  it('requires an assembler command', async () => {
    const { code, stderr } = await run(['lint', 'main.asm'], { '/proj/main.asm': 'Main:' });
    expect(code).toBe(1);
    expect(stderr).toBe(
      'main.asm: error: [MX012] No assembler configured (set "assembler" in mx65.toml or pass --assembler)\n',
    );
  });

  it('passes the base ROM, padded to the configured size', async () => {
    const { code, assembler } = await run(['lint', 'main.asm'], {
      ...project,
      '/proj/mx65.toml': 'assembler = "bridge"\nrom = "game.sfc"\nrom_size = 4',
      '/proj/game.sfc': 'AB',
    });
    expect(code).toBe(0);
    expect([...(assembler.calls[0]?.romData ?? [])]).toEqual([0x41, 0x42, 0, 0]);
  });

  it('reports a missing ROM against the entry file', async () => {
    const { code, stderr, assembler } = await run(
      ['lint', '--assembler', 'bridge', '--rom', 'game.sfc', 'main.asm'],
      { '/proj/main.asm': 'Main:' },
    );
    expect(code).toBe(1);
    expect(stderr).toBe('main.asm: error: [MX001] Cannot read ROM /proj/game.sfc\n');
    expect(assembler.calls).toHaveLength(0);
  });
});

describe('diagnostic output', () => {
  const diagnostic = (fields: Partial<Diagnostic>): Diagnostic => ({
    id: 'MX010',
    severity: 'error',
    message: 'm',
    ...fields,
  });

  it('formats with and without a location', () => {
    expect(formatDiagnosticForCli(diagnostic({ file: 'a.asm', line: 4, column: 2 }), 'main.asm')).toBe(
      'a.asm:4:2: error: [MX010] m',
    );
    expect(formatDiagnosticForCli(diagnostic({ line: 4 }), 'main.asm')).toBe('main.asm: error: [MX010] m');
  });

  it('sorts by file, line, column, severity, id and message', () => {
    const sorted = [
      diagnostic({ file: 'b.asm', line: 1, column: 1 }),
      diagnostic({ file: 'a.asm', line: 2, column: 1, severity: 'warning', id: 'MX011' }),
      diagnostic({ file: 'a.asm', line: 2, column: 1 }),
      diagnostic({ file: 'a.asm' }),
      diagnostic({ file: 'a.asm', line: 1, column: 9 }),
    ].sort(compareDiagnosticsForCli);
    expect(sorted.map((d) => `${d.file}:${String(d.line)}:${String(d.column)}:${d.severity}`)).toEqual([
      'a.asm:1:9:error',
      'a.asm:2:1:error',
      'a.asm:2:1:warning',
      'a.asm:undefined:undefined:error',
      'b.asm:1:1:error',
    ]);
  });
});
