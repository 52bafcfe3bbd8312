import { dirname, isAbsolute, join, resolve } from 'node:path';

import { DiagnosticIds, type Diagnostic } from '../diagnostics/types.js';
import { formatError } from '../logging.js';
import type { FileSystem } from '../workspace/fs.js';

export const CONFIG_FILE_NAME = 'mx65.toml';

/**
 * Project settings read from `mx65.toml`. Paths are stored as written; resolve them against the
 * config directory with {@link resolveConfigPath}.
 */
export interface ProjectConfig {
  includePaths: string[];
  /** `NAME` or `NAME=VALUE`. */
  defines: string[];
  mainFiles: string[];
  stdIncludes?: string;
  stdDefines?: string;
  romPath?: string;
  romSize?: number;
  lspLogEnabled?: boolean;
  lspLogPath?: string;
  warnUnknownWidth?: boolean;
  warnBranchOutsideBank?: boolean;
  warnOrgCollision?: boolean;
  /** Lint default accumulator width in bytes. */
  lintMWidth?: 1 | 2;
  /** Lint default index width in bytes. */
  lintXWidth?: 1 | 2;
  /** External assembler bridge command. */
  assembler?: string;
  assemblerArgs: string[];
  suppressLabelPrefixes: string[];
  suppressLabelUnderscoreSuffix: boolean;
  suppressMissingOrg: boolean;
}

export function emptyConfig(): ProjectConfig {
  return {
    includePaths: [],
    defines: [],
    mainFiles: [],
    assemblerArgs: [],
    suppressLabelPrefixes: [],
    suppressLabelUnderscoreSuffix: true,
    suppressMissingOrg: true,
  };
}

export class ConfigError extends Error {
  constructor(
    readonly detail: string,
    readonly file: string,
    readonly line: number,
  ) {
    super(`${file}:${line}: ${detail}`);
    this.name = 'ConfigError';
  }
}

/** A parsed right-hand side: quoted strings are unescaped, bare tokens kept verbatim. */
type RawValue = string | string[];

function stripHashComment(line: string): string {
  let inString = false;
  let escaped = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '#') return line.slice(0, i);
  }
  return line;
}

function bracketDelta(text: string): number {
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (const ch of text) {
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '[') depth++;
    else if (ch === ']') depth--;
  }
  return depth;
}

const ESCAPES: Readonly<Record<string, string>> = { n: '\n', t: '\t', r: '\r', '\\': '\\', '"': '"' };

function parseQuoted(text: string, fail: (message: string) => never): string {
  let out = '';
  for (let i = 1; i < text.length; i++) {
    const ch = text[i] ?? '';
    if (ch === '\\') {
      const next = text[i + 1] ?? '';
      out += ESCAPES[next] ?? next;
      i++;
      continue;
    }
    if (ch === '"') {
      if (text.slice(i + 1).trim().length > 0) fail(`unexpected text after string: ${text}`);
      return out;
    }
    out += ch;
  }
  return fail(`unterminated string: ${text}`);
}

function parseScalar(text: string, fail: (message: string) => never): string {
  const trimmed = text.trim();
  return trimmed.startsWith('"') ? parseQuoted(trimmed, fail) : trimmed;
}

function splitArrayItems(body: string): string[] {
  const items: string[] = [];
  let current = '';
  let inString = false;
  let escaped = false;
  for (const ch of body) {
    if (inString) {
      current += ch;
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    if (ch === ',') {
      items.push(current);
      current = '';
      continue;
    }
    current += ch;
  }
  items.push(current);
  return items.map((s) => s.trim()).filter((s) => s.length > 0);
}

function parseValue(text: string, fail: (message: string) => never): RawValue {
  const trimmed = text.trim();
  if (!trimmed.startsWith('[')) return parseScalar(trimmed, fail);
  if (!trimmed.endsWith(']')) fail(`unterminated array: ${trimmed}`);
  return splitArrayItems(trimmed.slice(1, -1)).map((item) => parseScalar(item, fail));
}

const TRUE_WORDS = new Set(['true', '1', 'yes', 'on']);
const FALSE_WORDS = new Set(['false', '0', 'no', 'off']);

function asBool(key: string, value: RawValue, fail: (message: string) => never): boolean {
  const word = typeof value === 'string' ? value.toLowerCase() : '';
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  return fail(`${key} expects a boolean`);
}

function asString(key: string, value: RawValue, fail: (message: string) => never): string {
  if (typeof value !== 'string') return fail(`${key} expects a string`);
  return value;
}

function asList(value: RawValue): string[] {
  return typeof value === 'string' ? [value] : value;
}

function asInt(key: string, value: RawValue, fail: (message: string) => never): number {
  const text = typeof value === 'string' ? value.replace(/_/g, '') : '';
  const n = /^0x[0-9a-f]+$/i.test(text) ? Number.parseInt(text.slice(2), 16) : Number(text);
  if (text.length === 0 || !Number.isInteger(n) || n < 0) return fail(`${key} expects a non-negative integer`);
  return n;
}

function asWidth(key: string, value: RawValue, fail: (message: string) => never): 1 | 2 {
  const bits = asInt(key, value, fail);
  if (bits === 8) return 1;
  if (bits === 16) return 2;
  return fail(`${key} expects 8 or 16`);
}

function applyKey(config: ProjectConfig, key: string, value: RawValue, fail: (message: string) => never): void {
  switch (key) {
    case 'include_paths':
      config.includePaths = asList(value);
      return;
    case 'defines':
      config.defines = asList(value);
      return;
    case 'main':
    case 'main_file':
    case 'main_files':
    case 'entry':
    case 'entry_files':
      config.mainFiles = asList(value);
      return;
    case 'std_includes':
      config.stdIncludes = asString(key, value, fail);
      return;
    case 'std_defines':
      config.stdDefines = asString(key, value, fail);
      return;
    case 'rom':
    case 'rom_path':
      config.romPath = asString(key, value, fail);
      return;
    case 'rom_size':
      config.romSize = asInt(key, value, fail);
      return;
    case 'lsp_log_enabled':
      config.lspLogEnabled = asBool(key, value, fail);
      return;
    case 'lsp_log_path':
      config.lspLogPath = asString(key, value, fail);
      return;
    case 'warn_unknown_width':
      config.warnUnknownWidth = asBool(key, value, fail);
      return;
    case 'warn_branch_outside_bank':
      config.warnBranchOutsideBank = asBool(key, value, fail);
      return;
    case 'warn_org_collision':
      config.warnOrgCollision = asBool(key, value, fail);
      return;
    case 'lint_m_width':
      config.lintMWidth = asWidth(key, value, fail);
      return;
    case 'lint_x_width':
      config.lintXWidth = asWidth(key, value, fail);
      return;
    case 'assembler':
      config.assembler = asString(key, value, fail);
      return;
    case 'assembler_args':
      config.assemblerArgs = asList(value);
      return;
    case 'suppress_label_prefixes':
      config.suppressLabelPrefixes = asList(value);
      return;
    case 'suppress_label_underscore_suffix':
      config.suppressLabelUnderscoreSuffix = asBool(key, value, fail);
      return;
    case 'suppress_missing_org':
      config.suppressMissingOrg = asBool(key, value, fail);
      return;
    default:
      // Unknown keys are ignored so newer config files still load.
      return;
  }
}

/**
 * Parse `mx65.toml` text: `key = value` pairs, `#` comments, quoted strings, bare words and
 * (possibly multi-line) arrays. `[table]` headers are accepted and ignored.
 *
 * @throws ConfigError on malformed input.
 */
export function parseConfig(text: string, file: string = CONFIG_FILE_NAME): ProjectConfig {
  const config = emptyConfig();
  const lines = text.split(/\r?\n/);
  let pending: { key: string; text: string; line: number; depth: number } | undefined;

  for (let index = 0; index < lines.length; index++) {
    const lineNo = index + 1;
    const code = stripHashComment(lines[index] ?? '').trim();

    if (pending !== undefined) {
      const open = pending;
      open.text += ` ${code}`;
      open.depth += bracketDelta(code);
      if (open.depth > 0) continue;
      pending = undefined;
      const fail = (message: string): never => {
        throw new ConfigError(message, file, open.line);
      };
      applyKey(config, open.key, parseValue(open.text, fail), fail);
      continue;
    }

    if (code.length === 0 || /^\[[^\]]*\]$/.test(code)) continue;

    const fail = (message: string): never => {
      throw new ConfigError(message, file, lineNo);
    };
    const eq = code.indexOf('=');
    if (eq <= 0) fail(`expected key = value: ${code}`);
    const key = code.slice(0, eq).trim();
    if (!/^[A-Za-z0-9_.-]+$/.test(key)) fail(`invalid key "${key}"`);
    const valueText = code.slice(eq + 1).trim();
    if (valueText.length === 0) fail(`missing value for ${key}`);

    const depth = bracketDelta(valueText);
    if (valueText.startsWith('[') && depth > 0) {
      pending = { key, text: valueText, line: lineNo, depth };
      continue;
    }
    applyKey(config, key, parseValue(valueText, fail), fail);
  }

  if (pending !== undefined) {
    throw new ConfigError(`unterminated array for ${pending.key}`, file, pending.line);
  }
  return config;
}

export type ConfigLoadResult = { config: ProjectConfig; error?: undefined } | { config?: undefined; error: Diagnostic };

/**
 * Read and parse a config file. Failures come back as a diagnostic instead of an exception.
 */
export function loadConfigFile(path: string, fs: FileSystem): ConfigLoadResult {
  let text: string;
  try {
    text = fs.readText(path);
  } catch (err) {
    return {
      error: {
        id: DiagnosticIds.IoReadFailed,
        severity: 'error',
        message: `Failed to read config: ${formatError(err)}`,
        file: path,
      },
    };
  }
  try {
    return { config: parseConfig(text, path) };
  } catch (err) {
    if (err instanceof ConfigError) {
      return {
        error: {
          id: DiagnosticIds.ConfigError,
          severity: 'error',
          message: err.detail,
          file: path,
          line: err.line,
          column: 1,
        },
      };
    }
    throw err;
  }
}

/** `mx65.toml` inside `dir`, when it exists. */
export function findConfigFile(dir: string, fs: FileSystem): string | undefined {
  const candidate = join(dir, CONFIG_FILE_NAME);
  return fs.exists(candidate) ? candidate : undefined;
}

export function resolveConfigPath(configDir: string, path: string): string {
  return isAbsolute(path) ? path : resolve(configDir, path);
}

export function configDirOf(configPath: string): string {
  return dirname(configPath);
}

/**
 * Split `NAME=VALUE` define strings; a bare `NAME` gets an empty value.
 */
export function parseDefines(defines: readonly string[]): Array<[string, string]> {
  return defines
    .map((d): [string, string] => {
      const eq = d.indexOf('=');
      return eq < 0 ? [d.trim(), ''] : [d.slice(0, eq).trim(), d.slice(eq + 1).trim()];
    })
    .filter(([name]) => name.length > 0);
}
