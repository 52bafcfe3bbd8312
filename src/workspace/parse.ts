import {
  afterKeyword,
  firstToken,
  splitLines,
  splitTopLevel,
  startsWithKeyword,
  stripComment,
} from './text.js';

export type SymbolKind = 'label' | 'macro' | 'define' | 'struct' | 'struct-field' | 'data';

/**
 * A symbol found by the best-effort text scan.
 *
 * `line` and `column` are 0-based so they map directly onto protocol positions.
 */
export interface SymbolEntry {
  /** Namespace-qualified name. */
  name: string;
  kind: SymbolKind;
  line: number;
  column: number;
  /** Trimmed source line that declared the symbol. */
  detail: string;
  /** Owning document URI; empty for text parsed without one. */
  uri: string;
  /** Macro parameter names, in order. */
  parameters?: string[];
}

export type IncludeKind = 'include' | 'incdir';

export interface IncludeEvent {
  kind: IncludeKind;
  path: string;
  /** 0-based line of the directive. */
  line: number;
}

export interface ParsedFile {
  symbols: SymbolEntry[];
  events: IncludeEvent[];
}

const INCLUDE_KEYWORDS: ReadonlyArray<[keyword: string, kind: IncludeKind]> = [
  ['incdir', 'incdir'],
  ['incsrc', 'include'],
  ['include', 'include'],
];

const NAME_RE = /^[A-Za-z_.@][A-Za-z0-9_.@]*$/;
const DEFINE_BANG_RE = /^!([A-Za-z0-9_.]+)/;
const ASSIGN_RE = /^([A-Za-z0-9_.]+)\s*=(?!=)/;
const DATA_RE = /^([A-Za-z_.][A-Za-z0-9_.]*)\s+(db|dw|dl|dd)\b/i;

/**
 * Recognize an `incdir` / `incsrc` / `include` directive in comment-stripped, trimmed code.
 *
 * The path is the quoted text when quoted, otherwise the first whitespace-delimited token.
 */
export function parseIncludeDirective(code: string): { kind: IncludeKind; path: string } | undefined {
  for (const [keyword, kind] of INCLUDE_KEYWORDS) {
    if (!startsWithKeyword(code, keyword)) continue;
    const rest = afterKeyword(code, keyword);
    let path: string;
    if (rest.startsWith('"')) {
      const close = rest.indexOf('"', 1);
      path = close < 0 ? rest.slice(1) : rest.slice(1, close);
    } else {
      path = firstToken(rest);
    }
    return path.length > 0 ? { kind, path } : undefined;
  }
  return undefined;
}

/**
 * Parse macro header text `NAME(p1, p2)` (after the `macro` keyword).
 */
export function parseMacroHeader(text: string): { name: string; parameters: string[] } | undefined {
  const open = text.indexOf('(');
  const head = (open < 0 ? text : text.slice(0, open)).trim();
  const name = firstToken(head);
  if (!NAME_RE.test(name)) return undefined;
  if (open < 0) return { name, parameters: [] };
  const close = text.lastIndexOf(')');
  const inner = text.slice(open + 1, close > open ? close : text.length);
  const parameters = splitTopLevel(inner)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
  return { name, parameters };
}

class ScopeStack {
  private readonly names: string[] = [];

  push(name: string): void {
    this.names.push(name);
  }

  pop(): void {
    this.names.pop();
  }

  clear(): void {
    this.names.length = 0;
  }

  qualify(name: string): string {
    if (this.names.length === 0 || name.startsWith('.')) return name;
    return `${this.names.join('_')}_${name}`;
  }
}

/**
 * Best-effort symbol and include scan of one file's text. Pure; never touches the filesystem.
 *
 * At most one symbol is recorded per line. Include/incdir lines only produce events.
 */
export function parseText(text: string, uri = ''): ParsedFile {
  const symbols: SymbolEntry[] = [];
  const events: IncludeEvent[] = [];
  const scope = new ScopeStack();
  let structName: string | undefined;

  const lines = splitLines(text);
  lines.forEach((raw, line) => {
    const code = stripComment(raw).trim();
    if (code.length === 0) return;

    const add = (name: string, written: string, kind: SymbolKind, parameters?: string[]): void => {
      const column = Math.max(0, raw.indexOf(written));
      const entry: SymbolEntry = { name, kind, line, column, detail: code, uri };
      if (parameters !== undefined) entry.parameters = parameters;
      symbols.push(entry);
    };

    const include = parseIncludeDirective(code);
    if (include) {
      events.push({ ...include, line });
      return;
    }

    if (startsWithKeyword(code, 'namespace')) {
      const arg = firstToken(afterKeyword(code, 'namespace'));
      if (arg.toLowerCase() === 'off') {
        scope.clear();
      } else if (arg.length > 0 && arg.toLowerCase() !== 'nested') {
        scope.push(arg);
      }
      return;
    }
    if (startsWithKeyword(code, 'pushns')) {
      const arg = firstToken(afterKeyword(code, 'pushns'));
      if (arg.length > 0) scope.push(arg);
      return;
    }
    if (startsWithKeyword(code, 'popns')) {
      scope.pop();
      return;
    }

    if (startsWithKeyword(code, 'endstruct')) {
      structName = undefined;
      return;
    }
    if (startsWithKeyword(code, 'struct')) {
      const written = afterKeyword(code, 'struct').split(/[\s{]/)[0] ?? '';
      if (!NAME_RE.test(written)) return;
      structName = scope.qualify(written);
      add(structName, written, 'struct');
      return;
    }
    if (structName !== undefined) {
      const token = firstToken(code);
      if (token.startsWith('.') && token.endsWith(':') && token.length > 2) {
        const field = token.slice(1, -1);
        add(`${structName}.${field}`, field, 'struct-field');
        return;
      }
    }

    if (startsWithKeyword(code, 'macro')) {
      const header = parseMacroHeader(afterKeyword(code, 'macro'));
      if (header) add(scope.qualify(header.name), header.name, 'macro', header.parameters);
      return;
    }

    const bang = DEFINE_BANG_RE.exec(code);
    if (bang?.[1] !== undefined) {
      add(bang[1], bang[1], 'define');
      return;
    }
    if (startsWithKeyword(code, 'define')) {
      const written = firstToken(afterKeyword(code, 'define')).replace(/^!/, '');
      if (written.length > 0) add(scope.qualify(written), written, 'define');
      return;
    }
    const assign = ASSIGN_RE.exec(code);
    if (assign?.[1] !== undefined) {
      add(scope.qualify(assign[1]), assign[1], 'define');
      return;
    }

    const data = DATA_RE.exec(code);
    if (data?.[1] !== undefined) {
      add(scope.qualify(data[1]), data[1], 'data');
      return;
    }

    const token = firstToken(code);
    if (token.length > 1 && token.endsWith(':')) {
      const written = token.slice(0, -1);
      if (NAME_RE.test(written)) add(scope.qualify(written), written, 'label');
    }
  });

  return { symbols, events };
}
