/**
 * Line-level text helpers shared by the parser and the language features.
 */

/**
 * Remove a `;` comment, ignoring semicolons inside single or double quotes (with `\` escapes).
 */
export function stripComment(line: string): string {
  let quote: '"' | "'" | undefined;
  let escaped = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quote !== undefined) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === quote) {
        quote = undefined;
      }
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      continue;
    }
    if (ch === ';') return line.slice(0, i);
  }
  return line;
}

/** The comment text after the first unquoted `;`, or `undefined` when there is none. */
export function commentOf(line: string): string | undefined {
  const code = stripComment(line);
  return code.length === line.length ? undefined : line.slice(code.length + 1);
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

export function isSymbolChar(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z0-9_.!@]/.test(ch);
}

export function isIdentifierChar(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z0-9_.]/.test(ch);
}

/**
 * Whether `line` starts with `keyword` (case-insensitive) followed by whitespace or end of line.
 */
export function startsWithKeyword(line: string, keyword: string): boolean {
  if (line.length < keyword.length) return false;
  if (line.slice(0, keyword.length).toLowerCase() !== keyword) return false;
  const next = line[keyword.length];
  return next === undefined || next === ' ' || next === '\t';
}

/** Text after the leading keyword, trimmed. */
export function afterKeyword(line: string, keyword: string): string {
  return line.slice(keyword.length).trim();
}

/** First whitespace-delimited token, or `''`. */
export function firstToken(text: string): string {
  const match = /^\S+/.exec(text.trimStart());
  return match ? match[0] : '';
}

/**
 * The symbol under a 0-based `(line, character)` position, using {@link isSymbolChar}.
 */
export function tokenAt(text: string, line: number, character: number): string {
  const source = splitLines(text)[line];
  if (source === undefined) return '';
  let pos = Math.min(character, source.length);
  if (!isSymbolChar(source[pos]) && pos > 0 && isSymbolChar(source[pos - 1])) pos -= 1;
  if (!isSymbolChar(source[pos])) return '';
  let start = pos;
  let end = pos;
  while (start > 0 && isSymbolChar(source[start - 1])) start--;
  while (end < source.length && isSymbolChar(source[end])) end++;
  return source.slice(start, end);
}

/** The symbol characters immediately before a 0-based position (the completion prefix). */
export function tokenPrefixAt(text: string, line: number, character: number): string {
  const source = splitLines(text)[line];
  if (source === undefined) return '';
  const end = Math.min(character, source.length);
  let start = end;
  while (start > 0 && isSymbolChar(source[start - 1])) start--;
  return source.slice(start, end);
}

/**
 * Split on commas that are not nested inside parentheses, brackets or quotes.
 */
export function splitTopLevel(text: string, separator = ','): string[] {
  const parts: string[] = [];
  let depth = 0;
  let quote: string | undefined;
  let current = '';
  for (const ch of text) {
    if (quote !== undefined) {
      current += ch;
      if (ch === quote) quote = undefined;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
    } else if (ch === '(' || ch === '[' || ch === '{') {
      depth++;
    } else if ((ch === ')' || ch === ']' || ch === '}') && depth > 0) {
      depth--;
    } else if (ch === separator && depth === 0) {
      parts.push(current);
      current = '';
      continue;
    }
    current += ch;
  }
  parts.push(current);
  return parts;
}

/**
 * 0-based columns where `word` occurs in `line` as a whole symbol (not inside a longer name).
 */
export function findWholeWord(line: string, word: string): number[] {
  if (word.length === 0) return [];
  const hits: number[] = [];
  let from = 0;
  for (;;) {
    const at = line.indexOf(word, from);
    if (at < 0) return hits;
    if (!isSymbolChar(line[at - 1]) && !isSymbolChar(line[at + word.length])) hits.push(at);
    from = at + word.length;
  }
}
