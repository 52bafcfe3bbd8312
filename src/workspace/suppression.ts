import { dirname } from 'node:path';

import type { Diagnostic } from '../diagnostics/types.js';
import type { FileSystem } from './fs.js';
import { parseIncludeDirective } from './parse.js';
import { normalizePath, resolveIncdirPath, resolveIncludePath } from './paths.js';
import { splitLines, stripComment } from './text.js';

/**
 * Best-effort rules for dropping assembler diagnostics that only arise because a file is being
 * assembled without the context its includers provide.
 */
export interface SuppressionRules {
  /**
   * Naming-convention prefixes: `Foo` also matches a known `<prefix>Foo`, and `<prefix>Foo`
   * matches a known `Foo`.
   */
  labelPrefixes: readonly string[];
  /** Match the text after the first `_` of a missing label against known names. */
  matchAfterFirstUnderscore: boolean;
  /** Drop "missing org" errors for files included after an org in some parent. */
  missingOrg: boolean;
}

export const defaultSuppressionRules: SuppressionRules = {
  labelPrefixes: [],
  matchAfterFirstUnderscore: true,
  missingOrg: true,
};

const MISSING_ORG_TEXT = 'Missing org or freespace command';

export function isMissingLabelMessage(message: string): boolean {
  return message.includes('Label') && message.includes("wasn't found");
}

export function isMissingOrgMessage(message: string): boolean {
  return message.includes(MISSING_ORG_TEXT);
}

/**
 * Label name from `Label 'Foo' wasn't found` (or the unquoted `Label Foo ...` form).
 */
export function extractMissingLabel(message: string): string | undefined {
  const quoted = /Label '([^']*)'/.exec(message);
  if (quoted?.[1]) return quoted[1];
  const bare = /Label (\S+)/.exec(message);
  return bare?.[1] || undefined;
}

/** Names a missing label could correspond to under the configured conventions. */
export function labelAliases(name: string, rules: SuppressionRules): string[] {
  const aliases = [name];
  for (const prefix of rules.labelPrefixes) {
    if (prefix.length === 0) continue;
    aliases.push(name.startsWith(prefix) ? name.slice(prefix.length) : `${prefix}${name}`);
  }
  if (rules.matchAfterFirstUnderscore) {
    const underscore = name.indexOf('_');
    if (underscore >= 0 && underscore + 1 < name.length) aliases.push(name.slice(underscore + 1));
  }
  return aliases.filter((alias) => alias.length > 0);
}

export function shouldSuppressMissingLabel(
  diagnostic: Diagnostic,
  knownSymbols: ReadonlySet<string>,
  rules: SuppressionRules,
): boolean {
  if (!isMissingLabelMessage(diagnostic.message)) return false;
  const missing = extractMissingLabel(diagnostic.message);
  if (missing === undefined) return false;
  return labelAliases(missing, rules).some((alias) => knownSymbols.has(alias));
}

function isDirective(code: string, keywords: readonly string[]): boolean {
  const lower = code.toLowerCase();
  return keywords.some((keyword) => {
    if (!lower.startsWith(keyword)) return false;
    const next = lower[keyword.length];
    return next === undefined || next === ' ' || next === '\t' || next === '(';
  });
}

export function isOrgDirective(code: string): boolean {
  return isDirective(code, ['org', 'freespace', 'freecode', 'freedata']);
}

export function isPushPc(code: string): boolean {
  return isDirective(code, ['pushpc']);
}

export function isPullPc(code: string): boolean {
  return isDirective(code, ['pullpc']);
}

export function documentHasOrg(text: string): boolean {
  return splitLines(text).some((line) => isOrgDirective(stripComment(line).trim()));
}

/**
 * Whether `parentText` includes `childPath` at a point where an org/freespace context is active.
 *
 * `pushpc`/`pullpc` save and restore the context; `incdir` extends the search path.
 */
export function parentIncludesChildAfterOrg(
  parentPath: string,
  parentText: string,
  childPath: string,
  includePaths: readonly string[],
  fs: FileSystem,
): boolean {
  const baseDir = dirname(parentPath);
  const paths = [...includePaths];
  const child = normalizePath(childPath);
  const saved: boolean[] = [];
  let orgActive = false;

  for (const raw of splitLines(parentText)) {
    const code = stripComment(raw).trim();
    if (code.length === 0) continue;
    const include = parseIncludeDirective(code);
    if (include?.kind === 'incdir') {
      const dir = resolveIncdirPath(include.path, baseDir, fs);
      if (dir !== undefined) paths.push(dir);
      continue;
    }
    if (include?.kind === 'include') {
      if (resolveIncludePath(include.path, baseDir, paths, fs) === child) return orgActive;
      continue;
    }
    if (isPushPc(code)) {
      saved.push(orgActive);
    } else if (isPullPc(code)) {
      orgActive = saved.pop() ?? orgActive;
    } else if (isOrgDirective(code)) {
      orgActive = true;
    }
  }
  return false;
}
