import { isAbsolute, resolve } from 'node:path';

import type { Diagnostic } from '../diagnostics/types.js';
import { endsWithPath, normalizePath } from './paths.js';

export interface MatchContext {
  /** Absolute path of the document diagnostics are being filtered for. */
  documentPath: string;
  /** Directory of the file handed to the assembler. */
  analysisRootDir: string;
  workspaceRoot?: string;
  /** Whether the document is itself the analysis root. */
  isRoot: boolean;
}

/**
 * `true`/`false` settles the match; `undefined` defers to the next strategy.
 */
export type MatchVerdict = boolean | undefined;

export interface DocumentMatcher {
  name: string;
  match(reported: string, ctx: MatchContext): MatchVerdict;
}

function samePath(a: string, b: string): boolean {
  return normalizePath(a) === normalizePath(b);
}

/**
 * Ordered strategies for deciding whether an assembler-reported filename names the document.
 *
 * The assembler reports paths inconsistently (absolute, relative to the entry file, relative to
 * the working directory, or bare file names), so each form gets a strategy; the first verdict wins.
 */
export const DOCUMENT_MATCHERS: readonly DocumentMatcher[] = [
  {
    name: 'absolute',
    match: (reported, ctx) => (isAbsolute(reported) ? samePath(reported, ctx.documentPath) : undefined),
  },
  {
    name: 'analysis-root-relative',
    match: (reported, ctx) => (samePath(resolve(ctx.analysisRootDir, reported), ctx.documentPath) ? true : undefined),
  },
  {
    name: 'workspace-relative',
    match: (reported, ctx) =>
      ctx.workspaceRoot !== undefined && samePath(resolve(ctx.workspaceRoot, reported), ctx.documentPath)
        ? true
        : undefined,
  },
  {
    name: 'suffix',
    match: (reported, ctx) => endsWithPath(ctx.documentPath, reported),
  },
];

export function pathMatchesDocument(
  reported: string,
  ctx: MatchContext,
  matchers: readonly DocumentMatcher[] = DOCUMENT_MATCHERS,
): boolean {
  for (const matcher of matchers) {
    const verdict = matcher.match(reported, ctx);
    if (verdict !== undefined) return verdict;
  }
  return false;
}

/**
 * A diagnostic without a filename belongs to the analysis root only.
 */
export function diagnosticAppliesTo(diagnostic: Diagnostic, ctx: MatchContext): boolean {
  if (diagnostic.file === undefined || diagnostic.file.length === 0) return ctx.isRoot;
  return pathMatchesDocument(diagnostic.file, ctx);
}

export function filterDiagnostics(diagnostics: readonly Diagnostic[], ctx: MatchContext): Diagnostic[] {
  return diagnostics.filter((d) => diagnosticAppliesTo(d, ctx));
}
