import type { Location, Position, TextEdit, WorkspaceEdit } from 'vscode-languageserver/node.js';

import { formatError } from '../../logging.js';
import { normalizePath, pathToUri, REFERENCE_EXTENSIONS } from '../../workspace/paths.js';
import { isIgnoredPath, type DocumentState } from '../../workspace/state.js';
import { findWholeWord, splitLines, tokenAt } from '../../workspace/text.js';
import { listSourceFiles } from '../../workspace/workspace.js';
import { lineRange } from '../convert.js';
import type { FeatureContext } from './context.js';

export interface WordHit {
  uri: string;
  line: number;
  character: number;
}

function filesToScan(ctx: FeatureContext): string[] {
  const { workspace } = ctx;
  const files =
    workspace.root !== undefined
      ? listSourceFiles(workspace.root, ctx.fs, (p) => isIgnoredPath(workspace, p), ctx.logger, REFERENCE_EXTENSIONS)
      : [...ctx.documents.values()].map((d) => d.path);
  return [...new Set(files.map(normalizePath))].sort();
}

function textOf(path: string, ctx: FeatureContext): string | undefined {
  for (const doc of ctx.documents.values()) {
    if (doc.path === path) return doc.text;
  }
  try {
    return ctx.fs.readText(path);
  } catch (err) {
    ctx.logger.warn(`cannot read ${path}: ${formatError(err)}`);
    return undefined;
  }
}

/**
 * Every whole-word occurrence of `word` across the workspace's source files. Open documents are
 * read from memory.
 */
export function findWordInWorkspace(word: string, ctx: FeatureContext): WordHit[] {
  const hits: WordHit[] = [];
  for (const path of filesToScan(ctx)) {
    const text = textOf(path, ctx);
    if (text === undefined) continue;
    const uri = pathToUri(path);
    splitLines(text).forEach((line, index) => {
      for (const character of findWholeWord(line, word)) hits.push({ uri, line: index, character });
    });
  }
  return hits;
}

export function references(doc: DocumentState, position: Position, ctx: FeatureContext): Location[] {
  const token = tokenAt(doc.text, position.line, position.character);
  if (token.length === 0) return [];
  return findWordInWorkspace(token, ctx).map((hit) => ({
    uri: hit.uri,
    range: lineRange(hit.line, hit.character, token.length),
  }));
}

export function rename(
  doc: DocumentState,
  position: Position,
  newName: string,
  ctx: FeatureContext,
): WorkspaceEdit | null {
  if (newName.length === 0) return null;
  const token = tokenAt(doc.text, position.line, position.character);
  if (token.length === 0) return null;

  const changes: Record<string, TextEdit[]> = {};
  for (const hit of findWordInWorkspace(token, ctx)) {
    const edits = (changes[hit.uri] ??= []);
    edits.push({ range: lineRange(hit.line, hit.character, token.length), newText: newName });
  }
  return { changes };
}
