import { dirname, resolve } from 'node:path';

import type { Location, Position } from 'vscode-languageserver/node.js';

import { parseIncludeDirective } from '../../workspace/parse.js';
import { pathToUri, resolveIncludePath, uriToPath } from '../../workspace/paths.js';
import type { DocumentState } from '../../workspace/state.js';
import { splitLines, stripComment, tokenAt } from '../../workspace/text.js';
import { lineRange, symbolRange } from '../convert.js';
import type { FeatureContext } from './context.js';

function includeTarget(doc: DocumentState, position: Position, ctx: FeatureContext): Location | undefined {
  const line = splitLines(doc.text)[position.line];
  if (line === undefined) return undefined;
  const directive = parseIncludeDirective(stripComment(line).trim());
  if (directive === undefined || directive.kind !== 'include') return undefined;

  const start = line.indexOf(directive.path);
  if (start < 0 || position.character < start - 1 || position.character > start + directive.path.length + 1) {
    return undefined;
  }
  const baseDir = dirname(doc.path);
  const target = resolveIncludePath(directive.path, baseDir, ctx.includePaths, ctx.fs);
  return target === undefined ? undefined : { uri: pathToUri(target), range: lineRange(0, 0) };
}

function labelLocation(doc: DocumentState, name: string): Location | undefined {
  const label = doc.labelMap.get(name);
  if (label === undefined) return undefined;
  const rootDir = dirname(uriToPath(doc.analysisRoot ?? doc.uri));
  for (const entry of doc.sourceMap.entries) {
    if (entry.address !== label.address) continue;
    const file = doc.sourceMap.files.find((f) => f.id === entry.fileId);
    if (file === undefined) continue;
    return { uri: pathToUri(resolve(rootDir, file.path)), range: lineRange(Math.max(0, entry.line - 1), 0) };
  }
  return undefined;
}

function symbolLocation(doc: DocumentState, name: string, ctx: FeatureContext): Location | undefined {
  const bare = name.replace(/^!/, '');
  const own = doc.symbols.find((s) => s.name === bare);
  if (own !== undefined) return { uri: own.uri || doc.uri, range: symbolRange(own) };
  for (const [uri, symbols] of ctx.workspace.symbolIndex) {
    const found = symbols.find((s) => s.name === bare);
    if (found !== undefined) return { uri: found.uri || uri, range: symbolRange(found) };
  }
  return undefined;
}

/**
 * Go to definition: an include path opens the included file; a name resolves through the
 * assembler's labels and source map, then through the scanned symbols.
 */
export function definition(doc: DocumentState, position: Position, ctx: FeatureContext): Location[] | null {
  const include = includeTarget(doc, position, ctx);
  if (include !== undefined) return [include];

  const token = tokenAt(doc.text, position.line, position.character);
  if (token.length === 0) return null;
  const location = labelLocation(doc, token) ?? symbolLocation(doc, token, ctx);
  return location === undefined ? null : [location];
}
