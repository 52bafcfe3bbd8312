import { dirname } from 'node:path';

import type { FileSystem } from './fs.js';
import type { ParsedFile, SymbolEntry } from './parse.js';
import type { ParseCache } from './parse_cache.js';
import { normalizePath, pathToUri, resolveIncdirPath, resolveIncludePath } from './paths.js';
import type { ProjectGraph } from './project_graph.js';

export interface IncludeLimits {
  /** Files deeper than this are not expanded. */
  maxDepth: number;
  /** The walk stops once this many files have been visited. */
  maxVisited: number;
}

export const DEFAULT_INCLUDE_LIMITS: IncludeLimits = { maxDepth: 16, maxVisited: 128 };

export interface CollectRequest {
  parsed: ParsedFile;
  uri: string;
  /** Absolute path of the parsed file, seeded into the visited set. */
  path: string;
  baseDir: string;
  includePaths: readonly string[];
}

export interface CollectDeps {
  cache: ParseCache;
  graph: ProjectGraph;
  fs: FileSystem;
}

export interface CollectResult {
  symbols: SymbolEntry[];
  /** Set when a bound cut the walk short; the symbol list is then partial, not wrong. */
  truncated: boolean;
  visited: ReadonlySet<string>;
}

interface WorkItem {
  parsed: ParsedFile;
  uri: string;
  baseDir: string;
  includePaths: string[];
  depth: number;
}

/**
 * Gather a file's symbols plus those of everything it includes, depth first in source order.
 *
 * Each resolved `include` registers a graph edge (even when the child was already visited);
 * `incdir` only extends the search path for the events after it and for the children they load.
 */
export function collectSymbolsRecursive(
  request: CollectRequest,
  deps: CollectDeps,
  limits: IncludeLimits = DEFAULT_INCLUDE_LIMITS,
): CollectResult {
  const visited = new Set<string>([normalizePath(request.path)]);
  const symbols: SymbolEntry[] = [];
  let truncated = false;
  const stack: WorkItem[] = [
    {
      parsed: request.parsed,
      uri: request.uri,
      baseDir: request.baseDir,
      includePaths: [...request.includePaths],
      depth: 0,
    },
  ];

  for (let item = stack.pop(); item !== undefined; item = stack.pop()) {
    if (visited.size > limits.maxVisited) {
      truncated = true;
      break;
    }
    if (item.depth > limits.maxDepth) {
      truncated = true;
      continue;
    }
    const owner = item.uri;
    for (const symbol of item.parsed.symbols) {
      symbols.push(symbol.uri.length > 0 ? symbol : { ...symbol, uri: owner });
    }

    const includePaths = [...item.includePaths];
    const children: WorkItem[] = [];
    for (const event of item.parsed.events) {
      if (event.kind === 'incdir') {
        const dir = resolveIncdirPath(event.path, item.baseDir, deps.fs);
        if (dir !== undefined) includePaths.push(dir);
        continue;
      }
      const target = resolveIncludePath(event.path, item.baseDir, includePaths, deps.fs);
      if (target === undefined) continue;
      const childUri = pathToUri(target);
      deps.graph.registerDependency(owner, childUri);
      if (visited.has(target)) continue;
      visited.add(target);
      const child = deps.cache.loadAndCacheFromDisk(target);
      if (child === undefined) continue;
      children.push({
        parsed: child,
        uri: childUri,
        baseDir: dirname(target),
        includePaths: [...includePaths],
        depth: item.depth + 1,
      });
    }
    // Reverse so the first include is expanded first.
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child !== undefined) stack.push(child);
    }
  }

  return { symbols, truncated, visited };
}
