import { dirname, join } from 'node:path';

import {
  CONFIG_FILE_NAME,
  findConfigFile,
  loadConfigFile,
  resolveConfigPath,
  type ProjectConfig,
} from '../config/loader.js';
import { formatError, nullLogger, type Logger } from '../logging.js';
import { nodeFileSystem, type DirectoryEntry, type FileSystem } from './fs.js';
import { nodeGitProbe, type GitProbe } from './git.js';
import { ParseCache, RomCache } from './parse_cache.js';
import {
  hasExtension,
  isMainFileName,
  normalizePath,
  pathToUri,
  resolveIncdirPath,
  resolveIncludePath,
  SOURCE_EXTENSIONS,
  uriToPath,
} from './paths.js';
import { ProjectGraph } from './project_graph.js';
import { emptyWorkspaceState, isIgnoredPath, type WorkspaceState } from './state.js';

/**
 * Long-lived structures shared by workspace build and per-document analysis.
 */
export interface WorkspaceServices {
  fs: FileSystem;
  logger: Logger;
  graph: ProjectGraph;
  parseCache: ParseCache;
  romCache: RomCache;
}

export function createServices(fs: FileSystem = nodeFileSystem, logger: Logger = nullLogger): WorkspaceServices {
  return {
    fs,
    logger,
    graph: new ProjectGraph(),
    parseCache: new ParseCache(fs, logger),
    romCache: new RomCache(fs, logger),
  };
}

/** The subset of `initialize` params the workspace build reads. */
export interface WorkspaceInit {
  rootUri?: string | null;
  rootPath?: string | null;
  workspaceFolders?: ReadonlyArray<{ uri: string }> | null;
}

/**
 * `rootUri`, then `rootPath`, then the first workspace folder holding `mx65.toml`, then the first
 * workspace folder.
 */
export function selectWorkspaceRoot(init: WorkspaceInit, fs: FileSystem): string | undefined {
  if (init.rootUri) return normalizePath(uriToPath(init.rootUri));
  if (init.rootPath) return normalizePath(init.rootPath);
  const folders = (init.workspaceFolders ?? []).map((f) => normalizePath(uriToPath(f.uri)));
  return folders.find((dir) => fs.exists(join(dir, CONFIG_FILE_NAME))) ?? folders[0];
}

/** Config include paths resolved against the config directory. */
export function configIncludePaths(config: ProjectConfig | undefined, configDir: string | undefined): string[] {
  if (config === undefined || configDir === undefined) return [];
  return config.includePaths.map((p) => resolveConfigPath(configDir, p));
}

/**
 * All files under `root` with one of `extensions`, sorted, skipping `.git`, `node_modules` and
 * paths rejected by `skip`.
 */
export function listSourceFiles(
  root: string,
  fs: FileSystem,
  skip: (path: string) => boolean,
  logger: Logger = nullLogger,
  extensions: readonly string[] = SOURCE_EXTENSIONS,
): string[] {
  const out: string[] = [];
  const pending = [root];
  for (let dir = pending.pop(); dir !== undefined; dir = pending.pop()) {
    let entries: DirectoryEntry[];
    try {
      entries = fs.list(dir);
    } catch (err) {
      logger.warn(`cannot list ${dir}: ${formatError(err)}`);
      continue;
    }
    for (const entry of entries) {
      const path = join(dir, entry.name);
      if (entry.isDirectory) {
        if (entry.name !== '.git' && entry.name !== 'node_modules') pending.push(path);
      } else if (entry.isFile && hasExtension(path, extensions) && !skip(path)) {
        out.push(path);
      }
    }
  }
  return out.sort();
}

/**
 * Build the project-wide state: config, git-ignore set, main candidates and a symbol index of
 * every source file under the root. Include edges found on the way go into `services.graph`.
 */
export function buildWorkspaceState(
  init: WorkspaceInit,
  services: WorkspaceServices,
  git: GitProbe = nodeGitProbe,
): WorkspaceState {
  const { fs, logger } = services;
  const root = selectWorkspaceRoot(init, fs);
  const workspace = emptyWorkspaceState(root);
  if (root === undefined) return workspace;

  const configPath = findConfigFile(root, fs);
  if (configPath !== undefined) {
    const loaded = loadConfigFile(configPath, fs);
    if (loaded.config !== undefined) {
      workspace.config = loaded.config;
      workspace.configDir = dirname(configPath);
    } else {
      logger.error(`${configPath}: ${loaded.error.message}`);
    }
  }

  const gitRoot = git.topLevel(root);
  if (gitRoot !== undefined) {
    workspace.gitRoot = gitRoot;
    for (const path of git.ignoredFiles(gitRoot)) workspace.ignoredPaths.add(path);
  }

  const configDir = workspace.configDir ?? root;
  for (const main of workspace.config?.mainFiles ?? []) {
    workspace.mainCandidates.add(pathToUri(resolveConfigPath(configDir, main)));
  }
  if (workspace.mainCandidates.size === 0) {
    try {
      for (const entry of fs.list(root)) {
        const path = join(root, entry.name);
        if (entry.isFile && hasExtension(path, SOURCE_EXTENSIONS) && isMainFileName(path)) {
          workspace.mainCandidates.add(pathToUri(path));
        }
      }
    } catch (err) {
      logger.warn(`cannot list ${root}: ${formatError(err)}`);
    }
  }
  const seeded = workspace.mainCandidates.size > 0;

  const includePaths = configIncludePaths(workspace.config, workspace.configDir);
  const files = listSourceFiles(root, fs, (path) => isIgnoredPath(workspace, path), logger);
  for (const path of files) {
    const parsed = services.parseCache.loadAndCacheFromDisk(path);
    if (parsed === undefined) continue;
    const uri = pathToUri(path);
    workspace.symbolIndex.set(uri, parsed.symbols);
    for (const symbol of parsed.symbols) workspace.symbolNames.add(symbol.name);
    if (!seeded && isMainFileName(path)) workspace.mainCandidates.add(uri);

    const baseDir = dirname(path);
    const searchPaths = [...includePaths];
    for (const event of parsed.events) {
      if (event.kind === 'incdir') {
        const dir = resolveIncdirPath(event.path, baseDir, fs);
        if (dir !== undefined) searchPaths.push(dir);
        continue;
      }
      const target = resolveIncludePath(event.path, baseDir, searchPaths, fs);
      if (target !== undefined) services.graph.registerDependency(uri, pathToUri(target));
    }
  }

  logger.info(
    `workspace ${root}: ${files.length} source files, ${workspace.symbolNames.size} symbols, ${workspace.mainCandidates.size} main candidates`,
  );
  return workspace;
}
