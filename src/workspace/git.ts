import { execFileSync } from 'node:child_process';
import { join } from 'node:path';

import { normalizePath } from './paths.js';

/**
 * Git queries used to skip ignored files. Both return "nothing" when git is unavailable.
 */
export interface GitProbe {
  topLevel(dir: string): string | undefined;
  /** Ignored, untracked files as absolute paths. */
  ignoredFiles(gitRoot: string): string[];
}

function runGit(args: string[]): string | undefined {
  try {
    return execFileSync('git', args, {
      encoding: 'utf8',
      stdio: ['ignore', 'pipe', 'ignore'],
      maxBuffer: 64 * 1024 * 1024,
      windowsHide: true,
    });
  } catch {
    return undefined;
  }
}

export const nodeGitProbe: GitProbe = {
  topLevel(dir) {
    const out = runGit(['-C', dir, 'rev-parse', '--show-toplevel'])?.trim();
    return out ? normalizePath(out) : undefined;
  },
  ignoredFiles(gitRoot) {
    const out = runGit(['-C', gitRoot, 'ls-files', '-o', '-i', '--exclude-standard', '-z']);
    if (out === undefined) return [];
    return out
      .split('\0')
      .filter((p) => p.length > 0)
      .map((p) => normalizePath(join(gitRoot, p)));
  },
};

export const noGitProbe: GitProbe = {
  topLevel: () => undefined,
  ignoredFiles: () => [],
};
