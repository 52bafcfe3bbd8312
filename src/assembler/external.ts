import { spawnSync } from 'node:child_process';

import type { ProjectConfig } from '../config/loader.js';
import { formatError, nullLogger, type Logger } from '../logging.js';
import { decodeAssembleResult, encodeRequest } from './bridge.js';
import { unavailableAssembleResult, type AssembleOptions, type AssembleResult, type Assembler } from './types.js';

const MAX_OUTPUT_BYTES = 512 * 1024 * 1024;

export interface ExternalAssemblerOptions {
  command: string;
  args?: string[];
  cwd?: string;
  /** Milliseconds before the child is killed. */
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Runs an assembler bridge command once per assemble: JSON request on stdin, JSON result on stdout.
 *
 * Spawn failures and malformed output are logged and reported as an unavailable result, so
 * callers keep their previous state.
 */
export class ExternalAssembler implements Assembler {
  private readonly logger: Logger;

  constructor(private readonly options: ExternalAssemblerOptions) {
    this.logger = options.logger ?? nullLogger;
  }

  assemble(options: AssembleOptions): AssembleResult {
    const { command, args = [], cwd, timeoutMs = 60_000 } = this.options;
    const child = spawnSync(command, args, {
      cwd,
      input: JSON.stringify(encodeRequest(options)),
      encoding: 'utf8',
      maxBuffer: MAX_OUTPUT_BYTES,
      timeout: timeoutMs,
      windowsHide: true,
    });

    if (child.error) {
      this.logger.error(`assembler "${command}" failed to run: ${formatError(child.error)}`);
      return unavailableAssembleResult();
    }
    const stdout = child.stdout.trim();
    if (stdout.length === 0) {
      const stderr = child.stderr.trim();
      this.logger.error(
        `assembler "${command}" produced no output (exit ${String(child.status)})${stderr ? `: ${stderr}` : ''}`,
      );
      return unavailableAssembleResult();
    }

    try {
      const parsed: unknown = JSON.parse(stdout);
      return decodeAssembleResult(parsed);
    } catch (err) {
      this.logger.error(`assembler "${command}" returned malformed output: ${formatError(err)}`);
      return unavailableAssembleResult();
    }
  }
}

/**
 * Stand-in when no assembler command is configured: every assemble is unavailable.
 */
export class UnavailableAssembler implements Assembler {
  private warned = false;

  constructor(private readonly logger: Logger = nullLogger) {}

  assemble(options: AssembleOptions): AssembleResult {
    if (!this.warned) {
      this.warned = true;
      this.logger.warn(`no assembler configured; skipping assembly of ${options.patchPath}`);
    }
    return unavailableAssembleResult();
  }
}

export function createAssembler(
  command: string | undefined,
  args: string[],
  cwd: string | undefined,
  logger: Logger,
): Assembler {
  if (command === undefined || command.length === 0) return new UnavailableAssembler(logger);
  return new ExternalAssembler({ command, args, ...(cwd !== undefined ? { cwd } : {}), logger });
}

/** Builds the assembler for a project; tests substitute an in-process one. */
export type AssemblerFactory = (
  config: ProjectConfig | undefined,
  configDir: string | undefined,
  logger: Logger,
) => Assembler;

export const defaultAssemblerFactory: AssemblerFactory = (config, configDir, logger) =>
  createAssembler(config?.assembler, config?.assemblerArgs ?? [], configDir, logger);
