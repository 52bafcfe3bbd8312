import { appendFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

export type LogLevel = 'info' | 'warn' | 'error';

/**
 * Best-effort diagnostic log sink. Logging never throws into the caller.
 */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const nullLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function defaultLogPath(): string {
  return join(tmpdir(), 'mx65-lsp.log');
}

export function formatError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Appends timestamped lines to a file. After the first failed write the sink disables itself and
 * reports the failure once on stderr (stdout belongs to the protocol stream).
 */
export class FileLogger implements Logger {
  private disabled = false;

  constructor(
    readonly path: string = defaultLogPath(),
    private readonly now: () => Date = () => new Date(),
  ) {}

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  private write(level: LogLevel, message: string): void {
    if (this.disabled) return;
    try {
      appendFileSync(this.path, `[${this.now().toISOString()}] ${level}: ${message}\n`, 'utf8');
    } catch (err) {
      this.disabled = true;
      process.stderr.write(`mx65: log file ${this.path} disabled: ${formatError(err)}\n`);
    }
  }
}

/** Collects log lines in memory. */
export class MemoryLogger implements Logger {
  readonly lines: Array<{ level: LogLevel; message: string }> = [];

  info(message: string): void {
    this.lines.push({ level: 'info', message });
  }

  warn(message: string): void {
    this.lines.push({ level: 'warn', message });
  }

  error(message: string): void {
    this.lines.push({ level: 'error', message });
  }
}

/** Prefixed lines on a writable stream; the CLI logs to stderr. */
export class StreamLogger implements Logger {
  constructor(private readonly stream: { write(chunk: string): unknown }) {}

  info(message: string): void {
    this.stream.write(`mx65: info: ${message}\n`);
  }

  warn(message: string): void {
    this.stream.write(`mx65: warning: ${message}\n`);
  }

  error(message: string): void {
    this.stream.write(`mx65: error: ${message}\n`);
  }
}
