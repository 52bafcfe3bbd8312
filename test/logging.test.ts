import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import { FileLogger, formatError, StreamLogger } from '../src/logging.js';
import { CapturedStream } from './helpers/fake_assembler.js';

describe('logging', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir !== undefined) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('prefixes stream lines with the level', () => {
    const stream = new CapturedStream();
    const logger = new StreamLogger(stream);
    logger.info('ready');
    logger.warn('slow');
    logger.error('broken');
    expect(stream.text).toBe('mx65: info: ready\nmx65: warning: slow\nmx65: error: broken\n');
  });

  it('appends timestamped lines to a file', () => {
    dir = mkdtempSync(join(tmpdir(), 'mx65-log-'));
    const path = join(dir, 'lsp.log');
    const logger = new FileLogger(path, () => new Date(Date.UTC(2024, 0, 2, 3, 4, 5)));
    logger.info('started');
    logger.error('analysis failed');
    expect(readFileSync(path, 'utf8')).toBe(
      '[2024-01-02T03:04:05.000Z] info: started\n[2024-01-02T03:04:05.000Z] error: analysis failed\n',
    );
  });

  it('formats thrown values', () => {
    expect(formatError(new Error('boom'))).toBe('boom');
    expect(formatError('plain')).toBe('plain');
  });
});
