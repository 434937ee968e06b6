import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import * as fs from 'fs';
import { readFile, readdir } from 'fs/promises';
import { join } from 'path';
import { Logger } from '../logger.js';

vi.mock('fs', async (importOriginal) => {
  const actual = await importOriginal<typeof import('fs')>();
  return { ...actual, createWriteStream: vi.fn(actual.createWriteStream) };
});
import { makeTempDir, removeDir } from '../../__tests__/helpers.js';

describe('Logger', () => {
  let logDir: string;
  let verbose: boolean;

  beforeEach(async () => {
    logDir = await makeTempDir('logger-test-');
    verbose = false;
  });

  afterEach(async () => {
    await removeDir(logDir);
  });

  async function logLines(): Promise<string[]> {
    const [file] = await readdir(logDir);
    const content = await readFile(join(logDir, file), 'utf-8');
    return content.split('\n').filter(Boolean);
  }

  it('writes levelled lines to a dated file', async () => {
    const logger = new Logger({ isVerbose: () => verbose }, logDir, false);

    logger.info('server started');
    logger.warn('slow agent');
    await logger.close();

    expect(await readdir(logDir)).toEqual([`orchestrator-${new Date().toISOString().split('T')[0]}.log`]);
    const lines = await logLines();
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] INFO: server started$/);
    expect(lines[1]).toMatch(/\] WARN: slow agent$/);
  });

  it('only writes verbose lines while verbosity is on', async () => {
    const logger = new Logger({ isVerbose: () => verbose }, logDir, false);

    logger.verbose('hidden');
    verbose = true;
    logger.verbose('shown');
    await logger.close();

    const lines = await logLines();
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/\] VERBOSE: shown$/);
  });

  it('appends error details', async () => {
    const logger = new Logger({ isVerbose: () => verbose }, logDir, false);

    logger.error('launch failed', new Error('spawn ENOENT'));
    await logger.close();

    const content = (await logLines()).join('\n');
    expect(content).toContain('ERROR: launch failed Error: spawn ENOENT');
  });

  it('rotates the file once it reaches the size limit', async () => {
    const logger = new Logger({ isVerbose: () => verbose }, logDir, false, 120);

    for (let i = 0; i < 4; i++) {
      logger.info(`line number ${i}`);
    }
    await logger.close();

    const files = await readdir(logDir);
    expect(files.length).toBeGreaterThan(1);
    expect(files.every(file => file.startsWith('orchestrator-') && file.endsWith('.log'))).toBe(true);
  });

  it('keeps running when the log file fails after a rotation', async () => {
    const logger = new Logger({ isVerbose: () => verbose }, logDir, false, 120);
    const actual = await vi.importActual<typeof import('fs')>('fs');
    const failing = actual.createWriteStream(join(logDir, 'missing', 'orchestrator.log'), { flags: 'a' });
    vi.mocked(fs.createWriteStream).mockImplementationOnce(() => failing);

    logger.info('first line that fills the file');
    logger.info('second line forces a rotation');
    await new Promise<void>(resolve => failing.once('close', resolve));

    expect(() => logger.info('still logging')).not.toThrow();
    await expect(logger.close()).resolves.toBeUndefined();
    const [rotated] = await readdir(logDir);
    await vi.waitFor(async () => {
      expect(await readFile(join(logDir, rotated), 'utf-8')).toContain('INFO: first line that fills the file');
    });
  });

  it('works without a file sink', async () => {
    const logger = new Logger({ isVerbose: () => verbose }, null, false);

    logger.info('console only');

    await expect(logger.close()).resolves.toBeUndefined();
  });
});
