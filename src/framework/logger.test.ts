import { readFile } from 'fs/promises';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { makeTempDir, removeTempDir } from '../test-utils.js';
import { Logger, attachFileSink, createModuleLogger } from './logger.js';
import type { LogEntry } from './logger.js';

describe('Logger', () => {
  const entries: LogEntry[] = [];
  let detach: () => void = () => {};

  beforeEach(() => {
    entries.length = 0;
    Logger.setConsoleOutput(false);
    Logger.setGlobalLevel('info');
    detach = Logger.addListener(entry => entries.push(entry));
  });

  afterEach(() => {
    detach();
    Logger.setConsoleOutput(true);
    Logger.setGlobalLevel('info');
  });

  it('delivers structured entries to listeners', () => {
    createModuleLogger('batch').info({ index: 3 }, 'Processing');
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ level: 'info', module: 'batch', message: 'Processing', context: { index: 3 } });
  });

  it('accepts a bare message', () => {
    createModuleLogger('cli').warn('careful');
    expect(entries[0]).toMatchObject({ level: 'warn', message: 'careful', context: {} });
  });

  it('drops entries below the global level', () => {
    const log = createModuleLogger('batch');
    log.debug('hidden');
    Logger.setGlobalLevel('debug');
    log.debug('shown');
    expect(entries.map(e => e.message)).toEqual(['shown']);
  });

  it('silences everything at silent', () => {
    Logger.setGlobalLevel('silent');
    createModuleLogger('batch').error('nothing');
    expect(entries).toEqual([]);
  });

  it('prefixes child modules', () => {
    createModuleLogger('engine').child('command').info('ready');
    expect(entries[0].module).toBe('engine:command');
  });

  it('serializes errors in context', () => {
    createModuleLogger('batch').error({ error: new TypeError('bad value') }, 'failed');
    expect(entries[0].context).toEqual({ error: { name: 'TypeError', message: 'bad value' } });
  });
});

describe('attachFileSink', () => {
  let dir = '';

  beforeEach(async () => {
    dir = await makeTempDir();
    Logger.setConsoleOutput(false);
  });

  afterEach(async () => {
    Logger.setConsoleOutput(true);
    await removeTempDir(dir);
  });

  it('appends one line per entry', async () => {
    const path = join(dir, 'run.log');
    const close = attachFileSink(path);
    createModuleLogger('batch').info({ index: 1 }, 'Saved model');
    createModuleLogger('batch').warn('Below target');
    await close();

    const lines = (await readFile(path, 'utf-8')).trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z - INFO - \[batch\] Saved model \{"index":1\}$/);
    expect(lines[1]).toMatch(/ - WARN - \[batch\] Below target$/);
  });

  it('stops writing once closed', async () => {
    const path = join(dir, 'run.log');
    const close = attachFileSink(path);
    createModuleLogger('batch').info('first');
    await close();
    createModuleLogger('batch').info('second');

    expect(await readFile(path, 'utf-8')).not.toContain('second');
  });
});
