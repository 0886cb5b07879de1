import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FileCache, isMissingFile } from './fileCache.js';

describe('FileCache', () => {
  let baseDir: string;

  beforeEach(async () => {
    baseDir = await mkdtemp(path.join(os.tmpdir(), 'file-cache-'));
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it('returns null for entries that were never written', async () => {
    const cache = new FileCache({ baseDir });
    await expect(cache.read('reddit-info', 'abc')).resolves.toBeNull();
  });

  it('round-trips a body with its metadata', async () => {
    const cache = new FileCache({ baseDir });
    await cache.write('reddit-info', { checksum: 'abc', body: '{"ok":true}', metadata: { path: '/api/info' } });

    const entry = await cache.read('reddit-info', 'abc');
    expect(entry?.body).toBe('{"ok":true}');
    expect(entry?.metadata).toEqual({ path: '/api/info' });
    expect(entry?.checksum).toBe('abc');
    expect(typeof entry?.storedAt).toBe('string');
  });

  it('fails on corrupt metadata rather than returning a partial entry', async () => {
    const cache = new FileCache({ baseDir });
    await cache.write('ns', { checksum: 'abc', body: 'x' });
    await writeFile(path.join(baseDir, 'ns', 'abc.meta.json'), '{}', 'utf8');

    await expect(cache.read('ns', 'abc')).rejects.toThrow('Cache metadata is missing storedAt');
  });
});

describe('isMissingFile', () => {
  it('recognises ENOENT errors only', () => {
    expect(isMissingFile(Object.assign(new Error('nope'), { code: 'ENOENT' }))).toBe(true);
    expect(isMissingFile(Object.assign(new Error('nope'), { code: 'EACCES' }))).toBe(false);
    expect(isMissingFile('ENOENT')).toBe(false);
  });
});
