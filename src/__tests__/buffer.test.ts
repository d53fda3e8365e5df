/**
 * Tests for temp file chunk buffers
 */

import { afterEach, describe, it, expect, beforeEach } from 'vitest';
import { existsSync, readFileSync } from 'fs';
import { basename, dirname, join } from 'path';
import { ChunkBuffer } from '../buffer';
import { IOFailure } from '../error';
import { listFiles, makeTmpDir, removeTmpDir } from './fixtures';

describe('ChunkBuffer', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTmpDir();
  });

  afterEach(() => {
    removeTmpDir(dir);
  });

  it('should create a prefixed temp file in the given directory', async () => {
    const chunk = await ChunkBuffer.open({ prefix: 'chunk-', dir });

    expect(dirname(chunk.path)).toBe(dir);
    expect(basename(chunk.path)).toMatch(/^chunk-[0-9a-f-]{36}\.tmp$/);
    expect(existsSync(chunk.path)).toBe(true);
    expect(chunk.isOpen).toBe(true);

    await chunk.discard();
  });

  it('should give each chunk its own file', async () => {
    const a = await ChunkBuffer.open({ prefix: 'chunk-', dir });
    const b = await ChunkBuffer.open({ prefix: 'chunk-', dir });

    expect(a.path).not.toBe(b.path);
    expect(listFiles(dir)).toHaveLength(2);

    await a.discard();
    await b.discard();
  });

  it('should append writes and report the on-disk size', async () => {
    const chunk = await ChunkBuffer.open({ prefix: 'chunk-', dir });
    expect(await chunk.size()).toBe(0);

    await chunk.write(Buffer.from('id,name\n'));
    await chunk.write(Buffer.from('1,a\n'));

    expect(await chunk.size()).toBe(12);
    await chunk.close();
    expect(readFileSync(chunk.path, 'utf-8')).toBe('id,name\n1,a\n');

    await chunk.discard();
  });

  it('should keep the file on close and still report its size', async () => {
    const chunk = await ChunkBuffer.open({ prefix: 'chunk-', dir });
    await chunk.write(Buffer.from('abc'));

    await chunk.close();
    await chunk.close();

    expect(chunk.isOpen).toBe(false);
    expect(existsSync(chunk.path)).toBe(true);
    expect(await chunk.size()).toBe(3);

    await chunk.discard();
  });

  it('should delete the file on discard, once', async () => {
    const chunk = await ChunkBuffer.open({ prefix: 'chunk-', dir });
    await chunk.write(Buffer.from('abc'));

    await chunk.discard();
    await chunk.discard();

    expect(existsSync(chunk.path)).toBe(false);
    expect(listFiles(dir)).toEqual([]);
    expect(await chunk.size()).toBe(0);
  });

  it('should reject writes after close', async () => {
    const chunk = await ChunkBuffer.open({ prefix: 'chunk-', dir });
    await chunk.close();

    await expect(chunk.write(Buffer.from('x'))).rejects.toBeInstanceOf(IOFailure);
    await expect(chunk.write(Buffer.from('x'))).rejects.toMatchObject({ code: 'IO.Write' });

    await chunk.discard();
  });

  it('should report a create failure for a missing directory', async () => {
    const missing = join(dir, 'missing');

    await expect(ChunkBuffer.open({ prefix: 'chunk-', dir: missing })).rejects.toMatchObject({
      name: 'IOFailure',
      code: 'IO.Create',
    });
  });
});
