import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { access, mkdir, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { LocalObjectStore } from './LocalObjectStore.js';
import { LocalIOError, ValidationError } from '../utils/errorHandler.js';

const OID = 'abcdef0123456789';

describe('LocalObjectStore', () => {
  let root: string;
  let store: LocalObjectStore;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'lfs-objects-'));
    store = new LocalObjectStore(root);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function shardDirectory(): Promise<string> {
    const directory = path.join(root, 'ab', 'cd');
    await mkdir(directory, { recursive: true });
    return directory;
  }

  it('should lay objects out in two levels of shard directories', () => {
    expect(store.pathFor(OID)).toBe(path.join(root, 'ab', 'cd', OID));
  });

  it('should refuse object ids that are not hexadecimal', () => {
    expect(() => store.pathFor('ab/../../etc')).toThrow(ValidationError);
  });

  it('should write chunks at their offsets and commit the file', async () => {
    await shardDirectory();
    const file = await store.create(OID);

    expect(await file.writeAt(Buffer.from('world'), 6)).toBe(5);
    expect(await file.writeAt(Buffer.from('hello '), 0)).toBe(6);
    await file.commit();

    expect(file.path).toBe(path.join(root, 'ab', 'cd', OID));
    expect(await readFile(file.path, 'utf8')).toBe('hello world');
  });

  it('should truncate a previous partial download', async () => {
    const directory = await shardDirectory();
    await writeFile(path.join(directory, OID), 'stale content from an earlier attempt');

    const file = await store.create(OID);
    await file.writeAt(Buffer.from('new'), 0);
    await file.commit();

    expect(await readFile(file.path, 'utf8')).toBe('new');
  });

  it('should delete a discarded download', async () => {
    await shardDirectory();
    const file = await store.create(OID);
    await file.writeAt(Buffer.from('partial'), 32);

    await file.discard();

    await expect(access(file.path)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('should discard a file that is already gone', async () => {
    await shardDirectory();
    const file = await store.create(OID);
    await rm(file.path);

    await expect(file.discard()).resolves.toBeUndefined();
  });

  it('should report a missing shard directory as a local I/O error', async () => {
    const expectedPath = path.join(root, 'ab', 'cd', OID);

    await expect(store.create(OID)).rejects.toThrow(
      new LocalIOError(`Cannot create ${expectedPath}: no such file or directory`)
    );
  });

  it('should open an existing object with its size', async () => {
    const directory = await shardDirectory();
    await writeFile(path.join(directory, OID), 'cached object');

    const file = await store.openForRead(OID);
    const chunks: Buffer[] = [];
    for await (const chunk of file.stream) {
      chunks.push(Buffer.from(chunk));
    }
    await file.close();

    expect(file.size).toBe(13);
    expect(Buffer.concat(chunks).toString('utf8')).toBe('cached object');
  });

  it('should report a missing object as a local I/O error', async () => {
    const expectedPath = path.join(root, 'ab', 'cd', OID);

    await expect(store.openForRead(OID)).rejects.toThrow(
      new LocalIOError(`Cannot open ${expectedPath}: no such file or directory`)
    );
  });
});
