import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { InMemoryBlobStorage, LocalFileStorage } from '../src/index';

describe('local file storage', () => {
  let directory: string;
  let storage: LocalFileStorage;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'gateway-storage-'));
    storage = new LocalFileStorage({ directory: join(directory, 'audio') });
    await storage.start();
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('stores, lists and deletes blobs', async () => {
    await storage.put('b.mp3', Buffer.from('audio'));
    await storage.put('a.json', '{"ok":true}');

    expect((await storage.get('b.mp3'))?.toString()).toBe('audio');
    expect((await storage.get('a.json'))?.toString()).toBe('{"ok":true}');
    expect(await storage.list()).toEqual(['a.json', 'b.mp3']);

    await storage.delete('b.mp3');

    expect(await storage.get('b.mp3')).toBeNull();
    expect(await storage.list()).toEqual(['a.json']);
  });

  it('fails deleting a missing key', async () => {
    await expect(storage.delete('missing.mp3')).rejects.toMatchObject({ kind: 'StorageFailure' });
  });

  it('refuses keys that would leave the directory', async () => {
    await expect(storage.put('../escape.mp3', 'x')).rejects.toMatchObject({ kind: 'StorageFailure' });
    await expect(storage.get('nested/file.mp3')).rejects.toMatchObject({ kind: 'StorageFailure' });
  });
});

describe('in-memory blob storage', () => {
  it('keeps copies of what was written', async () => {
    const storage = new InMemoryBlobStorage();
    const data = Buffer.from('abc');

    await storage.put('x', data);
    data.write('zzz');

    expect((await storage.get('x'))?.toString()).toBe('abc');
    expect(await storage.get('y')).toBeNull();
  });

  it('fails deletes that are missing or marked failing', async () => {
    const storage = new InMemoryBlobStorage();
    await storage.put('x', 'data');
    storage.failingDeletes.add('x');

    await expect(storage.delete('x')).rejects.toMatchObject({ kind: 'StorageFailure' });
    await expect(storage.delete('nope')).rejects.toMatchObject({ kind: 'StorageFailure' });
    expect(await storage.list()).toEqual(['x']);
  });
});
