import { describe, expect, it } from 'vitest';

import { GatewayError } from '@glimpse/core';
import { FakeLogger, InMemoryBlobStorage } from '@glimpse/testing';
import { AudioLifecycleManager } from '../src/index';

const START = Date.parse('2025-01-01T00:00:00.000Z');
const HOUR = 3_600_000;
const METADATA = { voice: 'alloy', speed: 1, sourceTextLength: 4 };

function setup() {
  let current = START;
  const storage = new InMemoryBlobStorage();
  const logger = new FakeLogger();
  const manager = new AudioLifecycleManager({
    storage,
    publicBaseUrl: 'http://gateway.test/',
    expirationMs: HOUR,
    logger,
    now: () => new Date(current)
  });
  return {
    storage,
    logger,
    manager,
    set: (value: number) => {
      current = value;
    }
  };
}

/** Sidecar writes wait for `sidecarGate` when set and fail otherwise. */
class FailingSidecarStorage extends InMemoryBlobStorage {
  public sidecarGate: Promise<void> | null = null;

  public async put(key: string, data: Buffer | string): Promise<void> {
    if (key.endsWith('.json')) {
      if (!this.sidecarGate) {
        throw new GatewayError('StorageFailure', `Could not write ${key}`);
      }
      await this.sidecarGate;
    }
    await super.put(key, data);
  }
}

describe('audio lifecycle manager', () => {
  it('stores payload and sidecar and resolves them by filename or id', async () => {
    const { storage, manager } = setup();

    const asset = await manager.store(Buffer.from('clip'), 'mp3', METADATA, 1.5);

    expect(asset.locator).toBe(`http://gateway.test/audio/${asset.id}.mp3`);
    expect(asset.filename).toBe(`${asset.id}.mp3`);
    expect(asset.sizeBytes).toBe(4);
    expect(await storage.list()).toEqual([`${asset.id}.json`, `${asset.id}.mp3`]);

    const byName = await manager.resolve(asset.filename);
    expect(byName.bytes.toString('utf8')).toBe('clip');
    expect(byName.contentType).toBe('audio/mpeg');
    expect(byName.asset.durationSeconds).toBe(1.5);
    expect(byName.asset.createdAt.getTime()).toBe(START);

    const byId = await manager.resolve(asset.id);
    expect(byId.bytes.toString('utf8')).toBe('clip');
  });

  it('hands out unique ids that resolve right after they are written', async () => {
    const { manager } = setup();
    const ids = new Set<string>();

    for (let index = 0; index < 10_000; index += 1) {
      const asset = await manager.store(Buffer.from(`clip-${index}`), 'mp3', METADATA);
      ids.add(asset.id);
      const resolved = await manager.resolve(asset.filename);
      expect(resolved.bytes.toString('utf8')).toBe(`clip-${index}`);
    }

    expect(ids.size).toBe(10_000);
  });

  it('keeps assets until the expiration and removes them after it', async () => {
    const { storage, logger, manager } = setup();
    const asset = await manager.store(Buffer.from('clip'), 'mp3', METADATA);

    expect(await manager.sweepExpired(new Date(START + HOUR - 1_000))).toBe(0);
    expect((await manager.resolve(asset.filename)).bytes.toString('utf8')).toBe('clip');

    expect(await manager.sweepExpired(new Date(START + HOUR + 1_000))).toBe(1);
    expect(await storage.list()).toEqual([]);
    expect(logger.withMessage('expired audio removed')).toEqual([
      { level: 'info', obj: { component: 'audio', deleted: 1 }, msg: 'expired audio removed' }
    ]);
    await expect(manager.resolve(asset.filename)).rejects.toMatchObject({ kind: 'AudioNotFound' });
  });

  it('logs a failed deletion and keeps sweeping the other assets', async () => {
    const { storage, logger, manager } = setup();
    const stuck = await manager.store(Buffer.from('one'), 'mp3', METADATA);
    const other = await manager.store(Buffer.from('two'), 'mp3', METADATA);
    storage.failingDeletes.add(stuck.filename);

    const deleted = await manager.sweepExpired(new Date(START + HOUR + 1_000));

    expect(deleted).toBe(1);
    expect(await storage.list()).toEqual([stuck.filename]);
    expect(await storage.get(other.filename)).toBeNull();
    expect(logger.withMessage('audio cleanup skipped an asset')).toEqual([
      {
        level: 'warn',
        obj: {
          component: 'audio',
          key: stuck.filename,
          operation: 'delete',
          errorKind: 'StorageFailure',
          err: `Could not delete ${stuck.filename}`
        },
        msg: 'audio cleanup skipped an asset'
      }
    ]);
  });

  it('treats malformed names, wrong extensions and expired assets as missing', async () => {
    const { manager, set } = setup();
    const asset = await manager.store(Buffer.from('clip'), 'mp3', METADATA);

    await expect(manager.resolve('../secret.mp3')).rejects.toMatchObject({
      kind: 'AudioNotFound',
      details: { filename: '../secret.mp3' }
    });
    await expect(manager.resolve('not-an-id')).rejects.toMatchObject({ kind: 'AudioNotFound' });
    await expect(manager.resolve(`${asset.id}.wav`)).rejects.toMatchObject({ kind: 'AudioNotFound' });

    set(START + HOUR + 1);
    await expect(manager.resolve(asset.filename)).rejects.toMatchObject({ kind: 'AudioNotFound' });
  });

  it('treats an unparsable sidecar as missing and sweeps it with its payload', async () => {
    const { storage, logger, manager } = setup();
    const id = '0b3f9a52-6c1e-4d2a-9f1b-2f7c8e9d0a11';
    await storage.put(`${id}.json`, '{broken');
    await storage.put(`${id}.mp3`, Buffer.from('clip'));

    await expect(manager.resolve(id)).rejects.toMatchObject({ kind: 'AudioNotFound' });
    expect(await manager.sweepExpired(new Date(START))).toBe(0);
    expect(await storage.list()).toEqual([]);
    expect(logger.withMessage('audio sidecar is malformed')).toHaveLength(2);
    expect(logger.withMessage('orphaned audio removed')).toEqual([
      { level: 'info', obj: { component: 'audio', orphaned: 1 }, msg: 'orphaned audio removed' }
    ]);
  });

  it('removes the payload when the sidecar cannot be written', async () => {
    const storage = new FailingSidecarStorage();
    const manager = new AudioLifecycleManager({
      storage,
      publicBaseUrl: 'http://gateway.test',
      logger: new FakeLogger(),
      now: () => new Date(START)
    });

    await expect(manager.store(Buffer.from('clip'), 'mp3', METADATA)).rejects.toMatchObject({
      kind: 'StorageFailure'
    });
    expect(await storage.list()).toEqual([]);
  });

  it('sweeps payloads that have no sidecar but leaves unrelated keys alone', async () => {
    const { storage, manager } = setup();
    const kept = await manager.store(Buffer.from('kept'), 'mp3', METADATA);
    await storage.put('4fa06fac-1c2d-4e5f-8a9b-0c1d2e3f4a5b.mp3', Buffer.from('orphan'));
    await storage.put('notes.txt', 'unrelated');

    expect(await manager.sweepExpired(new Date(START))).toBe(0);

    expect(await storage.list()).toEqual([`${kept.id}.json`, `${kept.id}.mp3`, 'notes.txt']);
  });

  it('does not sweep an asset whose sidecar is still being written', async () => {
    const storage = new FailingSidecarStorage();
    let release: () => void = () => undefined;
    storage.sidecarGate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const manager = new AudioLifecycleManager({
      storage,
      publicBaseUrl: 'http://gateway.test',
      logger: new FakeLogger(),
      now: () => new Date(START)
    });

    const pending = manager.store(Buffer.from('clip'), 'mp3', METADATA);
    await new Promise((resolve) => setImmediate(resolve));
    const [payload] = await storage.list();

    expect(await manager.sweepExpired(new Date(START))).toBe(0);
    expect(await storage.list()).toEqual([payload]);

    release();
    const asset = await pending;
    expect(payload).toBe(asset.filename);
    expect((await manager.resolve(asset.filename)).bytes.toString('utf8')).toBe('clip');
  });
});
