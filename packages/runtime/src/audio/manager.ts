import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import {
  AUDIO_CONTENT_TYPES,
  AUDIO_DEFAULTS,
  AUDIO_FORMATS,
  GatewayError,
  toGatewayError,
  type AudioAsset,
  type AudioFormat,
  type AudioMetadata,
  type BlobStoragePort,
  type Logger
} from '@glimpse/core';

const AUDIO_NAME = /^([0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12})(?:\.([a-z0-9]+))?$/i;
const SIDECAR_SUFFIX = '.json';

const SidecarSchema = z.object({
  id: z.string(),
  format: z.enum(AUDIO_FORMATS),
  durationSeconds: z.number().nonnegative(),
  sizeBytes: z.number().int().nonnegative(),
  createdAt: z.string().datetime(),
  metadata: z.object({
    voice: z.string(),
    speed: z.number(),
    sourceTextLength: z.number().int().nonnegative()
  })
});

type Sidecar = z.infer<typeof SidecarSchema>;

type SidecarRead =
  | { state: 'missing' }
  | { state: 'malformed' }
  | { state: 'valid'; sidecar: Sidecar };

export interface ResolvedAudio {
  bytes: Buffer;
  contentType: string;
  asset: AudioAsset;
}

export interface AudioLifecycleManagerOptions {
  storage: BlobStoragePort;
  /** Prefix of the locators handed to clients, without trailing slash. */
  publicBaseUrl: string;
  expirationMs?: number;
  logger: Logger;
  now?: () => Date;
  generateId?: () => string;
}

/**
 * Persists synthesized audio as `{id}.{format}` plus a `{id}.json` sidecar
 * and deletes both once they are older than the expiration. Payloads left
 * without a readable sidecar are deleted by the next sweep.
 */
export class AudioLifecycleManager {
  private readonly storage: BlobStoragePort;
  private readonly publicBaseUrl: string;
  private readonly expirationMs: number;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly generateId: () => string;
  /** Ids whose sidecar is not written yet. */
  private readonly writing = new Set<string>();

  public constructor(options: AudioLifecycleManagerOptions) {
    this.storage = options.storage;
    this.publicBaseUrl = options.publicBaseUrl.replace(/\/+$/, '');
    this.expirationMs = options.expirationMs ?? AUDIO_DEFAULTS.EXPIRATION_HOURS * 3_600_000;
    this.logger = options.logger.child({ component: 'audio' });
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  public async store(
    audio: Buffer,
    format: AudioFormat,
    metadata: AudioMetadata,
    durationSeconds = 0
  ): Promise<AudioAsset> {
    const id = this.generateId();
    const createdAt = this.now();
    const sidecar: Sidecar = {
      id,
      format,
      durationSeconds,
      sizeBytes: audio.length,
      createdAt: createdAt.toISOString(),
      metadata
    };

    const payloadKey = `${id}.${format}`;
    this.writing.add(id);
    try {
      await this.storage.put(payloadKey, audio);
      try {
        await this.storage.put(`${id}${SIDECAR_SUFFIX}`, JSON.stringify(sidecar));
      } catch (error) {
        await this.remove(payloadKey);
        throw error;
      }
    } finally {
      this.writing.delete(id);
    }

    return this.toAsset(sidecar);
  }

  /** Accepts a bare id or `{id}.{format}`. */
  public async resolve(idOrFilename: string): Promise<ResolvedAudio> {
    const match = AUDIO_NAME.exec(idOrFilename);
    if (!match) {
      throw this.notFound(idOrFilename);
    }

    const id = match[1]?.toLowerCase() ?? '';
    const requestedFormat = match[2];
    const read = await this.readSidecar(id);
    const sidecar = read.state === 'valid' ? read.sidecar : null;
    if (
      !sidecar
      || (requestedFormat !== undefined && requestedFormat.toLowerCase() !== sidecar.format)
      || this.isExpired(sidecar, this.now())
    ) {
      throw this.notFound(idOrFilename);
    }

    const bytes = await this.storage.get(`${id}.${sidecar.format}`);
    if (!bytes) {
      throw this.notFound(idOrFilename);
    }

    return { bytes, contentType: AUDIO_CONTENT_TYPES[sidecar.format], asset: this.toAsset(sidecar) };
  }

  /**
   * Deletes payload and sidecar of every expired asset, and every payload
   * whose sidecar is missing or malformed. Failures are logged per key;
   * only expired assets removed completely are counted.
   */
  public async sweepExpired(now: Date = this.now()): Promise<number> {
    let deleted = 0;
    let orphaned = 0;

    for (const [id, keys] of this.groupById(await this.storage.list())) {
      if (this.writing.has(id)) {
        continue;
      }

      const sidecarKey = `${id}${SIDECAR_SUFFIX}`;
      let read: SidecarRead;
      try {
        read = await this.readSidecar(id);
      } catch (error) {
        this.logFailure(error, sidecarKey, 'read');
        continue;
      }

      if (read.state === 'valid' && !this.isExpired(read.sidecar, now)) {
        continue;
      }
      const removed = await this.removeAll(keys);
      if (!removed) {
        continue;
      }
      if (read.state === 'valid') {
        deleted += 1;
      } else {
        orphaned += 1;
      }
    }

    if (deleted > 0) {
      this.logger.info({ deleted }, 'expired audio removed');
    }
    if (orphaned > 0) {
      this.logger.info({ orphaned }, 'orphaned audio removed');
    }
    return deleted;
  }

  /** Keys named after an asset id, payloads first and the sidecar last. */
  private groupById(keys: string[]): Map<string, string[]> {
    const groups = new Map<string, string[]>();
    for (const key of keys) {
      const match = AUDIO_NAME.exec(key);
      const id = match?.[1];
      if (id === undefined || match?.[2] === undefined) {
        continue;
      }
      const group = groups.get(id) ?? [];
      group.push(key);
      groups.set(id, group);
    }
    for (const group of groups.values()) {
      group.sort((a, b) => Number(a.endsWith(SIDECAR_SUFFIX)) - Number(b.endsWith(SIDECAR_SUFFIX)));
    }
    return groups;
  }

  private async removeAll(keys: string[]): Promise<boolean> {
    let removed = true;
    for (const key of keys) {
      removed = (await this.remove(key)) && removed;
    }
    return removed;
  }

  private async remove(key: string): Promise<boolean> {
    try {
      await this.storage.delete(key);
      return true;
    } catch (error) {
      this.logFailure(error, key, 'delete');
      return false;
    }
  }

  private logFailure(error: unknown, key: string, operation: string): void {
    const failure = toGatewayError(error, 'StorageFailure');
    this.logger.warn({ key, operation, errorKind: failure.kind, err: failure.message }, 'audio cleanup skipped an asset');
  }

  private async readSidecar(id: string): Promise<SidecarRead> {
    const raw = await this.storage.get(`${id}${SIDECAR_SUFFIX}`);
    if (!raw) {
      return { state: 'missing' };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw.toString('utf8'));
    } catch {
      parsed = null;
    }
    const sidecar = SidecarSchema.safeParse(parsed);
    if (!sidecar.success) {
      this.logger.warn({ id }, 'audio sidecar is malformed');
      return { state: 'malformed' };
    }
    return { state: 'valid', sidecar: sidecar.data };
  }

  private isExpired(sidecar: Sidecar, now: Date): boolean {
    return now.getTime() - Date.parse(sidecar.createdAt) > this.expirationMs;
  }

  private toAsset(sidecar: Sidecar): AudioAsset {
    const filename = `${sidecar.id}.${sidecar.format}`;
    return {
      id: sidecar.id,
      filename,
      locator: `${this.publicBaseUrl}/audio/${filename}`,
      format: sidecar.format,
      durationSeconds: sidecar.durationSeconds,
      sizeBytes: sidecar.sizeBytes,
      createdAt: new Date(sidecar.createdAt),
      metadata: sidecar.metadata
    };
  }

  private notFound(name: string): GatewayError {
    return new GatewayError('AudioNotFound', `Audio ${name} does not exist or has expired`, {
      details: { filename: name }
    });
  }
}
