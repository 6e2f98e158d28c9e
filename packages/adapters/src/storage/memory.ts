import { GatewayError, type BlobStoragePort } from '@glimpse/core';

export class InMemoryBlobStorage implements BlobStoragePort {
    private readonly blobs = new Map<string, Buffer>();
    /** Keys whose deletion fails, for exercising partial sweeps. */
    public readonly failingDeletes = new Set<string>();

    public async start(): Promise<void> { }
    public async close(): Promise<void> { }

    public async put(key: string, data: Buffer | string): Promise<void> {
        this.blobs.set(key, Buffer.isBuffer(data) ? Buffer.from(data) : Buffer.from(data, 'utf8'));
    }

    public async get(key: string): Promise<Buffer | null> {
        const data = this.blobs.get(key);
        return data ? Buffer.from(data) : null;
    }

    public async delete(key: string): Promise<void> {
        if (this.failingDeletes.has(key)) {
            throw new GatewayError('StorageFailure', `Could not delete ${key}`, { details: { key, operation: 'delete' } });
        }
        if (!this.blobs.delete(key)) {
            throw new GatewayError('StorageFailure', `Could not delete ${key}: not found`, { details: { key, operation: 'delete' } });
        }
    }

    public async list(): Promise<string[]> {
        return [...this.blobs.keys()].sort();
    }
}
