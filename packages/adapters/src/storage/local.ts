import { mkdir, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { GatewayError, describeError, type BlobStoragePort } from '@glimpse/core';

const SAFE_KEY = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export interface LocalFileStorageOptions {
    directory: string;
}

/** Flat directory of files, one per key. */
export class LocalFileStorage implements BlobStoragePort {
    public readonly directory: string;

    public constructor(options: LocalFileStorageOptions) {
        this.directory = resolve(options.directory);
    }

    public async start(): Promise<void> {
        await mkdir(this.directory, { recursive: true });
    }

    public async close(): Promise<void> { }

    public async put(key: string, data: Buffer | string): Promise<void> {
        const path = this.pathOf(key);
        try {
            await writeFile(path, data);
        } catch (error) {
            throw this.failure('write', key, error);
        }
    }

    public async get(key: string): Promise<Buffer | null> {
        const path = this.pathOf(key);
        try {
            return await readFile(path);
        } catch (error) {
            if (isMissingFile(error)) {
                return null;
            }
            throw this.failure('read', key, error);
        }
    }

    public async delete(key: string): Promise<void> {
        const path = this.pathOf(key);
        try {
            await rm(path);
        } catch (error) {
            throw this.failure('delete', key, error);
        }
    }

    public async list(): Promise<string[]> {
        try {
            const entries = await readdir(this.directory, { withFileTypes: true });
            return entries.filter((entry) => entry.isFile()).map((entry) => entry.name).sort();
        } catch (error) {
            if (isMissingFile(error)) {
                return [];
            }
            throw this.failure('list', this.directory, error);
        }
    }

    private pathOf(key: string): string {
        if (!SAFE_KEY.test(key)) {
            throw new GatewayError('StorageFailure', `Refusing unsafe storage key "${key}"`, {
                details: { key }
            });
        }
        return join(this.directory, key);
    }

    private failure(operation: string, key: string, error: unknown): GatewayError {
        return new GatewayError('StorageFailure', `Could not ${operation} ${key}: ${describeError(error)}`, {
            cause: error,
            details: { key, operation }
        });
    }
}
