import { timingSafeEqual } from 'node:crypto';
import { type CredentialValidatorPort } from '@glimpse/core';

export interface StaticCredentialValidatorOptions {
    requireAuth: boolean;
    apiKeys: readonly string[];
}

function sameKey(a: string, b: string): boolean {
    const left = Buffer.from(a);
    const right = Buffer.from(b);
    return left.length === right.length && timingSafeEqual(left, right);
}

/** Accepts any caller when auth is off, otherwise only the configured keys. */
export class StaticCredentialValidator implements CredentialValidatorPort {
    public constructor(private readonly options: StaticCredentialValidatorOptions) { }

    public async validate(credential: string | undefined): Promise<boolean> {
        if (!this.options.requireAuth) {
            return true;
        }
        if (!credential) {
            return false;
        }
        return this.options.apiKeys.some((key) => sameKey(key, credential));
    }
}
