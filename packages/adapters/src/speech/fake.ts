import {
    type GatewayError,
    type SpeechProviderPort,
    type SpeechRequest,
    type SpeechResult
} from '@glimpse/core';

export class FakeSpeechProvider implements SpeechProviderPort {
    public readonly calls: SpeechRequest[] = [];
    private failure: GatewayError | null = null;

    public constructor(public readonly id: string = 'fake') { }

    public async start(): Promise<void> { }
    public async close(): Promise<void> { }

    /** Makes every following call reject with `error`; `null` restores success. */
    public setFailure(error: GatewayError | null): void {
        this.failure = error;
    }

    public async synthesize(request: SpeechRequest): Promise<SpeechResult> {
        this.calls.push(request);
        if (this.failure) {
            throw this.failure;
        }
        return {
            audio: Buffer.from('fake-audio'),
            format: 'mp3',
            voice: request.voice ?? 'default',
            durationSeconds: 1,
            latencyMs: 1
        };
    }
}
