import {
    UpstreamCall,
    type ConnectionProbe,
    type GatewayError,
    type ProviderRequest,
    type ProviderResult,
    type VisionProviderPort
} from '@glimpse/core';

export interface FakeVisionScript {
    /** Whole answer, or the concatenation of `fragments` when absent. */
    text?: string;
    fragments?: string[];
    /** Thrown from `processImage` before anything is returned. */
    error?: GatewayError;
    /** Thrown by the fragment sequence after the listed fragments. */
    streamError?: GatewayError;
    /** After the listed fragments, wait until the call is aborted. */
    hangAfterFragments?: boolean;
}

export class FakeVisionProvider implements VisionProviderPort {
    public readonly model = 'fake-vision';
    public readonly calls: ProviderRequest[] = [];
    /** Signals handed to each call, for asserting cancellation. */
    public readonly signals: AbortSignal[] = [];
    public probes = 0;
    private script: FakeVisionScript;

    public constructor(public readonly id: string = 'fake', script: FakeVisionScript = {}) {
        this.script = script;
    }

    public setScript(script: FakeVisionScript): void {
        this.script = script;
    }

    public async start(): Promise<void> { }
    public async close(): Promise<void> { }

    public async processImage(request: ProviderRequest): Promise<ProviderResult> {
        this.calls.push(request);
        const { error, text, streamError, hangAfterFragments } = this.script;
        const fragments = this.script.fragments ?? (text ?? 'A fake description').split(/(?<= )/);

        if (error) {
            throw error;
        }
        if (!request.wantStream) {
            return { kind: 'complete', text: text ?? fragments.join('') };
        }

        const call = new UpstreamCall({ label: this.id, timeoutMs: 5_000, signal: request.signal });
        this.signals.push(call.signal);

        async function* emit(): AsyncGenerator<string, void, undefined> {
            for (const fragment of fragments) {
                yield fragment;
            }
            if (streamError) {
                throw streamError;
            }
            if (hangAfterFragments) {
                await new Promise<void>((resolve) => {
                    call.signal.addEventListener('abort', () => resolve(), { once: true });
                });
            }
        }

        return { kind: 'stream', fragments: call.stream(emit()) };
    }

    public async testConnection(): Promise<ConnectionProbe> {
        this.probes += 1;
        if (this.script.error) {
            return { ok: false, latencyMs: 1, detail: this.script.error.message };
        }
        return { ok: true, latencyMs: 1, detail: `${this.id} is reachable` };
    }
}
