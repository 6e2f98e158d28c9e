import {
    describeError,
    UpstreamCall,
    type ConnectionProbe,
    type UpstreamErrorClassifier
} from '@glimpse/core';

interface ProbeInput {
    label: string;
    timeoutMs: number;
    classify?: UpstreamErrorClassifier | undefined;
    run: (signal: AbortSignal) => Promise<unknown>;
}

/** Times one cheap request; failures become `ok: false` with the reason as detail. */
export async function probeConnection(input: ProbeInput): Promise<ConnectionProbe> {
    const startedAt = Date.now();
    const call = new UpstreamCall({ label: input.label, timeoutMs: input.timeoutMs, classify: input.classify });

    try {
        await call.complete(input.run);
        return { ok: true, latencyMs: Date.now() - startedAt, detail: `${input.label} is reachable` };
    } catch (error) {
        return { ok: false, latencyMs: Date.now() - startedAt, detail: describeError(error) };
    }
}
