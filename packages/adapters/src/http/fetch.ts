import { upstreamRejected } from '@glimpse/core';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export const defaultFetch: FetchLike = (url, init) => fetch(url, init);

const MAX_DETAIL_LENGTH = 300;

function extractMessage(body: unknown): string | null {
    if (typeof body !== 'object' || body === null) return null;
    if ('message' in body && typeof body.message === 'string') return body.message;
    if ('error' in body) {
        if (typeof body.error === 'string') return body.error;
        return extractMessage(body.error);
    }
    return null;
}

/** Best-effort human readable reason from a vendor error body. */
export async function readErrorDetail(response: Response): Promise<string> {
    const raw = await response.text();
    let parsed: unknown = null;
    try {
        parsed = JSON.parse(raw);
    } catch {
        parsed = null;
    }
    return (extractMessage(parsed) ?? raw).slice(0, MAX_DETAIL_LENGTH);
}

export async function ensureOk(response: Response, provider: string): Promise<Response> {
    if (!response.ok) {
        throw upstreamRejected(provider, response.status, await readErrorDetail(response));
    }
    return response;
}
