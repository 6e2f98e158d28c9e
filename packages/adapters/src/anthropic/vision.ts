import { z } from 'zod';
import {
    IMAGE_TURN_PROMPT,
    UPSTREAM_DEFAULTS,
    UpstreamCall,
    upstreamRejected,
    type ConnectionProbe,
    type ProviderRequest,
    type ProviderResult,
    type VisionProviderPort
} from '@glimpse/core';
import { defaultFetch, ensureOk, type FetchLike } from '../http/fetch';
import { readSseEvents } from '../http/sse';
import { probeConnection } from '../vision/probe';

export const ANTHROPIC_MESSAGES_URL = 'https://api.anthropic.com/v1/messages';
const ANTHROPIC_VERSION = '2023-06-01';
const CLAUDE_MAX_TOKENS = 4096;

export interface ClaudeVisionProviderOptions {
    apiKey: string;
    model: string;
    endpoint?: string | undefined;
    timeoutMs?: number | undefined;
    maxTokens?: number | undefined;
    fetch?: FetchLike | undefined;
}

type ClaudeContentBlock =
    | { type: 'text'; text: string }
    | { type: 'image'; source: { type: 'base64'; media_type: string; data: string } };

interface ClaudeMessage {
    role: 'user' | 'assistant';
    content: string | ClaudeContentBlock[];
}

const MessageResponseSchema = z.object({
    content: z.array(z.object({ type: z.string(), text: z.string().optional() }))
});

const DeltaEventSchema = z.object({
    delta: z.object({ type: z.string(), text: z.string().optional() })
});

const ErrorEventSchema = z.object({
    error: z.object({ type: z.string().optional(), message: z.string() })
});

function toClaudeMessages(request: ProviderRequest): ClaudeMessage[] {
    const messages: ClaudeMessage[] = request.history.map((turn) => ({
        role: turn.role,
        content: turn.content
    }));

    messages.push({
        role: 'user',
        content: [
            {
                type: 'image',
                source: { type: 'base64', media_type: request.image.mimeType, data: request.image.data }
            },
            { type: 'text', text: IMAGE_TURN_PROMPT }
        ]
    });

    return messages;
}

function parseJson(data: string): unknown {
    try {
        return JSON.parse(data);
    } catch {
        return null;
    }
}

/** `content_block_delta` events carry the text; `message_stop` ends the stream. */
async function* toFragments(body: ReadableStream<Uint8Array>): AsyncGenerator<string, void, undefined> {
    for await (const event of readSseEvents(body)) {
        if (event.event === 'message_stop') {
            return;
        }
        if (event.event === 'error') {
            const failure = ErrorEventSchema.safeParse(parseJson(event.data));
            throw upstreamRejected('claude', undefined, failure.success ? failure.data.error.message : event.data);
        }
        if (event.event !== 'content_block_delta') {
            continue;
        }

        const delta = DeltaEventSchema.safeParse(parseJson(event.data));
        if (delta.success && delta.data.delta.type === 'text_delta' && delta.data.delta.text) {
            yield delta.data.delta.text;
        }
    }
}

/**
 * Anthropic Messages API over plain fetch. The system prompt travels in its
 * own field and auth is the `x-api-key` header.
 */
export class ClaudeVisionProvider implements VisionProviderPort {
    public readonly id = 'claude';
    public readonly model: string;
    private readonly endpoint: string;
    private readonly timeoutMs: number;
    private readonly maxTokens: number;
    private readonly fetch: FetchLike;

    public constructor(private readonly opts: ClaudeVisionProviderOptions) {
        this.model = opts.model;
        this.endpoint = opts.endpoint ?? ANTHROPIC_MESSAGES_URL;
        this.timeoutMs = opts.timeoutMs ?? UPSTREAM_DEFAULTS.MODEL_TIMEOUT_SECONDS * 1000;
        this.maxTokens = opts.maxTokens ?? CLAUDE_MAX_TOKENS;
        this.fetch = opts.fetch ?? defaultFetch;
    }

    public async processImage(request: ProviderRequest): Promise<ProviderResult> {
        const payload = {
            model: this.model,
            max_tokens: this.maxTokens,
            system: request.systemInstructions,
            messages: toClaudeMessages(request)
        };
        const call = new UpstreamCall({ label: this.id, timeoutMs: this.timeoutMs, signal: request.signal });

        if (!request.wantStream) {
            const text = await call.complete(async (signal) => {
                const response = await ensureOk(await this.post(payload, signal), this.id);
                const parsed = MessageResponseSchema.safeParse(await response.json());
                if (!parsed.success) {
                    throw upstreamRejected(this.id, response.status, 'unexpected response shape');
                }
                return parsed.data.content
                    .filter((block) => block.type === 'text')
                    .map((block) => block.text ?? '')
                    .join('');
            });
            return { kind: 'complete', text };
        }

        const body = await call.open(async (signal) => {
            const response = await ensureOk(await this.post({ ...payload, stream: true }, signal), this.id);
            if (!response.body) {
                throw upstreamRejected(this.id, response.status, 'stream response has no body');
            }
            return response.body;
        });
        return { kind: 'stream', fragments: call.stream(toFragments(body)) };
    }

    public async testConnection(): Promise<ConnectionProbe> {
        return probeConnection({
            label: this.id,
            timeoutMs: UPSTREAM_DEFAULTS.PROBE_TIMEOUT_MS,
            run: async (signal) => ensureOk(await this.post({
                model: this.model,
                max_tokens: 10,
                messages: [{ role: 'user', content: 'Hello' }]
            }, signal), this.id)
        });
    }

    private post(payload: Record<string, unknown>, signal: AbortSignal): Promise<Response> {
        return this.fetch(this.endpoint, {
            method: 'POST',
            headers: {
                'x-api-key': this.opts.apiKey,
                'anthropic-version': ANTHROPIC_VERSION,
                'content-type': 'application/json'
            },
            body: JSON.stringify(payload),
            signal
        });
    }
}
