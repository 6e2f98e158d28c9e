import OpenAI from 'openai';
import {
    IMAGE_TURN_PROMPT,
    UPSTREAM_DEFAULTS,
    UpstreamCall,
    type ConnectionProbe,
    type ProviderRequest,
    type ProviderResult,
    type VisionProviderPort
} from '@glimpse/core';
import { probeConnection } from '../vision/probe';
import { classifyOpenAIError } from './errors';

type OpenAIMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type OpenAIChunk = OpenAI.Chat.Completions.ChatCompletionChunk;

export interface OpenAIVisionProviderOptions {
    /** Provider id reported in errors and telemetry (`openai`, `qwen`, `custom`...). */
    id: string;
    apiKey: string;
    model: string;
    baseUrl?: string | undefined;
    headers?: Record<string, string> | undefined;
    timeoutMs?: number | undefined;
    maxTokens?: number | undefined;
    /** `models` lists models; `hello` sends a ten-token chat. */
    probe?: 'models' | 'hello' | undefined;
    client?: OpenAI;
}

function toOpenAIMessages(request: ProviderRequest): OpenAIMessage[] {
    const messages: OpenAIMessage[] = [{ role: 'system', content: request.systemInstructions }];

    for (const turn of request.history) {
        messages.push(turn.role === 'user'
            ? { role: 'user', content: turn.content }
            : { role: 'assistant', content: turn.content });
    }

    messages.push({
        role: 'user',
        content: [
            { type: 'image_url', image_url: { url: `data:${request.image.mimeType};base64,${request.image.data}` } },
            { type: 'text', text: IMAGE_TURN_PROMPT }
        ]
    });

    return messages;
}

async function* toFragments(stream: AsyncIterable<OpenAIChunk>): AsyncGenerator<string, void, undefined> {
    for await (const chunk of stream) {
        const content = chunk.choices[0]?.delta?.content;
        if (content) {
            yield content;
        }
    }
}

/**
 * Any endpoint speaking the OpenAI chat-completions protocol: OpenAI itself,
 * the compatible modes of Qwen, Doubao and GLM, and caller-supplied endpoints.
 */
export class OpenAIVisionProvider implements VisionProviderPort {
    public readonly id: string;
    public readonly model: string;
    private client: OpenAI | null;
    private readonly timeoutMs: number;
    private readonly maxTokens: number;

    public constructor(private readonly opts: OpenAIVisionProviderOptions) {
        this.id = opts.id;
        this.model = opts.model;
        this.client = opts.client ?? null;
        this.timeoutMs = opts.timeoutMs ?? UPSTREAM_DEFAULTS.MODEL_TIMEOUT_SECONDS * 1000;
        this.maxTokens = opts.maxTokens ?? UPSTREAM_DEFAULTS.MAX_OUTPUT_TOKENS;
    }

    public async processImage(request: ProviderRequest): Promise<ProviderResult> {
        const client = this.getClient();
        const messages = toOpenAIMessages(request);
        const call = new UpstreamCall({
            label: this.id,
            timeoutMs: this.timeoutMs,
            signal: request.signal,
            classify: classifyOpenAIError
        });

        if (!request.wantStream) {
            const text = await call.complete(async (signal) => {
                const completion = await client.chat.completions.create(
                    { model: this.model, messages, max_tokens: this.maxTokens },
                    { signal }
                );
                return completion.choices[0]?.message?.content ?? '';
            });
            return { kind: 'complete', text };
        }

        const stream = await call.open((signal) => client.chat.completions.create(
            { model: this.model, messages, max_tokens: this.maxTokens, stream: true },
            { signal }
        ));
        return { kind: 'stream', fragments: call.stream(toFragments(stream)) };
    }

    public async testConnection(): Promise<ConnectionProbe> {
        const client = this.getClient();
        return probeConnection({
            label: this.id,
            timeoutMs: UPSTREAM_DEFAULTS.PROBE_TIMEOUT_MS,
            classify: classifyOpenAIError,
            run: (signal) => this.opts.probe === 'models'
                ? client.models.list({ signal })
                : client.chat.completions.create(
                    { model: this.model, messages: [{ role: 'user', content: 'Hello' }], max_tokens: 10 },
                    { signal }
                )
        });
    }

    /** The SDK client is built on first use; no connection is opened before a call. */
    private getClient(): OpenAI {
        if (!this.client) {
            this.client = new OpenAI({
                apiKey: this.opts.apiKey,
                baseURL: this.opts.baseUrl,
                defaultHeaders: this.opts.headers,
                timeout: this.timeoutMs,
                maxRetries: 0
            });
        }
        return this.client;
    }
}
