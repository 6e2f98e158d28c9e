import { ApiError, GoogleGenAI, type Content, type GenerateContentResponse } from '@google/genai';
import {
    classifyUpstreamError,
    GatewayError,
    IMAGE_TURN_PROMPT,
    UPSTREAM_DEFAULTS,
    UpstreamCall,
    upstreamRejected,
    type ConnectionProbe,
    type ProviderRequest,
    type ProviderResult,
    type VisionProviderPort
} from '@glimpse/core';
import { probeConnection } from '../vision/probe';

export interface GeminiVisionProviderOptions {
    apiKey: string;
    model: string;
    timeoutMs?: number | undefined;
    maxTokens?: number | undefined;
    client?: GoogleGenAI;
}

function classifyGeminiError(error: unknown, label: string): GatewayError {
    if (error instanceof ApiError) {
        return upstreamRejected(label, error.status, error.message);
    }
    return classifyUpstreamError(error, label);
}

/** Gemini calls the assistant side `model` and takes images as inline data parts. */
function toGeminiContents(request: ProviderRequest): Content[] {
    const contents: Content[] = request.history.map((turn) => ({
        role: turn.role === 'assistant' ? 'model' : 'user',
        parts: [{ text: turn.content }]
    }));

    contents.push({
        role: 'user',
        parts: [
            { inlineData: { mimeType: request.image.mimeType, data: request.image.data } },
            { text: IMAGE_TURN_PROMPT }
        ]
    });

    return contents;
}

async function* toFragments(stream: AsyncIterable<GenerateContentResponse>): AsyncGenerator<string, void, undefined> {
    for await (const chunk of stream) {
        const text = chunk.text;
        if (text) {
            yield text;
        }
    }
}

export class GeminiVisionProvider implements VisionProviderPort {
    public readonly id = 'gemini';
    public readonly model: string;
    private client: GoogleGenAI | null;
    private readonly timeoutMs: number;
    private readonly maxTokens: number;

    public constructor(private readonly opts: GeminiVisionProviderOptions) {
        this.model = opts.model;
        this.client = opts.client ?? null;
        this.timeoutMs = opts.timeoutMs ?? UPSTREAM_DEFAULTS.MODEL_TIMEOUT_SECONDS * 1000;
        this.maxTokens = opts.maxTokens ?? UPSTREAM_DEFAULTS.MAX_OUTPUT_TOKENS;
    }

    public async processImage(request: ProviderRequest): Promise<ProviderResult> {
        const client = this.getClient();
        const contents = toGeminiContents(request);
        const call = new UpstreamCall({
            label: this.id,
            timeoutMs: this.timeoutMs,
            signal: request.signal,
            classify: classifyGeminiError
        });
        const params = (signal: AbortSignal) => ({
            model: this.model,
            contents,
            config: {
                systemInstruction: request.systemInstructions,
                maxOutputTokens: this.maxTokens,
                abortSignal: signal
            }
        });

        if (!request.wantStream) {
            const text = await call.complete(async (signal) => {
                const response = await client.models.generateContent(params(signal));
                return response.text ?? '';
            });
            return { kind: 'complete', text };
        }

        const stream = await call.open((signal) => client.models.generateContentStream(params(signal)));
        return { kind: 'stream', fragments: call.stream(toFragments(stream)) };
    }

    public async testConnection(): Promise<ConnectionProbe> {
        const client = this.getClient();
        return probeConnection({
            label: this.id,
            timeoutMs: UPSTREAM_DEFAULTS.PROBE_TIMEOUT_MS,
            classify: classifyGeminiError,
            run: (signal) => client.models.generateContent({
                model: this.model,
                contents: 'Hello',
                config: { maxOutputTokens: 10, abortSignal: signal }
            })
        });
    }

    private getClient(): GoogleGenAI {
        if (!this.client) {
            this.client = new GoogleGenAI({ apiKey: this.opts.apiKey });
        }
        return this.client;
    }
}
