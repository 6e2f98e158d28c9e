import OpenAI from 'openai';
import {
    SPEECH_DEFAULTS,
    UPSTREAM_DEFAULTS,
    UpstreamCall,
    type SpeechProviderPort,
    type SpeechRequest,
    type SpeechResult
} from '@glimpse/core';
import { estimateSpeechSeconds, isDefaultVoice } from '../speech/duration';
import { classifyOpenAIError } from './errors';

export const OPENAI_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;

export type OpenAIVoice = (typeof OPENAI_VOICES)[number];

function isOpenAIVoice(value: string): value is OpenAIVoice {
    return OPENAI_VOICES.some((voice) => voice === value);
}

export interface OpenAISpeechProviderOptions {
    apiKey: string;
    voice?: OpenAIVoice;
    baseUrl?: string;
    model?: string;
    timeoutMs?: number;
    client?: OpenAI;
}

export class OpenAISpeechProvider implements SpeechProviderPort {
    public readonly id = 'openai';
    private readonly client: OpenAI;
    private readonly model: string;
    private readonly voice: OpenAIVoice;
    private readonly timeoutMs: number;

    public constructor(options: OpenAISpeechProviderOptions) {
        this.timeoutMs = options.timeoutMs ?? UPSTREAM_DEFAULTS.SPEECH_TIMEOUT_SECONDS * 1000;
        this.client = options.client ?? new OpenAI({
            apiKey: options.apiKey,
            baseURL: options.baseUrl,
            timeout: this.timeoutMs,
            maxRetries: 0
        });
        this.model = options.model ?? SPEECH_DEFAULTS.OPENAI_MODEL;
        this.voice = options.voice ?? SPEECH_DEFAULTS.OPENAI_VOICE;
    }

    public async synthesize(request: SpeechRequest): Promise<SpeechResult> {
        const startedAt = Date.now();
        const voice = !isDefaultVoice(request.voice) && request.voice && isOpenAIVoice(request.voice)
            ? request.voice
            : this.voice;
        const call = new UpstreamCall({
            label: 'openai-tts',
            timeoutMs: this.timeoutMs,
            signal: request.signal,
            classify: classifyOpenAIError
        });

        const audio = await call.complete(async (signal) => {
            const response = await this.client.audio.speech.create({
                model: this.model,
                voice,
                input: request.text,
                speed: request.speed,
                response_format: 'mp3'
            }, { signal });
            return Buffer.from(await response.arrayBuffer());
        });

        return {
            audio,
            format: 'mp3',
            voice,
            durationSeconds: estimateSpeechSeconds(request.text, request.speed),
            latencyMs: Math.max(0, Date.now() - startedAt)
        };
    }
}
