import {
    SPEECH_DEFAULTS,
    UPSTREAM_DEFAULTS,
    UpstreamCall,
    type SpeechProviderPort,
    type SpeechRequest,
    type SpeechResult
} from '@glimpse/core';
import { defaultFetch, ensureOk, type FetchLike } from '../http/fetch';
import { estimateSpeechSeconds, isDefaultVoice, languageOfVoice } from '../speech/duration';

export interface AzureSpeechProviderOptions {
    apiKey: string;
    region: string;
    voice?: string;
    timeoutMs?: number;
    fetch?: FetchLike;
}

function escapeXml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&apos;');
}

/** 1.0 → `+0%`, 1.5 → `+50%`, 0.5 → `-50%`. */
export function toProsodyRate(speed: number): string {
    const percent = Math.round((speed - 1) * 100);
    return `${percent >= 0 ? '+' : ''}${percent}%`;
}

export function buildSsml(text: string, voice: string, speed: number): string {
    const language = languageOfVoice(voice, 'en-US');
    return `<speak version="1.0" xmlns="http://www.w3.org/2001/10/synthesis" xml:lang="${language}">`
        + `<voice name="${escapeXml(voice)}"><prosody rate="${toProsodyRate(speed)}">${escapeXml(text)}</prosody></voice>`
        + '</speak>';
}

/** Azure Cognitive Services text-to-speech REST endpoint (SSML in, MP3 out). */
export class AzureSpeechProvider implements SpeechProviderPort {
    public readonly id = 'azure';
    private readonly voice: string;
    private readonly timeoutMs: number;
    private readonly fetch: FetchLike;

    public constructor(private readonly options: AzureSpeechProviderOptions) {
        this.voice = options.voice ?? SPEECH_DEFAULTS.AZURE_VOICE;
        this.timeoutMs = options.timeoutMs ?? UPSTREAM_DEFAULTS.SPEECH_TIMEOUT_SECONDS * 1000;
        this.fetch = options.fetch ?? defaultFetch;
    }

    public get endpoint(): string {
        return `https://${this.options.region}.tts.speech.microsoft.com/cognitiveservices/v1`;
    }

    public async synthesize(request: SpeechRequest): Promise<SpeechResult> {
        const startedAt = Date.now();
        const voice = isDefaultVoice(request.voice) || !request.voice ? this.voice : request.voice;
        const call = new UpstreamCall({ label: 'azure-tts', timeoutMs: this.timeoutMs, signal: request.signal });

        const audio = await call.complete(async (signal) => {
            const response = await ensureOk(await this.fetch(this.endpoint, {
                method: 'POST',
                headers: {
                    'Ocp-Apim-Subscription-Key': this.options.apiKey,
                    'Content-Type': 'application/ssml+xml',
                    'X-Microsoft-OutputFormat': 'audio-24khz-48kbitrate-mono-mp3',
                    'User-Agent': 'glimpse-gateway'
                },
                body: buildSsml(request.text, voice, request.speed),
                signal
            }), 'azure-tts');
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
