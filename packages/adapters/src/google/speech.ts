import { z } from 'zod';
import {
    SPEECH_DEFAULTS,
    UPSTREAM_DEFAULTS,
    UpstreamCall,
    upstreamRejected,
    type SpeechProviderPort,
    type SpeechRequest,
    type SpeechResult
} from '@glimpse/core';
import { defaultFetch, ensureOk, type FetchLike } from '../http/fetch';
import { estimateSpeechSeconds, isDefaultVoice, languageOfVoice } from '../speech/duration';

export const GOOGLE_TTS_URL = 'https://texttospeech.googleapis.com/v1/text:synthesize';

const SynthesizeResponseSchema = z.object({
    audioContent: z.string().min(1)
});

export interface GoogleSpeechProviderOptions {
    apiKey: string;
    voice?: string;
    timeoutMs?: number;
    fetch?: FetchLike;
}

export class GoogleSpeechProvider implements SpeechProviderPort {
    public readonly id = 'google';
    private readonly voice: string;
    private readonly timeoutMs: number;
    private readonly fetch: FetchLike;

    public constructor(private readonly options: GoogleSpeechProviderOptions) {
        this.voice = options.voice ?? SPEECH_DEFAULTS.GOOGLE_VOICE;
        this.timeoutMs = options.timeoutMs ?? UPSTREAM_DEFAULTS.SPEECH_TIMEOUT_SECONDS * 1000;
        this.fetch = options.fetch ?? defaultFetch;
    }

    public async synthesize(request: SpeechRequest): Promise<SpeechResult> {
        const startedAt = Date.now();
        const voice = isDefaultVoice(request.voice) || !request.voice ? this.voice : request.voice;
        const call = new UpstreamCall({ label: 'google-tts', timeoutMs: this.timeoutMs, signal: request.signal });
        const url = `${GOOGLE_TTS_URL}?key=${encodeURIComponent(this.options.apiKey)}`;

        const audio = await call.complete(async (signal) => {
            const response = await ensureOk(await this.fetch(url, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify({
                    input: { text: request.text },
                    voice: { languageCode: languageOfVoice(voice, SPEECH_DEFAULTS.GOOGLE_LANGUAGE), name: voice },
                    audioConfig: { audioEncoding: 'MP3', speakingRate: request.speed }
                }),
                signal
            }), 'google-tts');

            const parsed = SynthesizeResponseSchema.safeParse(await response.json());
            if (!parsed.success) {
                throw upstreamRejected('google-tts', response.status, 'response carried no audioContent');
            }
            return Buffer.from(parsed.data.audioContent, 'base64');
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
