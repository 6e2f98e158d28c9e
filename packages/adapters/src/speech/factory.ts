import {
    GatewayError,
    SPEECH_DEFAULTS,
    SPEECH_PROVIDER_IDS,
    UPSTREAM_DEFAULTS,
    isSpeechProvider,
    type ProviderDescriptor,
    type SpeechAdapterFactoryPort,
    type SpeechProviderId,
    type SpeechProviderPort
} from '@glimpse/core';
import { AzureSpeechProvider } from '../azure/speech';
import { GoogleSpeechProvider } from '../google/speech';
import { OpenAISpeechProvider } from '../openai/speech';

export interface SpeechAdapterFactoryOptions {
    timeoutMs?: number | undefined;
    openai?: { apiKey?: string | undefined; model?: string | undefined } | undefined;
    azure?: { apiKey?: string | undefined; region?: string | undefined } | undefined;
    google?: { apiKey?: string | undefined } | undefined;
    /** Replaces the adapter constructed for a provider id. */
    builders?: Partial<Record<SpeechProviderId, () => SpeechProviderPort>> | undefined;
}

const DEFAULT_VOICES: Record<SpeechProviderId, string> = {
    openai: SPEECH_DEFAULTS.OPENAI_VOICE,
    azure: SPEECH_DEFAULTS.AZURE_VOICE,
    google: SPEECH_DEFAULTS.GOOGLE_VOICE
};

export class SpeechAdapterFactory implements SpeechAdapterFactoryPort {
    private readonly timeoutMs: number;

    public constructor(private readonly options: SpeechAdapterFactoryOptions = {}) {
        this.timeoutMs = options.timeoutMs ?? UPSTREAM_DEFAULTS.SPEECH_TIMEOUT_SECONDS * 1000;
    }

    public create(providerId: string): SpeechProviderPort {
        if (!isSpeechProvider(providerId)) {
            throw new GatewayError('UnsupportedProvider', `Unknown speech provider "${providerId}"`, {
                details: { supported: [...SPEECH_PROVIDER_IDS] }
            });
        }

        const override = this.options.builders?.[providerId];
        if (override) {
            return override();
        }

        const adapter = this.build(providerId);
        if (!adapter) {
            throw new GatewayError('UnsupportedProvider', `Speech provider "${providerId}" is not configured on this gateway`, {
                details: { provider: providerId, reason: 'missing credentials' }
            });
        }
        return adapter;
    }

    public describeProviders(): ProviderDescriptor[] {
        return SPEECH_PROVIDER_IDS.map((id) => ({
            id,
            defaultModel: DEFAULT_VOICES[id],
            available: Boolean(this.options.builders?.[id]) || this.isConfigured(id)
        }));
    }

    private isConfigured(id: SpeechProviderId): boolean {
        switch (id) {
            case 'openai':
                return Boolean(this.options.openai?.apiKey);
            case 'azure':
                return Boolean(this.options.azure?.apiKey && this.options.azure.region);
            case 'google':
                return Boolean(this.options.google?.apiKey);
        }
    }

    private build(id: SpeechProviderId): SpeechProviderPort | null {
        const { openai, azure, google } = this.options;
        switch (id) {
            case 'openai':
                return openai?.apiKey
                    ? new OpenAISpeechProvider({ apiKey: openai.apiKey, model: openai.model, timeoutMs: this.timeoutMs })
                    : null;
            case 'azure':
                return azure?.apiKey && azure.region
                    ? new AzureSpeechProvider({ apiKey: azure.apiKey, region: azure.region, timeoutMs: this.timeoutMs })
                    : null;
            case 'google':
                return google?.apiKey
                    ? new GoogleSpeechProvider({ apiKey: google.apiKey, timeoutMs: this.timeoutMs })
                    : null;
        }
    }
}
