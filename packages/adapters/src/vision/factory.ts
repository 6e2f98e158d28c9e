import { z } from 'zod';
import {
    GatewayError,
    isBuiltinVisionProvider,
    UPSTREAM_DEFAULTS,
    VISION_PROVIDER_IDS,
    type BuiltinVisionProviderId,
    type CustomProviderConfig,
    type CustomProviderConfigInput,
    type ProviderDescriptor,
    type VisionAdapterFactoryPort,
    type VisionProviderId,
    type VisionProviderPort
} from '@glimpse/core';
import { ClaudeVisionProvider } from '../anthropic/vision';
import { GeminiVisionProvider } from '../google/vision';
import { OpenAIVisionProvider } from '../openai/vision';
import { normalizeCustomBaseUrl, VISION_VENDORS } from './vendors';

export interface VisionAdapterSettings {
    providerId: VisionProviderId;
    apiKey: string;
    model: string;
    baseUrl: string | undefined;
    headers: Record<string, string>;
    timeoutMs: number;
}

export type VisionAdapterBuilder = (settings: VisionAdapterSettings) => VisionProviderPort;

function builtinBuilder(id: BuiltinVisionProviderId): VisionAdapterBuilder {
    const vendor = VISION_VENDORS[id];
    switch (vendor.transport) {
        case 'anthropic':
            return (settings) => new ClaudeVisionProvider({
                apiKey: settings.apiKey,
                model: settings.model,
                endpoint: settings.baseUrl,
                timeoutMs: settings.timeoutMs
            });
        case 'gemini':
            return (settings) => new GeminiVisionProvider({
                apiKey: settings.apiKey,
                model: settings.model,
                timeoutMs: settings.timeoutMs
            });
        case 'openai':
            return (settings) => new OpenAIVisionProvider({
                id,
                apiKey: settings.apiKey,
                model: settings.model,
                baseUrl: settings.baseUrl,
                timeoutMs: settings.timeoutMs,
                probe: vendor.probe
            });
    }
}

const customBuilder: VisionAdapterBuilder = (settings) => new OpenAIVisionProvider({
    id: 'custom',
    apiKey: settings.apiKey,
    model: settings.model,
    baseUrl: settings.baseUrl,
    headers: settings.headers,
    timeoutMs: settings.timeoutMs,
    probe: 'hello'
});

const CustomConfigSchema = z.object({
    baseUrl: z
        .string({ required_error: 'base_url is required' })
        .url('base_url must be an absolute URL')
        .refine((value) => /^https?:\/\//i.test(value), 'base_url must use http or https'),
    apiKey: z.string({ required_error: 'api_key is required' }).min(1, 'api_key must not be empty'),
    modelName: z.string({ required_error: 'model_name is required' }).min(1, 'model_name must not be empty'),
    headers: z.record(z.string()).default({})
});

export function parseCustomConfig(input: CustomProviderConfigInput | undefined): CustomProviderConfig {
    if (!input) {
        throw new GatewayError('InvalidCustomConfig', 'The custom provider requires custom_config');
    }

    const parsed = CustomConfigSchema.safeParse(input);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => issue.message);
        throw new GatewayError('InvalidCustomConfig', `Invalid custom_config: ${issues.join('; ')}`, {
            details: { issues }
        });
    }

    return { ...parsed.data, baseUrl: normalizeCustomBaseUrl(parsed.data.baseUrl) };
}

export interface VisionAdapterFactoryOptions {
    apiKeys: Partial<Record<BuiltinVisionProviderId, string>>;
    timeoutMs?: number | undefined;
    /** Replaces the adapter constructed for a provider id. */
    builders?: Partial<Record<VisionProviderId, VisionAdapterBuilder>> | undefined;
}

/**
 * Static provider table. Construction never performs I/O; the adapters
 * connect on their first call.
 */
export class VisionAdapterFactory implements VisionAdapterFactoryPort {
    private readonly timeoutMs: number;

    public constructor(private readonly options: VisionAdapterFactoryOptions) {
        this.timeoutMs = options.timeoutMs ?? UPSTREAM_DEFAULTS.MODEL_TIMEOUT_SECONDS * 1000;
    }

    public create(providerId: string, customConfig?: CustomProviderConfigInput): VisionProviderPort {
        if (providerId === 'custom') {
            const config = parseCustomConfig(customConfig);
            const build = this.options.builders?.custom ?? customBuilder;
            return build({
                providerId: 'custom',
                apiKey: config.apiKey,
                model: config.modelName,
                baseUrl: config.baseUrl,
                headers: config.headers,
                timeoutMs: this.timeoutMs
            });
        }

        if (!isBuiltinVisionProvider(providerId)) {
            throw new GatewayError('UnsupportedProvider', `Unknown provider "${providerId}"`, {
                details: { supported: [...VISION_PROVIDER_IDS, 'custom'] }
            });
        }

        const apiKey = this.options.apiKeys[providerId];
        if (!apiKey) {
            throw new GatewayError('UnsupportedProvider', `Provider "${providerId}" is not configured on this gateway`, {
                details: { provider: providerId, reason: 'missing API key' }
            });
        }

        const vendor = VISION_VENDORS[providerId];
        const build = this.options.builders?.[providerId] ?? builtinBuilder(providerId);
        return build({
            providerId,
            apiKey,
            model: vendor.defaultModel,
            baseUrl: vendor.baseUrl,
            headers: {},
            timeoutMs: this.timeoutMs
        });
    }

    public describeProviders(): ProviderDescriptor[] {
        const builtins = VISION_PROVIDER_IDS.map((id) => ({
            id,
            defaultModel: VISION_VENDORS[id].defaultModel,
            available: Boolean(this.options.apiKeys[id])
        }));
        return [...builtins, { id: 'custom', defaultModel: 'caller-defined', available: true }];
    }
}
