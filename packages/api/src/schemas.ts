import { z } from 'zod';
import { GatewayError } from '@glimpse/core';
import { type GatewayRequest, type ProbeRequest } from '@glimpse/runtime';

const CustomConfigBody = z.object({
    base_url: z.string().optional(),
    api_key: z.string().optional(),
    model_name: z.string().optional(),
    headers: z.record(z.string()).optional()
});

export const ChatBodySchema = z.object({
    image_base64: z.string().min(1, 'image_base64 must not be empty'),
    system_prompt: z.string().min(1).max(2000),
    provider: z.string().min(1),
    custom_config: CustomConfigBody.optional(),
    conversation_id: z.string().min(1).optional(),
    stream: z.boolean().default(false),
    tts_enabled: z.boolean().default(true),
    tts_voice: z.string().min(1).optional(),
    tts_speed: z.number().min(0.5).max(2).default(1),
    tts_provider: z.string().min(1).optional()
});

export const TestConnectionBodySchema = z.object({
    provider: z.string().min(1),
    custom_config: CustomConfigBody.optional()
});

export type ChatBody = z.infer<typeof ChatBodySchema>;
export type TestConnectionBody = z.infer<typeof TestConnectionBodySchema>;

/** Parses a request body, throwing `InvalidRequest` with one entry per issue. */
export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
    const parsed = schema.safeParse(body ?? {});
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => {
            const path = issue.path.join('.');
            return path ? `${path}: ${issue.message}` : issue.message;
        });
        throw new GatewayError('InvalidRequest', `Invalid request body: ${issues.join('; ')}`, {
            details: { issues }
        });
    }
    return parsed.data;
}

function toCustomConfig(body: ChatBody['custom_config']): GatewayRequest['customConfig'] {
    if (!body) {
        return undefined;
    }
    return {
        baseUrl: body.base_url,
        apiKey: body.api_key,
        modelName: body.model_name,
        headers: body.headers
    };
}

export function toGatewayRequest(body: ChatBody): GatewayRequest {
    return {
        image: body.image_base64,
        systemPrompt: body.system_prompt,
        provider: body.provider,
        customConfig: toCustomConfig(body.custom_config),
        conversationId: body.conversation_id,
        speechEnabled: body.tts_enabled,
        speechVoice: body.tts_voice,
        speechSpeed: body.tts_speed,
        speechProvider: body.tts_provider
    };
}

export function toProbeRequest(body: TestConnectionBody): ProbeRequest {
    return { provider: body.provider, customConfig: toCustomConfig(body.custom_config) };
}
