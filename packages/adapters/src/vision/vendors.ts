import { type BuiltinVisionProviderId } from '@glimpse/core';

export interface VisionVendor {
    defaultModel: string;
    /** Endpoint base; `undefined` lets the vendor SDK choose. */
    baseUrl: string | undefined;
    transport: 'openai' | 'anthropic' | 'gemini';
    probe: 'models' | 'hello';
}

export const VISION_VENDORS: Record<BuiltinVisionProviderId, VisionVendor> = {
    openai: {
        defaultModel: 'gpt-4o',
        baseUrl: 'https://api.openai.com/v1',
        transport: 'openai',
        probe: 'models'
    },
    claude: {
        defaultModel: 'claude-3-5-sonnet-20241022',
        baseUrl: 'https://api.anthropic.com/v1/messages',
        transport: 'anthropic',
        probe: 'hello'
    },
    gemini: {
        defaultModel: 'gemini-2.0-flash',
        baseUrl: undefined,
        transport: 'gemini',
        probe: 'hello'
    },
    qwen: {
        defaultModel: 'qwen-vl-max',
        baseUrl: 'https://dashscope.aliyuncs.com/compatible-mode/v1',
        transport: 'openai',
        probe: 'hello'
    },
    doubao: {
        defaultModel: 'doubao-seed-1-6-flash-250828',
        baseUrl: 'https://ark.cn-beijing.volces.com/api/v3',
        transport: 'openai',
        probe: 'hello'
    },
    glm: {
        defaultModel: 'glm-4v-flash',
        baseUrl: 'https://open.bigmodel.cn/api/paas/v4',
        transport: 'openai',
        probe: 'hello'
    }
};

/**
 * Accepts a full `/chat/completions` URL, a `/v1` base, or a bare host, and
 * returns the base the OpenAI SDK appends `/chat/completions` to.
 */
export function normalizeCustomBaseUrl(raw: string): string {
    const trimmed = raw.trim().replace(/\/+$/, '');
    const completions = trimmed.indexOf('/chat/completions');
    if (completions !== -1) {
        return trimmed.slice(0, completions);
    }
    if (trimmed.endsWith('/v1')) {
        return trimmed;
    }
    return `${trimmed}/v1`;
}
