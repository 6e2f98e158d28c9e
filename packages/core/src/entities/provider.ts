export const VISION_PROVIDER_IDS = ['openai', 'claude', 'gemini', 'qwen', 'doubao', 'glm'] as const;

export type BuiltinVisionProviderId = (typeof VISION_PROVIDER_IDS)[number];

export type VisionProviderId = BuiltinVisionProviderId | 'custom';

export const SPEECH_PROVIDER_IDS = ['openai', 'azure', 'google'] as const;

export type SpeechProviderId = (typeof SPEECH_PROVIDER_IDS)[number];

/** Caller-supplied endpoint for the `custom` provider, as received (unvalidated). */
export interface CustomProviderConfigInput {
  baseUrl?: string | undefined;
  apiKey?: string | undefined;
  modelName?: string | undefined;
  headers?: Record<string, string> | undefined;
}

export interface CustomProviderConfig {
  baseUrl: string;
  apiKey: string;
  modelName: string;
  headers: Record<string, string>;
}

export interface ProviderDescriptor {
  id: string;
  defaultModel: string;
  available: boolean;
}

export function isBuiltinVisionProvider(value: string): value is BuiltinVisionProviderId {
  return VISION_PROVIDER_IDS.some((id) => id === value);
}

export function isSpeechProvider(value: string): value is SpeechProviderId {
  return SPEECH_PROVIDER_IDS.some((id) => id === value);
}
