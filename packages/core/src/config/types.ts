import { type BuiltinVisionProviderId, type SpeechProviderId } from '../entities/provider';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface GatewayConfig {
  server: {
    host: string;
    port: number;
    publicBaseUrl: string;
    trustProxy: boolean;
    /** Origins answered with CORS headers; `*` allows any, empty disables CORS. */
    allowedOrigins: string[];
  };
  logging: {
    level: LogLevel;
    pretty: boolean;
  };
  auth: {
    requireAuth: boolean;
    apiKeys: string[];
  };
  limits: {
    perAddressPerMinute: number;
    perCredentialPerMinute: number;
    windowMs: number;
    sweepIntervalMs: number;
    maxImageBytes: number;
  };
  conversations: {
    ttlMs: number;
    maxTurns: number;
    sweepIntervalMs: number;
  };
  vision: {
    timeoutMs: number;
    apiKeys: Partial<Record<BuiltinVisionProviderId, string>>;
  };
  speech: {
    /** `null` when no speech provider is configured; speech requests then return no audio. */
    defaultProvider: SpeechProviderId | null;
    timeoutMs: number;
    openai: { apiKey?: string | undefined; model: string };
    azure: { apiKey?: string | undefined; region?: string | undefined };
    google: { apiKey?: string | undefined };
  };
  audio: {
    directory: string;
    expirationMs: number;
    sweepIntervalMs: number;
  };
}
