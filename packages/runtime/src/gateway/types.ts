import { type CustomProviderConfigInput, type Logger } from '@glimpse/core';

export interface GatewayRequest {
  /** Base64 image, optionally as a `data:` URL. */
  image: string;
  systemPrompt: string;
  provider: string;
  customConfig?: CustomProviderConfigInput | undefined;
  /** Continues an existing conversation; a new one is created when absent. */
  conversationId?: string | undefined;
  speechEnabled: boolean;
  speechVoice?: string | undefined;
  speechSpeed?: number | undefined;
  /** Overrides the configured default speech provider. */
  speechProvider?: string | undefined;
}

export interface RequestContext {
  requestId: string;
  clientAddress: string;
  /** API key presented by the caller, if any. */
  credential?: string | undefined;
  /** Aborted when the caller goes away. */
  signal?: AbortSignal | undefined;
  logger?: Logger | undefined;
}

export interface GatewayResponse {
  text: string;
  audioLocator: string | null;
  conversationId: string;
  latencyMs: number;
  requestId: string;
}

export type GatewayStreamEvent =
  | { type: 'fragment'; text: string }
  | { type: 'done'; conversationId: string; audioLocator: string | null; latencyMs: number };

export type GatewayDoneEvent = Extract<GatewayStreamEvent, { type: 'done' }>;

export interface ProbeRequest {
  provider: string;
  customConfig?: CustomProviderConfigInput | undefined;
}

export type RequestState =
  | 'admitted'
  | 'authorized'
  | 'history_loaded'
  | 'model_in_flight'
  | 'model_complete'
  | 'model_failed'
  | 'speech_in_flight'
  | 'speech_complete'
  | 'speech_failed'
  | 'response_assembled'
  | 'rejected';
