import { type AudioFormat } from '../entities/audio';
import { type ProviderDescriptor } from '../entities/provider';
import { type RuntimeResource } from '../lifecycle';

export interface SpeechRequest {
  text: string;
  /** Provider voice name; `undefined` or `default` selects the provider default. */
  voice?: string | undefined;
  speed: number;
  signal?: AbortSignal | undefined;
}

export interface SpeechResult {
  audio: Buffer;
  format: AudioFormat;
  voice: string;
  durationSeconds: number;
  latencyMs: number;
}

export interface SpeechProviderPort extends RuntimeResource {
  readonly id: string;
  synthesize(request: SpeechRequest): Promise<SpeechResult>;
}

export interface SpeechAdapterFactoryPort {
  create(providerId: string): SpeechProviderPort;
  describeProviders(): ProviderDescriptor[];
}
