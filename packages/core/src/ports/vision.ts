import { type ConversationTurn } from '../entities/conversation';
import { type CustomProviderConfigInput, type ProviderDescriptor } from '../entities/provider';
import { type RuntimeResource } from '../lifecycle';
import { type ImageMimeType } from '../utils/image';

export interface ImagePayload {
  /** Base64 without any `data:` prefix. */
  data: string;
  mimeType: ImageMimeType;
}

export interface ProviderRequest {
  image: ImagePayload;
  systemInstructions: string;
  history: readonly ConversationTurn[];
  wantStream: boolean;
  /** Aborting it cancels the in-flight upstream call. */
  signal?: AbortSignal | undefined;
}

/**
 * Lazy, finite, single-use sequence of text fragments.
 * It ends when fully consumed or when cancelled.
 */
export interface FragmentSequence extends AsyncIterable<string> {
  cancel(): void;
}

export type ProviderResult =
  | { kind: 'complete'; text: string }
  | { kind: 'stream'; fragments: FragmentSequence };

export interface ConnectionProbe {
  ok: boolean;
  latencyMs: number;
  detail: string;
}

export interface VisionProviderPort extends RuntimeResource {
  readonly id: string;
  readonly model: string;
  processImage(request: ProviderRequest): Promise<ProviderResult>;
  testConnection(): Promise<ConnectionProbe>;
}

export interface VisionAdapterFactoryPort {
  /** Throws `UnsupportedProvider` or `InvalidCustomConfig`; never touches the network. */
  create(providerId: string, customConfig?: CustomProviderConfigInput): VisionProviderPort;
  describeProviders(): ProviderDescriptor[];
}
