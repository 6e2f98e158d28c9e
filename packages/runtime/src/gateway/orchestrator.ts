import {
  GatewayError,
  ModelCallFailedError,
  RateLimitedError,
  USER_IMAGE_TURN,
  decodeImagePayload,
  isUpstreamError,
  toGatewayError,
  upstreamRejected,
  type ConnectionProbe,
  type ConversationTurn,
  type CredentialValidatorPort,
  type DecodedImage,
  type FragmentSequence,
  type GatewayEvent,
  type Logger,
  type ProviderDescriptor,
  type ProviderResult,
  type SpeechAdapterFactoryPort,
  type SpeechProviderPort,
  type TelemetrySinkPort,
  type VisionAdapterFactoryPort,
  type VisionProviderPort
} from '@glimpse/core';
import { type AudioLifecycleManager } from '../audio/manager';
import { type ConversationStore } from '../conversation/store';
import { type SlidingWindowRateLimiter } from '../ratelimit/slidingWindow';
import { clampSpeed, prepareSpeechText } from '../speech/preprocess';
import { GatewayStream } from './stream';
import {
  type GatewayDoneEvent,
  type GatewayRequest,
  type GatewayResponse,
  type ProbeRequest,
  type RequestContext,
  type RequestState
} from './types';

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;
type GatewayEventInput = DistributiveOmit<GatewayEvent, 'timestamp' | 'requestId'>;

export interface GatewayOrchestratorDeps {
  conversations: ConversationStore;
  addressLimiter: SlidingWindowRateLimiter;
  credentialLimiter: SlidingWindowRateLimiter;
  visionFactory: VisionAdapterFactoryPort;
  speechFactory: SpeechAdapterFactoryPort;
  audio: AudioLifecycleManager;
  credentials: CredentialValidatorPort;
  telemetry: TelemetrySinkPort;
  logger: Logger;
  /** Used when a request asks for speech without naming a provider; `null` disables speech. */
  defaultSpeechProvider: string | null;
  maxImageBytes: number;
  clock?: () => number;
}

/** Per-request bookkeeping: correlation id, child logger and the current state. */
class RequestTrace {
  public state: RequestState = 'admitted';
  public readonly log: Logger;

  public constructor(
    public readonly requestId: string,
    public readonly startedAt: number,
    logger: Logger
  ) {
    this.log = logger.child({ requestId });
  }

  public moveTo(state: RequestState): void {
    this.log.debug({ from: this.state, to: state }, 'request state changed');
    this.state = state;
  }
}

interface PreparedRequest {
  trace: RequestTrace;
  adapter: VisionProviderPort;
  image: DecodedImage;
  conversationId: string;
  /** Turns recorded before this request's own user turn. */
  history: ConversationTurn[];
  /** `null` when speech is off or no provider is configured. */
  speech: SpeechProviderPort | null;
}

interface ModelCall {
  prepared: PreparedRequest;
  startedAt: number;
}

function singleFragment(text: string): FragmentSequence {
  return {
    cancel: () => undefined,
    async *[Symbol.asyncIterator]() {
      yield text;
    }
  };
}

async function collectText(result: ProviderResult): Promise<string> {
  if (result.kind === 'complete') {
    return result.text;
  }
  let text = '';
  for await (const fragment of result.fragments) {
    text += fragment;
  }
  return text;
}

/**
 * Sequences one request: credential check, rate limits, image and provider
 * validation, conversation history, the model call and optional speech.
 * Caller errors are rejected before any upstream call; speech failures
 * never fail the request.
 */
export class GatewayOrchestrator {
  private readonly deps: GatewayOrchestratorDeps;
  private readonly clock: () => number;

  public constructor(deps: GatewayOrchestratorDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? Date.now;
  }

  public async handle(request: GatewayRequest, context: RequestContext): Promise<GatewayResponse> {
    const prepared = await this.prepare(request, context, false);
    const call = this.startModelCall(prepared);

    let text: string;
    try {
      text = await collectText(await this.invokeModel(call, request, false, context.signal));
    } catch (error) {
      throw this.modelFailure(call, error);
    }

    this.completeModel(call, text);
    const audioLocator = await this.speak(prepared, request, text, context.signal);
    prepared.trace.moveTo('response_assembled');

    const latencyMs = this.elapsed(prepared.trace.startedAt);
    prepared.trace.log.info({ latencyMs, withAudio: audioLocator !== null }, 'request completed');
    return {
      text,
      audioLocator,
      conversationId: prepared.conversationId,
      latencyMs,
      requestId: context.requestId
    };
  }

  /**
   * Resolves once the upstream stream is open. Admission, validation and
   * connection failures reject the returned promise; later failures are
   * thrown by the iterator.
   */
  public async stream(request: GatewayRequest, context: RequestContext): Promise<GatewayStream> {
    const prepared = await this.prepare(request, context, true);
    const call = this.startModelCall(prepared);

    let result: ProviderResult;
    try {
      result = await this.invokeModel(call, request, true, context.signal);
    } catch (error) {
      throw this.modelFailure(call, error);
    }

    const fragments = result.kind === 'stream' ? result.fragments : singleFragment(result.text);
    return new GatewayStream(prepared.conversationId, context.requestId, fragments, {
      complete: async (text): Promise<GatewayDoneEvent> => {
        this.completeModel(call, text);
        const audioLocator = await this.speak(prepared, request, text, context.signal);
        prepared.trace.moveTo('response_assembled');
        const latencyMs = this.elapsed(prepared.trace.startedAt);
        prepared.trace.log.info({ latencyMs, withAudio: audioLocator !== null }, 'stream completed');
        return { type: 'done', conversationId: prepared.conversationId, audioLocator, latencyMs };
      },
      fail: (error) => this.modelFailure(call, error),
      abandon: () => {
        this.modelFailure(call, new GatewayError('RequestCancelled', 'The caller stopped reading the stream'));
      }
    });
  }

  /** Connection probe for one provider, behind the same credential and address checks. */
  public async probe(request: ProbeRequest, context: RequestContext): Promise<ConnectionProbe> {
    const trace = new RequestTrace(context.requestId, this.clock(), context.logger ?? this.deps.logger);
    let adapter: VisionProviderPort;
    try {
      await this.authorize(trace, context);
      adapter = this.deps.visionFactory.create(request.provider, request.customConfig);
    } catch (error) {
      throw this.reject(trace, error);
    }

    const probe = await adapter.testConnection();
    trace.log.info({ provider: adapter.id, ok: probe.ok, latencyMs: probe.latencyMs }, 'connection probed');
    return probe;
  }

  public describeProviders(): { vision: ProviderDescriptor[]; speech: ProviderDescriptor[] } {
    return {
      vision: this.deps.visionFactory.describeProviders(),
      speech: this.deps.speechFactory.describeProviders()
    };
  }

  private async prepare(request: GatewayRequest, context: RequestContext, stream: boolean): Promise<PreparedRequest> {
    const trace = new RequestTrace(context.requestId, this.clock(), context.logger ?? this.deps.logger);
    const { conversations, visionFactory, maxImageBytes } = this.deps;

    let adapter: VisionProviderPort;
    let image: DecodedImage;
    let conversationId: string;
    let speech: SpeechProviderPort | null;
    try {
      await this.authorize(trace, context);
      this.emit(trace, {
        type: 'request_admitted',
        clientAddress: context.clientAddress,
        provider: request.provider,
        stream
      });

      image = decodeImagePayload(request.image, maxImageBytes);
      adapter = visionFactory.create(request.provider, request.customConfig);
      speech = this.resolveSpeech(trace, request);

      if (request.conversationId !== undefined) {
        if (!conversations.exists(request.conversationId)) {
          throw new GatewayError('ConversationNotFound', `Conversation ${request.conversationId} does not exist or has expired`, {
            details: { conversation_id: request.conversationId }
          });
        }
        conversationId = request.conversationId;
      } else {
        conversationId = conversations.create();
      }
    } catch (error) {
      throw this.reject(trace, error);
    }

    const history = conversations.history(conversationId);
    conversations.append(conversationId, 'user', USER_IMAGE_TURN);
    trace.log.debug({ conversationId, historyTurns: history.length }, 'history loaded');
    trace.moveTo('history_loaded');

    return { trace, adapter, image, conversationId, history, speech };
  }

  private resolveSpeech(trace: RequestTrace, request: GatewayRequest): SpeechProviderPort | null {
    if (!request.speechEnabled) {
      return null;
    }
    const provider = request.speechProvider ?? this.deps.defaultSpeechProvider;
    if (!provider) {
      trace.log.debug('speech requested but no speech provider is configured');
      return null;
    }
    return this.deps.speechFactory.create(provider);
  }

  private async authorize(trace: RequestTrace, context: RequestContext): Promise<void> {
    const { credentials, addressLimiter, credentialLimiter } = this.deps;

    if (!(await credentials.validate(context.credential))) {
      throw new GatewayError('Unauthorized', context.credential ? 'The API key is not valid' : 'An API key is required');
    }
    trace.moveTo('authorized');

    const byAddress = await addressLimiter.admit(context.clientAddress);
    if (!byAddress.allowed) {
      throw new RateLimitedError('address', byAddress.retryAfterMs);
    }
    if (context.credential) {
      const byCredential = await credentialLimiter.admit(context.credential);
      if (!byCredential.allowed) {
        throw new RateLimitedError('credential', byCredential.retryAfterMs);
      }
    }
  }

  private reject(trace: RequestTrace, error: unknown): GatewayError {
    const failure = toGatewayError(error);
    this.emit(trace, { type: 'request_rejected', errorKind: failure.kind, message: failure.message });
    trace.log.info({ errorKind: failure.kind, err: failure.message }, 'request rejected');
    trace.moveTo('rejected');
    return failure;
  }

  private startModelCall(prepared: PreparedRequest): ModelCall {
    this.emit(prepared.trace, { type: 'upstream_call_started', target: 'model', provider: prepared.adapter.id });
    prepared.trace.moveTo('model_in_flight');
    return { prepared, startedAt: this.clock() };
  }

  private invokeModel(
    call: ModelCall,
    request: GatewayRequest,
    wantStream: boolean,
    signal: AbortSignal | undefined
  ): Promise<ProviderResult> {
    const { adapter, image, history } = call.prepared;
    return adapter.processImage({
      image: { data: image.data, mimeType: image.mimeType },
      systemInstructions: request.systemPrompt,
      history,
      wantStream,
      signal
    });
  }

  /** Records the answer; an empty answer counts as a failed model call. */
  private completeModel(call: ModelCall, text: string): void {
    const { trace, adapter, conversationId } = call.prepared;
    if (text.trim().length === 0) {
      throw this.modelFailure(call, upstreamRejected(adapter.id, undefined, 'the model returned an empty answer'));
    }

    this.emit(trace, {
      type: 'upstream_call_completed',
      target: 'model',
      provider: adapter.id,
      durationMs: this.elapsed(call.startedAt),
      outcome: 'ok'
    });
    this.deps.conversations.append(conversationId, 'assistant', text);
    trace.moveTo('model_complete');
  }

  private modelFailure(call: ModelCall, error: unknown): GatewayError {
    const { trace, adapter } = call.prepared;
    const failure = toGatewayError(error);
    const cancelled = failure.kind === 'RequestCancelled';

    this.emit(trace, {
      type: 'upstream_call_completed',
      target: 'model',
      provider: adapter.id,
      durationMs: this.elapsed(call.startedAt),
      outcome: cancelled ? 'cancelled' : 'error',
      errorKind: failure.kind
    });
    trace.moveTo('model_failed');

    if (cancelled) {
      trace.log.info({ provider: adapter.id }, 'model call cancelled by the caller');
      return failure;
    }
    trace.log.warn({ provider: adapter.id, errorKind: failure.kind, err: failure.message }, 'model call failed');
    return isUpstreamError(failure) ? new ModelCallFailedError(adapter.id, failure) : failure;
  }

  /** Returns the audio locator, or null when speech is off or fails. */
  private async speak(
    prepared: PreparedRequest,
    request: GatewayRequest,
    text: string,
    signal: AbortSignal | undefined
  ): Promise<string | null> {
    const { trace, speech: adapter } = prepared;
    if (!adapter) {
      return null;
    }
    const provider = adapter.id;

    const startedAt = this.clock();
    this.emit(trace, { type: 'upstream_call_started', target: 'speech', provider });
    trace.moveTo('speech_in_flight');

    try {
      const spoken = prepareSpeechText(text);
      const speed = clampSpeed(request.speechSpeed);
      const result = await adapter.synthesize({ text: spoken, voice: request.speechVoice, speed, signal });
      const asset = await this.deps.audio.store(
        result.audio,
        result.format,
        { voice: result.voice, speed, sourceTextLength: spoken.length },
        result.durationSeconds
      );

      this.emit(trace, {
        type: 'upstream_call_completed',
        target: 'speech',
        provider,
        durationMs: this.elapsed(startedAt),
        outcome: 'ok'
      });
      trace.moveTo('speech_complete');
      return asset.locator;
    } catch (error) {
      const cause = toGatewayError(error, 'SpeechGenerationFailed');
      const cancelled = cause.kind === 'RequestCancelled';
      const failure = cancelled || cause.kind === 'SpeechGenerationFailed'
        ? cause
        : new GatewayError('SpeechGenerationFailed', `Speech via ${provider} failed: ${cause.message}`, {
          cause,
          details: { provider, cause_kind: cause.kind }
        });

      this.emit(trace, {
        type: 'upstream_call_completed',
        target: 'speech',
        provider,
        durationMs: this.elapsed(startedAt),
        outcome: cancelled ? 'cancelled' : 'error',
        errorKind: failure.kind
      });
      trace.log.warn(
        { provider, errorKind: failure.kind, causeKind: cause.kind, err: failure.message },
        'speech failed, answering without audio'
      );
      trace.moveTo('speech_failed');
      return null;
    }
  }

  private emit(trace: RequestTrace, event: GatewayEventInput): void {
    this.deps.telemetry.emit({ ...event, requestId: trace.requestId, timestamp: new Date() });
  }

  private elapsed(since: number): number {
    return Math.max(0, this.clock() - since);
  }
}
