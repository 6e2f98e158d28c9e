import { describe, expect, it } from 'vitest';

import { GatewayError, type GatewayConfig } from '@glimpse/core';
import {
  TEST_API_KEY,
  TEST_CLIENT_ADDRESS,
  TEST_PNG_BASE64,
  createFakeGatewayConfig,
  createFakeGatewayDeps
} from '@glimpse/testing';
import { GatewayRuntime, type GatewayRequest, type GatewayStreamEvent, type RequestContext } from '../src/index';

function setup(overrides?: Partial<GatewayConfig>) {
  const config = createFakeGatewayConfig(overrides);
  const deps = createFakeGatewayDeps(config);
  const runtime = new GatewayRuntime({
    config,
    resources: deps,
    now: () => new Date('2025-01-01T00:00:00.000Z')
  });
  return { config, deps, runtime, orchestrator: runtime.orchestrator };
}

function request(overrides: Partial<GatewayRequest> = {}): GatewayRequest {
  return {
    image: TEST_PNG_BASE64,
    systemPrompt: 'Describe the scene for a blind reader.',
    provider: 'openai',
    speechEnabled: false,
    ...overrides
  };
}

let sequence = 0;
function context(overrides: Partial<RequestContext> = {}): RequestContext {
  sequence += 1;
  return { requestId: `req-${sequence}`, clientAddress: TEST_CLIENT_ADDRESS, ...overrides };
}

describe('gateway orchestrator', () => {
  it('answers and records both turns of the exchange', async () => {
    const { deps, runtime, orchestrator } = setup();

    const response = await orchestrator.handle(request(), context({ requestId: 'req-first' }));

    expect(response).toMatchObject({
      text: 'A fake description',
      audioLocator: null,
      requestId: 'req-first',
      latencyMs: 0
    });
    expect(runtime.conversations.history(response.conversationId).map((turn) => [turn.role, turn.content])).toEqual([
      ['user', 'Image uploaded'],
      ['assistant', 'A fake description']
    ]);
    expect(deps.vision.calls[0]).toMatchObject({
      image: { mimeType: 'image/png' },
      systemInstructions: 'Describe the scene for a blind reader.',
      history: [],
      wantStream: false
    });
  });

  it('passes the earlier exchange as history on the follow-up request', async () => {
    const { deps, runtime, orchestrator } = setup();
    const first = await orchestrator.handle(request(), context());

    const second = await orchestrator.handle(request({ conversationId: first.conversationId }), context());

    expect(second.conversationId).toBe(first.conversationId);
    expect(deps.vision.calls[1]?.history.map((turn) => turn.role)).toEqual(['user', 'assistant']);
    expect(runtime.conversations.history(first.conversationId)).toHaveLength(4);
  });

  it('stores synthesized audio and returns its locator', async () => {
    const { deps, runtime, orchestrator } = setup();

    const response = await orchestrator.handle(
      request({ speechEnabled: true, speechVoice: 'nova', speechSpeed: 5 }),
      context()
    );

    expect(response.audioLocator).toMatch(/^http:\/\/gateway\.test\/audio\/[0-9a-f-]{36}\.mp3$/);
    expect(deps.speech.calls).toHaveLength(1);
    expect(deps.speech.calls[0]).toMatchObject({ text: 'A fake description', voice: 'nova', speed: 2 });

    const filename = response.audioLocator?.split('/').pop() ?? '';
    const resolved = await runtime.audio.resolve(filename);
    expect(resolved.bytes.toString('utf8')).toBe('fake-audio');
    expect(resolved.asset.metadata).toEqual({ voice: 'nova', speed: 2, sourceTextLength: 18 });
  });

  it('answers without audio when speech times out', async () => {
    const { deps, orchestrator } = setup();
    deps.speech.setFailure(
      new GatewayError('UpstreamTimeout', 'openai did not respond within 10000ms', {
        details: { provider: 'openai', timeout_ms: 10_000 }
      })
    );

    const response = await orchestrator.handle(request({ speechEnabled: true }), context());

    expect(response.text).toBe('A fake description');
    expect(response.audioLocator).toBeNull();
    await expect(deps.storage.list()).resolves.toEqual([]);

    const speechDone = deps.telemetry.ofType('upstream_call_completed').filter((event) => event.target === 'speech');
    expect(speechDone).toHaveLength(1);
    expect(speechDone[0]).toMatchObject({ outcome: 'error', errorKind: 'SpeechGenerationFailed' });

    const warnings = deps.logger.withMessage('speech failed, answering without audio');
    expect(warnings).toHaveLength(1);
    expect(warnings[0]?.obj).toMatchObject({ errorKind: 'SpeechGenerationFailed', causeKind: 'UpstreamTimeout' });
  });

  it('skips speech when no speech provider is configured', async () => {
    const { deps, orchestrator } = setup({
      speech: { defaultProvider: null, timeoutMs: 10_000, openai: { model: 'tts-1' }, azure: {}, google: {} }
    });

    const response = await orchestrator.handle(request({ speechEnabled: true }), context());

    expect(response.audioLocator).toBeNull();
    expect(deps.speech.calls).toHaveLength(0);
  });

  it('rejects the request over the per-address quota with a retry hint', async () => {
    const { deps, orchestrator } = setup();

    for (let index = 0; index < 60; index += 1) {
      await orchestrator.handle(request(), context());
    }
    const rejected = orchestrator.handle(request(), context({ requestId: 'req-over' }));

    await expect(rejected).rejects.toMatchObject({
      kind: 'RateLimited',
      scope: 'address',
      retryAfterSeconds: 60,
      httpStatus: 429
    });
    expect(deps.vision.calls).toHaveLength(60);
    expect(deps.telemetry.ofType('request_rejected')).toMatchObject([
      { requestId: 'req-over', errorKind: 'RateLimited' }
    ]);
  });

  it('rejects an unknown provider before any upstream call', async () => {
    const { deps, orchestrator } = setup();

    await expect(orchestrator.handle(request({ provider: 'acme-vision' }), context())).rejects.toMatchObject({
      kind: 'UnsupportedProvider',
      httpStatus: 400
    });
    expect(deps.vision.calls).toHaveLength(0);
    expect(deps.telemetry.types()).toEqual(['request_admitted', 'request_rejected']);
  });

  it('rejects an unknown or unconfigured speech provider before the model call', async () => {
    const { deps, orchestrator } = setup();

    await expect(
      orchestrator.handle(request({ speechEnabled: true, speechProvider: 'acme-tts' }), context())
    ).rejects.toMatchObject({ kind: 'UnsupportedProvider', message: 'Unknown speech provider "acme-tts"' });
    await expect(
      orchestrator.stream(request({ speechEnabled: true, speechProvider: 'azure' }), context())
    ).rejects.toMatchObject({
      kind: 'UnsupportedProvider',
      message: 'Speech provider "azure" is not configured on this gateway'
    });

    expect(deps.vision.calls).toHaveLength(0);
    expect(deps.speech.calls).toHaveLength(0);
    expect(deps.telemetry.types()).toEqual([
      'request_admitted',
      'request_rejected',
      'request_admitted',
      'request_rejected'
    ]);
  });

  it('ignores the speech provider when speech is off', async () => {
    const { deps, orchestrator } = setup();

    const response = await orchestrator.handle(request({ speechProvider: 'acme-tts' }), context());

    expect(response.audioLocator).toBeNull();
    expect(deps.vision.calls).toHaveLength(1);
  });

  it('rejects undecodable images and unknown conversations', async () => {
    const { deps, orchestrator } = setup();

    await expect(orchestrator.handle(request({ image: 'not base64!' }), context())).rejects.toMatchObject({
      kind: 'InvalidImage'
    });
    await expect(
      orchestrator.handle(request({ conversationId: 'c0ffee00-0000-4000-8000-000000000000' }), context())
    ).rejects.toMatchObject({
      kind: 'ConversationNotFound',
      details: { conversation_id: 'c0ffee00-0000-4000-8000-000000000000' }
    });
    expect(deps.vision.calls).toHaveLength(0);
  });

  it('requires a valid credential when auth is on', async () => {
    const { orchestrator } = setup({ auth: { requireAuth: true, apiKeys: [TEST_API_KEY] } });

    await expect(orchestrator.handle(request(), context())).rejects.toMatchObject({
      kind: 'Unauthorized',
      message: 'An API key is required'
    });
    await expect(orchestrator.handle(request(), context({ credential: 'wrong-key' }))).rejects.toMatchObject({
      kind: 'Unauthorized',
      message: 'The API key is not valid'
    });
    await expect(orchestrator.handle(request(), context({ credential: TEST_API_KEY }))).resolves.toMatchObject({
      text: 'A fake description'
    });
  });

  it('applies the per-credential quota', async () => {
    const { orchestrator } = setup({
      auth: { requireAuth: true, apiKeys: [TEST_API_KEY] },
      limits: {
        perAddressPerMinute: 60,
        perCredentialPerMinute: 2,
        windowMs: 60_000,
        sweepIntervalMs: 300_000,
        maxImageBytes: 1_048_576
      }
    });

    await orchestrator.handle(request(), context({ credential: TEST_API_KEY }));
    await orchestrator.handle(request(), context({ credential: TEST_API_KEY, clientAddress: '198.51.100.1' }));

    await expect(
      orchestrator.handle(request(), context({ credential: TEST_API_KEY, clientAddress: '198.51.100.2' }))
    ).rejects.toMatchObject({ kind: 'RateLimited', scope: 'credential' });
  });

  it('surfaces a failed model call as ModelCallFailed and keeps the user turn', async () => {
    const { deps, runtime, orchestrator } = setup();
    const first = await orchestrator.handle(request(), context());
    deps.vision.setScript({ error: new GatewayError('UpstreamUnreachable', 'Could not reach openai') });

    await expect(
      orchestrator.handle(request({ conversationId: first.conversationId }), context())
    ).rejects.toMatchObject({
      kind: 'ModelCallFailed',
      upstreamKind: 'UpstreamUnreachable',
      vendorMessage: 'Could not reach openai',
      httpStatus: 502
    });
    expect(runtime.conversations.history(first.conversationId).map((turn) => turn.role)).toEqual([
      'user',
      'assistant',
      'user'
    ]);
  });

  it('treats an empty answer as a failed model call', async () => {
    const { deps, orchestrator } = setup();
    deps.vision.setScript({ text: '   ' });

    await expect(orchestrator.handle(request(), context())).rejects.toMatchObject({
      kind: 'ModelCallFailed',
      upstreamKind: 'UpstreamRejected',
      vendorMessage: 'openai rejected the request: the model returned an empty answer'
    });
  });

  it('streams fragments and then one done event', async () => {
    const { deps, orchestrator } = setup();

    const stream = await orchestrator.stream(request({ speechEnabled: true }), context());
    const events: GatewayStreamEvent[] = [];
    for await (const event of stream) {
      events.push(event);
    }

    expect(events.slice(0, 3)).toEqual([
      { type: 'fragment', text: 'A ' },
      { type: 'fragment', text: 'fake ' },
      { type: 'fragment', text: 'description' }
    ]);
    expect(events[3]).toMatchObject({ type: 'done', conversationId: stream.conversationId, latencyMs: 0 });
    expect(events).toHaveLength(4);
    expect(deps.speech.calls[0]?.text).toBe('A fake description');
    expect(deps.telemetry.events.map((event) => `${event.type}:${'target' in event ? event.target : '-'}`)).toEqual([
      'request_admitted:-',
      'upstream_call_started:model',
      'upstream_call_completed:model',
      'upstream_call_started:speech',
      'upstream_call_completed:speech'
    ]);
  });

  it('keeps the user turn when the caller disconnects mid-stream', async () => {
    const { deps, runtime, orchestrator } = setup();
    deps.vision.setScript({ fragments: ['A ', 'cat'], hangAfterFragments: true });
    const controller = new AbortController();

    const stream = await orchestrator.stream(request(), context({ signal: controller.signal }));
    const received: string[] = [];
    let failure: unknown;
    try {
      for await (const event of stream) {
        if (event.type === 'fragment') {
          received.push(event.text);
        }
        if (received.length === 2) {
          controller.abort();
        }
      }
    } catch (error) {
      failure = error;
    }

    expect(received).toEqual(['A ', 'cat']);
    expect(failure).toMatchObject({ kind: 'RequestCancelled' });
    expect(runtime.conversations.history(stream.conversationId).map((turn) => turn.content)).toEqual([
      'Image uploaded'
    ]);
    expect(deps.telemetry.ofType('upstream_call_completed')).toMatchObject([
      { target: 'model', outcome: 'cancelled', errorKind: 'RequestCancelled' }
    ]);
  });

  it('cancels the upstream call when a stream is dropped before reading', async () => {
    const { deps, orchestrator } = setup();

    const stream = await orchestrator.stream(request(), context());
    stream.cancel();

    expect(deps.vision.signals[0]?.aborted).toBe(true);
    expect(deps.telemetry.ofType('upstream_call_completed')).toMatchObject([{ outcome: 'cancelled' }]);
  });

  it('logs every state transition of a request', async () => {
    const { deps, orchestrator } = setup();

    await orchestrator.handle(request(), context({ requestId: 'req-trace' }));

    const transitions = deps.logger
      .withMessage('request state changed')
      .filter((entry) => entry.obj?.['requestId'] === 'req-trace')
      .map((entry) => entry.obj?.['to']);
    expect(transitions).toEqual(['authorized', 'history_loaded', 'model_in_flight', 'model_complete', 'response_assembled']);
  });

  it('probes a provider behind the same admission checks', async () => {
    const { deps, orchestrator } = setup();

    await expect(orchestrator.probe({ provider: 'openai' }, context())).resolves.toEqual({
      ok: true,
      latencyMs: 1,
      detail: 'openai is reachable'
    });
    expect(deps.vision.probes).toBe(1);
    await expect(orchestrator.probe({ provider: 'custom' }, context())).rejects.toMatchObject({
      kind: 'InvalidCustomConfig'
    });
  });

  it('describes vision and speech providers', () => {
    const { orchestrator } = setup();

    const providers = orchestrator.describeProviders();

    expect(providers.vision.find((provider) => provider.id === 'openai')?.available).toBe(true);
    expect(providers.vision.find((provider) => provider.id === 'claude')?.available).toBe(false);
    expect(providers.speech.find((provider) => provider.id === 'openai')?.available).toBe(true);
  });
});
